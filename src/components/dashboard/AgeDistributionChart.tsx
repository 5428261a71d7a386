import { Bar, BarChart, CartesianGrid, Legend, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts';
import { OUTCOME_DISPLAY, type OutcomeBucket } from '../../types/appointment';
import { ChartCard, OUTCOME_COLORS } from './ChartCard';

/**
 * Counts per age, one bar per outcome drawn over each other.
 */
export function AgeDistributionChart({ data }: { data: OutcomeBucket<number>[] }) {
  return (
    <ChartCard title="Age Distribution" isEmpty={data.length === 0}>
      <ResponsiveContainer width="100%" height="100%">
        <BarChart data={data} barGap="-100%" barCategoryGap={0}>
          <CartesianGrid strokeDasharray="3 3" vertical={false} />
          <XAxis dataKey="key" name="Age" />
          <YAxis allowDecimals={false} />
          <Tooltip labelFormatter={(age) => `Age ${String(age)}`} />
          <Legend />
          <Bar dataKey="No" name={OUTCOME_DISPLAY.No} fill={OUTCOME_COLORS.No} fillOpacity={0.6} />
          <Bar dataKey="Yes" name={OUTCOME_DISPLAY.Yes} fill={OUTCOME_COLORS.Yes} fillOpacity={0.6} />
        </BarChart>
      </ResponsiveContainer>
    </ChartCard>
  );
}
