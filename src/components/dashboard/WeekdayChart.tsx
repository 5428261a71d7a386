import { Bar, BarChart, CartesianGrid, Legend, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts';
import { OUTCOME_DISPLAY, type OutcomeBucket, type Weekday } from '../../types/appointment';
import { ChartCard, OUTCOME_COLORS } from './ChartCard';

export function WeekdayChart({ data }: { data: OutcomeBucket<Weekday>[] }) {
  const total = data.reduce((sum, bucket) => sum + bucket.No + bucket.Yes, 0);

  return (
    <ChartCard title="Appointments by Day of Week" isEmpty={total === 0}>
      <ResponsiveContainer width="100%" height="100%">
        <BarChart data={data}>
          <CartesianGrid strokeDasharray="3 3" vertical={false} />
          <XAxis dataKey="key" tickFormatter={(day: string) => day.slice(0, 3)} />
          <YAxis allowDecimals={false} />
          <Tooltip />
          <Legend />
          <Bar dataKey="No" name={OUTCOME_DISPLAY.No} fill={OUTCOME_COLORS.No} />
          <Bar dataKey="Yes" name={OUTCOME_DISPLAY.Yes} fill={OUTCOME_COLORS.Yes} />
        </BarChart>
      </ResponsiveContainer>
    </ChartCard>
  );
}
