import { Cell, Legend, Pie, PieChart, ResponsiveContainer, Tooltip } from 'recharts';
import { OUTCOME_DISPLAY, type OutcomeSlice } from '../../types/appointment';
import { ChartCard, OUTCOME_COLORS } from './ChartCard';

export function OutcomeSplitChart({ data }: { data: OutcomeSlice[] }) {
  const total = data.reduce((sum, slice) => sum + slice.count, 0);
  const chartData = data.map((slice) => ({
    ...slice,
    name: OUTCOME_DISPLAY[slice.outcome],
  }));

  return (
    <ChartCard title="Show vs No-show" isEmpty={total === 0}>
      <ResponsiveContainer width="100%" height="100%">
        <PieChart>
          <Pie
            data={chartData}
            dataKey="count"
            nameKey="name"
            innerRadius="45%"
            outerRadius="80%"
            label={({ percent }) => `${((percent ?? 0) * 100).toFixed(1)}%`}
          >
            {chartData.map((slice) => (
              <Cell key={slice.outcome} fill={OUTCOME_COLORS[slice.outcome]} />
            ))}
          </Pie>
          <Tooltip />
          <Legend />
        </PieChart>
      </ResponsiveContainer>
    </ChartCard>
  );
}
