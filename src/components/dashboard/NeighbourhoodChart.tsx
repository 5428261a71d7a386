import { Bar, BarChart, CartesianGrid, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts';
import { TOP_NEIGHBOURHOOD_LIMIT } from '../../config';
import { formatRate } from '../../services/aggregationEngine';
import type { NeighbourhoodRate } from '../../types/appointment';
import { ChartCard, OUTCOME_COLORS } from './ChartCard';

export function NeighbourhoodChart({ data }: { data: NeighbourhoodRate[] }) {
  return (
    <ChartCard title={`Top ${TOP_NEIGHBOURHOOD_LIMIT} Neighbourhoods by No-show Rate`} isEmpty={data.length === 0}>
      <ResponsiveContainer width="100%" height="100%">
        <BarChart data={data} margin={{ bottom: 48 }}>
          <CartesianGrid strokeDasharray="3 3" vertical={false} />
          <XAxis dataKey="neighbourhood" interval={0} angle={-35} textAnchor="end" tick={{ fontSize: 10 }} />
          <YAxis tickFormatter={(rate: number) => `${Math.round(rate * 100)}%`} domain={[0, 1]} />
          <Tooltip formatter={(rate) => (typeof rate === 'number' ? formatRate(rate) : String(rate))} />
          <Bar dataKey="rate" name="No-show rate" fill={OUTCOME_COLORS.Yes} />
        </BarChart>
      </ResponsiveContainer>
    </ChartCard>
  );
}
