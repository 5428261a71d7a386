import { CalendarCheck, Clock, UserX, Users } from 'lucide-react';
import type { LucideIcon } from 'lucide-react';
import {
  formatCount,
  formatRate,
  formatWaitingDays,
} from '../../services/aggregationEngine';
import type { DashboardStats } from '../../types/appointment';

interface SummaryCardsProps {
  stats: DashboardStats;
}

function StatCard({ icon: Icon, label, value }: { icon: LucideIcon; label: string; value: string }) {
  return (
    <div className="bg-[var(--bg-secondary)] border border-[var(--border)] rounded-xl p-4">
      <div className="flex items-center justify-between mb-2">
        <h3 className="text-sm font-medium text-[var(--text-muted)]">{label}</h3>
        <Icon className="w-4 h-4 text-[var(--text-dim)]" />
      </div>
      <p className="text-2xl font-bold text-[var(--text)]">{value}</p>
    </div>
  );
}

export function SummaryCards({ stats }: SummaryCardsProps) {
  return (
    <div className="grid grid-cols-1 md:grid-cols-2 xl:grid-cols-4 gap-4">
      <StatCard icon={CalendarCheck} label="Total Appointments" value={formatCount(stats.totalAppointments)} />
      <StatCard icon={UserX} label="No-Show Rate" value={formatRate(stats.noShowRate)} />
      <StatCard icon={Clock} label="Avg Waiting Time" value={formatWaitingDays(stats.avgWaitingDays)} />
      <StatCard icon={Users} label="Unique Patients" value={formatCount(stats.uniquePatients)} />
    </div>
  );
}
