import type { ReactNode } from 'react';

export const OUTCOME_COLORS = {
  No: '#0f766e',
  Yes: '#c2410c',
} as const;

interface ChartCardProps {
  title: string;
  /** Shown instead of the chart when the filtered view is empty */
  isEmpty: boolean;
  children: ReactNode;
}

export function ChartCard({ title, isEmpty, children }: ChartCardProps) {
  return (
    <section className="bg-[var(--bg-secondary)] border border-[var(--border)] rounded-xl p-4">
      <h3 className="text-sm font-semibold text-[var(--text)] mb-3">{title}</h3>
      <div className="h-72">
        {isEmpty ? (
          <div className="h-full flex items-center justify-center text-sm text-[var(--text-dim)]">
            No appointments match the current filters
          </div>
        ) : (
          children
        )}
      </div>
    </section>
  );
}
