/**
 * Aggregation Engine
 *
 * Summary statistics and chart payloads over a filtered view. Every function
 * is pure and takes the view explicitly.
 *
 * Means over an empty view are reported as null (shown as "N/A"), never NaN.
 */

import { TOP_NEIGHBOURHOOD_LIMIT } from '../config';
import { compareCodePoints } from '../utils/textOrder';
import {
  OUTCOME_LABELS,
  WEEKDAY_ORDER,
  type Appointment,
  type DashboardData,
  type DashboardStats,
  type NeighbourhoodRate,
  type OutcomeBucket,
  type OutcomeSlice,
  type Weekday,
} from '../types/appointment';

export const NOT_AVAILABLE = 'N/A';

function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
}

// ============================================================================
// Summary
// ============================================================================

export function summarize(view: readonly Appointment[]): DashboardStats {
  return {
    totalAppointments: view.length,
    noShowRate: mean(view.map(row => row.noShowFlag)),
    avgWaitingDays: mean(view.map(row => row.waitingDays)),
    uniquePatients: new Set(view.map(row => row.patientId)).size,
  };
}

/** 0.5 -> "50.00%" */
export function formatRate(rate: number | null): string {
  return rate === null ? NOT_AVAILABLE : `${(rate * 100).toFixed(2)}%`;
}

/** 12.34 -> "12.3 days" */
export function formatWaitingDays(days: number | null): string {
  return days === null ? NOT_AVAILABLE : `${days.toFixed(1)} days`;
}

export function formatCount(count: number): string {
  return count.toLocaleString('en-US');
}

// ============================================================================
// Chart Aggregates
// ============================================================================

/** Row count per outcome label, always both labels in the order No, Yes */
export function outcomeSplit(view: readonly Appointment[]): OutcomeSlice[] {
  const yes = view.reduce((count, row) => count + row.noShowFlag, 0);
  return OUTCOME_LABELS.map(outcome => ({
    outcome,
    count: outcome === 'Yes' ? yes : view.length - yes,
  }));
}

/** One bucket per observed integer age, ascending */
export function ageHistogram(view: readonly Appointment[]): OutcomeBucket<number>[] {
  const buckets = new Map<number, OutcomeBucket<number>>();
  for (const row of view) {
    let bucket = buckets.get(row.age);
    if (!bucket) {
      bucket = { key: row.age, No: 0, Yes: 0 };
      buckets.set(row.age, bucket);
    }
    bucket[row.outcome] += 1;
  }
  return [...buckets.values()].sort((a, b) => a.key - b.key);
}

/** Exactly seven buckets, Monday through Sunday; missing weekdays count zero */
export function weekdayHistogram(view: readonly Appointment[]): OutcomeBucket<Weekday>[] {
  const buckets = WEEKDAY_ORDER.map(day => ({ key: day, No: 0, Yes: 0 }));
  for (const row of view) {
    buckets[WEEKDAY_ORDER.indexOf(row.dayOfWeek)][row.outcome] += 1;
  }
  return buckets;
}

/**
 * Neighbourhoods with the highest no-show rate.
 *
 * Groups are formed in name order and the descending sort is stable, so equal
 * rates keep name order.
 */
export function topNeighbourhoods(
  view: readonly Appointment[],
  limit: number = TOP_NEIGHBOURHOOD_LIMIT
): NeighbourhoodRate[] {
  const groups = new Map<string, { noShows: number; appointments: number }>();
  for (const row of view) {
    const group = groups.get(row.neighbourhood) ?? { noShows: 0, appointments: 0 };
    group.noShows += row.noShowFlag;
    group.appointments += 1;
    groups.set(row.neighbourhood, group);
  }

  return [...groups.entries()]
    .sort(([a], [b]) => compareCodePoints(a, b))
    .map(([neighbourhood, group]) => ({
      neighbourhood,
      rate: group.noShows / group.appointments,
      appointments: group.appointments,
    }))
    .sort((a, b) => b.rate - a.rate)
    .slice(0, Math.max(0, limit));
}

export function buildDashboard(view: readonly Appointment[]): DashboardData {
  return {
    stats: summarize(view),
    outcomeSplit: outcomeSplit(view),
    ageHistogram: ageHistogram(view),
    weekdayHistogram: weekdayHistogram(view),
    topNeighbourhoods: topNeighbourhoods(view),
  };
}
