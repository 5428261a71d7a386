/**
 * Appointment Types
 *
 * Typed records for the appointments dataset, the filter selection applied to
 * it, and the aggregate payloads rendered by the dashboard.
 */

// ============================================================================
// Outcome & Weekday
// ============================================================================

/** Source label for the no-show column: "No" = attended, "Yes" = missed */
export type OutcomeLabel = 'No' | 'Yes';

export const OUTCOME_LABELS: readonly OutcomeLabel[] = ['No', 'Yes'];

export const OUTCOME_DISPLAY: Record<OutcomeLabel, string> = {
  No: 'Showed up',
  Yes: 'No-show',
};

export function isOutcomeLabel(value: string): value is OutcomeLabel {
  return value === 'No' || value === 'Yes';
}

export type Weekday =
  | 'Monday'
  | 'Tuesday'
  | 'Wednesday'
  | 'Thursday'
  | 'Friday'
  | 'Saturday'
  | 'Sunday';

/** Display order for weekday charts */
export const WEEKDAY_ORDER: readonly Weekday[] = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
];

// ============================================================================
// Appointment Record & Table
// ============================================================================

/** Columns computed at load time and appended after the source columns */
export const DERIVED_COLUMNS = ['waiting_days', 'day_of_week', 'no_show_flag'] as const;

export type DerivedColumn = (typeof DERIVED_COLUMNS)[number];

export interface Appointment {
  patientId: string;
  gender: string;
  /** Wall-clock scheduling time; zone suffixes in the source are ignored */
  scheduledAt: Date;
  /** Wall-clock appointment time */
  appointmentAt: Date;
  age: number;
  neighbourhood: string;
  outcome: OutcomeLabel;

  /** Whole days from scheduling to appointment, floored (can be negative) */
  waitingDays: number;
  dayOfWeek: Weekday;
  /** 1 for a no-show, 0 otherwise */
  noShowFlag: 0 | 1;

  /** Verbatim source cells keyed by normalized column name */
  raw: Readonly<Record<string, string>>;
}

export interface AppointmentTable {
  /** Source columns in source order, then the derived columns */
  columns: readonly string[];
  /** Names of the columns that came from the source file */
  sourceColumns: readonly string[];
  rows: readonly Appointment[];
}

// ============================================================================
// Filter Selection
// ============================================================================

export type AgeRange = readonly [min: number, max: number];

export interface FilterSelection {
  /** Empty = no gender constraint */
  genders: readonly string[];
  /** Inclusive on both ends; always applied */
  ageRange: AgeRange;
  /** Empty = no neighbourhood constraint */
  neighbourhoods: readonly string[];
}

export interface FilterOptions {
  genders: string[];
  neighbourhoods: string[];
  /** Observed [min, max] age in the table */
  ageBounds: AgeRange;
}

// ============================================================================
// Aggregates
// ============================================================================

export interface DashboardStats {
  totalAppointments: number;
  /** Fraction in [0, 1]; null for an empty view */
  noShowRate: number | null;
  /** null for an empty view */
  avgWaitingDays: number | null;
  uniquePatients: number;
}

export interface OutcomeSlice {
  outcome: OutcomeLabel;
  count: number;
}

/** Per-category counts split by outcome */
export interface OutcomeBucket<K> {
  key: K;
  No: number;
  Yes: number;
}

export interface NeighbourhoodRate {
  neighbourhood: string;
  /** Mean no-show flag in [0, 1] */
  rate: number;
  appointments: number;
}

export interface DashboardData {
  stats: DashboardStats;
  outcomeSplit: OutcomeSlice[];
  ageHistogram: OutcomeBucket<number>[];
  weekdayHistogram: OutcomeBucket<Weekday>[];
  topNeighbourhoods: NeighbourhoodRate[];
}
