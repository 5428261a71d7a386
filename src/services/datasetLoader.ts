/**
 * Dataset Loader
 *
 * Turns the appointments CSV into a frozen, typed AppointmentTable:
 * - normalizes column names (trim, lower-case, hyphen -> underscore)
 * - parses scheduling/appointment timestamps as wall-clock date-times
 * - derives waiting_days, day_of_week and no_show_flag
 *
 * Any bad row aborts the whole load. There is no partial-data mode.
 */

import { isValid, parseISO } from 'date-fns';
import { z } from 'zod';
import { parseCsv } from './csvCodec';
import {
  DERIVED_COLUMNS,
  WEEKDAY_ORDER,
  type Appointment,
  type AppointmentTable,
  type Weekday,
} from '../types/appointment';

// ============================================================================
// Errors
// ============================================================================

export type DatasetLoadErrorKind =
  | 'missing-file'
  | 'empty-file'
  | 'malformed-header'
  | 'malformed-row'
  | 'missing-column'
  | 'invalid-timestamp'
  | 'invalid-age'
  | 'invalid-outcome'
  | 'unexpected';

/**
 * Fatal error while loading the dataset.
 */
export class DatasetLoadError extends Error {
  kind: DatasetLoadErrorKind;
  /** 1-based data row number (header excluded), when the error is row-specific */
  row?: number;
  column?: string;

  constructor(
    kind: DatasetLoadErrorKind,
    message: string,
    details: { row?: number; column?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: details.cause });
    this.name = 'DatasetLoadError';
    this.kind = kind;
    this.row = details.row;
    this.column = details.column;
  }
}

// ============================================================================
// Columns
// ============================================================================

export const REQUIRED_COLUMNS = [
  'patientid',
  'gender',
  'scheduledday',
  'appointmentday',
  'age',
  'neighbourhood',
  'no_show',
] as const;

type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

export function normalizeColumnName(name: string): string {
  return name.trim().toLowerCase().replace(/-/g, '_');
}

const DERIVED_COLUMN_SET: ReadonlySet<string> = new Set(DERIVED_COLUMNS);

// ============================================================================
// Timestamps
// ============================================================================

const TIMESTAMP_PATTERN =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?)?\s*(?:Z|[+-]\d{2}(?::?\d{2})?)?$/i;

const MS_PER_DAY = 86_400_000;

/**
 * Parse a timestamp as a timezone-naive wall-clock value.
 *
 * Any zone suffix is discarded and the wall-clock fields are stored as UTC,
 * so differences and weekdays never shift with the viewer's time zone. Read
 * the result with the getUTC* accessors.
 */
export function parseTimestamp(text: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(text.trim());
  if (!match) return null;

  const [, date, hours = '00', minutes = '00', seconds = '00', fraction] = match;
  const millis = fraction ? `.${fraction.slice(0, 3).padEnd(3, '0')}` : '';
  const parsed = parseISO(`${date}T${hours}:${minutes}:${seconds}${millis}Z`);

  return isValid(parsed) ? parsed : null;
}

/** Whole days between two wall-clock timestamps, floored */
export function waitingDaysBetween(scheduledAt: Date, appointmentAt: Date): number {
  return Math.floor((appointmentAt.getTime() - scheduledAt.getTime()) / MS_PER_DAY);
}

export function weekdayOf(timestamp: Date): Weekday {
  // getUTCDay: 0 = Sunday; WEEKDAY_ORDER starts on Monday
  return WEEKDAY_ORDER[(timestamp.getUTCDay() + 6) % 7];
}

// ============================================================================
// Row Validation
// ============================================================================

const timestampField = z.string().transform((value, ctx) => {
  const parsed = parseTimestamp(value);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unparseable timestamp "${value}"` });
    return z.NEVER;
  }
  return parsed;
});

const rowSchema = z.object({
  patientid: z.string(),
  gender: z.string(),
  scheduledday: timestampField,
  appointmentday: timestampField,
  age: z
    .string()
    .trim()
    .regex(/^[+-]?\d+$/, 'age must be a whole number')
    .transform(Number),
  neighbourhood: z.string(),
  no_show: z.enum(['No', 'Yes'], {
    errorMap: (_issue, ctx) => ({ message: `unrecognized outcome label "${String(ctx.data)}"` }),
  }),
});

const ISSUE_KINDS: Record<RequiredColumn, DatasetLoadErrorKind> = {
  patientid: 'malformed-row',
  gender: 'malformed-row',
  scheduledday: 'invalid-timestamp',
  appointmentday: 'invalid-timestamp',
  age: 'invalid-age',
  neighbourhood: 'malformed-row',
  no_show: 'invalid-outcome',
};

function isRequiredColumn(value: unknown): value is RequiredColumn {
  return typeof value === 'string' && (REQUIRED_COLUMNS as readonly string[]).includes(value);
}

// ============================================================================
// Parsing
// ============================================================================

function readHeader(cells: string[]): string[] {
  const header = cells.map(normalizeColumnName);
  while (header.length > 0 && header[header.length - 1] === '') {
    header.pop();
  }

  const seen = new Set<string>();
  header.forEach((name, index) => {
    if (name === '') {
      throw new DatasetLoadError('malformed-header', `Column ${index + 1} has no name`);
    }
    if (seen.has(name)) {
      throw new DatasetLoadError('malformed-header', `Duplicate column "${name}"`, { column: name });
    }
    seen.add(name);
  });

  const missing = REQUIRED_COLUMNS.filter(column => !seen.has(column));
  if (missing.length > 0) {
    throw new DatasetLoadError(
      'missing-column',
      `Missing required column${missing.length > 1 ? 's' : ''}: ${missing.join(', ')}`,
      { column: missing[0] }
    );
  }

  return header;
}

function toAppointment(
  cells: string[],
  header: string[],
  sourceColumns: readonly string[],
  rowNumber: number
): Appointment {
  const extra = cells.slice(header.length).findIndex(cell => cell !== '');
  if (extra !== -1) {
    throw new DatasetLoadError(
      'malformed-row',
      `Row ${rowNumber} has a value in column ${header.length + extra + 1}, but the header names ${header.length} columns`,
      { row: rowNumber }
    );
  }

  const byName: Record<string, string> = {};
  header.forEach((name, index) => {
    byName[name] = cells[index] ?? '';
  });

  const result = rowSchema.safeParse(byName);
  if (!result.success) {
    const issue = result.error.issues[0];
    const column = issue.path[0];
    const kind = isRequiredColumn(column) ? ISSUE_KINDS[column] : 'malformed-row';
    throw new DatasetLoadError(kind, `Row ${rowNumber}, column "${String(column)}": ${issue.message}`, {
      row: rowNumber,
      column: typeof column === 'string' ? column : undefined,
    });
  }

  const parsed = result.data;
  const raw: Record<string, string> = {};
  for (const column of sourceColumns) {
    raw[column] = byName[column];
  }

  const appointment: Appointment = {
    patientId: parsed.patientid,
    gender: parsed.gender,
    scheduledAt: parsed.scheduledday,
    appointmentAt: parsed.appointmentday,
    age: parsed.age,
    neighbourhood: parsed.neighbourhood,
    outcome: parsed.no_show,
    waitingDays: waitingDaysBetween(parsed.scheduledday, parsed.appointmentday),
    dayOfWeek: weekdayOf(parsed.appointmentday),
    noShowFlag: parsed.no_show === 'Yes' ? 1 : 0,
    raw: Object.freeze(raw),
  };
  return Object.freeze(appointment);
}

/**
 * Parse the appointments CSV into a frozen table.
 *
 * Source columns that share a name with a derived column are dropped and
 * recomputed, so an exported view can be loaded again.
 */
export function parseDataset(text: string): AppointmentTable {
  if (text.trim() === '') {
    throw new DatasetLoadError('empty-file', 'The dataset file is empty');
  }

  let rows: string[][];
  try {
    rows = parseCsv(text);
  } catch (err) {
    throw new DatasetLoadError('malformed-row', 'The dataset file could not be read as CSV', { cause: err });
  }
  if (rows.length === 0) {
    throw new DatasetLoadError('empty-file', 'The dataset file has no header row');
  }

  const header = readHeader(rows[0]);
  const sourceColumns = header.filter(name => !DERIVED_COLUMN_SET.has(name));
  const appointments = rows
    .slice(1)
    .map((cells, index) => toAppointment(cells, header, sourceColumns, index + 1));

  const table: AppointmentTable = {
    columns: Object.freeze([...sourceColumns, ...DERIVED_COLUMNS]),
    sourceColumns: Object.freeze(sourceColumns),
    rows: Object.freeze(appointments),
  };
  return Object.freeze(table);
}

/**
 * Fetch and parse the dataset. Rejects with a DatasetLoadError.
 */
export async function loadDataset(url: string): Promise<AppointmentTable> {
  let response: Response;
  try {
    response = await fetch(url);
  } catch (err) {
    throw new DatasetLoadError('missing-file', `Unable to reach the dataset at ${url}`, { cause: err });
  }

  if (!response.ok) {
    throw new DatasetLoadError(
      'missing-file',
      `Dataset ${url} could not be loaded (${response.status} ${response.statusText})`
    );
  }

  const text = await response.text();

  // Vite's dev server answers unknown paths with index.html
  if (text.startsWith('<!') || text.startsWith('<html')) {
    throw new DatasetLoadError('missing-file', `Dataset ${url} was not found`);
  }

  const table = parseDataset(text);
  console.log(
    `[Dataset] Loaded ${table.rows.length.toLocaleString('en-US')} appointments (${table.sourceColumns.length} columns) from ${url}`
  );
  return table;
}
