/**
 * Table View
 *
 * The data table's projection of a filtered view: per-column queries, a
 * single-column sort and pagination. Cell text is shared with CSV export so
 * the table shows exactly what a download would contain.
 */

import type { Appointment, AppointmentTable } from '../types/appointment';

export type ColumnKind = 'number' | 'text';

export type SortDirection = 'asc' | 'desc';

export interface TableSort {
  column: string;
  direction: SortDirection;
}

export interface TableViewState {
  sort: TableSort | null;
  /** Query text keyed by column; blank queries are ignored */
  columnFilters: Record<string, string>;
  /** 0-based */
  page: number;
}

export interface TableViewResult {
  rows: Appointment[];
  /** Rows matching the column queries, across all pages */
  totalRows: number;
  pageCount: number;
  /** Page actually shown after clamping */
  page: number;
}

export const INITIAL_TABLE_STATE: TableViewState = {
  sort: null,
  columnFilters: {},
  page: 0,
};

// ============================================================================
// Cells
// ============================================================================

export function cellText(row: Appointment, column: string): string {
  switch (column) {
    case 'waiting_days':
      return String(row.waitingDays);
    case 'day_of_week':
      return row.dayOfWeek;
    case 'no_show_flag':
      return String(row.noShowFlag);
    default:
      return row.raw[column] ?? '';
  }
}

function toNumber(text: string): number | null {
  const trimmed = text.trim();
  if (trimmed === '') return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * A column is numeric when it has at least one value and every non-blank
 * value parses as a finite number.
 */
export function inferColumnKinds(table: AppointmentTable): Record<string, ColumnKind> {
  const kinds: Record<string, ColumnKind> = {};
  for (const column of table.columns) {
    let sawValue = false;
    let numeric = true;
    for (const row of table.rows) {
      const text = cellText(row, column);
      if (text.trim() === '') continue;
      sawValue = true;
      if (toNumber(text) === null) {
        numeric = false;
        break;
      }
    }
    kinds[column] = sawValue && numeric ? 'number' : 'text';
  }
  return kinds;
}

// ============================================================================
// Column Queries
// ============================================================================

type Comparison = '=' | '!=' | '<' | '<=' | '>' | '>=';

const NUMERIC_QUERY = /^(<=|>=|!=|=|<|>)?\s*(.*)$/;

function compareWith(op: Comparison, left: number, right: number): boolean {
  switch (op) {
    case '=':
      return left === right;
    case '!=':
      return left !== right;
    case '<':
      return left < right;
    case '<=':
      return left <= right;
    case '>':
      return left > right;
    case '>=':
      return left >= right;
  }
}

function isComparison(value: string): value is Comparison {
  return ['=', '!=', '<', '<=', '>', '>='].includes(value);
}

/**
 * Build a row predicate for one column query.
 *
 * Numeric columns: optional operator (=, !=, <, <=, >, >=) then a number;
 * an unparseable number matches nothing. Text columns: case-insensitive
 * substring, or exact (still case-insensitive) when prefixed with "=".
 */
export function compileColumnQuery(
  column: string,
  query: string,
  kind: ColumnKind
): ((row: Appointment) => boolean) | null {
  const trimmed = query.trim();
  if (trimmed === '') return null;

  if (kind === 'number') {
    const match = NUMERIC_QUERY.exec(trimmed);
    const op = match?.[1] ?? '=';
    const target = toNumber(match?.[2] ?? '');
    if (target === null || !isComparison(op)) return () => false;

    return row => {
      const value = toNumber(cellText(row, column));
      return value !== null && compareWith(op, value, target);
    };
  }

  if (trimmed.startsWith('=')) {
    const exact = trimmed.slice(1).trim().toLowerCase();
    return row => cellText(row, column).toLowerCase() === exact;
  }

  const needle = trimmed.toLowerCase();
  return row => cellText(row, column).toLowerCase().includes(needle);
}

// ============================================================================
// Sorting & Paging
// ============================================================================

function compareCells(a: Appointment, b: Appointment, column: string, kind: ColumnKind): number {
  const left = cellText(a, column);
  const right = cellText(b, column);

  if (kind === 'number') {
    const x = toNumber(left);
    const y = toNumber(right);
    // blanks sort after numbers when ascending
    if (x === null || y === null) return x === y ? 0 : x === null ? 1 : -1;
    return x - y;
  }
  return left.localeCompare(right);
}

export function buildTableView(
  view: readonly Appointment[],
  kinds: Record<string, ColumnKind>,
  state: TableViewState,
  pageSize: number
): TableViewResult {
  const predicates = Object.entries(state.columnFilters)
    .map(([column, query]) => compileColumnQuery(column, query, kinds[column] ?? 'text'))
    .filter((predicate): predicate is (row: Appointment) => boolean => predicate !== null);

  let rows = predicates.length > 0 ? view.filter(row => predicates.every(p => p(row))) : [...view];

  const { sort } = state;
  if (sort) {
    const kind = kinds[sort.column] ?? 'text';
    const sign = sort.direction === 'asc' ? 1 : -1;
    rows = rows.sort((a, b) => sign * compareCells(a, b, sort.column, kind));
  }

  const size = Math.max(1, Math.floor(pageSize));
  const pageCount = Math.max(1, Math.ceil(rows.length / size));
  const page = Math.min(Math.max(0, Math.floor(state.page)), pageCount - 1);

  return {
    rows: rows.slice(page * size, (page + 1) * size),
    totalRows: rows.length,
    pageCount,
    page,
  };
}

/** Cycle a header click through ascending, descending and unsorted */
export function nextSort(current: TableSort | null, column: string): TableSort | null {
  if (!current || current.column !== column) return { column, direction: 'asc' };
  if (current.direction === 'asc') return { column, direction: 'desc' };
  return null;
}
