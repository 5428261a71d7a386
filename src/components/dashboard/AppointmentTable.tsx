import { useEffect, useMemo, useState } from 'react';
import { ArrowDown, ArrowUp, ArrowUpDown, ChevronLeft, ChevronRight } from 'lucide-react';
import {
  INITIAL_TABLE_STATE,
  buildTableView,
  cellText,
  nextSort,
  type ColumnKind,
  type TableViewState,
} from '../../services/tableView';
import { formatCount } from '../../services/aggregationEngine';
import type { Appointment } from '../../types/appointment';

interface AppointmentTableProps {
  columns: readonly string[];
  columnKinds: Record<string, ColumnKind>;
  view: readonly Appointment[];
  pageSize: number;
}

/**
 * Paginated table over the applied view, sortable by header click and
 * filterable per column ("> 60" on numbers, substring or "=exact" on text).
 */
export function AppointmentTable({ columns, columnKinds, view, pageSize }: AppointmentTableProps) {
  const [state, setState] = useState<TableViewState>(INITIAL_TABLE_STATE);

  // A new filtered view starts from the first page
  useEffect(() => {
    setState((s) => ({ ...s, page: 0 }));
  }, [view]);

  const result = useMemo(
    () => buildTableView(view, columnKinds, state, pageSize),
    [view, columnKinds, state, pageSize]
  );

  const setColumnFilter = (column: string, query: string) => {
    setState((s) => ({ ...s, page: 0, columnFilters: { ...s.columnFilters, [column]: query } }));
  };

  return (
    <section className="bg-[var(--bg-secondary)] border border-[var(--border)] rounded-xl overflow-hidden">
      <div className="overflow-x-auto">
        <table className="min-w-full text-sm">
          <thead className="bg-[var(--bg-tertiary)]">
            <tr>
              {columns.map((column) => {
                const sorted = state.sort?.column === column ? state.sort.direction : null;
                return (
                  <th key={column} className="px-3 py-2 text-left font-medium text-[var(--text-muted)] whitespace-nowrap">
                    <button
                      type="button"
                      onClick={() => setState((s) => ({ ...s, sort: nextSort(s.sort, column) }))}
                      className="flex items-center gap-1 hover:text-[var(--text)] transition-colors"
                    >
                      {column}
                      {sorted === 'asc' ? (
                        <ArrowUp className="w-3 h-3" />
                      ) : sorted === 'desc' ? (
                        <ArrowDown className="w-3 h-3" />
                      ) : (
                        <ArrowUpDown className="w-3 h-3 opacity-40" />
                      )}
                    </button>
                  </th>
                );
              })}
            </tr>
            <tr>
              {columns.map((column) => (
                <th key={column} className="px-2 pb-2">
                  <input
                    type="text"
                    aria-label={`Filter ${column}`}
                    placeholder={columnKinds[column] === 'number' ? '> 0' : 'filter...'}
                    value={state.columnFilters[column] ?? ''}
                    onChange={(e) => setColumnFilter(column, e.target.value)}
                    className="w-full min-w-[5rem] px-2 py-1 bg-[var(--bg)] border border-[var(--border)] rounded text-xs font-normal text-[var(--text)] placeholder-[var(--text-dim)] focus:outline-none focus:border-[var(--accent)]"
                  />
                </th>
              ))}
            </tr>
          </thead>
          <tbody>
            {result.rows.map((row, index) => (
              <tr key={`${result.page}-${index}`} className="border-t border-[var(--border)] hover:bg-[var(--bg-tertiary)]">
                {columns.map((column) => (
                  <td key={column} className="px-3 py-1.5 text-[var(--text)] whitespace-nowrap">
                    {cellText(row, column)}
                  </td>
                ))}
              </tr>
            ))}
            {result.rows.length === 0 && (
              <tr>
                <td colSpan={columns.length} className="px-3 py-6 text-center text-[var(--text-dim)]">
                  No rows
                </td>
              </tr>
            )}
          </tbody>
        </table>
      </div>

      <div className="flex items-center justify-between px-3 py-2 border-t border-[var(--border)] text-xs text-[var(--text-muted)]">
        <span>{formatCount(result.totalRows)} rows</span>
        <div className="flex items-center gap-2">
          <button
            type="button"
            aria-label="Previous page"
            disabled={result.page === 0}
            onClick={() => setState((s) => ({ ...s, page: result.page - 1 }))}
            className="p-1 rounded hover:bg-[var(--bg-tertiary)] disabled:opacity-40"
          >
            <ChevronLeft className="w-4 h-4" />
          </button>
          <span>
            Page {result.page + 1} of {result.pageCount}
          </span>
          <button
            type="button"
            aria-label="Next page"
            disabled={result.page >= result.pageCount - 1}
            onClick={() => setState((s) => ({ ...s, page: result.page + 1 }))}
            className="p-1 rounded hover:bg-[var(--bg-tertiary)] disabled:opacity-40"
          >
            <ChevronRight className="w-4 h-4" />
          </button>
        </div>
      </div>
    </section>
  );
}
