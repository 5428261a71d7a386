import { Activity, Download, Filter, RotateCcw } from 'lucide-react';
import { useDashboardStore } from '../../stores/dashboardStore';
import { selectionsEqual } from '../../services/filterEngine';
import { formatCount } from '../../services/aggregationEngine';
import { MultiSelectDropdown } from '../filters/MultiSelectDropdown';
import { AgeRangeInput } from '../filters/AgeRangeInput';

export function Sidebar() {
  const {
    loadStatus,
    table,
    filterOptions,
    draftSelection,
    appliedSelection,
    view,
    setGenders,
    setAgeRange,
    setNeighbourhoods,
    applyFilters,
    resetFilters,
    downloadFiltered,
  } = useDashboardStore();

  const ready = loadStatus === 'ready' && filterOptions !== null;
  const hasPendingChanges = !selectionsEqual(draftSelection, appliedSelection);

  return (
    <aside className="w-72 bg-[var(--sidebar-bg)] flex flex-col shadow-lg">
      <div className="p-4 border-b border-[var(--sidebar-border)]">
        <div className="flex items-center gap-3">
          <div className="w-10 h-10 rounded-lg bg-[var(--primary)] flex items-center justify-center shadow-md">
            <Activity className="w-5 h-5 text-white" />
          </div>
          <div>
            <h1 className="font-semibold text-[var(--sidebar-text)] text-base tracking-tight">No-Show</h1>
            <h1 className="font-semibold text-[var(--primary)] text-base tracking-tight -mt-0.5">Explorer</h1>
          </div>
        </div>
      </div>

      <div className="flex-1 overflow-y-auto p-4 space-y-5">
        <div className="flex items-center gap-2 text-[var(--sidebar-text)]">
          <Filter className="w-4 h-4" />
          <h2 className="text-sm font-semibold uppercase tracking-wider">Filters</h2>
        </div>

        <div className="space-y-1.5">
          <label className="text-xs font-medium text-[var(--sidebar-text-muted)]">Gender</label>
          <MultiSelectDropdown
            label="Genders"
            options={filterOptions?.genders ?? []}
            selected={draftSelection.genders}
            onChange={setGenders}
          />
        </div>

        <div className="space-y-1.5">
          <label className="text-xs font-medium text-[var(--sidebar-text-muted)]">Age Range</label>
          <AgeRangeInput
            value={draftSelection.ageRange}
            bounds={filterOptions?.ageBounds ?? draftSelection.ageRange}
            onChange={setAgeRange}
          />
        </div>

        <div className="space-y-1.5">
          <label className="text-xs font-medium text-[var(--sidebar-text-muted)]">Neighbourhood</label>
          <MultiSelectDropdown
            label="Neighbourhoods"
            options={filterOptions?.neighbourhoods ?? []}
            selected={draftSelection.neighbourhoods}
            onChange={setNeighbourhoods}
            searchable
          />
        </div>

        <div className="space-y-2">
          <button
            type="button"
            onClick={applyFilters}
            disabled={!ready}
            className="w-full flex items-center justify-center gap-2 px-4 py-2 bg-[var(--primary)] hover:bg-[var(--primary)]/90 disabled:opacity-50 text-white rounded-md text-sm font-medium transition-colors"
          >
            <Filter className="w-4 h-4" />
            Apply Filters
            {hasPendingChanges && ready && (
              <span className="w-2 h-2 rounded-full bg-white" aria-label="Unapplied changes" />
            )}
          </button>
          <button
            type="button"
            onClick={resetFilters}
            disabled={!ready}
            className="w-full flex items-center justify-center gap-2 px-4 py-2 text-[var(--sidebar-text-muted)] hover:text-[var(--sidebar-text)] hover:bg-[var(--sidebar-bg-hover)] disabled:opacity-50 rounded-md text-sm transition-colors"
          >
            <RotateCcw className="w-4 h-4" />
            Reset
          </button>
        </div>

        <hr className="border-[var(--sidebar-border)]" />

        <button
          type="button"
          onClick={downloadFiltered}
          disabled={!ready}
          className="w-full flex items-center justify-center gap-2 px-4 py-2 bg-[var(--sidebar-bg-active)] hover:bg-[var(--sidebar-bg-hover)] disabled:opacity-50 text-[var(--sidebar-text)] rounded-md text-sm font-medium transition-colors"
        >
          <Download className="w-4 h-4" />
          Download Filtered CSV
        </button>
      </div>

      {table && (
        <div className="p-4 border-t border-[var(--sidebar-border)] text-xs text-[var(--sidebar-text-muted)]">
          Showing {formatCount(view.length)} of {formatCount(table.rows.length)} appointments
        </div>
      )}
    </aside>
  );
}
