/**
 * Dashboard Store
 *
 * Zustand store that owns:
 * - The appointments table, loaded once and frozen
 * - The draft filter selection edited in the sidebar
 * - The applied selection and everything derived from it
 *
 * The table is only ever read after load; each apply produces a fresh view.
 */

import { create } from 'zustand';

import { config } from '../config';
import { DatasetLoadError, loadDataset } from '../services/datasetLoader';
import {
  applyFilters as filterTable,
  createDefaultSelection,
  getFilterOptions,
} from '../services/filterEngine';
import { buildDashboard } from '../services/aggregationEngine';
import { downloadFilteredCsv } from '../services/csvExport';
import { inferColumnKinds, type ColumnKind } from '../services/tableView';
import type {
  AgeRange,
  Appointment,
  AppointmentTable,
  DashboardData,
  FilterOptions,
  FilterSelection,
} from '../types/appointment';

// ============================================================================
// Store Types
// ============================================================================

export type LoadStatus = 'idle' | 'loading' | 'ready' | 'error';

interface DashboardStore {
  loadStatus: LoadStatus;
  loadError: DatasetLoadError | null;

  table: AppointmentTable | null;
  filterOptions: FilterOptions | null;
  columnKinds: Record<string, ColumnKind>;

  /** Selection currently shown in the sidebar widgets */
  draftSelection: FilterSelection;
  /** Selection the dashboard was last computed with */
  appliedSelection: FilterSelection;
  /** Rows matching appliedSelection, in table order */
  view: readonly Appointment[];
  dashboard: DashboardData | null;

  // ========== Actions ==========

  /** Load the dataset. No-op once loaded or while a load is in flight */
  loadDataset: (url?: string) => Promise<void>;

  setGenders: (genders: string[]) => void;
  setAgeRange: (range: AgeRange) => void;
  setNeighbourhoods: (neighbourhoods: string[]) => void;

  /** Recompute the dashboard from the draft selection */
  applyFilters: () => void;

  /** Restore default widgets and recompute */
  resetFilters: () => void;

  /** Rows matching the draft selection, as the download would contain */
  getDraftView: () => readonly Appointment[];

  /** Download the rows matching the draft selection as CSV */
  downloadFiltered: () => void;
}

// ============================================================================
// Store Implementation
// ============================================================================

function normalizeAgeRange([a, b]: AgeRange): AgeRange {
  const low = Math.round(Math.min(a, b));
  const high = Math.round(Math.max(a, b));
  return [low, high];
}

export const useDashboardStore = create<DashboardStore>()((set, get) => ({
  loadStatus: 'idle',
  loadError: null,

  table: null,
  filterOptions: null,
  columnKinds: {},

  draftSelection: createDefaultSelection(),
  appliedSelection: createDefaultSelection(),
  view: [],
  dashboard: null,

  loadDataset: async (url = config.datasetUrl) => {
    const { loadStatus } = get();
    if (loadStatus === 'loading' || loadStatus === 'ready') return;

    set({ loadStatus: 'loading', loadError: null });

    try {
      const table = await loadDataset(url);
      set({
        table,
        filterOptions: getFilterOptions(table),
        columnKinds: inferColumnKinds(table),
        loadStatus: 'ready',
      });
      get().applyFilters();
    } catch (error) {
      const loadError =
        error instanceof DatasetLoadError
          ? error
          : new DatasetLoadError('unexpected', 'Unexpected error while loading the dataset', {
              cause: error,
            });
      console.error('[Dataset] Failed to load appointments:', loadError);
      set({ loadStatus: 'error', loadError });
    }
  },

  setGenders: (genders) => {
    set((state) => ({ draftSelection: { ...state.draftSelection, genders: [...genders] } }));
  },

  setAgeRange: (range) => {
    set((state) => ({
      draftSelection: { ...state.draftSelection, ageRange: normalizeAgeRange(range) },
    }));
  },

  setNeighbourhoods: (neighbourhoods) => {
    set((state) => ({
      draftSelection: { ...state.draftSelection, neighbourhoods: [...neighbourhoods] },
    }));
  },

  applyFilters: () => {
    const { table, draftSelection } = get();
    if (!table) return;

    const view = filterTable(table, draftSelection);
    set({
      appliedSelection: draftSelection,
      view,
      dashboard: buildDashboard(view),
    });

    console.log(
      `[Dashboard] Applied filters: ${view.length.toLocaleString('en-US')} of ${table.rows.length.toLocaleString('en-US')} appointments`
    );
  },

  resetFilters: () => {
    set({ draftSelection: createDefaultSelection() });
    get().applyFilters();
  },

  getDraftView: () => {
    const { table, draftSelection } = get();
    return table ? filterTable(table, draftSelection) : [];
  },

  downloadFiltered: () => {
    const { table } = get();
    if (!table) {
      console.warn('[Export] Nothing to download before the dataset has loaded');
      return;
    }
    downloadFilteredCsv(table, get().getDraftView(), config.exportFilename);
  },
}));
