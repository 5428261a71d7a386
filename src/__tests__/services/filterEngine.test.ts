/**
 * Filter Engine Tests
 */

import { describe, it, expect } from 'vitest';
import {
  applyFilters,
  createDefaultSelection,
  getFilterOptions,
  matchesSelection,
  selectionsEqual,
} from '../../services/filterEngine';
import { parseDataset } from '../../services/datasetLoader';
import type { FilterSelection } from '../../types/appointment';
import { HEADER_LINE, exampleTable, mixedTable } from '../fixtures/testDataset';

function selection(overrides: Partial<FilterSelection> = {}): FilterSelection {
  return { ...createDefaultSelection(), ...overrides };
}

describe('Filter Engine', () => {
  describe('applyFilters', () => {
    it('keeps rows of the selected genders', () => {
      const table = exampleTable();
      const view = applyFilters(table, selection({ genders: ['F'] }));

      expect(view.map(row => row.raw.appointmentid)).toEqual(['A1', 'A3']);
    });

    it('applies the age range inclusively', () => {
      const table = exampleTable();

      expect(applyFilters(table, selection({ ageRange: [40, 100] })).map(r => r.raw.appointmentid)).toEqual([
        'A2',
        'A3',
      ]);
      expect(applyFilters(table, selection({ ageRange: [30, 45] })).map(r => r.raw.appointmentid)).toEqual([
        'A1',
        'A2',
      ]);
    });

    it('keeps rows of the selected neighbourhoods', () => {
      const view = applyFilters(exampleTable(), selection({ neighbourhoods: ['B'] }));
      expect(view.map(row => row.patientId)).toEqual(['P2']);
    });

    it('combines constraints with AND', () => {
      const view = applyFilters(exampleTable(), selection({ genders: ['F'], ageRange: [40, 100], neighbourhoods: ['A'] }));
      expect(view.map(row => row.raw.appointmentid)).toEqual(['A3']);
    });

    it('returns the whole table for the default selection', () => {
      const table = exampleTable();
      const view = applyFilters(table, createDefaultSelection());

      expect(view).toEqual(table.rows);
      expect(view).not.toBe(table.rows);
    });

    it('yields an empty view for values that match nothing', () => {
      const table = exampleTable();

      expect(applyFilters(table, selection({ genders: ['X'] }))).toEqual([]);
      expect(applyFilters(table, selection({ ageRange: [80, 90] }))).toEqual([]);
    });

    it('is idempotent and leaves the table untouched', () => {
      const table = mixedTable();
      const before = [...table.rows];
      const chosen = selection({ genders: ['M'], ageRange: [10, 60] });

      const first = applyFilters(table, chosen);
      const second = applyFilters(table, chosen);

      expect(second).toEqual(first);
      expect(table.rows).toEqual(before);
    });

    it('returns only rows satisfying every constraint, in table order', () => {
      const table = mixedTable();
      const selections: FilterSelection[] = [
        selection({ genders: ['F'] }),
        selection({ neighbourhoods: ['PORTO', 'VILA'] }),
        selection({ ageRange: [20, 50] }),
        selection({ genders: ['M'], ageRange: [0, 70], neighbourhoods: ['JARDIM'] }),
      ];

      for (const chosen of selections) {
        const view = applyFilters(table, chosen);
        const positions = view.map(row => table.rows.indexOf(row));

        expect(view.length).toBeLessThanOrEqual(table.rows.length);
        expect(view.every(row => matchesSelection(row, chosen))).toBe(true);
        expect(positions).toEqual([...positions].sort((a, b) => a - b));
        expect(view).toHaveLength(table.rows.filter(row => matchesSelection(row, chosen)).length);
      }
    });
  });

  describe('getFilterOptions', () => {
    it('lists sorted distinct values and the observed age bounds', () => {
      expect(getFilterOptions(exampleTable())).toEqual({
        genders: ['F', 'M'],
        neighbourhoods: ['A', 'B'],
        ageBounds: [30, 70],
      });
    });

    it('covers every value of a larger table', () => {
      const options = getFilterOptions(mixedTable());

      expect(options.neighbourhoods).toEqual(['CENTRO', 'JARDIM', 'PORTO', 'VILA']);
      expect(options.ageBounds).toEqual([0, 109]);
    });

    it('falls back to the default age range for an empty table', () => {
      const options = getFilterOptions(parseDataset(`${HEADER_LINE}\n`));

      expect(options).toEqual({ genders: [], neighbourhoods: [], ageBounds: [0, 100] });
    });
  });

  describe('selectionsEqual', () => {
    it('ignores the order of selected values', () => {
      expect(
        selectionsEqual(
          selection({ genders: ['F', 'M'], neighbourhoods: ['A', 'B'] }),
          selection({ genders: ['M', 'F'], neighbourhoods: ['B', 'A'] })
        )
      ).toBe(true);
    });

    it('detects a changed age range', () => {
      expect(selectionsEqual(selection(), selection({ ageRange: [0, 99] }))).toBe(false);
    });
  });
});
