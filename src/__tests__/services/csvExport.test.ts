/**
 * CSV Export Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { downloadFilteredCsv, serializeView } from '../../services/csvExport';
import { parseCsv } from '../../services/csvCodec';
import { parseDataset } from '../../services/datasetLoader';
import { applyFilters } from '../../services/filterEngine';
import { DEFAULT_AGE_RANGE } from '../../config';
import { buildCsv, csvLine, exampleTable, resetRowCounter } from '../fixtures/testDataset';

describe('CSV Export', () => {
  beforeEach(() => {
    resetRowCounter();
  });

  describe('serializeView', () => {
    it('writes the header in table column order', () => {
      const table = exampleTable();
      const [header] = serializeView(table, table.rows).split('\n');

      expect(header).toBe(table.columns.join(','));
      expect(header.endsWith(',waiting_days,day_of_week,no_show_flag')).toBe(true);
    });

    it('writes source text followed by derived values', () => {
      const table = exampleTable();
      const lines = serializeView(table, table.rows).split('\n');

      expect(lines).toHaveLength(4);
      expect(lines[1]).toBe('P1,A1,F,2016-04-25T08:00:00Z,2016-04-29T00:00:00Z,30,A,0,0,0,0,0,0,No,3,Friday,0');
      expect(lines[2]).toBe('P2,A2,M,2016-04-29T18:38:08Z,2016-04-29T00:00:00Z,45,B,0,1,0,0,0,0,Yes,-1,Friday,1');
    });

    it('contains only the rows of the view', () => {
      const table = exampleTable();
      const view = applyFilters(table, { genders: ['M'], ageRange: DEFAULT_AGE_RANGE, neighbourhoods: [] });
      const lines = serializeView(table, view).split('\n');

      expect(lines).toHaveLength(2);
      expect(lines[1].startsWith('P2,A2,M,')).toBe(true);
    });

    it('writes only the header for an empty view', () => {
      const table = exampleTable();

      expect(serializeView(table, [])).toBe(table.columns.join(','));
    });

    it('quotes values containing a comma', () => {
      const table = parseDataset(buildCsv([csvLine({ neighbourhood: '"SANTA, ROSA"' })]));
      const [, line] = serializeView(table, table.rows).split('\n');

      expect(line).toBe('P1,A1,F,2016-04-25T08:00:00Z,2016-04-29T00:00:00Z,30,"SANTA, ROSA",0,0,0,0,0,0,No,3,Friday,0');
      expect(parseCsv(line)).toEqual([
        ['P1', 'A1', 'F', '2016-04-25T08:00:00Z', '2016-04-29T00:00:00Z', '30', 'SANTA, ROSA', '0', '0', '0', '0', '0', '0', 'No', '3', 'Friday', '0'],
      ]);
    });

    it('loads back into an equivalent table', () => {
      const table = exampleTable();
      const reloaded = parseDataset(serializeView(table, table.rows));

      expect(reloaded.columns).toEqual(table.columns);
      expect(reloaded.sourceColumns).toEqual(table.sourceColumns);
      expect(reloaded.rows.map(row => row.raw)).toEqual(table.rows.map(row => row.raw));
      expect(reloaded.rows.map(row => row.waitingDays)).toEqual([3, -1, 11]);
    });
  });

  describe('downloadFilteredCsv', () => {
    const link = {
      href: '',
      setAttribute: vi.fn(),
      click: vi.fn(),
      remove: vi.fn(),
    };
    const appendChild = vi.fn();

    beforeEach(() => {
      link.href = '';
      vi.stubGlobal('document', {
        createElement: vi.fn(() => link),
        body: { appendChild },
      });
      vi.spyOn(URL, 'createObjectURL').mockReturnValue('blob:test-url');
      vi.spyOn(URL, 'revokeObjectURL').mockImplementation(() => {});
      vi.spyOn(console, 'log').mockImplementation(() => {});
    });

    afterEach(() => {
      vi.unstubAllGlobals();
      vi.restoreAllMocks();
      vi.clearAllMocks();
    });

    it('clicks a download link for a CSV blob', async () => {
      const table = exampleTable();

      downloadFilteredCsv(table, table.rows, 'filtered.csv');

      const [blob] = vi.mocked(URL.createObjectURL).mock.calls[0];
      expect(blob).toBeInstanceOf(Blob);
      if (!(blob instanceof Blob)) return;
      expect(blob.type).toBe('text/csv;charset=utf-8;');
      expect(await blob.text()).toBe(serializeView(table, table.rows));

      expect(link.href).toBe('blob:test-url');
      expect(link.setAttribute).toHaveBeenCalledWith('download', 'filtered.csv');
      expect(link.click).toHaveBeenCalledTimes(1);
      expect(link.remove).toHaveBeenCalledTimes(1);
      expect(URL.revokeObjectURL).toHaveBeenCalledWith('blob:test-url');
      expect(console.log).toHaveBeenCalledWith('[Export] Downloaded 3 appointments as filtered.csv');
    });
  });
});
