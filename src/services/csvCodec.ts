/**
 * CSV Codec
 *
 * Reads and writes comma-separated text through SheetJS. Every cell is kept
 * as text in both directions; no number or date coercion happens here.
 */

import * as XLSX from 'xlsx';

/**
 * Parse CSV text into rows of cell strings. Blank lines are dropped.
 * Rows shorter than the widest row are padded with empty strings.
 */
export function parseCsv(text: string): string[][] {
  const workbook = XLSX.read(text, { type: 'string', raw: true });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) return [];

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: '',
    raw: true,
    blankrows: false,
  });

  return rows
    .map(row => row.map(cell => (cell === null || cell === undefined ? '' : String(cell))))
    .filter(row => row.some(cell => cell !== ''));
}

/**
 * Serialize rows of cell strings. Cells containing a comma, quote or newline
 * are quoted; lines are separated by "\n" with no trailing newline.
 */
export function writeCsv(rows: readonly (readonly string[])[]): string {
  const sheet = XLSX.utils.aoa_to_sheet(rows.map(row => [...row]));
  return XLSX.utils.sheet_to_csv(sheet, { FS: ',', RS: '\n' });
}
