/**
 * CSV export of the filtered view.
 */

import { writeCsv } from './csvCodec';
import { cellText } from './tableView';
import type { Appointment, AppointmentTable } from '../types/appointment';

/**
 * Header row in table column order, then one line per row. Source columns
 * carry their original text; derived columns carry computed values.
 */
export function serializeView(table: AppointmentTable, view: readonly Appointment[]): string {
  return writeCsv([
    table.columns,
    ...view.map(row => table.columns.map(column => cellText(row, column))),
  ]);
}

/**
 * Trigger a browser download of the view as UTF-8 CSV.
 */
export function downloadFilteredCsv(
  table: AppointmentTable,
  view: readonly Appointment[],
  filename: string
): void {
  const csvContent = serializeView(table, view);
  const blob = new Blob([csvContent], { type: 'text/csv;charset=utf-8;' });
  const url = URL.createObjectURL(blob);

  const link = document.createElement('a');
  link.href = url;
  link.setAttribute('download', filename);
  document.body.appendChild(link);
  link.click();
  link.remove();
  URL.revokeObjectURL(url);

  console.log(`[Export] Downloaded ${view.length} appointments as ${filename}`);
}
