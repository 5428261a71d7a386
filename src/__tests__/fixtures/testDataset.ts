/**
 * Test dataset builders.
 *
 * Rows follow the source file layout (mixed-case headers, hyphenated
 * No-show column, UTC "Z" timestamps).
 */

import { parseDataset } from '../../services/datasetLoader';
import type { AppointmentTable } from '../../types/appointment';

export const HEADER_LINE =
  'PatientId,AppointmentID,Gender,ScheduledDay,AppointmentDay,Age,Neighbourhood,Scholarship,Hipertension,Diabetes,Alcoholism,Handcap,SMS_received,No-show';

export const NORMALIZED_COLUMNS = [
  'patientid',
  'appointmentid',
  'gender',
  'scheduledday',
  'appointmentday',
  'age',
  'neighbourhood',
  'scholarship',
  'hipertension',
  'diabetes',
  'alcoholism',
  'handcap',
  'sms_received',
  'no_show',
];

export interface RowSpec {
  patientId?: string;
  appointmentId?: string;
  gender?: string;
  scheduled?: string;
  appointment?: string;
  age?: number | string;
  neighbourhood?: string;
  noShow?: string;
}

let rowCounter = 0;

export function resetRowCounter(): void {
  rowCounter = 0;
}

/** One CSV data line; unspecified fields get defaults and a fresh id */
export function csvLine(fields: RowSpec = {}): string {
  rowCounter += 1;
  return [
    fields.patientId ?? `P${rowCounter}`,
    fields.appointmentId ?? `A${rowCounter}`,
    fields.gender ?? 'F',
    fields.scheduled ?? '2016-04-25T08:00:00Z',
    fields.appointment ?? '2016-04-29T00:00:00Z',
    String(fields.age ?? 30),
    fields.neighbourhood ?? 'CENTRO',
    '0',
    '0',
    '0',
    '0',
    '0',
    '0',
    fields.noShow ?? 'No',
  ].join(',');
}

export function buildCsv(lines: string[], header: string = HEADER_LINE): string {
  return [header, ...lines].join('\n') + '\n';
}

/**
 * Three appointments:
 * 1. F, 30, A, attended  (waits 3 days, Friday)
 * 2. M, 45, B, no-show   (scheduled after midnight of the same day: -1, Friday)
 * 3. F, 70, A, no-show   (same patient as row 1; waits 11 days, Monday)
 */
export const EXAMPLE_CSV = buildCsv([
  'P1,A1,F,2016-04-25T08:00:00Z,2016-04-29T00:00:00Z,30,A,0,0,0,0,0,0,No',
  'P2,A2,M,2016-04-29T18:38:08Z,2016-04-29T00:00:00Z,45,B,0,1,0,0,0,0,Yes',
  'P1,A3,F,2016-04-20T10:00:00Z,2016-05-02T00:00:00Z,70,A,0,1,1,0,0,1,Yes',
]);

export function exampleTable(): AppointmentTable {
  return parseDataset(EXAMPLE_CSV);
}

/**
 * A larger table covering every gender/neighbourhood/outcome combination
 * over a spread of ages and weekdays.
 */
export function mixedTable(): AppointmentTable {
  resetRowCounter();
  const genders = ['F', 'M'];
  const neighbourhoods = ['CENTRO', 'JARDIM', 'PORTO', 'VILA'];
  const lines: string[] = [];
  for (let i = 0; i < 48; i++) {
    const day = String(1 + (i % 14)).padStart(2, '0');
    lines.push(
      csvLine({
        patientId: `P${i % 20}`,
        gender: genders[i % 2],
        neighbourhood: neighbourhoods[i % 4],
        age: (i * 7) % 110,
        appointment: `2016-05-${day}T00:00:00Z`,
        scheduled: '2016-04-20T09:30:00Z',
        noShow: i % 3 === 0 ? 'Yes' : 'No',
      })
    );
  }
  return parseDataset(buildCsv(lines));
}
