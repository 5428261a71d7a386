/**
 * Filter Engine
 *
 * Pure filtering of the loaded table by gender, age range and neighbourhood.
 * Constraints are combined with AND; an empty gender or neighbourhood list
 * places no constraint. Row order of the table is preserved.
 */

import { DEFAULT_AGE_RANGE } from '../config';
import { compareCodePoints } from '../utils/textOrder';
import type {
  AgeRange,
  Appointment,
  AppointmentTable,
  FilterOptions,
  FilterSelection,
} from '../types/appointment';

export function createDefaultSelection(): FilterSelection {
  return {
    genders: [],
    ageRange: DEFAULT_AGE_RANGE,
    neighbourhoods: [],
  };
}

export function matchesSelection(row: Appointment, selection: FilterSelection): boolean {
  const [minAge, maxAge] = selection.ageRange;

  if (selection.genders.length > 0 && !selection.genders.includes(row.gender)) {
    return false;
  }
  if (row.age < minAge || row.age > maxAge) {
    return false;
  }
  if (selection.neighbourhoods.length > 0 && !selection.neighbourhoods.includes(row.neighbourhood)) {
    return false;
  }
  return true;
}

/**
 * Rows of the table that satisfy every constraint of the selection.
 * An unmatched value is not an error; it yields an empty view.
 */
export function applyFilters(
  table: AppointmentTable,
  selection: FilterSelection
): readonly Appointment[] {
  return table.rows.filter(row => matchesSelection(row, selection));
}

function sortedDistinct(values: Iterable<string>): string[] {
  return [...new Set(values)].sort(compareCodePoints);
}

/**
 * Choices offered by the sidebar: distinct genders and neighbourhoods
 * (sorted) and the observed age bounds.
 */
export function getFilterOptions(table: AppointmentTable): FilterOptions {
  let minAge = Infinity;
  let maxAge = -Infinity;
  for (const row of table.rows) {
    if (row.age < minAge) minAge = row.age;
    if (row.age > maxAge) maxAge = row.age;
  }

  const ageBounds: AgeRange = table.rows.length > 0 ? [minAge, maxAge] : DEFAULT_AGE_RANGE;

  return {
    genders: sortedDistinct(table.rows.map(row => row.gender)),
    neighbourhoods: sortedDistinct(table.rows.map(row => row.neighbourhood)),
    ageBounds,
  };
}

/** Order-insensitive equality, used to tell whether the draft differs from the applied selection */
export function selectionsEqual(a: FilterSelection, b: FilterSelection): boolean {
  const sameMembers = (x: readonly string[], y: readonly string[]) => {
    const ys = new Set(y);
    const xs = new Set(x);
    return xs.size === ys.size && [...xs].every(value => ys.has(value));
  };

  return (
    a.ageRange[0] === b.ageRange[0] &&
    a.ageRange[1] === b.ageRange[1] &&
    sameMembers(a.genders, b.genders) &&
    sameMembers(a.neighbourhoods, b.neighbourhoods)
  );
}
