/**
 * Code-point ordering for category labels.
 *
 * Matches how the dataset's categories are grouped and listed everywhere in
 * the dashboard, independent of the browser locale.
 */
export function compareCodePoints(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
