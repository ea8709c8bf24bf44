/**
* True when the sequence is non-decreasing. Single left-to-right scan; the
* input is never modified. Empty and single-element sequences are sorted.
*/
export function isSorted(values: readonly number[]): boolean {
  for (let i = 1; i < values.length; i++) {
    if (values[i] < values[i - 1]) {
      return false;
    }
  }
  return true;
}
