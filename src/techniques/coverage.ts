/**
* Branch coverage subject: nested conditionals on sign, then parity. The
* returned steps name every branch taken, so a set of inputs covers the
* function when the union of their paths touches all four steps.
*/

export type PathStep = 'positive' | 'non-positive' | 'even' | 'odd';

export const ALL_PATH_STEPS: readonly PathStep[] = ['positive', 'non-positive', 'even', 'odd'];

export function tracePath(x: number): PathStep[] {
  if (x > 0) {
    if (x % 2 === 0) {
      return ['positive', 'even'];
    } else {
      return ['positive', 'odd'];
    }
  }
  return ['non-positive'];
}

/** Steps from `ALL_PATH_STEPS` that none of the inputs reach. */
export function uncoveredSteps(inputs: readonly number[]): PathStep[] {
  const seen = new Set<PathStep>();
  for (const x of inputs) {
    for (const step of tracePath(x)) seen.add(step);
  }
  return ALL_PATH_STEPS.filter((step) => !seen.has(step));
}
