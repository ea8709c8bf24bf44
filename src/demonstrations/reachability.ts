import { check, checkEqual, Demonstration } from '../runner';
import { PathStep, tracePath, uncoveredSteps } from '../techniques/coverage';

const CASES: ReadonlyArray<[number, PathStep[]]> = [
  [10, ['positive', 'even']],
  [7, ['positive', 'odd']],
  [-5, ['non-positive']],
];

export const reachability: Demonstration = {
  id: 'reachability',
  run({ messages, narrate }) {
    for (const [value, expected] of CASES) {
      const path = tracePath(value);
      for (const step of path) {
        narrate(messages.path[step]);
      }
      checkEqual(path, expected, `tracePath(${value})`);
    }

    const missed = uncoveredSteps(CASES.map(([value]) => value));
    check(missed.length === 0, `branches never reached: ${missed.join(', ')}`);

    narrate(messages.passed.reachability);
  },
};
