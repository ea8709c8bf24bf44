import { checkEqual, Demonstration } from '../runner';
import { evaluateCombination } from '../techniques/combinatorial';
import { Status } from '../techniques/status';

const CASES: ReadonlyArray<[number, boolean, Status]> = [
  [0, true, 'success'],
  [1, false, 'success'],
  [2, false, 'failure'],
  [3, true, 'failure'],
];

export const combinatorial: Demonstration = {
  id: 'combinatorial',
  run({ messages, narrate }) {
    for (const [a, b, expected] of CASES) {
      checkEqual(evaluateCombination(a, b), expected, `evaluateCombination(${a}, ${b})`);
    }
    narrate(messages.passed.combinatorial);
  },
};
