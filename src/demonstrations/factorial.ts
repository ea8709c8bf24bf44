import { InvalidInputError } from '../algorithms/errors';
import { factorial as factorialOf } from '../algorithms/factorial';
import { checkEqual, checkThrows, Demonstration } from '../runner';

const CASES: ReadonlyArray<[number, number]> = [
  [0, 1],
  [1, 1],
  [2, 2],
  [3, 6],
  [4, 24],
];

export const factorial: Demonstration = {
  id: 'factorial',
  run({ messages, narrate }) {
    for (const [n, expected] of CASES) {
      checkEqual(factorialOf(n), expected, `factorial(${n})`);
    }
    checkThrows(() => factorialOf(-1), InvalidInputError, 'factorial(-1)');

    narrate(messages.passed.factorial);
  },
};
