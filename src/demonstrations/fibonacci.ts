import { InvalidInputError } from '../algorithms/errors';
import { fibonacci as fibonacciOf } from '../algorithms/fibonacci';
import { checkEqual, checkThrows, Demonstration } from '../runner';

const EXPECTED = [0, 1, 1, 2, 3, 5];

export const fibonacci: Demonstration = {
  id: 'fibonacci',
  run({ messages, narrate }) {
    EXPECTED.forEach((expected, n) => {
      checkEqual(fibonacciOf(n), expected, `fibonacci(${n})`);
    });
    checkThrows(() => fibonacciOf(-1), InvalidInputError, 'fibonacci(-1)');

    narrate(messages.passed.fibonacci);
  },
};
