import { isPrime } from '../algorithms/primality';
import { checkEqual, Demonstration } from '../runner';

const CASES: ReadonlyArray<[number, boolean]> = [
  [2, true],
  [3, true],
  [4, false],
  [5, true],
  [10, false],
  [13, true],
];

export const primes: Demonstration = {
  id: 'primes',
  run({ messages, narrate }) {
    for (const [n, expected] of CASES) {
      checkEqual(isPrime(n), expected, `isPrime(${n})`);
    }
    narrate(messages.passed.primes);
  },
};
