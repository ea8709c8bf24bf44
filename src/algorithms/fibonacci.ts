import { assertNaturalNumber } from './errors';

/**
* F(n) with F(0) = 0 and F(1) = 1, computed iteratively in constant space.
*
* @throws InvalidInputError when `n` is negative or not an integer
*/
export function fibonacci(n: number): number {
  assertNaturalNumber(n, 'fibonacci');

  if (n === 0) return 0;
  if (n === 1) return 1;

  let prev = 0;
  let curr = 1;
  for (let i = 2; i <= n; i++) {
    const next = prev + curr;
    prev = curr;
    curr = next;
  }
  return curr;
}
