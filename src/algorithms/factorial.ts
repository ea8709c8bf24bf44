import { assertNaturalNumber } from './errors';

/**
* n! by iterative product. Exact up to 18!; larger results are rounded like
* any other float above `Number.MAX_SAFE_INTEGER`.
*
* @throws InvalidInputError when `n` is negative or not an integer
*/
export function factorial(n: number): number {
  assertNaturalNumber(n, 'factorial');

  let result = 1;
  for (let i = 2; i <= n; i++) {
    result *= i;
  }
  return result;
}
