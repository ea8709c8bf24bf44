import { FAILURE, Status, SUCCESS } from './status';

export const COMBINATION_MIN = 0;
export const COMBINATION_MAX = 10;

/**
* Pairwise subject with two parameters. `a` must lie in [0, 10]; `evenRequired`
* selects the parity `a` must have (true ⇒ even, false ⇒ odd). Out-of-range
* (NaN included) or mismatched pairs are a `'failure'`, never an exception.
*/
export function evaluateCombination(a: number, evenRequired: boolean): Status {
  if (!(a >= COMBINATION_MIN && a <= COMBINATION_MAX)) return FAILURE;

  const isEven = a % 2 === 0;
  if (evenRequired && isEven) return SUCCESS;
  if (!evenRequired && !isEven) return SUCCESS;
  return FAILURE;
}
