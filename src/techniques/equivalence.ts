import { FAILURE, Status, SUCCESS } from './status';

/**
* Equivalence partitioning over the integers: negative values form the
* invalid class, zero and positive values are both valid.
*/
export function processValue(value: number): Status {
  if (value < 0) return FAILURE;
  if (value === 0) return SUCCESS;
  return SUCCESS;
}
