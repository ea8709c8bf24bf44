import { Status, statusOf } from './status';

export const RANGE_MIN = 1;
export const RANGE_MAX = 100;

/** Boundary-value subject: accepts the closed range [1, 100]. */
export function checkRange(value: number): Status {
  return statusOf(value >= RANGE_MIN && value <= RANGE_MAX);
}

/**
* The classic boundary probes for a closed range: each limit plus its
* neighbours just inside and just outside.
*/
export function boundaryProbes(min: number = RANGE_MIN, max: number = RANGE_MAX): number[] {
  return [min - 1, min, min + 1, max - 1, max, max + 1];
}
