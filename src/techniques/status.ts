/**
* Two-valued outcome returned by the validation-style checks. Expected bad
* input is reported as `'failure'`, never thrown.
*/
export type Status = 'success' | 'failure';

export const SUCCESS: Status = 'success';
export const FAILURE: Status = 'failure';

export function statusOf(passed: boolean): Status {
  return passed ? SUCCESS : FAILURE;
}
