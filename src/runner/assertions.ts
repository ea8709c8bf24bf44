/**
* Assertion helpers used by the demonstrations. Each one throws an
* `AssertionFailure` naming the case that broke; the runner stops at the first.
*/

import { isDeepStrictEqual } from 'util';

export class AssertionFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AssertionFailure';
  }
}

function show(value: unknown): string {
  return JSON.stringify(value) ?? String(value);
}

export function check(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new AssertionFailure(message);
  }
}

/** Deep, strict comparison – arrays and plain objects compare by content. */
export function checkEqual<T>(actual: T, expected: T, label: string): void {
  if (!isDeepStrictEqual(actual, expected)) {
    throw new AssertionFailure(`${label}: expected ${show(expected)}, received ${show(actual)}`);
  }
}

/**
* Run `fn` and require it to throw an instance of `errorClass`. Returns the
* caught error; anything else thrown is re-thrown untouched.
*/
export function checkThrows<E extends Error>(
  fn: () => unknown,
  errorClass: new (...args: never[]) => E,
  label: string,
): E {
  try {
    fn();
  } catch (err) {
    if (err instanceof errorClass) return err;
    throw err;
  }
  throw new AssertionFailure(`${label}: expected ${errorClass.name} to be thrown`);
}
