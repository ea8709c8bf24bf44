/**
* Raised by the numeric algorithms when the argument is outside their
* mathematical domain (negative, or not an integer). This is different from
* a `'failure'` status: the caller asked a question that has no answer.
*/
export class InvalidInputError extends Error {
  readonly input: number;

  constructor(message: string, input: number) {
    super(message);
    this.name = 'InvalidInputError';
    this.input = input;
  }
}

export function assertNaturalNumber(n: number, fn: string): void {
  if (!Number.isInteger(n)) {
    throw new InvalidInputError(`${fn}() expects an integer, received ${n}`, n);
  }
  if (n < 0) {
    throw new InvalidInputError(`${fn}() is not defined for negative input (${n})`, n);
  }
}
