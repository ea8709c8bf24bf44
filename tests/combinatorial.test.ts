import { evaluateCombination } from '../src/techniques/combinatorial';

describe('evaluateCombination()', () => {
  it.each([
    [0, true, 'success'],
    [1, false, 'success'],
    [2, false, 'failure'],
    [3, true, 'failure'],
  ])('evaluateCombination(%i, %s) is %s', (a, b, expected) => {
    expect(evaluateCombination(a, b)).toBe(expected);
  });

  it.each([
    [-1, false],
    [-2, true],
    [11, false],
    [12, true],
  ])('fails out-of-range a=%i even when parity matches (b=%s)', (a, b) => {
    expect(evaluateCombination(a, b)).toBe('failure');
  });

  it('accepts the range limits when parity matches', () => {
    expect(evaluateCombination(10, true)).toBe('success');
    expect(evaluateCombination(9, false)).toBe('success');
  });

  it('covers every in-range pair: exactly one flag value succeeds', () => {
    for (let a = 0; a <= 10; a++) {
      const outcomes = [evaluateCombination(a, true), evaluateCombination(a, false)];
      expect(outcomes.filter((s) => s === 'success')).toHaveLength(1);
    }
  });

  it('never throws', () => {
    expect(() => evaluateCombination(Number.MAX_SAFE_INTEGER, true)).not.toThrow();
    expect(() => evaluateCombination(Number.NaN, false)).not.toThrow();
  });

  it.each([true, false])('fails NaN for b=%s', (b) => {
    expect(evaluateCombination(Number.NaN, b)).toBe('failure');
  });
});
