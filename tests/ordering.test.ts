import fc from 'fast-check';

import { isSorted } from '../src/techniques/ordering';

describe('isSorted()', () => {
  it('recognises sorted and unsorted arrays', () => {
    expect(isSorted([1, 2, 3, 4, 5])).toBe(true);
    expect(isSorted([5, 3, 1])).toBe(false);
  });

  it('treats empty and single-element sequences as sorted', () => {
    expect(isSorted([])).toBe(true);
    expect(isSorted([42])).toBe(true);
  });

  it('allows equal neighbours', () => {
    expect(isSorted([1, 1, 2, 2])).toBe(true);
  });

  it('catches a single descent at the end', () => {
    expect(isSorted([1, 2, 3, 2])).toBe(false);
  });

  it('is true iff every adjacent pair is non-decreasing', () => {
    fc.assert(
      fc.property(fc.array(fc.integer({ min: -20, max: 20 }), { maxLength: 8 }), (arr) => {
        const expected = arr.every((v, i) => i === 0 || arr[i - 1] <= v);
        return isSorted(arr) === expected;
      }),
    );
  });

  it('accepts any array once sorted, without modifying the input', () => {
    fc.assert(
      fc.property(fc.array(fc.integer()), (arr) => {
        const sorted = [...arr].sort((x, y) => x - y);
        const before = [...sorted];
        return isSorted(sorted) && sorted.every((v, i) => v === before[i]);
      }),
    );
  });
});
