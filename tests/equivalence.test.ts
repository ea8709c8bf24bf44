import fc from 'fast-check';

import { processValue } from '../src/techniques/equivalence';

describe('processValue()', () => {
  it.each([
    [-5, 'failure'],
    [0, 'success'],
    [10, 'success'],
  ])('maps %i to %s', (value, expected) => {
    expect(processValue(value)).toBe(expected);
  });

  it('fails every negative integer', () => {
    fc.assert(
      fc.property(fc.integer({ max: -1 }), (v) => processValue(v) === 'failure'),
    );
  });

  it('accepts every non-negative integer', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0 }), (v) => processValue(v) === 'success'),
    );
  });
});
