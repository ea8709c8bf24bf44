import fc from 'fast-check';

import { getMessages } from '../src/i18n';
import { classifyNumber, numberClass } from '../src/techniques/classification';

describe('numberClass()', () => {
  it.each([
    [0, 'unclassified'],
    [2, 'positive-even'],
    [3, 'positive-odd'],
    [-4, 'negative-even'],
    [-5, 'negative-odd'],
  ])('classifies %i as %s', (n, expected) => {
    expect(numberClass(n)).toBe(expected);
  });

  it.each([Number.NaN, Number.POSITIVE_INFINITY, Number.NEGATIVE_INFINITY, 2.5, -0.5])(
    'leaves non-integer %p unclassified',
    (n) => {
      expect(numberClass(n)).toBe('unclassified');
      expect(classifyNumber(n)).toBe('Unclassified');
    },
  );

  it('agrees with sign and parity for every non-zero integer', () => {
    fc.assert(
      fc.property(fc.integer().filter((n) => n !== 0), (n) => {
        const sign = n > 0 ? 'positive' : 'negative';
        const parity = Math.abs(n) % 2 === 0 ? 'even' : 'odd';
        return numberClass(n) === `${sign}-${parity}`;
      }),
    );
  });
});

describe('classifyNumber()', () => {
  it.each([
    [2, 'Positive-Even'],
    [1, 'Positive-Odd'],
    [-2, 'Negative-Even'],
    [-1, 'Negative-Odd'],
    [0, 'Unclassified'],
  ])('labels %i as "%s" by default', (n, expected) => {
    expect(classifyNumber(n)).toBe(expected);
  });

  it.each([
    [2, 'Positif dan Genap'],
    [1, 'Positif dan Ganjil'],
    [-2, 'Negatif dan Genap'],
    [-1, 'Negatif dan Ganjil'],
    [0, 'Klasifikasi Tidak Dikenal'],
  ])('labels %i as "%s" with the Indonesian table', (n, expected) => {
    expect(classifyNumber(n, getMessages('id').numberClass)).toBe(expected);
  });
});
