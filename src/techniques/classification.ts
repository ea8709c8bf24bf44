/**
* Venn-diagram framing: the integers split by sign and by parity. Zero is
* neither positive nor negative, so it lands outside every labelled region,
* as do non-integers (NaN, ±Infinity, fractions).
*/

import { getMessages } from '../i18n';

export type NumberClass =
  | 'positive-even'
  | 'positive-odd'
  | 'negative-even'
  | 'negative-odd'
  | 'unclassified';

export function numberClass(n: number): NumberClass {
  if (!Number.isInteger(n) || n === 0) return 'unclassified';

  const isEven = n % 2 === 0;
  const isPositive = n > 0;

  if (isPositive && isEven) return 'positive-even';
  if (isPositive && !isEven) return 'positive-odd';
  if (!isPositive && isEven) return 'negative-even';
  return 'negative-odd';
}

/**
* Display label for `n`. Defaults to the English table; pass
* `getMessages(locale).numberClass` for another locale.
*/
export function classifyNumber(
  n: number,
  labels: Record<NumberClass, string> = getMessages('en').numberClass,
): string {
  return labels[numberClass(n)];
}
