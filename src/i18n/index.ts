/**
* Message catalogues for the console narration.
*
* Each locale lives in `./locales/<locale>.json`; the `Messages` interface
* below is what keeps the two files in step – a missing key fails the type
* check on the `CATALOGUES` table.
*/

import type { NumberClass } from '../techniques/classification';
import type { PathStep } from '../techniques/coverage';

import en from './locales/en.json';
import id from './locales/id.json';

export type Locale = 'en' | 'id';

export const LOCALES: readonly Locale[] = ['en', 'id'];

export type SectionId =
  | 'setTheory'
  | 'equivalence'
  | 'reachability'
  | 'boundary'
  | 'combinatorial'
  | 'ordering'
  | 'venn'
  | 'factorial'
  | 'fibonacci'
  | 'primes';

export interface Messages {
  sections: Record<SectionId, string>;
  passed: Record<SectionId, string>;
  /** Template with a `{name}` placeholder. */
  feature: string;
  featureDivider: string;
  path: Record<PathStep, string>;
  numberClass: Record<NumberClass, string>;
  /** Template with `{section}` and `{reason}` placeholders. */
  failed: string;
}

const CATALOGUES: Record<Locale, Messages> = { en, id };

export function isLocale(value: string): value is Locale {
  return (LOCALES as readonly string[]).includes(value);
}

export function getMessages(locale: Locale = 'en'): Messages {
  return CATALOGUES[locale];
}

/**
* Fill `{placeholder}` slots in a template. Placeholders without a matching
* value are left untouched.
*/
export function format(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    key in values ? String(values[key]) : match,
  );
}
