// Public API – the techniques and algorithms themselves, plus the runner so
// callers can assemble their own demonstration lists.

export * from './techniques';
export * from './algorithms';
export { DEMONSTRATIONS } from './demonstrations';
export {
  AssertionFailure,
  check,
  checkEqual,
  checkThrows,
  runDemonstrations,
  SECTION_SEPARATOR,
} from './runner';
export type { DemoContext, Demonstration, RunContext, RunReport } from './runner';
export { format, getMessages, isLocale, LOCALES } from './i18n';
export type { Locale, Messages, SectionId } from './i18n';
export { getConfig, getOptionalConfig, loadSettings } from './config';
export type { GetConfigOptions, Settings } from './config';
