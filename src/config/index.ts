/**
* Centralised configuration loader over environment variables.
*
* Usage examples:
*
* ```ts
* import { getConfig, loadSettings } from '../config';
*
* // Optional key with fallback + custom validation
* const locale = getConfig('NARRATION_LOCALE', {
*   required: false,
*   fallback: 'en',
*   validate: (v) => v === 'en' || v === 'id' || 'NARRATION_LOCALE must be "en" or "id"',
* });
*
* // Everything the console program needs, resolved and validated at once
* const { logLevel, locale } = loadSettings();
* ```
*/

import { isLogSeverity, LogSeverity } from '../utils/logger';
import { isLocale, Locale } from '../i18n';

export type Environment = Record<string, string | undefined>;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export interface GetConfigOptions {
  /**
   * Throw when the key is missing or an empty string. Defaults to `true`.
   */
  required?: boolean;

  /**
   * Fallback value when the key is undefined/empty.
   */
  fallback?: string;

  /**
   * Optional validator. Return `true` for valid inputs or a **string** with a
   * custom error message when invalid.
   */
  validate?: (value: string) => boolean | string;

  /**
   * Variables to read from. Defaults to `process.env`.
   */
  env?: Environment;
}

/**
* Retrieve a configuration value from the environment.
*
* Empty strings count as missing, so `FOO=` in a shell falls through to the
* fallback just like an unset variable.
*/
export function getConfig(key: string, opts: GetConfigOptions = {}): string | undefined {
  const { required = true, fallback, validate, env = process.env } = opts;

  let val: string | undefined = env[key];

  if ((val === undefined || val === '') && typeof fallback === 'string') {
    val = fallback;
  }

  // Validation – execute only when a value is present
  if (val !== undefined && val !== '' && validate) {
    const result = validate(val);
    if (result !== true) {
      const msg =
        typeof result === 'string' ? result : `Invalid value for config key "${key}"`;
      throw new Error(msg);
    }
  }

  if ((val === undefined || val === '') && required) {
    throw new Error(`Missing required configuration key "${key}" – set it as an environment variable.`);
  }

  return val === '' ? undefined : val;
}

/** Shortcut for `getConfig(key, { required: false })`. */
export function getOptionalConfig(key: string, fallback?: string, env?: Environment): string | undefined {
  return getConfig(key, { required: false, fallback, env });
}

// ---------------------------------------------------------------------------
// Resolved settings for the console program
// ---------------------------------------------------------------------------

export interface Settings {
  logLevel: LogSeverity;
  locale: Locale;
}

export const DEFAULT_SETTINGS: Readonly<Settings> = {
  logLevel: 'WARNING',
  locale: 'en',
};

export function loadSettings(env: Environment = process.env): Settings {
  const rawLevel = getConfig('LOG_LEVEL', {
    required: false,
    fallback: DEFAULT_SETTINGS.logLevel,
    validate: (v) =>
      isLogSeverity(v.toUpperCase()) || 'LOG_LEVEL must be one of DEBUG, INFO, WARNING, ERROR',
    env,
  });

  const rawLocale = getConfig('NARRATION_LOCALE', {
    required: false,
    fallback: DEFAULT_SETTINGS.locale,
    validate: (v) => isLocale(v) || 'NARRATION_LOCALE must be "en" or "id"',
    env,
  });

  const level = (rawLevel ?? DEFAULT_SETTINGS.logLevel).toUpperCase();

  return {
    logLevel: isLogSeverity(level) ? level : DEFAULT_SETTINGS.logLevel,
    locale: rawLocale !== undefined && isLocale(rawLocale) ? rawLocale : DEFAULT_SETTINGS.locale,
  };
}

export default {
  getConfig,
  getOptionalConfig,
  loadSettings,
};
