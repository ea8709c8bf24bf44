/**
* logger.ts
* Structured logger that writes one **JSON line** per call.
*
* Each record carries:
*   – `timestamp` → ISO-8601 string in UTC (to millisecond precision).
*   – `severity`  → one of DEBUG | INFO | WARNING | ERROR (uppercase).
*   – `message`   → human-readable message string.
*   – `metadata`  → optional JSON payload with additional context.
*
* Records below the active threshold (see `setLogLevel()`) are dropped. The
* console narration printed by the demonstration runner does not go through
* here – this is for diagnostics only.
*/

/* eslint-disable no-console */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogSeverity = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

export const LOG_SEVERITIES: readonly LogSeverity[] = ['DEBUG', 'INFO', 'WARNING', 'ERROR'];

export type LogMetadata = Record<string, unknown>;

export interface LogEntry {
  timestamp: string; // e.g. 2025-07-26T02:33:12.123Z
  severity: LogSeverity;
  message: string;
  metadata?: LogMetadata;
}

// ---------------------------------------------------------------------------
// Threshold
// ---------------------------------------------------------------------------

let threshold: LogSeverity = 'WARNING';

export function setLogLevel(level: LogSeverity): void {
  threshold = level;
}

export function getLogLevel(): LogSeverity {
  return threshold;
}

export function isLogSeverity(value: string): value is LogSeverity {
  return (LOG_SEVERITIES as readonly string[]).includes(value);
}

function isEnabled(severity: LogSeverity): boolean {
  return LOG_SEVERITIES.indexOf(severity) >= LOG_SEVERITIES.indexOf(threshold);
}

// ---------------------------------------------------------------------------
// Error / value normalisation helpers
// ---------------------------------------------------------------------------

/**
* Recursively walk a value converting `Error` instances into plain objects with
* enumerable `name`, `message`, and `stack` properties so they survive
* `JSON.stringify()`.
*/
function normalizeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: value.stack,
    };
  }

  if (Array.isArray(value)) {
    return value.map(normalizeValue);
  }

  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      result[k] = normalizeValue(v);
    }
    return result;
  }

  return value;
}

function normalizeMetadata(metadata: LogMetadata): LogMetadata {
  const result: LogMetadata = {};
  for (const [k, v] of Object.entries(metadata)) {
    result[k] = normalizeValue(v);
  }
  return result;
}

// ---------------------------------------------------------------------------
// Internal helper – single implementation funneled through by the public API
// ---------------------------------------------------------------------------

function emit(severity: LogSeverity, message: string, metadata?: LogMetadata): void {
  if (!isEnabled(severity)) return;

  const normalizedMetadata = metadata ? normalizeMetadata(metadata) : undefined;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    severity,
    message,
    ...(normalizedMetadata && Object.keys(normalizedMetadata).length ? { metadata: normalizedMetadata } : {}),
  };

  const serialized = JSON.stringify(entry);

  switch (severity) {
    case 'DEBUG':
    case 'INFO':
      console.log(serialized);
      break;
    case 'WARNING':
      console.warn(serialized);
      break;
    case 'ERROR':
      console.error(serialized);
      break;
    // No default so TS exhaustiveness check protects future changes.
  }
}

// ---------------------------------------------------------------------------
// Public API – severity-specific wrappers
// ---------------------------------------------------------------------------

export const debug = (msg: string, meta?: LogMetadata): void => emit('DEBUG', msg, meta);
export const info = (msg: string, meta?: LogMetadata): void => emit('INFO', msg, meta);
export const warn = (msg: string, meta?: LogMetadata): void => emit('WARNING', msg, meta);
export const error = (msg: string, meta?: LogMetadata): void => emit('ERROR', msg, meta);

export default { debug, info, warn, error } as const;
