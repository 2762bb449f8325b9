/**
 * Structured JSON logging for the release plugin.
 *
 * Provides component-scoped loggers with level filtering and an
 * injectable sink for testing. Every entry is a JSON object with
 * level, ts, component and msg fields; hook and release fields bound
 * through `withContext` are promoted to the top level.
 *
 * Output goes to stderr: stdout is reserved for the JSON response the
 * CLI prints for the host.
 *
 * @example
 * ```ts
 * const logger = createLogger('orchestrator').withContext({ hook: 'pre-publish' });
 * logger.info('release created', { version: '1.2.3' });
 * // → {"level":"info","ts":"...","component":"orchestrator","msg":"release created","hook":"pre-publish","version":"1.2.3"}
 * ```
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Log severity levels in ascending order. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** A structured log entry. */
export interface LogEntry {
  level: LogLevel;
  ts: string;
  component: string;
  msg: string;
  hook?: string;
  version?: string;
  org?: string;
  duration_ms?: number;
  ok?: boolean;
  error_code?: string;
  meta?: Record<string, unknown>;
}

/** A function that consumes a log entry (output destination). */
export type LogSink = (entry: LogEntry) => void;

/** Context fields promoted to every entry of a bound logger. */
export interface LogContext {
  hook?: string;
  version?: string;
  org?: string;
}

/** A structured logger scoped to a component. */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(subComponent: string): Logger;
  withContext(ctx: LogContext): Logger;
}

// ---------------------------------------------------------------------------
// Level ordering
// ---------------------------------------------------------------------------

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Narrow an arbitrary string (e.g. from an env var) to a LogLevel. */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  return normalized === 'debug' ||
    normalized === 'info' ||
    normalized === 'warn' ||
    normalized === 'error'
    ? normalized
    : undefined;
}

// ---------------------------------------------------------------------------
// Global state
// ---------------------------------------------------------------------------

let globalLevel: LogLevel = 'info';
let globalSink: LogSink = defaultSink;

/** Configure the global logging level and/or sink. */
export function configureLogging(options: { level?: LogLevel; sink?: LogSink }): void {
  if (options.level !== undefined) {
    globalLevel = options.level;
  }
  if (options.sink !== undefined) {
    globalSink = options.sink;
  }
}

/** Reset logging to defaults (level: info, sink: stderr JSON). */
export function resetLogging(): void {
  globalLevel = 'info';
  globalSink = defaultSink;
}

function defaultSink(entry: LogEntry): void {
  process.stderr.write(JSON.stringify(entry) + '\n');
}

// ---------------------------------------------------------------------------
// Metadata sanitization
// ---------------------------------------------------------------------------

/** Metadata keys that must never appear in log output. */
export const NEVER_LOG_FIELDS = new Set([
  'auth_token',
  'authToken',
  'token',
  'authorization',
  'Authorization',
  'password',
  'secret',
  'SENTRY_AUTH_TOKEN',
]);

/** Maximum length for string values in metadata before truncation. */
export const META_STRING_MAX_LENGTH = 1024;

function sanitizeMeta(meta: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    if (NEVER_LOG_FIELDS.has(key)) continue;

    if (value instanceof Error) {
      result[key] = { name: value.name, message: value.message, stack: value.stack };
    } else if (typeof value === 'string' && value.length > META_STRING_MAX_LENGTH) {
      result[key] = value.slice(0, META_STRING_MAX_LENGTH) + '...[truncated]';
    } else {
      result[key] = value;
    }
  }
  return result;
}

// ---------------------------------------------------------------------------
// createLogger
// ---------------------------------------------------------------------------

/**
 * Create a structured logger scoped to a component.
 *
 * @param component - Component name (e.g. `'orchestrator'`, `'sentry-client'`).
 * @param boundContext - Context fields promoted to every entry.
 */
export function createLogger(component: string, boundContext?: LogContext): Logger {
  function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[globalLevel]) return;

    const entry: LogEntry = {
      level,
      ts: new Date().toISOString(),
      component,
      msg: message,
    };

    if (boundContext) {
      if (boundContext.hook) entry.hook = boundContext.hook;
      if (boundContext.version) entry.version = boundContext.version;
      if (boundContext.org) entry.org = boundContext.org;
    }

    if (meta) {
      const remaining: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(sanitizeMeta(meta))) {
        // Promote well-known fields to the top level
        if (key === 'duration_ms' && typeof value === 'number') entry.duration_ms = value;
        else if (key === 'ok' && typeof value === 'boolean') entry.ok = value;
        else if (key === 'error_code' && typeof value === 'string') entry.error_code = value;
        else if (key === 'hook' && typeof value === 'string') entry.hook = value;
        else if (key === 'version' && typeof value === 'string') entry.version = value;
        else if (key === 'org' && typeof value === 'string') entry.org = value;
        else remaining[key] = value;
      }
      if (Object.keys(remaining).length > 0) {
        entry.meta = remaining;
      }
    }

    globalSink(entry);
  }

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
    child: (subComponent) => createLogger(`${component}:${subComponent}`, boundContext),
    withContext: (ctx) => createLogger(component, { ...boundContext, ...ctx }),
  };
}
