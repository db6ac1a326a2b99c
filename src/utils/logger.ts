/**
 * Console logging for the fusion components.
 *
 * Every component takes an optional `logger` and defaults to a prefixed one
 * from here. `LOG_LEVEL` sets the minimum level (default `info`);
 * `LOG_FORMAT=json` turns structured entries into one JSON object per line.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface StructuredLogEntry {
  readonly event: string;
  readonly message?: string;
  readonly [key: string]: unknown;
}

export interface Logger {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug: (message: string) => void;
}

export interface StructuredLogger extends Logger {
  structured: (level: LogLevel, entry: StructuredLogEntry) => void;
}

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.log(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function threshold(): LogLevel {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error' ? raw : 'info';
}

function emit(level: LogLevel, line: string): void {
  if (SEVERITY[level] >= SEVERITY[threshold()]) WRITERS[level](line);
}

/**
 * @example
 * createPrefixedLogger('[ContentPool]').info('Backfilling paragraphs');
 * // [ContentPool] Backfilling paragraphs
 */
export function createPrefixedLogger(prefix: string): Logger {
  return {
    info: (message) => emit('info', `${prefix} ${message}`),
    warn: (message) => emit('warn', `${prefix} ${message}`),
    error: (message) => emit('error', `${prefix} ${message}`),
    debug: (message) => emit('debug', `${prefix} ${message}`),
  };
}

/**
 * Human-readable form: `<prefix> [<event>]: <message> {<fields>}`.
 */
export function formatStructuredEntry(prefix: string, entry: StructuredLogEntry): string {
  const { event, message, ...fields } = entry;
  const text = message ? `: ${message}` : '';
  const data = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
  return `${prefix} [${event}]${text}${data}`;
}

export function createStructuredLogger(prefix: string): StructuredLogger {
  const module = prefix.replace(/[[\]]/g, '').trim();
  return {
    ...createPrefixedLogger(prefix),
    structured: (level, entry) => {
      const line =
        process.env.LOG_FORMAT === 'json'
          ? JSON.stringify({ timestamp: new Date().toISOString(), level, module, ...entry })
          : formatStructuredEntry(prefix, entry);
      emit(level, line);
    },
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};
