/**
 * Structured JSON line logger.
 *
 * Every event is written as a single JSON object with a timestamp, level,
 * service name and scope so log processors can filter on decision codes and
 * durations without parsing free text.
 */

import { PROJECT_NAME } from './constants';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(event: string, fields?: LogFields): void;
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
  /** Logger that adds `fields` to every line it writes */
  child(fields: LogFields): Logger;
}

export interface LoggerOptions {
  /** Component name, e.g. `pipeline` or `text-source.internal` */
  scope?: string;
  /** Lowest level that is written (default: info) */
  level?: LogLevel;
  /** Receives each serialized line; defaults to console.log / console.error */
  sink?: (line: string, level: LogLevel) => void;
  /** Fields merged into every line */
  base?: LogFields;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function defaultSink(line: string, level: LogLevel): void {
  if (level === 'error') {
    // eslint-disable-next-line no-console
    console.error(line);
    return;
  }
  // eslint-disable-next-line no-console
  console.log(line);
}

function serialize(record: LogFields): string {
  try {
    return JSON.stringify(record);
  } catch (err) {
    return JSON.stringify({
      timestamp: record['timestamp'],
      level: record['level'],
      event: record['event'],
      serializationError: err instanceof Error ? err.message : String(err)
    });
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const sink = options.sink ?? defaultSink;
  const base: LogFields = {
    service: PROJECT_NAME,
    ...(options.scope ? { scope: options.scope } : {}),
    ...options.base
  };

  const write = (level: LogLevel, event: string, fields?: LogFields) => {
    if (LEVEL_ORDER[level] < threshold) return;
    const record = { timestamp: new Date().toISOString(), level, ...base, event, ...fields };
    sink(serialize(record), level);
  };

  return {
    debug: (event, fields) => write('debug', event, fields),
    info: (event, fields) => write('info', event, fields),
    warn: (event, fields) => write('warn', event, fields),
    error: (event, fields) => write('error', event, fields),
    child: fields =>
      createLogger({
        ...options,
        base: { ...options.base, ...fields }
      })
  };
}

/** Logger that drops everything; the default for pure library use. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger
};
