import debug from 'debug';
import { types } from 'node:util';
import { DEBUG_PREFIX } from './lib/utils/debug.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
  /** Child logger that adds `fields` to every line. */
  with(fields: LogFields): Logger;
}

export type LogSink = (line: string) => void;

const LEVEL_WEIGHT: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };
const REDACT_KEYS = ['password', 'secret', 'token'];

let sink: LogSink = (line) => process.stderr.write(`${line}\n`);
const debugLogger = debug(`${DEBUG_PREFIX}:log`);

/** Replace where log lines go (stderr by default). Returns the previous sink. */
export function setLogSink(fn: LogSink): LogSink {
  const previous = sink;
  sink = fn;
  return previous;
}

function shouldRedact(key: string): boolean {
  const normalized = key.toLowerCase();
  return REDACT_KEYS.some((candidate) => normalized.includes(candidate));
}

function stringify(value: unknown): string {
  if (value instanceof Error || types.isNativeError(value)) return value.message;
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map(stringify).join(',');
  if (value === undefined) return '';
  if (value !== null && typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function formatValue(value: unknown): string {
  const text = stringify(value);
  return /[\s"=]/.test(text) || text === '' ? JSON.stringify(text) : text;
}

/** Render a logfmt line, quoting values with spaces, quotes or `=`. */
export function formatLogfmt(fields: LogFields): string {
  return Object.entries(fields)
    .map(([key, value]) => `${key}=${shouldRedact(key) ? '[redacted]' : formatValue(value)}`)
    .join(' ');
}

/**
 * Leveled logfmt logger. Lines below `level` are dropped; every line is also
 * mirrored to the `scep-acme-bridge:log` debug namespace.
 */
export function createLogger(level: LogLevel = 'info', context: LogFields = {}): Logger {
  const threshold = LEVEL_WEIGHT[level];

  const write = (lvl: LogLevel, msg: string, fields?: LogFields) => {
    if (LEVEL_WEIGHT[lvl] < threshold) return;
    const line = formatLogfmt({
      ts: new Date().toISOString(),
      level: lvl,
      ...context,
      msg,
      ...fields,
    });
    debugLogger(line);
    sink(line);
  };

  return {
    debug: (msg, fields) => write('debug', msg, fields),
    info: (msg, fields) => write('info', msg, fields),
    warn: (msg, fields) => write('warn', msg, fields),
    error: (msg, fields) => write('error', msg, fields),
    with: (fields) => createLogger(level, { ...context, ...fields }),
  };
}

/** Logger that drops everything; default for library components. */
export const nopLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  with: () => nopLogger,
};
