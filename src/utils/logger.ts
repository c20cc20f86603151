/**
 * Diagnostic logger for the discord CLI.
 *
 * Driven by the resolved `logging` level and format. The caller picks the
 * stream; the CLI always passes stderr so stdout carries nothing but
 * formatted command output. `json` emits one object per line; any other
 * format emits emoji-prefixed text.
 */

import type { LoggingConfig } from '../schema/index.js';

// ── Levels ──────────────────────────────────────────────────

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFields = Readonly<Record<string, string | number | boolean>>;

/** Unknown names fall back to `info`. */
export function parseLevel(name: string): LogLevel {
  return LOG_LEVELS.find((level) => level === name) ?? 'info';
}

const RANK: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const ICON: Readonly<Record<LogLevel, string>> = {
  debug: '🔧',
  info: 'ℹ️ ',
  warn: '⚠️ ',
  error: '💥',
};

// ── Logger ──────────────────────────────────────────────────

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export interface LoggerOptions {
  /** Defaults to the wall clock; injectable for tests. */
  now?: () => Date;
}

export function createLogger(
  settings: Pick<LoggingConfig, 'level' | 'format'>,
  stream: NodeJS.WritableStream,
  options: LoggerOptions = {},
): Logger {
  const level = parseLevel(settings.level);
  const now = options.now ?? (() => new Date());
  const json = settings.format === 'json';

  function write(at: LogLevel, message: string, fields: LogFields = {}): void {
    if (RANK[at] < RANK[level]) return;
    const line = json
      ? JSON.stringify({ time: now().toISOString(), level: at, message, ...fields })
      : textLine(at, message, fields);
    stream.write(line + '\n');
  }

  return {
    level,
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
  };
}

function textLine(at: LogLevel, message: string, fields: LogFields): string {
  const suffix = Object.entries(fields)
    .map(([key, value]) => `${key}=${String(value)}`)
    .join(' ');
  return suffix.length > 0
    ? `${ICON[at]} ${message} ${suffix}`
    : `${ICON[at]} ${message}`;
}
