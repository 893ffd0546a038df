/**
 * CLI logger. Structured pino output goes to stderr so stdout stays free for
 * the run summary.
 */

import { destination, pino } from 'pino';
import type { Logger } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Pick the log level: explicit flag, then PATCHSYNC_LOGLEVEL, then info.
 *
 * @throws If a level is given but not recognized
 */
export function resolveLogLevel(
  flag: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): LogLevel {
  const raw = (flag ?? env['PATCHSYNC_LOGLEVEL'] ?? 'info').toLowerCase();
  if (!isLogLevel(raw)) {
    throw new Error(`Unknown log level "${raw}" (expected one of: ${LOG_LEVELS.join(', ')})`);
  }
  return raw;
}

export function createLogger(level: LogLevel): Logger {
  return pino({ name: 'patchsync', level }, destination(2));
}
