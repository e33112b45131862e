import { pino, stdTimeFunctions } from 'pino';
import type { BaseLogger, Logger, LoggerOptions } from 'pino';

export type { BaseLogger };

export const createLoggerOptions = (level: string): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime,
});

export function createLogger(level: string): Logger {
  return pino({ ...createLoggerOptions(level), name: 'selector-sql' });
}

/** Package-wide logger used when a caller does not hand one in. */
export const logger = createLogger(process.env['LOG_LEVEL'] ?? 'info');
