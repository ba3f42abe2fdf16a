import pino, { stdTimeFunctions } from 'pino';
import type { Logger, LoggerOptions } from 'pino';

/** The slice of a pino logger the sync components write to. */
export interface SyncLogger {
  debug(obj: Record<string, unknown>, msg?: string): void;
  info(obj: Record<string, unknown>, msg?: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
}

export const createLogger = (level: string): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

/** Logs to stderr so command output on stdout stays machine readable. */
export const createStandaloneLogger = (level: string): Logger => pino(createLogger(level), pino.destination(2));
