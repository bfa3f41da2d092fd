import { pino } from 'pino';
import type { Logger, DestinationStream, Level } from 'pino';

export type { Logger };

export type LogLevel = Level | 'silent';

export interface LoggerOptions {
  level?: LogLevel;
  /** Where JSON lines go. Defaults to stdout. */
  destination?: DestinationStream;
}

export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

export function createLogger(options: LoggerOptions = {}): Logger {
  const opts = { level: options.level ?? DEFAULT_LOG_LEVEL };
  return options.destination ? pino(opts, options.destination) : pino(opts);
}

/** A logger that drops everything; used when the caller passes none. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
