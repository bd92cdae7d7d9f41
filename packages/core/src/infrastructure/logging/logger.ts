import { pino } from 'pino';
import type { DestinationStream, Logger, LevelWithSilent } from 'pino';

export interface LoggerOptions {
  readonly name?: string;
  readonly level?: LevelWithSilent;
  /** Where log lines are written. Default: stdout. */
  readonly destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const settings = {
    name: options.name ?? 'embedbatch',
    level: options.level ?? 'info',
  };
  return options.destination ? pino(settings, options.destination) : pino(settings);
}

/** Shared default for components constructed without a logger. */
export const defaultLogger: Logger = createLogger();
