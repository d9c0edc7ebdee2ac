import { pino } from 'pino';
import type { DestinationStream, LevelWithSilent, Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  /** pino level, or 'silent' to disable output. Defaults to 'silent'. */
  level?: LevelWithSilent;
  destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const config = { name: 'odata-query', level: options.level ?? 'silent' };
  return options.destination === undefined ? pino(config) : pino(config, options.destination);
}

export const defaultLogger: Logger = createLogger();
