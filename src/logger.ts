import { pino, type DestinationStream, type Logger } from 'pino';
import type { LogLevel } from './config.js';
import { loadConfig } from './config.js';

export type { Logger } from 'pino';

export interface LoggerOptions {
  level?: LogLevel;
  destination?: DestinationStream;
}

/**
 * Create a pino logger tagged with the library name.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const pinoOptions = {
    level: options.level ?? loadConfig().logLevel,
    base: { lib: 'lindsl' },
  };
  return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}

let current: Logger | null = null;

/**
 * Get the library logger, creating it from configuration on first use.
 */
export function getLogger(): Logger {
  if (!current) {
    current = createLogger();
  }
  return current;
}

/**
 * Replace the library logger (or reset it with `null`).
 */
export function setLogger(logger: Logger | null): void {
  current = logger;
}
