import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type - pino's Logger, no wrapper.
 *
 * API follows pino idiom (data-first):
 *   logger.info({ address }, 'listening');
 *   logger.error({ err }, 'gateway failed');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface for DI.
 */
export interface ILoggerFactory {
  /** Create a child logger for a component */
  create(component: string): Logger;

  /** Root logger instance */
  readonly root: Logger;
}

/**
 * Levels accepted on the command line.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type LogFormat = 'json' | 'pretty';

export interface RootLoggerOptions {
  /** Logger name; every line carries it */
  readonly name: string;
  readonly level: LogLevel;
  readonly format: LogFormat;
}
