import pino, { type DestinationStream } from 'pino';
import type { ILoggerFactory, Logger, RootLoggerOptions } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Create the root pino logger.
 *
 * - json: synchronous JSON lines on stderr (stdout stays free for tooling)
 * - pretty: pino-pretty transport, for humans at a terminal
 *
 * `destination` overrides both; tests pass a capturing stream.
 */
export function createRootLogger(options: RootLoggerOptions, destination?: DestinationStream): Logger {
  const base = {
    name: options.name,
    level: options.level,
    redact: REDACTION_CONFIG,
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  if (destination) {
    return pino(base, destination);
  }

  if (options.format === 'pretty') {
    return pino({
      ...base,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      },
    });
  }

  return pino(base, pino.destination({ dest: 2, sync: true }));
}

/**
 * Logger factory - component loggers are children of one root.
 */
export class PinoLoggerFactory implements ILoggerFactory {
  constructor(private readonly _root: Logger) {}

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
