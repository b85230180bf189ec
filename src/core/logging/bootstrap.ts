import pino from 'pino';
import type { Logger } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Logger for the window before flags are parsed and the container exists.
 *
 * Only startup failures go through it, so it defaults to `info` and honours
 * GATEWAY_BOOTSTRAP_LOG_LEVEL for debugging the composition root itself.
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    const level = process.env['GATEWAY_BOOTSTRAP_LOG_LEVEL']?.toLowerCase() || 'info';

    _bootstrapLogger = pino(
      {
        name: 'bootstrap',
        level,
        redact: REDACTION_CONFIG,
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: 2, sync: true })
    );
  }

  return _bootstrapLogger;
}
