// Types
export type { Logger, ILoggerFactory, LogLevel, LogFormat, RootLoggerOptions } from './types.js';

// Root + factory (registered in the container)
export { createRootLogger, PinoLoggerFactory } from './create-logger.js';

// Bootstrap (for pre-container code)
export { getBootstrapLogger } from './bootstrap.js';

export { REDACTION_CONFIG } from './redaction.js';
