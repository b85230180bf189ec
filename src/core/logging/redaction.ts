/**
 * Redaction paths for pino.
 * Forwarded requests are logged with their headers at debug level; credentials never are.
 */
export const REDACTION_CONFIG = {
  paths: [
    'authorization',
    'password',
    'token',

    'headers.authorization',
    'headers.cookie',
    'headers["x-api-key"]',
    'req.headers.authorization',
    'req.headers.cookie',
  ],
  censor: '[REDACTED]',
};
