import express, { type Application, type ErrorRequestHandler, type RequestHandler } from 'express';
import type { ILoggerFactory, Logger } from '../../core/logging/index.js';
import { forwardTo } from './forward.js';

export interface GatewayAppOptions {
  readonly loggerFactory: ILoggerFactory;
  readonly upstreams: {
    readonly query: URL;
    readonly write: URL;
  };
}

/** Mount point of the metrics API. */
export const METRICS_API_PREFIX = '/api/metrics/v1';

/**
 * Express application served by the gateway.
 *
 * Routes:
 * - GET  /-/healthy                      -> liveness
 * - GET  /-/ready                        -> readiness
 * - ALL  /api/metrics/v1/api/v1/*        -> query upstream
 * - POST /api/metrics/v1/write           -> write upstream
 */
export function createGatewayApp(options: GatewayAppOptions): Application {
  const logger = options.loggerFactory.create('http');
  const app = express();

  app.disable('x-powered-by');
  app.use(requestLogging(logger));

  app.get('/-/healthy', (_req, res) => {
    res.type('text/plain').send('OK');
  });

  app.get('/-/ready', (_req, res) => {
    res.type('text/plain').send('OK');
  });

  app.all(
    `${METRICS_API_PREFIX}/api/v1/*`,
    forwardTo({ target: options.upstreams.query, stripPrefix: METRICS_API_PREFIX, logger })
  );

  app.post(
    `${METRICS_API_PREFIX}/write`,
    forwardTo({ target: options.upstreams.write, stripPrefix: `${METRICS_API_PREFIX}/write`, logger })
  );

  app.use((_req, res) => {
    res.status(404).json({ error: 'not found' });
  });

  app.use(errorHandler(logger));

  return app;
}

function requestLogging(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      logger.debug(
        { method: req.method, path: req.path, status: res.statusCode, durationMs: Date.now() - start },
        'request completed'
      );
    });
    next();
  };
}

function errorHandler(logger: Logger): ErrorRequestHandler {
  return (error: unknown, req, res, next) => {
    logger.error({ err: error, method: req.method, path: req.path }, 'request failed');
    if (res.headersSent) {
      next(error);
      return;
    }
    res.status(500).json({ error: 'internal error' });
  };
}
