import http, { type ClientRequest, type IncomingMessage, type RequestOptions } from 'http';
import https from 'https';
import { pipeline } from 'stream';
import type { RequestHandler } from 'express';
import type { Logger } from '../../core/logging/index.js';

export interface ForwardOptions {
  readonly target: URL;
  /** Leading part of the incoming path that the target's own path replaces. */
  readonly stripPrefix: string;
  readonly logger: Logger;
}

/**
 * Map an incoming request URL onto the upstream.
 *
 * `/api/metrics/v1/api/v1/query?q=up` with prefix `/api/metrics/v1` and
 * target `http://query:9090/` becomes `http://query:9090/api/v1/query?q=up`.
 */
export function resolveUpstreamUrl(target: URL, stripPrefix: string, originalUrl: string): URL {
  const incoming = new URL(originalUrl, 'http://gateway.invalid');
  const suffix = incoming.pathname.startsWith(stripPrefix)
    ? incoming.pathname.slice(stripPrefix.length)
    : incoming.pathname;

  const url = new URL(target.href);
  url.pathname = target.pathname.replace(/\/$/, '') + suffix;
  url.search = incoming.search;
  return url;
}

function request(url: URL, options: RequestOptions, onResponse: (res: IncomingMessage) => void): ClientRequest {
  return url.protocol === 'https:'
    ? https.request(url, options, onResponse)
    : http.request(url, options, onResponse);
}

/**
 * Stream a request to the upstream and its response back, unbuffered.
 */
export function forwardTo(options: ForwardOptions): RequestHandler {
  const { target, stripPrefix, logger } = options;

  return (req, res) => {
    const url = resolveUpstreamUrl(target, stripPrefix, req.originalUrl);

    let clientGone = false;
    let upstreamAborted = false;

    const upstream = request(url, { method: req.method, headers: { ...req.headers, host: url.host } }, (upstreamRes) => {
      upstreamRes.once('error', () => {
        upstreamAborted = true;
      });
      res.writeHead(upstreamRes.statusCode ?? 502, upstreamRes.headers);
      // pipeline tears the client response down when the upstream body stops short.
      pipeline(upstreamRes, res, (error) => {
        if (!error || clientGone) return;
        logger.warn({ err: error, upstream: url.origin, path: url.pathname }, 'upstream response aborted');
      });
    });

    upstream.on('error', (error) => {
      if (clientGone) {
        logger.debug({ upstream: url.origin, path: url.pathname }, 'client went away, upstream request aborted');
        return;
      }
      logger.warn({ err: error, upstream: url.origin, path: url.pathname }, 'upstream request failed');
      if (!res.headersSent) {
        res.status(502).json({ error: 'bad gateway' });
      } else {
        res.destroy(error);
      }
    });

    res.on('close', () => {
      if (!res.writableFinished && !upstreamAborted) {
        clientGone = true;
        upstream.destroy();
      }
    });

    req.pipe(upstream);
  };
}
