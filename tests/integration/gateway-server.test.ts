import { describe, it, expect, afterEach, vi } from 'vitest';
import http, { createServer, Server, type RequestListener } from 'http';
import { ok } from 'neverthrow';
import { GatewayServer } from '../../src/infrastructure/http/gateway-server.js';
import type { ValidatedConfig } from '../../src/config/app-config.js';
import { testConfig } from '../helpers/config.js';
import { createCapturingLogger, type LogCapture } from '../helpers/log-capture.js';
import { closeServer, httpRequest, listenOnLoopback, portOfAddress, waitFor } from '../helpers/http.js';

function createGateway(handler: RequestListener, config: ValidatedConfig): { server: GatewayServer; capture: LogCapture } {
  const { factory, capture } = createCapturingLogger();
  const server = new GatewayServer(handler, config.server.listen, config.server.gracePeriodMs, factory);
  return { server, capture };
}

const okHandler: RequestListener = (_req, res) => {
  res.end('OK');
};

describe('GatewayServer', () => {
  const cleanups: Array<() => Promise<void>> = [];

  afterEach(async () => {
    vi.restoreAllMocks();
    for (const cleanup of cleanups.splice(0).reverse()) {
      await cleanup();
    }
  });

  it('serves requests once listening and closes gracefully when idle', async () => {
    const { server } = createGateway(okHandler, testConfig());

    const running = server.run();
    const port = portOfAddress(await server.whenListening());
    expect(server.state).toBe('listening');

    const response = await httpRequest(port, '/');
    expect(response.status).toBe(200);
    expect(response.body).toBe('OK');

    server.interrupt(ok(undefined));
    const result = await running;

    expect(result.isOk()).toBe(true);
    expect(server.state).toBe('closed');
    expect(server.shutdownReport?.kind).toBe('graceful');
    expect(server.forcedCloseCount).toBe(0);
  });

  it('lets an in-flight request finish inside the grace period', async () => {
    const handler: RequestListener = (_req, res) => {
      setTimeout(() => res.end('slow but done'), 50);
    };
    const { server } = createGateway(handler, testConfig({ gracePeriod: '1s' }));

    const running = server.run();
    const port = portOfAddress(await server.whenListening());
    const response = httpRequest(port, '/slow');
    await waitFor(() => server.inFlight === 1);

    server.interrupt(ok(undefined));
    expect(server.state).toBe('draining');

    expect((await response).body).toBe('slow but done');
    expect((await running).isOk()).toBe(true);
    expect(server.shutdownReport?.kind).toBe('graceful');
    expect(server.inFlight).toBe(0);
  });

  it('forces connections closed once the grace period expires, exactly once', async () => {
    const timers = new Set<NodeJS.Timeout>();
    const handler: RequestListener = (_req, res) => {
      const timer = setTimeout(() => res.end('too late'), 1_000);
      timers.add(timer);
      res.on('close', () => clearTimeout(timer));
    };
    cleanups.push(async () => timers.forEach((timer) => clearTimeout(timer)));
    const { server, capture } = createGateway(handler, testConfig({ gracePeriod: '100ms' }));

    const running = server.run();
    const port = portOfAddress(await server.whenListening());
    const response = httpRequest(port, '/stuck').then(
      () => 'completed',
      () => 'reset'
    );
    await waitFor(() => server.inFlight === 1);

    const started = Date.now();
    server.interrupt(ok(undefined));
    server.interrupt(ok(undefined));
    const result = await running;
    const elapsed = Date.now() - started;

    expect(result.isOk()).toBe(true);
    expect(elapsed).toBeGreaterThanOrEqual(90);
    expect(elapsed).toBeLessThan(1_000);
    expect(await response).toBe('reset');
    expect(server.forcedCloseCount).toBe(1);
    expect(server.shutdownReport).toMatchObject({ kind: 'forced', inFlight: 1 });
    expect(capture.withMessage('grace period expired, forcing connections closed')).toHaveLength(1);
    expect(capture.at('warn')).toHaveLength(1);
  });

  it('closes idle keep-alive connections when shutdown starts', async () => {
    const agent = new http.Agent({ keepAlive: true, maxSockets: 1 });
    cleanups.push(async () => agent.destroy());
    const { server } = createGateway(okHandler, testConfig({ gracePeriod: '5s' }));

    const running = server.run();
    const port = portOfAddress(await server.whenListening());
    await httpRequest(port, '/', { agent });

    const started = Date.now();
    server.interrupt(ok(undefined));
    await running;

    expect(Date.now() - started).toBeLessThan(1_000);
    expect(server.shutdownReport?.kind).toBe('graceful');
  });

  it('returns ListenFailed when the address is taken', async () => {
    const occupant: Server = createServer();
    const takenPort = await listenOnLoopback(occupant);
    cleanups.push(() => closeServer(occupant));
    const { server, capture } = createGateway(okHandler, testConfig({ listen: `127.0.0.1:${takenPort}` }));

    const result = await server.run();

    const error = result._unsafeUnwrapErr();
    expect(error._tag).toBe('ListenFailed');
    if (error._tag === 'ListenFailed') {
      expect(error.code).toBe('EADDRINUSE');
      expect(error.address).toBe(`127.0.0.1:${takenPort}`);
    }
    expect(server.state).toBe('closed');
    expect(await server.whenListening()).toBeNull();
    expect(capture.withMessage('failed to listen')).toHaveLength(1);
  });

  it('returns ShutdownFailed when closing the listener fails', async () => {
    const closeFailure = new Error('close failed');
    const realClose = Server.prototype.close;
    vi.spyOn(Server.prototype, 'close').mockImplementationOnce(function (
      this: Server,
      callback?: (err?: Error) => void
    ): Server {
      // The socket really closes; only the callback reports a failure.
      return realClose.call(this, () => callback?.(closeFailure));
    });
    const { server, capture } = createGateway(okHandler, testConfig());

    const running = server.run();
    await server.whenListening();
    server.interrupt(ok(undefined));
    const result = await running;

    expect(result._unsafeUnwrapErr()).toEqual({
      _tag: 'ShutdownFailed',
      actor: 'gateway-server',
      message: 'Shutdown of gateway-server failed',
      cause: closeFailure,
    });
    expect(server.state).toBe('closed');
    expect(server.shutdownReport).toBeNull();
    expect(capture.withMessage('server close failed')).toHaveLength(1);
  });

  it('keeps the longest accepted grace period as a real deadline', async () => {
    const handler: RequestListener = (_req, res) => {
      setTimeout(() => res.end('done'), 100);
    };
    const { server } = createGateway(handler, testConfig({ gracePeriod: '596h31m23.647s' }));

    const running = server.run();
    const port = portOfAddress(await server.whenListening());
    const response = httpRequest(port, '/slow');
    await waitFor(() => server.inFlight === 1);

    server.interrupt(ok(undefined));

    expect((await response).body).toBe('done');
    expect((await running).isOk()).toBe(true);
    expect(server.shutdownReport?.kind).toBe('graceful');
    expect(server.forcedCloseCount).toBe(0);
  });

  it('does not bind when interrupted before run', async () => {
    const { server } = createGateway(okHandler, testConfig());

    server.interrupt(ok(undefined));
    const result = await server.run();

    expect(result.isOk()).toBe(true);
    expect(server.state).toBe('closed');
    expect(server.shutdownReport).toBeNull();
  });

  it('shuts down right after binding when interrupted while listen is pending', async () => {
    const { server } = createGateway(okHandler, testConfig());

    const running = server.run();
    server.interrupt(ok(undefined));
    const result = await running;

    expect(result.isOk()).toBe(true);
    expect(server.state).toBe('closed');
    expect(server.shutdownReport?.kind).toBe('graceful');
  });

  it('refuses a second run', async () => {
    const { server } = createGateway(okHandler, testConfig());

    const running = server.run();
    await server.whenListening();

    await expect(server.run()).rejects.toThrow('GatewayServer.run() called twice');
    server.interrupt(ok(undefined));
    await running;
  });
});
