import { createServer, type Server } from 'http';
import type { RequestListener } from 'http';
import type { AddressInfo } from 'net';
import { err, ok, type Result } from 'neverthrow';
import { inject, injectable } from 'tsyringe';
import { DI } from '../../di/tokens.js';
import type { ILoggerFactory, Logger } from '../../core/logging/index.js';
import { describeListenAddress } from '../../config/app-config.js';
import type { ListenAddress } from '../../config/app-config.js';
import { Err } from '../../errors/factories.js';
import type { Actor, ActorResult } from '../../runtime/actor.js';

/**
 * Server lifecycle states.
 *
 * - idle -> listening -> draining -> closed
 * - idle -> closed on a listen failure, or when interrupted before run()
 */
export type ServerState = 'idle' | 'listening' | 'draining' | 'closed';

/**
 * How the last shutdown ended. A forced close is reported, never returned as an error.
 */
export type ShutdownReport =
  | { readonly kind: 'graceful'; readonly durationMs: number }
  | { readonly kind: 'forced'; readonly inFlight: number; readonly durationMs: number };

/**
 * Actor serving HTTP until interrupted.
 *
 * On interrupt the listener stops accepting at once, in-flight requests get
 * `gracePeriodMs` to finish, and whatever is still open after that is
 * destroyed. `run` settles once the server has fully closed.
 */
@injectable()
export class GatewayServer implements Actor {
  readonly name = 'gateway-server';

  private readonly logger: Logger;
  private server: Server | null = null;
  private _state: ServerState = 'idle';
  private boundAddress: AddressInfo | null = null;
  private readonly listenWaiters: Array<(address: AddressInfo | null) => void> = [];
  private interruptRequested = false;
  private inFlightRequests = 0;
  private drainStartedAt = 0;
  private _report: ShutdownReport | null = null;
  private _forcedCloseCount = 0;
  private finish: ((result: ActorResult) => void) | null = null;

  constructor(
    @inject(DI.Http.Handler) private readonly handler: RequestListener,
    @inject(DI.Config.ListenAddress) private readonly listenAddress: ListenAddress,
    @inject(DI.Config.GracePeriodMs) private readonly gracePeriodMs: number,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory
  ) {
    this.logger = loggerFactory.create('gateway-server');
  }

  get state(): ServerState {
    return this._state;
  }

  get inFlight(): number {
    return this.inFlightRequests;
  }

  get shutdownReport(): ShutdownReport | null {
    return this._report;
  }

  /** Number of forced-close events recorded; at most one per server. */
  get forcedCloseCount(): number {
    return this._forcedCloseCount;
  }

  /**
   * Resolves with the bound address once listening, or null if the server
   * closed without ever listening.
   */
  whenListening(): Promise<AddressInfo | null> {
    if (this._state !== 'idle') {
      return Promise.resolve(this.boundAddress);
    }
    return new Promise((resolve) => {
      this.listenWaiters.push(resolve);
    });
  }

  async run(): Promise<ActorResult> {
    if (this.server) {
      throw new Error('GatewayServer.run() called twice');
    }
    if (this._state === 'closed') {
      // Interrupted before it ever started: nothing to bind, nothing to drain.
      return ok(undefined);
    }

    const server = createServer();
    this.server = server;
    server.on('request', (_req, res) => {
      this.inFlightRequests += 1;
      res.once('close', () => {
        this.inFlightRequests -= 1;
        if (this._state === 'draining') {
          // Keep-alive sockets go idle once their response is done.
          server.closeIdleConnections();
        }
      });
    });
    server.on('request', this.handler);

    const done = new Promise<ActorResult>((resolve) => {
      let settled = false;
      this.finish = (result) => {
        if (settled) return;
        settled = true;
        resolve(result);
      };
    });

    const address = describeListenAddress(this.listenAddress);
    const listened = await this.listen(server);
    if (listened.isErr()) {
      this.transition('closed');
      this.logger.error({ err: listened.error, address }, 'failed to listen');
      return err(Err.listenFailed(address, listened.error));
    }

    this.boundAddress = listened.value;
    this.transition('listening');
    this.logger.info({ address, port: listened.value.port }, 'listening');

    server.on('error', (error) => {
      this.logger.error({ err: error }, 'server error');
      this.transition('closed');
      server.close();
      server.closeAllConnections();
      this.finish?.(err(Err.actorCrashed(this.name, error)));
    });

    if (this.interruptRequested) {
      this.beginShutdown();
    }

    return done;
  }

  interrupt(cause: ActorResult): void {
    if (this.interruptRequested) return;
    this.interruptRequested = true;
    this.logger.info({ state: this._state, causeOk: cause.isOk() }, 'shutdown requested');

    if (this._state === 'listening') {
      this.beginShutdown();
    } else if (this._state === 'idle' && !this.server) {
      this.transition('closed');
    }
    // idle with a server: listen() is in flight; run() starts the shutdown once bound.
  }

  private listen(server: Server): Promise<Result<AddressInfo, unknown>> {
    return new Promise((resolve) => {
      const onError = (error: Error): void => {
        resolve(err(error));
      };
      server.once('error', onError);
      server.listen({ port: this.listenAddress.port, host: this.listenAddress.host ?? undefined }, () => {
        server.off('error', onError);
        const bound = server.address();
        if (bound === null || typeof bound === 'string') {
          resolve(err(new Error(`unexpected server address: ${String(bound)}`)));
          return;
        }
        resolve(ok(bound));
      });
    });
  }

  private beginShutdown(): void {
    const server = this.server;
    if (!server || this._state !== 'listening') return;

    this.transition('draining');
    this.drainStartedAt = Date.now();
    this.logger.info(
      { inFlight: this.inFlightRequests, gracePeriodMs: this.gracePeriodMs },
      'draining in-flight requests'
    );

    const deadline = setTimeout(() => this.forceClose(), this.gracePeriodMs);

    server.close((error) => {
      clearTimeout(deadline);
      const durationMs = Date.now() - this.drainStartedAt;
      this.transition('closed');

      if (error) {
        this.logger.error({ err: error }, 'server close failed');
        this.finish?.(err(Err.shutdownFailed(this.name, error)));
        return;
      }

      if (!this._report) {
        this._report = { kind: 'graceful', durationMs };
        this.logger.info({ durationMs }, 'server closed gracefully');
      } else {
        this.logger.info({ durationMs }, 'server closed after forcing connections');
      }
      this.finish?.(ok(undefined));
    });
    server.closeIdleConnections();
  }

  private forceClose(): void {
    const server = this.server;
    if (!server || this._state !== 'draining' || this._report) return;

    const inFlight = this.inFlightRequests;
    this._report = { kind: 'forced', inFlight, durationMs: Date.now() - this.drainStartedAt };
    this._forcedCloseCount += 1;
    this.logger.warn(
      { inFlight, gracePeriodMs: this.gracePeriodMs },
      'grace period expired, forcing connections closed'
    );
    server.closeAllConnections();
  }

  private transition(next: ServerState): void {
    if (this._state === next) return;
    this._state = next;
    if (next === 'listening' || next === 'closed') {
      for (const waiter of this.listenWaiters.splice(0)) {
        waiter(this.boundAddress);
      }
    }
  }
}
