import { ok } from 'neverthrow';
import { inject, injectable } from 'tsyringe';
import { DI } from '../di/tokens.js';
import type { ILoggerFactory, Logger } from '../core/logging/index.js';
import type { Actor, ActorResult } from './actor.js';
import { Channel } from './channel.js';
import type { ProcessSignals, ShutdownSignal, Unsubscribe } from './ports/process-signals.js';

export const DEFAULT_SHUTDOWN_SIGNALS: readonly ShutdownSignal[] = ['SIGINT', 'SIGTERM'];

/**
 * Actor that finishes when the process receives a shutdown signal.
 *
 * The subscription is made inside `run`, after the group has spawned the
 * actor. A signal delivered before that point is not seen; the watcher then
 * only finishes through `interrupt`. The one-slot channel is created before
 * subscribing so a signal arriving between subscribe and wait is kept.
 */
@injectable()
export class SignalWatcher implements Actor {
  readonly name = 'signal-watcher';

  private readonly logger: Logger;
  private readonly signals: readonly ShutdownSignal[];
  private channel: Channel<ShutdownSignal> | null = null;
  private interrupted = false;
  private _receivedSignal: ShutdownSignal | null = null;

  constructor(
    @inject(DI.Runtime.ProcessSignals) private readonly processSignals: ProcessSignals,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory,
    @inject(DI.Runtime.ShutdownSignals) signals: readonly ShutdownSignal[] = DEFAULT_SHUTDOWN_SIGNALS
  ) {
    this.logger = loggerFactory.create('signal-watcher');
    this.signals = signals;
  }

  /** Signal that ended `run`, or null if it ended through `interrupt`. */
  get receivedSignal(): ShutdownSignal | null {
    return this._receivedSignal;
  }

  async run(): Promise<ActorResult> {
    const channel = new Channel<ShutdownSignal>(1);
    this.channel = channel;
    if (this.interrupted) {
      channel.close();
    }

    const subscriptions: Unsubscribe[] = this.signals.map((signal) =>
      this.processSignals.on(signal, (s) => {
        channel.send(s);
      })
    );

    try {
      const received = await channel.receive();
      if (received.kind === 'value') {
        this._receivedSignal = received.value;
        this.logger.info({ signal: received.value }, 'received signal');
      }
      return ok(undefined);
    } finally {
      for (const unsubscribe of subscriptions) {
        unsubscribe();
      }
    }
  }

  interrupt(cause: ActorResult): void {
    if (this.interrupted) return;
    this.interrupted = true;

    this.logger.info(
      cause.isErr() ? { cause: cause.error.message } : {},
      'caught interrupt'
    );
    this.channel?.close();
  }
}
