import { inject, injectable } from 'tsyringe';
import { DI } from '../di/tokens.js';
import type { AppError } from '../errors/app-error.js';
import { formatAppError } from '../errors/formatter.js';
import type { ILoggerFactory, Logger } from '../core/logging/index.js';
import type { ExitCode, ProcessTerminator } from './ports/process-terminator.js';
import type { RunOutcome } from './run-group.js';

export type DeferredCleanup = () => void | Promise<void>;

/**
 * Turns a run outcome into the process exit.
 *
 * Mapping is total: an outcome without error exits 0, any error exits 1
 * after exactly one error line. "exiting" is logged next, then deferred
 * cleanups (log flush and the like) run last-in first-out before the
 * terminator is called.
 */
@injectable()
export class ExitCoordinator {
  private readonly logger: Logger;
  private readonly cleanups: DeferredCleanup[] = [];

  constructor(
    @inject(DI.Runtime.ProcessTerminator) private readonly terminator: ProcessTerminator,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory,
    @inject(DI.Config.DebugName) private readonly debugName: string
  ) {
    this.logger = loggerFactory.root;
  }

  defer(cleanup: DeferredCleanup): void {
    this.cleanups.push(cleanup);
  }

  toExitCode(outcome: RunOutcome): ExitCode {
    return outcome.result.isOk() ? { kind: 'success' } : { kind: 'failure' };
  }

  async exit(outcome: RunOutcome): Promise<never> {
    if (outcome.result.isErr()) {
      this.logError(outcome.result.error, outcome.actor);
    }
    return this.terminate(this.toExitCode(outcome));
  }

  /**
   * Exit for failures detected before the run group starts (invalid flags).
   */
  async fail(error: AppError): Promise<never> {
    this.logError(error, null);
    return this.terminate({ kind: 'failure' });
  }

  private logError(error: AppError, actor: string | null): void {
    const cause = 'cause' in error && error.cause instanceof Error ? error.cause : undefined;
    this.logger.error(
      { err: cause, actor, tag: error._tag, detail: formatAppError(error) },
      `${this.debugName} failed`
    );
  }

  private async terminate(code: ExitCode): Promise<never> {
    // Logged before the cleanups so the log flush covers it.
    this.logger.info({ code: code.kind }, 'exiting');
    for (const cleanup of this.cleanups.splice(0).reverse()) {
      try {
        await cleanup();
      } catch (error) {
        this.logger.warn({ err: error }, 'deferred cleanup failed');
      }
    }
    return this.terminator.terminate(code);
  }
}
