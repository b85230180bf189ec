import type { Result } from 'neverthrow';
import type { ActorError } from '../errors/app-error.js';

/**
 * Settled value of an actor's `run`: success, or the reason it stopped.
 */
export type ActorResult = Result<void, ActorError>;

/**
 * A unit of concurrent work owned by a RunGroup.
 *
 * - `run` is called exactly once and must eventually settle, at the latest
 *   after `interrupt` has been called.
 * - `interrupt` must not block and must tolerate repeated calls, including
 *   calls made while `run` is still executing or has already settled. It
 *   receives the result of the first actor to finish.
 */
export interface Actor {
  readonly name: string;
  run(): Promise<ActorResult>;
  interrupt(cause: ActorResult): void;
}
