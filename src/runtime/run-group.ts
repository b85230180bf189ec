import { err, ok } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import { Err } from '../errors/factories.js';
import type { Actor, ActorResult } from './actor.js';
import { Channel } from './channel.js';

/**
 * Result of a group run: the first actor to finish and what it returned.
 * `actor` is null (and `index` -1) only for an empty group.
 */
export interface RunOutcome {
  readonly actor: string | null;
  readonly index: number;
  readonly result: ActorResult;
}

interface Completion {
  readonly index: number;
  readonly result: ActorResult;
}

export class RunGroupStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RunGroupStateError';
  }
}

type GroupState = 'open' | 'running' | 'finished';

/**
 * Runs a set of actors concurrently and stops them all as soon as one finishes.
 *
 * The first completion, success or failure, becomes the outcome. Every actor
 * (the finished one included) is then interrupted with that result, and `run`
 * keeps waiting until each remaining actor has settled. Results that arrive
 * after the first are discarded.
 *
 * No timeout is applied here: an actor that ignores `interrupt` keeps the
 * group waiting. Bounding shutdown time is each actor's responsibility.
 *
 * A group is single-use.
 */
export class RunGroup {
  private readonly actors: Actor[] = [];
  private state: GroupState = 'open';

  constructor(private readonly logger: Logger) {}

  get size(): number {
    return this.actors.length;
  }

  add(actor: Actor): this {
    if (this.state !== 'open') {
      throw new RunGroupStateError(`Cannot add actor "${actor.name}" to a group that has already run`);
    }
    this.actors.push(actor);
    return this;
  }

  async run(): Promise<RunOutcome> {
    if (this.state !== 'open') {
      throw new RunGroupStateError('Run group can only be run once');
    }
    this.state = 'running';

    if (this.actors.length === 0) {
      this.state = 'finished';
      return { actor: null, index: -1, result: ok(undefined) };
    }

    const completions = new Channel<Completion>(this.actors.length);

    // All actors start before the first await, so none can finish unseen.
    this.actors.forEach((actor, index) => {
      void this.execute(actor).then((result) => {
        completions.send({ index, result });
      });
    });

    const first = await this.receive(completions);
    const firstActor = this.actorAt(first.index);
    this.logger.debug(
      { actor: firstActor.name, ok: first.result.isOk() },
      'first actor finished, interrupting group'
    );

    for (const actor of this.actors) {
      this.interrupt(actor, first.result);
    }

    for (let remaining = this.actors.length - 1; remaining > 0; remaining--) {
      const late = await this.receive(completions);
      this.logger.debug(
        { actor: this.actorAt(late.index).name, ok: late.result.isOk(), remaining: remaining - 1 },
        'actor finished after interrupt'
      );
    }

    this.state = 'finished';
    return { actor: firstActor.name, index: first.index, result: first.result };
  }

  /**
   * Invoke `run`, turning a throw or rejection into an error result so every
   * actor produces exactly one completion.
   */
  private async execute(actor: Actor): Promise<ActorResult> {
    try {
      return await actor.run();
    } catch (cause) {
      return err(Err.actorCrashed(actor.name, cause));
    }
  }

  private interrupt(actor: Actor, cause: ActorResult): void {
    try {
      actor.interrupt(cause);
    } catch (error) {
      this.logger.error({ err: error, actor: actor.name }, 'actor interrupt threw');
    }
  }

  private async receive(completions: Channel<Completion>): Promise<Completion> {
    const received = await completions.receive();
    if (received.kind === 'closed') {
      // The completion channel is never closed while actors are outstanding.
      throw new RunGroupStateError('Completion channel closed with actors still running');
    }
    return received.value;
  }

  private actorAt(index: number): Actor {
    const actor = this.actors[index];
    if (!actor) {
      throw new RunGroupStateError(`No actor registered at index ${index}`);
    }
    return actor;
  }
}
