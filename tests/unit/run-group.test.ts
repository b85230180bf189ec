import { describe, it, expect } from 'vitest';
import { err, ok } from 'neverthrow';
import { RunGroup, RunGroupStateError } from '../../src/runtime/run-group.js';
import type { Actor } from '../../src/runtime/actor.js';
import { Err } from '../../src/errors/factories.js';
import { ScriptedActor } from '../helpers/scripted-actor.js';
import { createCapturingLogger } from '../helpers/log-capture.js';

function flushMicrotasks(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('RunGroup', () => {
  it('returns an ok outcome without an actor for an empty group', async () => {
    const group = new RunGroup(createCapturingLogger().logger);

    const outcome = await group.run();

    expect(outcome.actor).toBeNull();
    expect(outcome.index).toBe(-1);
    expect(outcome.result.isOk()).toBe(true);
  });

  it('starts every actor before observing a completion', async () => {
    const journal: string[] = [];
    const first = new ScriptedActor('first', { journal });
    const second = new ScriptedActor('second', { journal });
    first.complete(ok(undefined));

    const group = new RunGroup(createCapturingLogger().logger).add(first).add(second);
    const outcome = await group.run();

    expect(outcome.actor).toBe('first');
    expect(journal.slice(0, 2)).toEqual(['run:first', 'run:second']);
    expect(second.started).toBe(true);
  });

  it('interrupts every actor in registration order, the finished one included', async () => {
    const journal: string[] = [];
    const a = new ScriptedActor('a', { journal });
    const b = new ScriptedActor('b', { journal });
    const c = new ScriptedActor('c', { journal });
    const failure = Err.shutdownFailed('b', new Error('close failed'));

    const group = new RunGroup(createCapturingLogger().logger).add(a).add(b).add(c);
    const running = group.run();
    b.complete(err(failure));
    const outcome = await running;

    expect(outcome).toEqual({ actor: 'b', index: 1, result: err(failure) });
    expect(journal).toEqual(['run:a', 'run:b', 'run:c', 'interrupt:a', 'interrupt:b', 'interrupt:c']);
    for (const actor of [a, b, c]) {
      expect(actor.interrupts).toEqual([err(failure)]);
    }
  });

  it('waits for every actor to settle before resolving', async () => {
    const first = new ScriptedActor('first');
    const stubborn = new ScriptedActor('stubborn', { onInterrupt: null });

    const group = new RunGroup(createCapturingLogger().logger).add(first).add(stubborn);
    let resolved = false;
    const running = group.run().then((outcome) => {
      resolved = true;
      return outcome;
    });

    first.complete(ok(undefined));
    await flushMicrotasks();
    expect(stubborn.interrupts).toHaveLength(1);
    expect(resolved).toBe(false);

    stubborn.complete(ok(undefined));
    const outcome = await running;
    expect(resolved).toBe(true);
    expect(outcome.actor).toBe('first');
  });

  it('keeps the first result and discards later errors', async () => {
    const server = new ScriptedActor('server', {
      onInterrupt: err(Err.shutdownFailed('server', new Error('late failure'))),
    });
    const watcher = new ScriptedActor('watcher');

    const group = new RunGroup(createCapturingLogger().logger).add(server).add(watcher);
    const running = group.run();
    watcher.complete(ok(undefined));
    const outcome = await running;

    expect(outcome.actor).toBe('watcher');
    expect(outcome.index).toBe(1);
    expect(outcome.result.isOk()).toBe(true);
  });

  it('reports the first error regardless of registration order', async () => {
    const listenError = Err.listenFailed(':8080', new Error('in use'));
    const watcher = new ScriptedActor('watcher');
    const server = new ScriptedActor('server');

    const group = new RunGroup(createCapturingLogger().logger).add(watcher).add(server);
    const running = group.run();
    server.complete(err(listenError));
    const outcome = await running;

    expect(outcome.actor).toBe('server');
    expect(outcome.result._unsafeUnwrapErr()).toBe(listenError);
    expect(watcher.interrupts).toEqual([err(listenError)]);
  });

  it('turns a rejected run into an ActorCrashed completion', async () => {
    const cause = new Error('kaput');
    const crashing: Actor = {
      name: 'crashing',
      run: async () => {
        throw cause;
      },
      interrupt: () => undefined,
    };
    const other = new ScriptedActor('other');

    const outcome = await new RunGroup(createCapturingLogger().logger).add(other).add(crashing).run();

    expect(outcome.actor).toBe('crashing');
    expect(outcome.result._unsafeUnwrapErr()).toEqual({
      _tag: 'ActorCrashed',
      actor: 'crashing',
      message: 'Actor crashing crashed',
      cause,
    });
    expect(other.interrupts).toHaveLength(1);
  });

  it('logs a throwing interrupt and still interrupts the remaining actors', async () => {
    const { logger, capture } = createCapturingLogger();
    const faulty = new ScriptedActor('faulty', { interruptThrows: new Error('interrupt exploded') });
    const healthy = new ScriptedActor('healthy');
    const trigger = new ScriptedActor('trigger');

    const group = new RunGroup(logger).add(faulty).add(healthy).add(trigger);
    const running = group.run();
    trigger.complete(ok(undefined));
    await flushMicrotasks();

    expect(healthy.interrupts).toHaveLength(1);
    expect(trigger.interrupts).toHaveLength(1);

    const errors = capture.withMessage('actor interrupt threw');
    expect(errors).toHaveLength(1);
    expect(errors[0]?.['actor']).toBe('faulty');

    faulty.complete(ok(undefined));
    const outcome = await running;
    expect(outcome.actor).toBe('trigger');
  });

  it('logs every late completion at debug level', async () => {
    const { logger, capture } = createCapturingLogger();
    const a = new ScriptedActor('a');
    const group = new RunGroup(logger).add(a).add(new ScriptedActor('b')).add(new ScriptedActor('c'));

    const running = group.run();
    a.complete(ok(undefined));
    await running;

    expect(capture.withMessage('first actor finished, interrupting group').map((line) => line['actor'])).toEqual(['a']);
    const late = capture.withMessage('actor finished after interrupt');
    expect(late.map((line) => line['actor'])).toEqual(['b', 'c']);
    expect(late.every((line) => line.level === 20)).toBe(true);
  });

  it('is single-use', async () => {
    const group = new RunGroup(createCapturingLogger().logger);
    await group.run();

    await expect(group.run()).rejects.toBeInstanceOf(RunGroupStateError);
    expect(() => group.add(new ScriptedActor('late'))).toThrow(RunGroupStateError);
  });
});
