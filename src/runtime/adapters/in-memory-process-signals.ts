import type { ProcessSignals, ShutdownSignal, Unsubscribe } from '../ports/process-signals.js';

/**
 * In-process signal source.
 * Used in test mode so nothing binds real OS handlers; tests call `emit` to deliver a signal.
 */
export class InMemoryProcessSignals implements ProcessSignals {
  private readonly listeners = new Map<ShutdownSignal, Set<(signal: ShutdownSignal) => void>>();

  on(signal: ShutdownSignal, handler: (signal: ShutdownSignal) => void): Unsubscribe {
    let set = this.listeners.get(signal);
    if (!set) {
      set = new Set();
      this.listeners.set(signal, set);
    }
    const registered = set;
    // Wrap so the same handler can be subscribed twice and removed independently.
    const entry = (s: ShutdownSignal): void => handler(s);
    registered.add(entry);
    return () => {
      registered.delete(entry);
    };
  }

  /**
   * Deliver a signal to current subscribers.
   * Returns false when nobody was listening (the signal is lost, as with a real process
   * that has not subscribed yet).
   */
  emit(signal: ShutdownSignal): boolean {
    const set = this.listeners.get(signal);
    if (!set || set.size === 0) return false;
    for (const listener of [...set]) {
      listener(signal);
    }
    return true;
  }

  listenerCount(signal: ShutdownSignal): number {
    return this.listeners.get(signal)?.size ?? 0;
  }
}
