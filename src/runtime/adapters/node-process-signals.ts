import type { ProcessSignals, ShutdownSignal, Unsubscribe } from '../ports/process-signals.js';

/**
 * Node.js adapter for ProcessSignals.
 * Each subscription owns its own listener, so unsubscribing never touches handlers
 * installed by other code.
 */
export class NodeProcessSignals implements ProcessSignals {
  on(signal: ShutdownSignal, handler: (signal: ShutdownSignal) => void): Unsubscribe {
    const listener = (): void => handler(signal);
    process.on(signal, listener);
    return () => {
      process.off(signal, listener);
    };
  }
}
