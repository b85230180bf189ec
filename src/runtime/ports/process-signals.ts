/**
 * Port for subscribing to process signals.
 * Abstracts Node's `process.on` so signal-driven actors can be tested with a fake source.
 */
export type ShutdownSignal = Extract<NodeJS.Signals, 'SIGINT' | 'SIGTERM' | 'SIGHUP'>;

export type Unsubscribe = () => void;

export interface ProcessSignals {
  on(signal: ShutdownSignal, handler: (signal: ShutdownSignal) => void): Unsubscribe;
}
