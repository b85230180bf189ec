/**
 * Whether the process may bind real OS signal handlers.
 * Discriminated union instead of a boolean flag.
 */
export type ProcessLifecyclePolicy =
  | { kind: 'install_signal_handlers' }
  | { kind: 'no_signal_handlers' };
