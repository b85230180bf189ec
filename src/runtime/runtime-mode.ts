/**
 * Runtime mode of the current process.
 * Decided once by the composition root and injected; services never sniff env vars.
 */
export type RuntimeMode =
  | { kind: 'production' }
  | { kind: 'test' }
  | { kind: 'cli' };
