/**
 * Port for terminating the current process.
 * Only composition roots and the exit coordinator may hold one.
 */
export type ExitCode =
  | { kind: 'success' }
  | { kind: 'failure' };

export interface ProcessTerminator {
  terminate(code: ExitCode): never;
}

export function toNumericExitCode(code: ExitCode): 0 | 1 {
  switch (code.kind) {
    case 'success':
      return 0;
    case 'failure':
      return 1;
  }
}
