import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Raised instead of exiting when running under test.
 * Carries the exit code so tests can assert on it.
 */
export class TerminationRequested extends Error {
  constructor(readonly code: ExitCode) {
    super(`[ProcessTerminator] terminate(${code.kind})`);
    this.name = 'TerminationRequested';
  }
}

/**
 * Test adapter: never exits the process.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    throw new TerminationRequested(code);
  }
}
