import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';

export class TerminationRequested extends Error {
  constructor(readonly exitCode: ExitCode) {
    super(`process termination requested: ${exitCode.kind}`);
    this.name = 'TerminationRequested';
  }
}

/**
 * Test adapter: throws instead of exiting, carrying the requested code.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  readonly requested: ExitCode[] = [];

  terminate(code: ExitCode): never {
    this.requested.push(code);
    throw new TerminationRequested(code);
  }
}
