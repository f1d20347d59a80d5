import type { ExitStatus, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Test adapter: never exits the process, so an accidental termination fails the test instead.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(status: ExitStatus): never {
    throw new Error(`[ProcessTerminator] terminate(${status})`);
  }
}
