import type { ExitStatus, ProcessTerminator } from '../ports/process-terminator.js';

export class NodeProcessTerminator implements ProcessTerminator {
  terminate(status: ExitStatus): never {
    return process.exit(status);
  }
}
