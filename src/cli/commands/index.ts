/**
 * CLI Commands - Public API
 */

export { executeRunCommand } from './run-machine.js';
export type { RunnableEngine, RunCommandDeps, RunCommandOptions } from './run-machine.js';

export { executeStatusCommand } from './status.js';
export type { StatusCommandDeps } from './status.js';
