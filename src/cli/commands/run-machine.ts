/**
 * Run Command
 *
 * Restores a machine from its checkpoint, optionally acknowledges a previous
 * failure, and runs it to completion. Pure function over injected deps.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure, misuse } from '../types/cli-result.js';
import type { EngineError } from '../../durable-core/engine-error.js';
import { engineErrorKind, formatEngineError } from '../../durable-core/engine-error.js';
import { assertNever } from '../../runtime/assert-never.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

/** The part of ResumableEngine a run needs. */
export interface RunnableEngine {
  restore(): ResultAsync<unknown, EngineError>;
  dropError(): ResultAsync<void, EngineError>;
  run(): ResultAsync<void, EngineError>;
}

export interface RunCommandDeps {
  readonly engine: RunnableEngine;
  /** Checkpoint location, shown to the operator. */
  readonly location: string;
  /** Message printed when the machine completes. */
  readonly completedMessage: string;
}

export interface RunCommandOptions {
  /** Acknowledge the recorded failure before running. */
  readonly dropError?: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export async function executeRunCommand(
  deps: RunCommandDeps,
  options: RunCommandOptions = {}
): Promise<CliResult> {
  const restored = await deps.engine.restore();
  if (restored.isErr()) return toCliFailure(restored.error, deps.location);

  if (options.dropError) {
    const dropped = await deps.engine.dropError();
    if (dropped.isErr()) return toCliFailure(dropped.error, deps.location);
  }

  const ran = await deps.engine.run();
  if (ran.isErr()) return toCliFailure(ran.error, deps.location);

  return success({ message: deps.completedMessage });
}

function toCliFailure(error: EngineError, location: string): CliResult {
  const kind = engineErrorKind(error);
  switch (kind) {
    case 'step_failure':
      return failure({
        message: formatEngineError(error),
        details: [`Checkpoint: ${location}`],
        suggestions: ['Fix what made the step fail, then rerun with --drop-error to retry it'],
      });
    case 'persistence':
      return failure({
        message: 'Checkpoint persistence failed',
        details: [formatEngineError(error)],
        suggestions: [`Check that ${location} is readable and writable`],
      });
    case 'misuse':
      return misuse({ message: formatEngineError(error) });
    default:
      return assertNever(kind);
  }
}
