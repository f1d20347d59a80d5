/**
 * Status Command
 *
 * Shows where a machine instance stands without running anything.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';
import type { Checkpoint } from '../../durable-core/checkpoint.js';
import type { CheckpointStoreError } from '../../ports/checkpoint-store.port.js';
import type { CheckpointPathSource } from '../../infra/local/checkpoint-location/index.js';
import { describeCheckpointSource } from '../../infra/local/checkpoint-location/index.js';

export interface StatusCommandDeps<S> {
  readonly location: string;
  readonly source: CheckpointPathSource;
  readonly load: () => ResultAsync<Checkpoint<S> | null, CheckpointStoreError>;
  readonly describe: (state: S) => string;
}

export async function executeStatusCommand<S>(deps: StatusCommandDeps<S>): Promise<CliResult> {
  const loaded = await deps.load();
  const where = [`Checkpoint: ${deps.location}`, `Source: ${describeCheckpointSource(deps.source)}`];

  if (loaded.isErr()) {
    return failure({
      message: `Cannot read checkpoint: ${loaded.error.message}`,
      details: [...where, `Code: ${loaded.error.code}`],
    });
  }

  const checkpoint = loaded.value;
  if (checkpoint === null) {
    return success({ message: 'Nothing to resume', details: where });
  }

  const step = deps.describe(checkpoint.state);
  if (checkpoint.error !== null) {
    return success({
      message: `Stopped at step ${step} after a failure`,
      details: where,
      warnings: [checkpoint.error],
      suggestions: ['Rerun with --drop-error once the cause is fixed'],
    });
  }

  return success({
    message: `Will resume at step ${step}`,
    details: where,
  });
}
