import type { ResultAsync } from 'neverthrow';
import type { Checkpoint } from '../durable-core/checkpoint.js';

export type CheckpointStoreError =
  | { readonly code: 'CHECKPOINT_STORE_IO_ERROR'; readonly message: string }
  | { readonly code: 'CHECKPOINT_STORE_CORRUPTION_DETECTED'; readonly message: string }
  | { readonly code: 'CHECKPOINT_STORE_ENCODE_ERROR'; readonly message: string };

/**
 * Port: durable home of a single checkpoint record.
 *
 * One store location = one logical machine instance. The location is fixed for
 * the lifetime of the store and is assumed to have a single writer; no locking
 * is provided.
 *
 * Guarantees:
 * - load() returns null when there is no record (no prior run, or the prior run completed)
 * - save() replaces the whole record
 * - clean() removes the record; an absent record counts as already clean
 * - errors are returned as data, never thrown
 */
export interface CheckpointStorePort<S> {
  /** Path or key of the record, for diagnostics. */
  readonly location: string;

  load(): ResultAsync<Checkpoint<S> | null, CheckpointStoreError>;
  save(checkpoint: Checkpoint<S>): ResultAsync<void, CheckpointStoreError>;
  clean(): ResultAsync<void, CheckpointStoreError>;
}
