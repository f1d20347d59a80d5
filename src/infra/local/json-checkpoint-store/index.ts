import type { ResultAsync } from 'neverthrow';
import { okAsync, errAsync } from 'neverthrow';
import type { z } from 'zod';
import type { FileSystemPort, FsError } from '../../../ports/fs.port.js';
import type { CheckpointStoreError, CheckpointStorePort } from '../../../ports/checkpoint-store.port.js';
import type { Checkpoint } from '../../../durable-core/checkpoint.js';
import { decodeCheckpoint } from '../../../durable-core/checkpoint.js';
import type { CheckpointPath } from '../checkpoint-location/index.js';

function toIoError(e: FsError): CheckpointStoreError {
  return { code: 'CHECKPOINT_STORE_IO_ERROR', message: e.message };
}

/**
 * Checkpoint store backed by a single pretty-printed JSON file.
 *
 * Saves go through `FileSystemPort.writeFileAtomic`, so a crash mid-save
 * leaves either the previous record or the new one, never a torn file.
 */
export class JsonFileCheckpointStore<S> implements CheckpointStorePort<S> {
  constructor(
    private readonly filePath: CheckpointPath,
    private readonly stateSchema: z.ZodType<S, z.ZodTypeDef, unknown>,
    private readonly fs: FileSystemPort
  ) {}

  get location(): string {
    return this.filePath;
  }

  load(): ResultAsync<Checkpoint<S> | null, CheckpointStoreError> {
    return this.fs
      .readFileUtf8(this.filePath)
      .andThen((raw) => this.parse(raw))
      .orElse((e: FsError | CheckpointStoreError) => {
        if (e.code === 'FS_NOT_FOUND') return okAsync(null);
        if (e.code === 'FS_IO_ERROR' || e.code === 'FS_PERMISSION_DENIED') {
          return errAsync(toIoError(e));
        }
        return errAsync(e);
      });
  }

  save(checkpoint: Checkpoint<S>): ResultAsync<void, CheckpointStoreError> {
    let text: string;
    try {
      text = `${JSON.stringify(checkpoint, null, 2)}\n`;
    } catch (e) {
      return errAsync({
        code: 'CHECKPOINT_STORE_ENCODE_ERROR',
        message: `Cannot encode checkpoint for ${this.filePath}: ${e instanceof Error ? e.message : String(e)}`,
      } as const);
    }

    return this.fs
      .writeFileAtomic(this.filePath, new TextEncoder().encode(text))
      .mapErr(toIoError);
  }

  /**
   * Removes the record. A record that is already gone counts as clean: a
   * machine whose first step completes never wrote one.
   */
  clean(): ResultAsync<void, CheckpointStoreError> {
    return this.fs
      .unlink(this.filePath)
      .orElse((e) => (e.code === 'FS_NOT_FOUND' ? okAsync(undefined) : errAsync(e)))
      .mapErr(toIoError);
  }

  private parse(raw: string): ResultAsync<Checkpoint<S>, CheckpointStoreError> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return errAsync({
        code: 'CHECKPOINT_STORE_CORRUPTION_DETECTED',
        message: `Invalid JSON in checkpoint file: ${this.filePath}`,
      } as const);
    }

    const decoded = decodeCheckpoint(this.stateSchema, parsed);
    if (decoded.isErr()) {
      return errAsync({
        code: 'CHECKPOINT_STORE_CORRUPTION_DETECTED',
        message: `Invalid checkpoint file ${this.filePath}: ${decoded.error}`,
      } as const);
    }

    return okAsync(decoded.value);
  }
}
