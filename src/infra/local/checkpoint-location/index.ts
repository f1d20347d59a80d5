import * as path from 'path';
import type { Brand } from '../../../runtime/brand.js';
import { assertNever } from '../../../runtime/assert-never.js';

/** Absolute path of a checkpoint record; one path = one machine instance. */
export type CheckpointPath = Brand<string, 'CheckpointPath'>;

/** Where a checkpoint path came from. */
export type CheckpointPathSource =
  | { readonly kind: 'option' }
  | { readonly kind: 'env' }
  | { readonly kind: 'derived'; readonly programPath: string };

export interface ResolvedCheckpointPath {
  readonly path: CheckpointPath;
  readonly source: CheckpointPathSource;
}

export function describeCheckpointSource(source: CheckpointPathSource): string {
  switch (source.kind) {
    case 'option':
      return 'set by --checkpoint';
    case 'env':
      return 'set by RESUMABLE_CHECKPOINT_PATH';
    case 'derived':
      return `derived from program path ${source.programPath}`;
    default:
      return assertNever(source);
  }
}

/**
 * Default location rule: the running program's path with its extension
 * replaced by `.json`, in the same directory.
 *
 *   /opt/bin/myprog   → /opt/bin/myprog.json
 *   /srv/dist/cli.js  → /srv/dist/cli.json
 */
export function deriveDefaultCheckpointPath(programPath: string): CheckpointPath {
  const resolved = path.resolve(programPath);
  const parsed = path.parse(resolved);
  return path.join(parsed.dir, `${parsed.name}.json`) as CheckpointPath;
}

/**
 * Path of the program the process is running: the entry script when there is
 * one, otherwise the executable itself.
 */
export function currentProgramPath(argv: readonly string[], execPath: string): string {
  const script = argv[1];
  return script !== undefined && script.length > 0 ? script : execPath;
}

export function asCheckpointPath(value: string): CheckpointPath {
  return path.resolve(value) as CheckpointPath;
}
