import * as fs from 'fs/promises';
import * as path from 'path';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA, errAsync } from 'neverthrow';
import type { FileSystemPort, FsError } from '../../../ports/fs.port.js';

function errnoOf(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  return typeof e.code === 'string' ? e.code : undefined;
}

function toFsError(target: string): (e: unknown) => FsError {
  return (e) => {
    switch (errnoOf(e)) {
      case 'ENOENT':
        return { code: 'FS_NOT_FOUND', message: `Not found: ${target}` };
      case 'EACCES':
      case 'EPERM':
        return { code: 'FS_PERMISSION_DENIED', message: `Permission denied: ${target}` };
      default:
        return { code: 'FS_IO_ERROR', message: `FS error at ${target}: ${e instanceof Error ? e.message : String(e)}` };
    }
  };
}

/** Write, flush and close; the handle is closed on every path. */
async function writeAndFlush(filePath: string, bytes: Uint8Array): Promise<void> {
  const handle = await fs.open(filePath, 'w', 0o600);
  try {
    await handle.writeFile(bytes);
    await handle.sync();
  } finally {
    await handle.close();
  }
}

// Some platforms cannot fsync a directory handle; the rename is then as durable as it gets.
const DIR_SYNC_UNSUPPORTED = new Set(['EINVAL', 'ENOTSUP', 'EISDIR']);

async function flushDirectory(dirPath: string): Promise<void> {
  const handle = await fs.open(dirPath, 'r');
  try {
    await handle.sync();
  } catch (e) {
    const errno = errnoOf(e);
    if (errno === undefined || !DIR_SYNC_UNSUPPORTED.has(errno)) throw e;
  } finally {
    await handle.close();
  }
}

/**
 * Node adapter for checkpoint files.
 *
 * writeFileAtomic: mkdir -p, write `<file>.tmp` (0600) + fsync, rename over
 * `<file>`, fsync the directory. A failure before the rename removes the temp
 * file and reports the original error.
 */
export class NodeFileSystem implements FileSystemPort {
  readFileUtf8(filePath: string): ResultAsync<string, FsError> {
    return RA.fromPromise(fs.readFile(filePath, 'utf8'), toFsError(filePath));
  }

  writeFileAtomic(filePath: string, bytes: Uint8Array): ResultAsync<void, FsError> {
    const dir = path.dirname(filePath);
    const tmpPath = `${filePath}.tmp`;

    return RA.fromPromise(fs.mkdir(dir, { recursive: true }), toFsError(dir))
      .andThen(() => RA.fromPromise(writeAndFlush(tmpPath, bytes), toFsError(tmpPath)))
      .andThen(() => RA.fromPromise(fs.rename(tmpPath, filePath), toFsError(filePath)))
      .orElse((e) => RA.fromPromise(fs.rm(tmpPath, { force: true }), () => e).andThen(() => errAsync(e)))
      .andThen(() => RA.fromPromise(flushDirectory(dir), toFsError(dir)));
  }

  unlink(filePath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.unlink(filePath), toFsError(filePath));
  }
}
