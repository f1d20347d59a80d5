import type { ResultAsync } from 'neverthrow';

export type FsError =
  | { readonly code: 'FS_IO_ERROR'; readonly message: string }
  | { readonly code: 'FS_NOT_FOUND'; readonly message: string }
  | { readonly code: 'FS_PERMISSION_DENIED'; readonly message: string };

/**
 * Port: the filesystem operations a single-record file store needs.
 */
export interface FileSystemPort {
  readFileUtf8(filePath: string): ResultAsync<string, FsError>;

  /**
   * Replace `filePath` with `bytes` so that a crash leaves either the old
   * content or the new, never a mix.
   *
   * Guarantees:
   * - missing parent directories are created
   * - on success the content and the directory entry are durable
   * - on failure no temporary file is left behind and no handle stays open
   */
  writeFileAtomic(filePath: string, bytes: Uint8Array): ResultAsync<void, FsError>;

  unlink(filePath: string): ResultAsync<void, FsError>;
}
