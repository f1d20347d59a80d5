/**
 * Port for terminating the current process.
 * Only composition roots (the CLI entrypoint) may use it.
 *
 * 0 success, 1 run failure, 2 misuse (bad configuration or API misuse).
 */
export type ExitStatus = 0 | 1 | 2;

export interface ProcessTerminator {
  terminate(status: ExitStatus): never;
}
