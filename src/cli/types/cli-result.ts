/**
 * What a command hands back to the composition root: text to show and, on
 * failure, the exit status to end with.
 */

export interface CliOutput {
  readonly message: string;
  readonly details?: readonly string[];
  /** Rendered under "Pending:". */
  readonly warnings?: readonly string[];
  /** Rendered under "Next:". */
  readonly suggestions?: readonly string[];
}

export type CliResult =
  | { readonly kind: 'success'; readonly output: CliOutput }
  | { readonly kind: 'failure'; readonly status: 1 | 2; readonly output: CliOutput };

export function success(output: CliOutput): CliResult {
  return { kind: 'success', output };
}

/** The run itself failed (exit status 1). */
export function failure(output: CliOutput): CliResult {
  return { kind: 'failure', status: 1, output };
}

/** Bad configuration or a call the engine rejects (exit status 2). */
export function misuse(output: CliOutput): CliResult {
  return { kind: 'failure', status: 2, output };
}
