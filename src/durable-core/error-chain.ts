import { safeToString } from '../errors/formatter.js';

/**
 * Render an error with its `cause` chain:
 *
 * ```
 * can't write file `out/report.csv`
 * Caused by:
 * 	EACCES: permission denied
 * ```
 *
 * Causes are listed in order, one per line, tab-indented. The walk stops at a
 * missing cause or a cycle.
 */
export function formatErrorChain(error: Error): string {
  const causes: string[] = [];
  const seen = new Set<unknown>([error]);
  let current: unknown = error.cause;

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    causes.push(current instanceof Error ? current.message : safeToString(current));
    current = current instanceof Error ? current.cause : undefined;
  }

  if (causes.length === 0) return error.message;
  return [error.message, 'Caused by:', ...causes.map((c) => `\t${c}`)].join('\n');
}

/**
 * Normalize anything a step threw into an `Error`.
 */
export function toError(thrown: unknown): Error {
  return thrown instanceof Error ? thrown : new Error(safeToString(thrown));
}
