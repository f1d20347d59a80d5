import type { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';

export type StateCodecError =
  | { readonly code: 'STATE_ENCODE_FAILED'; readonly message: string }
  | { readonly code: 'STATE_DECODE_FAILED'; readonly message: string };

/**
 * Encode a state into its snapshot form (JSON text).
 */
export function encodeState<S>(state: S): Result<string, StateCodecError> {
  let encoded: unknown;
  try {
    encoded = JSON.stringify(state);
  } catch (e) {
    return err({
      code: 'STATE_ENCODE_FAILED',
      message: `State is not JSON-encodable: ${e instanceof Error ? e.message : String(e)}`,
    } as const);
  }
  if (typeof encoded !== 'string') {
    return err({ code: 'STATE_ENCODE_FAILED', message: 'State is not JSON-encodable: encoded to nothing' } as const);
  }
  return ok(encoded);
}

/**
 * Decode a snapshot back into a state value through the machine's schema.
 */
export function decodeState<S>(
  schema: z.ZodType<S, z.ZodTypeDef, unknown>,
  snapshot: string
): Result<S, StateCodecError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(snapshot);
  } catch {
    return err({ code: 'STATE_DECODE_FAILED', message: 'State snapshot is not valid JSON' } as const);
  }

  const validated = schema.safeParse(parsed);
  if (!validated.success) {
    return err({ code: 'STATE_DECODE_FAILED', message: `State snapshot rejected by schema: ${formatZodIssues(validated.error)}` } as const);
  }
  return ok(validated.data);
}

export function formatZodIssues(error: z.ZodError, prefix?: string): string {
  return error.issues
    .map((issue) => {
      const segments = prefix ? [prefix, ...issue.path] : issue.path;
      const path = segments.length ? segments.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}
