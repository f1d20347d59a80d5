import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { formatZodIssues } from './state-codec.js';

/**
 * The durable record of where a machine instance stands.
 *
 * Invariant: `error` is non-null only after a failed transition and before it
 * is acknowledged; while it is set, `state` is the state that was current
 * before the failing attempt.
 */
export interface Checkpoint<S> {
  readonly state: S;
  readonly error: string | null;
}

// A record written without an `error` key has no pending error.
const CheckpointEnvelopeSchema = z.object({
  state: z.unknown(),
  error: z.string().nullable().default(null),
});

/**
 * Decode a parsed JSON value into a checkpoint, validating the state against
 * the machine's own schema. Returns a human-readable reason on mismatch.
 */
export function decodeCheckpoint<S>(
  stateSchema: z.ZodType<S, z.ZodTypeDef, unknown>,
  raw: unknown
): Result<Checkpoint<S>, string> {
  const envelope = CheckpointEnvelopeSchema.safeParse(raw);
  if (!envelope.success) return err(formatZodIssues(envelope.error));

  const state = stateSchema.safeParse(envelope.data.state);
  if (!state.success) return err(formatZodIssues(state.error, 'state'));

  return ok({ state: state.data, error: envelope.data.error });
}
