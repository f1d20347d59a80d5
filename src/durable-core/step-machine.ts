import type { ResultAsync } from 'neverthrow';
import type { z } from 'zod';

/**
 * What a single step produces: the next state, `null` when the machine is
 * done, or a domain failure.
 */
export type TransitionResult<S> = ResultAsync<S | null, Error>;

/**
 * A closed set of step states plus the logic that moves between them.
 *
 * `S` is expected to be a discriminated union (a `kind` tag per variant) and
 * `transition` an exhaustive `switch` over it. Every variant must survive a
 * round trip through `stateSchema` unchanged: the engine hands `transition`
 * a decoded copy and rolls back to a decoded snapshot on failure.
 *
 * @example
 * ```typescript
 * type Upload = { kind: 'prepare' } | { kind: 'send'; file: string };
 *
 * const uploader: StepMachine<Upload> = {
 *   stateSchema: UploadSchema,
 *   transition(state) {
 *     switch (state.kind) {
 *       case 'prepare':
 *         return okAsync({ kind: 'send', file: 'report.csv' });
 *       case 'send':
 *         return send(state.file).map(() => null);
 *     }
 *   },
 * };
 * ```
 */
export interface StepMachine<S> {
  /** Self-describing codec: must pick the right variant from the encoded value alone. */
  readonly stateSchema: z.ZodType<S, z.ZodTypeDef, unknown>;

  /**
   * Performs the step. Called at most once per attempt; a throw or a rejected
   * promise counts as a failure.
   */
  transition(state: S): TransitionResult<S>;

  /** Short human rendering used in logs and in the pending-error message. */
  describe?(state: S): string;
}

export function describeState<S>(machine: StepMachine<S>, state: S): string {
  if (machine.describe) return machine.describe(state);
  try {
    return JSON.stringify(state) ?? String(state);
  } catch {
    return String(state);
  }
}
