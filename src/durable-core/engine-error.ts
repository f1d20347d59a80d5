import type { CheckpointStoreError } from '../ports/checkpoint-store.port.js';
import type { StateCodecError } from './state-codec.js';
import { assertNever } from '../runtime/assert-never.js';

export type EngineError =
  /** A transition failed; the failure is now recorded in the checkpoint. */
  | { readonly code: 'ENGINE_STEP_FAILED'; readonly message: string; readonly step: string }
  /** A recorded failure has not been acknowledged with dropError(). */
  | { readonly code: 'ENGINE_PREVIOUS_RUN_FAILED'; readonly message: string; readonly previousError: string; readonly step: string }
  | { readonly code: 'ENGINE_STORE_FAILED'; readonly message: string; readonly location: string; readonly cause: CheckpointStoreError }
  | { readonly code: 'ENGINE_STATE_CODEC_FAILED'; readonly message: string; readonly cause: StateCodecError }
  | { readonly code: 'ENGINE_MISUSE'; readonly message: string };

export type EngineErrorKind = 'step_failure' | 'persistence' | 'misuse';

/**
 * Step failures are sticky and user-facing; persistence failures mean the
 * durable record itself may be stale or missing.
 */
export function engineErrorKind(error: EngineError): EngineErrorKind {
  switch (error.code) {
    case 'ENGINE_STEP_FAILED':
    case 'ENGINE_PREVIOUS_RUN_FAILED':
      return 'step_failure';
    case 'ENGINE_STORE_FAILED':
    case 'ENGINE_STATE_CODEC_FAILED':
      return 'persistence';
    case 'ENGINE_MISUSE':
      return 'misuse';
    default:
      return assertNever(error);
  }
}

export function formatEngineError(error: EngineError): string {
  switch (error.code) {
    case 'ENGINE_STEP_FAILED':
    case 'ENGINE_PREVIOUS_RUN_FAILED':
    case 'ENGINE_MISUSE':
      return error.message;
    case 'ENGINE_STORE_FAILED':
      return `${error.message} [${error.cause.code}]`;
    case 'ENGINE_STATE_CODEC_FAILED':
      return `${error.message} [${error.cause.code}]`;
    default:
      return assertNever(error);
  }
}
