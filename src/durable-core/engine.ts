import type { Result } from 'neverthrow';
import { ResultAsync, ok, err, errAsync } from 'neverthrow';
import type { Logger } from '../core/logging/types.js';
import { createBootstrapLogger } from '../core/logging/bootstrap.js';
import type { CheckpointStoreError, CheckpointStorePort } from '../ports/checkpoint-store.port.js';
import type { Checkpoint } from './checkpoint.js';
import type { StepMachine } from './step-machine.js';
import { describeState } from './step-machine.js';
import type { StateCodecError } from './state-codec.js';
import { decodeState, encodeState } from './state-codec.js';
import type { EngineError } from './engine-error.js';
import { formatErrorChain, toError } from './error-chain.js';

/**
 * fresh → restored → running → completed | failed
 *
 * A pending error is not a phase of its own: it can be present while
 * `restored` (loaded from a failed run) or `failed` (this process failed).
 */
export type EnginePhase = 'fresh' | 'restored' | 'running' | 'completed' | 'failed';

export interface ResumableEngineOptions<S> {
  readonly machine: StepMachine<S>;
  readonly store: CheckpointStorePort<S>;
  readonly initialState: S;
  readonly logger?: Logger;
}

/**
 * Runs a step machine to completion, persisting a checkpoint after every step.
 *
 * Protocol:
 * 1. construct with the initial state (no I/O)
 * 2. restore() to pick up where a previous process stopped
 * 3. dropError() once the operator has fixed what made the last attempt fail
 * 4. run()
 *
 * A failed step is rolled back to its pre-attempt snapshot and recorded in the
 * checkpoint. Further run() calls refuse to start until dropError() is called,
 * so a step with external side effects is never retried unattended.
 */
export class ResumableEngine<S> {
  private readonly machine: StepMachine<S>;
  private readonly store: CheckpointStorePort<S>;
  private readonly logger: Logger;
  private current: Checkpoint<S>;
  private _phase: EnginePhase = 'fresh';

  constructor(options: ResumableEngineOptions<S>) {
    this.machine = options.machine;
    this.store = options.store;
    this.logger = options.logger ?? createBootstrapLogger('ResumableEngine');
    this.current = { state: options.initialState, error: null };
  }

  get phase(): EnginePhase {
    return this._phase;
  }

  get checkpoint(): Checkpoint<S> {
    return this.current;
  }

  get hasPendingError(): boolean {
    return this.current.error !== null;
  }

  /**
   * Replace the in-memory checkpoint (state and pending error) with the stored
   * one, if any. Leaves everything untouched when the store is empty.
   */
  restore(): ResultAsync<Checkpoint<S>, EngineError> {
    if (this._phase === 'running') return errAsync(misuse('restore() called while a run is in progress'));

    return this.store
      .load()
      .mapErr((e) => this.storeFailed(e))
      .map((loaded) => {
        if (loaded !== null) {
          this.current = loaded;
          this.logger.info(
            { step: describeState(this.machine, loaded.state), pendingError: loaded.error, location: this.store.location },
            'Restored checkpoint'
          );
        } else {
          this.logger.debug({ location: this.store.location }, 'No checkpoint to restore');
        }
        if (this._phase === 'fresh') this._phase = 'restored';
        return this.current;
      });
  }

  /**
   * Acknowledge a previous failure: clear the pending error and persist the
   * cleared checkpoint, so the next run() re-attempts the failed step.
   */
  dropError(): ResultAsync<void, EngineError> {
    if (this._phase === 'running') return errAsync(misuse('dropError() called while a run is in progress'));
    if (this._phase === 'completed') return errAsync(misuse('dropError() called on a completed machine'));

    const previous = this.current.error;
    this.current = { state: this.current.state, error: null };

    return this.store
      .save(this.current)
      .mapErr((e) => this.storeFailed(e))
      .map(() => {
        if (previous !== null) {
          this.logger.info({ step: describeState(this.machine, this.current.state), previousError: previous }, 'Dropped pending error');
        }
      });
  }

  /**
   * Run steps until the machine completes or a step fails.
   *
   * Every step produces exactly one store write; completion produces exactly
   * one store clean. Nothing is retried.
   */
  run(): ResultAsync<void, EngineError> {
    if (this._phase === 'running') return errAsync(misuse('run() called while a run is in progress'));
    if (this._phase === 'completed') return errAsync(misuse('run() called on a completed machine'));

    const pending = this.current.error;
    if (pending !== null) {
      const step = describeState(this.machine, this.current.state);
      this.logger.warn({ step, pendingError: pending }, 'Refusing to run: previous run failed');
      return errAsync({
        code: 'ENGINE_PREVIOUS_RUN_FAILED',
        message: `Previous run resulted in an error: ${pending} on step: ${step}`,
        previousError: pending,
        step,
      } as const);
    }

    this._phase = 'running';
    return new ResultAsync(this.loop());
  }

  private async loop(): Promise<Result<void, EngineError>> {
    for (;;) {
      const step = describeState(this.machine, this.current.state);
      this.logger.info({ step }, 'Running step');

      const snapshot = encodeState(this.current.state);
      if (snapshot.isErr()) return this.abort(codecFailed(snapshot.error));

      const working = decodeState(this.machine.stateSchema, snapshot.value);
      if (working.isErr()) return this.abort(codecFailed(working.error));

      const outcome = await this.attempt(working.value);
      if (outcome.isErr()) return this.recordStepFailure(snapshot.value, outcome.error);

      const next = outcome.value;
      if (next === null) {
        const cleaned = await this.store.clean();
        if (cleaned.isErr()) return this.abort(this.storeFailed(cleaned.error));

        this._phase = 'completed';
        this.logger.info({ step }, 'Finished successfully');
        return ok(undefined);
      }

      this.current = { state: next, error: null };
      const saved = await this.store.save(this.current);
      if (saved.isErr()) return this.abort(this.storeFailed(saved.error));
    }
  }

  private async attempt(state: S): Promise<Result<S | null, Error>> {
    try {
      return await this.machine.transition(state);
    } catch (thrown) {
      return err(toError(thrown));
    }
  }

  private async recordStepFailure(snapshot: string, failure: Error): Promise<Result<void, EngineError>> {
    const rolledBack = decodeState(this.machine.stateSchema, snapshot);
    if (rolledBack.isErr()) return this.abort(codecFailed(rolledBack.error));

    const message = formatErrorChain(failure);
    const step = describeState(this.machine, rolledBack.value);
    this.current = { state: rolledBack.value, error: message };
    this.logger.warn({ step, err: failure }, 'Step failed');

    const saved = await this.store.save(this.current);
    if (saved.isErr()) return this.abort(this.storeFailed(saved.error));

    this._phase = 'failed';
    return err({ code: 'ENGINE_STEP_FAILED', message, step } as const);
  }

  private abort(error: EngineError): Result<void, EngineError> {
    this._phase = 'failed';
    this.logger.error({ code: error.code, detail: error.message }, 'Run aborted');
    return err(error);
  }

  private storeFailed(cause: CheckpointStoreError): EngineError {
    return {
      code: 'ENGINE_STORE_FAILED',
      message: `Checkpoint store failed at ${this.store.location}: ${cause.message}`,
      location: this.store.location,
      cause,
    };
  }
}

function codecFailed(cause: StateCodecError): EngineError {
  return { code: 'ENGINE_STATE_CODEC_FAILED', message: `State snapshot failed: ${cause.message}`, cause };
}

function misuse(message: string): EngineError {
  return { code: 'ENGINE_MISUSE', message };
}
