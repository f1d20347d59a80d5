/**
 * Property-based tests for the engine's persistence laws using fast-check.
 *
 * - Every state variant survives the snapshot round trip unchanged
 * - A run of n steps writes exactly n checkpoints and cleans once
 * - A failure at any step leaves that step's pre-attempt state on record
 */
import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';

import { decodeState, encodeState } from '../../../src/durable-core/state-codec.js';
import { ResumableEngine } from '../../../src/durable-core/engine.js';
import type { CoinTossState } from '../../../src/machines/coin-toss/machine.js';
import { CoinTossStateSchema } from '../../../src/machines/coin-toss/machine.js';
import { InMemoryCheckpointStore } from '../../fakes/index.js';
import type { Counter } from './counter-machine.js';
import { COUNTER_START, CounterMachine, CounterSchema, faultsAt } from './counter-machine.js';

const arbCoinTossState: fc.Arbitrary<CoinTossState> = fc.oneof(
  fc.constant({ kind: 'first_toss' as const }),
  fc.record({
    kind: fc.constant('second_toss' as const),
    firstCoin: fc.constantFrom('heads' as const, 'tails' as const),
  })
);

const arbCounter: fc.Arbitrary<Counter> = fc.record({
  kind: fc.constant('count' as const),
  n: fc.integer({ min: -1000, max: 1000 }),
  log: fc.array(fc.string(), { maxLength: 5 }),
});

describe('Property-based: resumable engine', () => {
  it('encode → decode reproduces every coin-toss state', () => {
    fc.assert(
      fc.property(arbCoinTossState, (state) => {
        const encoded = encodeState(state)._unsafeUnwrap();
        expect(decodeState(CoinTossStateSchema, encoded)._unsafeUnwrap()).toEqual(state);
      })
    );
  });

  it('encode → decode reproduces every counter state', () => {
    fc.assert(
      fc.property(arbCounter, (state) => {
        const encoded = encodeState(state)._unsafeUnwrap();
        expect(decodeState(CounterSchema, encoded)._unsafeUnwrap()).toEqual(state);
      })
    );
  });

  it('writes one checkpoint per step and cleans once', async () => {
    await fc.assert(
      fc.asyncProperty(fc.integer({ min: 0, max: 12 }), async (limit) => {
        const store = new InMemoryCheckpointStore<Counter>();
        const engine = new ResumableEngine<Counter>({
          machine: new CounterMachine(limit),
          store,
          initialState: COUNTER_START,
        });

        expect((await engine.run()).isOk()).toBe(true);
        expect(store.count('save')).toBe(limit);
        expect(store.count('clean')).toBe(1);
      }),
      { numRuns: 30 }
    );
  });

  it('records the pre-attempt state of whichever step fails', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 0, max: 8 }).chain((limit) => fc.tuple(fc.constant(limit), fc.integer({ min: 0, max: limit }))),
        async ([limit, failAt]) => {
          const store = new InMemoryCheckpointStore<Counter>();
          const machine = new CounterMachine(limit, faultsAt([[failAt, { kind: 'err', error: new Error(`failed at ${failAt}`) }]]));
          const engine = new ResumableEngine<Counter>({ machine, store, initialState: COUNTER_START });

          const result = await engine.run();

          expect(result._unsafeUnwrapErr().code).toBe('ENGINE_STEP_FAILED');
          expect(store.current).toEqual({
            state: {
              kind: 'count',
              n: failAt,
              log: Array.from({ length: failAt }, (_, i) => `visited ${i}`),
            },
            error: `failed at ${failAt}`,
          });
        }
      ),
      { numRuns: 30 }
    );
  });
});
