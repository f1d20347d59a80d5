import { z } from 'zod';
import { okAsync, errAsync } from 'neverthrow';
import type { StepMachine, TransitionResult } from '../../durable-core/step-machine.js';
import type { RandomEntropyPort } from '../../ports/random-entropy.port.js';
import { assertNever } from '../../runtime/assert-never.js';
import { CoinSchema, coinLabel, tossCoin } from './coin.js';

export const CoinTossStateSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('first_toss') }),
  z.object({ kind: z.literal('second_toss'), firstCoin: CoinSchema }),
]);

export type CoinTossState = z.infer<typeof CoinTossStateSchema>;

export const COIN_TOSS_INITIAL_STATE: CoinTossState = { kind: 'first_toss' };

export const COINS_LANDED_DIFFERENTLY = 'Coins landed differently';

export interface CoinTossDeps {
  readonly entropy: RandomEntropyPort;
  /** Receives one human-readable line per event (toss results, match). */
  readonly report: (line: string) => void;
}

/**
 * Two coins must land on the same side.
 *
 * first_toss → second_toss(firstCoin) → done. When the second coin differs the
 * step fails; after the failure is acknowledged only the second coin is
 * tossed again, the first result having been checkpointed.
 */
export class CoinTossMachine implements StepMachine<CoinTossState> {
  readonly stateSchema = CoinTossStateSchema;

  constructor(private readonly deps: CoinTossDeps) {}

  transition(state: CoinTossState): TransitionResult<CoinTossState> {
    switch (state.kind) {
      case 'first_toss': {
        const firstCoin = tossCoin(this.deps.entropy);
        this.deps.report(`First coin: ${coinLabel(firstCoin)}`);
        const next: CoinTossState = { kind: 'second_toss', firstCoin };
        return okAsync(next);
      }
      case 'second_toss': {
        const secondCoin = tossCoin(this.deps.entropy);
        this.deps.report(`Second coin: ${coinLabel(secondCoin)}`);
        if (secondCoin !== state.firstCoin) return errAsync(new Error(COINS_LANDED_DIFFERENTLY));
        this.deps.report('Coins match');
        return okAsync(null);
      }
      default:
        return assertNever(state);
    }
  }

  describe(state: CoinTossState): string {
    switch (state.kind) {
      case 'first_toss':
        return 'FirstToss';
      case 'second_toss':
        return `SecondToss(${coinLabel(state.firstCoin)})`;
      default:
        return assertNever(state);
    }
  }
}
