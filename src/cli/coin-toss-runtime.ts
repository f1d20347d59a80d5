import type { DependencyContainer } from 'tsyringe';
import { DI } from '../di/tokens.js';
import type { ILoggerFactory } from '../core/logging/types.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import type { RandomEntropyPort } from '../ports/random-entropy.port.js';
import { ResumableEngine } from '../durable-core/engine.js';
import { JsonFileCheckpointStore } from '../infra/local/json-checkpoint-store/index.js';
import type { CheckpointPath } from '../infra/local/checkpoint-location/index.js';
import type { CoinTossState } from '../machines/coin-toss/machine.js';
import { COIN_TOSS_INITIAL_STATE, CoinTossMachine, CoinTossStateSchema } from '../machines/coin-toss/machine.js';

export interface CoinTossRuntime {
  readonly machine: CoinTossMachine;
  readonly store: JsonFileCheckpointStore<CoinTossState>;
  readonly engine: ResumableEngine<CoinTossState>;
}

/**
 * Build the coin-toss machine, its file store and engine from the container.
 */
export function createCoinTossRuntime(
  c: DependencyContainer,
  checkpointPath: CheckpointPath,
  report: (line: string) => void
): CoinTossRuntime {
  const loggers = c.resolve<ILoggerFactory>(DI.Logging.Factory);
  const fs = c.resolve<FileSystemPort>(DI.Infra.FileSystem);
  const entropy = c.resolve<RandomEntropyPort>(DI.Infra.RandomEntropy);

  const machine = new CoinTossMachine({ entropy, report });
  const store = new JsonFileCheckpointStore<CoinTossState>(checkpointPath, CoinTossStateSchema, fs);
  const engine = new ResumableEngine<CoinTossState>({
    machine,
    store,
    initialState: COIN_TOSS_INITIAL_STATE,
    logger: loggers.create('CoinToss'),
  });

  return { machine, store, engine };
}
