/**
 * Integration: the coin-toss machine across three "processes" sharing one
 * checkpoint file on the real filesystem.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as os from 'os';
import * as path from 'path';
import * as fs from 'fs/promises';

import { ResumableEngine } from '../../src/durable-core/engine.js';
import { JsonFileCheckpointStore } from '../../src/infra/local/json-checkpoint-store/index.js';
import { NodeFileSystem } from '../../src/infra/local/fs/index.js';
import type { CheckpointPath } from '../../src/infra/local/checkpoint-location/index.js';
import { asCheckpointPath } from '../../src/infra/local/checkpoint-location/index.js';
import type { CoinTossState } from '../../src/machines/coin-toss/machine.js';
import { COIN_TOSS_INITIAL_STATE, CoinTossMachine, CoinTossStateSchema } from '../../src/machines/coin-toss/machine.js';
import { ScriptedRandomEntropy } from '../fakes/index.js';

function startProcess(file: CheckpointPath, bytes: readonly number[]) {
  const lines: string[] = [];
  const entropy = new ScriptedRandomEntropy(bytes);
  const machine = new CoinTossMachine({ entropy, report: (line) => lines.push(line) });
  const store = new JsonFileCheckpointStore<CoinTossState>(file, CoinTossStateSchema, new NodeFileSystem());
  const engine = new ResumableEngine<CoinTossState>({ machine, store, initialState: COIN_TOSS_INITIAL_STATE });
  return { engine, lines, entropy };
}

describe('coin toss resumption', () => {
  let dir: string;
  let file: CheckpointPath;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'resumable-coin-'));
    file = asCheckpointPath(path.join(dir, 'nested', 'coin.json'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('fails on a mismatch, refuses to retry unacknowledged, then retosses only the second coin', async () => {
    // Run 1: heads then tails.
    const first = startProcess(file, [0, 1]);
    expect((await first.engine.restore()).isOk()).toBe(true);
    const failed = await first.engine.run();

    expect(failed._unsafeUnwrapErr()).toEqual({
      code: 'ENGINE_STEP_FAILED',
      message: 'Coins landed differently',
      step: 'SecondToss(Heads)',
    });
    expect(first.lines).toEqual(['First coin: Heads', 'Second coin: Tails']);
    expect(JSON.parse(await fs.readFile(file, 'utf8'))).toEqual({
      state: { kind: 'second_toss', firstCoin: 'heads' },
      error: 'Coins landed differently',
    });

    // Run 2: restored failure, no acknowledgement.
    const second = startProcess(file, []);
    await second.engine.restore();
    const guarded = await second.engine.run();

    expect(guarded._unsafeUnwrapErr().message).toBe(
      'Previous run resulted in an error: Coins landed differently on step: SecondToss(Heads)'
    );
    expect(second.entropy.consumed).toBe(0);
    expect(second.lines).toEqual([]);

    // Run 3: acknowledged; the second coin lands heads.
    const third = startProcess(file, [2]);
    await third.engine.restore();
    expect((await third.engine.dropError()).isOk()).toBe(true);
    const finished = await third.engine.run();

    expect(finished.isOk()).toBe(true);
    expect(third.lines).toEqual(['Second coin: Heads', 'Coins match']);
    expect(third.entropy.consumed).toBe(1);
    await expect(fs.access(file)).rejects.toThrow();
    await expect(fs.access(`${file}.tmp`)).rejects.toThrow();
  });

  it('finishes in one run when both coins match and leaves no file behind', async () => {
    const run = startProcess(file, [1, 3]);
    await run.engine.restore();

    expect((await run.engine.run()).isOk()).toBe(true);
    expect(run.lines).toEqual(['First coin: Tails', 'Second coin: Tails', 'Coins match']);
    await expect(fs.access(file)).rejects.toThrow();
  });

  it('resumes at the second toss after a crash between steps', async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, JSON.stringify({ state: { kind: 'second_toss', firstCoin: 'tails' }, error: null }));

    const run = startProcess(file, [5]);
    await run.engine.restore();

    expect((await run.engine.run()).isOk()).toBe(true);
    expect(run.lines).toEqual(['Second coin: Tails', 'Coins match']);
  });

  it('reports a corrupt checkpoint file instead of starting over', async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, 'not json');

    const run = startProcess(file, [0, 0]);
    const restored = await run.engine.restore();

    expect(restored._unsafeUnwrapErr()).toEqual({
      code: 'ENGINE_STORE_FAILED',
      message: `Checkpoint store failed at ${file}: Invalid JSON in checkpoint file: ${file}`,
      location: file,
      cause: { code: 'CHECKPOINT_STORE_CORRUPTION_DETECTED', message: `Invalid JSON in checkpoint file: ${file}` },
    });
    expect(run.entropy.consumed).toBe(0);
  });

  it('leaves no temp file behind when the checkpoint cannot be written', async () => {
    // A non-empty directory where the checkpoint file should go makes the rename fail.
    await fs.mkdir(path.join(file, 'occupied'), { recursive: true });

    const run = startProcess(file, [0, 1]);
    const result = await run.engine.run();

    expect(result._unsafeUnwrapErr().code).toBe('ENGINE_STORE_FAILED');
    await expect(fs.access(`${file}.tmp`)).rejects.toThrow();
    expect(await fs.readdir(path.dirname(file))).toEqual(['coin.json']);
  });
});
