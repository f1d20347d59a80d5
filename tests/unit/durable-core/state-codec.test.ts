import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { decodeState, encodeState } from '../../../src/durable-core/state-codec.js';
import { decodeCheckpoint } from '../../../src/durable-core/checkpoint.js';
import { CoinTossStateSchema } from '../../../src/machines/coin-toss/machine.js';

describe('encodeState', () => {
  it('encodes a state as compact JSON', () => {
    expect(encodeState({ kind: 'second_toss', firstCoin: 'heads' })._unsafeUnwrap()).toBe(
      '{"kind":"second_toss","firstCoin":"heads"}'
    );
  });

  it('rejects a value that encodes to nothing', () => {
    expect(encodeState(undefined)._unsafeUnwrapErr()).toEqual({
      code: 'STATE_ENCODE_FAILED',
      message: 'State is not JSON-encodable: encoded to nothing',
    });
  });

  it('rejects a cyclic value', () => {
    const cyclic: { self?: unknown } = {};
    cyclic.self = cyclic;

    expect(encodeState(cyclic)._unsafeUnwrapErr().code).toBe('STATE_ENCODE_FAILED');
  });
});

describe('decodeState', () => {
  const schema = z.object({ count: z.number() });

  it('decodes through the schema', () => {
    expect(decodeState(schema, '{"count":3}')._unsafeUnwrap()).toEqual({ count: 3 });
  });

  it('rejects text that is not JSON', () => {
    expect(decodeState(schema, '{count')._unsafeUnwrapErr()).toEqual({
      code: 'STATE_DECODE_FAILED',
      message: 'State snapshot is not valid JSON',
    });
  });

  it('rejects a value the schema does not accept', () => {
    expect(decodeState(schema, '{"count":"3"}')._unsafeUnwrapErr()).toEqual({
      code: 'STATE_DECODE_FAILED',
      message: 'State snapshot rejected by schema: count: Expected number, received string',
    });
  });
});

describe('decodeCheckpoint', () => {
  it('accepts a record with a pending error', () => {
    const raw = { state: { kind: 'second_toss', firstCoin: 'tails' }, error: 'Coins landed differently' };

    expect(decodeCheckpoint(CoinTossStateSchema, raw)._unsafeUnwrap()).toEqual(raw);
  });

  it('reads a missing error field as no pending error', () => {
    expect(decodeCheckpoint(CoinTossStateSchema, { state: { kind: 'first_toss' } })._unsafeUnwrap()).toEqual({
      state: { kind: 'first_toss' },
      error: null,
    });
  });

  it('rejects an error field that is not a string', () => {
    expect(decodeCheckpoint(CoinTossStateSchema, { state: { kind: 'first_toss' }, error: 7 })._unsafeUnwrapErr()).toBe(
      'error: Expected string, received number'
    );
  });

  it('reports state problems under the state path', () => {
    const raw = { state: { kind: 'second_toss', firstCoin: 'edge' }, error: null };

    expect(decodeCheckpoint(CoinTossStateSchema, raw)._unsafeUnwrapErr()).toBe(
      "state.firstCoin: Invalid enum value. Expected 'heads' | 'tails', received 'edge'"
    );
  });

  it('rejects an unknown variant', () => {
    const raw = { state: { kind: 'third_toss' }, error: null };

    expect(decodeCheckpoint(CoinTossStateSchema, raw)._unsafeUnwrapErr()).toBe(
      "state.kind: Invalid discriminator value. Expected 'first_toss' | 'second_toss'"
    );
  });

  it('rejects a record that is not an object', () => {
    expect(decodeCheckpoint(CoinTossStateSchema, 'first_toss')._unsafeUnwrapErr()).toBe(
      '(root): Expected object, received string'
    );
  });
});
