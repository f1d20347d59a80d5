import { z } from 'zod';
import type { RandomEntropyPort } from '../../ports/random-entropy.port.js';

export const CoinSchema = z.enum(['heads', 'tails']);
export type Coin = z.infer<typeof CoinSchema>;

/** Even byte: heads. Odd byte: tails. */
export function tossCoin(entropy: RandomEntropyPort): Coin {
  const [byte] = entropy.generateBytes(1);
  return (byte ?? 0) % 2 === 0 ? 'heads' : 'tails';
}

export function coinLabel(coin: Coin): string {
  return coin === 'heads' ? 'Heads' : 'Tails';
}
