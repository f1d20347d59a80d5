import { randomBytes } from 'node:crypto';
import type { RandomEntropyPort } from '../../../ports/random-entropy.port.js';

/**
 * Node crypto adapter for random entropy.
 */
export class NodeRandomEntropy implements RandomEntropyPort {
  generateBytes(count: number): Uint8Array {
    return new Uint8Array(randomBytes(count));
  }
}
