/**
 * Random entropy port.
 *
 * Abstracted so step bodies that need randomness stay deterministic under test.
 *
 * @example
 * const [byte] = entropy.generateBytes(1);
 */
export interface RandomEntropyPort {
  /**
   * @param count - Number of bytes to generate (must be positive)
   * @returns exactly `count` random bytes
   */
  generateBytes(count: number): Uint8Array;
}
