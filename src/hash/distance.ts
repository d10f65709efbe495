/**
 * Hamming distance over 64-bit fingerprints
 *
 * Hamming distance = number of differing bits. Fingerprints are fixed-width,
 * so every one of the 64 positions is compared regardless of magnitude.
 */

import type { DistanceStrategyName, EncodedHashInput, HashMode, RawHash } from '../types/index.js';

import { decodeHash, HASH_BITS, UINT64_MAX } from './encoding.js';

export type HammingStrategy = (a: RawHash, b: RawHash) => number;

/**
 * Maximum possible Hamming distance for 64-bit hash
 */
export const MAX_HAMMING_DISTANCE = HASH_BITS;

/**
 * Compare each bit position in turn
 */
export function bitwiseHammingDistance(a: RawHash, b: RawHash): number {
  let distance = 0;

  for (let i = 0n; i < BigInt(HASH_BITS); i++) {
    const mask = 1n << i;
    if ((a & mask) !== (b & mask)) {
      distance++;
    }
  }

  return distance;
}

/**
 * Population count of `a XOR b`, one 32-bit word at a time
 */
export function popcountHammingDistance(a: RawHash, b: RawHash): number {
  const xor = (a ^ b) & UINT64_MAX;
  const higher = Number(xor >> 32n);
  const lower = Number(xor & 0xffffffffn);

  return countBits32(higher) + countBits32(lower);
}

function countBits32(word: number): number {
  let n = word - ((word >>> 1) & 0x55555555);
  n = (n & 0x33333333) + ((n >>> 2) & 0x33333333);
  n = (n + (n >>> 4)) & 0x0f0f0f0f;
  return Math.imul(n, 0x01010101) >>> 24;
}

const strategies: Record<DistanceStrategyName, HammingStrategy> = {
  popcount: popcountHammingDistance,
  bitwise: bitwiseHammingDistance
};

export function resolveHammingStrategy(name: DistanceStrategyName = 'popcount'): HammingStrategy {
  return strategies[name];
}

/**
 * Calculate Hamming distance between two encoded hashes
 *
 * @param hash1 - First hash, encoded in `mode`
 * @param hash2 - Second hash, encoded in `mode`
 * @returns Hamming distance (0 = identical, 64 = completely different)
 */
export function hammingDistance(
  hash1: EncodedHashInput,
  hash2: EncodedHashInput,
  mode: HashMode,
  strategy: HammingStrategy = popcountHammingDistance
): number {
  return strategy(decodeHash(hash1, mode), decodeHash(hash2, mode));
}
