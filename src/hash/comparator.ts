/**
 * Similarity scoring and composite (full / left / right) comparison of
 * encoded hashes
 */

import type {
  CompositeDistance,
  CompositeHash,
  EncodedHashInput,
  HashMode,
  SimilarityResult
} from '../types/index.js';

import {
  hammingDistance,
  MAX_HAMMING_DISTANCE,
  popcountHammingDistance,
  type HammingStrategy
} from './distance.js';

/**
 * Default similarity threshold (Hamming distance)
 * - Distance 0: Identical
 * - Distance 1-5: Very similar
 * - Distance 6-10: Similar
 * - Distance 11-20: Somewhat similar
 * - Distance >20: Different
 */
export const DEFAULT_SIMILARITY_THRESHOLD = 10;

/**
 * Compare two encoded hashes for similarity
 *
 * @param threshold - Largest distance still considered similar
 */
export function compareSimilarity(
  hash1: EncodedHashInput,
  hash2: EncodedHashInput,
  mode: HashMode,
  threshold: number = DEFAULT_SIMILARITY_THRESHOLD,
  strategy: HammingStrategy = popcountHammingDistance
): SimilarityResult {
  const distance = hammingDistance(hash1, hash2, mode, strategy);
  const similarity = ((MAX_HAMMING_DISTANCE - distance) / MAX_HAMMING_DISTANCE) * 100;

  return {
    distance,
    similarity: Math.round(similarity * 100) / 100, // Round to 2 decimal places
    isSimilar: distance <= threshold
  };
}

/**
 * Pairwise distances between the parts of two composite hashes.
 * No aggregate score is derived; weighting the parts is up to the caller.
 */
export function compositeDistance(
  hash1: CompositeHash,
  hash2: CompositeHash,
  mode: HashMode,
  strategy: HammingStrategy = popcountHammingDistance
): CompositeDistance {
  return {
    fullDistance: hammingDistance(hash1.full, hash2.full, mode, strategy),
    leftPartDistance: hammingDistance(hash1.left, hash2.left, mode, strategy),
    rightPartDistance: hammingDistance(hash1.right, hash2.right, mode, strategy)
  };
}
