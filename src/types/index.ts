// Core type definitions for image fingerprinting

/**
 * Encoding used to render a raw 64-bit fingerprint
 * - `hex`: minimal lower-case hexadecimal string
 * - `dec`: signed 64-bit integer (bigint) sharing the raw bit pattern
 */
export type HashMode = 'hex' | 'dec';

export const HEXADECIMAL: HashMode = 'hex';
export const DECIMAL: HashMode = 'dec';

/**
 * Unsigned 64-bit fingerprint in [0, 2^64 - 1]
 */
export type RawHash = bigint;

export type EncodedHash = string | bigint;

/**
 * Anything `decodeHash` accepts. Plain numbers are allowed in decimal mode
 * for values persisted as JSON numbers.
 */
export type EncodedHashInput = EncodedHash | number;

export interface CompositeHash {
  full: EncodedHash;
  left: EncodedHash;
  right: EncodedHash;
}

export interface CompositeDistance {
  fullDistance: number;
  leftPartDistance: number;
  rightPartDistance: number;
}

export interface SimilarityResult {
  /** Hamming distance between hashes */
  distance: number;
  /** Similarity percentage (0-100) */
  similarity: number;
  /** Whether images are considered similar (distance <= threshold) */
  isSimilar: boolean;
}

export type HashAlgorithm = 'difference' | 'average' | 'perceptual';

export type DistanceStrategyName = 'popcount' | 'bitwise';
