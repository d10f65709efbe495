/**
 * Hash module - encoding, Hamming distance and image comparison
 */

export {
  encodeHash,
  decodeHash,
  parseHexHash,
  toRawHash,
  HASH_BITS,
  UINT64_MAX
} from './encoding.js';
export {
  hammingDistance,
  bitwiseHammingDistance,
  popcountHammingDistance,
  resolveHammingStrategy,
  MAX_HAMMING_DISTANCE,
  type HammingStrategy
} from './distance.js';
export {
  compareSimilarity,
  compositeDistance,
  DEFAULT_SIMILARITY_THRESHOLD
} from './comparator.js';
export { ImageHasher, type ImageHasherOptions } from './image-hash.js';
export { createImageHasher } from './factory.js';
