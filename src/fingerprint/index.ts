/**
 * Fingerprint module - interchangeable hashing algorithms
 */

import type { HashAlgorithm } from '../types/index.js';

import { AverageHash } from './average.js';
import { DifferenceHash } from './difference.js';
import { PerceptualHash } from './perceptual.js';
import type { Fingerprinter } from './types.js';

export { AverageHash, DifferenceHash, PerceptualHash };
export { grayscaleThumbnail } from './thumbnail.js';
export type { Fingerprinter } from './types.js';

export function createFingerprinter(algorithm: HashAlgorithm): Fingerprinter {
  switch (algorithm) {
    case 'difference':
      return new DifferenceHash();
    case 'average':
      return new AverageHash();
    case 'perceptual':
      return new PerceptualHash();
  }
}
