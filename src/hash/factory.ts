import { parseHashingSettings, type HashingData } from '../config/index.js';
import { createFingerprinter } from '../fingerprint/index.js';
import type { ImageProcessor } from '../image/processor.js';
import { logger } from '../lib/logger.js';

import { ImageHasher } from './image-hash.js';

/**
 * Build an ImageHasher from validated configuration
 *
 * @param settings - Defaults to the `IMAGE_HASH_*` variables of the process,
 *   which are validated here rather than on import
 */
export function createImageHasher(
  settings: HashingData = parseHashingSettings(process.env),
  processor?: ImageProcessor
): ImageHasher {
  logger.debug(
    {
      mode: settings.IMAGE_HASH_MODE,
      algorithm: settings.IMAGE_HASH_ALGORITHM,
      distanceStrategy: settings.IMAGE_HASH_DISTANCE_STRATEGY
    },
    'Creating image hasher'
  );

  return new ImageHasher(createFingerprinter(settings.IMAGE_HASH_ALGORITHM), {
    mode: settings.IMAGE_HASH_MODE,
    processor,
    distanceStrategy: settings.IMAGE_HASH_DISTANCE_STRATEGY,
    similarityThreshold: settings.IMAGE_HASH_SIMILARITY_THRESHOLD
  });
}
