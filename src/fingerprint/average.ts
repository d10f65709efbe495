import type { ImageHandle } from '../image/processor.js';
import type { RawHash } from '../types/index.js';

import { grayscaleThumbnail } from './thumbnail.js';
import type { Fingerprinter } from './types.js';

/**
 * Average hash: one bit per pixel of an 8x8 grayscale thumbnail, set when the
 * pixel is brighter than the thumbnail's mean.
 */
export class AverageHash implements Fingerprinter {
  readonly name = 'average';

  constructor(private readonly size = 8) {}

  async fingerprint(image: ImageHandle): Promise<RawHash> {
    const pixels = await grayscaleThumbnail(image, this.size, this.size);
    const mean = pixels.reduce((sum, value) => sum + value, 0) / pixels.length;

    let hash = 0n;
    let bit = 1n;

    for (const value of pixels) {
      if (value > mean) {
        hash |= bit;
      }
      bit <<= 1n;
    }

    return hash;
  }
}
