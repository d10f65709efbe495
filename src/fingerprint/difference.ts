import type { ImageHandle } from '../image/processor.js';
import type { RawHash } from '../types/index.js';

import { grayscaleThumbnail } from './thumbnail.js';
import type { Fingerprinter } from './types.js';

/**
 * Difference (gradient) hash.
 *
 * The image is reduced to a (size + 1) x size grayscale grid; each bit records
 * whether a pixel is brighter than its right-hand neighbour. Bits are filled
 * from the least significant end, row by row.
 */
export class DifferenceHash implements Fingerprinter {
  readonly name = 'difference';

  constructor(private readonly size = 8) {}

  async fingerprint(image: ImageHandle): Promise<RawHash> {
    const width = this.size + 1;
    const pixels = await grayscaleThumbnail(image, width, this.size);

    let hash = 0n;
    let bit = 1n;

    for (let y = 0; y < this.size; y++) {
      const row = y * width;
      for (let x = 0; x < this.size; x++) {
        if ((pixels[row + x] ?? 0) > (pixels[row + x + 1] ?? 0)) {
          hash |= bit;
        }
        bit <<= 1n;
      }
    }

    return hash;
  }
}
