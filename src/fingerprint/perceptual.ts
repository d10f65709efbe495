/**
 * DCT-based perceptual hash (pHash)
 *
 * pHash is robust to:
 * - Compression artifacts
 * - Minor color changes
 * - Small resizing
 * - Format conversion
 */

import phashModule from 'sharp-phash';

import type { ImageHandle } from '../image/processor.js';
import { rawPipeline } from '../image/sharp-processor.js';
import type { RawHash } from '../types/index.js';

import type { Fingerprinter } from './types.js';

// sharp-phash has incorrect TypeScript module exports, cast to proper type
const phashLib = phashModule as unknown as (buffer: Buffer) => Promise<string>;

export class PerceptualHash implements Fingerprinter {
  readonly name = 'perceptual';

  async fingerprint(image: ImageHandle): Promise<RawHash> {
    // sharp-phash expects encoded image bytes
    const encoded = await rawPipeline(image).png().toBuffer();
    const bits = await phashLib(encoded);

    if (!/^[01]{64}$/.test(bits)) {
      throw new Error(`Unexpected perceptual hash output of length ${bits.length}`);
    }

    return BigInt(`0b${bits}`);
  }
}
