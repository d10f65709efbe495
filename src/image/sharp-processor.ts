/**
 * sharp-backed image processing
 *
 * Images are decoded once into raw pixels; crops and thumbnails are taken
 * from that buffer so the source bytes are read a single time per call.
 */

import sharp from 'sharp';

import { InvalidRegionError, UnreadableImageError } from '../lib/errors.js';
import { createModuleLogger } from '../lib/logger.js';
import { CropRegionSchema } from '../lib/validation.js';

import {
  ImageHandle,
  type CropRegion,
  type ImageDimensions,
  type ImageProcessor
} from './processor.js';

const log = createModuleLogger('sharp-processor');

/**
 * Build a sharp pipeline over the raw pixels of a decoded image
 */
export function rawPipeline(image: ImageHandle): sharp.Sharp {
  return sharp(image.pixels, {
    raw: {
      width: image.width,
      height: image.height,
      channels: image.channels
    }
  });
}

export class SharpImageProcessor implements ImageProcessor {
  async decode(data: Buffer): Promise<ImageHandle> {
    try {
      const { data: pixels, info } = await sharp(data).raw().toBuffer({ resolveWithObject: true });
      const image = new ImageHandle(pixels, info.width, info.height, info.channels);

      log.debug(
        { handle: image.id, width: image.width, height: image.height, channels: image.channels },
        'Decoded image'
      );

      return image;
    } catch (error) {
      throw new UnreadableImageError('Unable to decode image data', { cause: error });
    }
  }

  dimensions(image: ImageHandle): ImageDimensions {
    return { width: image.width, height: image.height };
  }

  async crop(image: ImageHandle, region: CropRegion): Promise<ImageHandle> {
    const parsed = CropRegionSchema.safeParse(region);
    if (!parsed.success) {
      throw new InvalidRegionError(
        `Invalid crop region: ${parsed.error.issues.map(issue => issue.message).join(', ')}`
      );
    }

    if (region.left + region.width > image.width || region.top + region.height > image.height) {
      throw new InvalidRegionError(
        `Crop region ${region.width}x${region.height}+${region.left}+${region.top} exceeds image ${image.width}x${image.height}`
      );
    }

    const { data: pixels, info } = await rawPipeline(image)
      .extract(region)
      .raw()
      .toBuffer({ resolveWithObject: true });

    return new ImageHandle(pixels, info.width, info.height, info.channels);
  }

  release(image: ImageHandle): void {
    if (image.release()) {
      log.debug({ handle: image.id }, 'Released image');
    }
  }
}
