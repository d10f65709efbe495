/**
 * Image-processing capability used by the hash orchestrator.
 *
 * The orchestrator never touches pixels itself. It decodes, measures, crops
 * and releases images through an `ImageProcessor`, and hands the resulting
 * handles to a fingerprinter.
 */

import { ImageReleasedError } from '../lib/errors.js';

export type ImageChannels = 1 | 2 | 3 | 4;

export interface ImageDimensions {
  width: number;
  height: number;
}

/**
 * Rectangle in pixel coordinates, same shape as sharp's `extract` options
 */
export interface CropRegion {
  left: number;
  top: number;
  width: number;
  height: number;
}

let nextHandleId = 1;

/**
 * Decoded image held in memory as raw, interleaved pixels
 */
export class ImageHandle {
  readonly id: number;
  readonly width: number;
  readonly height: number;
  readonly channels: ImageChannels;
  private data: Buffer | null;

  constructor(pixels: Buffer, width: number, height: number, channels: ImageChannels) {
    this.id = nextHandleId++;
    this.data = pixels;
    this.width = width;
    this.height = height;
    this.channels = channels;
  }

  get released(): boolean {
    return this.data === null;
  }

  get pixels(): Buffer {
    if (this.data === null) {
      throw new ImageReleasedError(this.id);
    }
    return this.data;
  }

  /**
   * Drop the pixel buffer. Returns false when the handle was already released.
   */
  release(): boolean {
    if (this.data === null) {
      return false;
    }
    this.data = null;
    return true;
  }
}

export interface ImageProcessor {
  /** @throws UnreadableImageError when the bytes are not a decodable image */
  decode(data: Buffer): Promise<ImageHandle>;
  dimensions(image: ImageHandle): ImageDimensions;
  crop(image: ImageHandle, region: CropRegion): Promise<ImageHandle>;
  /** Safe to call more than once for the same handle */
  release(image: ImageHandle): void;
}
