import type { ImageHandle } from '../image/processor.js';
import { rawPipeline } from '../image/sharp-processor.js';

/**
 * Downsample an image to `width` x `height` luminance values, row by row
 */
export async function grayscaleThumbnail(
  image: ImageHandle,
  width: number,
  height: number
): Promise<Uint8Array> {
  const { data, info } = await rawPipeline(image)
    .resize(width, height, { fit: 'fill' })
    .greyscale()
    .raw()
    .toBuffer({ resolveWithObject: true });

  // greyscale output keeps an alpha band when the source has one
  const luminance = new Uint8Array(width * height);
  for (let i = 0; i < luminance.length; i++) {
    luminance[i] = data[i * info.channels] ?? 0;
  }

  return luminance;
}
