/**
 * Image module - decoding, cropping and handle lifetime
 */

export {
  ImageHandle,
  type CropRegion,
  type ImageChannels,
  type ImageDimensions,
  type ImageProcessor
} from './processor.js';
export { SharpImageProcessor, rawPipeline } from './sharp-processor.js';
export { HandleScope, withHandleScope, loadImageSource, type ImageSource } from './scope.js';
