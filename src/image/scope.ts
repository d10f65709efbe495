import { readFile } from 'node:fs/promises';

import { UnreadableImageError } from '../lib/errors.js';
import { createModuleLogger } from '../lib/logger.js';

import type { ImageHandle, ImageProcessor } from './processor.js';

/**
 * Image input accepted by the orchestrator: encoded bytes, a file path, or an
 * image that is already decoded
 */
export type ImageSource = Buffer | string | ImageHandle;

const log = createModuleLogger('handle-scope');

/**
 * Tracks every handle acquired during one operation and releases them all,
 * most recent first, when the operation ends.
 */
export class HandleScope {
  private readonly handles: ImageHandle[] = [];

  constructor(private readonly processor: ImageProcessor) {}

  get size(): number {
    return this.handles.length;
  }

  adopt(image: ImageHandle): ImageHandle {
    this.handles.push(image);
    return image;
  }

  async acquire(pending: Promise<ImageHandle>): Promise<ImageHandle> {
    return this.adopt(await pending);
  }

  releaseAll(): void {
    let firstError: unknown;
    let failed = false;

    for (let image = this.handles.pop(); image; image = this.handles.pop()) {
      try {
        this.processor.release(image);
      } catch (error) {
        if (!failed) {
          firstError = error;
          failed = true;
        }
      }
    }

    if (failed) {
      throw firstError;
    }
  }
}

/**
 * Run `fn` with a fresh scope; every handle it acquires is released on return
 * or failure.
 *
 * When `fn` fails, its error is the one rethrown; a release failure on that
 * path is logged instead.
 */
export async function withHandleScope<T>(
  processor: ImageProcessor,
  fn: (scope: HandleScope) => Promise<T>
): Promise<T> {
  const scope = new HandleScope(processor);

  let result: T;
  try {
    result = await fn(scope);
  } catch (error) {
    try {
      scope.releaseAll();
    } catch (releaseError) {
      log.error({ error: releaseError, cause: error }, 'Failed to release image handles');
    }
    throw error;
  }

  scope.releaseAll();
  return result;
}

/**
 * Decode bytes or a file into a new handle owned by the caller
 */
export async function loadImageSource(
  processor: ImageProcessor,
  source: Buffer | string
): Promise<ImageHandle> {
  if (typeof source !== 'string') {
    return processor.decode(source);
  }

  let data: Buffer;
  try {
    data = await readFile(source);
  } catch (error) {
    throw new UnreadableImageError(`Unable to load file: ${source}`, { cause: error });
  }

  try {
    return await processor.decode(data);
  } catch (error) {
    throw new UnreadableImageError(`Unable to load file: ${source}`, { cause: error });
  }
}
