/**
 * Image hashing and comparison
 *
 * `ImageHasher` ties a fingerprinting algorithm to an image processor and a
 * fixed encoding mode. It produces single and composite (full, left half,
 * right half) hashes and compares them by Hamming distance.
 *
 * Every image decoded or cropped here is released before the call settles,
 * whether it succeeds or fails. Handles passed in by the caller stay open.
 */

import { DifferenceHash } from '../fingerprint/difference.js';
import type { Fingerprinter } from '../fingerprint/types.js';
import { ImageHandle, type ImageProcessor } from '../image/processor.js';
import { loadImageSource, withHandleScope, type ImageSource } from '../image/scope.js';
import { SharpImageProcessor } from '../image/sharp-processor.js';
import { InvalidCompositeInputError } from '../lib/errors.js';
import { createModuleLogger } from '../lib/logger.js';
import type {
  CompositeDistance,
  CompositeHash,
  DistanceStrategyName,
  EncodedHash,
  EncodedHashInput,
  HashMode,
  RawHash,
  SimilarityResult
} from '../types/index.js';

import { compareSimilarity, compositeDistance, DEFAULT_SIMILARITY_THRESHOLD } from './comparator.js';
import { resolveHammingStrategy, type HammingStrategy } from './distance.js';
import { decodeHash, encodeHash } from './encoding.js';

const log = createModuleLogger('image-hash');

export interface ImageHasherOptions {
  /** Encoding of every hash produced and consumed by the instance */
  mode?: HashMode;
  processor?: ImageProcessor;
  distanceStrategy?: DistanceStrategyName;
  /** Default threshold used by `similarity` */
  similarityThreshold?: number;
}

export class ImageHasher {
  readonly mode: HashMode;
  readonly similarityThreshold: number;
  private readonly fingerprinter: Fingerprinter;
  private readonly processor: ImageProcessor;
  private readonly countBits: HammingStrategy;

  constructor(fingerprinter: Fingerprinter = new DifferenceHash(), options: ImageHasherOptions = {}) {
    this.fingerprinter = fingerprinter;
    this.mode = options.mode ?? 'hex';
    this.processor = options.processor ?? new SharpImageProcessor();
    this.countBits = resolveHammingStrategy(options.distanceStrategy);
    this.similarityThreshold = options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
  }

  get algorithm(): string {
    return this.fingerprinter.name;
  }

  /**
   * Calculate a perceptual hash of an image
   *
   * @param source - Image bytes, file path, or a decoded handle (left open)
   */
  async hash(source: ImageSource): Promise<EncodedHash> {
    if (source instanceof ImageHandle) {
      return this.encode(await this.fingerprinter.fingerprint(source));
    }

    const input: Buffer | string = source;
    return withHandleScope(this.processor, async scope => {
      const image = await scope.acquire(loadImageSource(this.processor, input));
      return this.encode(await this.fingerprinter.fingerprint(image));
    });
  }

  /**
   * Calculate a perceptual hash of encoded image bytes
   */
  async hashFromBytes(data: Buffer): Promise<EncodedHash> {
    return withHandleScope(this.processor, async scope => {
      const image = await scope.acquire(this.processor.decode(data));
      return this.encode(await this.fingerprinter.fingerprint(image));
    });
  }

  /**
   * Hash the whole image and its left and right halves.
   *
   * Resolves to `false` when given a decoded handle instead of a source.
   * Callers that need a reason can check for `ImageHandle` up front, or use
   * `multipleCompare`, which throws `InvalidCompositeInputError`.
   */
  async multipleHash(source: ImageSource): Promise<CompositeHash | false> {
    if (source instanceof ImageHandle) {
      log.warn({ handle: source.id }, 'Composite hashing requires an image source, not a decoded handle');
      return false;
    }

    const input: Buffer | string = source;
    return withHandleScope(this.processor, async scope => {
      const full = await scope.acquire(loadImageSource(this.processor, input));
      const { width, height } = this.processor.dimensions(full);
      const midpoint = Math.floor(width / 2);

      const left = await scope.acquire(
        this.processor.crop(full, { left: 0, top: 0, width: midpoint, height })
      );
      const right = await scope.acquire(
        this.processor.crop(full, { left: midpoint, top: 0, width: width - midpoint, height })
      );

      const fullHash = await this.fingerprinter.fingerprint(full);
      const leftHash = await this.fingerprinter.fingerprint(left);
      const rightHash = await this.fingerprinter.fingerprint(right);

      log.debug({ width, height, midpoint, algorithm: this.algorithm }, 'Computed composite hash');

      return {
        full: this.encode(fullHash),
        left: this.encode(leftHash),
        right: this.encode(rightHash)
      };
    });
  }

  /**
   * Hash two images and return the Hamming distance between them
   */
  async compare(source1: ImageSource, source2: ImageSource): Promise<number> {
    const hash1 = await this.hash(source1);
    const hash2 = await this.hash(source2);

    return this.distance(hash1, hash2);
  }

  /**
   * Composite-hash two images and return the distance of each part
   *
   * @throws InvalidCompositeInputError when either source is a decoded handle
   */
  async multipleCompare(source1: ImageSource, source2: ImageSource): Promise<CompositeDistance> {
    const hash1 = await this.multipleHash(source1);
    const hash2 = await this.multipleHash(source2);

    if (hash1 === false || hash2 === false) {
      throw new InvalidCompositeInputError();
    }

    return compositeDistance(hash1, hash2, this.mode, this.countBits);
  }

  /**
   * Hamming distance between two hashes encoded in this instance's mode
   */
  distance(hash1: EncodedHashInput, hash2: EncodedHashInput): number {
    return this.countBits(this.decode(hash1), this.decode(hash2));
  }

  similarity(
    hash1: EncodedHashInput,
    hash2: EncodedHashInput,
    threshold: number = this.similarityThreshold
  ): SimilarityResult {
    return compareSimilarity(hash1, hash2, this.mode, threshold, this.countBits);
  }

  encode(raw: RawHash): EncodedHash {
    return encodeHash(raw, this.mode);
  }

  decode(encoded: EncodedHashInput): RawHash {
    return decodeHash(encoded, this.mode);
  }
}
