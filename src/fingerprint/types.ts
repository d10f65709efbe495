import type { ImageHandle } from '../image/processor.js';
import type { RawHash } from '../types/index.js';

/**
 * Pluggable fingerprinting algorithm.
 *
 * Must be deterministic for identical pixel content and return a value in
 * the unsigned 64-bit range.
 */
export interface Fingerprinter {
  readonly name: string;
  fingerprint(image: ImageHandle): Promise<RawHash>;
}
