/**
 * Error taxonomy for hashing and comparison.
 *
 * Every error exposes a `statusCode` so an HTTP layer can map it the same way
 * it maps other application errors.
 */

export type ImageHashErrorCode =
  | 'UNREADABLE_IMAGE'
  | 'MALFORMED_HASH'
  | 'INVALID_COMPOSITE_INPUT'
  | 'INVALID_REGION'
  | 'IMAGE_RELEASED';

export class ImageHashError extends Error {
  readonly code: ImageHashErrorCode;
  readonly statusCode: number;

  constructor(code: ImageHashErrorCode, message: string, statusCode = 400, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

/**
 * Source bytes or file could not be decoded into an image
 */
export class UnreadableImageError extends ImageHashError {
  constructor(message = 'Unable to decode image data', options?: ErrorOptions) {
    super('UNREADABLE_IMAGE', message, 400, options);
  }
}

/**
 * Encoded hash is not valid for the configured mode
 */
export class MalformedHashError extends ImageHashError {
  readonly value: unknown;

  constructor(value: unknown, mode: string, reason?: string) {
    const detail = reason ? `: ${reason}` : '';
    super('MALFORMED_HASH', `Malformed ${mode} hash ${formatValue(value)}${detail}`);
    this.value = value;
  }
}

/**
 * Composite hashing needs a decodable source, not an open image handle
 */
export class InvalidCompositeInputError extends ImageHashError {
  constructor(message = 'Composite hashing requires an image source, not a decoded handle') {
    super('INVALID_COMPOSITE_INPUT', message);
  }
}

export class InvalidRegionError extends ImageHashError {
  constructor(message: string) {
    super('INVALID_REGION', message);
  }
}

export class ImageReleasedError extends ImageHashError {
  constructor(handleId: number) {
    super('IMAGE_RELEASED', `Image handle ${handleId} has already been released`, 500);
  }
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'bigint') {
    return `${value.toString()}n`;
  }
  return String(value);
}
