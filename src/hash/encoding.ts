/**
 * Fingerprint encoding
 *
 * Raw fingerprints are unsigned 64-bit values held as `bigint`. They are
 * persisted either as a minimal lower-case hex string or as the signed 64-bit
 * integer that shares their bit pattern. Both forms must stay compatible with
 * hashes stored by earlier releases, including the signed rendering of values
 * at or above 2^63.
 */

import { MalformedHashError } from '../lib/errors.js';
import { DecimalHashStringSchema, HexHashSchema } from '../lib/validation.js';
import type { EncodedHash, EncodedHashInput, HashMode, RawHash } from '../types/index.js';

export const HASH_BITS = 64;

export const UINT64_MAX: RawHash = (1n << 64n) - 1n;

const INT64_MIN = -(1n << 63n);

/**
 * Assert that a value produced by a fingerprinter fits in 64 unsigned bits
 */
export function toRawHash(value: bigint): RawHash {
  if (value < 0n || value > UINT64_MAX) {
    throw new RangeError(`Fingerprint ${value.toString()} is outside the unsigned 64-bit range`);
  }
  return value;
}

/**
 * Render a raw fingerprint in the given mode
 *
 * @returns Hex string without leading zeros, or a signed 64-bit bigint
 */
export function encodeHash(raw: RawHash, mode: HashMode): EncodedHash {
  const value = toRawHash(raw);

  if (mode === 'hex') {
    return value.toString(16);
  }

  return BigInt.asIntN(HASH_BITS, value);
}

/**
 * Recover the raw fingerprint from its encoded form
 *
 * @throws MalformedHashError when the value is not a valid encoding for `mode`
 */
export function decodeHash(encoded: EncodedHashInput, mode: HashMode): RawHash {
  if (mode === 'hex') {
    if (typeof encoded !== 'string') {
      throw new MalformedHashError(encoded, mode, 'expected a string');
    }
    return parseHexHash(encoded);
  }

  return parseDecimalHash(encoded);
}

/**
 * Parse a hex fingerprint as an unsigned 64-bit value.
 *
 * Full-width strings whose first nibble is above 8 are read as two big-endian
 * 32-bit words, matching how hashes with the sign bit set were always decoded.
 */
export function parseHexHash(hex: string): RawHash {
  const parsed = HexHashSchema.safeParse(hex);
  if (!parsed.success) {
    throw new MalformedHashError(hex, 'hex', parsed.error.issues[0]?.message);
  }

  if (hex.length === 16 && Number.parseInt(hex[0] ?? '0', 16) > 8) {
    const words = Buffer.from(hex, 'hex');
    const higher = BigInt(words.readUInt32BE(0));
    const lower = BigInt(words.readUInt32BE(4));
    return (higher << 32n) | lower;
  }

  return BigInt(`0x${hex}`);
}

function parseDecimalHash(encoded: EncodedHashInput): RawHash {
  let value: bigint;

  if (typeof encoded === 'bigint') {
    value = encoded;
  } else if (typeof encoded === 'number') {
    if (!Number.isSafeInteger(encoded)) {
      throw new MalformedHashError(encoded, 'dec', 'expected a safe integer');
    }
    value = BigInt(encoded);
  } else {
    const parsed = DecimalHashStringSchema.safeParse(encoded);
    if (!parsed.success) {
      throw new MalformedHashError(encoded, 'dec', parsed.error.issues[0]?.message);
    }
    value = BigInt(parsed.data);
  }

  if (value < INT64_MIN || value > UINT64_MAX) {
    throw new MalformedHashError(encoded, 'dec', 'does not fit in 64 bits');
  }

  return BigInt.asUintN(HASH_BITS, value);
}
