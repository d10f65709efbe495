import { z } from 'zod';

import type { HashMode } from '../types/index.js';

/**
 * Validation schemas for encoded hashes and image regions
 */

export const HashModeSchema = z.enum(['hex', 'dec']);

export const HexHashSchema = z
  .string()
  .min(1, 'Hex hash must not be empty')
  .max(16, 'Hex hash must fit in 64 bits (16 digits)')
  .regex(/^[0-9a-fA-F]+$/, 'Hex hash must contain only hexadecimal digits');

export const DecimalHashStringSchema = z
  .string()
  .regex(/^-?\d+$/, 'Decimal hash must be an integer literal');

export const CropRegionSchema = z.object({
  left: z.number().int().min(0),
  top: z.number().int().min(0),
  width: z.number().int().min(1, 'Crop width must be positive'),
  height: z.number().int().min(1, 'Crop height must be positive')
});

/**
 * Check the syntax of an encoded hash without decoding it
 */
export function isValidEncodedHash(value: unknown, mode: HashMode): boolean {
  if (mode === 'hex') {
    return HexHashSchema.safeParse(value).success;
  }

  if (typeof value === 'bigint') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isSafeInteger(value);
  }
  return DecimalHashStringSchema.safeParse(value).success;
}
