import { describe, it, expect } from 'vitest';

import {
  bitwiseHammingDistance,
  hammingDistance,
  popcountHammingDistance,
  resolveHammingStrategy
} from '../../src/hash/distance.js';
import { encodeHash, UINT64_MAX } from '../../src/hash/encoding.js';
import { MalformedHashError } from '../../src/lib/errors.js';

const values: bigint[] = [
  0n,
  1n,
  0x5555555555555555n,
  0xaaaaaaaaaaaaaaaan,
  0x00000000ffffffffn,
  0xffffffff00000000n,
  0x8000000000000001n,
  0x0123456789abcdefn,
  0xdeadbeefcafebaben,
  UINT64_MAX
];

const pairs: Array<[bigint, bigint]> = values.flatMap(a =>
  values.map((b): [bigint, bigint] => [a, b])
);

function flipBits(value: bigint, positions: number[]): bigint {
  return positions.reduce((acc, position) => acc ^ (1n << BigInt(position)), value);
}

describe('Hamming distance', () => {
  it('matches between the bitwise loop and the popcount path', () => {
    for (const [a, b] of pairs) {
      expect(popcountHammingDistance(a, b)).toBe(bitwiseHammingDistance(a, b));
    }
  });

  it('counts every position of full-width values', () => {
    expect(bitwiseHammingDistance(0n, UINT64_MAX)).toBe(64);
    expect(popcountHammingDistance(0n, UINT64_MAX)).toBe(64);
    expect(popcountHammingDistance(0x5555555555555555n, 0xaaaaaaaaaaaaaaaan)).toBe(64);
    expect(popcountHammingDistance(0n, 1n << 63n)).toBe(1);
    expect(popcountHammingDistance(0xdeadbeefcafebaben, 0n)).toBe(46);
  });

  it('is symmetric, zero on identity and bounded by 64', () => {
    for (const [a, b] of pairs) {
      const distance = popcountHammingDistance(a, b);
      expect(distance).toBe(popcountHammingDistance(b, a));
      expect(distance).toBeGreaterThanOrEqual(0);
      expect(distance).toBeLessThanOrEqual(64);
    }
    for (const value of values) {
      expect(bitwiseHammingDistance(value, value)).toBe(0);
    }
  });

  it.each([
    [[0]],
    [[63]],
    [[0, 31, 32, 63]],
    [[1, 2, 3, 4, 5, 6, 7, 8]],
    [Array.from({ length: 64 }, (_, i) => i)]
  ])('reports exactly k for k flipped bits %#', positions => {
    for (const mode of ['hex', 'dec'] as const) {
      const original = 0x8000000000000001n;
      const flipped = flipBits(original, positions);

      const distance = hammingDistance(encodeHash(original, mode), encodeHash(flipped, mode), mode);

      expect(distance).toBe(positions.length);
    }
  });

  it('decodes either encoding before comparing', () => {
    expect(hammingDistance('0', 'ffffffffffffffff', 'hex')).toBe(64);
    expect(hammingDistance('f0', 'f', 'hex')).toBe(8);
    expect(hammingDistance(0n, -1n, 'dec')).toBe(64);
    expect(hammingDistance('-9223372036854775808', 0, 'dec')).toBe(1);
  });

  it('uses the requested strategy', () => {
    expect(resolveHammingStrategy('bitwise')).toBe(bitwiseHammingDistance);
    expect(resolveHammingStrategy('popcount')).toBe(popcountHammingDistance);
    expect(resolveHammingStrategy()).toBe(popcountHammingDistance);
    expect(hammingDistance('ff', '0', 'hex', bitwiseHammingDistance)).toBe(8);
  });

  it('propagates decode failures', () => {
    expect(() => hammingDistance('zz', '0', 'hex')).toThrow(MalformedHashError);
    expect(() => hammingDistance(1n, 'one', 'dec')).toThrow(MalformedHashError);
  });
});
