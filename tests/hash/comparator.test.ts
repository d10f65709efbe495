import { describe, it, expect } from 'vitest';

import {
  compareSimilarity,
  compositeDistance,
  DEFAULT_SIMILARITY_THRESHOLD
} from '../../src/hash/comparator.js';
import { bitwiseHammingDistance } from '../../src/hash/distance.js';

describe('Comparator helpers', () => {
  it('reports identical hashes as fully similar', () => {
    expect(compareSimilarity('abc', 'abc', 'hex')).toEqual({
      distance: 0,
      similarity: 100,
      isSimilar: true
    });
  });

  it('rounds similarity to two decimals', () => {
    // 0x7 vs 0x0: three differing bits
    expect(compareSimilarity('7', '0', 'hex')).toEqual({
      distance: 3,
      similarity: 95.31,
      isSimilar: true
    });
  });

  it('applies the threshold inclusively', () => {
    expect(DEFAULT_SIMILARITY_THRESHOLD).toBe(10);
    expect(compareSimilarity('3ff', '0', 'hex').isSimilar).toBe(true);
    expect(compareSimilarity('7ff', '0', 'hex').isSimilar).toBe(false);
    expect(compareSimilarity('7ff', '0', 'hex', 11).isSimilar).toBe(true);
  });

  it('works on decimal hashes', () => {
    const result = compareSimilarity(-1n, 0n, 'dec', 10, bitwiseHammingDistance);

    expect(result).toEqual({ distance: 64, similarity: 0, isSimilar: false });
  });

  it('computes part distances independently', () => {
    const first = { full: 'ff', left: '0', right: '8000000000000000' };
    const second = { full: 'ff', left: '3', right: '0' };

    expect(compositeDistance(first, second, 'hex')).toEqual({
      fullDistance: 0,
      leftPartDistance: 2,
      rightPartDistance: 1
    });
  });
});
