import {
  describe,
  expect,
  it
} from 'vitest';

import {
  countBits,
  generateSubsetMasks,
  selectByMask
} from '../src/combinatorics.ts';

describe('countBits', () => {
  it('counts set bits', () => {
    expect(countBits(0)).toBe(0);
    expect(countBits(0b1011)).toBe(3);
    expect(countBits(0b111111111)).toBe(9);
  });
});

describe('generateSubsetMasks', () => {
  it('returns pairs of three items in ascending order', () => {
    expect(generateSubsetMasks(3, 2, 2)).toEqual([0b011, 0b101, 0b110]);
  });

  it('covers a size range', () => {
    // C(4,2) + C(4,3)
    expect(generateSubsetMasks(4, 2, 3)).toHaveLength(10);
  });

  it('returns every non-empty subset of nine items', () => {
    expect(generateSubsetMasks(9, 1, 9)).toHaveLength(511);
  });

  it('returns nothing when the range is empty', () => {
    expect(generateSubsetMasks(0, 2, -1)).toEqual([]);
    expect(generateSubsetMasks(2, 2, 1)).toEqual([]);
  });

  it('rejects an unusable item count', () => {
    expect(() => generateSubsetMasks(-1, 1, 1)).toThrow(RangeError);
  });
});

describe('selectByMask', () => {
  it('picks the items whose bits are set', () => {
    expect(selectByMask(['a', 'b', 'c'], 0b101)).toEqual(['a', 'c']);
    expect(selectByMask(['a', 'b', 'c'], 0)).toEqual([]);
  });
});
