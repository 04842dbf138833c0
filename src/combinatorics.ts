/* eslint-disable no-bitwise -- Subsets are enumerated as index bitmasks. */

import { ensureNonNullable } from './typeGuards.ts';

const MAX_ITEMS = 30;

export function countBits(mask: number): number {
  let count = 0;
  for (let rest = mask; rest !== 0; rest &= rest - 1) {
    count++;
  }
  return count;
}

/**
 * Every bitmask over `itemCount` indices whose size lies in
 * `[minSize, maxSize]`, in ascending numeric order.
 */
export function generateSubsetMasks(itemCount: number, minSize: number, maxSize: number): number[] {
  if (!Number.isInteger(itemCount) || itemCount < 0 || itemCount > MAX_ITEMS) {
    throw new RangeError(`Cannot enumerate subsets of ${String(itemCount)} items`);
  }

  const masks: number[] = [];
  const limit = 1 << itemCount;
  for (let mask = 1; mask < limit; mask++) {
    const size = countBits(mask);
    if (size >= minSize && size <= maxSize) {
      masks.push(mask);
    }
  }
  return masks;
}

export function selectByMask<T>(items: readonly T[], mask: number): T[] {
  const selected: T[] = [];
  for (let i = 0; i < items.length; i++) {
    if ((mask & (1 << i)) !== 0) {
      selected.push(ensureNonNullable(items[i]));
    }
  }
  return selected;
}

/* eslint-enable no-bitwise -- End subset mask block. */
