/**
 * Fixed-width bitmap arithmetic.
 *
 * Bitmaps are non-negative bigints below 2^width. Bit index 0 is the least
 * significant bit. Helpers never widen a mask past the width they are given.
 */

import type { Bitmap } from '../types';
import { MAX_BITMAP_WIDTH } from '../config';

export const EMPTY_BITMAP: Bitmap = 0n;

/** Single-bit mask for `index`. Caller guarantees `0 <= index < width`. */
export function bitAt(index: number): Bitmap {
  return 1n << BigInt(index);
}

/** True when `index` addresses a bit inside a bitmap of `width` bits. */
export function fitsIndex(index: number, width: number = MAX_BITMAP_WIDTH): boolean {
  return Number.isInteger(index) && index >= 0 && index < width;
}

/** True when `mask` is a valid bitmap of `width` bits. */
export function fitsWidth(mask: Bitmap, width: number = MAX_BITMAP_WIDTH): boolean {
  return mask >= 0n && mask >> BigInt(width) === 0n;
}

export function union(...masks: Bitmap[]): Bitmap {
  let out = EMPTY_BITMAP;
  for (const mask of masks) out |= mask;
  return out;
}

/** `mask & query === query`: every bit of `query` is set in `mask`. */
export function containsAll(mask: Bitmap, query: Bitmap): boolean {
  return (mask & query) === query;
}

export function intersects(a: Bitmap, b: Bitmap): boolean {
  return (a & b) !== 0n;
}

/** Set bit indices of `mask`, ascending. */
export function bitIndices(mask: Bitmap): number[] {
  const out: number[] = [];
  let rest = mask;
  let index = 0;
  while (rest > 0n) {
    if ((rest & 1n) === 1n) out.push(index);
    rest >>= 1n;
    index++;
  }
  return out;
}

export function popcount(mask: Bitmap): number {
  return bitIndices(mask).length;
}

export function toHex(mask: Bitmap): string {
  return `0x${mask.toString(16)}`;
}

/** Parse a `0x`-prefixed hex string. Returns null for anything else. */
export function fromHex(text: string): Bitmap | null {
  if (!/^0x[0-9a-f]+$/i.test(text)) return null;
  return BigInt(text);
}
