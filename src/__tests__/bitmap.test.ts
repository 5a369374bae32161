import { describe, it, expect } from 'vitest';
import {
  bitAt,
  bitIndices,
  containsAll,
  fitsIndex,
  fitsWidth,
  fromHex,
  intersects,
  popcount,
  toHex,
  union,
} from '../core/bitmap';

describe('bitmap', () => {
  it('builds single-bit masks', () => {
    expect(bitAt(0)).toBe(1n);
    expect(bitAt(1)).toBe(2n);
    expect(bitAt(127)).toBe(170141183460469231731687303715884105728n);
  });

  it('checks indices and masks against the width', () => {
    expect(fitsIndex(127)).toBe(true);
    expect(fitsIndex(128)).toBe(false);
    expect(fitsIndex(-1)).toBe(false);
    expect(fitsIndex(3, 4)).toBe(true);
    expect(fitsIndex(4, 4)).toBe(false);

    expect(fitsWidth(1n << 127n)).toBe(true);
    expect(fitsWidth(1n << 128n)).toBe(false);
    expect(fitsWidth(-1n)).toBe(false);
    expect(fitsWidth(15n, 4)).toBe(true);
    expect(fitsWidth(16n, 4)).toBe(false);
  });

  it('combines and compares masks', () => {
    expect(union(2n, 4n)).toBe(6n);
    expect(union(2n, 2n, 8n)).toBe(10n);
    expect(union()).toBe(0n);

    expect(containsAll(6n, 2n)).toBe(true);
    expect(containsAll(6n, 0n)).toBe(true);
    expect(containsAll(2n, 6n)).toBe(false);

    expect(intersects(6n, 4n)).toBe(true);
    expect(intersects(6n, 8n)).toBe(false);
  });

  it('lists set bit indices', () => {
    expect(bitIndices(6n)).toEqual([1, 2]);
    expect(bitIndices(0n)).toEqual([]);
    expect(bitIndices((1n << 127n) | 2n)).toEqual([1, 127]);
    expect(popcount(14n)).toBe(3);
  });

  it('formats and parses hex', () => {
    expect(toHex(0n)).toBe('0x0');
    expect(toHex(255n)).toBe('0xff');
    expect(fromHex('0xFF')).toBe(255n);
    expect(fromHex('0x6')).toBe(6n);
    expect(fromHex('ff')).toBeNull();
    expect(fromHex('0x')).toBeNull();
    expect(fromHex('0x-1')).toBeNull();
  });
});
