/**
 * Component register: the bit allocator.
 *
 * Each newly seen component address gets the next bit index of a fixed-width
 * bitmap. Indices are pre-incremented, so the first allocation is bit 1 and
 * bit 0 is never handed out. The counter only grows: a de-registered address
 * leaves a hole, and registering it again issues a fresh bit.
 *
 * All functions take the register by value and return a new one; nothing here
 * touches storage.
 */

import type { Address, Bitmap, Register, Result } from '../types';
import { ok, err } from '../types';
import { DEFAULT_REGISTRY_CONFIG, type UnregisterLookup } from '../config';
import { bitAt } from '../core/bitmap';
import { REGISTRY_ERROR, RegistryError } from '../core/errors';

export interface AllocatorOptions {
  bitmapWidth: number;
  unregisterLookup: UnregisterLookup;
}

const DEFAULT_OPTIONS: AllocatorOptions = {
  bitmapWidth: DEFAULT_REGISTRY_CONFIG.bitmapWidth,
  unregisterLookup: DEFAULT_REGISTRY_CONFIG.unregisterLookup,
};

export interface Allocation {
  register: Register;
  /** `1 << bitIndex`, or null when the address already owns a bit. */
  bit: Bitmap | null;
  bitIndex: number | null;
}

export interface Release {
  register: Register;
  removed: boolean;
}

/** Pluggable allocation strategy. `BitRegister` is the production one. */
export interface Registered {
  register(current: Register | undefined, address: Address, options?: Partial<AllocatorOptions>): Result<Allocation, RegistryError>;
  unregister(current: Register | undefined, address: Address, options?: Partial<AllocatorOptions>): Result<Release, RegistryError>;
}

export function createRegister(): Register {
  return { nextBit: 0, addresses: [], bitToAddress: new Map() };
}

export function cloneRegister(register: Register): Register {
  return {
    nextBit: register.nextBit,
    addresses: [...register.addresses],
    bitToAddress: new Map(register.bitToAddress),
  };
}

/**
 * Allocate a bit for `address`.
 * An undefined register is created on the spot. An address already present
 * yields `bit: null` and the register back unchanged.
 */
export function registerComponent(
  current: Register | undefined,
  address: Address,
  options: Partial<AllocatorOptions> = {},
): Result<Allocation, RegistryError> {
  const { bitmapWidth } = { ...DEFAULT_OPTIONS, ...options };
  const register = current ?? createRegister();

  if (register.addresses.includes(address)) {
    return ok({ register, bit: null, bitIndex: null });
  }

  const bitIndex = register.nextBit + 1;
  if (bitIndex >= bitmapWidth) {
    return err(
      new RegistryError(
        REGISTRY_ERROR.CAPACITY_EXHAUSTED,
        `Cannot register ${address}: all ${bitmapWidth - 1} component bits of the ${bitmapWidth}-bit map are allocated`,
      ),
    );
  }

  const next = cloneRegister(register);
  next.nextBit = bitIndex;
  next.addresses.push(address);
  next.bitToAddress.set(bitIndex, address);

  return ok({ register: next, bit: bitAt(bitIndex), bitIndex });
}

/**
 * Release `address` from the register.
 * Absent addresses are a no-op. The bit stays consumed and its audit entry
 * in `bitToAddress` is kept.
 */
export function unregisterComponent(
  current: Register | undefined,
  address: Address,
  options: Partial<AllocatorOptions> = {},
): Result<Release, RegistryError> {
  if (!current) {
    return err(new RegistryError(REGISTRY_ERROR.REGISTER_MISSING));
  }

  const { unregisterLookup } = { ...DEFAULT_OPTIONS, ...options };
  const index = unregisterLookup === 'binary-search'
    ? binarySearch(current.addresses, address)
    : current.addresses.indexOf(address);

  if (index === -1) {
    return ok({ register: current, removed: false });
  }

  const next = cloneRegister(current);
  next.addresses.splice(index, 1);
  return ok({ register: next, removed: true });
}

export const BitRegister: Registered = {
  register: registerComponent,
  unregister: unregisterComponent,
};

// ── Read helpers ──────────────────────────────────────────────────

export function isRegistered(register: Register | undefined, address: Address): boolean {
  return register?.addresses.includes(address) ?? false;
}

/** Address recorded for a bit index, including ones since de-registered. */
export function addressForBit(register: Register | undefined, bitIndex: number): Address | undefined {
  return register?.bitToAddress.get(bitIndex);
}

/** Bits still available before registration fails. */
export function remainingCapacity(
  register: Register | undefined,
  bitmapWidth: number = DEFAULT_OPTIONS.bitmapWidth,
): number {
  const used = register?.nextBit ?? 0;
  return Math.max(0, bitmapWidth - 1 - used);
}

/**
 * Binary search over a list assumed to be sorted ascending.
 * The register appends in arrival order, so on an unsorted list this can
 * return -1 for an address that is present.
 */
function binarySearch(addresses: readonly Address[], address: Address): number {
  let lo = 0;
  let hi = addresses.length;

  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const probe = addresses[mid];
    if (probe === undefined) return -1;
    if (probe === address) return mid;
    if (probe < address) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }

  return -1;
}
