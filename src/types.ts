/**
 * Core type definitions for the bitmask ECS registry.
 */

// ── Identifiers ─────────────────────────────────────────────────

/** Opaque caller or component token. Compared by value. */
export type Address = string;

/**
 * Fixed-width unsigned bitmap. Allocator bits, entity composite masks and
 * system query masks all share this type; width is enforced by `core/bitmap`.
 */
export type Bitmap = bigint;

/** Query mask a system registers under. */
export type Query = Bitmap;

/** Entity ids start at 1 and are never reused. */
export type EntityId = number;

// ── Aggregates ──────────────────────────────────────────────────

export interface EntityRecord {
  bitmask: Bitmap;
  /** Addresses actually incorporated at spawn, in request order. */
  components: Address[];
}

export interface World {
  readonly name: string;
  nextEntityId: EntityId;
  entities: Map<EntityId, EntityRecord>;
  systems: Map<Query, Address>;
}

export interface Register {
  /** Last allocated bit index. 0 means nothing allocated yet. */
  nextBit: number;
  addresses: Address[];
  /** Audit trail, never pruned on de-registration. */
  bitToAddress: Map<number, Address>;
}

// ── Storage ─────────────────────────────────────────────────────

export const StorageKey = {
  GENESIS: 'genesis',
  WORLD: 'world',
  REGISTER: 'register',
} as const;

export type StorageKey = (typeof StorageKey)[keyof typeof StorageKey];

export interface StoredValues {
  genesis: boolean;
  world: World;
  register: Register;
}

// ── Result Type ─────────────────────────────────────────────────

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T, E = Error>(value: T): Result<T, E> {
  return { ok: true, value };
}

export function err<T, E = Error>(error: E): Result<T, E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok;
}

/** Return the value or throw the error (wrapped in an Error when it is not one). */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value;
  if (result.error instanceof Error) throw result.error;
  throw new Error(String(result.error));
}
