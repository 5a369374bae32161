/**
 * World aggregate: entity table and system registry.
 *
 * One world exists per deployment. It is created once at genesis and passed
 * by value through every operation here: load, mutate a copy, store.
 */

import { WORLD_NAME_MAX_LENGTH, WORLD_NAME_PATTERN } from '../config';
import type { Address, Bitmap, EntityId, EntityRecord, Query, Register, Result, World } from '../types';
import { ok, err } from '../types';
import { EMPTY_BITMAP, fitsWidth, toHex } from '../core/bitmap';
import { REGISTRY_ERROR, RegistryError } from '../core/errors';
import { BitRegister, type AllocatorOptions, type Registered } from './register';

/** World names are short symbols: 1-32 characters of `[A-Za-z0-9_]`. */
export function isValidWorldName(name: string): boolean {
  return name.length > 0 && name.length <= WORLD_NAME_MAX_LENGTH && WORLD_NAME_PATTERN.test(name);
}

export function createWorld(name: string): World {
  return {
    name,
    nextEntityId: 0,
    entities: new Map(),
    systems: new Map(),
  };
}

export function cloneWorld(world: World): World {
  const entities = new Map<EntityId, EntityRecord>();
  for (const [id, record] of world.entities) {
    entities.set(id, { bitmask: record.bitmask, components: [...record.components] });
  }
  return {
    name: world.name,
    nextEntityId: world.nextEntityId,
    entities,
    systems: new Map(world.systems),
  };
}

// ── Entities ──────────────────────────────────────────────────────

export interface WorldOptions extends Partial<AllocatorOptions> {
  allocator?: Registered;
}

export interface ComponentAllocation {
  address: Address;
  bitIndex: number;
  bit: Bitmap;
}

export interface SpawnOutcome {
  /** False when no requested address yielded a new bit. */
  created: boolean;
  world: World;
  /** Undefined only when nothing was requested and no register existed yet. */
  register: Register | undefined;
  entityId: EntityId | null;
  bitmask: Bitmap;
  /** New bits in request order. */
  allocations: ComponentAllocation[];
}

/**
 * Spawn an entity from `components`.
 *
 * Each address is registered left to right. Addresses that already own a bit,
 * including a repeat within the same call, are dropped from both the mask and
 * the stored component list. If none yields a bit, no entity id is consumed
 * and the world comes back unchanged. A capacity failure part-way fails the
 * whole spawn.
 */
export function spawn(
  world: World,
  register: Register | undefined,
  components: readonly Address[],
  options: WorldOptions = {},
): Result<SpawnOutcome, RegistryError> {
  const { allocator = BitRegister, ...allocatorOptions } = options;

  let currentRegister = register;
  let bitmask = EMPTY_BITMAP;
  const filtered: Address[] = [];
  const allocations: ComponentAllocation[] = [];

  for (const address of components) {
    const result = allocator.register(currentRegister, address, allocatorOptions);
    if (!result.ok) return result;

    const { register: nextRegister, bit, bitIndex } = result.value;
    currentRegister = nextRegister;
    if (bit === null || bitIndex === null) continue;

    bitmask |= bit;
    filtered.push(address);
    allocations.push({ address, bitIndex, bit });
  }

  if (filtered.length === 0) {
    return ok({
      created: false,
      world,
      register: currentRegister,
      entityId: null,
      bitmask: EMPTY_BITMAP,
      allocations,
    });
  }

  const next = cloneWorld(world);
  next.nextEntityId = world.nextEntityId + 1;
  next.entities.set(next.nextEntityId, { bitmask, components: filtered });

  return ok({
    created: true,
    world: next,
    register: currentRegister,
    entityId: next.nextEntityId,
    bitmask,
    allocations,
  });
}

/**
 * Release a component address back to the register.
 *
 * Entity records are left exactly as stored: an entity that incorporated
 * `address` keeps it in its component list and its bit in its mask.
 */
export function despawn(
  register: Register | undefined,
  address: Address,
  options: WorldOptions = {},
): Result<{ register: Register; removed: boolean }, RegistryError> {
  const { allocator = BitRegister, ...allocatorOptions } = options;
  return allocator.unregister(register, address, allocatorOptions);
}

export function getEntity(world: World, entityId: EntityId): EntityRecord | undefined {
  return world.entities.get(entityId);
}

// ── Systems ───────────────────────────────────────────────────────

export function validateQuery(query: Query, bitmapWidth: number): Result<Query, RegistryError> {
  if (!fitsWidth(query, bitmapWidth)) {
    return err(
      new RegistryError(
        REGISTRY_ERROR.INVALID_BITMAP,
        `Query ${query < 0n ? query.toString() : toHex(query)} does not fit a ${bitmapWidth}-bit map`,
      ),
    );
  }
  return ok(query);
}

/** Upsert the handler for `query`; an existing handler is replaced without warning. */
export function addSystem(world: World, query: Query, handler: Address): World {
  const next = cloneWorld(world);
  next.systems.set(query, handler);
  return next;
}

/** Remove the handler for exactly `query`. Absent queries return the world unchanged. */
export function removeSystem(world: World, query: Query): World {
  if (!world.systems.has(query)) return world;
  const next = cloneWorld(world);
  next.systems.delete(query);
  return next;
}

export function getSystem(world: World, query: Query): Address | undefined {
  return world.systems.get(query);
}
