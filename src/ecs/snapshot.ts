/**
 * JSON snapshot encoder/decoder for the persisted registry state.
 * Format (version 1):
 *   genesis:  boolean
 *   world:    { name, nextEntityId, entities: [id, { bitmask, components }][], systems: [query, handler][] } | null
 *   register: { nextBit, addresses, bitToAddress: [bitIndex, address][] } | null
 * Bitmaps are `0x` hex strings; maps are entry arrays in insertion order.
 */

import { SNAPSHOT_VERSION, MAX_BITMAP_WIDTH } from '../config';
import { fitsWidth, fromHex, toHex } from '../core/bitmap';
import { REGISTRY_ERROR, RegistryError } from '../core/errors';
import type { Address, Bitmap, EntityId, EntityRecord, Query, Register, World } from '../types';
import { isValidWorldName } from './world';

export interface EncodedEntity {
  bitmask: string;
  components: Address[];
}

export interface EncodedWorld {
  name: string;
  nextEntityId: number;
  entities: Array<[EntityId, EncodedEntity]>;
  systems: Array<[string, Address]>;
}

export interface EncodedRegister {
  nextBit: number;
  addresses: Address[];
  bitToAddress: Array<[number, Address]>;
}

export interface RegistrySnapshot {
  version: number;
  genesis: boolean;
  world: EncodedWorld | null;
  register: EncodedRegister | null;
}

export interface RegistryState {
  genesis: boolean;
  world: World | undefined;
  register: Register | undefined;
}

// ── Encode ─────────────────────────────────────────────────────────

export function encodeWorld(world: World): EncodedWorld {
  return {
    name: world.name,
    nextEntityId: world.nextEntityId,
    entities: [...world.entities].map(([id, record]) => [
      id,
      { bitmask: toHex(record.bitmask), components: [...record.components] },
    ]),
    systems: [...world.systems].map(([query, handler]) => [toHex(query), handler]),
  };
}

export function encodeRegister(register: Register): EncodedRegister {
  return {
    nextBit: register.nextBit,
    addresses: [...register.addresses],
    bitToAddress: [...register.bitToAddress],
  };
}

export function encodeSnapshot(state: RegistryState): RegistrySnapshot {
  return {
    version: SNAPSHOT_VERSION,
    genesis: state.genesis,
    world: state.world ? encodeWorld(state.world) : null,
    register: state.register ? encodeRegister(state.register) : null,
  };
}

// ── Decode ─────────────────────────────────────────────────────────

function invalid(message: string): RegistryError {
  return new RegistryError(REGISTRY_ERROR.INVALID_SNAPSHOT, `Invalid snapshot: ${message}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function readAddresses(value: unknown, field: string): Address[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw invalid(`${field} must be an array of strings`);
  }
  return [...value];
}

function readPair(value: unknown, field: string): [unknown, unknown] {
  if (!Array.isArray(value) || value.length !== 2) {
    throw invalid(`${field} entries must be [key, value] pairs`);
  }
  return [value[0], value[1]];
}

function readBitmap(value: unknown, field: string, bitmapWidth: number): Bitmap {
  const mask = typeof value === 'string' ? fromHex(value) : null;
  if (mask === null) throw invalid(`${field} must be a 0x-prefixed hex string`);
  if (!fitsWidth(mask, bitmapWidth)) throw invalid(`${field} ${toHex(mask)} exceeds ${bitmapWidth} bits`);
  return mask;
}

export function decodeWorld(value: unknown, bitmapWidth: number = MAX_BITMAP_WIDTH): World {
  if (!isRecord(value)) throw invalid('world must be an object');

  const { name, nextEntityId, entities, systems } = value;
  if (typeof name !== 'string' || !isValidWorldName(name)) {
    throw invalid('world.name must be 1-32 characters of [A-Za-z0-9_]');
  }
  if (!isCount(nextEntityId)) throw invalid('world.nextEntityId must be a non-negative integer');
  if (!Array.isArray(entities)) throw invalid('world.entities must be an array');
  if (!Array.isArray(systems)) throw invalid('world.systems must be an array');

  const entityTable = new Map<EntityId, EntityRecord>();
  for (const entry of entities) {
    const [id, record] = readPair(entry, 'world.entities');
    if (!isCount(id) || id === 0 || id > nextEntityId) {
      throw invalid(`entity id ${String(id)} must be between 1 and ${nextEntityId}`);
    }
    if (!isRecord(record)) throw invalid(`entity ${id} must be an object`);
    entityTable.set(id, {
      bitmask: readBitmap(record.bitmask, `entity ${id} bitmask`, bitmapWidth),
      components: readAddresses(record.components, `entity ${id} components`),
    });
  }

  const systemTable = new Map<Query, Address>();
  for (const entry of systems) {
    const [query, handler] = readPair(entry, 'world.systems');
    if (typeof handler !== 'string') throw invalid('system handler must be a string');
    systemTable.set(readBitmap(query, 'system query', bitmapWidth), handler);
  }

  return { name, nextEntityId, entities: entityTable, systems: systemTable };
}

export function decodeRegister(value: unknown, bitmapWidth: number = MAX_BITMAP_WIDTH): Register {
  if (!isRecord(value)) throw invalid('register must be an object');

  const { nextBit, addresses, bitToAddress } = value;
  if (!isCount(nextBit) || nextBit >= bitmapWidth) {
    throw invalid(`register.nextBit must be an integer below ${bitmapWidth}`);
  }
  if (!Array.isArray(bitToAddress)) throw invalid('register.bitToAddress must be an array');

  const audit = new Map<number, Address>();
  for (const entry of bitToAddress) {
    const [bitIndex, address] = readPair(entry, 'register.bitToAddress');
    if (!isCount(bitIndex) || bitIndex === 0 || bitIndex > nextBit) {
      throw invalid(`bit index ${String(bitIndex)} must be between 1 and ${nextBit}`);
    }
    if (typeof address !== 'string') throw invalid(`bit ${bitIndex} address must be a string`);
    audit.set(bitIndex, address);
  }

  const owned = readAddresses(addresses, 'register.addresses');
  const seen = new Set<Address>();
  const audited = new Set(audit.values());
  for (const address of owned) {
    if (seen.has(address)) throw invalid(`register address ${address} is listed twice`);
    if (!audited.has(address)) throw invalid(`register address ${address} has no bit in bitToAddress`);
    seen.add(address);
  }

  return { nextBit, addresses: owned, bitToAddress: audit };
}

/** Decode and validate a snapshot document. Throws INVALID_SNAPSHOT. */
export function decodeSnapshot(value: unknown, bitmapWidth: number = MAX_BITMAP_WIDTH): RegistryState {
  if (!isRecord(value)) throw invalid('document must be an object');
  if (value.version !== SNAPSHOT_VERSION) {
    throw invalid(`unsupported version ${String(value.version)}`);
  }
  if (typeof value.genesis !== 'boolean') throw invalid('genesis must be a boolean');

  const world = value.world === null || value.world === undefined
    ? undefined
    : decodeWorld(value.world, bitmapWidth);
  const register = value.register === null || value.register === undefined
    ? undefined
    : decodeRegister(value.register, bitmapWidth);

  if (value.genesis !== (world !== undefined)) {
    throw invalid('genesis flag and world presence disagree');
  }

  return { genesis: value.genesis, world, register };
}
