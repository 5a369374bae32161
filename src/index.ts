/**
 * Public API.
 *
 * `EcsRegistry` is the entry point most callers need. The pure world and
 * register functions are exported for hosts that manage storage themselves.
 */

export { EcsRegistry } from './ecs/registry';
export type { EcsRegistryOptions, SpawnReceipt } from './ecs/registry';

// Aggregates
export {
  createWorld, cloneWorld, isValidWorldName,
  spawn, despawn, getEntity,
  addSystem, removeSystem, getSystem, validateQuery,
} from './ecs/world';
export type { WorldOptions, SpawnOutcome, ComponentAllocation } from './ecs/world';

export {
  BitRegister, createRegister, cloneRegister,
  registerComponent, unregisterComponent,
  isRegistered, addressForBit, remainingCapacity,
} from './ecs/register';
export type { Registered, AllocatorOptions, Allocation, Release } from './ecs/register';

// Queries
export { matchesQuery, findMatchingEntities, findSystemsForEntity } from './ecs/query';

// Snapshots
export {
  encodeSnapshot, decodeSnapshot,
  encodeWorld, decodeWorld,
  encodeRegister, decodeRegister,
} from './ecs/snapshot';
export type { RegistrySnapshot, RegistryState, EncodedWorld, EncodedRegister, EncodedEntity } from './ecs/snapshot';

// Storage
export { MemoryStore } from './storage/store';
export type { KeyValueStore } from './storage/store';

// Bitmaps
export {
  EMPTY_BITMAP, bitAt, fitsIndex, fitsWidth,
  union, containsAll, intersects, bitIndices, popcount, toHex, fromHex,
} from './core/bitmap';

// Errors, events, logging, config
export { RegistryError, REGISTRY_ERROR, isRegistryError, isCapacityError, isPreconditionError } from './core/errors';
export type { RegistryErrorCode } from './core/errors';
export { EventBus } from './core/eventBus';
export type { RegistryEventMap } from './core/eventBus';
export { createLogger, setLogLevel, getLogLevel, isLogLevel, LOG_LEVELS } from './core/logger';
export type { Logger, LogLevel } from './core/logger';
export {
  validateAndLoadConfig, getEnvConfig, DEFAULT_REGISTRY_CONFIG,
  MAX_BITMAP_WIDTH, MIN_BITMAP_WIDTH, DEFAULT_BITMAP_WIDTH,
} from './config';
export type { RegistryConfig, UnregisterLookup, ConfigValidationResult } from './config';

// Types
export { StorageKey, ok, err, isOk, unwrap } from './types';
export type {
  Address, Bitmap, Query, EntityId, EntityRecord, World, Register, StoredValues, Result,
} from './types';
