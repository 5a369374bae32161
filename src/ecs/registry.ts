/**
 * Registry entry points.
 *
 * Each operation loads the singletons from the store, runs the pure world and
 * register functions on copies, and writes the results back inside one store
 * transaction. A failure throws before commit, so the store is left untouched.
 * Events fire only after a commit.
 *
 * Until genesis has run, every mutating operation is a silent no-op and
 * `getWorld` fails with NOT_INITIALIZED.
 */

import type { Address, Bitmap, EntityId, Query, Register, World } from '../types';
import { StorageKey, unwrap } from '../types';
import { validateAndLoadConfig, getEnvConfig, type RegistryConfig } from '../config';
import { EMPTY_BITMAP, toHex } from '../core/bitmap';
import { REGISTRY_ERROR, RegistryError, isCapacityError } from '../core/errors';
import { EventBus, type RegistryEventMap } from '../core/eventBus';
import { createLogger, setLogLevel } from '../core/logger';
import { MemoryStore, type KeyValueStore } from '../storage/store';
import { BitRegister, type Registered } from './register';
import { decodeSnapshot, encodeSnapshot, type RegistrySnapshot } from './snapshot';
import {
  addSystem,
  createWorld,
  despawn,
  isValidWorldName,
  removeSystem,
  spawn,
  validateQuery,
  type ComponentAllocation,
  type WorldOptions,
} from './world';

const log = createLogger('EcsRegistry');

export interface EcsRegistryOptions {
  store?: KeyValueStore;
  config?: Partial<RegistryConfig>;
  events?: EventBus<RegistryEventMap>;
  allocator?: Registered;
}

export interface SpawnReceipt {
  created: boolean;
  entityId: EntityId | null;
  bitmask: Bitmap;
  /** Addresses incorporated into the new entity. */
  components: Address[];
}

export class EcsRegistry {
  readonly config: RegistryConfig;
  readonly events: EventBus<RegistryEventMap>;
  private readonly store: KeyValueStore;
  private readonly allocator: Registered;

  constructor(options: EcsRegistryOptions = {}) {
    const { valid, config, errors } = validateAndLoadConfig(options.config);
    if (!valid) {
      throw new RegistryError(REGISTRY_ERROR.INVALID_CONFIG, `Invalid registry config: ${errors.join('; ')}`);
    }

    this.config = config;
    this.store = options.store ?? new MemoryStore();
    this.events = options.events ?? new EventBus<RegistryEventMap>();
    this.allocator = options.allocator ?? BitRegister;
    // The log level is process-wide; only an explicit setting changes it.
    if (options.config?.logLevel !== undefined) setLogLevel(config.logLevel);
  }

  /** Registry configured from ECS_* environment variables. */
  static fromEnv(
    env: Record<string, string | undefined> = process.env,
    options: Omit<EcsRegistryOptions, 'config'> = {},
  ): EcsRegistry {
    return new EcsRegistry({ ...options, config: getEnvConfig(env) });
  }

  /**
   * Registry restored from an `exportSnapshot` document. Every key of a
   * supplied store is replaced, and keys the snapshot lacks are removed.
   * Throws INVALID_SNAPSHOT.
   */
  static fromSnapshot(snapshot: unknown, options: EcsRegistryOptions = {}): EcsRegistry {
    const registry = new EcsRegistry(options);
    const state = decodeSnapshot(snapshot, registry.config.bitmapWidth);

    registry.store.transaction((tx) => {
      tx.set(StorageKey.GENESIS, state.genesis);
      if (state.world) tx.set(StorageKey.WORLD, state.world);
      else tx.delete(StorageKey.WORLD);
      if (state.register) tx.set(StorageKey.REGISTER, state.register);
      else tx.delete(StorageKey.REGISTER);
    });

    log.info(`Restored registry snapshot (genesis=${state.genesis})`);
    return registry;
  }

  private get allocatorOptions(): WorldOptions {
    return {
      allocator: this.allocator,
      bitmapWidth: this.config.bitmapWidth,
      unregisterLookup: this.config.unregisterLookup,
    };
  }

  isInitialized(): boolean {
    return this.store.get(StorageKey.GENESIS) ?? false;
  }

  // ── Genesis ───────────────────────────────────────────────────────

  /** Create the world once. Later calls are no-ops, whatever the name. */
  genesis(name: string): void {
    if (!isValidWorldName(name)) {
      throw new RegistryError(REGISTRY_ERROR.INVALID_NAME, `Invalid world name "${name}"`);
    }

    const created = this.store.transaction((tx) => {
      if (tx.get(StorageKey.GENESIS)) return false;
      tx.set(StorageKey.GENESIS, true);
      tx.set(StorageKey.WORLD, createWorld(name));
      return true;
    });

    if (!created) {
      log.debug(`genesis("${name}") ignored; world already exists`);
      return;
    }

    log.info(`World "${name}" created`);
    this.events.emit('genesis', { name });
  }

  // ── Reads ─────────────────────────────────────────────────────────

  /** Snapshot of the world. Throws NOT_INITIALIZED before genesis. */
  getWorld(): World {
    const world = this.store.get(StorageKey.WORLD);
    if (!world) throw new RegistryError(REGISTRY_ERROR.NOT_INITIALIZED);
    return world;
  }

  /** Snapshot of the register, undefined until the first component is registered. */
  getRegister(): Register | undefined {
    return this.store.get(StorageKey.REGISTER);
  }

  exportSnapshot(): RegistrySnapshot {
    return encodeSnapshot({
      genesis: this.isInitialized(),
      world: this.store.get(StorageKey.WORLD),
      register: this.store.get(StorageKey.REGISTER),
    });
  }

  // ── Entities ──────────────────────────────────────────────────────

  /**
   * Spawn an entity from the addresses that are not registered yet.
   * Throws CAPACITY_EXHAUSTED, with nothing persisted, when the bitmap runs out.
   */
  spawn(components: readonly Address[]): SpawnReceipt {
    if (!this.isInitialized()) {
      log.debug('spawn ignored; genesis has not run');
      return { created: false, entityId: null, bitmask: EMPTY_BITMAP, components: [] };
    }

    let allocations: ComponentAllocation[] = [];
    const receipt = this.store.transaction((tx): SpawnReceipt => {
      const world = this.loadWorld(tx);
      const result = spawn(world, tx.get(StorageKey.REGISTER), components, this.allocatorOptions);
      if (!result.ok && isCapacityError(result.error)) log.warn(result.error.message);
      const outcome = unwrap(result);

      allocations = outcome.allocations;
      if (outcome.register && allocations.length > 0) {
        tx.set(StorageKey.REGISTER, outcome.register);
      }
      if (outcome.created) {
        tx.set(StorageKey.WORLD, outcome.world);
      }

      return {
        created: outcome.created,
        entityId: outcome.entityId,
        bitmask: outcome.bitmask,
        components: allocations.map((allocation) => allocation.address),
      };
    });

    for (const { address, bitIndex, bit } of allocations) {
      this.events.emit('component_registered', { address, bitIndex, bit });
    }

    if (receipt.created && receipt.entityId !== null) {
      log.debug(`Spawned entity ${receipt.entityId} with mask ${toHex(receipt.bitmask)}`);
      this.events.emit('entity_spawned', {
        entityId: receipt.entityId,
        bitmask: receipt.bitmask,
        components: [...receipt.components],
      });
    } else {
      log.debug('spawn created nothing; every component already owns a bit');
    }

    return receipt;
  }

  /**
   * Release a component address from the register.
   * Entity records that incorporated it are left as they are.
   * Throws REGISTER_MISSING when no component was ever registered.
   */
  despawn(address: Address): void {
    if (!this.isInitialized()) {
      log.debug('despawn ignored; genesis has not run');
      return;
    }

    const removed = this.store.transaction((tx) => {
      const release = unwrap(despawn(tx.get(StorageKey.REGISTER), address, this.allocatorOptions));
      if (release.removed) tx.set(StorageKey.REGISTER, release.register);
      return release.removed;
    });

    if (!removed) {
      log.debug(`despawn(${address}) found nothing to release`);
      return;
    }

    this.events.emit('component_unregistered', { address });
  }

  // ── Systems ───────────────────────────────────────────────────────

  /** Register `handler` under `query`, replacing any handler already there. */
  addSystem(query: Query, handler: Address): void {
    if (!this.isInitialized()) {
      log.debug('addSystem ignored; genesis has not run');
      return;
    }

    unwrap(validateQuery(query, this.config.bitmapWidth));

    const replaced = this.store.transaction((tx) => {
      const world = this.loadWorld(tx);
      const previous = world.systems.get(query) ?? null;
      tx.set(StorageKey.WORLD, addSystem(world, query, handler));
      return previous;
    });

    if (replaced !== null && replaced !== handler) {
      log.debug(`System under ${toHex(query)} replaced: ${replaced} -> ${handler}`);
    }
    this.events.emit('system_added', { query, handler, replaced });
  }

  removeSystem(query: Query): void {
    if (!this.isInitialized()) {
      log.debug('removeSystem ignored; genesis has not run');
      return;
    }

    const removed = this.store.transaction((tx) => {
      const world = this.loadWorld(tx);
      const handler = world.systems.get(query);
      if (handler === undefined) return null;
      tx.set(StorageKey.WORLD, removeSystem(world, query));
      return handler;
    });

    if (removed !== null) {
      this.events.emit('system_removed', { query, handler: removed });
    }
  }

  /** Genesis flag set without a world means the store was tampered with. */
  private loadWorld(tx: KeyValueStore): World {
    const world = tx.get(StorageKey.WORLD);
    if (!world) {
      throw new RegistryError(REGISTRY_ERROR.NOT_INITIALIZED, 'Genesis flag is set but the world record is missing');
    }
    return world;
  }
}
