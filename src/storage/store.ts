/**
 * Key-value store for the registry singletons.
 *
 * The registry keeps three keys: the genesis flag, the world and the register.
 * Values cross the store boundary by copy, so a caller can never mutate stored
 * state through a reference it was handed.
 *
 * `transaction` stages every write and applies them together when the callback
 * returns. A throw discards the staged writes, leaving the store as it was.
 */

import { StorageKey, type StoredValues } from '../types';

export interface KeyValueStore {
  get<K extends StorageKey>(key: K): StoredValues[K] | undefined;
  has(key: StorageKey): boolean;
  set<K extends StorageKey>(key: K, value: StoredValues[K]): void;
  delete(key: StorageKey): void;
  transaction<T>(fn: (tx: KeyValueStore) => T): T;
}

type Table = Partial<StoredValues>;

/** In-process store backed by a plain object. */
export class MemoryStore implements KeyValueStore {
  private data: Table = {};

  constructor(initial: Table = {}) {
    this.data = structuredClone(initial);
  }

  get<K extends StorageKey>(key: K): StoredValues[K] | undefined {
    const value = this.data[key];
    return value === undefined ? undefined : structuredClone(value);
  }

  has(key: StorageKey): boolean {
    return this.data[key] !== undefined;
  }

  set<K extends StorageKey>(key: K, value: StoredValues[K]): void {
    this.data[key] = structuredClone(value);
  }

  delete(key: StorageKey): void {
    delete this.data[key];
  }

  transaction<T>(fn: (tx: KeyValueStore) => T): T {
    const tx = new StagedTransaction(this);
    const result = fn(tx);
    tx.commit(this);
    return result;
  }

  /** Number of keys currently held. */
  get size(): number {
    return Object.values(this.data).filter((value) => value !== undefined).length;
  }
}

/**
 * Write overlay over another store. Reads see staged writes first.
 * Nested transactions join the outer one.
 */
class StagedTransaction implements KeyValueStore {
  private staged: Table = {};
  private readonly deleted = new Set<StorageKey>();

  constructor(private readonly base: KeyValueStore) {}

  get<K extends StorageKey>(key: K): StoredValues[K] | undefined {
    if (this.deleted.has(key)) return undefined;
    const value = this.staged[key];
    if (value !== undefined) return structuredClone(value);
    return this.base.get(key);
  }

  has(key: StorageKey): boolean {
    if (this.deleted.has(key)) return false;
    return this.staged[key] !== undefined || this.base.has(key);
  }

  set<K extends StorageKey>(key: K, value: StoredValues[K]): void {
    this.deleted.delete(key);
    this.staged[key] = structuredClone(value);
  }

  delete(key: StorageKey): void {
    delete this.staged[key];
    this.deleted.add(key);
  }

  transaction<T>(fn: (tx: KeyValueStore) => T): T {
    return fn(this);
  }

  commit(target: KeyValueStore): void {
    for (const key of this.deleted) target.delete(key);
    if (this.staged.genesis !== undefined) target.set(StorageKey.GENESIS, this.staged.genesis);
    if (this.staged.world !== undefined) target.set(StorageKey.WORLD, this.staged.world);
    if (this.staged.register !== undefined) target.set(StorageKey.REGISTER, this.staged.register);
  }
}
