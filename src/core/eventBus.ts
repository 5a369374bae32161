/**
 * Typed event bus for registry events.
 * Registry events fire after their writes are committed, so a listener that
 * throws is logged and skipped rather than failing the operation.
 */

import type { Address, Bitmap, EntityId, Query } from '../types';
import { createLogger } from './logger';

const log = createLogger('EventBus');

type Listener<T> = (payload: T) => void;

type ListenerTable<EventMap> = { [K in keyof EventMap]?: Set<Listener<EventMap[K]>> };

export class EventBus<EventMap extends { [K in keyof EventMap]: unknown }> {
  private listeners: ListenerTable<EventMap> = {};

  on<K extends keyof EventMap>(event: K, listener: Listener<EventMap[K]>): () => void {
    let set: Set<Listener<EventMap[K]>> | undefined = this.listeners[event];
    if (!set) {
      set = new Set();
      this.listeners[event] = set;
    }
    const owned = set;
    owned.add(listener);

    // Return unsubscribe function
    return () => {
      owned.delete(listener);
      if (owned.size === 0 && this.listeners[event] === owned) delete this.listeners[event];
    };
  }

  once<K extends keyof EventMap>(event: K, listener: Listener<EventMap[K]>): () => void {
    const unsub = this.on(event, (payload) => {
      unsub();
      listener(payload);
    });
    return unsub;
  }

  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void {
    const set = this.listeners[event];
    if (!set) return;
    for (const listener of [...set]) {
      try {
        listener(payload);
      } catch (error) {
        log.error(`Listener for "${String(event)}" failed:`, error);
      }
    }
  }

  off<K extends keyof EventMap>(event: K): void {
    delete this.listeners[event];
  }

  clear(): void {
    this.listeners = {};
  }
}

// ── Registry Event Map ──────────────────────────────────────────

export interface RegistryEventMap {
  genesis: { name: string };
  component_registered: { address: Address; bitIndex: number; bit: Bitmap };
  component_unregistered: { address: Address };
  entity_spawned: { entityId: EntityId; bitmask: Bitmap; components: Address[] };
  system_added: { query: Query; handler: Address; replaced: Address | null };
  system_removed: { query: Query; handler: Address };
}
