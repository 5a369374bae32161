/**
 * Read-only query helpers.
 *
 * A system is relevant to an entity when the entity's composite mask contains
 * every bit of the system's query mask. These helpers only report matches;
 * they never invoke a handler.
 */

import type { Address, Bitmap, EntityId, Query, World } from '../types';
import { containsAll } from '../core/bitmap';

export function matchesQuery(entityMask: Bitmap, query: Query): boolean {
  return containsAll(entityMask, query);
}

/** Entity ids whose mask contains `query`, ascending. */
export function findMatchingEntities(world: World, query: Query): EntityId[] {
  const ids: EntityId[] = [];
  for (const [id, record] of world.entities) {
    if (matchesQuery(record.bitmask, query)) ids.push(id);
  }
  return ids.sort((a, b) => a - b);
}

/** Registered `[query, handler]` pairs relevant to one entity, in registration order. */
export function findSystemsForEntity(world: World, entityId: EntityId): Array<[Query, Address]> {
  const record = world.entities.get(entityId);
  if (!record) return [];

  const out: Array<[Query, Address]> = [];
  for (const [query, handler] of world.systems) {
    if (matchesQuery(record.bitmask, query)) out.push([query, handler]);
  }
  return out;
}
