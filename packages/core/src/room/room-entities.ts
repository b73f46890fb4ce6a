import type { RoomName, WorldView } from '@colonist/world-contract';

import type { RoomNameIndex } from '../caches/room-name-index.js';
import type { Entity, EntityStore } from '../entity-store.js';
import { RoomData, RoomDataAttribute } from './room-data.js';

export interface RoomRef {
  readonly entity: Entity;
  readonly data: RoomData;
}

/**
 * Returns the room entity for `name`, creating it on first reference.
 */
export function ensureRoomEntity(
  store: EntityStore,
  rooms: RoomNameIndex,
  name: RoomName,
): RoomRef {
  const existing = rooms.get(name);
  const data = existing === undefined ? undefined : store.get(RoomDataAttribute, existing);
  if (existing !== undefined && data) {
    return { entity: existing, data };
  }
  const entity = store.create();
  const created = new RoomData(name);
  store.insert(RoomDataAttribute, entity, created);
  rooms.register(name, entity);
  return { entity, data: created };
}

export function getRoomRef(
  store: EntityStore,
  rooms: RoomNameIndex,
  name: RoomName,
): RoomRef | undefined {
  const entity = rooms.get(name);
  const data = entity === undefined ? undefined : store.get(RoomDataAttribute, entity);
  return entity !== undefined && data ? { entity, data } : undefined;
}

/**
 * Rooms whose last observation shows a controller owned by `username`.
 */
export function ownedRooms(
  store: EntityStore,
  rooms: RoomNameIndex,
  username: string | undefined,
): RoomRef[] {
  if (username === undefined) {
    return [];
  }
  const result: RoomRef[] = [];
  for (const name of rooms.names()) {
    const ref = getRoomRef(store, rooms, name);
    if (ref && ref.data.getObservation()?.owner === username) {
      result.push(ref);
    }
  }
  return result;
}

/** Rooms further than this are never used as spawn homes. */
export const MAX_HOME_DISTANCE = 10;

/**
 * Closest of `candidates` to `target` by room distance, within
 * {@link MAX_HOME_DISTANCE}.
 */
export function nearestRoom(
  world: WorldView,
  candidates: readonly RoomRef[],
  target: RoomName,
): RoomRef | undefined {
  let best: RoomRef | undefined;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const candidate of candidates) {
    const distance = world.roomDistance(candidate.data.name, target);
    if (distance <= MAX_HOME_DISTANCE && distance < bestDistance) {
      best = candidate;
      bestDistance = distance;
    }
  }
  return best;
}
