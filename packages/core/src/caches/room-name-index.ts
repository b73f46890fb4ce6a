import type { RoomName } from '@colonist/world-contract';

import type { Entity, EntityStore } from '../entity-store.js';
import { RoomDataAttribute } from '../room/room-data.js';

/**
 * Room name to room entity. Rebuilt from scratch every tick rather than
 * maintained incrementally.
 */
export class RoomNameIndex {
  private entities = new Map<RoomName, Entity>();

  rebuild(store: EntityStore): void {
    const next = new Map<RoomName, Entity>();
    for (const entity of store.entitiesWith(RoomDataAttribute)) {
      const room = store.get(RoomDataAttribute, entity);
      if (room) {
        next.set(room.name, entity);
      }
    }
    this.entities = next;
  }

  /** Makes a room created this tick resolvable before the next rebuild. */
  register(name: RoomName, entity: Entity): void {
    this.entities.set(name, entity);
  }

  get(name: RoomName): Entity | undefined {
    return this.entities.get(name);
  }

  names(): RoomName[] {
    return [...this.entities.keys()];
  }

  get size(): number {
    return this.entities.size;
  }

  clear(): void {
    this.entities = new Map();
  }
}
