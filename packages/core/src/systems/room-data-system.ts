import type { RoomName } from '@colonist/world-contract';

import { MissionDataAttribute } from '../missions/mission-types.js';
import { ensureRoomEntity } from '../room/room-entities.js';
import type { SystemDefinition, TickContext } from './system-types.js';

export const ROOM_DATA_SYSTEM_ID = 'room-data';

export interface RoomDataSystemOptions {
  readonly id?: string;
  readonly before?: readonly string[];
  readonly after?: readonly string[];
}

/**
 * Rooms worth tracking this tick: every visible room plus rooms holding a
 * flag or a construction site.
 */
export function roomsOfInterest(context: TickContext): RoomName[] {
  const names = new Set<RoomName>(context.world.visibleRooms());
  for (const room of context.world.flagRooms()) {
    names.add(room);
  }
  for (const room of context.world.constructionSiteRooms()) {
    names.add(room);
  }
  return [...names].sort();
}

/**
 * Creates room entities on first reference and refreshes the observation of
 * every visible room in place.
 */
export function createRoomDataSystem(options: RoomDataSystemOptions = {}): SystemDefinition {
  const { id = ROOM_DATA_SYSTEM_ID, before, after } = options;

  return {
    id,
    before,
    after,
    tick(context: TickContext) {
      const { store, rooms, world } = context;
      for (const name of roomsOfInterest(context)) {
        const room = ensureRoomEntity(store, rooms, name);
        const view = world.getRoom(name);
        if (view) {
          room.data.observe(view, context.tick, context.engine.username);
        }
        room.data.pruneMissions((mission) => store.has(MissionDataAttribute, mission));
      }
    },
  };
}
