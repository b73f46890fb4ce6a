import type { SystemDefinition, TickContext } from './system-types.js';

export const ROOM_NAME_INDEX_SYSTEM_ID = 'room-name-index';

export interface RoomNameIndexSystemOptions {
  readonly id?: string;
  readonly before?: readonly string[];
  readonly after?: readonly string[];
}

export function createRoomNameIndexSystem(
  options: RoomNameIndexSystemOptions = {},
): SystemDefinition {
  const { id = ROOM_NAME_INDEX_SYSTEM_ID, before, after } = options;

  return {
    id,
    before,
    after,
    tick(context: TickContext) {
      context.rooms.rebuild(context.store);
    },
  };
}
