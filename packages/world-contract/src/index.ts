import type { SegmentPlatform } from './segments.js';
import type { SpawnQueue, UnitActions, WorldView } from './world.js';

export const WORLD_CONTRACT_VERSION = 1;

export {
  MAX_ACTIVE_SEGMENTS,
  MAX_SEGMENT_BYTES,
  SEGMENT_COUNT,
  type SegmentPlatform,
} from './segments.js';
export {
  ROOM_SIZE,
  type ActionResult,
  type BodyPart,
  type ControllerReservation,
  type ControllerView,
  type CostLookup,
  type ObjectKind,
  type ObjectView,
  type Position,
  type RoomName,
  type RoomView,
  type SpawnQueue,
  type SpawnRequest,
  type TerrainKind,
  type UnitActions,
  type UnitView,
  type WorldView,
} from './world.js';

/**
 * Everything the host hands to the engine for one tick.
 */
export interface WorldHost {
  readonly world: WorldView;
  readonly actions: UnitActions;
  readonly spawns: SpawnQueue;
  readonly segments: SegmentPlatform;
}
