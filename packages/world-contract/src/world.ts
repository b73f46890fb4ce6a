export type RoomName = string;

/** Rooms are square grids of this many tiles per side. */
export const ROOM_SIZE = 50;

export interface Position {
  readonly x: number;
  readonly y: number;
  readonly room: RoomName;
}

export type BodyPart = 'move' | 'work' | 'carry' | 'claim' | 'attack';

export type ObjectKind =
  | 'source'
  | 'controller'
  | 'container'
  | 'storage'
  | 'spawn'
  | 'extension'
  | 'tower'
  | 'road'
  | 'wall'
  | 'construction-site';

export interface ObjectView {
  readonly id: string;
  readonly kind: ObjectKind;
  readonly pos: Position;
  readonly energy?: number;
  readonly energyCapacity?: number;
  readonly hits?: number;
  readonly owner?: string;
}

export interface ControllerReservation {
  readonly username: string;
  readonly ticksToEnd: number;
}

export interface ControllerView extends ObjectView {
  readonly kind: 'controller';
  readonly level: number;
  /** Set when the controller belongs to the agent's own account. */
  readonly my?: boolean;
  readonly reservation?: ControllerReservation;
}

export type TerrainKind = 'plain' | 'swamp' | 'wall';

export interface RoomView {
  readonly name: RoomName;
  readonly controller?: ControllerView;
  readonly sources: readonly ObjectView[];
  readonly structures: readonly ObjectView[];
  readonly constructionSites: readonly ObjectView[];
  readonly hostileUnitCount: number;
  readonly sourceKeepers: boolean;
  readonly exits: readonly RoomName[];
  terrainAt(x: number, y: number): TerrainKind;
}

export interface UnitView {
  readonly name: string;
  readonly pos: Position;
  readonly spawning: boolean;
  readonly energy: number;
  readonly energyCapacity: number;
  readonly ticksToLive?: number;
}

/**
 * Read-only observation of the world for the current tick. Every value is a
 * fresh observation; nothing is retained across ticks by the host.
 */
export interface WorldView {
  readonly time: number;
  getUnit(name: string): UnitView | undefined;
  getRoom(name: RoomName): RoomView | undefined;
  getObject(id: string): ObjectView | undefined;
  visibleRooms(): readonly RoomName[];
  flagRooms(): readonly RoomName[];
  constructionSiteRooms(): readonly RoomName[];
  roomDistance(from: RoomName, to: RoomName): number;
}

export type ActionResult =
  | 'ok'
  | 'not-in-range'
  | 'invalid-target'
  | 'not-enough-resources'
  | 'full'
  | 'busy'
  | 'no-body-part';

/**
 * Per-tile movement costs handed to the host's path-finder. `undefined` means
 * no opinion; 255 marks an impassable tile.
 */
export interface CostLookup {
  costAt(room: RoomName, x: number, y: number): number | undefined;
}

/**
 * Fire-and-forget unit actions. Results only report whether the host accepted
 * the intent; effects become observable on a later tick.
 */
export interface UnitActions {
  moveTo(
    unit: string,
    target: Position,
    range: number,
    costs?: CostLookup,
  ): ActionResult;
  harvest(unit: string, targetId: string): ActionResult;
  transfer(unit: string, targetId: string): ActionResult;
  withdraw(unit: string, targetId: string): ActionResult;
  build(unit: string, targetId: string): ActionResult;
  dismantle(unit: string, targetId: string): ActionResult;
  upgradeController(unit: string, targetId: string): ActionResult;
  claimController(unit: string, targetId: string): ActionResult;
  reserveController(unit: string, targetId: string): ActionResult;
  signController(unit: string, targetId: string, text: string): ActionResult;
}

export interface SpawnRequest {
  readonly label: string;
  readonly body: readonly BodyPart[];
  readonly priority: number;
  /** Invoked by the spawn queue once a unit has been started for this request. */
  readonly onSpawn: (unitName: string) => void;
}

/**
 * Requests last for the tick they were made in; the host starts at most one
 * unit per request and drops the rest at the end of the tick.
 */
export interface SpawnQueue {
  request(room: RoomName, request: SpawnRequest): void;
}
