import type {
  ActionResult,
  ControllerView,
  CostLookup,
  ObjectView,
  Position,
  RoomName,
  RoomView,
  SegmentPlatform,
  SpawnQueue,
  SpawnRequest,
  TerrainKind,
  UnitActions,
  UnitView,
  WorldHost,
  WorldView,
} from '@colonist/world-contract';

import { PathCostCache } from './caches/path-cost-cache.js';
import { RoomNameIndex } from './caches/room-name-index.js';
import { createEngineContext, type EngineConfigOverrides } from './config.js';
import { DescribeLog } from './diagnostics/describe-sink.js';
import { EntityStore, type Entity } from './entity-store.js';
import { JobDataAttribute } from './jobs/job-types.js';
import { MemoryArbiter } from './memory/memory-arbiter.js';
import type { TickContext } from './systems/system-types.js';

/**
 * Segment platform held in memory. Activation requests take effect on
 * {@link InMemorySegmentPlatform.advanceTick}, mirroring the host's one-tick
 * latency; the active set persists until replaced.
 */
export class InMemorySegmentPlatform implements SegmentPlatform {
  private readonly data = new Map<number, string>();
  private active = new Set<number>();
  private pending: readonly number[] | undefined;
  readonly activationRequests: number[][] = [];

  constructor(initial: Readonly<Record<number, string>> = {}) {
    for (const [segment, value] of Object.entries(initial)) {
      this.data.set(Number(segment), value);
    }
  }

  activeSegments(): readonly number[] {
    return [...this.active].sort((left, right) => left - right);
  }

  read(segment: number): string | undefined {
    return this.active.has(segment) ? this.data.get(segment) : undefined;
  }

  write(segment: number, data: string): void {
    this.data.set(segment, data);
  }

  setActiveSegments(segments: readonly number[]): void {
    this.pending = [...segments];
    this.activationRequests.push([...segments]);
  }

  advanceTick(): void {
    if (this.pending) {
      this.active = new Set(this.pending);
      this.pending = undefined;
    }
  }

  activateNow(segments: readonly number[]): void {
    this.active = new Set(segments);
  }

  /** Raw content regardless of activation. */
  stored(segment: number): string | undefined {
    return this.data.get(segment);
  }
}

export interface RoomFixture {
  readonly controller?: Omit<ControllerView, 'kind' | 'pos'> & { readonly pos?: Position };
  readonly sources?: readonly { readonly id: string; readonly x: number; readonly y: number }[];
  readonly structures?: readonly ObjectView[];
  readonly constructionSites?: readonly ObjectView[];
  readonly hostileUnitCount?: number;
  readonly sourceKeepers?: boolean;
  readonly exits?: readonly RoomName[];
  readonly walls?: readonly { readonly x: number; readonly y: number }[];
}

export interface RecordedAction {
  readonly action: keyof UnitActions;
  readonly unit: string;
  readonly target: string;
  readonly range?: number;
}

export interface RecordedSpawn {
  readonly room: RoomName;
  readonly request: SpawnRequest;
}

type MutableUnit = {
  name: string;
  pos: Position;
  spawning: boolean;
  energy: number;
  energyCapacity: number;
  ticksToLive?: number;
};

/**
 * World stand-in: a world view, a recorder of unit actions and a spawn
 * queue whose requests complete on {@link InMemoryWorld.fulfilSpawns}.
 */
export class InMemoryWorld implements WorldView, UnitActions, SpawnQueue {
  time = 1;
  readonly actionLog: RecordedAction[] = [];
  readonly spawnLog: RecordedSpawn[] = [];
  private readonly rooms = new Map<RoomName, RoomView>();
  private readonly units = new Map<string, MutableUnit>();
  private readonly flags = new Set<RoomName>();
  private readonly siteRooms = new Set<RoomName>();
  private pendingSpawns: RecordedSpawn[] = [];
  private readonly results = new Map<keyof UnitActions, ActionResult>();
  private spawnCounter = 0;

  addRoom(name: RoomName, fixture: RoomFixture = {}): RoomView {
    const walls = new Set(
      (fixture.walls ?? []).map((tile) => tile.y * 50 + tile.x),
    );
    const controller: ControllerView | undefined = fixture.controller
      ? {
          ...fixture.controller,
          kind: 'controller',
          pos: fixture.controller.pos ?? { x: 25, y: 25, room: name },
        }
      : undefined;
    const room: RoomView = {
      name,
      ...(controller ? { controller } : {}),
      sources: (fixture.sources ?? []).map((source) => ({
        id: source.id,
        kind: 'source' as const,
        pos: { x: source.x, y: source.y, room: name },
        energy: 3000,
        energyCapacity: 3000,
      })),
      structures: fixture.structures ?? [],
      constructionSites: fixture.constructionSites ?? [],
      hostileUnitCount: fixture.hostileUnitCount ?? 0,
      sourceKeepers: fixture.sourceKeepers ?? false,
      exits: fixture.exits ?? [],
      terrainAt(x: number, y: number): TerrainKind {
        return walls.has(y * 50 + x) ? 'wall' : 'plain';
      },
    };
    this.rooms.set(name, room);
    if (room.constructionSites.length > 0) {
      this.siteRooms.add(name);
    }
    return room;
  }

  removeRoom(name: RoomName): void {
    this.rooms.delete(name);
  }

  addFlag(room: RoomName): void {
    this.flags.add(room);
  }

  removeFlag(room: RoomName): void {
    this.flags.delete(room);
  }

  addUnit(
    name: string,
    pos: Position,
    overrides: Partial<Omit<MutableUnit, 'name' | 'pos'>> = {},
  ): UnitView {
    const unit: MutableUnit = {
      name,
      pos,
      spawning: false,
      energy: 0,
      energyCapacity: 50,
      ...overrides,
    };
    this.units.set(name, unit);
    return unit;
  }

  updateUnit(name: string, update: Partial<Omit<MutableUnit, 'name'>>): void {
    const unit = this.units.get(name);
    if (unit) {
      Object.assign(unit, update);
    }
  }

  removeUnit(name: string): void {
    this.units.delete(name);
  }

  setActionResult(action: keyof UnitActions, result: ActionResult): void {
    this.results.set(action, result);
  }

  /** Starts a unit for every queued spawn request, invoking its callback. */
  fulfilSpawns(): string[] {
    const started: string[] = [];
    const pending = this.pendingSpawns;
    this.pendingSpawns = [];
    for (const { room, request } of pending) {
      this.spawnCounter += 1;
      const name = `${request.label}-${this.spawnCounter}`;
      this.addUnit(name, { x: 25, y: 25, room }, { spawning: true });
      request.onSpawn(name);
      started.push(name);
    }
    return started;
  }

  pendingSpawnCount(): number {
    return this.pendingSpawns.length;
  }

  /** End of tick: unfulfilled requests lapse. */
  dropSpawnRequests(): void {
    this.pendingSpawns = [];
  }

  getUnit(name: string): UnitView | undefined {
    return this.units.get(name);
  }

  getRoom(name: RoomName): RoomView | undefined {
    return this.rooms.get(name);
  }

  getObject(id: string): ObjectView | undefined {
    for (const room of this.rooms.values()) {
      if (room.controller?.id === id) {
        return room.controller;
      }
      const found =
        room.sources.find((object) => object.id === id) ??
        room.structures.find((object) => object.id === id) ??
        room.constructionSites.find((object) => object.id === id);
      if (found) {
        return found;
      }
    }
    return undefined;
  }

  visibleRooms(): readonly RoomName[] {
    return [...this.rooms.keys()];
  }

  flagRooms(): readonly RoomName[] {
    return [...this.flags];
  }

  constructionSiteRooms(): readonly RoomName[] {
    return [...this.siteRooms].filter((room) => this.rooms.has(room));
  }

  roomDistance(from: RoomName, to: RoomName): number {
    if (from === to) {
      return 0;
    }
    const visited = new Set<RoomName>([from]);
    let frontier: RoomName[] = [from];
    for (let distance = 1; frontier.length > 0; distance += 1) {
      const next: RoomName[] = [];
      for (const name of frontier) {
        for (const exit of this.rooms.get(name)?.exits ?? []) {
          if (exit === to) {
            return distance;
          }
          if (!visited.has(exit)) {
            visited.add(exit);
            next.push(exit);
          }
        }
      }
      frontier = next;
    }
    return Number.POSITIVE_INFINITY;
  }

  request(room: RoomName, request: SpawnRequest): void {
    const entry = { room, request };
    this.spawnLog.push(entry);
    this.pendingSpawns.push(entry);
  }

  moveTo(unit: string, target: Position, range: number, _costs?: CostLookup): ActionResult {
    return this.record('moveTo', unit, `${target.room}:${target.x},${target.y}`, range);
  }

  harvest(unit: string, targetId: string): ActionResult {
    return this.record('harvest', unit, targetId);
  }

  transfer(unit: string, targetId: string): ActionResult {
    return this.record('transfer', unit, targetId);
  }

  withdraw(unit: string, targetId: string): ActionResult {
    return this.record('withdraw', unit, targetId);
  }

  build(unit: string, targetId: string): ActionResult {
    return this.record('build', unit, targetId);
  }

  dismantle(unit: string, targetId: string): ActionResult {
    return this.record('dismantle', unit, targetId);
  }

  upgradeController(unit: string, targetId: string): ActionResult {
    return this.record('upgradeController', unit, targetId);
  }

  claimController(unit: string, targetId: string): ActionResult {
    return this.record('claimController', unit, targetId);
  }

  reserveController(unit: string, targetId: string): ActionResult {
    return this.record('reserveController', unit, targetId);
  }

  signController(unit: string, targetId: string, _text: string): ActionResult {
    return this.record('signController', unit, targetId);
  }

  actionsOf(unit: string): RecordedAction[] {
    return this.actionLog.filter((entry) => entry.unit === unit);
  }

  private record(
    action: keyof UnitActions,
    unit: string,
    target: string,
    range?: number,
  ): ActionResult {
    this.actionLog.push(
      range === undefined ? { action, unit, target } : { action, unit, target, range },
    );
    return this.results.get(action) ?? 'ok';
  }
}

export function createWorldHost(
  world: InMemoryWorld,
  segments: SegmentPlatform = new InMemorySegmentPlatform(),
): WorldHost {
  return { world, actions: world, spawns: world, segments };
}

export interface TestTickContextOptions {
  readonly world?: InMemoryWorld;
  readonly store?: EntityStore;
  readonly platform?: SegmentPlatform;
  readonly username?: string;
  readonly config?: EngineConfigOverrides;
}

export interface TestTickContext extends TickContext {
  readonly world: InMemoryWorld;
  readonly describe: DescribeLog;
}

/**
 * Creates a TickContext for testing. The tick is the world's `time` and the
 * store is moved onto it.
 */
export function createTestTickContext(options: TestTickContextOptions = {}): TestTickContext {
  const world = options.world ?? new InMemoryWorld();
  const store = options.store ?? new EntityStore();
  const engine = createEngineContext(options.config, options.username ?? 'tester');
  store.beginTick(world.time);
  return {
    tick: world.time,
    store,
    world,
    actions: world,
    spawns: world,
    engine,
    rooms: new RoomNameIndex(),
    pathCosts: new PathCostCache(),
    memory: new MemoryArbiter(
      options.platform ?? new InMemorySegmentPlatform(),
      engine.config.segments,
    ),
    describe: new DescribeLog(),
  };
}

/**
 * Returns a context for the next tick sharing every long-lived part of
 * `context`.
 */
export function nextTick(context: TestTickContext): TestTickContext {
  context.world.time += 1;
  context.world.dropSpawnRequests();
  context.store.beginTick(context.world.time);
  context.describe.clear();
  return { ...context, tick: context.world.time };
}

/** Phase of the job held by `entity`, or `undefined` once the job is gone. */
export function jobPhase(store: EntityStore, entity: Entity): { readonly type: string } | undefined {
  return store.get(JobDataAttribute, entity)?.job.phase;
}
