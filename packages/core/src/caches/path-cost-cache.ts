import {
  ROOM_SIZE,
  type CostLookup,
  type ObjectKind,
  type RoomName,
  type RoomView,
} from '@colonist/world-contract';
import { z } from 'zod';

import { segmentByteLength } from '../memory/memory-arbiter.js';
import { telemetry } from '../telemetry.js';

export const IMPASSABLE_COST = 0xff;
const TILE_COUNT = ROOM_SIZE * ROOM_SIZE;
const CACHE_FORMAT_VERSION = 1;

const STRUCTURE_COSTS: Readonly<Partial<Record<ObjectKind, number>>> = Object.freeze({
  road: 1,
  wall: IMPASSABLE_COST,
  spawn: IMPASSABLE_COST,
  extension: IMPASSABLE_COST,
  tower: IMPASSABLE_COST,
  storage: IMPASSABLE_COST,
});

const cachePayloadSchema = z.object({
  version: z.literal(CACHE_FORMAT_VERSION),
  rooms: z.array(
    z.object({
      room: z.string().min(1),
      tick: z.number().int().nonnegative(),
      costs: z.string(),
    }),
  ),
});

interface RoomCostEntry {
  readonly tick: number;
  readonly costs: Uint8Array;
}

function tileIndex(x: number, y: number): number | undefined {
  if (!Number.isInteger(x) || !Number.isInteger(y)) {
    return undefined;
  }
  if (x < 0 || y < 0 || x >= ROOM_SIZE || y >= ROOM_SIZE) {
    return undefined;
  }
  return y * ROOM_SIZE + x;
}

function compareNames(left: RoomName, right: RoomName): number {
  return left < right ? -1 : left > right ? 1 : 0;
}

function sameCosts(left: Uint8Array, right: Uint8Array): boolean {
  if (left.length !== right.length) {
    return false;
  }
  for (let index = 0; index < left.length; index += 1) {
    if (left[index] !== right[index]) {
      return false;
    }
  }
  return true;
}

/**
 * Structure costs derived from the room's visible structures. Tiles with no
 * structure stay 0, leaving terrain to the path-finder.
 */
export function computeStructureCosts(room: RoomView): Uint8Array {
  const costs = new Uint8Array(TILE_COUNT);
  for (const structure of room.structures) {
    const cost = STRUCTURE_COSTS[structure.kind];
    const index = tileIndex(structure.pos.x, structure.pos.y);
    if (cost === undefined || index === undefined) {
      continue;
    }
    // impassable wins over a road on the same tile
    costs[index] = Math.max(costs[index] ?? 0, cost);
  }
  return costs;
}

/**
 * Per-room movement cost matrices. Structure costs persist through a
 * segment; transient costs (unit positions) only last for the current tick.
 * The cache is an optimization: anything that fails to decode is a miss.
 */
export class PathCostCache implements CostLookup {
  private rooms = new Map<RoomName, RoomCostEntry>();
  private transient = new Map<RoomName, Map<number, number>>();
  private dirty = false;

  get size(): number {
    return this.rooms.size;
  }

  isDirty(): boolean {
    return this.dirty;
  }

  has(room: RoomName): boolean {
    return this.rooms.has(room);
  }

  lastRefreshed(room: RoomName): number | undefined {
    return this.rooms.get(room)?.tick;
  }

  /**
   * Recomputes structure costs for a visible room. Only a change in costs
   * marks the cache for storing.
   */
  refreshRoom(room: RoomView, tick: number): void {
    const costs = computeStructureCosts(room);
    const existing = this.rooms.get(room.name);
    if (!existing || !sameCosts(existing.costs, costs)) {
      this.dirty = true;
    }
    this.rooms.set(room.name, { tick, costs });
  }

  setTransient(room: RoomName, x: number, y: number, cost: number): void {
    const index = tileIndex(x, y);
    if (index === undefined) {
      return;
    }
    let costs = this.transient.get(room);
    if (!costs) {
      costs = new Map();
      this.transient.set(room, costs);
    }
    costs.set(index, Math.min(IMPASSABLE_COST, Math.max(0, Math.floor(cost))));
  }

  clearTransient(): void {
    this.transient.clear();
  }

  costAt(room: RoomName, x: number, y: number): number | undefined {
    const index = tileIndex(x, y);
    if (index === undefined) {
      return undefined;
    }
    const structural = this.rooms.get(room)?.costs[index];
    const transient = this.transient.get(room)?.get(index);
    if (structural === undefined && transient === undefined) {
      return undefined;
    }
    return Math.max(structural ?? 0, transient ?? 0);
  }

  clear(): void {
    this.rooms = new Map();
    this.transient = new Map();
    this.dirty = false;
  }

  encode(): string {
    const rooms = [...this.rooms.entries()]
      .sort(([left], [right]) => compareNames(left, right))
      .map(([room, entry]) => ({
        room,
        tick: entry.tick,
        costs: Buffer.from(entry.costs).toString('base64'),
      }));
    return JSON.stringify({ version: CACHE_FORMAT_VERSION, rooms });
  }

  /**
   * Drops the least recently refreshed rooms until the encoded payload fits
   * `maxBytes`. Rooms refreshed on the same tick are dropped in name order.
   *
   * @returns the dropped rooms.
   */
  trimTo(maxBytes: number): RoomName[] {
    let bytes = segmentByteLength(this.encode());
    if (bytes <= maxBytes) {
      return [];
    }
    const byAge = [...this.rooms.entries()].sort(
      ([leftName, left], [rightName, right]) =>
        left.tick - right.tick || compareNames(leftName, rightName),
    );
    const dropped: RoomName[] = [];
    for (const [room] of byAge) {
      if (bytes <= maxBytes) {
        break;
      }
      this.rooms.delete(room);
      dropped.push(room);
      bytes = segmentByteLength(this.encode());
    }
    this.dirty = true;
    telemetry.recordProgress('PathCostCacheTrimmed', {
      dropped: dropped.length,
      bytes,
      limit: maxBytes,
    });
    return dropped;
  }

  /**
   * Replaces the structure costs with a stored payload. Absent or
   * undecodable payloads leave the cache empty.
   *
   * @returns whether the payload was accepted.
   */
  load(data: string | undefined): boolean {
    this.clear();
    if (data === undefined || data.length === 0) {
      return false;
    }
    const decoded = decodeCostPayload(data);
    if (!decoded) {
      telemetry.recordWarning('PathCostCacheDecodeFailed', { bytes: data.length });
      return false;
    }
    this.rooms = decoded;
    return true;
  }

  markStored(): void {
    this.dirty = false;
  }
}

function decodeCostPayload(data: string): Map<RoomName, RoomCostEntry> | undefined {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch {
    return undefined;
  }
  const parsed = cachePayloadSchema.safeParse(json);
  if (!parsed.success) {
    return undefined;
  }
  const rooms = new Map<RoomName, RoomCostEntry>();
  for (const entry of parsed.data.rooms) {
    const costs = Uint8Array.from(Buffer.from(entry.costs, 'base64'));
    if (costs.length !== TILE_COUNT) {
      return undefined;
    }
    rooms.set(entry.room, { tick: entry.tick, costs });
  }
  return rooms;
}
