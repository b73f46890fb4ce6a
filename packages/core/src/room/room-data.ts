import type { RoomName, RoomView } from '@colonist/world-contract';
import { z } from 'zod';

import {
  defineAttribute,
  type Entity,
  type EntityRefReader,
  type EntityRefWriter,
} from '../entity-store.js';
import { ChildList } from '../ownership.js';

const reservationSchema = z.object({
  username: z.string(),
  ticksToEnd: z.number().int().nonnegative(),
});

const tileObjectSchema = z.object({
  id: z.string().min(1),
  x: z.number().int(),
  y: z.number().int(),
});

const observationSchema = z.object({
  tick: z.number().int().nonnegative(),
  owner: z.string().optional(),
  reservation: reservationSchema.optional(),
  controller: tileObjectSchema.extend({ level: z.number().int().nonnegative() }).optional(),
  sources: z.array(tileObjectSchema),
  hostileUnitCount: z.number().int().nonnegative(),
  sourceKeepers: z.boolean(),
  foreignStructureCount: z.number().int().nonnegative(),
  exits: z.array(z.string()),
  constructionSiteCount: z.number().int().nonnegative(),
});

export const roomDataSchema = z.object({
  name: z.string().min(1),
  missions: z.array(z.number().int().positive()),
  observation: observationSchema.optional(),
});

/**
 * Last observation of a room, kept so rooms out of sight can still be
 * reasoned about.
 */
export type RoomObservation = z.infer<typeof observationSchema>;

/**
 * Snapshot of the parts of a room view that stay useful once the room is
 * out of sight. `username` decides which structures count as foreign.
 */
export function observeRoom(
  view: RoomView,
  tick: number,
  username?: string,
): RoomObservation {
  const controller = view.controller;
  return {
    tick,
    ...(controller?.owner !== undefined ? { owner: controller.owner } : {}),
    ...(controller?.reservation ? { reservation: { ...controller.reservation } } : {}),
    ...(controller
      ? {
          controller: {
            id: controller.id,
            x: controller.pos.x,
            y: controller.pos.y,
            level: controller.level,
          },
        }
      : {}),
    sources: view.sources.map((source) => ({
      id: source.id,
      x: source.pos.x,
      y: source.pos.y,
    })),
    hostileUnitCount: view.hostileUnitCount,
    sourceKeepers: view.sourceKeepers,
    foreignStructureCount: view.structures.filter(
      (structure) => structure.owner !== undefined && structure.owner !== username,
    ).length,
    exits: [...view.exits],
    constructionSiteCount: view.constructionSites.length,
  };
}

/**
 * Per-room record. Created the first time a room is referenced and never
 * destroyed; the missions attached to the room are tracked here so
 * directives can check for an existing mission of a kind.
 */
export class RoomData {
  private observation: RoomObservation | undefined;
  private readonly missions: ChildList;

  constructor(
    readonly name: RoomName,
    missions: ChildList = new ChildList(),
    observation?: RoomObservation,
  ) {
    this.missions = missions;
    this.observation = observation;
  }

  observe(view: RoomView, tick: number, username?: string): void {
    this.observation = observeRoom(view, tick, username);
  }

  getObservation(): RoomObservation | undefined {
    return this.observation;
  }

  isVisible(tick: number): boolean {
    return this.observation?.tick === tick;
  }

  getMissions(): readonly Entity[] {
    return this.missions.list();
  }

  addMission(mission: Entity): void {
    this.missions.add(mission);
  }

  removeMission(mission: Entity): boolean {
    return this.missions.remove(mission);
  }

  /**
   * Drops mission entries rejected by `keep`.
   *
   * @returns the removed entries.
   */
  pruneMissions(keep: (mission: Entity) => boolean): Entity[] {
    return this.missions.retain(keep);
  }

  encode(refs: EntityRefWriter): z.infer<typeof roomDataSchema> {
    return {
      name: this.name,
      missions: this.missions.encode(refs),
      ...(this.observation ? { observation: this.observation } : {}),
    };
  }

  static decode(data: unknown, refs: EntityRefReader): RoomData {
    const parsed = roomDataSchema.parse(data);
    return new RoomData(
      parsed.name,
      ChildList.decode(parsed.missions, refs),
      parsed.observation,
    );
  }
}

export const RoomDataAttribute = defineAttribute<RoomData>('room.data', {
  encode: (value, refs) => value.encode(refs),
  decode: (data, refs) => RoomData.decode(data, refs),
});
