import type { BodyPart, ObjectView, RoomName, RoomView } from '@colonist/world-contract';
import { z } from 'zod';

import {
  requireEntity,
  requireMarker,
  type Entity,
  type EntityRefReader,
  type EntityRefWriter,
  type EntityStore,
} from '../entity-store.js';
import { JobDataAttribute, type JobData } from '../jobs/job-types.js';
import type { RemoteTarget } from '../jobs/movement.js';
import {
  ChildList,
  decodeMissionOwner,
  encodeOwner,
  NO_OWNER,
  OwnerSlot,
  serializedOwnerSchema,
  type MissionOwnerRef,
  type OwnerRef,
} from '../ownership.js';
import { RoomDataAttribute, type RoomData } from '../room/room-data.js';
import { TASK_OK, type TaskOutcome } from '../task-outcome.js';
import type { MissionTickContext } from '../task-types.js';

export const SpawnPriority = Object.freeze({
  HIGH: 3,
  MEDIUM: 2,
  LOW: 1,
});

export const WORKER_BODY: readonly BodyPart[] = Object.freeze(['work', 'carry', 'move']);
export const CLAIMER_BODY: readonly BodyPart[] = Object.freeze(['claim', 'move']);
export const SCOUT_BODY: readonly BodyPart[] = Object.freeze(['move']);
export const DISMANTLER_BODY: readonly BodyPart[] = Object.freeze(['work', 'work', 'move']);

/** How long a room observation is trusted when deciding ownership. */
export const OBSERVATION_TRUST_TICKS = 1000;

const markerSchema = z.number().int().positive();

export const missionBaseSchema = z.object({
  owner: serializedOwnerSchema,
  room: markerSchema,
  home: markerSchema,
  children: z.array(markerSchema),
});

export type MissionBaseData = z.infer<typeof missionBaseSchema>;

export interface MissionBaseFields {
  readonly room: Entity;
  readonly home: Entity;
  readonly owner: MissionOwnerRef;
  readonly children: ChildList;
}

export function decodeMissionBase(
  data: MissionBaseData,
  refs: EntityRefReader,
): MissionBaseFields {
  return {
    room: requireEntity(refs, data.room),
    home: requireEntity(refs, data.home),
    owner: decodeMissionOwner(data.owner, refs),
    children: ChildList.decode(data.children, refs),
  };
}

export function toRemoteTarget(object: ObjectView): RemoteTarget {
  return { id: object.id, pos: object.pos };
}

/**
 * Where energy gathered for a room ends up: its storage once built, a spawn
 * before that.
 */
export function findDeliveryTarget(view: RoomView): RemoteTarget | undefined {
  const target =
    view.structures.find((structure) => structure.kind === 'storage') ??
    view.structures.find((structure) => structure.kind === 'spawn');
  return target ? toRemoteTarget(target) : undefined;
}

/**
 * State every mission carries: the room it works on, the room it spawns
 * from, its owner and the jobs it created.
 */
export abstract class MissionBase {
  readonly room: Entity;
  readonly home: Entity;
  protected readonly owner: OwnerSlot;
  protected readonly children: ChildList;

  protected constructor(fields: MissionBaseFields) {
    this.room = fields.room;
    this.home = fields.home;
    this.owner = new OwnerSlot(fields.owner);
    this.children = fields.children;
  }

  getRoom(): Entity {
    return this.room;
  }

  getOwner(): OwnerRef {
    return this.owner.get();
  }

  ownerComplete(owner: Entity): void {
    this.owner.complete(owner);
  }

  getChildren(): readonly Entity[] {
    return this.children.list();
  }

  addChild(child: Entity): void {
    this.children.add(child);
  }

  childComplete(child: Entity): void {
    this.children.remove(child);
  }

  /** Forgets jobs that no longer exist. */
  preRun(context: MissionTickContext, _entity: Entity): TaskOutcome<undefined> {
    this.children.retain((child) => context.store.has(JobDataAttribute, child));
    return TASK_OK;
  }

  protected roomData(store: EntityStore): RoomData | undefined {
    return store.get(RoomDataAttribute, this.room);
  }

  protected roomName(store: EntityStore): RoomName {
    return this.roomData(store)?.name ?? '?';
  }

  protected homeName(store: EntityStore): RoomName | undefined {
    return store.get(RoomDataAttribute, this.home)?.name;
  }

  protected childJobs(store: EntityStore): JobData[] {
    const jobs: JobData[] = [];
    for (const child of this.children.list()) {
      const job = store.get(JobDataAttribute, child);
      if (job) {
        jobs.push(job);
      }
    }
    return jobs;
  }

  protected encodeBase(refs: EntityRefWriter): MissionBaseData {
    return {
      owner: encodeOwner(this.getOwner(), refs),
      room: requireMarker(refs, this.room),
      home: requireMarker(refs, this.home),
      children: this.children.encode(refs),
    };
  }

  protected baseFields(): MissionBaseFields {
    const owner = this.getOwner();
    return {
      room: this.room,
      home: this.home,
      owner: owner.kind === 'mission' ? NO_OWNER : owner,
      children: new ChildList(),
    };
  }
}
