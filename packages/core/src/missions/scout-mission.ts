import { z } from 'zod';

import type { Entity, EntityRefReader, EntityRefWriter } from '../entity-store.js';
import { ScoutJob } from '../jobs/scout-job.js';
import {
  RUNNING,
  SUCCESS,
  taskFailure,
  taskSuccess,
  type TaskOutcome,
  type TaskRunResult,
} from '../task-outcome.js';
import type { MissionTickContext } from '../task-types.js';
import { telemetry } from '../telemetry.js';
import {
  decodeMissionBase,
  MissionBase,
  missionBaseSchema,
  SCOUT_BODY,
  SpawnPriority,
  type MissionBaseFields,
} from './mission-base.js';
import type { MissionCapability, MissionData } from './mission-types.js';

const UNIT_LIFETIME = 1500;
const FRESH_OBSERVATION_TICKS = 10;
export const MAX_SCOUT_ATTEMPTS = 4;

export const scoutMissionSchema = missionBaseSchema.extend({
  spawned: z.number().int().nonnegative(),
  nextSpawn: z.number().int().nonnegative().nullable(),
});

/**
 * Backoff before the next scout: a quarter lifetime per scout already sent,
 * capped at three lifetimes.
 */
export function nextScoutDelay(spawned: number): number {
  return Math.min(spawned * (UNIT_LIFETIME / 4), UNIT_LIFETIME * 3);
}

/**
 * Gets fresh eyes on a room. Completes once the room has been observed
 * recently, or gives up after {@link MAX_SCOUT_ATTEMPTS} scouts.
 */
export class ScoutMission extends MissionBase implements MissionCapability {
  private spawned: number;
  private nextSpawn: number | undefined;

  constructor(fields: MissionBaseFields, spawned = 0, nextSpawn?: number) {
    super(fields);
    this.spawned = spawned;
    this.nextSpawn = nextSpawn;
  }

  get spawnedScouts(): number {
    return this.spawned;
  }

  describe(context: MissionTickContext): string {
    const wait = Math.max(0, (this.nextSpawn ?? context.tick) - context.tick);
    return `Scout ${this.roomName(context.store)} - scouts ${this.children.size} - next spawn ${wait}`;
  }

  run(context: MissionTickContext, _entity: Entity): TaskOutcome<TaskRunResult<MissionData>> {
    const roomData = this.roomData(context.store);
    if (!roomData) {
      return taskFailure('ROOM_MISSING', 'Scout target has no room data.');
    }
    const observation = roomData.getObservation();
    if (observation && observation.tick >= context.tick - FRESH_OBSERVATION_TICKS) {
      return taskSuccess(SUCCESS);
    }
    if (this.spawned >= MAX_SCOUT_ATTEMPTS && this.children.size === 0) {
      telemetry.recordWarning('ScoutMissionAbandoned', {
        room: roomData.name,
        attempts: this.spawned,
      });
      return taskSuccess(SUCCESS);
    }
    const home = this.homeName(context.store);
    if (home === undefined) {
      return taskFailure('HOME_MISSING', 'Scout mission has no home room.');
    }

    const ready = this.nextSpawn === undefined || context.tick >= this.nextSpawn;
    if (this.children.size === 0 && ready) {
      const tick = context.tick;
      context.requestUnit({
        room: home,
        label: 'scout',
        body: SCOUT_BODY,
        priority: SpawnPriority.LOW,
        job: (owner) => ({ kind: 'scout', job: new ScoutJob(roomData.name, owner) }),
        onSpawned: () => {
          this.spawned += 1;
          this.nextSpawn = tick + nextScoutDelay(this.spawned);
        },
      });
    }
    return taskSuccess(RUNNING);
  }

  encode(refs: EntityRefWriter): z.infer<typeof scoutMissionSchema> {
    return {
      ...this.encodeBase(refs),
      spawned: this.spawned,
      nextSpawn: this.nextSpawn ?? null,
    };
  }

  static decode(data: z.infer<typeof scoutMissionSchema>, refs: EntityRefReader): ScoutMission {
    return new ScoutMission(
      decodeMissionBase(data, refs),
      data.spawned,
      data.nextSpawn ?? undefined,
    );
  }
}
