import { z } from 'zod';

import type { Entity, EntityRefReader, EntityRefWriter } from '../entity-store.js';
import { DismantleJob, findDismantleTargets } from '../jobs/dismantle-job.js';
import {
  RUNNING,
  SUCCESS,
  taskFailure,
  taskSuccess,
  type TaskOutcome,
  type TaskRunResult,
} from '../task-outcome.js';
import type { MissionTickContext } from '../task-types.js';
import {
  decodeMissionBase,
  DISMANTLER_BODY,
  MissionBase,
  missionBaseSchema,
  SpawnPriority,
  type MissionBaseFields,
} from './mission-base.js';
import type { MissionCapability, MissionData } from './mission-types.js';

export const dismantleMissionSchema = missionBaseSchema;

/**
 * Clears foreign structures out of a room, one dismantler at a time.
 */
export class DismantleMission extends MissionBase implements MissionCapability {
  constructor(fields: MissionBaseFields) {
    super(fields);
  }

  describe(context: MissionTickContext): string {
    return `Dismantle ${this.roomName(context.store)} - dismantlers ${this.children.size}`;
  }

  run(context: MissionTickContext, _entity: Entity): TaskOutcome<TaskRunResult<MissionData>> {
    const roomData = this.roomData(context.store);
    if (!roomData) {
      return taskFailure('ROOM_MISSING', 'Dismantle target has no room data.');
    }
    const view = context.world.getRoom(roomData.name);
    if (view && findDismantleTargets(view.structures, context.engine.username).length === 0) {
      return taskSuccess(SUCCESS);
    }
    const home = this.homeName(context.store);
    if (home === undefined) {
      return taskFailure('HOME_MISSING', 'Dismantle mission has no home room.');
    }
    if (this.children.size === 0) {
      context.requestUnit({
        room: home,
        label: 'dismantler',
        body: DISMANTLER_BODY,
        priority: SpawnPriority.LOW,
        job: (owner) => ({ kind: 'dismantle', job: new DismantleJob(roomData.name, owner) }),
      });
    }
    return taskSuccess(RUNNING);
  }

  encode(refs: EntityRefWriter): z.infer<typeof dismantleMissionSchema> {
    return this.encodeBase(refs);
  }

  static decode(
    data: z.infer<typeof dismantleMissionSchema>,
    refs: EntityRefReader,
  ): DismantleMission {
    return new DismantleMission(decodeMissionBase(data, refs));
  }
}
