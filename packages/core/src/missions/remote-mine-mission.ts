import { z } from 'zod';

import type { Entity, EntityRefReader, EntityRefWriter } from '../entity-store.js';
import { HarvestJob } from '../jobs/harvest-job.js';
import {
  RUNNING,
  SUCCESS,
  taskFailure,
  taskSuccess,
  type TaskOutcome,
  type TaskRunResult,
} from '../task-outcome.js';
import type { MissionTickContext } from '../task-types.js';
import { isClaimedByOther } from './claim-mission.js';
import {
  decodeMissionBase,
  findDeliveryTarget,
  MissionBase,
  missionBaseSchema,
  SpawnPriority,
  WORKER_BODY,
  type MissionBaseFields,
} from './mission-base.js';
import type { MissionCapability, MissionData } from './mission-types.js';

export const remoteMineMissionSchema = missionBaseSchema;

/**
 * Harvests the sources of a neighbouring room and carries the energy home.
 */
export class RemoteMineMission extends MissionBase implements MissionCapability {
  constructor(fields: MissionBaseFields) {
    super(fields);
  }

  describe(context: MissionTickContext): string {
    return `Remote mine ${this.roomName(context.store)} - miners ${this.children.size}`;
  }

  run(context: MissionTickContext, _entity: Entity): TaskOutcome<TaskRunResult<MissionData>> {
    const roomData = this.roomData(context.store);
    const observation = roomData?.getObservation();
    if (!roomData || !observation) {
      return taskFailure('ROOM_NOT_OBSERVED', 'Remote mine target has not been observed.');
    }
    const username = context.engine.username;
    if (username !== undefined && observation.owner === username) {
      // claimed since; the colony mission takes over
      return taskSuccess(SUCCESS);
    }
    if (isClaimedByOther(observation, username)) {
      return taskSuccess(SUCCESS);
    }
    if (observation.hostileUnitCount > 0) {
      return taskFailure('ROOM_HOSTILE', `Hostiles present in ${roomData.name}.`, {
        room: roomData.name,
        hostiles: observation.hostileUnitCount,
      });
    }
    const home = this.homeName(context.store);
    const homeView = home === undefined ? undefined : context.world.getRoom(home);
    const delivery = homeView ? findDeliveryTarget(homeView) : undefined;
    if (home === undefined || !delivery) {
      return taskFailure('NO_DELIVERY', 'Remote mine has no delivery target at home.');
    }

    const jobs = this.childJobs(context.store);
    for (const source of observation.sources) {
      const covered = jobs.some((job) => job.kind === 'harvest' && job.job.source.id === source.id);
      if (covered) {
        continue;
      }
      const target = { id: source.id, pos: { x: source.x, y: source.y, room: roomData.name } };
      context.requestUnit({
        room: home,
        label: 'miner',
        body: WORKER_BODY,
        priority: SpawnPriority.LOW,
        job: (owner) => ({ kind: 'harvest', job: new HarvestJob(target, delivery, owner) }),
      });
    }
    return taskSuccess(RUNNING);
  }

  encode(refs: EntityRefWriter): z.infer<typeof remoteMineMissionSchema> {
    return this.encodeBase(refs);
  }

  static decode(
    data: z.infer<typeof remoteMineMissionSchema>,
    refs: EntityRefReader,
  ): RemoteMineMission {
    return new RemoteMineMission(decodeMissionBase(data, refs));
  }
}
