import { z } from 'zod';

import type { Entity, EntityRefReader, EntityRefWriter } from '../entity-store.js';
import { ClaimJob } from '../jobs/claim-job.js';
import type { RoomObservation } from '../room/room-data.js';
import {
  replaceWith,
  RUNNING,
  taskFailure,
  taskSuccess,
  type TaskOutcome,
  type TaskRunResult,
} from '../task-outcome.js';
import type { MissionTickContext } from '../task-types.js';
import { ColonyMission } from './colony-mission.js';
import {
  CLAIMER_BODY,
  decodeMissionBase,
  MissionBase,
  missionBaseSchema,
  OBSERVATION_TRUST_TICKS,
  SpawnPriority,
  type MissionBaseFields,
} from './mission-base.js';
import type { MissionCapability, MissionData } from './mission-types.js';

export const claimMissionSchema = missionBaseSchema;

/**
 * Whether a recent observation shows the room held or reserved by another
 * player.
 */
export function isClaimedByOther(
  observation: RoomObservation,
  username: string | undefined,
): boolean {
  if (observation.owner !== undefined && observation.owner !== username) {
    return true;
  }
  const reservedBy = observation.reservation?.username;
  return reservedBy !== undefined && reservedBy !== username;
}

/**
 * Sends a claimer from the home room. Once the room is ours the mission
 * turns into the room's colony mission.
 */
export class ClaimMission extends MissionBase implements MissionCapability {
  constructor(fields: MissionBaseFields) {
    super(fields);
  }

  describe(context: MissionTickContext): string {
    return `Claim ${this.roomName(context.store)} - claimers ${this.children.size}`;
  }

  run(context: MissionTickContext, _entity: Entity): TaskOutcome<TaskRunResult<MissionData>> {
    const roomData = this.roomData(context.store);
    const observation = roomData?.getObservation();
    if (!roomData || !observation) {
      return taskFailure('ROOM_NOT_OBSERVED', 'Claim target has not been observed.');
    }
    const username = context.engine.username;
    if (observation.tick >= context.tick - OBSERVATION_TRUST_TICKS) {
      if (username !== undefined && observation.owner === username) {
        return taskSuccess(
          replaceWith<MissionData>({
            kind: 'colony',
            mission: new ColonyMission({ ...this.baseFields(), home: this.room }),
          }),
        );
      }
      if (isClaimedByOther(observation, username)) {
        return taskFailure('ROOM_UNAVAILABLE', `Room ${roomData.name} is held by another player.`, {
          room: roomData.name,
        });
      }
    }
    const controller = observation.controller;
    if (!controller) {
      return taskFailure('NO_CONTROLLER', `Room ${roomData.name} has no controller.`);
    }
    const home = this.homeName(context.store);
    if (home === undefined) {
      return taskFailure('HOME_MISSING', 'Claim mission has no home room.');
    }

    if (this.children.size === 0) {
      const target = {
        id: controller.id,
        pos: { x: controller.x, y: controller.y, room: roomData.name },
      };
      context.requestUnit({
        room: home,
        label: 'claimer',
        body: CLAIMER_BODY,
        priority: SpawnPriority.MEDIUM,
        job: (owner) => ({ kind: 'claim', job: new ClaimJob(target, owner) }),
      });
    }
    return taskSuccess(RUNNING);
  }

  encode(refs: EntityRefWriter): z.infer<typeof claimMissionSchema> {
    return this.encodeBase(refs);
  }

  static decode(data: z.infer<typeof claimMissionSchema>, refs: EntityRefReader): ClaimMission {
    return new ClaimMission(decodeMissionBase(data, refs));
  }
}
