import { z } from 'zod';

import type { Entity, EntityRefReader, EntityRefWriter } from '../entity-store.js';
import { UnitBindingAttribute } from '../jobs/job-types.js';
import { ReserveJob } from '../jobs/reserve-job.js';
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
  CLAIMER_BODY,
  decodeMissionBase,
  MissionBase,
  missionBaseSchema,
  OBSERVATION_TRUST_TICKS,
  SpawnPriority,
  type MissionBaseFields,
} from './mission-base.js';
import type { MissionCapability, MissionData } from './mission-types.js';

export const reserveMissionSchema = missionBaseSchema;

/** Reservers with fewer ticks left are replaced ahead of time. */
const RESERVER_REPLACE_TICKS = 100;
/** Reservation length that needs no further reservers. */
const SUFFICIENT_RESERVATION_TICKS = 1000;

export class ReserveMission extends MissionBase implements MissionCapability {
  constructor(fields: MissionBaseFields) {
    super(fields);
  }

  describe(context: MissionTickContext): string {
    return `Reserve ${this.roomName(context.store)} - reservers ${this.children.size}`;
  }

  run(context: MissionTickContext, _entity: Entity): TaskOutcome<TaskRunResult<MissionData>> {
    const roomData = this.roomData(context.store);
    const observation = roomData?.getObservation();
    if (!roomData || !observation) {
      return taskFailure('ROOM_NOT_OBSERVED', 'Reserve target has not been observed.');
    }
    const username = context.engine.username;
    if (observation.tick >= context.tick - OBSERVATION_TRUST_TICKS) {
      if (username !== undefined && observation.owner === username) {
        return taskSuccess(SUCCESS);
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
      return taskFailure('HOME_MISSING', 'Reserve mission has no home room.');
    }

    const activeReservers = this.children.list().filter((child) => {
      const binding = context.store.get(UnitBindingAttribute, child);
      const unit = binding ? context.world.getUnit(binding.unitName) : undefined;
      if (!unit) {
        return false;
      }
      return unit.ticksToLive === undefined || unit.ticksToLive > RESERVER_REPLACE_TICKS;
    }).length;
    const reservation = context.world.getRoom(roomData.name)?.controller?.reservation;
    const sufficient =
      reservation !== undefined &&
      reservation.username === username &&
      reservation.ticksToEnd > SUFFICIENT_RESERVATION_TICKS;

    if (activeReservers === 0 && !sufficient) {
      const target = {
        id: controller.id,
        pos: { x: controller.x, y: controller.y, room: roomData.name },
      };
      context.requestUnit({
        room: home,
        label: 'reserver',
        body: CLAIMER_BODY,
        priority: SpawnPriority.LOW,
        job: (owner) => ({ kind: 'reserve', job: new ReserveJob(target, owner) }),
      });
    }
    return taskSuccess(RUNNING);
  }

  encode(refs: EntityRefWriter): z.infer<typeof reserveMissionSchema> {
    return this.encodeBase(refs);
  }

  static decode(data: z.infer<typeof reserveMissionSchema>, refs: EntityRefReader): ReserveMission {
    return new ReserveMission(decodeMissionBase(data, refs));
  }
}
