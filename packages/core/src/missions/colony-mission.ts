import type { RoomView } from '@colonist/world-contract';
import { z } from 'zod';

import type { Entity, EntityRefReader, EntityRefWriter } from '../entity-store.js';
import { BuildJob } from '../jobs/build-job.js';
import { HarvestJob } from '../jobs/harvest-job.js';
import { HaulJob } from '../jobs/haul-job.js';
import type { JobData } from '../jobs/job-types.js';
import { UpgradeJob } from '../jobs/upgrade-job.js';
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
  findDeliveryTarget,
  MissionBase,
  missionBaseSchema,
  SpawnPriority,
  toRemoteTarget,
  WORKER_BODY,
  type MissionBaseFields,
} from './mission-base.js';
import type { MissionCapability, MissionData } from './mission-types.js';

export const colonyMissionSchema = missionBaseSchema;

function countJobs(jobs: readonly JobData[], kind: JobData['kind']): number {
  return jobs.filter((job) => job.kind === kind).length;
}

/**
 * Runs an owned room: one harvester per source, an upgrader, a builder while
 * construction sites exist and a hauler per container once storage is built.
 */
export class ColonyMission extends MissionBase implements MissionCapability {
  constructor(fields: MissionBaseFields) {
    super(fields);
  }

  describe(context: MissionTickContext): string {
    const jobs = this.childJobs(context.store);
    return (
      `Colony ${this.roomName(context.store)} - harvesters ${countJobs(jobs, 'harvest')}` +
      ` upgraders ${countJobs(jobs, 'upgrade')} builders ${countJobs(jobs, 'build')}` +
      ` haulers ${countJobs(jobs, 'haul')}`
    );
  }

  run(context: MissionTickContext, _entity: Entity): TaskOutcome<TaskRunResult<MissionData>> {
    const roomData = this.roomData(context.store);
    if (!roomData) {
      return taskFailure('ROOM_MISSING', 'Colony room has no room data.');
    }
    const view = context.world.getRoom(roomData.name);
    if (!view) {
      return taskFailure('ROOM_NOT_VISIBLE', `Colony room ${roomData.name} is not visible.`, {
        room: roomData.name,
      });
    }
    const username = context.engine.username;
    if (username === undefined || view.controller?.owner !== username) {
      // room lost
      return taskSuccess(SUCCESS);
    }

    this.requestMissingUnits(context, view, this.childJobs(context.store));
    return taskSuccess(RUNNING);
  }

  private requestMissingUnits(
    context: MissionTickContext,
    view: RoomView,
    jobs: readonly JobData[],
  ): void {
    const delivery = findDeliveryTarget(view);
    const storage = view.structures.find((structure) => structure.kind === 'storage');

    for (const source of view.sources) {
      const covered = jobs.some((job) => job.kind === 'harvest' && job.job.source.id === source.id);
      if (!covered) {
        context.requestUnit({
          room: view.name,
          label: 'harvester',
          body: WORKER_BODY,
          priority: SpawnPriority.HIGH,
          job: (owner) => ({
            kind: 'harvest',
            job: new HarvestJob(toRemoteTarget(source), delivery, owner),
          }),
        });
      }
    }

    const controller = view.controller;
    if (controller && countJobs(jobs, 'upgrade') === 0) {
      context.requestUnit({
        room: view.name,
        label: 'upgrader',
        body: WORKER_BODY,
        priority: SpawnPriority.MEDIUM,
        job: (owner) => ({
          kind: 'upgrade',
          job: new UpgradeJob(
            toRemoteTarget(controller),
            storage ? toRemoteTarget(storage) : undefined,
            owner,
          ),
        }),
      });
    }

    if (view.constructionSites.length > 0 && countJobs(jobs, 'build') === 0) {
      context.requestUnit({
        room: view.name,
        label: 'builder',
        body: WORKER_BODY,
        priority: SpawnPriority.LOW,
        job: (owner) => ({ kind: 'build', job: new BuildJob(view.name, owner) }),
      });
    }

    if (!storage) {
      return;
    }
    for (const container of view.structures) {
      if (container.kind !== 'container') {
        continue;
      }
      const covered = jobs.some((job) => job.kind === 'haul' && job.job.pickup.id === container.id);
      if (!covered) {
        context.requestUnit({
          room: view.name,
          label: 'hauler',
          body: WORKER_BODY,
          priority: SpawnPriority.LOW,
          job: (owner) => ({
            kind: 'haul',
            job: new HaulJob(toRemoteTarget(container), toRemoteTarget(storage), owner),
          }),
        });
      }
    }
  }

  encode(refs: EntityRefWriter): z.infer<typeof colonyMissionSchema> {
    return this.encodeBase(refs);
  }

  static decode(data: z.infer<typeof colonyMissionSchema>, refs: EntityRefReader): ColonyMission {
    return new ColonyMission(decodeMissionBase(data, refs));
  }
}
