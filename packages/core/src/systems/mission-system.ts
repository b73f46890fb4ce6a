import type { Entity, EntityStore } from '../entity-store.js';
import { createJobEntity } from '../jobs/job-builders.js';
import { asMission, MissionDataAttribute } from '../missions/mission-types.js';
import { missionOwner, NO_OWNER } from '../ownership.js';
import { completeMission, replaceMission } from '../task-lifecycle.js';
import type { MissionTickContext, UnitRequest } from '../task-types.js';
import type { SystemDefinition, TickContext } from './system-types.js';
import {
  executeTask,
  runnableEntities,
  taskIdentity,
  type TaskSystemOptions,
} from './task-execution.js';

export const MISSION_SYSTEM_ID = 'missions';

/**
 * Creates the job for a freshly spawned unit. The job is owned by the mission
 * only while the mission still exists; otherwise it runs ownerless.
 */
export function adoptSpawnedUnit(
  store: EntityStore,
  mission: Entity,
  unitName: string,
  request: UnitRequest,
): Entity {
  const owner = store.has(MissionDataAttribute, mission) ? missionOwner(mission) : NO_OWNER;
  const job = createJobEntity(store, unitName, request.job(owner));
  request.onSpawned?.(unitName);
  return job;
}

export function createMissionTickContext(
  context: TickContext,
  mission: Entity,
): MissionTickContext {
  return {
    ...context,
    requestUnit(request: UnitRequest) {
      context.spawns.request(request.room, {
        label: request.label,
        body: request.body,
        priority: request.priority,
        onSpawn: (unitName) => {
          adoptSpawnedUnit(context.store, mission, unitName, request);
        },
      });
    },
  };
}

export function createMissionSystem(options: TaskSystemOptions = {}): SystemDefinition {
  const { id = MISSION_SYSTEM_ID, before, after } = options;

  return {
    id,
    before,
    after,
    tick(context: TickContext) {
      const { store } = context;
      for (const entity of runnableEntities(context, MissionDataAttribute)) {
        const data = store.get(MissionDataAttribute, entity);
        if (!data) {
          continue;
        }
        executeTask(
          createMissionTickContext(context, entity),
          entity,
          taskIdentity(entity, data.kind, 'mission'),
          asMission(data),
          {
            onSuccess: () => completeMission(store, entity),
            onReplace: (replacement) => replaceMission(store, entity, replacement),
          },
        );
      }
    },
  };
}
