import {
  createDirectiveManagerSystem,
  DIRECTIVE_MANAGER_SYSTEM_ID,
  type DirectiveManagerSystemOptions,
} from './directive-manager-system.js';
import { createDirectiveSystem, DIRECTIVE_SYSTEM_ID } from './directive-system.js';
import { createJobSystem, JOB_SYSTEM_ID } from './job-system.js';
import { createMissionSystem, MISSION_SYSTEM_ID } from './mission-system.js';
import { createPathCostSystem, type PathCostSystemOptions } from './path-cost-system.js';
import {
  createRoomDataSystem,
  ROOM_DATA_SYSTEM_ID,
  type RoomDataSystemOptions,
} from './room-data-system.js';
import {
  createRoomNameIndexSystem,
  ROOM_NAME_INDEX_SYSTEM_ID,
  type RoomNameIndexSystemOptions,
} from './room-name-index-system.js';
import type { SystemDefinition } from './system-types.js';
import type { TaskSystemOptions } from './task-execution.js';

export interface CoreSystemsOptions {
  readonly roomNameIndex?: RoomNameIndexSystemOptions;
  readonly roomData?: RoomDataSystemOptions;
  readonly directiveManager?: DirectiveManagerSystemOptions;
  readonly directives?: TaskSystemOptions;
  readonly missions?: TaskSystemOptions;
  readonly jobs?: TaskSystemOptions;
  readonly pathCosts?: PathCostSystemOptions;
}

/**
 * The engine's systems, chained so that rooms are indexed and observed
 * before directives run, directives before missions, missions before jobs,
 * and the path-cost cache last.
 */
export function createCoreSystems(options: CoreSystemsOptions = {}): SystemDefinition[] {
  const indexId = options.roomNameIndex?.id ?? ROOM_NAME_INDEX_SYSTEM_ID;
  const roomDataId = options.roomData?.id ?? ROOM_DATA_SYSTEM_ID;
  const managerId = options.directiveManager?.id ?? DIRECTIVE_MANAGER_SYSTEM_ID;
  const directivesId = options.directives?.id ?? DIRECTIVE_SYSTEM_ID;
  const missionsId = options.missions?.id ?? MISSION_SYSTEM_ID;
  const jobsId = options.jobs?.id ?? JOB_SYSTEM_ID;

  return [
    createRoomNameIndexSystem(options.roomNameIndex),
    createRoomDataSystem({
      ...options.roomData,
      after: mergeConstraints(options.roomData?.after, [indexId]),
    }),
    createDirectiveManagerSystem({
      ...options.directiveManager,
      after: mergeConstraints(options.directiveManager?.after, [roomDataId]),
    }),
    createDirectiveSystem({
      ...options.directives,
      after: mergeConstraints(options.directives?.after, [managerId]),
    }),
    createMissionSystem({
      ...options.missions,
      after: mergeConstraints(options.missions?.after, [directivesId]),
    }),
    createJobSystem({
      ...options.jobs,
      after: mergeConstraints(options.jobs?.after, [missionsId]),
    }),
    createPathCostSystem({
      ...options.pathCosts,
      after: mergeConstraints(options.pathCosts?.after, [jobsId]),
    }),
  ];
}

function mergeConstraints(
  base: readonly string[] | undefined,
  additions: readonly string[] | undefined,
): readonly string[] | undefined {
  const set = new Set<string>(base ?? []);
  if (additions) {
    for (const id of additions) {
      if (id) {
        set.add(id);
      }
    }
  }
  return set.size > 0 ? Object.freeze(Array.from(set)) : base;
}
