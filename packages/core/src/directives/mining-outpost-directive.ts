import type { z } from 'zod';

import type { Entity, EntityRefReader, EntityRefWriter } from '../entity-store.js';
import { isClaimedByOther } from '../missions/claim-mission.js';
import {
  createDismantleMission,
  createRemoteMineMission,
  createReserveMission,
  roomHasMission,
  type MissionBuilderOptions,
} from '../missions/mission-builders.js';
import { directiveOwner } from '../ownership.js';
import type { RoomObservation } from '../room/room-data.js';
import { getRoomRef, ownedRooms } from '../room/room-entities.js';
import type { TickContext } from '../systems/system-types.js';
import { RUNNING, taskSuccess, type TaskOutcome, type TaskRunResult } from '../task-outcome.js';
import {
  decodeDirectiveBase,
  DirectiveBase,
  directiveBaseSchema,
  type DirectiveBaseFields,
} from './directive-base.js';
import type { DirectiveCapability, DirectiveData } from './directive-types.js';

export const miningOutpostDirectiveSchema = directiveBaseSchema;

/**
 * Whether a neighbouring room is safe and free to mine.
 */
export function isOutpostCandidate(
  observation: RoomObservation,
  username: string | undefined,
): boolean {
  return (
    observation.owner === undefined &&
    !isClaimedByOther(observation, username) &&
    !observation.sourceKeepers &&
    observation.hostileUnitCount === 0 &&
    observation.sources.length > 0
  );
}

/**
 * Sets up remote mining, reservation and clean-up missions in unowned rooms
 * next to owned ones. Flagged rooms are left to the claim directive.
 */
export class MiningOutpostDirective extends DirectiveBase implements DirectiveCapability {
  constructor(fields: DirectiveBaseFields) {
    super(fields);
  }

  describe(): string {
    return `Mining outposts - missions ${this.children.size}`;
  }

  run(context: TickContext, entity: Entity): TaskOutcome<TaskRunResult<DirectiveData>> {
    if (!this.claimRunSlot(context.tick)) {
      return taskSuccess(RUNNING);
    }
    const { store, rooms } = context;
    const username = context.engine.username;
    const flagged = new Set(context.world.flagRooms());

    for (const home of ownedRooms(store, rooms, username)) {
      for (const exit of home.data.getObservation()?.exits ?? []) {
        if (flagged.has(exit)) {
          continue;
        }
        const target = getRoomRef(store, rooms, exit);
        const observation = target?.data.getObservation();
        if (!target || !observation || !isOutpostCandidate(observation, username)) {
          continue;
        }
        const options: MissionBuilderOptions = {
          room: target.entity,
          home: home.entity,
          owner: directiveOwner(entity),
        };
        if (!roomHasMission(store, target.data, 'remoteMine')) {
          createRemoteMineMission(store, options);
        }
        if (observation.controller && !roomHasMission(store, target.data, 'reserve')) {
          createReserveMission(store, options);
        }
        if (
          observation.foreignStructureCount > 0 &&
          !roomHasMission(store, target.data, 'dismantle')
        ) {
          createDismantleMission(store, options);
        }
      }
    }
    return taskSuccess(RUNNING);
  }

  encode(refs: EntityRefWriter): z.infer<typeof miningOutpostDirectiveSchema> {
    return this.encodeBase(refs);
  }

  static decode(
    data: z.infer<typeof miningOutpostDirectiveSchema>,
    refs: EntityRefReader,
  ): MiningOutpostDirective {
    return new MiningOutpostDirective(decodeDirectiveBase(data, refs));
  }
}
