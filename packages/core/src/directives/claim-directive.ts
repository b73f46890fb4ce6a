import type { z } from 'zod';

import type { Entity, EntityRefReader, EntityRefWriter } from '../entity-store.js';
import { createClaimMission, roomHasMission } from '../missions/mission-builders.js';
import { directiveOwner } from '../ownership.js';
import { ensureRoomEntity, nearestRoom, ownedRooms } from '../room/room-entities.js';
import type { TickContext } from '../systems/system-types.js';
import { RUNNING, taskSuccess, type TaskOutcome, type TaskRunResult } from '../task-outcome.js';
import {
  decodeDirectiveBase,
  DirectiveBase,
  directiveBaseSchema,
  type DirectiveBaseFields,
} from './directive-base.js';
import type { DirectiveCapability, DirectiveData } from './directive-types.js';

export const claimDirectiveSchema = directiveBaseSchema;

/**
 * Turns flagged rooms into claim missions, spawning from the nearest owned
 * room.
 */
export class ClaimDirective extends DirectiveBase implements DirectiveCapability {
  constructor(fields: DirectiveBaseFields) {
    super(fields);
  }

  describe(): string {
    return `Claim - missions ${this.children.size}`;
  }

  run(context: TickContext, entity: Entity): TaskOutcome<TaskRunResult<DirectiveData>> {
    if (!this.claimRunSlot(context.tick)) {
      return taskSuccess(RUNNING);
    }
    const { store, rooms } = context;
    const username = context.engine.username;
    const homes = ownedRooms(store, rooms, username);
    if (homes.length === 0) {
      return taskSuccess(RUNNING);
    }

    for (const flagRoom of context.world.flagRooms()) {
      const target = ensureRoomEntity(store, rooms, flagRoom);
      if (target.data.getObservation()?.owner === username) {
        continue;
      }
      if (roomHasMission(store, target.data, 'claim', 'colony')) {
        continue;
      }
      const home = nearestRoom(context.world, homes, flagRoom);
      if (!home) {
        continue;
      }
      createClaimMission(store, {
        room: target.entity,
        home: home.entity,
        owner: directiveOwner(entity),
      });
    }
    return taskSuccess(RUNNING);
  }

  encode(refs: EntityRefWriter): z.infer<typeof claimDirectiveSchema> {
    return this.encodeBase(refs);
  }

  static decode(data: z.infer<typeof claimDirectiveSchema>, refs: EntityRefReader): ClaimDirective {
    return new ClaimDirective(decodeDirectiveBase(data, refs));
  }
}
