import type { z } from 'zod';

import type { Entity, EntityRefReader, EntityRefWriter } from '../entity-store.js';
import {
  createColonyMission,
  createScoutMission,
  roomHasMission,
} from '../missions/mission-builders.js';
import { directiveOwner } from '../ownership.js';
import { ensureRoomEntity, ownedRooms } from '../room/room-entities.js';
import type { TickContext } from '../systems/system-types.js';
import { RUNNING, taskSuccess, type TaskOutcome, type TaskRunResult } from '../task-outcome.js';
import {
  decodeDirectiveBase,
  DirectiveBase,
  directiveBaseSchema,
  type DirectiveBaseFields,
} from './directive-base.js';
import type { DirectiveCapability, DirectiveData } from './directive-types.js';

/** Neighbouring rooms observed longer ago than this get scouted again. */
export const SCOUT_REFRESH_TICKS = 1000;

export const colonyDirectiveSchema = directiveBaseSchema;

/**
 * Keeps a colony mission on every owned room and scouts the rooms next to
 * them.
 */
export class ColonyDirective extends DirectiveBase implements DirectiveCapability {
  constructor(fields: DirectiveBaseFields) {
    super(fields);
  }

  describe(): string {
    return `Colony - missions ${this.children.size}`;
  }

  run(context: TickContext, entity: Entity): TaskOutcome<TaskRunResult<DirectiveData>> {
    if (!this.claimRunSlot(context.tick)) {
      return taskSuccess(RUNNING);
    }
    const { store, rooms } = context;
    const owner = directiveOwner(entity);

    for (const home of ownedRooms(store, rooms, context.engine.username)) {
      if (!roomHasMission(store, home.data, 'colony')) {
        createColonyMission(store, { room: home.entity, owner });
      }

      for (const exit of home.data.getObservation()?.exits ?? []) {
        const target = ensureRoomEntity(store, rooms, exit);
        const observation = target.data.getObservation();
        if (observation && observation.tick >= context.tick - SCOUT_REFRESH_TICKS) {
          continue;
        }
        if (roomHasMission(store, target.data, 'scout')) {
          continue;
        }
        createScoutMission(store, { room: target.entity, home: home.entity, owner });
      }
    }
    return taskSuccess(RUNNING);
  }

  encode(refs: EntityRefWriter): z.infer<typeof colonyDirectiveSchema> {
    return this.encodeBase(refs);
  }

  static decode(
    data: z.infer<typeof colonyDirectiveSchema>,
    refs: EntityRefReader,
  ): ColonyDirective {
    return new ColonyDirective(decodeDirectiveBase(data, refs));
  }
}
