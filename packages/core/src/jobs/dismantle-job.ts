import type { ObjectView, RoomName } from '@colonist/world-contract';
import { z } from 'zod';

import type { Entity, EntityRefReader, EntityRefWriter } from '../entity-store.js';
import {
  decodeOwner,
  encodeOwner,
  serializedOwnerSchema,
  type JobOwnerRef,
} from '../ownership.js';
import { PhasedTask } from '../phased-task.js';
import { runStateMachine } from '../state-machine.js';
import {
  RUNNING,
  SUCCESS,
  taskSuccess,
  type TaskOutcome,
  type TaskRunResult,
} from '../task-outcome.js';
import type { JobTickContext } from '../task-types.js';
import { ActionFlag } from './action-flags.js';
import type { JobCapability, JobData } from './job-types.js';
import {
  remoteTargetSchema,
  tickMoveToPosition,
  tickMoveToRoom,
} from './movement.js';

const dismantlePhaseSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('moveToRoom') }),
  z.object({ type: z.literal('pickTarget') }),
  z.object({ type: z.literal('moveToTarget'), target: remoteTargetSchema }),
  z.object({ type: z.literal('dismantle'), target: remoteTargetSchema }),
  z.object({ type: z.literal('done') }),
]);

export type DismantlePhase = z.infer<typeof dismantlePhaseSchema>;

export const dismantleJobSchema = z.object({
  owner: serializedOwnerSchema,
  phase: dismantlePhaseSchema,
  room: z.string().min(1),
});

/**
 * Structures in a room that belong to someone else.
 */
export function findDismantleTargets(
  structures: readonly ObjectView[],
  username: string | undefined,
): ObjectView[] {
  return structures.filter(
    (structure) => structure.owner !== undefined && structure.owner !== username,
  );
}

export class DismantleJob extends PhasedTask<DismantlePhase> implements JobCapability {
  constructor(
    readonly room: RoomName,
    owner: JobOwnerRef,
    phase: DismantlePhase = { type: 'moveToRoom' },
  ) {
    super(owner, phase);
  }

  describe(): string {
    return `Dismantle ${this.room} - ${this.phase.type}`;
  }

  run(context: JobTickContext, _entity: Entity): TaskOutcome<TaskRunResult<JobData>> {
    runStateMachine(
      this.state,
      'DismantleJob',
      (phase) => this.tickPhase(context, phase),
      { maxTransitions: context.engine.config.limits.maxStateTransitions },
    );
    return taskSuccess(this.phase.type === 'done' ? SUCCESS : RUNNING);
  }

  private tickPhase(
    context: JobTickContext,
    phase: DismantlePhase,
  ): DismantlePhase | undefined {
    switch (phase.type) {
      case 'moveToRoom':
        return tickMoveToRoom<DismantlePhase>(context, this.room, () => ({
          type: 'pickTarget',
        }));
      case 'pickTarget': {
        const room = context.world.getRoom(this.room);
        if (!room) {
          return context.unit.pos.room === this.room ? undefined : { type: 'moveToRoom' };
        }
        const [target] = findDismantleTargets(room.structures, context.engine.username);
        return target
          ? { type: 'moveToTarget', target: { id: target.id, pos: target.pos } }
          : { type: 'done' };
      }
      case 'moveToTarget':
        return tickMoveToPosition<DismantlePhase>(context, phase.target.pos, 1, () => ({
          type: 'dismantle',
          target: phase.target,
        }));
      case 'dismantle': {
        if (!context.world.getObject(phase.target.id)) {
          return { type: 'pickTarget' };
        }
        if (!context.actionFlags.consume(ActionFlag.DISMANTLE)) {
          return undefined;
        }
        const result = context.actions.dismantle(context.unit.name, phase.target.id);
        return result === 'not-in-range'
          ? { type: 'moveToTarget', target: phase.target }
          : undefined;
      }
      case 'done':
        return undefined;
    }
  }

  encode(refs: EntityRefWriter): z.infer<typeof dismantleJobSchema> {
    return {
      owner: encodeOwner(this.getOwner(), refs),
      phase: this.phase,
      room: this.room,
    };
  }

  static decode(data: z.infer<typeof dismantleJobSchema>, refs: EntityRefReader): DismantleJob {
    return new DismantleJob(data.room, decodeOwner(data.owner, refs), data.phase);
  }
}
