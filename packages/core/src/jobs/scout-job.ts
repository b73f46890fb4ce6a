import type { RoomName } from '@colonist/world-contract';
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
import { RUNNING, taskSuccess, type TaskOutcome, type TaskRunResult } from '../task-outcome.js';
import type { JobTickContext } from '../task-types.js';
import type { JobCapability, JobData } from './job-types.js';
import { tickMoveToRoom } from './movement.js';

const scoutPhaseSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('moveToRoom') }),
  z.object({ type: z.literal('idle'), since: z.number().int().nonnegative().nullable() }),
]);

export type ScoutPhase = z.infer<typeof scoutPhaseSchema>;

export const scoutJobSchema = z.object({
  owner: serializedOwnerSchema,
  phase: scoutPhaseSchema,
  room: z.string().min(1),
});

/**
 * Walks a unit into a room to give vision of it, then idles there.
 */
export class ScoutJob extends PhasedTask<ScoutPhase> implements JobCapability {
  constructor(
    readonly room: RoomName,
    owner: JobOwnerRef,
    phase: ScoutPhase = { type: 'moveToRoom' },
  ) {
    super(owner, phase);
  }

  describe(): string {
    return `Scout -> ${this.room} - ${this.phase.type}`;
  }

  run(context: JobTickContext, _entity: Entity): TaskOutcome<TaskRunResult<JobData>> {
    runStateMachine(
      this.state,
      'ScoutJob',
      (phase) => this.tickPhase(context, phase),
      { maxTransitions: context.engine.config.limits.maxStateTransitions },
    );
    return taskSuccess(RUNNING);
  }

  private tickPhase(context: JobTickContext, phase: ScoutPhase): ScoutPhase | undefined {
    switch (phase.type) {
      case 'moveToRoom':
        return tickMoveToRoom<ScoutPhase>(context, this.room, () => ({
          type: 'idle',
          since: null,
        }));
      case 'idle':
        // idle ends the loop; leaving the room restarts the walk next tick
        if (phase.since === null) {
          phase.since = context.tick;
        }
        if (context.unit.pos.room !== this.room) {
          this.state.current = { type: 'moveToRoom' };
        }
        return undefined;
    }
  }

  encode(refs: EntityRefWriter): z.infer<typeof scoutJobSchema> {
    return {
      owner: encodeOwner(this.getOwner(), refs),
      phase: this.phase,
      room: this.room,
    };
  }

  static decode(data: z.infer<typeof scoutJobSchema>, refs: EntityRefReader): ScoutJob {
    return new ScoutJob(data.room, decodeOwner(data.owner, refs), data.phase);
  }
}
