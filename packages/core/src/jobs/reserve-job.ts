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
import { ActionFlag } from './action-flags.js';
import type { JobCapability, JobData } from './job-types.js';
import { remoteTargetSchema, tickMoveToPosition, type RemoteTarget } from './movement.js';

const reservePhaseSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('moveToController') }),
  z.object({ type: z.literal('reserve') }),
]);

export type ReservePhase = z.infer<typeof reservePhaseSchema>;

export const reserveJobSchema = z.object({
  owner: serializedOwnerSchema,
  phase: reservePhaseSchema,
  controller: remoteTargetSchema,
});

/**
 * Keeps a controller reserved for as long as the unit lives.
 */
export class ReserveJob extends PhasedTask<ReservePhase> implements JobCapability {
  constructor(
    readonly controller: RemoteTarget,
    owner: JobOwnerRef,
    phase: ReservePhase = { type: 'moveToController' },
  ) {
    super(owner, phase);
  }

  describe(): string {
    return `Reserve ${this.controller.pos.room} - ${this.phase.type}`;
  }

  run(context: JobTickContext, _entity: Entity): TaskOutcome<TaskRunResult<JobData>> {
    runStateMachine(
      this.state,
      'ReserveJob',
      (phase) => this.tickPhase(context, phase),
      { maxTransitions: context.engine.config.limits.maxStateTransitions },
    );
    return taskSuccess(RUNNING);
  }

  private tickPhase(context: JobTickContext, phase: ReservePhase): ReservePhase | undefined {
    switch (phase.type) {
      case 'moveToController':
        return tickMoveToPosition<ReservePhase>(context, this.controller.pos, 1, () => ({
          type: 'reserve',
        }));
      case 'reserve': {
        if (!context.actionFlags.consume(ActionFlag.RESERVE_CONTROLLER)) {
          return undefined;
        }
        const result = context.actions.reserveController(context.unit.name, this.controller.id);
        return result === 'not-in-range' ? { type: 'moveToController' } : undefined;
      }
    }
  }

  encode(refs: EntityRefWriter): z.infer<typeof reserveJobSchema> {
    return {
      owner: encodeOwner(this.getOwner(), refs),
      phase: this.phase,
      controller: this.controller,
    };
  }

  static decode(data: z.infer<typeof reserveJobSchema>, refs: EntityRefReader): ReserveJob {
    return new ReserveJob(data.controller, decodeOwner(data.owner, refs), data.phase);
  }
}
