import { z } from 'zod';

import type { Entity, EntityRefReader, EntityRefWriter } from '../entity-store.js';
import {
  decodeOwner,
  encodeOwner,
  serializedOwnerSchema,
  type JobOwnerRef,
} from '../ownership.js';
import { PhasedTask } from '../phased-task.js';
import { runStateMachineResult } from '../state-machine.js';
import {
  RUNNING,
  SUCCESS,
  taskFailure,
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
  tickWait,
  type RemoteTarget,
} from './movement.js';

const CLAIM_RETRY_TICKS = 5;
const CONTROLLER_SIGN = 'Claimed by colonist';

const claimPhaseSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('moveToController') }),
  z.object({ type: z.literal('claim') }),
  z.object({ type: z.literal('sign') }),
  z.object({ type: z.literal('wait'), ticks: z.number().int().nonnegative() }),
]);

export type ClaimPhase = z.infer<typeof claimPhaseSchema>;

type ClaimStep = TaskOutcome<ClaimPhase | undefined>;

function next(phase: ClaimPhase | undefined): ClaimStep {
  return taskSuccess(phase);
}

export const claimJobSchema = z.object({
  owner: serializedOwnerSchema,
  phase: claimPhaseSchema,
  controller: remoteTargetSchema,
});

/**
 * Claims a controller. Completes once the controller is owned by us.
 */
export class ClaimJob extends PhasedTask<ClaimPhase> implements JobCapability {
  constructor(
    readonly controller: RemoteTarget,
    owner: JobOwnerRef,
    phase: ClaimPhase = { type: 'moveToController' },
  ) {
    super(owner, phase);
  }

  describe(): string {
    return `Claim ${this.controller.pos.room} - ${this.phase.type}`;
  }

  run(context: JobTickContext, _entity: Entity): TaskOutcome<TaskRunResult<JobData>> {
    const controller = context.world.getObject(this.controller.id);
    const username = context.engine.username;
    if (controller && username !== undefined && controller.owner === username) {
      return taskSuccess(SUCCESS);
    }
    const stepped = runStateMachineResult(
      this.state,
      'ClaimJob',
      (phase) => this.tickPhase(context, phase),
      { maxTransitions: context.engine.config.limits.maxStateTransitions },
    );
    return stepped.success ? taskSuccess(RUNNING) : stepped;
  }

  /** A unit without a claim part fails the step and retries the claim next tick. */
  private tickPhase(context: JobTickContext, phase: ClaimPhase): ClaimStep {
    const unit = context.unit.name;
    switch (phase.type) {
      case 'moveToController':
        return next(
          tickMoveToPosition<ClaimPhase>(context, this.controller.pos, 1, () => ({
            type: 'claim',
          })),
        );
      case 'claim': {
        if (!context.actionFlags.consume(ActionFlag.CLAIM_CONTROLLER)) {
          return next(undefined);
        }
        const result = context.actions.claimController(unit, this.controller.id);
        if (result === 'no-body-part') {
          return taskFailure('ClaimPartMissing', `Unit ${unit} cannot claim controllers.`, {
            controller: this.controller.id,
          });
        }
        if (result === 'not-in-range') {
          return next({ type: 'moveToController' });
        }
        return next(
          result === 'ok' ? { type: 'sign' } : { type: 'wait', ticks: CLAIM_RETRY_TICKS },
        );
      }
      case 'sign':
        // shares the controller pipeline with claiming, so lands a tick later
        if (!context.actionFlags.consume(ActionFlag.SIGN)) {
          return next(undefined);
        }
        context.actions.signController(unit, this.controller.id, CONTROLLER_SIGN);
        return next({ type: 'wait', ticks: CLAIM_RETRY_TICKS });
      case 'wait':
        return next(tickWait<ClaimPhase>(phase, () => ({ type: 'moveToController' })));
    }
  }

  encode(refs: EntityRefWriter): z.infer<typeof claimJobSchema> {
    return {
      owner: encodeOwner(this.getOwner(), refs),
      phase: this.phase,
      controller: this.controller,
    };
  }

  static decode(data: z.infer<typeof claimJobSchema>, refs: EntityRefReader): ClaimJob {
    return new ClaimJob(data.controller, decodeOwner(data.owner, refs), data.phase);
  }
}
