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
import {
  remoteTargetSchema,
  tickMoveToPosition,
  tickWait,
  type RemoteTarget,
} from './movement.js';

const EMPTY_PICKUP_WAIT_TICKS = 3;

const haulPhaseSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('moveToPickup') }),
  z.object({ type: z.literal('withdraw') }),
  z.object({ type: z.literal('moveToDelivery') }),
  z.object({ type: z.literal('deliver') }),
  z.object({ type: z.literal('wait'), ticks: z.number().int().nonnegative() }),
]);

export type HaulPhase = z.infer<typeof haulPhaseSchema>;

export const haulJobSchema = z.object({
  owner: serializedOwnerSchema,
  phase: haulPhaseSchema,
  pickup: remoteTargetSchema,
  delivery: remoteTargetSchema,
});

/**
 * Moves energy from a pickup structure to a delivery structure.
 */
export class HaulJob extends PhasedTask<HaulPhase> implements JobCapability {
  constructor(
    readonly pickup: RemoteTarget,
    readonly delivery: RemoteTarget,
    owner: JobOwnerRef,
    phase: HaulPhase = { type: 'moveToPickup' },
  ) {
    super(owner, phase);
  }

  describe(): string {
    return `Haul ${this.pickup.id} -> ${this.delivery.id} - ${this.phase.type}`;
  }

  run(context: JobTickContext, _entity: Entity): TaskOutcome<TaskRunResult<JobData>> {
    runStateMachine(
      this.state,
      'HaulJob',
      (phase) => this.tickPhase(context, phase),
      { maxTransitions: context.engine.config.limits.maxStateTransitions },
    );
    return taskSuccess(RUNNING);
  }

  private tickPhase(context: JobTickContext, phase: HaulPhase): HaulPhase | undefined {
    const { unit } = context;
    switch (phase.type) {
      case 'moveToPickup':
        return tickMoveToPosition<HaulPhase>(context, this.pickup.pos, 1, () => ({
          type: 'withdraw',
        }));
      case 'withdraw': {
        if (unit.energy >= unit.energyCapacity) {
          return { type: 'moveToDelivery' };
        }
        if (!context.actionFlags.consume(ActionFlag.WITHDRAW)) {
          return undefined;
        }
        const result = context.actions.withdraw(unit.name, this.pickup.id);
        if (result === 'not-in-range') {
          return { type: 'moveToPickup' };
        }
        return result === 'not-enough-resources' && unit.energy === 0
          ? { type: 'wait', ticks: EMPTY_PICKUP_WAIT_TICKS }
          : undefined;
      }
      case 'moveToDelivery':
        return tickMoveToPosition<HaulPhase>(context, this.delivery.pos, 1, () => ({
          type: 'deliver',
        }));
      case 'deliver': {
        if (unit.energy === 0) {
          return { type: 'moveToPickup' };
        }
        if (!context.actionFlags.consume(ActionFlag.TRANSFER)) {
          return undefined;
        }
        const result = context.actions.transfer(unit.name, this.delivery.id);
        return result === 'not-in-range' ? { type: 'moveToDelivery' } : undefined;
      }
      case 'wait':
        return tickWait<HaulPhase>(phase, () => ({ type: 'moveToPickup' }));
    }
  }

  encode(refs: EntityRefWriter): z.infer<typeof haulJobSchema> {
    return {
      owner: encodeOwner(this.getOwner(), refs),
      phase: this.phase,
      pickup: this.pickup,
      delivery: this.delivery,
    };
  }

  static decode(data: z.infer<typeof haulJobSchema>, refs: EntityRefReader): HaulJob {
    return new HaulJob(data.pickup, data.delivery, decodeOwner(data.owner, refs), data.phase);
  }
}
