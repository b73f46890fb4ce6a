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

const harvestPhaseSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('moveToSource') }),
  z.object({ type: z.literal('harvest') }),
  z.object({ type: z.literal('moveToDelivery') }),
  z.object({ type: z.literal('deliver') }),
]);

export type HarvestPhase = z.infer<typeof harvestPhaseSchema>;

export const harvestJobSchema = z.object({
  owner: serializedOwnerSchema,
  phase: harvestPhaseSchema,
  source: remoteTargetSchema,
  delivery: remoteTargetSchema.nullable(),
});

/**
 * Harvests a source. With a delivery target the unit shuttles energy there;
 * without one it keeps harvesting and lets the energy drop.
 */
export class HarvestJob extends PhasedTask<HarvestPhase> implements JobCapability {
  constructor(
    readonly source: RemoteTarget,
    readonly delivery: RemoteTarget | undefined,
    owner: JobOwnerRef,
    phase: HarvestPhase = { type: 'moveToSource' },
  ) {
    super(owner, phase);
  }

  describe(): string {
    return `Harvest ${this.source.id} - ${this.phase.type}`;
  }

  run(context: JobTickContext, _entity: Entity): TaskOutcome<TaskRunResult<JobData>> {
    runStateMachine(
      this.state,
      'HarvestJob',
      (phase) => this.tickPhase(context, phase),
      { maxTransitions: context.engine.config.limits.maxStateTransitions },
    );
    return taskSuccess(RUNNING);
  }

  private tickPhase(context: JobTickContext, phase: HarvestPhase): HarvestPhase | undefined {
    const { unit } = context;
    switch (phase.type) {
      case 'moveToSource':
        return tickMoveToPosition<HarvestPhase>(context, this.source.pos, 1, () => ({
          type: 'harvest',
        }));
      case 'harvest': {
        if (this.delivery && unit.energy >= unit.energyCapacity) {
          return { type: 'moveToDelivery' };
        }
        if (!context.actionFlags.consume(ActionFlag.HARVEST)) {
          return undefined;
        }
        const result = context.actions.harvest(unit.name, this.source.id);
        return result === 'not-in-range' ? { type: 'moveToSource' } : undefined;
      }
      case 'moveToDelivery': {
        const delivery = this.delivery;
        if (!delivery) {
          return { type: 'moveToSource' };
        }
        return tickMoveToPosition<HarvestPhase>(context, delivery.pos, 1, () => ({
          type: 'deliver',
        }));
      }
      case 'deliver': {
        const delivery = this.delivery;
        if (!delivery || unit.energy === 0) {
          return { type: 'moveToSource' };
        }
        if (!context.actionFlags.consume(ActionFlag.TRANSFER)) {
          return undefined;
        }
        const result = context.actions.transfer(unit.name, delivery.id);
        return result === 'not-in-range' ? { type: 'moveToDelivery' } : undefined;
      }
    }
  }

  encode(refs: EntityRefWriter): z.infer<typeof harvestJobSchema> {
    return {
      owner: encodeOwner(this.getOwner(), refs),
      phase: this.phase,
      source: this.source,
      delivery: this.delivery ?? null,
    };
  }

  static decode(data: z.infer<typeof harvestJobSchema>, refs: EntityRefReader): HarvestJob {
    return new HarvestJob(
      data.source,
      data.delivery ?? undefined,
      decodeOwner(data.owner, refs),
      data.phase,
    );
  }
}
