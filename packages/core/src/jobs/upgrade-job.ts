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

const UPGRADE_RANGE = 3;
const EMPTY_WAIT_TICKS = 5;

const upgradePhaseSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('moveToController') }),
  z.object({ type: z.literal('upgrade') }),
  z.object({ type: z.literal('moveToSupply') }),
  z.object({ type: z.literal('withdraw') }),
  z.object({ type: z.literal('wait'), ticks: z.number().int().nonnegative() }),
]);

export type UpgradePhase = z.infer<typeof upgradePhaseSchema>;

export const upgradeJobSchema = z.object({
  owner: serializedOwnerSchema,
  phase: upgradePhaseSchema,
  controller: remoteTargetSchema,
  supply: remoteTargetSchema.nullable(),
});

export class UpgradeJob extends PhasedTask<UpgradePhase> implements JobCapability {
  constructor(
    readonly controller: RemoteTarget,
    readonly supply: RemoteTarget | undefined,
    owner: JobOwnerRef,
    phase: UpgradePhase = { type: 'moveToController' },
  ) {
    super(owner, phase);
  }

  describe(): string {
    return `Upgrade ${this.controller.pos.room} - ${this.phase.type}`;
  }

  run(context: JobTickContext, _entity: Entity): TaskOutcome<TaskRunResult<JobData>> {
    runStateMachine(
      this.state,
      'UpgradeJob',
      (phase) => this.tickPhase(context, phase),
      { maxTransitions: context.engine.config.limits.maxStateTransitions },
    );
    return taskSuccess(RUNNING);
  }

  private tickPhase(context: JobTickContext, phase: UpgradePhase): UpgradePhase | undefined {
    const { unit } = context;
    switch (phase.type) {
      case 'moveToController':
        return tickMoveToPosition<UpgradePhase>(
          context,
          this.controller.pos,
          UPGRADE_RANGE,
          () => ({ type: 'upgrade' }),
        );
      case 'upgrade': {
        if (unit.energy === 0) {
          return this.supply
            ? { type: 'moveToSupply' }
            : { type: 'wait', ticks: EMPTY_WAIT_TICKS };
        }
        if (!context.actionFlags.consume(ActionFlag.UPGRADE_CONTROLLER)) {
          return undefined;
        }
        const result = context.actions.upgradeController(unit.name, this.controller.id);
        return result === 'not-in-range' ? { type: 'moveToController' } : undefined;
      }
      case 'moveToSupply': {
        const supply = this.supply;
        if (!supply) {
          return { type: 'moveToController' };
        }
        return tickMoveToPosition<UpgradePhase>(context, supply.pos, 1, () => ({
          type: 'withdraw',
        }));
      }
      case 'withdraw': {
        const supply = this.supply;
        if (!supply || unit.energy >= unit.energyCapacity) {
          return { type: 'moveToController' };
        }
        if (!context.actionFlags.consume(ActionFlag.WITHDRAW)) {
          return undefined;
        }
        const result = context.actions.withdraw(unit.name, supply.id);
        if (result === 'not-in-range') {
          return { type: 'moveToSupply' };
        }
        return result === 'not-enough-resources'
          ? { type: 'wait', ticks: EMPTY_WAIT_TICKS }
          : undefined;
      }
      case 'wait':
        return tickWait<UpgradePhase>(phase, () => ({ type: 'moveToController' }));
    }
  }

  encode(refs: EntityRefWriter): z.infer<typeof upgradeJobSchema> {
    return {
      owner: encodeOwner(this.getOwner(), refs),
      phase: this.phase,
      controller: this.controller,
      supply: this.supply ?? null,
    };
  }

  static decode(data: z.infer<typeof upgradeJobSchema>, refs: EntityRefReader): UpgradeJob {
    return new UpgradeJob(
      data.controller,
      data.supply ?? undefined,
      decodeOwner(data.owner, refs),
      data.phase,
    );
  }
}
