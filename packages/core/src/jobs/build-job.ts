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
  inRange,
  remoteTargetSchema,
  tickMoveToPosition,
  tickMoveToRoom,
} from './movement.js';

const BUILD_RANGE = 3;

const buildPhaseSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('moveToRoom') }),
  z.object({ type: z.literal('pickSite') }),
  z.object({ type: z.literal('moveToSite'), site: remoteTargetSchema }),
  z.object({ type: z.literal('build'), site: remoteTargetSchema }),
  z.object({ type: z.literal('collect'), source: remoteTargetSchema }),
  z.object({ type: z.literal('done') }),
]);

export type BuildPhase = z.infer<typeof buildPhaseSchema>;

export const buildJobSchema = z.object({
  owner: serializedOwnerSchema,
  phase: buildPhaseSchema,
  room: z.string().min(1),
});

/**
 * Builds every construction site in a room, harvesting energy from the
 * room's sources when empty. Completes once no site is left.
 */
export class BuildJob extends PhasedTask<BuildPhase> implements JobCapability {
  constructor(
    readonly room: RoomName,
    owner: JobOwnerRef,
    phase: BuildPhase = { type: 'moveToRoom' },
  ) {
    super(owner, phase);
  }

  describe(): string {
    return `Build ${this.room} - ${this.phase.type}`;
  }

  run(context: JobTickContext, _entity: Entity): TaskOutcome<TaskRunResult<JobData>> {
    runStateMachine(
      this.state,
      'BuildJob',
      (phase) => this.tickPhase(context, phase),
      { maxTransitions: context.engine.config.limits.maxStateTransitions },
    );
    return taskSuccess(this.phase.type === 'done' ? SUCCESS : RUNNING);
  }

  private tickPhase(context: JobTickContext, phase: BuildPhase): BuildPhase | undefined {
    const { unit } = context;
    switch (phase.type) {
      case 'moveToRoom':
        return tickMoveToRoom<BuildPhase>(context, this.room, () => ({ type: 'pickSite' }));
      case 'pickSite': {
        const room = context.world.getRoom(this.room);
        if (!room) {
          return unit.pos.room === this.room ? { type: 'done' } : { type: 'moveToRoom' };
        }
        const site = room.constructionSites[0];
        if (!site) {
          return { type: 'done' };
        }
        return { type: 'moveToSite', site: { id: site.id, pos: site.pos } };
      }
      case 'moveToSite':
        return tickMoveToPosition<BuildPhase>(context, phase.site.pos, BUILD_RANGE, () => ({
          type: 'build',
          site: phase.site,
        }));
      case 'build': {
        if (!context.world.getObject(phase.site.id)) {
          return { type: 'pickSite' };
        }
        if (unit.energy === 0) {
          const source = context.world.getRoom(this.room)?.sources[0];
          return source
            ? { type: 'collect', source: { id: source.id, pos: source.pos } }
            : undefined;
        }
        if (!context.actionFlags.consume(ActionFlag.BUILD)) {
          return undefined;
        }
        const result = context.actions.build(unit.name, phase.site.id);
        return result === 'not-in-range' ? { type: 'moveToSite', site: phase.site } : undefined;
      }
      case 'collect': {
        if (unit.energy >= unit.energyCapacity) {
          return { type: 'pickSite' };
        }
        if (!inRange(unit.pos, phase.source.pos, 1)) {
          if (context.actionFlags.consume(ActionFlag.MOVE)) {
            context.actions.moveTo(unit.name, phase.source.pos, 1, context.pathCosts);
          }
          return undefined;
        }
        if (context.actionFlags.consume(ActionFlag.HARVEST)) {
          context.actions.harvest(unit.name, phase.source.id);
        }
        return undefined;
      }
      case 'done':
        return undefined;
    }
  }

  encode(refs: EntityRefWriter): z.infer<typeof buildJobSchema> {
    return {
      owner: encodeOwner(this.getOwner(), refs),
      phase: this.phase,
      room: this.room,
    };
  }

  static decode(data: z.infer<typeof buildJobSchema>, refs: EntityRefReader): BuildJob {
    return new BuildJob(data.room, decodeOwner(data.owner, refs), data.phase);
  }
}
