import type { BodyPart, RoomName, UnitView } from '@colonist/world-contract';

import type { Entity } from './entity-store.js';
import type { SimultaneousActionFlags } from './jobs/action-flags.js';
import type { JobData } from './jobs/job-types.js';
import type { JobOwnerRef, OwnerRef } from './ownership.js';
import type { TickContext } from './systems/system-types.js';
import type { TaskOutcome, TaskRunResult } from './task-outcome.js';

/**
 * Behaviour shared by every task level. `TData` is the level's tagged union,
 * used for replacements; `TContext` is what the level's system hands to a run.
 */
export interface TaskCapability<TData, TContext extends TickContext = TickContext> {
  describe(context: TContext, entity: Entity): string;
  run(context: TContext, entity: Entity): TaskOutcome<TaskRunResult<TData>>;
  getOwner(): OwnerRef;
  /**
   * Owner-complete handshake.
   *
   * @throws OwnershipInvariantError when `owner` is not the recorded owner.
   */
  ownerComplete(owner: Entity): void;
}

/**
 * Directives and missions additionally track the tasks they own.
 */
export interface OwningTaskCapability<TData, TContext extends TickContext = TickContext>
  extends TaskCapability<TData, TContext> {
  preRun(context: TContext, entity: Entity): TaskOutcome<undefined>;
  getChildren(): readonly Entity[];
  /** Records a task created on this task's behalf. */
  addChild(child: Entity): void;
  childComplete(child: Entity): void;
}

export interface JobTickContext extends TickContext {
  readonly unit: UnitView;
  readonly actionFlags: SimultaneousActionFlags;
}

/**
 * A unit a mission wants spawned. `job` builds the unit's job once the spawn
 * has started, with the owner the mission still holds at that point.
 */
export interface UnitRequest {
  readonly room: RoomName;
  readonly label: string;
  readonly body: readonly BodyPart[];
  readonly priority: number;
  readonly job: (owner: JobOwnerRef) => JobData;
  readonly onSpawned?: (unitName: string) => void;
}

export interface MissionTickContext extends TickContext {
  requestUnit(request: UnitRequest): void;
}

export function assertNever(value: never, context: string): never {
  throw new Error(`Unhandled ${context}: ${JSON.stringify(value)}`);
}
