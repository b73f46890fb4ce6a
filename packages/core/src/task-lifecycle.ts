import type { TaskLevel } from './diagnostics/describe-sink.js';
import {
  asDirective,
  DirectiveDataAttribute,
  type DirectiveCapability,
  type DirectiveData,
} from './directives/directive-types.js';
import { formatEntity, type Entity, type EntityStore } from './entity-store.js';
import {
  asJob,
  JobDataAttribute,
  UnitBindingAttribute,
  type JobCapability,
  type JobData,
} from './jobs/job-types.js';
import {
  asMission,
  MissionDataAttribute,
  type MissionCapability,
  type MissionData,
} from './missions/mission-types.js';
import { OwnershipInvariantError, ownerEntity, type OwnerRef } from './ownership.js';
import { RoomDataAttribute } from './room/room-data.js';
import { TASK_OK, taskFailure, type TaskOutcome } from './task-outcome.js';
import { telemetry } from './telemetry.js';

export type TaskHandle =
  | { readonly level: 'directive'; readonly task: DirectiveCapability }
  | { readonly level: 'mission'; readonly task: MissionCapability }
  | { readonly level: 'job'; readonly task: JobCapability };

/**
 * The task an entity holds, at whichever level.
 */
export function findTask(store: EntityStore, entity: Entity): TaskHandle | undefined {
  const directive = store.get(DirectiveDataAttribute, entity);
  if (directive) {
    return { level: 'directive', task: asDirective(directive) };
  }
  const mission = store.get(MissionDataAttribute, entity);
  if (mission) {
    return { level: 'mission', task: asMission(mission) };
  }
  const job = store.get(JobDataAttribute, entity);
  if (job) {
    return { level: 'job', task: asJob(job) };
  }
  return undefined;
}

function holdsOwnerAttribute(store: EntityStore, owner: OwnerRef): boolean {
  switch (owner.kind) {
    case 'none':
      return true;
    case 'directive':
      return store.has(DirectiveDataAttribute, owner.entity);
    case 'mission':
      return store.has(MissionDataAttribute, owner.entity);
  }
}

/**
 * Sends owner-complete to every live child. All children are checked before
 * any is notified, so a mismatch leaves every reference untouched.
 *
 * @throws OwnershipInvariantError when a child records a different owner.
 */
function releaseChildren(store: EntityStore, owner: Entity, children: readonly Entity[]): void {
  const live: TaskHandle[] = [];
  for (const child of children) {
    const handle = findTask(store, child);
    if (!handle) {
      continue;
    }
    const recorded = handle.task.getOwner();
    if (ownerEntity(recorded) !== owner) {
      throw new OwnershipInvariantError(recorded, owner);
    }
    live.push(handle);
  }
  for (const handle of live) {
    handle.task.ownerComplete(owner);
  }
}

function notifyOwner(store: EntityStore, owner: OwnerRef, child: Entity): void {
  if (owner.kind === 'directive') {
    const data = store.get(DirectiveDataAttribute, owner.entity);
    if (data) {
      asDirective(data).childComplete(child);
    }
  } else if (owner.kind === 'mission') {
    const data = store.get(MissionDataAttribute, owner.entity);
    if (data) {
      asMission(data).childComplete(child);
    }
  }
}

/**
 * Lists `child` on the task `owner` names. Builders call this in the same step
 * that records the owner on the child, so a completing owner always reaches it.
 */
export function linkToOwner(store: EntityStore, owner: OwnerRef, child: Entity): void {
  if (owner.kind === 'directive') {
    const data = store.get(DirectiveDataAttribute, owner.entity);
    if (data) {
      asDirective(data).addChild(child);
    }
  } else if (owner.kind === 'mission') {
    const data = store.get(MissionDataAttribute, owner.entity);
    if (data) {
      asMission(data).addChild(child);
    }
  }
}

function destroyIfEmpty(store: EntityStore, entity: Entity): void {
  if (!store.hasAnyAttribute(entity)) {
    store.destroy(entity);
  }
}

/**
 * Completes a directive: its missions are released, the attribute removed,
 * and the entity destroyed when nothing else is attached.
 *
 * @returns false when the entity holds no directive.
 */
export function completeDirective(store: EntityStore, entity: Entity): boolean {
  const data = store.get(DirectiveDataAttribute, entity);
  if (!data) {
    return false;
  }
  const directive = asDirective(data);
  releaseChildren(store, entity, directive.getChildren());
  notifyOwner(store, directive.getOwner(), entity);
  store.removeAttribute(DirectiveDataAttribute, entity);
  destroyIfEmpty(store, entity);
  return true;
}

/**
 * Completes a mission and detaches it from its room.
 */
export function completeMission(store: EntityStore, entity: Entity): boolean {
  const data = store.get(MissionDataAttribute, entity);
  if (!data) {
    return false;
  }
  const mission = asMission(data);
  releaseChildren(store, entity, mission.getChildren());
  notifyOwner(store, mission.getOwner(), entity);
  store.get(RoomDataAttribute, mission.getRoom())?.removeMission(entity);
  store.removeAttribute(MissionDataAttribute, entity);
  destroyIfEmpty(store, entity);
  return true;
}

export function completeJob(store: EntityStore, entity: Entity): boolean {
  const data = store.get(JobDataAttribute, entity);
  if (!data) {
    return false;
  }
  notifyOwner(store, asJob(data).getOwner(), entity);
  store.removeAttribute(JobDataAttribute, entity);
  store.removeAttribute(UnitBindingAttribute, entity);
  destroyIfEmpty(store, entity);
  return true;
}

/**
 * Swaps a directive for another on the same entity. The old value's children
 * are released; the replacement runs from the next tick.
 */
export function replaceDirective(
  store: EntityStore,
  entity: Entity,
  replacement: DirectiveData,
): void {
  const current = store.get(DirectiveDataAttribute, entity);
  if (current) {
    releaseChildren(store, entity, asDirective(current).getChildren());
  }
  store.insert(DirectiveDataAttribute, entity, replacement);
}

export function replaceMission(
  store: EntityStore,
  entity: Entity,
  replacement: MissionData,
): void {
  const current = store.get(MissionDataAttribute, entity);
  const nextRoom = asMission(replacement).getRoom();
  if (current) {
    const mission = asMission(current);
    releaseChildren(store, entity, mission.getChildren());
    if (mission.getRoom() !== nextRoom) {
      store.get(RoomDataAttribute, mission.getRoom())?.removeMission(entity);
    }
  }
  store.insert(MissionDataAttribute, entity, replacement);
  store.get(RoomDataAttribute, nextRoom)?.addMission(entity);
}

export function replaceJob(store: EntityStore, entity: Entity, replacement: JobData): void {
  store.insert(JobDataAttribute, entity, replacement);
}

export interface TaskDependent {
  readonly entity: Entity;
  readonly level: TaskLevel;
}

function* allTasks(store: EntityStore): Generator<TaskDependent & { readonly owner: OwnerRef }> {
  for (const entity of store.entitiesWith(DirectiveDataAttribute)) {
    const data = store.get(DirectiveDataAttribute, entity);
    if (data) {
      yield { entity, level: 'directive', owner: asDirective(data).getOwner() };
    }
  }
  for (const entity of store.entitiesWith(MissionDataAttribute)) {
    const data = store.get(MissionDataAttribute, entity);
    if (data) {
      yield { entity, level: 'mission', owner: asMission(data).getOwner() };
    }
  }
  for (const entity of store.entitiesWith(JobDataAttribute)) {
    const data = store.get(JobDataAttribute, entity);
    if (data) {
      yield { entity, level: 'job', owner: asJob(data).getOwner() };
    }
  }
}

/** Live tasks that still name `entity` as their owner. */
export function findDependents(store: EntityStore, entity: Entity): TaskDependent[] {
  const dependents: TaskDependent[] = [];
  for (const task of allTasks(store)) {
    if (ownerEntity(task.owner) === entity) {
      dependents.push({ entity: task.entity, level: task.level });
    }
  }
  return dependents;
}

/**
 * Destroys a task entity, refusing while any live task still names it as
 * owner: owners must send owner-complete first.
 */
export function destroyTaskEntity(store: EntityStore, entity: Entity): TaskOutcome<undefined> {
  const dependents = findDependents(store, entity);
  if (dependents.length > 0) {
    const names = dependents.map((dependent) => formatEntity(dependent.entity));
    telemetry.recordInvariantViolation('DanglingOwnerReference', {
      entity: formatEntity(entity),
      dependents: names,
    });
    return taskFailure(
      'DANGLING_OWNER_REFERENCE',
      `Entity ${formatEntity(entity)} still owns ${names.join(', ')}.`,
      { dependents: names },
    );
  }
  store.destroy(entity);
  return TASK_OK;
}

export interface DanglingOwner {
  readonly entity: Entity;
  readonly level: TaskLevel;
  readonly owner: OwnerRef;
}

/**
 * Tasks whose owner reference points at an entity that no longer holds the
 * matching task attribute.
 */
export function findDanglingOwners(store: EntityStore): DanglingOwner[] {
  const dangling: DanglingOwner[] = [];
  for (const task of allTasks(store)) {
    if (!holdsOwnerAttribute(store, task.owner)) {
      dangling.push(task);
    }
  }
  return dangling;
}

export interface IntegrityReport {
  readonly removedMissions: number;
  readonly releasedTasks: number;
  readonly droppedChildren: number;
  readonly droppedRoomEntries: number;
}

function dropDeadChildren(
  store: EntityStore,
  task: DirectiveCapability | MissionCapability,
  isChild: (entity: Entity) => boolean,
): number {
  let dropped = 0;
  for (const child of task.getChildren()) {
    if (!isChild(child)) {
      task.childComplete(child);
      dropped += 1;
    }
  }
  return dropped;
}

/**
 * Brings the store back to a consistent tree before it is persisted:
 * missions with a vanished owner are completed, other tasks with a vanished
 * owner are released, and child and room lists lose entries that no longer
 * exist.
 */
export function repairEntityIntegrity(store: EntityStore): IntegrityReport {
  let removedMissions = 0;
  let releasedTasks = 0;
  for (const dangling of findDanglingOwners(store)) {
    const owner = ownerEntity(dangling.owner);
    if (dangling.level === 'mission') {
      try {
        if (completeMission(store, dangling.entity)) {
          removedMissions += 1;
        }
      } catch (error) {
        if (!(error instanceof OwnershipInvariantError)) {
          throw error;
        }
        telemetry.recordInvariantViolation('OwnerMismatch', {
          entity: formatEntity(dangling.entity),
          message: error.message,
        });
      }
    } else if (owner !== undefined) {
      findTask(store, dangling.entity)?.task.ownerComplete(owner);
      releasedTasks += 1;
    }
  }

  let droppedChildren = 0;
  for (const entity of store.entitiesWith(DirectiveDataAttribute)) {
    const data = store.get(DirectiveDataAttribute, entity);
    if (data) {
      droppedChildren += dropDeadChildren(store, asDirective(data), (child) =>
        store.has(MissionDataAttribute, child),
      );
    }
  }
  for (const entity of store.entitiesWith(MissionDataAttribute)) {
    const data = store.get(MissionDataAttribute, entity);
    if (data) {
      droppedChildren += dropDeadChildren(store, asMission(data), (child) =>
        store.has(JobDataAttribute, child),
      );
    }
  }

  let droppedRoomEntries = 0;
  for (const entity of store.entitiesWith(RoomDataAttribute)) {
    const room = store.get(RoomDataAttribute, entity);
    if (room) {
      droppedRoomEntries += room.pruneMissions((mission) =>
        store.has(MissionDataAttribute, mission),
      ).length;
    }
  }

  const report = { removedMissions, releasedTasks, droppedChildren, droppedRoomEntries };
  if (removedMissions + releasedTasks + droppedChildren + droppedRoomEntries > 0) {
    telemetry.recordWarning('IntegrityRepaired', report);
  }
  return report;
}
