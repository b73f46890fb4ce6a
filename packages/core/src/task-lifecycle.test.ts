import { afterEach, describe, expect, it, vi } from 'vitest';

import { createColonyDirective } from './directives/directive-builders.js';
import { asDirective, DirectiveDataAttribute } from './directives/directive-types.js';
import { EntityStore, type Entity } from './entity-store.js';
import { createHarvestJob, createScoutJob } from './jobs/job-builders.js';
import { asJob, JobDataAttribute } from './jobs/job-types.js';
import { ColonyMission } from './missions/colony-mission.js';
import { createColonyMission } from './missions/mission-builders.js';
import { asMission, MissionDataAttribute } from './missions/mission-types.js';
import {
  ChildList,
  directiveOwner,
  missionOwner,
  NO_OWNER,
  OwnershipInvariantError,
  type OwnerRef,
} from './ownership.js';
import { RoomData, RoomDataAttribute } from './room/room-data.js';
import {
  completeDirective,
  completeJob,
  destroyTaskEntity,
  findDanglingOwners,
  repairEntityIntegrity,
  replaceMission,
} from './task-lifecycle.js';
import { resetTelemetry, setTelemetry, silentTelemetry } from './telemetry.js';

const SOURCE = { id: 'src', pos: { x: 10, y: 10, room: 'W1N1' } };

interface Tree {
  readonly store: EntityStore;
  readonly room: Entity;
  readonly directive: Entity;
  readonly mission: Entity;
  readonly job: Entity;
}

/** room, directive -> mission -> job */
function buildTree(): Tree {
  const store = new EntityStore();
  const room = store.create();
  store.insert(RoomDataAttribute, room, new RoomData('W1N1'));
  const directive = createColonyDirective(store);
  const mission = createColonyMission(store, { room, owner: directiveOwner(directive) });
  const job = createHarvestJob(store, {
    unitName: 'h1',
    source: SOURCE,
    owner: missionOwner(mission),
  });
  return { store, room, directive, mission, job };
}

function addChild(store: EntityStore, owner: Entity, child: Entity): void {
  const directive = store.get(DirectiveDataAttribute, owner);
  if (directive) {
    asDirective(directive).addChild(child);
    return;
  }
  const mission = store.get(MissionDataAttribute, owner);
  if (mission) {
    asMission(mission).addChild(child);
  }
}

function ownerOf(store: EntityStore, entity: Entity): OwnerRef | undefined {
  const mission = store.get(MissionDataAttribute, entity);
  if (mission) {
    return asMission(mission).getOwner();
  }
  const job = store.get(JobDataAttribute, entity);
  return job ? asJob(job).getOwner() : undefined;
}

function childrenOf(store: EntityStore, entity: Entity): readonly Entity[] {
  const directive = store.get(DirectiveDataAttribute, entity);
  if (directive) {
    return asDirective(directive).getChildren();
  }
  const mission = store.get(MissionDataAttribute, entity);
  return mission ? asMission(mission).getChildren() : [];
}

describe('task lifecycle', () => {
  afterEach(() => {
    resetTelemetry();
  });

  it('releases missions before a directive is destroyed', () => {
    const { store, directive, mission, job } = buildTree();

    expect(completeDirective(store, directive)).toBe(true);

    expect(store.isAlive(directive)).toBe(false);
    expect(ownerOf(store, mission)).toEqual(NO_OWNER);
    expect(ownerOf(store, job)).toEqual(missionOwner(mission));
  });

  it('lists built tasks on their owner as they are created', () => {
    const { store, directive, mission, job } = buildTree();
    const scoutJob = createScoutJob(store, {
      unitName: 's1',
      room: 'W2N1',
      owner: directiveOwner(directive),
    });

    expect(childrenOf(store, directive)).toEqual([mission, scoutJob]);
    expect(childrenOf(store, mission)).toEqual([job]);
  });

  it('leaves built missions ownerless but alive after their directive completes', () => {
    const { store, directive, mission } = buildTree();

    completeDirective(store, directive);

    expect(findDanglingOwners(store)).toEqual([]);
    expect(repairEntityIntegrity(store)).toEqual({
      removedMissions: 0,
      releasedTasks: 0,
      droppedChildren: 0,
      droppedRoomEntries: 0,
    });
    expect(store.has(MissionDataAttribute, mission)).toBe(true);
    expect(ownerOf(store, mission)).toEqual(NO_OWNER);
  });

  it('rejects a release from an entity that is not the recorded owner', () => {
    const { store, mission } = buildTree();
    const impostor = createColonyDirective(store);
    addChild(store, impostor, mission);

    expect(() => completeDirective(store, impostor)).toThrow(OwnershipInvariantError);
    expect(store.has(DirectiveDataAttribute, impostor)).toBe(true);
    expect(ownerOf(store, mission)).toMatchObject({ kind: 'directive' });
  });

  it('tells the owner when a job completes', () => {
    const { store, mission, job } = buildTree();

    completeJob(store, job);

    expect(store.isAlive(job)).toBe(false);
    expect(childrenOf(store, mission)).toEqual([]);
  });

  it('refuses to destroy an entity other tasks still name as owner', () => {
    const recordInvariantViolation = vi.fn();
    setTelemetry({ ...silentTelemetry, recordInvariantViolation });
    const { store, room, directive } = buildTree();
    const second = createColonyMission(store, { room, owner: directiveOwner(directive) });

    const outcome = destroyTaskEntity(store, directive);

    expect(outcome).toEqual({
      success: false,
      error: {
        code: 'DANGLING_OWNER_REFERENCE',
        message: 'Entity 1v0 still owns 2v0, 4v0.',
        details: { dependents: ['2v0', '4v0'] },
      },
    });
    expect(store.isAlive(directive)).toBe(true);
    expect(store.isAlive(second)).toBe(true);
    expect(recordInvariantViolation).toHaveBeenCalledWith('DanglingOwnerReference', {
      entity: '1v0',
      dependents: ['2v0', '4v0'],
    });
  });

  it('destroys a task entity nobody depends on', () => {
    const { store, job } = buildTree();

    expect(destroyTaskEntity(store, job)).toEqual({ success: true, value: undefined });
    expect(store.isAlive(job)).toBe(false);
  });

  it('releases the children of a replaced mission and keeps it listed once', () => {
    const { store, room, directive, mission, job } = buildTree();

    replaceMission(store, mission, {
      kind: 'colony',
      mission: new ColonyMission({
        room,
        home: room,
        owner: directiveOwner(directive),
        children: new ChildList(),
      }),
    });

    expect(ownerOf(store, job)).toEqual(NO_OWNER);
    expect(childrenOf(store, mission)).toEqual([]);
    expect(store.get(RoomDataAttribute, room)?.getMissions()).toEqual([mission]);
  });

  describe('repairEntityIntegrity', () => {
    it('completes missions whose directive vanished', () => {
      const recordWarning = vi.fn();
      setTelemetry({ ...silentTelemetry, recordWarning });
      const { store, room, directive, mission, job } = buildTree();
      store.removeAttribute(DirectiveDataAttribute, directive);

      const report = repairEntityIntegrity(store);

      expect(report).toEqual({
        removedMissions: 1,
        releasedTasks: 0,
        droppedChildren: 0,
        droppedRoomEntries: 0,
      });
      expect(store.isAlive(mission)).toBe(false);
      expect(ownerOf(store, job)).toEqual(NO_OWNER);
      expect(store.get(RoomDataAttribute, room)?.getMissions()).toEqual([]);
      expect(recordWarning).toHaveBeenCalledWith('IntegrityRepaired', report);
    });

    it('releases jobs and drops stale entries when a mission vanished', () => {
      const { store, room, directive, mission, job } = buildTree();
      store.removeAttribute(MissionDataAttribute, mission);

      expect(findDanglingOwners(store)).toEqual([
        { entity: job, level: 'job', owner: missionOwner(mission) },
      ]);
      expect(repairEntityIntegrity(store)).toEqual({
        removedMissions: 0,
        releasedTasks: 1,
        droppedChildren: 1,
        droppedRoomEntries: 1,
      });
      expect(ownerOf(store, job)).toEqual(NO_OWNER);
      expect(childrenOf(store, directive)).toEqual([]);
      expect(store.get(RoomDataAttribute, room)?.getMissions()).toEqual([]);
      expect(findDanglingOwners(store)).toEqual([]);
    });

    it('reports nothing for a consistent tree', () => {
      const recordWarning = vi.fn();
      setTelemetry({ ...silentTelemetry, recordWarning });
      const { store } = buildTree();

      expect(repairEntityIntegrity(store)).toEqual({
        removedMissions: 0,
        releasedTasks: 0,
        droppedChildren: 0,
        droppedRoomEntries: 0,
      });
      expect(recordWarning).not.toHaveBeenCalled();
    });
  });
});
