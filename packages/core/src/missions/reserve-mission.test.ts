import { describe, expect, it } from 'vitest';

import type { Entity } from '../entity-store.js';
import { asJob, JobDataAttribute } from '../jobs/job-types.js';
import { ensureRoomEntity } from '../room/room-entities.js';
import { createMissionSystem } from '../systems/mission-system.js';
import { createRoomDataSystem } from '../systems/room-data-system.js';
import {
  createTestTickContext,
  InMemoryWorld,
  nextTick,
  type TestTickContext,
} from '../test-utils.js';
import { createReserveMission } from './mission-builders.js';

function reserveWorld(): InMemoryWorld {
  const world = new InMemoryWorld();
  world.addRoom('W1N1', {
    controller: { id: 'ctrl', level: 2, owner: 'tester', my: true },
    exits: ['W2N1'],
  });
  world.addRoom('W2N1', { controller: { id: 'c2', level: 0 }, exits: ['W1N1'] });
  return world;
}

function setup(world: InMemoryWorld): { context: TestTickContext; mission: Entity } {
  const context = createTestTickContext({ world });
  createRoomDataSystem().tick(context);
  const mission = createReserveMission(context.store, {
    room: ensureRoomEntity(context.store, context.rooms, 'W2N1').entity,
    home: ensureRoomEntity(context.store, context.rooms, 'W1N1').entity,
  });
  return { context, mission };
}

describe('ReserveMission', () => {
  it('replaces reservers that are about to expire', () => {
    const world = reserveWorld();
    const { context } = setup(world);
    const system = createMissionSystem();

    let current = nextTick(context);
    system.tick(current);
    expect(world.fulfilSpawns()).toEqual(['reserver-1']);
    expect(world.spawnLog[0]?.request.priority).toBe(1);

    current = nextTick(current);
    system.tick(current);
    expect(world.spawnLog).toHaveLength(1);

    world.updateUnit('reserver-1', { ticksToLive: 50 });
    current = nextTick(current);
    system.tick(current);
    expect(world.spawnLog.map(({ request }) => request.label)).toEqual(['reserver', 'reserver']);
  });

  it('sends nobody while our reservation has long to run', () => {
    const world = reserveWorld();
    const { context } = setup(world);
    world.addRoom('W2N1', {
      controller: {
        id: 'c2',
        level: 0,
        reservation: { username: 'tester', ticksToEnd: 2000 },
      },
      exits: ['W1N1'],
    });

    createMissionSystem().tick(nextTick(context));

    expect(world.spawnLog).toEqual([]);
  });

  it('completes once the room is ours and releases its reserver', () => {
    const world = reserveWorld();
    const { context, mission } = setup(world);
    const { store } = context;
    const system = createMissionSystem();

    let current = nextTick(context);
    system.tick(current);
    world.fulfilSpawns();
    const [job] = store.entitiesWith(JobDataAttribute);
    const jobData = job === undefined ? undefined : store.get(JobDataAttribute, job);
    expect(jobData?.kind).toBe('reserve');
    expect(jobData && asJob(jobData).getOwner()).toEqual({ kind: 'mission', entity: mission });

    world.addRoom('W2N1', {
      controller: { id: 'c2', level: 1, owner: 'tester', my: true },
      exits: ['W1N1'],
    });
    current = nextTick(current);
    createRoomDataSystem().tick(current);
    system.tick(current);

    expect(store.isAlive(mission)).toBe(false);
    expect(job !== undefined && store.isAlive(job)).toBe(true);
    expect(jobData && asJob(jobData).getOwner().kind).toBe('none');
  });
});
