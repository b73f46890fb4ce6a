import { afterEach, describe, expect, it, vi } from 'vitest';

import type { Entity } from '../entity-store.js';
import { JobDataAttribute } from '../jobs/job-types.js';
import { ensureRoomEntity } from '../room/room-entities.js';
import { createMissionSystem } from '../systems/mission-system.js';
import { createRoomDataSystem } from '../systems/room-data-system.js';
import { resetTelemetry, setTelemetry, silentTelemetry } from '../telemetry.js';
import {
  createTestTickContext,
  InMemoryWorld,
  nextTick,
  type RoomFixture,
  type TestTickContext,
} from '../test-utils.js';
import { createRemoteMineMission } from './mission-builders.js';

const OUTPOST: RoomFixture = {
  sources: [
    { id: 's-a', x: 10, y: 10 },
    { id: 's-b', x: 40, y: 40 },
  ],
  exits: ['W1N1'],
};

function mineWorld(): InMemoryWorld {
  const world = new InMemoryWorld();
  world.addRoom('W1N1', {
    controller: { id: 'ctrl', level: 3, owner: 'tester', my: true },
    structures: [{ id: 'spawn1', kind: 'spawn', pos: { x: 25, y: 30, room: 'W1N1' } }],
    exits: ['W2N1'],
  });
  world.addRoom('W2N1', OUTPOST);
  return world;
}

function setup(world: InMemoryWorld): { context: TestTickContext; mission: Entity } {
  const context = createTestTickContext({ world });
  createRoomDataSystem().tick(context);
  const mission = createRemoteMineMission(context.store, {
    room: ensureRoomEntity(context.store, context.rooms, 'W2N1').entity,
    home: ensureRoomEntity(context.store, context.rooms, 'W1N1').entity,
  });
  return { context, mission };
}

describe('RemoteMineMission', () => {
  afterEach(() => {
    resetTelemetry();
  });

  it('sends one miner per source that delivers to the home spawn', () => {
    const world = mineWorld();
    const { context } = setup(world);
    const { store } = context;
    const system = createMissionSystem();

    let current = nextTick(context);
    system.tick(current);
    expect(
      world.spawnLog.map(({ room, request }) => [room, request.label, request.priority]),
    ).toEqual([
      ['W1N1', 'miner', 1],
      ['W1N1', 'miner', 1],
    ]);
    world.fulfilSpawns();

    const targets = store.entitiesWith(JobDataAttribute).map((job) => {
      const data = store.get(JobDataAttribute, job);
      return data?.kind === 'harvest' ? [data.job.source.id, data.job.delivery?.id] : undefined;
    });
    expect(targets).toEqual([
      ['s-a', 'spawn1'],
      ['s-b', 'spawn1'],
    ]);

    current = nextTick(current);
    system.tick(current);
    expect(world.spawnLog).toHaveLength(2);
  });

  it('holds off while hostiles are in the room', () => {
    const recordError = vi.fn();
    setTelemetry({ ...silentTelemetry, recordError });
    const world = mineWorld();
    world.addRoom('W2N1', { ...OUTPOST, hostileUnitCount: 2 });
    const { context, mission } = setup(world);

    createMissionSystem().tick(nextTick(context));

    expect(context.store.isAlive(mission)).toBe(true);
    expect(world.spawnLog).toEqual([]);
    expect(recordError).toHaveBeenCalledWith('TaskRunFailed', {
      entity: '2v0',
      kind: 'remoteMine',
      level: 'mission',
      code: 'ROOM_HOSTILE',
      message: 'Hostiles present in W2N1.',
      details: { room: 'W2N1', hostiles: 2 },
    });
  });

  it('completes once another player takes the room', () => {
    const world = mineWorld();
    const { context, mission } = setup(world);
    world.addRoom('W2N1', { ...OUTPOST, controller: { id: 'c2', level: 1, owner: 'rival' } });
    const current = nextTick(context);
    createRoomDataSystem().tick(current);

    createMissionSystem().tick(current);

    expect(context.store.isAlive(mission)).toBe(false);
    expect(world.spawnLog).toEqual([]);
  });
});
