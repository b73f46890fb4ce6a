import { afterEach, describe, expect, it, vi } from 'vitest';

import type { Entity } from '../entity-store.js';
import { ChildList, NO_OWNER } from '../ownership.js';
import { ensureRoomEntity } from '../room/room-entities.js';
import { createMissionSystem } from '../systems/mission-system.js';
import { createRoomDataSystem } from '../systems/room-data-system.js';
import { completeJob } from '../task-lifecycle.js';
import { resetTelemetry, setTelemetry, silentTelemetry } from '../telemetry.js';
import {
  createTestTickContext,
  InMemoryWorld,
  nextTick,
  type TestTickContext,
} from '../test-utils.js';
import { createMissionEntity, createScoutMission } from './mission-builders.js';
import { asMission, MissionDataAttribute } from './mission-types.js';
import { MAX_SCOUT_ATTEMPTS, nextScoutDelay, ScoutMission } from './scout-mission.js';

interface ScoutSetup {
  readonly context: TestTickContext;
  readonly room: Entity;
  readonly home: Entity;
}

/** W1N1 is ours and visible; W2N1 is known by name only. */
function setup(): ScoutSetup {
  const world = new InMemoryWorld();
  world.addRoom('W1N1', {
    controller: { id: 'ctrl', level: 2, owner: 'tester', my: true },
    exits: ['W2N1'],
  });
  const context = createTestTickContext({ world });
  createRoomDataSystem().tick(context);
  const home = ensureRoomEntity(context.store, context.rooms, 'W1N1').entity;
  const room = ensureRoomEntity(context.store, context.rooms, 'W2N1').entity;
  return { context, room, home };
}

describe('nextScoutDelay', () => {
  it('grows by a quarter lifetime per scout up to three lifetimes', () => {
    expect(nextScoutDelay(0)).toBe(0);
    expect(nextScoutDelay(1)).toBe(375);
    expect(nextScoutDelay(4)).toBe(1500);
    expect(nextScoutDelay(20)).toBe(4500);
  });
});

describe('ScoutMission', () => {
  afterEach(() => {
    resetTelemetry();
  });

  it('backs off before sending the next scout', () => {
    const { context, room, home } = setup();
    const { store, world } = context;
    const mission = createScoutMission(store, { room, home });
    const system = createMissionSystem();

    let current = nextTick(context);
    system.tick(current);
    expect(world.spawnLog.map(({ room: spawnRoom, request }) => [spawnRoom, request.label])).toEqual(
      [['W1N1', 'scout']],
    );
    expect(world.spawnLog[0]?.request.body).toEqual(['move']);
    world.fulfilSpawns();

    const data = store.get(MissionDataAttribute, mission);
    const [scout] = data ? asMission(data).getChildren() : [];
    expect(data?.kind === 'scout' ? data.mission.spawnedScouts : undefined).toBe(1);
    if (scout !== undefined) {
      completeJob(store, scout);
    }

    current = nextTick(current);
    system.tick(current);
    expect(world.spawnLog).toHaveLength(1);
    expect(current.describe.list('mission')).toEqual([
      { level: 'mission', entity: mission, text: 'Scout W2N1 - scouts 0 - next spawn 374' },
    ]);

    world.time += 373;
    current = nextTick(current);
    expect(current.tick).toBe(377);
    system.tick(current);
    expect(world.spawnLog).toHaveLength(2);
  });

  it('completes as soon as the room has been seen', () => {
    const { context, room, home } = setup();
    const { store, world } = context;
    const mission = createScoutMission(store, { room, home });
    world.addRoom('W2N1', { exits: ['W1N1'] });
    const current = nextTick(context);
    createRoomDataSystem().tick(current);

    createMissionSystem().tick(current);

    expect(store.isAlive(mission)).toBe(false);
    expect(world.spawnLog).toEqual([]);
  });

  it('gives up after the last permitted scout', () => {
    const recordWarning = vi.fn();
    setTelemetry({ ...silentTelemetry, recordWarning });
    const { context, room, home } = setup();
    const mission = createMissionEntity(context.store, {
      kind: 'scout',
      mission: new ScoutMission(
        { room, home, owner: NO_OWNER, children: new ChildList() },
        MAX_SCOUT_ATTEMPTS,
      ),
    });

    createMissionSystem().tick(nextTick(context));

    expect(context.store.isAlive(mission)).toBe(false);
    expect(context.world.spawnLog).toEqual([]);
    expect(recordWarning).toHaveBeenCalledWith('ScoutMissionAbandoned', {
      room: 'W2N1',
      attempts: 4,
    });
  });
});
