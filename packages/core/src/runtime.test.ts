import { afterEach, describe, expect, it, vi } from 'vitest';

import { ColonistRuntime, resolveUsername } from './runtime.js';
import { createCoreSystems } from './systems/core-systems.js';
import type { SystemDefinition } from './systems/system-types.js';
import { resetTelemetry, setTelemetry, silentTelemetry } from './telemetry.js';
import { createWorldHost, InMemorySegmentPlatform, InMemoryWorld } from './test-utils.js';

function ownedWorld(): InMemoryWorld {
  const world = new InMemoryWorld();
  world.addRoom('W1N1', {
    controller: { id: 'ctrl', level: 2, owner: 'tester', my: true },
    sources: [{ id: 'src', x: 10, y: 10 }],
  });
  return world;
}

/** Runs one runtime tick and advances the host clock and segment latency. */
function createDriver(runtime: ColonistRuntime, world: InMemoryWorld) {
  const platform = new InMemorySegmentPlatform();
  const host = createWorldHost(world, platform);
  return {
    platform,
    step() {
      const report = runtime.tick(host);
      platform.advanceTick();
      world.time += 1;
      return report;
    },
  };
}

describe('ColonistRuntime', () => {
  afterEach(() => {
    resetTelemetry();
  });

  it('orders the core systems', () => {
    expect(new ColonistRuntime().getSystemOrder()).toEqual([
      'room-name-index',
      'room-data',
      'directive-manager',
      'directives',
      'missions',
      'jobs',
      'path-costs',
    ]);
  });

  it('waits for the snapshot segments before running systems', () => {
    const recordWarning = vi.fn();
    setTelemetry({ ...silentTelemetry, recordWarning });
    const world = ownedWorld();
    const runtime = new ColonistRuntime();
    const driver = createDriver(runtime, world);

    expect(driver.step()).toEqual({
      tick: 1,
      status: 'waiting',
      reloaded: true,
      loaded: [],
      tasks: { directives: 0, missions: 0, jobs: 0 },
      snapshotWritten: false,
    });
    expect(recordWarning).toHaveBeenCalledWith('SegmentDataNotReady', {
      tick: 1,
      segments: [50, 51, 52, 53, 55],
    });
    expect(driver.platform.activationRequests).toEqual([[50, 51, 52, 53, 55]]);

    expect(driver.step()).toEqual({
      tick: 2,
      status: 'completed',
      reloaded: false,
      loaded: ['snapshot', 'path-costs'],
      tasks: { directives: 3, missions: 0, jobs: 0 },
      integrity: {
        removedMissions: 0,
        releasedTasks: 0,
        droppedChildren: 0,
        droppedRoomEntries: 0,
      },
      snapshotWritten: true,
    });
    expect(runtime.getEngineContext().username).toBe('tester');
    expect(driver.platform.stored(55)).toBe(runtime.getPathCosts().encode());
  });

  it('grows the task tree one level per tick', () => {
    const world = ownedWorld();
    const runtime = new ColonistRuntime();
    const driver = createDriver(runtime, world);

    driver.step();
    driver.step();
    expect(driver.step().tasks).toEqual({ directives: 3, missions: 1, jobs: 0 });
    expect(world.spawnLog).toEqual([]);

    driver.step();
    expect(world.spawnLog.map(({ request }) => request.label)).toEqual([
      'harvester',
      'upgrader',
    ]);
    expect(runtime.describeEntries().map((entry) => entry.level)).toEqual([
      'directive',
      'directive',
      'directive',
      'mission',
    ]);
  });

  it('rebuilds the store from the snapshot after a missed tick', () => {
    const recordProgress = vi.fn();
    setTelemetry({ ...silentTelemetry, recordProgress });
    const world = ownedWorld();
    const runtime = new ColonistRuntime();
    const driver = createDriver(runtime, world);
    driver.step();
    driver.step();
    driver.step();
    const before = runtime.getStore();

    world.time = 10;
    const report = driver.step();

    expect(report.reloaded).toBe(true);
    expect(report.loaded).toEqual(['snapshot', 'path-costs']);
    expect(report.tasks).toEqual({ directives: 3, missions: 1, jobs: 0 });
    expect(runtime.getStore()).not.toBe(before);
    expect(recordProgress).toHaveBeenCalledWith('EnvironmentReloaded', { tick: 10, lastTick: 3 });
    expect(recordProgress).toHaveBeenCalledWith('SnapshotRestored', {
      entities: 5,
      failedAttributes: 0,
    });
    expect(world.spawnLog.map(({ request }) => request.label)).toEqual([
      'harvester',
      'upgrader',
    ]);
  });

  it('reports a failing system and runs the following tick normally', () => {
    const recordError = vi.fn();
    setTelemetry({ ...silentTelemetry, recordError });
    let calls = 0;
    const flaky: SystemDefinition = {
      id: 'flaky',
      tick() {
        calls += 1;
        if (calls === 1) {
          throw new Error('boom');
        }
      },
    };
    const runtime = new ColonistRuntime({ systems: [flaky] });
    const driver = createDriver(runtime, ownedWorld());
    driver.step();

    const failed = driver.step();
    expect(failed.status).toBe('completed');
    expect(failed.failedSystems).toEqual(['flaky']);
    expect(failed.snapshotWritten).toBe(true);
    expect(recordError).toHaveBeenCalledWith('SystemExecutionFailed', {
      tick: 2,
      systemId: 'flaky',
      error: expect.objectContaining({ name: 'Error', message: 'boom' }),
    });
    expect(recordError).not.toHaveBeenCalledWith('TickFailed', expect.anything());
    expect(runtime.getTimelineSnapshot().entries[1]?.metadata?.systems?.[0]?.error).toMatchObject(
      { message: 'boom' },
    );

    const next = driver.step();
    expect(next.status).toBe('completed');
    expect(next.failedSystems).toBeUndefined();
    expect(calls).toBe(2);
  });

  it('keeps running later systems while one system always throws', () => {
    setTelemetry({ ...silentTelemetry, recordError: vi.fn() });
    const broken: SystemDefinition = {
      id: 'broken',
      tick() {
        throw new Error('always broken');
      },
    };
    const world = ownedWorld();
    const runtime = new ColonistRuntime({ systems: [broken, ...createCoreSystems()] });
    const driver = createDriver(runtime, world);

    driver.step();
    const second = driver.step();
    expect(second.failedSystems).toEqual(['broken']);
    expect(second.tasks).toEqual({ directives: 3, missions: 0, jobs: 0 });
    expect(second.snapshotWritten).toBe(true);
    expect(driver.platform.stored(50)).toBeDefined();

    driver.step();
    driver.step();
    for (const name of world.fulfilSpawns()) {
      world.updateUnit(name, { spawning: false });
    }

    const fifth = driver.step();
    expect(fifth.status).toBe('completed');
    expect(fifth.failedSystems).toEqual(['broken']);
    expect(fifth.tasks.jobs).toBe(2);
    expect(fifth.snapshotWritten).toBe(true);
    expect(
      runtime
        .describeEntries()
        .filter((entry) => entry.level === 'job')
        .map((entry) => entry.text.length > 0),
    ).toEqual([true, true]);
  });

  it('flags ticks that exceed the budget', () => {
    const recordWarning = vi.fn();
    setTelemetry({ ...silentTelemetry, recordWarning });
    let now = 0;
    const runtime = new ColonistRuntime({
      systems: [],
      clock: {
        now: () => {
          now += 30;
          return now;
        },
      },
    });
    const driver = createDriver(runtime, ownedWorld());
    driver.step();
    driver.step();

    expect(recordWarning).toHaveBeenCalledWith('TickExecutionSlow', {
      tick: 2,
      durationMs: 30,
      budgetMs: 20,
    });
    expect(runtime.getTimelineSnapshot().entries.map((entry) => entry.isSlow)).toEqual([
      true,
      true,
    ]);
  });
});

describe('resolveUsername', () => {
  it('reads the owner of a controller marked as ours', () => {
    const world = new InMemoryWorld();
    world.addRoom('W5N5', { controller: { id: 'c1', level: 1, owner: 'rival' } });
    world.addRoom('W1N1', { controller: { id: 'c2', level: 1, owner: 'tester', my: true } });

    expect(resolveUsername(world)).toBe('tester');
  });

  it('is undefined without an owned controller in view', () => {
    expect(resolveUsername(new InMemoryWorld())).toBeUndefined();
  });
});
