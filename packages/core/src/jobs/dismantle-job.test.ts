import { describe, expect, it } from 'vitest';

import { createJobSystem } from '../systems/job-system.js';
import { createTestTickContext, InMemoryWorld, jobPhase, nextTick } from '../test-utils.js';
import { createDismantleJob } from './job-builders.js';

const ROAD = { id: 'road-1', kind: 'road', pos: { x: 5, y: 5, room: 'W4N1' } } as const;
const RIVAL_WALL = {
  id: 'wall-x',
  kind: 'wall',
  pos: { x: 30, y: 30, room: 'W4N1' },
  owner: 'rival',
} as const;

describe('DismantleJob', () => {
  it('dismantles foreign structures and completes once none are left', () => {
    const world = new InMemoryWorld();
    world.addRoom('W4N1', { structures: [ROAD, RIVAL_WALL] });
    world.addUnit('d1', { x: 25, y: 25, room: 'W4N1' });
    const context = createTestTickContext({ world });
    const job = createDismantleJob(context.store, { unitName: 'd1', room: 'W4N1' });
    const system = createJobSystem();

    let current = nextTick(context);
    system.tick(current);
    expect(jobPhase(context.store, job)).toEqual({
      type: 'moveToTarget',
      target: { id: 'wall-x', pos: RIVAL_WALL.pos },
    });

    world.updateUnit('d1', { pos: { x: 29, y: 30, room: 'W4N1' } });
    current = nextTick(current);
    system.tick(current);
    expect(jobPhase(context.store, job)?.type).toBe('dismantle');

    world.addRoom('W4N1', { structures: [ROAD] });
    system.tick(nextTick(current));

    expect(context.store.isAlive(job)).toBe(false);
    expect(world.actionsOf('d1')).toEqual([
      { action: 'moveTo', unit: 'd1', target: 'W4N1:30,30', range: 1 },
      { action: 'dismantle', unit: 'd1', target: 'wall-x' },
    ]);
  });

  it('leaves structures without an owner alone', () => {
    const world = new InMemoryWorld();
    world.addRoom('W4N1', { structures: [ROAD] });
    world.addUnit('d1', { x: 25, y: 25, room: 'W4N1' });
    const context = createTestTickContext({ world });
    const job = createDismantleJob(context.store, { unitName: 'd1', room: 'W4N1' });

    createJobSystem().tick(nextTick(context));

    expect(context.store.isAlive(job)).toBe(false);
    expect(world.actionLog).toEqual([]);
  });
});
