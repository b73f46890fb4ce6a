import { describe, expect, it } from 'vitest';

import { createJobSystem } from '../systems/job-system.js';
import { createTestTickContext, InMemoryWorld, jobPhase, nextTick } from '../test-utils.js';
import { createScoutJob } from './job-builders.js';

describe('ScoutJob', () => {
  it('idles once inside the room and walks back after leaving it', () => {
    const world = new InMemoryWorld();
    world.addUnit('s1', { x: 25, y: 25, room: 'W2N1' });
    const context = createTestTickContext({ world });
    const job = createScoutJob(context.store, { unitName: 's1', room: 'W1N1' });
    const system = createJobSystem();

    let current = nextTick(context);
    system.tick(current);
    expect(jobPhase(context.store, job)).toEqual({ type: 'moveToRoom' });

    world.updateUnit('s1', { pos: { x: 3, y: 25, room: 'W1N1' } });
    current = nextTick(current);
    system.tick(current);
    expect(jobPhase(context.store, job)).toEqual({ type: 'idle', since: 3 });

    current = nextTick(current);
    system.tick(current);
    expect(jobPhase(context.store, job)).toEqual({ type: 'idle', since: 3 });

    world.updateUnit('s1', { pos: { x: 48, y: 25, room: 'W2N1' } });
    current = nextTick(current);
    system.tick(current);
    expect(jobPhase(context.store, job)).toEqual({ type: 'moveToRoom' });

    system.tick(nextTick(current));
    expect(world.actionsOf('s1')).toEqual([
      { action: 'moveTo', unit: 's1', target: 'W1N1:25,25', range: 23 },
      { action: 'moveTo', unit: 's1', target: 'W1N1:25,25', range: 23 },
    ]);
    expect(context.store.isAlive(job)).toBe(true);
  });
});
