import { describe, expect, it } from 'vitest';

import { createJobSystem } from '../systems/job-system.js';
import { createTestTickContext, InMemoryWorld, jobPhase, nextTick } from '../test-utils.js';
import { createBuildJob } from './job-builders.js';

const SITE = {
  id: 'site1',
  kind: 'construction-site',
  pos: { x: 20, y: 20, room: 'W1N1' },
} as const;
const SOURCES = [{ id: 'src', x: 10, y: 10 }];

describe('BuildJob', () => {
  it('harvests when empty and completes once no site is left', () => {
    const world = new InMemoryWorld();
    world.addRoom('W1N1', { sources: SOURCES, constructionSites: [SITE] });
    world.addUnit('b1', { x: 25, y: 25, room: 'W2N1' });
    const context = createTestTickContext({ world });
    const job = createBuildJob(context.store, { unitName: 'b1', room: 'W1N1' });
    const system = createJobSystem();

    let current = nextTick(context);
    system.tick(current);
    expect(jobPhase(context.store, job)).toEqual({ type: 'moveToRoom' });

    world.updateUnit('b1', { pos: { x: 25, y: 25, room: 'W1N1' } });
    current = nextTick(current);
    system.tick(current);
    expect(jobPhase(context.store, job)).toEqual({
      type: 'moveToSite',
      site: { id: 'site1', pos: SITE.pos },
    });

    world.updateUnit('b1', { pos: { x: 22, y: 22, room: 'W1N1' } });
    current = nextTick(current);
    system.tick(current);
    expect(jobPhase(context.store, job)?.type).toBe('collect');

    world.updateUnit('b1', { pos: { x: 11, y: 10, room: 'W1N1' } });
    current = nextTick(current);
    system.tick(current);
    expect(jobPhase(context.store, job)?.type).toBe('collect');

    world.updateUnit('b1', { energy: 50 });
    current = nextTick(current);
    system.tick(current);
    expect(jobPhase(context.store, job)?.type).toBe('moveToSite');

    world.updateUnit('b1', { pos: { x: 21, y: 21, room: 'W1N1' } });
    current = nextTick(current);
    system.tick(current);
    expect(jobPhase(context.store, job)?.type).toBe('build');

    world.addRoom('W1N1', { sources: SOURCES });
    system.tick(nextTick(current));

    expect(context.store.isAlive(job)).toBe(false);
    expect(world.actionsOf('b1')).toEqual([
      { action: 'moveTo', unit: 'b1', target: 'W1N1:25,25', range: 23 },
      { action: 'moveTo', unit: 'b1', target: 'W1N1:20,20', range: 3 },
      { action: 'moveTo', unit: 'b1', target: 'W1N1:10,10', range: 1 },
      { action: 'harvest', unit: 'b1', target: 'src' },
      { action: 'moveTo', unit: 'b1', target: 'W1N1:20,20', range: 3 },
      { action: 'build', unit: 'b1', target: 'site1' },
    ]);
  });
});
