import { describe, expect, it } from 'vitest';

import { createJobSystem } from '../systems/job-system.js';
import { createTestTickContext, InMemoryWorld, jobPhase, nextTick } from '../test-utils.js';
import { createUpgradeJob } from './job-builders.js';

const CONTROLLER = { id: 'ctrl', pos: { x: 25, y: 25, room: 'W1N1' } };

function upgradeWorld(): InMemoryWorld {
  const world = new InMemoryWorld();
  world.addRoom('W1N1', { controller: { id: 'ctrl', level: 2, owner: 'tester', my: true } });
  return world;
}

describe('UpgradeJob', () => {
  it('refills from its supply and upgrades within range of the controller', () => {
    const world = upgradeWorld();
    world.addUnit('u1', { x: 20, y: 20, room: 'W1N1' });
    const context = createTestTickContext({ world });
    const job = createUpgradeJob(context.store, {
      unitName: 'u1',
      controller: CONTROLLER,
      supply: { id: 'box', pos: { x: 30, y: 30, room: 'W1N1' } },
    });
    const system = createJobSystem();

    let current = nextTick(context);
    system.tick(current);
    expect(jobPhase(context.store, job)).toEqual({ type: 'moveToController' });

    world.updateUnit('u1', { pos: { x: 23, y: 23, room: 'W1N1' } });
    current = nextTick(current);
    system.tick(current);
    expect(jobPhase(context.store, job)).toEqual({ type: 'moveToSupply' });

    world.updateUnit('u1', { pos: { x: 29, y: 29, room: 'W1N1' } });
    current = nextTick(current);
    system.tick(current);
    expect(jobPhase(context.store, job)).toEqual({ type: 'withdraw' });

    world.updateUnit('u1', { energy: 50 });
    current = nextTick(current);
    system.tick(current);
    expect(jobPhase(context.store, job)).toEqual({ type: 'moveToController' });

    world.updateUnit('u1', { pos: { x: 26, y: 26, room: 'W1N1' } });
    system.tick(nextTick(current));
    expect(jobPhase(context.store, job)).toEqual({ type: 'upgrade' });

    expect(world.actionsOf('u1')).toEqual([
      { action: 'moveTo', unit: 'u1', target: 'W1N1:25,25', range: 3 },
      { action: 'moveTo', unit: 'u1', target: 'W1N1:30,30', range: 1 },
      { action: 'withdraw', unit: 'u1', target: 'box' },
      { action: 'moveTo', unit: 'u1', target: 'W1N1:25,25', range: 3 },
      { action: 'upgradeController', unit: 'u1', target: 'ctrl' },
    ]);
    expect(context.store.isAlive(job)).toBe(true);
  });

  it('waits when empty and there is nothing to withdraw from', () => {
    const world = upgradeWorld();
    world.addUnit('u1', { x: 25, y: 24, room: 'W1N1' });
    const context = createTestTickContext({ world });
    const job = createUpgradeJob(context.store, { unitName: 'u1', controller: CONTROLLER });

    createJobSystem().tick(nextTick(context));

    expect(jobPhase(context.store, job)).toEqual({ type: 'wait', ticks: 4 });
    expect(world.actionLog).toEqual([]);
  });
});
