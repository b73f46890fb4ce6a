import { afterEach, describe, expect, it, vi } from 'vitest';

import { segmentByteLength } from '../memory/memory-arbiter.js';
import { resetTelemetry, setTelemetry, silentTelemetry } from '../telemetry.js';
import { InMemoryWorld } from '../test-utils.js';
import { computeStructureCosts, IMPASSABLE_COST, PathCostCache } from './path-cost-cache.js';

function roomWithStructures() {
  const world = new InMemoryWorld();
  return world.addRoom('W1N1', {
    structures: [
      { id: 'road-1', kind: 'road', pos: { x: 10, y: 10, room: 'W1N1' } },
      { id: 'tower-1', kind: 'tower', pos: { x: 12, y: 10, room: 'W1N1' } },
      { id: 'road-2', kind: 'road', pos: { x: 12, y: 10, room: 'W1N1' } },
      { id: 'box-1', kind: 'container', pos: { x: 14, y: 10, room: 'W1N1' } },
    ],
  });
}

describe('PathCostCache', () => {
  afterEach(() => {
    resetTelemetry();
  });

  it('derives structure costs with impassable tiles winning', () => {
    const costs = computeStructureCosts(roomWithStructures());

    expect(costs[10 * 50 + 10]).toBe(1);
    expect(costs[10 * 50 + 12]).toBe(IMPASSABLE_COST);
    expect(costs[10 * 50 + 14]).toBe(0);
  });

  it('combines structural and transient costs', () => {
    const cache = new PathCostCache();
    cache.refreshRoom(roomWithStructures(), 5);
    cache.setTransient('W1N1', 10, 10, 20);

    expect(cache.costAt('W1N1', 10, 10)).toBe(20);
    cache.clearTransient();
    expect(cache.costAt('W1N1', 10, 10)).toBe(1);
    expect(cache.costAt('W1N1', 50, 10)).toBeUndefined();
    expect(cache.costAt('W2N2', 1, 1)).toBeUndefined();
  });

  it('only marks itself dirty when costs change', () => {
    const cache = new PathCostCache();
    const room = roomWithStructures();
    cache.refreshRoom(room, 1);
    expect(cache.isDirty()).toBe(true);
    cache.markStored();

    cache.refreshRoom(room, 2);
    expect(cache.isDirty()).toBe(false);
    expect(cache.lastRefreshed('W1N1')).toBe(2);
  });

  it('restores structure costs from its encoded form', () => {
    const cache = new PathCostCache();
    cache.refreshRoom(roomWithStructures(), 9);
    cache.setTransient('W1N1', 30, 30, 255);

    const restored = new PathCostCache();
    expect(restored.load(cache.encode())).toBe(true);

    expect(restored.costAt('W1N1', 12, 10)).toBe(IMPASSABLE_COST);
    expect(restored.costAt('W1N1', 30, 30)).toBe(0);
    expect(restored.lastRefreshed('W1N1')).toBe(9);
    expect(restored.isDirty()).toBe(false);
  });

  it('treats undecodable payloads as an empty cache', () => {
    const recordWarning = vi.fn();
    setTelemetry({ ...silentTelemetry, recordWarning });
    const cache = new PathCostCache();
    cache.refreshRoom(roomWithStructures(), 1);

    expect(cache.load('{not json')).toBe(false);
    expect(cache.size).toBe(0);
    expect(recordWarning).toHaveBeenCalledWith('PathCostCacheDecodeFailed', { bytes: 9 });

    expect(
      cache.load(JSON.stringify({ version: 1, rooms: [{ room: 'W1N1', tick: 1, costs: 'AAAA' }] })),
    ).toBe(false);
    expect(cache.load(undefined)).toBe(false);
    expect(recordWarning).toHaveBeenCalledTimes(2);
  });

  it('drops the least recently refreshed rooms until the payload fits', () => {
    const recordProgress = vi.fn();
    setTelemetry({ ...silentTelemetry, recordProgress });
    const world = new InMemoryWorld();
    const cache = new PathCostCache();
    const older = Array.from({ length: 20 }, (_, index) => `W${index}N1`);
    const newer = Array.from({ length: 20 }, (_, index) => `W${index + 20}N1`);
    for (const name of older) {
      cache.refreshRoom(world.addRoom(name), 1);
    }
    for (const name of newer) {
      cache.refreshRoom(world.addRoom(name), 2);
    }
    cache.markStored();

    const dropped = cache.trimTo(102_400);

    expect(dropped).toEqual([...older].sort().slice(0, 10));
    expect(cache.size).toBe(30);
    expect(newer.every((name) => cache.has(name))).toBe(true);
    expect(segmentByteLength(cache.encode())).toBeLessThanOrEqual(102_400);
    expect(cache.isDirty()).toBe(true);
    expect(recordProgress).toHaveBeenCalledWith('PathCostCacheTrimmed', {
      dropped: 10,
      bytes: segmentByteLength(cache.encode()),
      limit: 102_400,
    });
  });

  it('keeps every room when the payload already fits', () => {
    const cache = new PathCostCache();
    cache.refreshRoom(roomWithStructures(), 1);
    cache.markStored();

    expect(cache.trimTo(102_400)).toEqual([]);
    expect(cache.size).toBe(1);
    expect(cache.isDirty()).toBe(false);
  });
});
