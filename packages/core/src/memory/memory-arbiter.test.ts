import { afterEach, describe, expect, it, vi } from 'vitest';

import { resolveEngineConfig } from '../config.js';
import { resetTelemetry, setTelemetry, silentTelemetry } from '../telemetry.js';
import { InMemorySegmentPlatform } from '../test-utils.js';
import { MemoryArbiter, segmentByteLength } from './memory-arbiter.js';

describe('MemoryArbiter', () => {
  afterEach(() => {
    resetTelemetry();
  });

  it('returns written content while the segment is active', () => {
    const platform = new InMemorySegmentPlatform();
    platform.activateNow([5]);
    const arbiter = new MemoryArbiter(platform);

    expect(arbiter.set(5, '{"rooms":[]}')).toBe(true);
    expect(arbiter.get(5)).toBe('{"rooms":[]}');
  });

  it('hides content of inactive segments', () => {
    const platform = new InMemorySegmentPlatform({ 12: 'stored' });
    const arbiter = new MemoryArbiter(platform);

    expect(arbiter.get(12)).toBeUndefined();
    expect(platform.stored(12)).toBe('stored');
  });

  it('drops oversized writes and keeps the previous content', () => {
    const recordError = vi.fn();
    setTelemetry({ ...silentTelemetry, recordError });
    const platform = new InMemorySegmentPlatform();
    platform.activateNow([5]);
    const limits = resolveEngineConfig({ segments: { maxSegmentBytes: 8 } }).segments;
    const arbiter = new MemoryArbiter(platform, limits);

    arbiter.set(5, 'old');
    expect(arbiter.set(5, '123456789')).toBe(false);

    expect(arbiter.get(5)).toBe('old');
    expect(recordError).toHaveBeenCalledWith('SegmentWriteTooLarge', {
      segment: 5,
      bytes: 9,
      limit: 8,
    });
  });

  it('measures the bound in encoded bytes', () => {
    expect(segmentByteLength('abc')).toBe(3);
    expect(segmentByteLength('é')).toBe(2);
  });

  it('reads the active set once per tick', () => {
    const platform = new InMemorySegmentPlatform();
    platform.activateNow([1]);
    const arbiter = new MemoryArbiter(platform);

    expect(arbiter.isActive(1)).toBe(true);
    platform.activateNow([2]);
    expect(arbiter.isActive(2)).toBe(false);
    expect(arbiter.isActive(1)).toBe(true);

    arbiter.clear();
    expect(arbiter.isActive(2)).toBe(true);
  });

  it('activates requested segments on the following tick', () => {
    const platform = new InMemorySegmentPlatform();
    const arbiter = new MemoryArbiter(platform);

    arbiter.request(3);
    arbiter.request(7);
    arbiter.request(3);
    expect(arbiter.isActive(3)).toBe(false);
    arbiter.clear();
    platform.advanceTick();

    expect(arbiter.isActive(3)).toBe(true);
    expect(arbiter.isActive(7)).toBe(true);
    expect(platform.activationRequests).toEqual([[3, 7]]);
  });

  it('truncates requests beyond the active limit to the lowest segments', () => {
    const recordWarning = vi.fn();
    setTelemetry({ ...silentTelemetry, recordWarning });
    const platform = new InMemorySegmentPlatform();
    const limits = resolveEngineConfig({ segments: { maxActiveSegments: 2 } }).segments;
    const arbiter = new MemoryArbiter(platform, limits);

    arbiter.request(9);
    arbiter.request(1);
    arbiter.request(4);
    arbiter.clear();

    expect(platform.activationRequests).toEqual([[1, 4]]);
    expect(recordWarning).toHaveBeenCalledWith('SegmentRequestOverflow', {
      requested: [1, 4, 9],
      granted: [1, 4],
      limit: 2,
    });
    expect(arbiter.pendingRequests()).toEqual([]);
  });

  it('rejects segments outside the index space', () => {
    const arbiter = new MemoryArbiter(new InMemorySegmentPlatform());

    expect(() => arbiter.request(100)).toThrowError('Segment 100 is outside 0..99.');
    expect(() => arbiter.set(-1, 'x')).toThrowError(RangeError);
  });

  it('gates execution and fires load callbacks once per lifecycle', () => {
    const platform = new InMemorySegmentPlatform();
    const arbiter = new MemoryArbiter(platform);
    const onLoad = vi.fn();
    arbiter.register({
      label: 'snapshot',
      segments: [50, 51],
      gatesExecution: true,
      onLoad,
    });
    arbiter.register({ label: 'cache', segments: [55] });

    arbiter.requestRegistered();
    expect(arbiter.pendingRequests()).toEqual([50, 51, 55]);
    expect(arbiter.registeredSegments()).toEqual([50, 51, 55]);
    expect(arbiter.gatesReady()).toBe(false);
    expect(arbiter.runPendingLoads()).toEqual([]);

    arbiter.clear();
    platform.advanceTick();

    expect(arbiter.gatesReady()).toBe(true);
    expect(arbiter.runPendingLoads()).toEqual(['snapshot']);
    expect(arbiter.runPendingLoads()).toEqual([]);
    expect(onLoad).toHaveBeenCalledTimes(1);

    arbiter.resetLoadState();
    expect(arbiter.runPendingLoads()).toEqual(['snapshot']);
    expect(onLoad).toHaveBeenCalledTimes(2);
  });
});
