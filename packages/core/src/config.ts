import {
  MAX_ACTIVE_SEGMENTS,
  MAX_SEGMENT_BYTES,
  SEGMENT_COUNT,
} from '@colonist/world-contract';

export interface EngineConfig {
  readonly limits: {
    /**
     * Maximum phase replacements a single state-machine invocation performs
     * within one tick.
     *
     * @defaultValue `20`
     */
    readonly maxStateTransitions: number;
  };
  readonly segments: {
    /**
     * Largest payload, in bytes, accepted by a single segment write.
     *
     * @defaultValue `102400`
     */
    readonly maxSegmentBytes: number;
    /**
     * Segments the platform activates at once.
     *
     * @defaultValue `10`
     */
    readonly maxActiveSegments: number;
    /**
     * Size of the segment index space.
     *
     * @defaultValue `100`
     */
    readonly segmentCount: number;
  };
  readonly persistence: {
    /**
     * Segments holding the entity store snapshot, in chunk order.
     *
     * @defaultValue `[50, 51, 52, 53]`
     */
    readonly snapshotSegments: readonly number[];
    /**
     * Segment holding the path-cost cache.
     *
     * @defaultValue `55`
     */
    readonly pathCostSegment: number;
  };
  readonly timing: {
    /**
     * Per-tick budget; ticks running longer are flagged as slow.
     *
     * @defaultValue `20`
     */
    readonly cpuBudgetMs: number;
    /**
     * Ticks retained by the diagnostic timeline.
     *
     * @defaultValue `120`
     */
    readonly timelineCapacity: number;
  };
}

export type EngineConfigOverrides = Readonly<{
  readonly limits?: Partial<EngineConfig['limits']>;
  readonly segments?: Partial<EngineConfig['segments']>;
  readonly persistence?: Partial<EngineConfig['persistence']>;
  readonly timing?: Partial<EngineConfig['timing']>;
}>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
  limits: Object.freeze({
    maxStateTransitions: 20,
  }),
  segments: Object.freeze({
    maxSegmentBytes: MAX_SEGMENT_BYTES,
    maxActiveSegments: MAX_ACTIVE_SEGMENTS,
    segmentCount: SEGMENT_COUNT,
  }),
  persistence: Object.freeze({
    snapshotSegments: Object.freeze([50, 51, 52, 53]),
    pathCostSegment: 55,
  }),
  timing: Object.freeze({
    cpuBudgetMs: 20,
    timelineCapacity: 120,
  }),
});

function toFiniteNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function toPositiveInt(value: unknown): number | undefined {
  const numeric = toFiniteNumber(value);
  if (numeric === undefined || numeric <= 0) {
    return undefined;
  }
  return Math.max(1, Math.floor(numeric));
}

function toSegmentIndex(value: unknown, segmentCount: number): number | undefined {
  const numeric = toFiniteNumber(value);
  if (numeric === undefined || !Number.isInteger(numeric)) {
    return undefined;
  }
  return numeric >= 0 && numeric < segmentCount ? numeric : undefined;
}

function resolveSegmentsConfig(
  overrides: EngineConfigOverrides['segments'] | undefined,
): EngineConfig['segments'] {
  const source = overrides ?? {};
  const defaults = DEFAULT_ENGINE_CONFIG.segments;

  return {
    maxSegmentBytes:
      toPositiveInt(source.maxSegmentBytes) ?? defaults.maxSegmentBytes,
    maxActiveSegments:
      toPositiveInt(source.maxActiveSegments) ?? defaults.maxActiveSegments,
    segmentCount: toPositiveInt(source.segmentCount) ?? defaults.segmentCount,
  };
}

function resolvePersistenceConfig(
  overrides: EngineConfigOverrides['persistence'] | undefined,
  segmentCount: number,
): EngineConfig['persistence'] {
  const source = overrides ?? {};
  const defaults = DEFAULT_ENGINE_CONFIG.persistence;

  const snapshotSegments = Array.isArray(source.snapshotSegments)
    ? source.snapshotSegments
        .map((segment) => toSegmentIndex(segment, segmentCount))
        .filter((segment): segment is number => segment !== undefined)
    : [];

  return {
    snapshotSegments: Object.freeze(
      snapshotSegments.length > 0 ? snapshotSegments : [...defaults.snapshotSegments],
    ),
    pathCostSegment:
      toSegmentIndex(source.pathCostSegment, segmentCount) ??
      defaults.pathCostSegment,
  };
}

export function resolveEngineConfig(
  overrides?: EngineConfigOverrides,
): EngineConfig {
  const limitsSource = overrides?.limits ?? {};
  const timingSource = overrides?.timing ?? {};
  const segments = resolveSegmentsConfig(overrides?.segments);

  return Object.freeze({
    limits: Object.freeze({
      maxStateTransitions:
        toPositiveInt(limitsSource.maxStateTransitions) ??
        DEFAULT_ENGINE_CONFIG.limits.maxStateTransitions,
    }),
    segments: Object.freeze(segments),
    persistence: Object.freeze(
      resolvePersistenceConfig(overrides?.persistence, segments.segmentCount),
    ),
    timing: Object.freeze({
      cpuBudgetMs:
        toFiniteNumber(timingSource.cpuBudgetMs) ??
        DEFAULT_ENGINE_CONFIG.timing.cpuBudgetMs,
      timelineCapacity:
        toPositiveInt(timingSource.timelineCapacity) ??
        DEFAULT_ENGINE_CONFIG.timing.timelineCapacity,
    }),
  });
}

/**
 * Process-wide values resolved once at start-up and threaded through every
 * tick. Replaced, never mutated.
 */
export interface EngineContext {
  readonly username: string | undefined;
  readonly config: EngineConfig;
}

export function createEngineContext(
  overrides?: EngineConfigOverrides,
  username?: string,
): EngineContext {
  return Object.freeze({
    username,
    config: resolveEngineConfig(overrides),
  });
}

export function withUsername(
  context: EngineContext,
  username: string | undefined,
): EngineContext {
  if (context.username === username) {
    return context;
  }
  return Object.freeze({ ...context, username });
}
