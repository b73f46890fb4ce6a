import type { SegmentPlatform } from '@colonist/world-contract';

import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config.js';
import { telemetry } from '../telemetry.js';

export interface SegmentRequirementOptions {
  /** Shown in diagnostics. */
  readonly label: string;
  readonly segments: readonly number[];
  /** Holds back system execution until every listed segment is active. */
  readonly gatesExecution?: boolean;
  /**
   * Runs once per environment lifecycle, the first tick all listed segments
   * are active.
   */
  readonly onLoad?: () => void;
}

interface SegmentRequirement {
  readonly label: string;
  readonly segments: readonly number[];
  readonly gatesExecution: boolean;
  readonly onLoad?: () => void;
  loaded: boolean;
}

const utf8Encoder = new TextEncoder();

export function segmentByteLength(data: string): number {
  return utf8Encoder.encode(data).byteLength;
}

/**
 * Single access point to persistent segments. Requests accumulate during the
 * tick and are handed to the platform by {@link MemoryArbiter.clear}; the
 * platform's active set is read at most once per tick.
 */
export class MemoryArbiter {
  private active: ReadonlySet<number> | undefined;
  private readonly requests = new Set<number>();
  private readonly requirements: SegmentRequirement[] = [];
  private readonly limits: EngineConfig['segments'];

  constructor(
    readonly platform: SegmentPlatform,
    limits: EngineConfig['segments'] = DEFAULT_ENGINE_CONFIG.segments,
  ) {
    this.limits = limits;
  }

  register(options: SegmentRequirementOptions): void {
    for (const segment of options.segments) {
      this.assertSegment(segment);
    }
    this.requirements.push({
      label: options.label,
      segments: Object.freeze([...options.segments]),
      gatesExecution: options.gatesExecution ?? false,
      onLoad: options.onLoad,
      loaded: false,
    });
  }

  request(segment: number): void {
    this.assertSegment(segment);
    this.requests.add(segment);
  }

  isActive(segment: number): boolean {
    if (!this.active) {
      this.active = new Set(this.platform.activeSegments());
    }
    return this.active.has(segment);
  }

  get(segment: number): string | undefined {
    if (!this.isActive(segment)) {
      return undefined;
    }
    return this.platform.read(segment);
  }

  /**
   * Writes `data` unless it exceeds the segment bound, in which case the
   * write is dropped and the previous content kept.
   *
   * @returns whether the write reached the platform.
   */
  set(segment: number, data: string): boolean {
    this.assertSegment(segment);
    const bytes = segmentByteLength(data);
    if (bytes > this.limits.maxSegmentBytes) {
      telemetry.recordError('SegmentWriteTooLarge', {
        segment,
        bytes,
        limit: this.limits.maxSegmentBytes,
      });
      return false;
    }
    this.platform.write(segment, data);
    return true;
  }

  /**
   * End-of-tick flush: hands the accumulated requests to the platform and
   * forgets this tick's activity snapshot.
   */
  clear(): void {
    const requested = [...this.requests].sort((left, right) => left - right);
    const granted = requested.slice(0, this.limits.maxActiveSegments);
    if (granted.length < requested.length) {
      telemetry.recordWarning('SegmentRequestOverflow', {
        requested,
        granted,
        limit: this.limits.maxActiveSegments,
      });
    }
    this.platform.setActiveSegments(granted);
    this.requests.clear();
    this.active = undefined;
  }

  pendingRequests(): readonly number[] {
    return [...this.requests].sort((left, right) => left - right);
  }

  requestRegistered(): void {
    for (const requirement of this.requirements) {
      for (const segment of requirement.segments) {
        this.requests.add(segment);
      }
    }
  }

  gatesReady(): boolean {
    return this.requirements
      .filter((requirement) => requirement.gatesExecution)
      .every((requirement) =>
        requirement.segments.every((segment) => this.isActive(segment)),
      );
  }

  /**
   * Fires each pending `onLoad` whose segments are all active.
   *
   * @returns labels of the requirements that loaded.
   */
  runPendingLoads(): readonly string[] {
    const loaded: string[] = [];
    for (const requirement of this.requirements) {
      if (requirement.loaded || !requirement.onLoad) {
        continue;
      }
      if (!requirement.segments.every((segment) => this.isActive(segment))) {
        continue;
      }
      requirement.onLoad();
      requirement.loaded = true;
      loaded.push(requirement.label);
    }
    return loaded;
  }

  registeredSegments(): readonly number[] {
    return this.requirements.flatMap((requirement) => requirement.segments);
  }

  resetLoadState(): void {
    for (const requirement of this.requirements) {
      requirement.loaded = false;
    }
  }

  private assertSegment(segment: number): void {
    if (
      !Number.isInteger(segment) ||
      segment < 0 ||
      segment >= this.limits.segmentCount
    ) {
      throw new RangeError(
        `Segment ${segment} is outside 0..${this.limits.segmentCount - 1}.`,
      );
    }
  }
}
