import type { WorldHost, WorldView } from '@colonist/world-contract';

import { PathCostCache } from './caches/path-cost-cache.js';
import { RoomNameIndex } from './caches/room-name-index.js';
import {
  createEngineContext,
  withUsername,
  type EngineConfigOverrides,
  type EngineContext,
} from './config.js';
import { DescribeLog, type DescribeEntry } from './diagnostics/describe-sink.js';
import {
  createTickTimelineRecorder,
  toErrorLike,
  type ErrorLike,
  type HighResolutionClock,
  type SystemSpan,
  type TaskCounts,
  type TickTimelineRecorder,
  type TickTimelineResult,
} from './diagnostics/tick-timeline.js';
import { DirectiveDataAttribute } from './directives/directive-types.js';
import { EntityStore } from './entity-store.js';
import { JobDataAttribute } from './jobs/job-types.js';
import { MemoryArbiter } from './memory/memory-arbiter.js';
import { MissionDataAttribute } from './missions/mission-types.js';
import {
  captureSnapshot,
  readSnapshot,
  restoreSnapshot,
  writeSnapshot,
} from './state-sync/snapshot.js';
import { createCoreSystems } from './systems/core-systems.js';
import { registerSystems, type RegisterSystemsResult } from './systems/system-registry.js';
import type { System, SystemDefinition, TickContext } from './systems/system-types.js';
import { repairEntityIntegrity, type IntegrityReport } from './task-lifecycle.js';
import { telemetry } from './telemetry.js';

export interface ColonistRuntimeOptions {
  readonly config?: EngineConfigOverrides;
  /** Replaces the core systems. */
  readonly systems?: readonly SystemDefinition[];
  readonly clock?: HighResolutionClock;
}

export type TickStatus = 'completed' | 'waiting' | 'failed';

export interface TickReport {
  readonly tick: number;
  readonly status: TickStatus;
  /** The store was rebuilt because the previous tick was not `tick - 1`. */
  readonly reloaded: boolean;
  /** Segment requirements whose data was loaded this tick. */
  readonly loaded: readonly string[];
  readonly tasks: TaskCounts;
  readonly integrity?: IntegrityReport;
  readonly snapshotWritten: boolean;
  readonly error?: ErrorLike;
  /** Tick step that threw. */
  readonly failedPhase?: string;
  /** Systems that threw this tick. The rest of the tick still ran. */
  readonly failedSystems?: readonly string[];
}

const SNAPSHOT_REQUIREMENT = 'snapshot';
const PATH_COST_REQUIREMENT = 'path-costs';

const performanceClock: HighResolutionClock = {
  now: () => performance.now(),
};

/**
 * The account name, read off any visible controller the host marks as ours.
 */
export function resolveUsername(world: WorldView): string | undefined {
  for (const name of world.visibleRooms()) {
    const controller = world.getRoom(name)?.controller;
    if (controller?.my === true && controller.owner !== undefined) {
      return controller.owner;
    }
  }
  return undefined;
}

export function countTasks(store: EntityStore): TaskCounts {
  return {
    directives: store.entitiesWith(DirectiveDataAttribute).length,
    missions: store.entitiesWith(MissionDataAttribute).length,
    jobs: store.entitiesWith(JobDataAttribute).length,
  };
}

/**
 * Drives the engine one host tick at a time. The entity store lives in
 * process memory and is rebuilt from the persisted snapshot whenever the
 * process has missed a tick.
 */
export class ColonistRuntime {
  private readonly systems: System[] = [];
  private readonly order: RegisterSystemsResult;
  private readonly rooms = new RoomNameIndex();
  private readonly pathCosts = new PathCostCache();
  private readonly describeLog = new DescribeLog();
  private readonly timeline: TickTimelineRecorder;
  private readonly clock: HighResolutionClock;
  private engine: EngineContext;
  private store = new EntityStore();
  private memory: MemoryArbiter | undefined;
  private lastTick: number | undefined;

  constructor(options: ColonistRuntimeOptions = {}) {
    this.engine = createEngineContext(options.config);
    this.clock = options.clock ?? performanceClock;
    this.timeline = createTickTimelineRecorder({
      capacity: this.engine.config.timing.timelineCapacity,
      slowTickBudgetMs: this.engine.config.timing.cpuBudgetMs,
      clock: this.clock,
    });
    this.order = registerSystems(
      { addSystem: (system) => this.addSystem(system) },
      options.systems ?? createCoreSystems(),
    );
  }

  private addSystem(system: System): void {
    if (this.systems.some((entry) => entry.id === system.id)) {
      throw new Error(`System "${system.id}" is already registered.`);
    }
    this.systems.push(system);
  }

  getSystemOrder(): readonly string[] {
    return this.order.order;
  }

  getStore(): EntityStore {
    return this.store;
  }

  getEngineContext(): EngineContext {
    return this.engine;
  }

  getPathCosts(): PathCostCache {
    return this.pathCosts;
  }

  getTimelineSnapshot(): TickTimelineResult {
    return this.timeline.snapshot();
  }

  /** Task descriptions collected during the last executed tick. */
  describeEntries(): readonly DescribeEntry[] {
    return this.describeLog.list();
  }

  /**
   * Runs one tick. Never throws: a failure is recorded as `TickFailed` and
   * reported, and the following tick proceeds normally.
   */
  tick(host: WorldHost): TickReport {
    const tick = host.world.time;
    const handle = this.timeline.startTick(tick);
    let phase = 'environment';
    let reloaded = false;
    let loaded: readonly string[] = [];

    try {
      reloaded = this.prepareEnvironment(host, tick);
      const memory = this.requireMemory();

      phase = 'segments';
      memory.requestRegistered();
      if (!memory.gatesReady()) {
        telemetry.recordWarning('SegmentDataNotReady', {
          tick,
          segments: memory.registeredSegments(),
        });
        handle.end();
        return this.report(tick, 'waiting', { reloaded, loaded });
      }

      phase = 'load';
      this.store.beginTick(tick);
      loaded = memory.runPendingLoads();
      if (loaded.includes(SNAPSHOT_REQUIREMENT)) {
        this.rooms.rebuild(this.store);
      }

      phase = 'username';
      this.engine = withUsername(
        this.engine,
        resolveUsername(host.world) ?? this.engine.username,
      );

      this.describeLog.clear();
      const context: TickContext = {
        tick,
        store: this.store,
        world: host.world,
        actions: host.actions,
        spawns: host.spawns,
        engine: this.engine,
        rooms: this.rooms,
        pathCosts: this.pathCosts,
        memory,
        describe: this.describeLog,
      };

      phase = 'systems';
      const spans = this.runSystems(context);
      const failedSystems = spans
        .filter((span) => span.error !== undefined)
        .map((span) => span.id);

      phase = 'integrity';
      const integrity = repairEntityIntegrity(this.store);

      phase = 'snapshot';
      const snapshotWritten = writeSnapshot(memory, captureSnapshot(this.store, tick), {
        segments: this.engine.config.persistence.snapshotSegments,
        maxSegmentBytes: this.engine.config.segments.maxSegmentBytes,
      });

      const tasks = countTasks(this.store);
      telemetry.recordCounters('tasks', { ...tasks });
      telemetry.recordTick();
      const entry = handle.end({ metadata: { tasks, systems: spans } });
      if (entry?.isSlow) {
        telemetry.recordWarning('TickExecutionSlow', {
          tick,
          durationMs: entry.durationMs,
          budgetMs: entry.budgetMs,
        });
      }
      return this.report(tick, 'completed', {
        reloaded,
        loaded,
        integrity,
        snapshotWritten,
        failedSystems,
      });
    } catch (error) {
      const errorLike = toErrorLike(error);
      telemetry.recordError('TickFailed', { tick, phase, error: errorLike });
      handle.end({ error });
      return this.report(tick, 'failed', {
        reloaded,
        loaded,
        failedPhase: phase,
        ...(errorLike ? { error: errorLike } : {}),
      });
    } finally {
      this.lastTick = tick;
      this.memory?.clear();
    }
  }

  /**
   * Runs every system in order. A system that throws is recorded as
   * `SystemExecutionFailed` and the next system still runs.
   */
  private runSystems(context: TickContext): SystemSpan[] {
    const spans: SystemSpan[] = [];
    for (const system of this.systems) {
      const startedAt = this.clock.now();
      try {
        system.tick(context);
        spans.push({ id: system.id, durationMs: this.clock.now() - startedAt });
      } catch (error) {
        const errorLike = toErrorLike(error) ?? { message: 'unknown error' };
        telemetry.recordError('SystemExecutionFailed', {
          tick: context.tick,
          systemId: system.id,
          error: errorLike,
        });
        spans.push({ id: system.id, durationMs: this.clock.now() - startedAt, error: errorLike });
      }
    }
    return spans;
  }

  /**
   * Binds the arbiter to the host's segment platform and starts a fresh
   * environment when the previous tick was not `tick - 1` or the platform
   * changed.
   *
   * @returns whether the environment was reset.
   */
  private prepareEnvironment(host: WorldHost, tick: number): boolean {
    let memory = this.memory;
    const rebound = !memory || memory.platform !== host.segments;
    if (!memory || rebound) {
      memory = this.createArbiter(host);
      this.memory = memory;
    }
    if (!rebound && this.lastTick !== undefined && tick === this.lastTick + 1) {
      return false;
    }

    if (this.lastTick !== undefined) {
      telemetry.recordProgress('EnvironmentReloaded', { tick, lastTick: this.lastTick });
    }
    this.store = new EntityStore();
    this.store.beginTick(tick);
    this.rooms.clear();
    this.pathCosts.clear();
    memory.resetLoadState();
    return true;
  }

  private createArbiter(host: WorldHost): MemoryArbiter {
    const { persistence, segments } = this.engine.config;
    const memory = new MemoryArbiter(host.segments, segments);
    memory.register({
      label: SNAPSHOT_REQUIREMENT,
      segments: persistence.snapshotSegments,
      gatesExecution: true,
      onLoad: () => {
        this.loadSnapshot(memory, persistence.snapshotSegments);
      },
    });
    memory.register({
      label: PATH_COST_REQUIREMENT,
      segments: [persistence.pathCostSegment],
      onLoad: () => {
        this.pathCosts.load(memory.get(persistence.pathCostSegment));
      },
    });
    return memory;
  }

  private loadSnapshot(memory: MemoryArbiter, segments: readonly number[]): void {
    const payload = readSnapshot(memory, segments);
    if (payload === undefined) {
      return;
    }
    const result = restoreSnapshot(this.store, payload);
    if (result.restored) {
      telemetry.recordProgress('SnapshotRestored', {
        entities: result.entities,
        failedAttributes: result.failedAttributes,
      });
    }
  }

  private requireMemory(): MemoryArbiter {
    if (!this.memory) {
      throw new Error('Memory arbiter is not bound to a segment platform.');
    }
    return this.memory;
  }

  private report(
    tick: number,
    status: TickStatus,
    details: Partial<Omit<TickReport, 'tick' | 'status' | 'tasks'>>,
  ): TickReport {
    return {
      tick,
      status,
      reloaded: details.reloaded ?? false,
      loaded: details.loaded ?? [],
      tasks: countTasks(this.store),
      snapshotWritten: details.snapshotWritten ?? false,
      ...(details.integrity ? { integrity: details.integrity } : {}),
      ...(details.error ? { error: details.error } : {}),
      ...(details.failedPhase ? { failedPhase: details.failedPhase } : {}),
      ...(details.failedSystems && details.failedSystems.length > 0
        ? { failedSystems: details.failedSystems }
        : {}),
    };
  }
}
