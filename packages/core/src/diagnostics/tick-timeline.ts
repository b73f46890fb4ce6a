export interface HighResolutionClock {
  now(): number;
}

export interface TickTimelineOptions {
  /** @defaultValue `120` */
  readonly capacity?: number;
  /** @defaultValue `20` */
  readonly slowTickBudgetMs?: number;
  readonly clock?: HighResolutionClock;
}

/** Plain, serializable form of a thrown value. */
export interface ErrorLike {
  readonly name?: string;
  readonly message?: string;
  readonly stack?: string;
}

export interface TaskCounts {
  readonly directives: number;
  readonly missions: number;
  readonly jobs: number;
}

export interface SystemSpan {
  readonly id: string;
  readonly durationMs: number;
  readonly error?: ErrorLike;
}

export interface TickTimelineMetadata {
  readonly tasks?: TaskCounts;
  readonly systems?: readonly SystemSpan[];
}

export interface TickTimelineEntry {
  readonly tick: number;
  readonly durationMs: number;
  readonly budgetMs: number;
  readonly isSlow: boolean;
  readonly overBudgetMs: number;
  readonly error?: ErrorLike;
  readonly metadata?: TickTimelineMetadata;
}

export interface TickTimelineResult {
  readonly capacity: number;
  readonly size: number;
  readonly droppedEntries: number;
  readonly lastTick?: number;
  readonly entries: readonly TickTimelineEntry[];
}

export interface CompleteTickOptions {
  readonly error?: unknown;
  readonly metadata?: TickTimelineMetadata;
}

export interface TickHandle {
  readonly tick: number;
  readonly startedAt: number;
  /** Records the tick. Later calls return `undefined` and record nothing. */
  end(completion?: CompleteTickOptions): TickTimelineEntry | undefined;
}

export interface TickTimelineRecorder {
  startTick(tick: number): TickHandle;
  snapshot(): TickTimelineResult;
  clear(): void;
}

/**
 * Fixed-size ring of tick entries. `head` is the slot the next entry lands
 * in; once the ring is full it also holds the oldest entry.
 */
class TickRing {
  private slots: (TickTimelineEntry | undefined)[];
  private head = 0;
  private count = 0;
  dropped = 0;
  lastTick: number | undefined;

  constructor(readonly capacity: number) {
    this.slots = new Array<TickTimelineEntry | undefined>(capacity).fill(undefined);
  }

  push(entry: TickTimelineEntry): void {
    this.lastTick = entry.tick;
    if (this.capacity === 0) {
      this.dropped += 1;
      return;
    }
    if (this.count === this.capacity) {
      this.dropped += 1;
    } else {
      this.count += 1;
    }
    this.slots[this.head] = entry;
    this.head = (this.head + 1) % this.capacity;
  }

  /** Oldest first. */
  toArray(): TickTimelineEntry[] {
    const start = this.count === this.capacity ? this.head : 0;
    const ordered: TickTimelineEntry[] = [];
    for (let offset = 0; offset < this.count; offset += 1) {
      const entry = this.slots[(start + offset) % this.capacity];
      if (entry) {
        ordered.push(entry);
      }
    }
    return ordered;
  }

  reset(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
    this.dropped = 0;
    this.lastTick = undefined;
  }
}

const systemClock: HighResolutionClock = {
  now: () => performance.now(),
};

function resolveCapacity(value: number | undefined): number {
  return value !== undefined && Number.isFinite(value) && value >= 0 ? Math.floor(value) : 120;
}

/**
 * Keeps the most recent tick durations and flags those over the CPU budget.
 * Entries evicted from a full ring are counted in `droppedEntries`.
 */
export function createTickTimelineRecorder(
  options: TickTimelineOptions = {},
): TickTimelineRecorder {
  const ring = new TickRing(resolveCapacity(options.capacity));
  const budgetMs = options.slowTickBudgetMs ?? 20;
  const clock = options.clock ?? systemClock;

  const buildEntry = (
    tick: number,
    durationMs: number,
    completion: CompleteTickOptions | undefined,
  ): TickTimelineEntry => {
    const overBudgetMs = Math.max(0, durationMs - budgetMs);
    const error = toErrorLike(completion?.error);
    const metadata = completion?.metadata;
    return Object.freeze({
      tick,
      durationMs,
      budgetMs,
      isSlow: overBudgetMs > 0,
      overBudgetMs,
      ...(error === undefined ? {} : { error: Object.freeze(error) }),
      ...(metadata === undefined ? {} : { metadata: freezeMetadata(metadata) }),
    });
  };

  return {
    startTick(tick) {
      const startedAt = clock.now();
      let recorded = false;
      return {
        tick,
        startedAt,
        end(completion) {
          if (recorded) {
            return undefined;
          }
          recorded = true;
          const entry = buildEntry(tick, Math.max(0, clock.now() - startedAt), completion);
          ring.push(entry);
          return entry;
        },
      };
    },
    snapshot() {
      const entries = ring.toArray();
      return Object.freeze({
        capacity: ring.capacity,
        size: entries.length,
        droppedEntries: ring.dropped,
        lastTick: ring.lastTick,
        entries: Object.freeze(entries),
      });
    },
    clear() {
      ring.reset();
    },
  };
}

export function toErrorLike(value: unknown): ErrorLike | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (value instanceof Error) {
    const { name, message, stack } = value;
    return stack === undefined ? { name, message } : { name, message, stack };
  }
  return { message: typeof value === 'string' ? value : String(value) };
}

function freezeMetadata({ tasks, systems }: TickTimelineMetadata): TickTimelineMetadata {
  return Object.freeze({
    ...(tasks === undefined ? {} : { tasks: Object.freeze({ ...tasks }) }),
    ...(systems === undefined
      ? {}
      : { systems: Object.freeze(systems.map((span) => Object.freeze({ ...span }))) }),
  });
}
