import type { SpawnQueue, UnitActions, WorldView } from '@colonist/world-contract';

import type { PathCostCache } from '../caches/path-cost-cache.js';
import type { RoomNameIndex } from '../caches/room-name-index.js';
import type { EngineContext } from '../config.js';
import type { DescribeSink } from '../diagnostics/describe-sink.js';
import type { EntityStore } from '../entity-store.js';
import type { MemoryArbiter } from '../memory/memory-arbiter.js';

export interface TickContext {
  readonly tick: number;
  readonly store: EntityStore;
  readonly world: WorldView;
  readonly actions: UnitActions;
  readonly spawns: SpawnQueue;
  readonly engine: EngineContext;
  readonly rooms: RoomNameIndex;
  readonly pathCosts: PathCostCache;
  readonly memory: MemoryArbiter;
  readonly describe: DescribeSink;
}

export type System = {
  readonly id: string;
  readonly tick: (context: TickContext) => void;
};

export interface SystemDefinition extends System {
  readonly after?: readonly string[];
  readonly before?: readonly string[];
  readonly label?: string;
}
