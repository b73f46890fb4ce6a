import { IMPASSABLE_COST } from '../caches/path-cost-cache.js';
import { UnitBindingAttribute } from '../jobs/job-types.js';
import type { SystemDefinition, TickContext } from './system-types.js';

export const PATH_COST_SYSTEM_ID = 'path-costs';

export interface PathCostSystemOptions {
  readonly id?: string;
  readonly before?: readonly string[];
  readonly after?: readonly string[];
}

/**
 * Refreshes the cost matrices of visible rooms, marks tiles occupied by
 * controlled units as impassable for this tick, and stores the structure
 * costs when they changed. Rooms that no longer fit the segment are dropped,
 * oldest first.
 */
export function createPathCostSystem(options: PathCostSystemOptions = {}): SystemDefinition {
  const { id = PATH_COST_SYSTEM_ID, before, after } = options;

  return {
    id,
    before,
    after,
    tick(context: TickContext) {
      const { pathCosts, world, store } = context;
      pathCosts.clearTransient();

      for (const name of world.visibleRooms()) {
        const view = world.getRoom(name);
        if (view) {
          pathCosts.refreshRoom(view, context.tick);
        }
      }

      for (const entity of store.entitiesWith(UnitBindingAttribute)) {
        const binding = store.get(UnitBindingAttribute, entity);
        const unit = binding ? world.getUnit(binding.unitName) : undefined;
        if (unit) {
          pathCosts.setTransient(unit.pos.room, unit.pos.x, unit.pos.y, IMPASSABLE_COST);
        }
      }

      if (pathCosts.isDirty()) {
        const segment = context.engine.config.persistence.pathCostSegment;
        pathCosts.trimTo(context.engine.config.segments.maxSegmentBytes);
        if (context.memory.set(segment, pathCosts.encode())) {
          pathCosts.markStored();
        }
      }
    },
  };
}
