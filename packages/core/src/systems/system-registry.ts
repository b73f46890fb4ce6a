import { telemetry } from '../telemetry.js';
import type { System, SystemDefinition } from './system-types.js';

export interface SystemHost {
  addSystem(system: System): void;
}

export interface RegisterSystemsResult {
  readonly order: readonly string[];
}

/**
 * Adds `definitions` to `host` in an order satisfying every `before` and
 * `after` constraint. Among systems that are ready at the same time, the one
 * listed first goes first.
 *
 * @throws Error on unknown references, duplicates or cycles.
 */
export function registerSystems(
  host: SystemHost,
  definitions: readonly SystemDefinition[],
): RegisterSystemsResult {
  const predecessors = collectPredecessors(definitions);
  const placed = new Set<string>();
  const ordered: SystemDefinition[] = [];
  let pending = [...definitions];

  while (pending.length > 0) {
    const nextIndex = pending.findIndex((definition) =>
      [...(predecessors.get(definition.id) ?? [])].every((id) => placed.has(id)),
    );
    const next = pending[nextIndex];
    if (next === undefined) {
      const unresolved = pending.map((definition) => definition.id).sort();
      telemetry.recordError('SystemDependencyCycle', { unresolved });
      throw new Error(
        `System dependency graph contains a cycle involving: ${unresolved.join(', ')}`,
      );
    }
    placed.add(next.id);
    ordered.push(next);
    pending = pending.filter((_, index) => index !== nextIndex);
  }

  for (const definition of ordered) {
    host.addSystem(definition);
  }

  return { order: Object.freeze(ordered.map((definition) => definition.id)) };
}

/** Maps each system id to the ids that must run before it. */
function collectPredecessors(
  definitions: readonly SystemDefinition[],
): Map<string, Set<string>> {
  const predecessors = new Map<string, Set<string>>();
  for (const { id } of definitions) {
    if (predecessors.has(id)) {
      throw new Error(`System "${id}" registered multiple times.`);
    }
    predecessors.set(id, new Set());
  }

  const requireKnown = (id: string, reference: string, role: string): Set<string> => {
    const entry = predecessors.get(reference);
    if (entry === undefined) {
      throw new Error(`System "${id}" declares unknown ${role} "${reference}".`);
    }
    return entry;
  };

  for (const { id, after = [], before = [] } of definitions) {
    for (const dependency of after) {
      if (dependency === id) {
        throw new Error(`System "${id}" cannot depend on itself.`);
      }
      requireKnown(id, dependency, 'dependency');
      predecessors.get(id)?.add(dependency);
    }
    for (const successor of before) {
      if (successor === id) {
        throw new Error(`System "${id}" cannot declare before itself.`);
      }
      requireKnown(id, successor, 'successor').add(id);
    }
  }

  return predecessors;
}
