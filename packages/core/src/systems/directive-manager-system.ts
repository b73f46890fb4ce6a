import {
  ALWAYS_ON_DIRECTIVES,
  createDirective,
} from '../directives/directive-builders.js';
import { DirectiveDataAttribute, type DirectiveKind } from '../directives/directive-types.js';
import { telemetry } from '../telemetry.js';
import type { SystemDefinition, TickContext } from './system-types.js';

export const DIRECTIVE_MANAGER_SYSTEM_ID = 'directive-manager';

export interface DirectiveManagerSystemOptions {
  readonly id?: string;
  readonly before?: readonly string[];
  readonly after?: readonly string[];
  readonly kinds?: readonly DirectiveKind[];
}

/**
 * Keeps exactly one directive of each always-on kind alive.
 */
export function createDirectiveManagerSystem(
  options: DirectiveManagerSystemOptions = {},
): SystemDefinition {
  const {
    id = DIRECTIVE_MANAGER_SYSTEM_ID,
    before,
    after,
    kinds = ALWAYS_ON_DIRECTIVES,
  } = options;

  return {
    id,
    before,
    after,
    tick(context: TickContext) {
      const { store } = context;
      const present = new Set<DirectiveKind>();
      for (const entity of store.entitiesWith(DirectiveDataAttribute)) {
        const data = store.get(DirectiveDataAttribute, entity);
        if (data) {
          present.add(data.kind);
        }
      }
      for (const kind of kinds) {
        if (!present.has(kind)) {
          createDirective(store, kind);
          telemetry.recordProgress('DirectiveCreated', { kind, tick: context.tick });
        }
      }
    },
  };
}
