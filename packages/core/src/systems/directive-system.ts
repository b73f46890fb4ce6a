import { asDirective, DirectiveDataAttribute } from '../directives/directive-types.js';
import { completeDirective, replaceDirective } from '../task-lifecycle.js';
import type { SystemDefinition, TickContext } from './system-types.js';
import {
  executeTask,
  runnableEntities,
  taskIdentity,
  type TaskSystemOptions,
} from './task-execution.js';

export const DIRECTIVE_SYSTEM_ID = 'directives';

export function createDirectiveSystem(options: TaskSystemOptions = {}): SystemDefinition {
  const { id = DIRECTIVE_SYSTEM_ID, before, after } = options;

  return {
    id,
    before,
    after,
    tick(context: TickContext) {
      const { store } = context;
      for (const entity of runnableEntities(context, DirectiveDataAttribute)) {
        const data = store.get(DirectiveDataAttribute, entity);
        if (!data) {
          continue;
        }
        executeTask(
          context,
          entity,
          taskIdentity(entity, data.kind, 'directive'),
          asDirective(data),
          {
            onSuccess: () => completeDirective(store, entity),
            onReplace: (replacement) => replaceDirective(store, entity, replacement),
          },
        );
      }
    },
  };
}
