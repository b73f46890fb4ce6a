import { formatEntity } from '../entity-store.js';
import { SimultaneousActionFlags } from '../jobs/action-flags.js';
import { asJob, JobDataAttribute, UnitBindingAttribute } from '../jobs/job-types.js';
import { completeJob, replaceJob } from '../task-lifecycle.js';
import type { JobTickContext } from '../task-types.js';
import { telemetry } from '../telemetry.js';
import type { SystemDefinition, TickContext } from './system-types.js';
import {
  executeTask,
  runnableEntities,
  taskIdentity,
  type TaskSystemOptions,
} from './task-execution.js';

export const JOB_SYSTEM_ID = 'jobs';

export function createJobSystem(options: TaskSystemOptions = {}): SystemDefinition {
  const { id = JOB_SYSTEM_ID, before, after } = options;

  return {
    id,
    before,
    after,
    tick(context: TickContext) {
      const { store } = context;
      for (const entity of runnableEntities(context, JobDataAttribute)) {
        const data = store.get(JobDataAttribute, entity);
        if (!data) {
          continue;
        }
        const binding = store.get(UnitBindingAttribute, entity);
        const unit = binding ? context.world.getUnit(binding.unitName) : undefined;
        if (!unit) {
          telemetry.recordProgress('JobUnitGone', {
            entity: formatEntity(entity),
            kind: data.kind,
            unit: binding?.unitName ?? null,
          });
          completeJob(store, entity);
          continue;
        }
        if (unit.spawning) {
          continue;
        }

        const jobContext: JobTickContext = {
          ...context,
          unit,
          actionFlags: new SimultaneousActionFlags(),
        };
        executeTask(
          jobContext,
          entity,
          taskIdentity(entity, data.kind, 'job'),
          asJob(data),
          {
            onSuccess: () => completeJob(store, entity),
            onReplace: (replacement) => replaceJob(store, entity, replacement),
          },
        );
      }
    },
  };
}
