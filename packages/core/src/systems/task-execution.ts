import type { TaskLevel } from '../diagnostics/describe-sink.js';
import { formatEntity, type AttributeType, type Entity } from '../entity-store.js';
import { OwnershipInvariantError } from '../ownership.js';
import type { TaskOutcome, TaskRunResult } from '../task-outcome.js';
import type { TaskCapability } from '../task-types.js';
import { telemetry } from '../telemetry.js';
import type { TickContext } from './system-types.js';

export interface TaskSystemOptions {
  readonly id?: string;
  readonly before?: readonly string[];
  readonly after?: readonly string[];
}

export interface TaskIdentity {
  readonly entity: string;
  readonly kind: string;
  readonly level: TaskLevel;
}

export function taskIdentity(entity: Entity, kind: string, level: TaskLevel): TaskIdentity {
  return { entity: formatEntity(entity), kind, level };
}

/**
 * Entities holding `attribute` that were attached before this tick. Anything
 * created or replaced during the tick waits for the next one.
 */
export function runnableEntities(
  context: TickContext,
  attribute: AttributeType<unknown>,
): Entity[] {
  return context.store.entitiesWith(attribute).filter((entity) => {
    const attachedAt = context.store.attachedAt(attribute, entity);
    return attachedAt !== undefined && attachedAt < context.tick;
  });
}

export interface TaskStepHandlers<TData> {
  onSuccess(): void;
  onReplace(replacement: TData): void;
}

/**
 * Drives one task through `preRun` (when present) and `run`, then applies
 * the result. Failures are recorded and leave the task in place; ownership
 * invariant errors halt the task for this tick.
 */
export function executeTask<TData, TContext extends TickContext>(
  context: TContext,
  entity: Entity,
  identity: TaskIdentity,
  task: TaskCapability<TData, TContext> & {
    preRun?(context: TContext, entity: Entity): TaskOutcome<undefined>;
  },
  handlers: TaskStepHandlers<TData>,
): void {
  try {
    context.describe.add(identity.level, entity, task.describe(context, entity));

    if (task.preRun) {
      const prepared = task.preRun(context, entity);
      if (!prepared.success) {
        telemetry.recordError('TaskPreRunFailed', {
          ...identity,
          code: prepared.error.code,
          message: prepared.error.message,
        });
        return;
      }
    }

    const outcome = task.run(context, entity);
    if (!outcome.success) {
      telemetry.recordError('TaskRunFailed', {
        ...identity,
        code: outcome.error.code,
        message: outcome.error.message,
        ...(outcome.error.details ? { details: outcome.error.details } : {}),
      });
      return;
    }
    applyRunResult(outcome.value, handlers);
  } catch (error) {
    if (!(error instanceof OwnershipInvariantError)) {
      throw error;
    }
    telemetry.recordInvariantViolation('OwnerMismatch', {
      ...identity,
      message: error.message,
    });
  }
}

function applyRunResult<TData>(result: TaskRunResult<TData>, handlers: TaskStepHandlers<TData>): void {
  switch (result.status) {
    case 'running':
      return;
    case 'success':
      handlers.onSuccess();
      return;
    case 'replace':
      handlers.onReplace(result.replacement);
      return;
  }
}
