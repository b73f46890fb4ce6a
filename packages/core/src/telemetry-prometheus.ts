import { Counter, Gauge, Registry, collectDefaultMetrics } from 'prom-client';

import {
  createConsoleTelemetry,
  type TelemetryEventData,
  type TelemetryFacade,
} from './telemetry.js';

export interface PrometheusTelemetryOptions {
  readonly registry?: Registry;
  /** @defaultValue `'colonist_'` */
  readonly prefix?: string;
  readonly collectDefaultMetrics?: boolean;
  /**
   * Receives every event after it is counted.
   *
   * @defaultValue console output at `info` and above
   */
  readonly log?: TelemetryFacade;
}

export interface PrometheusTelemetryFacade extends TelemetryFacade {
  readonly registry: Registry;
}

type Severity = 'error' | 'warning' | 'invariant';

const TASK_LEVEL_BY_COUNTER: Readonly<Record<string, string>> = Object.freeze({
  directives: 'directive',
  missions: 'mission',
  jobs: 'job',
});

const TASK_FAILURE_EVENTS: ReadonlySet<string> = new Set(['TaskPreRunFailed', 'TaskRunFailed']);

export function createPrometheusTelemetry(
  options: PrometheusTelemetryOptions = {},
): PrometheusTelemetryFacade {
  const registry = options.registry ?? new Registry();
  const prefix = options.prefix ?? 'colonist_';
  const log = options.log ?? createConsoleTelemetry({ minLevel: 'info' });

  if (options.collectDefaultMetrics ?? true) {
    collectDefaultMetrics({ register: registry, prefix });
  }

  const counter = (name: string, help: string, labelNames: readonly string[] = []) =>
    new Counter({ name: `${prefix}${name}`, help, labelNames, registers: [registry] });

  const events = counter('events_total', 'Errors, warnings and invariant violations by event.', [
    'severity',
    'event',
  ]);
  const taskFailures = counter('task_failures_total', 'Failed task steps by level and kind.', [
    'level',
    'kind',
  ]);
  const directivesCreated = counter('directives_created_total', 'Directives created by kind.', [
    'kind',
  ]);
  const reloads = counter('environment_reloads_total', 'Store rebuilds after a missed tick.');
  const ticks = counter('ticks_total', 'Ticks executed by the runtime.');
  const slowTicks = counter('ticks_over_budget_total', 'Ticks that exceeded the CPU budget.');
  const activeTasks = new Gauge({
    name: `${prefix}tasks_active`,
    help: 'Live tasks per level at the end of the last tick.',
    labelNames: ['level'],
    registers: [registry],
  });

  const countEvent = (severity: Severity, event: string): void => {
    events.inc({ severity, event });
  };

  return {
    registry,
    recordError(event, data) {
      countEvent('error', event);
      if (TASK_FAILURE_EVENTS.has(event)) {
        const labels = taskFailureLabels(data);
        if (labels) {
          taskFailures.inc(labels);
        }
      }
      log.recordError(event, data);
    },
    recordWarning(event, data) {
      countEvent('warning', event);
      if (event === 'TickExecutionSlow') {
        slowTicks.inc();
      }
      log.recordWarning(event, data);
    },
    recordInvariantViolation(event, data) {
      countEvent('invariant', event);
      log.recordInvariantViolation(event, data);
    },
    recordProgress(event, data) {
      const kind = data?.kind;
      if (event === 'EnvironmentReloaded') {
        reloads.inc();
      } else if (event === 'DirectiveCreated' && typeof kind === 'string') {
        directivesCreated.inc({ kind });
      }
      log.recordProgress(event, data);
    },
    recordCounters(group, counters) {
      if (group === 'tasks') {
        for (const [key, value] of Object.entries(counters)) {
          const level = TASK_LEVEL_BY_COUNTER[key];
          if (level !== undefined && Number.isFinite(value)) {
            activeTasks.set({ level }, value);
          }
        }
      }
      log.recordCounters(group, counters);
    },
    recordTick() {
      ticks.inc();
      log.recordTick();
    },
  };
}

function taskFailureLabels(
  data: TelemetryEventData | undefined,
): { level: string; kind: string } | undefined {
  const level = data?.level;
  const kind = data?.kind;
  return typeof level === 'string' && typeof kind === 'string' ? { level, kind } : undefined;
}
