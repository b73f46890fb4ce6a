import { describe, expect, it, vi } from 'vitest';
import { Registry } from 'prom-client';

import { silentTelemetry } from './telemetry.js';
import { createPrometheusTelemetry } from './telemetry-prometheus.js';

function createFacade(log = silentTelemetry) {
  const registry = new Registry();
  const facade = createPrometheusTelemetry({
    registry,
    collectDefaultMetrics: false,
    prefix: 'test_',
    log,
  });
  const valuesOf = async (name: string) =>
    (await registry.getSingleMetric(`test_${name}`)?.get())?.values ?? [];
  return { facade, valuesOf };
}

describe('createPrometheusTelemetry', () => {
  it('keeps the last task count reported per level', async () => {
    const { facade, valuesOf } = createFacade();

    facade.recordCounters('tasks', { directives: 3, missions: 5, jobs: 9 });
    facade.recordCounters('tasks', { directives: 3, missions: 4, jobs: 7 });
    facade.recordCounters('segments', { directives: 100 });

    expect(await valuesOf('tasks_active')).toEqual(
      expect.arrayContaining([
        expect.objectContaining({ value: 3, labels: { level: 'directive' } }),
        expect.objectContaining({ value: 4, labels: { level: 'mission' } }),
        expect.objectContaining({ value: 7, labels: { level: 'job' } }),
      ]),
    );
  });

  it('counts events by severity and task failures by level and kind', async () => {
    const { facade, valuesOf } = createFacade();

    facade.recordError('TaskRunFailed', { level: 'job', kind: 'harvest' });
    facade.recordError('TaskRunFailed', { level: 'job', kind: 'harvest' });
    facade.recordError('TaskPreRunFailed', { level: 'mission', kind: 'colony' });
    facade.recordError('TickFailed', { tick: 4 });
    facade.recordWarning('TickExecutionSlow');
    facade.recordInvariantViolation('OwnerMismatch');

    expect(await valuesOf('events_total')).toEqual(
      expect.arrayContaining([
        expect.objectContaining({ value: 2, labels: { severity: 'error', event: 'TaskRunFailed' } }),
        expect.objectContaining({ value: 1, labels: { severity: 'error', event: 'TickFailed' } }),
        expect.objectContaining({
          value: 1,
          labels: { severity: 'warning', event: 'TickExecutionSlow' },
        }),
        expect.objectContaining({
          value: 1,
          labels: { severity: 'invariant', event: 'OwnerMismatch' },
        }),
      ]),
    );
    expect(await valuesOf('task_failures_total')).toEqual(
      expect.arrayContaining([
        expect.objectContaining({ value: 2, labels: { level: 'job', kind: 'harvest' } }),
        expect.objectContaining({ value: 1, labels: { level: 'mission', kind: 'colony' } }),
      ]),
    );
    expect((await valuesOf('ticks_over_budget_total'))[0]?.value).toBe(1);
  });

  it('counts ticks, reloads and created directives', async () => {
    const { facade, valuesOf } = createFacade();

    facade.recordTick();
    facade.recordTick();
    facade.recordProgress('EnvironmentReloaded', { tick: 10, lastTick: 3 });
    facade.recordProgress('DirectiveCreated', { kind: 'claim' });
    facade.recordProgress('DirectiveCreated', { kind: 'claim' });
    facade.recordProgress('JobUnitGone', { kind: 'harvest' });

    expect((await valuesOf('ticks_total'))[0]?.value).toBe(2);
    expect((await valuesOf('environment_reloads_total'))[0]?.value).toBe(1);
    expect(await valuesOf('directives_created_total')).toEqual([
      expect.objectContaining({ value: 2, labels: { kind: 'claim' } }),
    ]);
  });

  it('forwards every event to the log facade', () => {
    const log = { ...silentTelemetry, recordError: vi.fn(), recordProgress: vi.fn() };
    const { facade } = createFacade(log);

    facade.recordError('SnapshotTooLarge', { capacity: 10 });
    facade.recordProgress('SnapshotRestored', { entities: 5 });

    expect(log.recordError).toHaveBeenCalledWith('SnapshotTooLarge', { capacity: 10 });
    expect(log.recordProgress).toHaveBeenCalledWith('SnapshotRestored', { entities: 5 });
  });
});
