import { afterEach, describe, expect, it, vi } from 'vitest';

import { DirectiveDataAttribute } from '../directives/directive-types.js';
import { completeDirective } from '../task-lifecycle.js';
import { resetTelemetry, setTelemetry, silentTelemetry } from '../telemetry.js';
import { createTestTickContext, nextTick } from '../test-utils.js';
import { createDirectiveManagerSystem } from './directive-manager-system.js';

describe('createDirectiveManagerSystem', () => {
  afterEach(() => {
    resetTelemetry();
  });

  it('creates each always-on directive exactly once', () => {
    const recordProgress = vi.fn();
    setTelemetry({ ...silentTelemetry, recordProgress });
    const context = createTestTickContext();
    const system = createDirectiveManagerSystem();

    system.tick(context);
    system.tick(nextTick(context));

    const kinds = context.store
      .entitiesWith(DirectiveDataAttribute)
      .map((entity) => context.store.get(DirectiveDataAttribute, entity)?.kind);
    expect(kinds).toEqual(['claim', 'colony', 'miningOutpost']);
    expect(recordProgress.mock.calls).toEqual([
      ['DirectiveCreated', { kind: 'claim', tick: 1 }],
      ['DirectiveCreated', { kind: 'colony', tick: 1 }],
      ['DirectiveCreated', { kind: 'miningOutpost', tick: 1 }],
    ]);
  });

  it('recreates a directive that completed', () => {
    const context = createTestTickContext();
    const system = createDirectiveManagerSystem({ kinds: ['colony'] });
    system.tick(context);
    const [first] = context.store.entitiesWith(DirectiveDataAttribute);
    if (first === undefined) {
      throw new Error('directive missing');
    }

    completeDirective(context.store, first);
    system.tick(nextTick(context));

    const current = context.store.entitiesWith(DirectiveDataAttribute);
    expect(current).toHaveLength(1);
    expect(current[0]).not.toBe(first);
  });
});
