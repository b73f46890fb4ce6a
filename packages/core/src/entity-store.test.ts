import { describe, expect, it } from 'vitest';

import {
  defineAttribute,
  entityGeneration,
  entityIndex,
  EntityStore,
  formatEntity,
} from './entity-store.js';

const Label = defineAttribute<string>('test.label');
const Weight = defineAttribute<number>('test.weight', {
  encode: (value) => value,
  decode: (data) => (typeof data === 'number' ? data : 0),
});

describe('EntityStore', () => {
  it('creates live entities with increasing markers', () => {
    const store = new EntityStore();
    const first = store.create();
    const second = store.create();

    expect(store.isAlive(first)).toBe(true);
    expect(store.size).toBe(2);
    expect(store.markerOf(first)).toBe(1);
    expect(store.markerOf(second)).toBe(2);
    expect(store.entityForMarker(2)).toBe(second);
    expect(store.getNextMarker()).toBe(3);
  });

  it('never aliases a destroyed entity with the slot reusing it', () => {
    const store = new EntityStore();
    const first = store.create();
    store.insert(Label, first, 'old');
    expect(store.destroy(first)).toBe(true);

    const reused = store.create();
    expect(entityIndex(reused)).toBe(entityIndex(first));
    expect(entityGeneration(reused)).toBe(1);
    expect(store.isAlive(first)).toBe(false);
    expect(store.get(Label, first)).toBeUndefined();
    expect(store.get(Label, reused)).toBeUndefined();
    expect(formatEntity(reused)).toBe('0v1');
    expect(store.destroy(first)).toBe(false);
  });

  it('reads and replaces typed attributes', () => {
    const store = new EntityStore();
    const entity = store.create();
    store.insert(Weight, entity, 3);
    store.insert(Weight, entity, 5);

    expect(store.get(Weight, entity)).toBe(5);
    expect(store.has(Weight, entity)).toBe(true);
    expect(store.removeAttribute(Weight, entity)).toBe(true);
    expect(store.hasAnyAttribute(entity)).toBe(false);
  });

  it('rejects attaching to dead entities', () => {
    const store = new EntityStore();
    const entity = store.create();
    store.destroy(entity);

    expect(() => store.insert(Label, entity, 'x')).toThrowError(
      'Cannot attach "test.label" to dead entity 0v0.',
    );
  });

  it('stamps attributes with the tick they were attached on', () => {
    const store = new EntityStore();
    store.beginTick(7);
    const entity = store.create();
    store.insert(Label, entity, 'a');
    store.beginTick(8);

    expect(store.attachedAt(Label, entity)).toBe(7);
    store.insert(Label, entity, 'b');
    expect(store.attachedAt(Label, entity)).toBe(8);
  });

  it('queries entities holding every listed attribute', () => {
    const store = new EntityStore();
    const both = store.create();
    const labelOnly = store.create();
    const weightOnly = store.create();
    store.insert(Label, both, 'both');
    store.insert(Weight, both, 1);
    store.insert(Label, labelOnly, 'label');
    store.insert(Weight, weightOnly, 2);

    expect(store.entitiesWith(Label, Weight)).toEqual([both]);
    expect(store.entitiesWith(Label)).toEqual([both, labelOnly]);
  });

  it('lets callers destroy entities while iterating a query', () => {
    const store = new EntityStore();
    const entities = [store.create(), store.create(), store.create()];
    for (const entity of entities) {
      store.insert(Label, entity, 'x');
    }

    for (const entity of store.entitiesWith(Label)) {
      store.destroy(entity);
    }

    expect(store.size).toBe(0);
    expect(store.entities()).toEqual([]);
  });

  it('recreates entities under restored markers', () => {
    const store = new EntityStore();
    const restored = store.createWithMarker(9);

    expect(store.markerOf(restored)).toBe(9);
    expect(store.getNextMarker()).toBe(10);
    expect(store.create()).not.toBe(restored);
    expect(() => store.createWithMarker(9)).toThrowError(
      'Entity marker 9 is already in use.',
    );
    expect(() => store.createWithMarker(0)).toThrowError('Invalid entity marker 0.');
  });

  it('encodes only persistent attributes', () => {
    const store = new EntityStore();
    const entity = store.create();
    store.insert(Label, entity, 'x');
    store.insert(Weight, entity, 4);
    const refs = { toMarker: () => undefined };

    expect(Label.persistent).toBe(false);
    expect(Label.encodeFor(store, entity, refs)).toBeUndefined();
    expect(Weight.encodeFor(store, entity, refs)).toEqual({ data: 4 });
  });

  it('keeps storages separate per store', () => {
    const left = new EntityStore();
    const right = new EntityStore();
    const leftEntity = left.create();
    const rightEntity = right.create();
    left.insert(Label, leftEntity, 'left');

    expect(leftEntity).toBe(rightEntity);
    expect(right.get(Label, rightEntity)).toBeUndefined();
  });
});
