declare const entityBrand: unique symbol;

/**
 * Opaque generational entity id. The low bits hold the arena slot, the high
 * bits the slot's generation, so an id never aliases a later occupant of the
 * same slot.
 */
export type Entity = number & { readonly [entityBrand]: true };

const INDEX_SPACE = 2 ** 22;

function packEntity(index: number, generation: number): Entity {
  return (generation * INDEX_SPACE + index) as Entity;
}

export function entityIndex(entity: Entity): number {
  return entity % INDEX_SPACE;
}

export function entityGeneration(entity: Entity): number {
  return Math.floor(entity / INDEX_SPACE);
}

export function formatEntity(entity: Entity): string {
  return `${entityIndex(entity)}v${entityGeneration(entity)}`;
}

/**
 * Converts entity references to persisted markers while an attribute is
 * encoded. Returns `undefined` for entities that are no longer alive.
 */
export interface EntityRefWriter {
  toMarker(entity: Entity): number | undefined;
}

/**
 * Converts persisted markers back to live entities while an attribute is
 * decoded.
 */
export interface EntityRefReader {
  toEntity(marker: number): Entity | undefined;
}

export function requireMarker(refs: EntityRefWriter, entity: Entity): number {
  const marker = refs.toMarker(entity);
  if (marker === undefined) {
    throw new Error(`Entity ${formatEntity(entity)} has no marker.`);
  }
  return marker;
}

export function requireEntity(refs: EntityRefReader, marker: number): Entity {
  const entity = refs.toEntity(marker);
  if (entity === undefined) {
    throw new Error(`No entity for marker ${marker}.`);
  }
  return entity;
}

export interface AttributeCodec<T> {
  encode(value: T, refs: EntityRefWriter): unknown;
  decode(data: unknown, refs: EntityRefReader): T;
}

/**
 * Type-erased view of an attribute used by queries and persistence.
 */
export interface ErasedAttribute {
  readonly name: string;
  readonly persistent: boolean;
  has(store: EntityStore, entity: Entity): boolean;
  remove(store: EntityStore, entity: Entity): boolean;
  encodeFor(
    store: EntityStore,
    entity: Entity,
    refs: EntityRefWriter,
  ): { readonly data: unknown } | undefined;
  decodeInto(
    store: EntityStore,
    entity: Entity,
    data: unknown,
    refs: EntityRefReader,
  ): void;
}

interface AttributeSlot<T> {
  value: T;
  attachedAt: number;
}

interface ErasedStorage {
  has(index: number): boolean;
  delete(index: number): boolean;
  indices(): IterableIterator<number>;
}

class AttributeStorage<T> implements ErasedStorage {
  private readonly slots = new Map<number, AttributeSlot<T>>();

  get(index: number): AttributeSlot<T> | undefined {
    return this.slots.get(index);
  }

  set(index: number, value: T, attachedAt: number): void {
    this.slots.set(index, { value, attachedAt });
  }

  has(index: number): boolean {
    return this.slots.has(index);
  }

  delete(index: number): boolean {
    return this.slots.delete(index);
  }

  indices(): IterableIterator<number> {
    return this.slots.keys();
  }
}

/**
 * A typed attribute record kind. Storage is keyed per store, so the same
 * attribute type can be used with several independent stores.
 */
export class AttributeType<T> implements ErasedAttribute {
  declare readonly valueType: T;
  private readonly storages = new WeakMap<EntityStore, AttributeStorage<T>>();

  constructor(
    readonly name: string,
    private readonly codec?: AttributeCodec<T>,
  ) {}

  get persistent(): boolean {
    return this.codec !== undefined;
  }

  storage(store: EntityStore): AttributeStorage<T> {
    let storage = this.storages.get(store);
    if (!storage) {
      storage = new AttributeStorage<T>();
      this.storages.set(store, storage);
      store.registerStorage(this.name, storage);
    }
    return storage;
  }

  has(store: EntityStore, entity: Entity): boolean {
    return store.isAlive(entity) && this.storage(store).has(entityIndex(entity));
  }

  remove(store: EntityStore, entity: Entity): boolean {
    return store.removeAttribute(this, entity);
  }

  encodeFor(
    store: EntityStore,
    entity: Entity,
    refs: EntityRefWriter,
  ): { readonly data: unknown } | undefined {
    if (!this.codec) {
      return undefined;
    }
    const value = store.get(this, entity);
    if (value === undefined) {
      return undefined;
    }
    return { data: this.codec.encode(value, refs) };
  }

  decodeInto(
    store: EntityStore,
    entity: Entity,
    data: unknown,
    refs: EntityRefReader,
  ): void {
    if (!this.codec) {
      throw new Error(`Attribute "${this.name}" is not persistent.`);
    }
    store.insert(this, entity, this.codec.decode(data, refs));
  }
}

export function defineAttribute<T>(
  name: string,
  codec?: AttributeCodec<T>,
): AttributeType<T> {
  return new AttributeType<T>(name, codec);
}

/**
 * Arena of entities with per-attribute storages.
 *
 * Iteration order is the storage's insertion order and is not stable across
 * ticks; callers must not rely on it beyond tie-breaking.
 */
export class EntityStore {
  private readonly generations: number[] = [];
  private readonly alive: boolean[] = [];
  private readonly freeIndices: number[] = [];
  private readonly markers = new Map<number, number>();
  private readonly entitiesByMarker = new Map<number, Entity>();
  private readonly storages = new Map<string, ErasedStorage>();
  private nextMarker = 1;
  private tick = 0;
  private liveCount = 0;

  get size(): number {
    return this.liveCount;
  }

  get currentTick(): number {
    return this.tick;
  }

  /**
   * Sets the tick stamped onto attributes attached from now on.
   */
  beginTick(tick: number): void {
    this.tick = tick;
  }

  registerStorage(name: string, storage: ErasedStorage): void {
    const existing = this.storages.get(name);
    if (existing && existing !== storage) {
      throw new Error(`Attribute "${name}" registered multiple times.`);
    }
    this.storages.set(name, storage);
  }

  create(): Entity {
    const entity = this.allocate();
    this.assignMarker(entity, this.nextMarker);
    this.nextMarker += 1;
    return entity;
  }

  /**
   * Recreates an entity under a marker read back from a snapshot.
   */
  createWithMarker(marker: number): Entity {
    if (!Number.isInteger(marker) || marker <= 0) {
      throw new Error(`Invalid entity marker ${marker}.`);
    }
    if (this.entitiesByMarker.has(marker)) {
      throw new Error(`Entity marker ${marker} is already in use.`);
    }
    const entity = this.allocate();
    this.assignMarker(entity, marker);
    this.nextMarker = Math.max(this.nextMarker, marker + 1);
    return entity;
  }

  destroy(entity: Entity): boolean {
    if (!this.isAlive(entity)) {
      return false;
    }
    const index = entityIndex(entity);
    for (const storage of this.storages.values()) {
      storage.delete(index);
    }
    const marker = this.markers.get(index);
    if (marker !== undefined) {
      this.entitiesByMarker.delete(marker);
      this.markers.delete(index);
    }
    this.alive[index] = false;
    this.generations[index] = entityGeneration(entity) + 1;
    this.freeIndices.push(index);
    this.liveCount -= 1;
    return true;
  }

  isAlive(entity: Entity): boolean {
    const index = entityIndex(entity);
    return (
      this.alive[index] === true &&
      this.generations[index] === entityGeneration(entity)
    );
  }

  markerOf(entity: Entity): number | undefined {
    if (!this.isAlive(entity)) {
      return undefined;
    }
    return this.markers.get(entityIndex(entity));
  }

  entityForMarker(marker: number): Entity | undefined {
    return this.entitiesByMarker.get(marker);
  }

  getNextMarker(): number {
    return this.nextMarker;
  }

  setNextMarker(marker: number): void {
    if (Number.isInteger(marker) && marker > this.nextMarker) {
      this.nextMarker = marker;
    }
  }

  entities(): Entity[] {
    const result: Entity[] = [];
    for (let index = 0; index < this.alive.length; index += 1) {
      const generation = this.generations[index];
      if (this.alive[index] === true && generation !== undefined) {
        result.push(packEntity(index, generation));
      }
    }
    return result;
  }

  insert<T>(type: AttributeType<T>, entity: Entity, value: T): void {
    if (!this.isAlive(entity)) {
      throw new Error(
        `Cannot attach "${type.name}" to dead entity ${formatEntity(entity)}.`,
      );
    }
    type.storage(this).set(entityIndex(entity), value, this.tick);
  }

  get<T>(type: AttributeType<T>, entity: Entity): T | undefined {
    if (!this.isAlive(entity)) {
      return undefined;
    }
    return type.storage(this).get(entityIndex(entity))?.value;
  }

  has(type: ErasedAttribute, entity: Entity): boolean {
    return type.has(this, entity);
  }

  /**
   * Tick on which the attribute value currently held by `entity` was attached.
   */
  attachedAt(type: AttributeType<unknown>, entity: Entity): number | undefined {
    if (!this.isAlive(entity)) {
      return undefined;
    }
    return type.storage(this).get(entityIndex(entity))?.attachedAt;
  }

  removeAttribute<T>(type: AttributeType<T>, entity: Entity): boolean {
    if (!this.isAlive(entity)) {
      return false;
    }
    return type.storage(this).delete(entityIndex(entity));
  }

  hasAnyAttribute(entity: Entity): boolean {
    if (!this.isAlive(entity)) {
      return false;
    }
    const index = entityIndex(entity);
    for (const storage of this.storages.values()) {
      if (storage.has(index)) {
        return true;
      }
    }
    return false;
  }

  /**
   * Entities holding every listed attribute, captured up front so callers may
   * mutate the store while iterating.
   */
  entitiesWith(
    primary: AttributeType<unknown>,
    ...others: readonly ErasedAttribute[]
  ): Entity[] {
    const result: Entity[] = [];
    for (const index of primary.storage(this).indices()) {
      const generation = this.generations[index];
      if (generation === undefined || this.alive[index] !== true) {
        continue;
      }
      const entity = packEntity(index, generation);
      if (others.every((other) => other.has(this, entity))) {
        result.push(entity);
      }
    }
    return result;
  }

  private allocate(): Entity {
    const reused = this.freeIndices.pop();
    const index = reused ?? this.alive.length;
    const generation = this.generations[index] ?? 0;
    this.generations[index] = generation;
    this.alive[index] = true;
    this.liveCount += 1;
    if (index >= INDEX_SPACE) {
      throw new Error('Entity arena exhausted.');
    }
    return packEntity(index, generation);
  }

  private assignMarker(entity: Entity, marker: number): void {
    this.markers.set(entityIndex(entity), marker);
    this.entitiesByMarker.set(marker, entity);
  }
}
