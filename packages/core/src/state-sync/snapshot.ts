import { z } from 'zod';

import { toErrorLike } from '../diagnostics/tick-timeline.js';
import { DirectiveDataAttribute } from '../directives/directive-types.js';
import {
  formatEntity,
  type EntityRefReader,
  type EntityRefWriter,
  type EntityStore,
  type ErasedAttribute,
} from '../entity-store.js';
import { JobDataAttribute, UnitBindingAttribute } from '../jobs/job-types.js';
import { segmentByteLength, type MemoryArbiter } from '../memory/memory-arbiter.js';
import { MissionDataAttribute } from '../missions/mission-types.js';
import { RoomDataAttribute } from '../room/room-data.js';
import { telemetry } from '../telemetry.js';

export const SNAPSHOT_VERSION = 1;

/**
 * Attributes written to and read from snapshots, in restore order.
 */
export const PERSISTENT_ATTRIBUTES: readonly ErasedAttribute[] = Object.freeze([
  RoomDataAttribute,
  DirectiveDataAttribute,
  MissionDataAttribute,
  JobDataAttribute,
  UnitBindingAttribute,
]);

const entitySnapshotSchema = z.object({
  marker: z.number().int().positive(),
  attributes: z.record(z.string(), z.unknown()),
});

export const storeSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  tick: z.number().int().nonnegative(),
  nextMarker: z.number().int().positive(),
  entities: z
    .array(entitySnapshotSchema)
    .refine(
      (entities) => new Set(entities.map((entity) => entity.marker)).size === entities.length,
      'Entity markers must be unique.',
    ),
});

export type EntitySnapshot = z.infer<typeof entitySnapshotSchema>;
export type StoreSnapshot = z.infer<typeof storeSnapshotSchema>;

function refWriter(store: EntityStore): EntityRefWriter {
  return { toMarker: (entity) => store.markerOf(entity) };
}

function refReader(store: EntityStore): EntityRefReader {
  return {
    toEntity: (marker) => {
      const entity = store.entityForMarker(marker);
      return entity !== undefined && store.isAlive(entity) ? entity : undefined;
    },
  };
}

/**
 * Serializes every entity holding at least one persistent attribute. Entity
 * references inside attribute values are written as markers.
 */
export function captureSnapshot(
  store: EntityStore,
  tick: number,
  attributes: readonly ErasedAttribute[] = PERSISTENT_ATTRIBUTES,
): StoreSnapshot {
  const refs = refWriter(store);
  const entities: EntitySnapshot[] = [];

  for (const entity of store.entities()) {
    const marker = store.markerOf(entity);
    if (marker === undefined) {
      continue;
    }
    const encoded: Record<string, unknown> = {};
    let count = 0;
    for (const attribute of attributes) {
      try {
        const value = attribute.encodeFor(store, entity, refs);
        if (value !== undefined) {
          encoded[attribute.name] = value.data;
          count += 1;
        }
      } catch (error) {
        telemetry.recordError('SnapshotAttributeEncodeFailed', {
          entity: formatEntity(entity),
          attribute: attribute.name,
          error: toErrorLike(error),
        });
      }
    }
    if (count > 0) {
      entities.push({ marker, attributes: encoded });
    }
  }

  entities.sort((left, right) => left.marker - right.marker);
  return {
    version: SNAPSHOT_VERSION,
    tick,
    nextMarker: store.getNextMarker(),
    entities,
  };
}

export interface RestoreSnapshotResult {
  readonly restored: boolean;
  readonly entities: number;
  readonly failedAttributes: number;
}

/**
 * Rebuilds `store` from a snapshot payload. Entities are recreated under
 * their markers first so references between them resolve while attributes
 * are decoded. An attribute that fails to decode is skipped; an entity left
 * with nothing attached is discarded.
 *
 * Restored attributes are stamped with the snapshot tick, so they run on the
 * tick that follows it.
 */
export function restoreSnapshot(
  store: EntityStore,
  payload: unknown,
  attributes: readonly ErasedAttribute[] = PERSISTENT_ATTRIBUTES,
): RestoreSnapshotResult {
  const parsed = storeSnapshotSchema.safeParse(payload);
  if (!parsed.success) {
    telemetry.recordWarning('SnapshotInvalid', {
      issues: parsed.error.issues.map((issue) => issue.message),
    });
    return { restored: false, entities: 0, failedAttributes: 0 };
  }
  const snapshot = parsed.data;
  if (store.size > 0) {
    throw new Error('Snapshots can only be restored into an empty store.');
  }

  const resumeTick = store.currentTick;
  store.beginTick(snapshot.tick);

  const created = snapshot.entities.map((entry) => ({
    entity: store.createWithMarker(entry.marker),
    entry,
  }));

  const refs = refReader(store);
  let failedAttributes = 0;
  for (const attribute of attributes) {
    for (const { entity, entry } of created) {
      if (!(attribute.name in entry.attributes)) {
        continue;
      }
      try {
        attribute.decodeInto(store, entity, entry.attributes[attribute.name], refs);
      } catch (error) {
        failedAttributes += 1;
        telemetry.recordWarning('SnapshotAttributeDecodeFailed', {
          marker: entry.marker,
          attribute: attribute.name,
          error: toErrorLike(error),
        });
      }
    }
  }

  let restored = 0;
  for (const { entity } of created) {
    if (store.hasAnyAttribute(entity)) {
      restored += 1;
    } else {
      store.destroy(entity);
    }
  }

  store.setNextMarker(snapshot.nextMarker);
  store.beginTick(resumeTick);
  return { restored: true, entities: restored, failedAttributes };
}

/**
 * Splits `data` into pieces of at most `maxBytes` UTF-8 bytes without
 * cutting a code point.
 *
 * @returns undefined when more than `maxChunks` pieces would be needed.
 */
export function chunkByBytes(
  data: string,
  maxBytes: number,
  maxChunks: number,
): string[] | undefined {
  const chunks: string[] = [];
  let current = '';
  let currentBytes = 0;
  for (const character of data) {
    const bytes = segmentByteLength(character);
    if (currentBytes + bytes > maxBytes) {
      chunks.push(current);
      current = '';
      currentBytes = 0;
    }
    current += character;
    currentBytes += bytes;
  }
  if (current.length > 0) {
    chunks.push(current);
  }
  return chunks.length > maxChunks ? undefined : chunks;
}

export interface SnapshotSegmentOptions {
  readonly segments: readonly number[];
  readonly maxSegmentBytes: number;
}

/**
 * Writes the snapshot across `segments`, blanking the ones it does not need.
 * A snapshot that does not fit is not written at all.
 *
 * @returns whether every segment write went through.
 */
export function writeSnapshot(
  memory: MemoryArbiter,
  snapshot: StoreSnapshot,
  options: SnapshotSegmentOptions,
): boolean {
  const data = JSON.stringify(snapshot);
  const chunks = chunkByBytes(data, options.maxSegmentBytes, options.segments.length);
  if (!chunks) {
    telemetry.recordError('SnapshotTooLarge', {
      bytes: segmentByteLength(data),
      capacity: options.maxSegmentBytes * options.segments.length,
      entities: snapshot.entities.length,
    });
    return false;
  }
  let written = true;
  options.segments.forEach((segment, index) => {
    written = memory.set(segment, chunks[index] ?? '') && written;
  });
  return written;
}

/**
 * Reassembles a snapshot payload from active segments.
 *
 * @returns undefined when nothing is stored or the stored text is not JSON.
 */
export function readSnapshot(
  memory: MemoryArbiter,
  segments: readonly number[],
): unknown {
  const data = segments.map((segment) => memory.get(segment) ?? '').join('');
  if (data.length === 0) {
    return undefined;
  }
  try {
    return JSON.parse(data);
  } catch (error) {
    telemetry.recordWarning('SnapshotDecodeFailed', {
      bytes: segmentByteLength(data),
      error: toErrorLike(error),
    });
    return undefined;
  }
}
