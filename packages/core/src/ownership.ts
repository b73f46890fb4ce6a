import { z } from 'zod';

import type { Entity, EntityRefReader, EntityRefWriter } from './entity-store.js';
import { formatEntity } from './entity-store.js';

export type NoOwner = { readonly kind: 'none' };
export type DirectiveOwner = { readonly kind: 'directive'; readonly entity: Entity };
export type MissionOwner = { readonly kind: 'mission'; readonly entity: Entity };

export type OwnerRef = NoOwner | DirectiveOwner | MissionOwner;

/** Missions are owned by a directive or by nothing. */
export type MissionOwnerRef = NoOwner | DirectiveOwner;

/** Jobs may be owned by any level above them. */
export type JobOwnerRef = OwnerRef;

export const NO_OWNER: NoOwner = Object.freeze({ kind: 'none' });

export function directiveOwner(entity: Entity): DirectiveOwner {
  return { kind: 'directive', entity };
}

export function missionOwner(entity: Entity): MissionOwner {
  return { kind: 'mission', entity };
}

export function ownerEntity(owner: OwnerRef): Entity | undefined {
  return owner.kind === 'none' ? undefined : owner.entity;
}

export function describeOwner(owner: OwnerRef): string {
  return owner.kind === 'none' ? 'none' : `${owner.kind}:${formatEntity(owner.entity)}`;
}

/**
 * Raised when an owner-complete notification names an entity other than the
 * recorded owner. Always a logic error in the calling system.
 */
export class OwnershipInvariantError extends Error {
  readonly code = 'OWNER_MISMATCH';

  constructor(
    readonly recorded: OwnerRef,
    readonly notifiedBy: Entity,
  ) {
    super(
      `Owner-complete from ${formatEntity(notifiedBy)} does not match recorded owner ${describeOwner(recorded)}.`,
    );
    this.name = 'OwnershipInvariantError';
  }
}

/**
 * A task's back-reference to its owner. Written once at construction and
 * cleared only by a matching owner-complete notification.
 */
export class OwnerSlot {
  private owner: OwnerRef;

  constructor(owner: OwnerRef) {
    this.owner = owner;
  }

  get(): OwnerRef {
    return this.owner;
  }

  /**
   * @throws OwnershipInvariantError when `entity` is not the recorded owner;
   * the reference is left untouched.
   */
  complete(entity: Entity): void {
    const owner = this.owner;
    if (owner.kind === 'none' || owner.entity !== entity) {
      throw new OwnershipInvariantError(owner, entity);
    }
    this.owner = NO_OWNER;
  }
}

export const serializedOwnerSchema = z
  .object({
    kind: z.enum(['directive', 'mission']),
    marker: z.number().int().positive(),
  })
  .nullable();

export type SerializedOwnerRef = z.infer<typeof serializedOwnerSchema>;

/**
 * Writes an owner reference as a persisted marker. Owners that are no longer
 * alive are written as absent.
 */
export function encodeOwner(owner: OwnerRef, refs: EntityRefWriter): SerializedOwnerRef {
  if (owner.kind === 'none') {
    return null;
  }
  const marker = refs.toMarker(owner.entity);
  return marker === undefined ? null : { kind: owner.kind, marker };
}

export function decodeOwner(data: SerializedOwnerRef, refs: EntityRefReader): OwnerRef {
  const entity = data === null ? undefined : refs.toEntity(data.marker);
  if (data === null || entity === undefined) {
    return NO_OWNER;
  }
  return data.kind === 'directive' ? directiveOwner(entity) : missionOwner(entity);
}

export function decodeMissionOwner(
  data: SerializedOwnerRef,
  refs: EntityRefReader,
): MissionOwnerRef {
  const owner = decodeOwner(data, refs);
  return owner.kind === 'mission' ? NO_OWNER : owner;
}

/**
 * Entities owned by a directive or mission, in creation order.
 */
export class ChildList {
  private readonly children: Entity[];

  constructor(children: readonly Entity[] = []) {
    this.children = [...children];
  }

  add(child: Entity): void {
    if (!this.children.includes(child)) {
      this.children.push(child);
    }
  }

  remove(child: Entity): boolean {
    const index = this.children.indexOf(child);
    if (index === -1) {
      return false;
    }
    this.children.splice(index, 1);
    return true;
  }

  has(child: Entity): boolean {
    return this.children.includes(child);
  }

  /**
   * Drops entries rejected by `keep`.
   *
   * @returns the removed entries.
   */
  retain(keep: (child: Entity) => boolean): Entity[] {
    const removed = this.children.filter((child) => !keep(child));
    for (const child of removed) {
      this.remove(child);
    }
    return removed;
  }

  list(): readonly Entity[] {
    return [...this.children];
  }

  get size(): number {
    return this.children.length;
  }

  encode(refs: EntityRefWriter): number[] {
    const markers: number[] = [];
    for (const child of this.children) {
      const marker = refs.toMarker(child);
      if (marker !== undefined) {
        markers.push(marker);
      }
    }
    return markers;
  }

  static decode(markers: readonly number[], refs: EntityRefReader): ChildList {
    const children: Entity[] = [];
    for (const marker of markers) {
      const entity = refs.toEntity(marker);
      if (entity !== undefined) {
        children.push(entity);
      }
    }
    return new ChildList(children);
  }
}
