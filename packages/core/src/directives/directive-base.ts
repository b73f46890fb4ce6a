import { z } from 'zod';

import type { Entity, EntityRefReader, EntityRefWriter } from '../entity-store.js';
import { MissionDataAttribute } from '../missions/mission-types.js';
import {
  ChildList,
  decodeOwner,
  encodeOwner,
  OwnerSlot,
  serializedOwnerSchema,
  type OwnerRef,
} from '../ownership.js';
import type { TickContext } from '../systems/system-types.js';
import { TASK_OK, type TaskOutcome } from '../task-outcome.js';

/** Directives re-evaluate the world at most this often. */
export const DIRECTIVE_RUN_INTERVAL = 50;

export const directiveBaseSchema = z.object({
  owner: serializedOwnerSchema,
  children: z.array(z.number().int().positive()),
  lastRun: z.number().int().nonnegative().nullable(),
});

export type DirectiveBaseData = z.infer<typeof directiveBaseSchema>;

export interface DirectiveBaseFields {
  readonly owner: OwnerRef;
  readonly children: ChildList;
  readonly lastRun?: number;
}

export function decodeDirectiveBase(
  data: DirectiveBaseData,
  refs: EntityRefReader,
): DirectiveBaseFields {
  return {
    owner: decodeOwner(data.owner, refs),
    children: ChildList.decode(data.children, refs),
    ...(data.lastRun === null ? {} : { lastRun: data.lastRun }),
  };
}

export abstract class DirectiveBase {
  protected readonly owner: OwnerSlot;
  protected readonly children: ChildList;
  private lastRun: number | undefined;

  protected constructor(fields: DirectiveBaseFields) {
    this.owner = new OwnerSlot(fields.owner);
    this.children = fields.children;
    this.lastRun = fields.lastRun;
  }

  getOwner(): OwnerRef {
    return this.owner.get();
  }

  ownerComplete(owner: Entity): void {
    this.owner.complete(owner);
  }

  getChildren(): readonly Entity[] {
    return this.children.list();
  }

  addChild(child: Entity): void {
    this.children.add(child);
  }

  childComplete(child: Entity): void {
    this.children.remove(child);
  }

  /** Forgets missions that no longer exist. */
  preRun(context: TickContext, _entity: Entity): TaskOutcome<undefined> {
    this.children.retain((child) => context.store.has(MissionDataAttribute, child));
    return TASK_OK;
  }

  /**
   * Claims this tick's evaluation slot.
   *
   * @returns false while the previous evaluation is still recent.
   */
  protected claimRunSlot(tick: number): boolean {
    if (this.lastRun !== undefined && tick - this.lastRun < DIRECTIVE_RUN_INTERVAL) {
      return false;
    }
    this.lastRun = tick;
    return true;
  }

  protected encodeBase(refs: EntityRefWriter): DirectiveBaseData {
    return {
      owner: encodeOwner(this.getOwner(), refs),
      children: this.children.encode(refs),
      lastRun: this.lastRun ?? null,
    };
  }
}
