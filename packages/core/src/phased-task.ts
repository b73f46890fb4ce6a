import type { Entity } from './entity-store.js';
import { OwnerSlot, type OwnerRef } from './ownership.js';
import type { MachineState } from './state-machine.js';

export type Phase = { readonly type: string };

/**
 * Common state of every concrete task: its persisted phase and its owner
 * back-reference.
 */
export abstract class PhasedTask<TPhase extends Phase> {
  protected readonly state: MachineState<TPhase>;
  protected readonly owner: OwnerSlot;

  protected constructor(owner: OwnerRef, phase: TPhase) {
    this.owner = new OwnerSlot(owner);
    this.state = { current: phase };
  }

  get phase(): TPhase {
    return this.state.current;
  }

  getOwner(): OwnerRef {
    return this.owner.get();
  }

  ownerComplete(owner: Entity): void {
    this.owner.complete(owner);
  }
}
