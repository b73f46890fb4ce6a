/**
 * Action pipelines a unit can use once per tick. Actions sharing a pipeline
 * share a bit and are mutually exclusive; actions on different pipelines can
 * be combined.
 */
export const ActionFlag = Object.freeze({
  NONE: 0,
  MOVE: 1,
  // work pipeline
  HARVEST: 1 << 1,
  ATTACK: 1 << 1,
  BUILD: 1 << 1,
  REPAIR: 1 << 1,
  DISMANTLE: 1 << 1,
  ATTACK_CONTROLLER: 1 << 1,
  // ranged pipeline
  RANGED_ATTACK: 1 << 2,
  RANGED_HEAL: 1 << 2,
  HEAL: 1 << 3,
  // logistics pipeline
  WITHDRAW: 1 << 4,
  TRANSFER: 1 << 4,
  DROP: 1 << 4,
  PICKUP: 1 << 4,
  UPGRADE_CONTROLLER: 1 << 5,
  // controller pipeline
  CLAIM_CONTROLLER: 1 << 6,
  RESERVE_CONTROLLER: 1 << 6,
  SIGN: 1 << 6,
});

export class SimultaneousActionFlags {
  private used: number = ActionFlag.NONE;

  get value(): number {
    return this.used;
  }

  has(flags: number): boolean {
    return (this.used & flags) !== 0;
  }

  /**
   * Claims `flags` for this tick. Returns `false`, claiming nothing, when any
   * of them is already taken.
   */
  consume(flags: number): boolean {
    if ((this.used & flags) !== 0) {
      return false;
    }
    this.used |= flags;
    return true;
  }
}
