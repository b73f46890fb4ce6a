import { ROOM_SIZE, type Position, type RoomName } from '@colonist/world-contract';
import { z } from 'zod';

import type { JobTickContext } from '../task-types.js';
import { ActionFlag } from './action-flags.js';

export const positionSchema = z.object({
  x: z.number().int().min(0).max(ROOM_SIZE - 1),
  y: z.number().int().min(0).max(ROOM_SIZE - 1),
  room: z.string().min(1),
});

/** An object id together with where it was last seen. */
export const remoteTargetSchema = z.object({
  id: z.string().min(1),
  pos: positionSchema,
});

export type RemoteTarget = z.infer<typeof remoteTargetSchema>;

const ROOM_CENTER = Math.floor(ROOM_SIZE / 2);
const ROOM_ARRIVAL_RANGE = ROOM_CENTER - 2;

/** Chebyshev distance check; positions in different rooms are never in range. */
export function inRange(from: Position, to: Position, range: number): boolean {
  return (
    from.room === to.room &&
    Math.max(Math.abs(from.x - to.x), Math.abs(from.y - to.y)) <= range
  );
}

export function roomCenter(room: RoomName): Position {
  return { x: ROOM_CENTER, y: ROOM_CENTER, room };
}

/**
 * Moves the unit toward `target`. Yields `next()` once in range; otherwise
 * issues a move if the move pipeline is still free this tick.
 */
export function tickMoveToPosition<TPhase>(
  context: JobTickContext,
  target: Position,
  range: number,
  next: () => TPhase,
): TPhase | undefined {
  if (inRange(context.unit.pos, target, range)) {
    return next();
  }
  if (context.actionFlags.consume(ActionFlag.MOVE)) {
    context.actions.moveTo(context.unit.name, target, range, context.pathCosts);
  }
  return undefined;
}

export function tickMoveToRoom<TPhase>(
  context: JobTickContext,
  room: RoomName,
  next: () => TPhase,
): TPhase | undefined {
  return tickMoveToPosition(context, roomCenter(room), ROOM_ARRIVAL_RANGE, next);
}

/**
 * Counts down a wait phase in place. Yields `next()` once the countdown has
 * run out.
 */
export function tickWait<TPhase>(
  phase: { ticks: number },
  next: () => TPhase,
): TPhase | undefined {
  if (phase.ticks <= 0) {
    return next();
  }
  phase.ticks -= 1;
  return undefined;
}
