import type { Entity, EntityStore } from '../entity-store.js';
import { ChildList, NO_OWNER, type MissionOwnerRef } from '../ownership.js';
import { RoomDataAttribute, type RoomData } from '../room/room-data.js';
import { linkToOwner } from '../task-lifecycle.js';
import { ClaimMission } from './claim-mission.js';
import { ColonyMission } from './colony-mission.js';
import { DismantleMission } from './dismantle-mission.js';
import type { MissionBaseFields } from './mission-base.js';
import {
  asMission,
  MissionDataAttribute,
  type MissionData,
  type MissionKind,
} from './mission-types.js';
import { RemoteMineMission } from './remote-mine-mission.js';
import { ReserveMission } from './reserve-mission.js';
import { ScoutMission } from './scout-mission.js';

export interface MissionBuilderOptions {
  /** Room entity the mission works on. */
  readonly room: Entity;
  /** Room entity units are spawned from. */
  readonly home: Entity;
  readonly owner?: MissionOwnerRef;
}

function baseFields(options: MissionBuilderOptions): MissionBaseFields {
  return {
    room: options.room,
    home: options.home,
    owner: options.owner ?? NO_OWNER,
    children: new ChildList(),
  };
}

/**
 * Creates a mission entity, lists it on its room and on its owning directive.
 */
export function createMissionEntity(store: EntityStore, data: MissionData): Entity {
  const entity = store.create();
  const mission = asMission(data);
  store.insert(MissionDataAttribute, entity, data);
  store.get(RoomDataAttribute, mission.getRoom())?.addMission(entity);
  linkToOwner(store, mission.getOwner(), entity);
  return entity;
}

export function createColonyMission(
  store: EntityStore,
  options: Omit<MissionBuilderOptions, 'home'>,
): Entity {
  return createMissionEntity(store, {
    kind: 'colony',
    mission: new ColonyMission(baseFields({ ...options, home: options.room })),
  });
}

export function createClaimMission(store: EntityStore, options: MissionBuilderOptions): Entity {
  return createMissionEntity(store, {
    kind: 'claim',
    mission: new ClaimMission(baseFields(options)),
  });
}

export function createReserveMission(store: EntityStore, options: MissionBuilderOptions): Entity {
  return createMissionEntity(store, {
    kind: 'reserve',
    mission: new ReserveMission(baseFields(options)),
  });
}

export function createRemoteMineMission(
  store: EntityStore,
  options: MissionBuilderOptions,
): Entity {
  return createMissionEntity(store, {
    kind: 'remoteMine',
    mission: new RemoteMineMission(baseFields(options)),
  });
}

export function createScoutMission(store: EntityStore, options: MissionBuilderOptions): Entity {
  return createMissionEntity(store, {
    kind: 'scout',
    mission: new ScoutMission(baseFields(options)),
  });
}

export function createDismantleMission(
  store: EntityStore,
  options: MissionBuilderOptions,
): Entity {
  return createMissionEntity(store, {
    kind: 'dismantle',
    mission: new DismantleMission(baseFields(options)),
  });
}

/**
 * Whether one of the missions listed on `room` is of `kind`.
 */
export function roomHasMission(
  store: EntityStore,
  room: RoomData | undefined,
  ...kinds: readonly MissionKind[]
): boolean {
  if (!room) {
    return false;
  }
  return room.getMissions().some((mission) => {
    const data = store.get(MissionDataAttribute, mission);
    return data !== undefined && kinds.includes(data.kind);
  });
}
