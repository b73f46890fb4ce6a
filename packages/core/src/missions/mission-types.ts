import { z } from 'zod';

import {
  defineAttribute,
  type Entity,
  type EntityRefReader,
  type EntityRefWriter,
} from '../entity-store.js';
import {
  assertNever,
  type MissionTickContext,
  type OwningTaskCapability,
} from '../task-types.js';
import { ClaimMission, claimMissionSchema } from './claim-mission.js';
import { ColonyMission, colonyMissionSchema } from './colony-mission.js';
import { DismantleMission, dismantleMissionSchema } from './dismantle-mission.js';
import { RemoteMineMission, remoteMineMissionSchema } from './remote-mine-mission.js';
import { ReserveMission, reserveMissionSchema } from './reserve-mission.js';
import { ScoutMission, scoutMissionSchema } from './scout-mission.js';

export interface MissionCapability
  extends OwningTaskCapability<MissionData, MissionTickContext> {
  /** Room entity the mission is attached to. */
  getRoom(): Entity;
}

export type MissionData =
  | { readonly kind: 'colony'; readonly mission: ColonyMission }
  | { readonly kind: 'claim'; readonly mission: ClaimMission }
  | { readonly kind: 'reserve'; readonly mission: ReserveMission }
  | { readonly kind: 'remoteMine'; readonly mission: RemoteMineMission }
  | { readonly kind: 'scout'; readonly mission: ScoutMission }
  | { readonly kind: 'dismantle'; readonly mission: DismantleMission };

export type MissionKind = MissionData['kind'];

export function asMission(data: MissionData): MissionCapability {
  switch (data.kind) {
    case 'colony':
      return data.mission;
    case 'claim':
      return data.mission;
    case 'reserve':
      return data.mission;
    case 'remoteMine':
      return data.mission;
    case 'scout':
      return data.mission;
    case 'dismantle':
      return data.mission;
    default:
      return assertNever(data, 'mission kind');
  }
}

const serializedMissionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('colony'), data: colonyMissionSchema }),
  z.object({ kind: z.literal('claim'), data: claimMissionSchema }),
  z.object({ kind: z.literal('reserve'), data: reserveMissionSchema }),
  z.object({ kind: z.literal('remoteMine'), data: remoteMineMissionSchema }),
  z.object({ kind: z.literal('scout'), data: scoutMissionSchema }),
  z.object({ kind: z.literal('dismantle'), data: dismantleMissionSchema }),
]);

export type SerializedMissionData = z.infer<typeof serializedMissionSchema>;

export function serializeMissionData(
  data: MissionData,
  refs: EntityRefWriter,
): SerializedMissionData {
  switch (data.kind) {
    case 'colony':
      return { kind: data.kind, data: data.mission.encode(refs) };
    case 'claim':
      return { kind: data.kind, data: data.mission.encode(refs) };
    case 'reserve':
      return { kind: data.kind, data: data.mission.encode(refs) };
    case 'remoteMine':
      return { kind: data.kind, data: data.mission.encode(refs) };
    case 'scout':
      return { kind: data.kind, data: data.mission.encode(refs) };
    case 'dismantle':
      return { kind: data.kind, data: data.mission.encode(refs) };
    default:
      return assertNever(data, 'mission kind');
  }
}

export function hydrateMissionData(raw: unknown, refs: EntityRefReader): MissionData {
  const parsed = serializedMissionSchema.parse(raw);
  switch (parsed.kind) {
    case 'colony':
      return { kind: parsed.kind, mission: ColonyMission.decode(parsed.data, refs) };
    case 'claim':
      return { kind: parsed.kind, mission: ClaimMission.decode(parsed.data, refs) };
    case 'reserve':
      return { kind: parsed.kind, mission: ReserveMission.decode(parsed.data, refs) };
    case 'remoteMine':
      return { kind: parsed.kind, mission: RemoteMineMission.decode(parsed.data, refs) };
    case 'scout':
      return { kind: parsed.kind, mission: ScoutMission.decode(parsed.data, refs) };
    case 'dismantle':
      return { kind: parsed.kind, mission: DismantleMission.decode(parsed.data, refs) };
    default:
      return assertNever(parsed, 'serialized mission kind');
  }
}

export const MissionDataAttribute = defineAttribute<MissionData>('mission.data', {
  encode: serializeMissionData,
  decode: hydrateMissionData,
});
