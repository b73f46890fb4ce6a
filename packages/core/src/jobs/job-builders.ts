import type { RoomName } from '@colonist/world-contract';

import type { Entity, EntityStore } from '../entity-store.js';
import { NO_OWNER, type JobOwnerRef } from '../ownership.js';
import { BuildJob } from './build-job.js';
import { ClaimJob } from './claim-job.js';
import { DismantleJob } from './dismantle-job.js';
import { HarvestJob } from './harvest-job.js';
import { HaulJob } from './haul-job.js';
import { linkToOwner } from '../task-lifecycle.js';
import { asJob, JobDataAttribute, UnitBindingAttribute, type JobData } from './job-types.js';
import type { RemoteTarget } from './movement.js';
import { ReserveJob } from './reserve-job.js';
import { ScoutJob } from './scout-job.js';
import { UpgradeJob } from './upgrade-job.js';

export interface JobBuilderOptions {
  readonly unitName: string;
  readonly owner?: JobOwnerRef;
}

/**
 * Creates a job entity bound to `unitName`. The job value already carries
 * its owner, which lists the new entity among its children.
 */
export function createJobEntity(store: EntityStore, unitName: string, data: JobData): Entity {
  const entity = store.create();
  store.insert(JobDataAttribute, entity, data);
  store.insert(UnitBindingAttribute, entity, { unitName });
  linkToOwner(store, asJob(data).getOwner(), entity);
  return entity;
}

export function createHarvestJob(
  store: EntityStore,
  options: JobBuilderOptions & {
    readonly source: RemoteTarget;
    readonly delivery?: RemoteTarget;
  },
): Entity {
  return createJobEntity(store, options.unitName, {
    kind: 'harvest',
    job: new HarvestJob(options.source, options.delivery, options.owner ?? NO_OWNER),
  });
}

export function createUpgradeJob(
  store: EntityStore,
  options: JobBuilderOptions & {
    readonly controller: RemoteTarget;
    readonly supply?: RemoteTarget;
  },
): Entity {
  return createJobEntity(store, options.unitName, {
    kind: 'upgrade',
    job: new UpgradeJob(options.controller, options.supply, options.owner ?? NO_OWNER),
  });
}

export function createHaulJob(
  store: EntityStore,
  options: JobBuilderOptions & {
    readonly pickup: RemoteTarget;
    readonly delivery: RemoteTarget;
  },
): Entity {
  return createJobEntity(store, options.unitName, {
    kind: 'haul',
    job: new HaulJob(options.pickup, options.delivery, options.owner ?? NO_OWNER),
  });
}

export function createBuildJob(
  store: EntityStore,
  options: JobBuilderOptions & { readonly room: RoomName },
): Entity {
  return createJobEntity(store, options.unitName, {
    kind: 'build',
    job: new BuildJob(options.room, options.owner ?? NO_OWNER),
  });
}

export function createScoutJob(
  store: EntityStore,
  options: JobBuilderOptions & { readonly room: RoomName },
): Entity {
  return createJobEntity(store, options.unitName, {
    kind: 'scout',
    job: new ScoutJob(options.room, options.owner ?? NO_OWNER),
  });
}

export function createReserveJob(
  store: EntityStore,
  options: JobBuilderOptions & { readonly controller: RemoteTarget },
): Entity {
  return createJobEntity(store, options.unitName, {
    kind: 'reserve',
    job: new ReserveJob(options.controller, options.owner ?? NO_OWNER),
  });
}

export function createClaimJob(
  store: EntityStore,
  options: JobBuilderOptions & { readonly controller: RemoteTarget },
): Entity {
  return createJobEntity(store, options.unitName, {
    kind: 'claim',
    job: new ClaimJob(options.controller, options.owner ?? NO_OWNER),
  });
}

export function createDismantleJob(
  store: EntityStore,
  options: JobBuilderOptions & { readonly room: RoomName },
): Entity {
  return createJobEntity(store, options.unitName, {
    kind: 'dismantle',
    job: new DismantleJob(options.room, options.owner ?? NO_OWNER),
  });
}
