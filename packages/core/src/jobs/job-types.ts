import { z } from 'zod';

import {
  defineAttribute,
  type EntityRefReader,
  type EntityRefWriter,
} from '../entity-store.js';
import { assertNever, type JobTickContext, type TaskCapability } from '../task-types.js';
import { BuildJob, buildJobSchema } from './build-job.js';
import { ClaimJob, claimJobSchema } from './claim-job.js';
import { DismantleJob, dismantleJobSchema } from './dismantle-job.js';
import { HarvestJob, harvestJobSchema } from './harvest-job.js';
import { HaulJob, haulJobSchema } from './haul-job.js';
import { ReserveJob, reserveJobSchema } from './reserve-job.js';
import { ScoutJob, scoutJobSchema } from './scout-job.js';
import { UpgradeJob, upgradeJobSchema } from './upgrade-job.js';

export type JobCapability = TaskCapability<JobData, JobTickContext>;

export type JobData =
  | { readonly kind: 'harvest'; readonly job: HarvestJob }
  | { readonly kind: 'upgrade'; readonly job: UpgradeJob }
  | { readonly kind: 'haul'; readonly job: HaulJob }
  | { readonly kind: 'build'; readonly job: BuildJob }
  | { readonly kind: 'scout'; readonly job: ScoutJob }
  | { readonly kind: 'reserve'; readonly job: ReserveJob }
  | { readonly kind: 'claim'; readonly job: ClaimJob }
  | { readonly kind: 'dismantle'; readonly job: DismantleJob };

export type JobKind = JobData['kind'];

export function asJob(data: JobData): JobCapability {
  switch (data.kind) {
    case 'harvest':
      return data.job;
    case 'upgrade':
      return data.job;
    case 'haul':
      return data.job;
    case 'build':
      return data.job;
    case 'scout':
      return data.job;
    case 'reserve':
      return data.job;
    case 'claim':
      return data.job;
    case 'dismantle':
      return data.job;
    default:
      return assertNever(data, 'job kind');
  }
}

const serializedJobSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('harvest'), data: harvestJobSchema }),
  z.object({ kind: z.literal('upgrade'), data: upgradeJobSchema }),
  z.object({ kind: z.literal('haul'), data: haulJobSchema }),
  z.object({ kind: z.literal('build'), data: buildJobSchema }),
  z.object({ kind: z.literal('scout'), data: scoutJobSchema }),
  z.object({ kind: z.literal('reserve'), data: reserveJobSchema }),
  z.object({ kind: z.literal('claim'), data: claimJobSchema }),
  z.object({ kind: z.literal('dismantle'), data: dismantleJobSchema }),
]);

export type SerializedJobData = z.infer<typeof serializedJobSchema>;

export function serializeJobData(data: JobData, refs: EntityRefWriter): SerializedJobData {
  switch (data.kind) {
    case 'harvest':
      return { kind: data.kind, data: data.job.encode(refs) };
    case 'upgrade':
      return { kind: data.kind, data: data.job.encode(refs) };
    case 'haul':
      return { kind: data.kind, data: data.job.encode(refs) };
    case 'build':
      return { kind: data.kind, data: data.job.encode(refs) };
    case 'scout':
      return { kind: data.kind, data: data.job.encode(refs) };
    case 'reserve':
      return { kind: data.kind, data: data.job.encode(refs) };
    case 'claim':
      return { kind: data.kind, data: data.job.encode(refs) };
    case 'dismantle':
      return { kind: data.kind, data: data.job.encode(refs) };
    default:
      return assertNever(data, 'job kind');
  }
}

export function hydrateJobData(raw: unknown, refs: EntityRefReader): JobData {
  const parsed = serializedJobSchema.parse(raw);
  switch (parsed.kind) {
    case 'harvest':
      return { kind: parsed.kind, job: HarvestJob.decode(parsed.data, refs) };
    case 'upgrade':
      return { kind: parsed.kind, job: UpgradeJob.decode(parsed.data, refs) };
    case 'haul':
      return { kind: parsed.kind, job: HaulJob.decode(parsed.data, refs) };
    case 'build':
      return { kind: parsed.kind, job: BuildJob.decode(parsed.data, refs) };
    case 'scout':
      return { kind: parsed.kind, job: ScoutJob.decode(parsed.data, refs) };
    case 'reserve':
      return { kind: parsed.kind, job: ReserveJob.decode(parsed.data, refs) };
    case 'claim':
      return { kind: parsed.kind, job: ClaimJob.decode(parsed.data, refs) };
    case 'dismantle':
      return { kind: parsed.kind, job: DismantleJob.decode(parsed.data, refs) };
    default:
      return assertNever(parsed, 'serialized job kind');
  }
}

export const JobDataAttribute = defineAttribute<JobData>('job.data', {
  encode: serializeJobData,
  decode: hydrateJobData,
});

const unitBindingSchema = z.object({ unitName: z.string().min(1) });

/** Names the unit a job entity drives. */
export type UnitBinding = z.infer<typeof unitBindingSchema>;

export const UnitBindingAttribute = defineAttribute<UnitBinding>('job.unit', {
  encode: (value) => ({ unitName: value.unitName }),
  decode: (data) => unitBindingSchema.parse(data),
});
