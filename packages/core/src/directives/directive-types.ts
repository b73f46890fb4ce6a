import { z } from 'zod';

import {
  defineAttribute,
  type EntityRefReader,
  type EntityRefWriter,
} from '../entity-store.js';
import { assertNever, type OwningTaskCapability } from '../task-types.js';
import { ClaimDirective, claimDirectiveSchema } from './claim-directive.js';
import { ColonyDirective, colonyDirectiveSchema } from './colony-directive.js';
import {
  MiningOutpostDirective,
  miningOutpostDirectiveSchema,
} from './mining-outpost-directive.js';

export type DirectiveCapability = OwningTaskCapability<DirectiveData>;

export type DirectiveData =
  | { readonly kind: 'claim'; readonly directive: ClaimDirective }
  | { readonly kind: 'colony'; readonly directive: ColonyDirective }
  | { readonly kind: 'miningOutpost'; readonly directive: MiningOutpostDirective };

export type DirectiveKind = DirectiveData['kind'];

export function asDirective(data: DirectiveData): DirectiveCapability {
  switch (data.kind) {
    case 'claim':
      return data.directive;
    case 'colony':
      return data.directive;
    case 'miningOutpost':
      return data.directive;
    default:
      return assertNever(data, 'directive kind');
  }
}

const serializedDirectiveSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('claim'), data: claimDirectiveSchema }),
  z.object({ kind: z.literal('colony'), data: colonyDirectiveSchema }),
  z.object({ kind: z.literal('miningOutpost'), data: miningOutpostDirectiveSchema }),
]);

export type SerializedDirectiveData = z.infer<typeof serializedDirectiveSchema>;

export function serializeDirectiveData(
  data: DirectiveData,
  refs: EntityRefWriter,
): SerializedDirectiveData {
  switch (data.kind) {
    case 'claim':
      return { kind: data.kind, data: data.directive.encode(refs) };
    case 'colony':
      return { kind: data.kind, data: data.directive.encode(refs) };
    case 'miningOutpost':
      return { kind: data.kind, data: data.directive.encode(refs) };
    default:
      return assertNever(data, 'directive kind');
  }
}

export function hydrateDirectiveData(raw: unknown, refs: EntityRefReader): DirectiveData {
  const parsed = serializedDirectiveSchema.parse(raw);
  switch (parsed.kind) {
    case 'claim':
      return { kind: parsed.kind, directive: ClaimDirective.decode(parsed.data, refs) };
    case 'colony':
      return { kind: parsed.kind, directive: ColonyDirective.decode(parsed.data, refs) };
    case 'miningOutpost':
      return {
        kind: parsed.kind,
        directive: MiningOutpostDirective.decode(parsed.data, refs),
      };
    default:
      return assertNever(parsed, 'serialized directive kind');
  }
}

export const DirectiveDataAttribute = defineAttribute<DirectiveData>('directive.data', {
  encode: serializeDirectiveData,
  decode: hydrateDirectiveData,
});
