import type { Entity, EntityStore } from '../entity-store.js';
import { ChildList, NO_OWNER, type OwnerRef } from '../ownership.js';
import { ClaimDirective } from './claim-directive.js';
import { ColonyDirective } from './colony-directive.js';
import type { DirectiveBaseFields } from './directive-base.js';
import {
  DirectiveDataAttribute,
  type DirectiveData,
  type DirectiveKind,
} from './directive-types.js';
import { MiningOutpostDirective } from './mining-outpost-directive.js';

export interface DirectiveBuilderOptions {
  readonly owner?: OwnerRef;
}

function baseFields(options: DirectiveBuilderOptions): DirectiveBaseFields {
  return { owner: options.owner ?? NO_OWNER, children: new ChildList() };
}

export function createDirectiveEntity(store: EntityStore, data: DirectiveData): Entity {
  const entity = store.create();
  store.insert(DirectiveDataAttribute, entity, data);
  return entity;
}

export function createClaimDirective(
  store: EntityStore,
  options: DirectiveBuilderOptions = {},
): Entity {
  return createDirectiveEntity(store, {
    kind: 'claim',
    directive: new ClaimDirective(baseFields(options)),
  });
}

export function createColonyDirective(
  store: EntityStore,
  options: DirectiveBuilderOptions = {},
): Entity {
  return createDirectiveEntity(store, {
    kind: 'colony',
    directive: new ColonyDirective(baseFields(options)),
  });
}

export function createMiningOutpostDirective(
  store: EntityStore,
  options: DirectiveBuilderOptions = {},
): Entity {
  return createDirectiveEntity(store, {
    kind: 'miningOutpost',
    directive: new MiningOutpostDirective(baseFields(options)),
  });
}

const BUILDERS: Readonly<Record<DirectiveKind, (store: EntityStore) => Entity>> = {
  claim: (store) => createClaimDirective(store),
  colony: (store) => createColonyDirective(store),
  miningOutpost: (store) => createMiningOutpostDirective(store),
};

export const ALWAYS_ON_DIRECTIVES: readonly DirectiveKind[] = Object.freeze([
  'claim',
  'colony',
  'miningOutpost',
]);

export function createDirective(store: EntityStore, kind: DirectiveKind): Entity {
  return BUILDERS[kind](store);
}
