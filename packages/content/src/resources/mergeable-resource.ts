import { SchemaMismatchError, type Endian } from '@modmerge/core';
import { ActorInfo } from './actor-info.js';
import { ActorLink } from './actor-link.js';
import { AreaData } from './area-data.js';
import { AttClientList } from './att-client-list.js';
import { DropTable } from './drop-table.js';
import { EventInfo } from './event-info.js';
import { GameDataPack } from './game-data.js';
import { GeneralParamList } from './general-param-list.js';
import { GenericParameter } from './generic-parameter.js';
import { ResidentActors } from './resident-actors.js';
import { StaticMap } from './static-map.js';
import type { ResourceKind } from './resource.js';

export type MergeableResource =
  | ActorInfo
  | ActorLink
  | AreaData
  | AttClientList
  | DropTable
  | EventInfo
  | GameDataPack
  | GeneralParamList
  | GenericParameter
  | ResidentActors
  | StaticMap;

type ResourceOf<K extends ResourceKind> = Extract<MergeableResource, { kind: K }>;

export interface ResourceSchema<K extends ResourceKind = ResourceKind> {
  readonly kind: K;
  /** Canonical path pattern; absent for sniffed fallbacks. */
  readonly pathPattern?: RegExp;
  parse(bytes: Uint8Array): ResourceOf<K>;
}

function schema<K extends ResourceKind>(
  kind: K,
  parse: (bytes: Uint8Array) => ResourceOf<K>,
  pathPattern?: RegExp,
): ResourceSchema<K> {
  return { kind, parse, pathPattern };
}

/**
 * Path-matched schemas in match priority order: single files first, then
 * directory patterns.
 */
export const RESOURCE_SCHEMAS: readonly ResourceSchema[] = [
  schema('ActorInfo', ActorInfo.fromBinary, ActorInfo.pathPattern),
  schema('ResidentActors', ResidentActors.fromBinary, ResidentActors.pathPattern),
  schema('EventInfo', EventInfo.fromBinary, EventInfo.pathPattern),
  schema('AreaData', AreaData.fromBinary, AreaData.pathPattern),
  schema('GameDataPack', GameDataPack.fromBinary, GameDataPack.pathPattern),
  schema('Static', StaticMap.fromBinary, StaticMap.pathPattern),
  schema('ActorLink', ActorLink.fromBinary, ActorLink.pathPattern),
  schema('AttClientList', AttClientList.fromBinary, AttClientList.pathPattern),
  schema('DropTable', DropTable.fromBinary, DropTable.pathPattern),
  schema('GeneralParamList', GeneralParamList.fromBinary, GeneralParamList.pathPattern),
];

export const GENERIC_PARAMETER_SCHEMA: ResourceSchema<'GenericParameter'> = schema(
  'GenericParameter',
  GenericParameter.fromBinary,
);

/** First schema whose pattern matches the canonical path. */
export function schemaForPath(canonical: string): ResourceSchema | undefined {
  return RESOURCE_SCHEMAS.find((entry) => entry.pathPattern?.test(canonical) === true);
}

function assertNever(value: never): never {
  throw new Error(`Unhandled resource: ${JSON.stringify(value)}`);
}

function mismatch(operation: string, a: MergeableResource, b: MergeableResource): SchemaMismatchError {
  return new SchemaMismatchError(operation, a.kind, b.kind);
}

/** Diff two resources of the same kind. */
export function diffResource(base: MergeableResource, modified: MergeableResource): MergeableResource {
  switch (base.kind) {
    case 'ActorInfo':
      if (modified instanceof ActorInfo) return base.diff(modified);
      break;
    case 'ActorLink':
      if (modified instanceof ActorLink) return base.diff(modified);
      break;
    case 'AreaData':
      if (modified instanceof AreaData) return base.diff(modified);
      break;
    case 'AttClientList':
      if (modified instanceof AttClientList) return base.diff(modified);
      break;
    case 'DropTable':
      if (modified instanceof DropTable) return base.diff(modified);
      break;
    case 'EventInfo':
      if (modified instanceof EventInfo) return base.diff(modified);
      break;
    case 'GameDataPack':
      if (modified instanceof GameDataPack) return base.diff(modified);
      break;
    case 'GeneralParamList':
      if (modified instanceof GeneralParamList) return base.diff(modified);
      break;
    case 'GenericParameter':
      if (modified instanceof GenericParameter) return base.diff(modified);
      break;
    case 'ResidentActors':
      if (modified instanceof ResidentActors) return base.diff(modified);
      break;
    case 'Static':
      if (modified instanceof StaticMap) return base.diff(modified);
      break;
    default:
      return assertNever(base);
  }
  throw mismatch('diff', base, modified);
}

/** Apply a diff produced by {@link diffResource}. */
export function mergeResource(base: MergeableResource, diff: MergeableResource): MergeableResource {
  switch (base.kind) {
    case 'ActorInfo':
      if (diff instanceof ActorInfo) return base.merge(diff);
      break;
    case 'ActorLink':
      if (diff instanceof ActorLink) return base.merge(diff);
      break;
    case 'AreaData':
      if (diff instanceof AreaData) return base.merge(diff);
      break;
    case 'AttClientList':
      if (diff instanceof AttClientList) return base.merge(diff);
      break;
    case 'DropTable':
      if (diff instanceof DropTable) return base.merge(diff);
      break;
    case 'EventInfo':
      if (diff instanceof EventInfo) return base.merge(diff);
      break;
    case 'GameDataPack':
      if (diff instanceof GameDataPack) return base.merge(diff);
      break;
    case 'GeneralParamList':
      if (diff instanceof GeneralParamList) return base.merge(diff);
      break;
    case 'GenericParameter':
      if (diff instanceof GenericParameter) return base.merge(diff);
      break;
    case 'ResidentActors':
      if (diff instanceof ResidentActors) return base.merge(diff);
      break;
    case 'Static':
      if (diff instanceof StaticMap) return base.merge(diff);
      break;
    default:
      return assertNever(base);
  }
  throw mismatch('merge', base, diff);
}

/** Structural equality; resources of different kinds are never equal. */
export function resourcesEqual(a: MergeableResource, b: MergeableResource): boolean {
  switch (a.kind) {
    case 'ActorInfo':
      return b instanceof ActorInfo && a.equals(b);
    case 'ActorLink':
      return b instanceof ActorLink && a.equals(b);
    case 'AreaData':
      return b instanceof AreaData && a.equals(b);
    case 'AttClientList':
      return b instanceof AttClientList && a.equals(b);
    case 'DropTable':
      return b instanceof DropTable && a.equals(b);
    case 'EventInfo':
      return b instanceof EventInfo && a.equals(b);
    case 'GameDataPack':
      return b instanceof GameDataPack && a.equals(b);
    case 'GeneralParamList':
      return b instanceof GeneralParamList && a.equals(b);
    case 'GenericParameter':
      return b instanceof GenericParameter && a.equals(b);
    case 'ResidentActors':
      return b instanceof ResidentActors && a.equals(b);
    case 'Static':
      return b instanceof StaticMap && a.equals(b);
    default:
      return assertNever(a);
  }
}

export function resourceToBinary(resource: MergeableResource, endian: Endian): Uint8Array {
  return resource.toBinary(endian);
}
