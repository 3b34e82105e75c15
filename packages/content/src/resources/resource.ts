import type { Endian } from '@modmerge/core';
import type { Mergeable } from '../collections/mergeable.js';

export const RESOURCE_KINDS = [
  'ActorInfo',
  'ActorLink',
  'AreaData',
  'AttClientList',
  'DropTable',
  'EventInfo',
  'GameDataPack',
  'GeneralParamList',
  'GenericParameter',
  'ResidentActors',
  'Static',
] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

/** A typed resource: mergeable, and serializable for a target platform. */
export interface Resource<T> extends Mergeable<T> {
  readonly kind: ResourceKind;
  toBinary(endian: Endian): Uint8Array;
}
