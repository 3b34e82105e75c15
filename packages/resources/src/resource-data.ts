import { SchemaMismatchError, decompressIfYaz0, type Endian } from '@modmerge/core';
import {
  diffResource,
  mergeResource,
  resourceToBinary,
  resourcesEqual,
  type MergeableResource,
} from '@modmerge/content';
import type { ArchiveMap, ArchiveWriteOptions } from './archive-map.js';
import type { BinaryResource } from './binary-resource.js';

/** The bytes a resource was read from, kept so unmodified data is written back untouched. */
export interface ResourceSource {
  /** Bytes as stored, Yaz0 compression included. */
  readonly raw: Uint8Array;
  /** Byte order of the payload; absent for platform-agnostic formats. */
  readonly endian?: Endian;
}

/** Source of an archive, with the member resources loaded alongside it. */
export interface ArchiveSource extends ResourceSource {
  /** Canonical key to the data each member was loaded as. */
  readonly members: ReadonlyMap<string, ResourceData>;
}

export type ResourceData =
  | { readonly type: 'binary'; readonly resource: BinaryResource; readonly source?: ResourceSource }
  | { readonly type: 'mergeable'; readonly resource: MergeableResource; readonly source?: ResourceSource }
  | { readonly type: 'archive'; readonly map: ArchiveMap; readonly source?: ArchiveSource };

/** Canonical resource key to resource. */
export type ResourceTable = Map<string, ResourceData>;

export function binaryData(resource: BinaryResource, source?: ResourceSource): ResourceData {
  return { type: 'binary', resource, source };
}

export function mergeableData(resource: MergeableResource, source?: ResourceSource): ResourceData {
  return { type: 'mergeable', resource, source };
}

export function archiveData(map: ArchiveMap, source?: ArchiveSource): ResourceData {
  return { type: 'archive', map, source };
}

/**
 * An archive is untouched while every member it references still resolves
 * to the data it was loaded with, recursively.
 */
function archiveUntouched(source: ArchiveSource, map: ArchiveMap, table: ResourceTable, seen: Set<ArchiveMap>): boolean {
  if (seen.has(map)) return true;
  seen.add(map);
  for (const canonical of map.entries.values()) {
    const data = table.get(canonical);
    if (data === undefined || data !== source.members.get(canonical)) return false;
    if (data.type === 'archive' && (data.source === undefined || !archiveUntouched(data.source, data.map, table, seen))) {
      return false;
    }
  }
  return true;
}

/** Source bytes usable for `endian`, or undefined when the resource must be re-encoded. */
export function reusableSource(data: ResourceData, endian: Endian, table: ResourceTable): ResourceSource | undefined {
  const source = data.source;
  if (source === undefined) return undefined;
  if (source.endian !== undefined && source.endian !== endian) return undefined;
  if (data.type === 'archive' && (data.source === undefined || !archiveUntouched(data.source, data.map, table, new Set()))) {
    return undefined;
  }
  return source;
}

/**
 * Uncompressed bytes of a resource for one platform. Resources that still
 * match their source return its bytes; archives are otherwise rebuilt from
 * `table`.
 */
export function resourceDataToBinary(
  data: ResourceData,
  endian: Endian,
  table: ResourceTable,
  options: ArchiveWriteOptions = {},
): Uint8Array {
  const source = reusableSource(data, endian, table);
  if (source) return decompressIfYaz0(source.raw);
  switch (data.type) {
    case 'binary':
      return data.resource.toBinary(endian);
    case 'mergeable':
      return resourceToBinary(data.resource, endian);
    case 'archive':
      return data.map.toBinary(endian, table, options);
  }
}

export function diffResourceData(base: ResourceData, modified: ResourceData): ResourceData {
  if (base.type === 'binary' && modified.type === 'binary') {
    return binaryData(base.resource.diff(modified.resource));
  }
  if (base.type === 'mergeable' && modified.type === 'mergeable') {
    return mergeableData(diffResource(base.resource, modified.resource));
  }
  if (base.type === 'archive' && modified.type === 'archive') {
    return archiveData(base.map.diff(modified.map));
  }
  throw new SchemaMismatchError('diff', base.type, modified.type);
}

export function mergeResourceData(base: ResourceData, diff: ResourceData): ResourceData {
  if (base.type === 'binary' && diff.type === 'binary') {
    return binaryData(base.resource.merge(diff.resource));
  }
  if (base.type === 'mergeable' && diff.type === 'mergeable') {
    return mergeableData(mergeResource(base.resource, diff.resource));
  }
  if (base.type === 'archive' && diff.type === 'archive') {
    return archiveData(base.map.merge(diff.map));
  }
  throw new SchemaMismatchError('merge', base.type, diff.type);
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.byteLength !== b.byteLength) return false;
  for (let i = 0; i < a.byteLength; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function resourceDataEquals(a: ResourceData, b: ResourceData): boolean {
  if (a.type === 'binary' && b.type === 'binary') return a.resource.equals(b.resource);
  if (a.type === 'mergeable' && b.type === 'mergeable') {
    if (a.source && b.source && sameBytes(a.source.raw, b.source.raw)) return true;
    return resourcesEqual(a.resource, b.resource);
  }
  if (a.type === 'archive' && b.type === 'archive') return a.map.equals(b.map);
  return false;
}
