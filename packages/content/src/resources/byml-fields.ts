import { bymlEquals, expectHash, type BymlNode } from '@modmerge/core';
import { DeleteMap, SortedDeleteMap } from '../collections/delete-map.js';

export type BymlFields = DeleteMap<string, BymlNode>;

/** Members of a hash node as a delete-aware map of atomic values. */
export function bymlFields(node: BymlNode, field?: string): BymlFields {
  return new DeleteMap(expectHash(node, field), bymlEquals);
}

export function nodeMap<K>(entries: Iterable<readonly [K, BymlNode]> = []): DeleteMap<K, BymlNode> {
  return new DeleteMap(entries, bymlEquals);
}

export function sortedNodeMap<K extends string | number>(
  entries: Iterable<readonly [K, BymlNode]> = [],
): SortedDeleteMap<K, BymlNode> {
  return new SortedDeleteMap(entries, bymlEquals);
}
