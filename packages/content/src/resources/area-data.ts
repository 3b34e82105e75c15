import {
  Byml,
  expectArray,
  expectHash,
  expectInt,
  expectMember,
  parseByml,
  writeByml,
  type BymlNode,
  type Endian,
} from '@modmerge/core';
import type { SortedDeleteMap } from '../collections/delete-map.js';
import { sortedNodeMap } from './byml-fields.js';
import type { Resource } from './resource.js';

/** Ecosystem area table; each area is replaced as a whole. */
export class AreaData implements Resource<AreaData> {
  readonly kind = 'AreaData' as const;
  static readonly pathPattern = /^Ecosystem\/AreaData\.byml$/;

  constructor(readonly areas: SortedDeleteMap<number, BymlNode> = sortedNodeMap()) {}

  static fromBinary(data: Uint8Array): AreaData {
    return AreaData.fromByml(parseByml(data).root);
  }

  static fromByml(root: BymlNode): AreaData {
    return new AreaData(
      sortedNodeMap(
        expectArray(root, 'root').map((node) => {
          const area = expectInt(expectMember(expectHash(node, 'area'), 'AreaNumber'), 'AreaNumber');
          return [area, node] as const;
        }),
      ),
    );
  }

  toByml(): BymlNode {
    return Byml.array(this.areas.values());
  }

  toBinary(endian: Endian): Uint8Array {
    return writeByml(this.toByml(), endian);
  }

  diff(other: AreaData): AreaData {
    return new AreaData(this.areas.diff(other.areas));
  }

  merge(diff: AreaData): AreaData {
    return new AreaData(this.areas.merge(diff.areas));
  }

  equals(other: AreaData): boolean {
    return this.areas.equals(other.areas);
  }
}
