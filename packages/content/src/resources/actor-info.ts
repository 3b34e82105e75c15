import {
  Byml,
  crc32,
  expectArray,
  expectHash,
  expectMember,
  expectString,
  parseByml,
  writeByml,
  type BymlNode,
  type Endian,
} from '@modmerge/core';
import { SortedDeleteMap } from '../collections/delete-map.js';
import { mergeableEquals } from '../collections/mergeable.js';
import { nodeMap, type BymlFields } from './byml-fields.js';
import type { Resource } from './resource.js';

/**
 * The actor information table. Actors are keyed by the CRC32 of their name
 * and written back in ascending hash order, with the matching `Hashes` list.
 */
export class ActorInfo implements Resource<ActorInfo> {
  readonly kind = 'ActorInfo' as const;
  static readonly pathPattern = /^Actor\/ActorInfo\.product\.byml$/;

  constructor(
    readonly actors: SortedDeleteMap<number, BymlFields> = new SortedDeleteMap<number, BymlFields>(
      undefined,
      mergeableEquals,
    ),
  ) {}

  static fromBinary(data: Uint8Array): ActorInfo {
    return ActorInfo.fromByml(parseByml(data).root);
  }

  static fromByml(root: BymlNode): ActorInfo {
    const actors = new SortedDeleteMap<number, BymlFields>(undefined, mergeableEquals);
    for (const node of expectArray(expectMember(expectHash(root, 'root'), 'Actors'), 'Actors')) {
      const actor = expectHash(node, 'Actors');
      actors.set(crc32(expectString(expectMember(actor, 'name'), 'name')), nodeMap(actor));
    }
    return new ActorInfo(actors);
  }

  toByml(): BymlNode {
    return Byml.record({
      Actors: Byml.array([...this.actors.values()].map((fields) => Byml.hash(fields))),
      Hashes: Byml.array([...this.actors.keys()].map((hash) => (hash < 0x80000000 ? Byml.int(hash) : Byml.uint(hash)))),
    });
  }

  toBinary(endian: Endian): Uint8Array {
    return writeByml(this.toByml(), endian);
  }

  diff(other: ActorInfo): ActorInfo {
    return new ActorInfo(this.actors.deepDiff(other.actors));
  }

  merge(diff: ActorInfo): ActorInfo {
    return new ActorInfo(this.actors.deepMerge(diff.actors));
  }

  equals(other: ActorInfo): boolean {
    return this.actors.equals(other.actors);
  }
}
