import {
  Byml,
  expectArray,
  expectHash,
  expectMember,
  expectString,
  parseByml,
  writeByml,
  type BymlNode,
  type Endian,
} from '@modmerge/core';
import type { DeleteMap } from '../collections/delete-map.js';
import { nodeMap } from './byml-fields.js';
import type { Resource } from './resource.js';

/** Actors kept loaded for the whole session, keyed by actor name. */
export class ResidentActors implements Resource<ResidentActors> {
  readonly kind = 'ResidentActors' as const;
  static readonly pathPattern = /^Actor\/ResidentActors\.byml$/;

  constructor(readonly actors: DeleteMap<string, BymlNode> = nodeMap()) {}

  static fromBinary(data: Uint8Array): ResidentActors {
    return ResidentActors.fromByml(parseByml(data).root);
  }

  static fromByml(root: BymlNode): ResidentActors {
    return new ResidentActors(
      nodeMap(
        expectArray(root, 'root').map((node) => {
          const name = expectString(expectMember(expectHash(node, 'actor'), 'name'), 'name');
          return [name, node] as const;
        }),
      ),
    );
  }

  toByml(): BymlNode {
    return Byml.array(this.actors.values());
  }

  toBinary(endian: Endian): Uint8Array {
    return writeByml(this.toByml(), endian);
  }

  diff(other: ResidentActors): ResidentActors {
    return new ResidentActors(this.actors.diff(other.actors));
  }

  merge(diff: ResidentActors): ResidentActors {
    return new ResidentActors(this.actors.merge(diff.actors));
  }

  equals(other: ResidentActors): boolean {
    return this.actors.equals(other.actors);
  }
}
