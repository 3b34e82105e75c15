import {
  Param,
  createParameterIO,
  expectParameterObject,
  expectStringParam,
  nameHash,
  objectByName,
  parameterObject,
  parameterObjectEquals,
  parseParameterIO,
  writeParameterIO,
  type Endian,
  type ParameterIO,
  type ParameterObject,
} from '@modmerge/core';
import { DeleteSet } from '../collections/delete-set.js';
import { diffParameterObject, mergeParameterObject } from './parameter-object.js';
import type { Resource } from './resource.js';

const TARGETS_OBJECT = 'LinkTarget';
const TAGS_OBJECT = 'Tags';

/**
 * Actor link file: the per-actor table of which parameter files the actor
 * uses (`LinkTarget`) plus its tag set.
 */
export class ActorLink implements Resource<ActorLink> {
  readonly kind = 'ActorLink' as const;
  static readonly pathPattern = /^Actor\/ActorLink\/[^/]+\.bxml$/;

  constructor(
    readonly targets: ParameterObject,
    readonly tags: DeleteSet<string> = new DeleteSet(),
  ) {}

  static fromBinary(data: Uint8Array): ActorLink {
    return ActorLink.fromParameterIO(parseParameterIO(data));
  }

  static fromParameterIO(pio: ParameterIO): ActorLink {
    const targets = expectParameterObject(pio.root, TARGETS_OBJECT);
    const tags = new DeleteSet<string>();
    const tagObject = objectByName(pio.root, TAGS_OBJECT);
    if (tagObject) {
      for (let i = 0; i < tagObject.size; i++) tags.add(expectStringParam(tagObject, `Tag${i}`));
    }
    return new ActorLink(new Map(targets), tags);
  }

  toParameterIO(): ParameterIO {
    const pio = createParameterIO();
    pio.root.objects.set(nameHash(TARGETS_OBJECT), new Map(this.targets));
    if (this.tags.size > 0) {
      pio.root.objects.set(
        nameHash(TAGS_OBJECT),
        parameterObject([...this.tags].map((tag, i) => [`Tag${i}`, Param.string64(tag)] as const)),
      );
    }
    return pio;
  }

  toBinary(_endian: Endian): Uint8Array {
    return writeParameterIO(this.toParameterIO());
  }

  diff(other: ActorLink): ActorLink {
    return new ActorLink(diffParameterObject(this.targets, other.targets), this.tags.diff(other.tags));
  }

  merge(diff: ActorLink): ActorLink {
    return new ActorLink(mergeParameterObject(this.targets, diff.targets), this.tags.merge(diff.tags));
  }

  equals(other: ActorLink): boolean {
    return parameterObjectEquals(this.targets, other.targets) && this.tags.equals(other.tags);
  }
}
