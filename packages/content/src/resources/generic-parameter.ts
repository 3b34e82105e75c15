import {
  createParameterList,
  parseParameterIO,
  writeParameterIO,
  type Endian,
  type Parameter,
  type ParameterIO,
  type ParameterList,
} from '@modmerge/core';
import { DeleteMap } from '../collections/delete-map.js';
import { mergeableEquals, type Mergeable } from '../collections/mergeable.js';
import { parameterGroups, type ParameterGroups } from './general-param-list.js';
import { parameterMap } from './parameter-object.js';
import type { Resource } from './resource.js';

/** A parameter list as nested delete-aware maps of objects and child lists. */
export class ParameterTree implements Mergeable<ParameterTree> {
  constructor(
    readonly objects: ParameterGroups = parameterGroups(),
    readonly lists: DeleteMap<number, ParameterTree> = new DeleteMap<number, ParameterTree>(undefined, mergeableEquals),
  ) {}

  static fromList(list: ParameterList): ParameterTree {
    return new ParameterTree(
      parameterGroups([...list.objects].map(([hash, obj]) => [hash, parameterMap(obj)] as const)),
      new DeleteMap(
        [...list.lists].map(([hash, child]) => [hash, ParameterTree.fromList(child)] as const),
        mergeableEquals,
      ),
    );
  }

  toList(): ParameterList {
    const list = createParameterList();
    for (const [hash, params] of this.objects) list.objects.set(hash, params.toMap());
    for (const [hash, child] of this.lists) list.lists.set(hash, child.toList());
    return list;
  }

  diff(other: ParameterTree): ParameterTree {
    return new ParameterTree(this.objects.deepDiff(other.objects), this.lists.deepDiff(other.lists));
  }

  merge(diff: ParameterTree): ParameterTree {
    return new ParameterTree(this.objects.deepMerge(diff.objects), this.lists.deepMerge(diff.lists));
  }

  equals(other: ParameterTree): boolean {
    return this.objects.equals(other.objects) && this.lists.equals(other.lists);
  }
}

/**
 * Any parameter archive without a dedicated schema. The whole tree is diffed
 * structurally; the header's version and data type are taken from the newer
 * side.
 */
export class GenericParameter implements Resource<GenericParameter> {
  readonly kind = 'GenericParameter' as const;

  constructor(
    readonly root: ParameterTree,
    readonly dataType = 'xml',
    readonly version = 0,
  ) {}

  static fromBinary(data: Uint8Array): GenericParameter {
    return GenericParameter.fromParameterIO(parseParameterIO(data));
  }

  static fromParameterIO(pio: ParameterIO): GenericParameter {
    return new GenericParameter(ParameterTree.fromList(pio.root), pio.dataType, pio.version);
  }

  toParameterIO(): ParameterIO {
    return { version: this.version, dataType: this.dataType, root: this.root.toList() };
  }

  toBinary(_endian: Endian): Uint8Array {
    return writeParameterIO(this.toParameterIO());
  }

  diff(other: GenericParameter): GenericParameter {
    return new GenericParameter(this.root.diff(other.root), other.dataType, other.version);
  }

  merge(diff: GenericParameter): GenericParameter {
    return new GenericParameter(this.root.merge(diff.root), diff.dataType, diff.version);
  }

  equals(other: GenericParameter): boolean {
    return this.dataType === other.dataType && this.version === other.version && this.root.equals(other.root);
  }
}
