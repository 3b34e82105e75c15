import {
  createParameterIO,
  parseParameterIO,
  writeParameterIO,
  type Endian,
  type Parameter,
  type ParameterIO,
} from '@modmerge/core';
import { DeleteMap } from '../collections/delete-map.js';
import { mergeableEquals } from '../collections/mergeable.js';
import { parameterMap } from './parameter-object.js';
import type { Resource } from './resource.js';

export type ParameterGroups = DeleteMap<number, DeleteMap<number, Parameter>>;

export function parameterGroups(entries: Iterable<readonly [number, DeleteMap<number, Parameter>]> = []): ParameterGroups {
  return new DeleteMap(entries, mergeableEquals);
}

/** Actor general parameters: root objects keyed by name hash, diffed parameter by parameter. */
export class GeneralParamList implements Resource<GeneralParamList> {
  readonly kind = 'GeneralParamList' as const;
  static readonly pathPattern = /^Actor\/GeneralParamList\/[^/]+\.bgparamlist$/;

  constructor(readonly objects: ParameterGroups = parameterGroups()) {}

  static fromBinary(data: Uint8Array): GeneralParamList {
    return GeneralParamList.fromParameterIO(parseParameterIO(data));
  }

  static fromParameterIO(pio: ParameterIO): GeneralParamList {
    return new GeneralParamList(
      parameterGroups([...pio.root.objects].map(([hash, obj]) => [hash, parameterMap(obj)] as const)),
    );
  }

  toParameterIO(): ParameterIO {
    const pio = createParameterIO();
    for (const [hash, params] of this.objects) pio.root.objects.set(hash, params.toMap());
    return pio;
  }

  toBinary(_endian: Endian): Uint8Array {
    return writeParameterIO(this.toParameterIO());
  }

  diff(other: GeneralParamList): GeneralParamList {
    return new GeneralParamList(this.objects.deepDiff(other.objects));
  }

  merge(diff: GeneralParamList): GeneralParamList {
    return new GeneralParamList(this.objects.deepMerge(diff.objects));
  }

  equals(other: GeneralParamList): boolean {
    return this.objects.equals(other.objects);
  }
}
