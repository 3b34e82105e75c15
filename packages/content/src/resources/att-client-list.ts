import {
  Param,
  createParameterIO,
  createParameterList,
  expectParameterList,
  expectParameterObject,
  expectStringParam,
  nameHash,
  parameterObject,
  parameterObjectEquals,
  parseParameterIO,
  writeParameterIO,
  type Endian,
  type ParameterIO,
  type ParameterObject,
} from '@modmerge/core';
import { DeleteMap } from '../collections/delete-map.js';
import { diffParameterObject, mergeParameterObject } from './parameter-object.js';
import type { Resource } from './resource.js';

/**
 * Attention client list: the interaction clients attached to an actor,
 * keyed by client name, plus the shared `AttPos` parameters.
 */
export class AttClientList implements Resource<AttClientList> {
  readonly kind = 'AttClientList' as const;
  static readonly pathPattern = /^Actor\/AttClientList\/[^/]+\.batcllist$/;

  constructor(
    readonly attPos: ParameterObject,
    /** Client name to attention client file name. */
    readonly clients: DeleteMap<string, string> = new DeleteMap(),
  ) {}

  static fromBinary(data: Uint8Array): AttClientList {
    return AttClientList.fromParameterIO(parseParameterIO(data));
  }

  static fromParameterIO(pio: ParameterIO): AttClientList {
    const attPos = expectParameterObject(pio.root, 'AttPos');
    const clients = new DeleteMap<string, string>();
    for (const obj of expectParameterList(pio.root, 'AttClients').objects.values()) {
      clients.set(expectStringParam(obj, 'Name'), expectStringParam(obj, 'FileName'));
    }
    return new AttClientList(new Map(attPos), clients);
  }

  toParameterIO(): ParameterIO {
    const pio = createParameterIO();
    pio.root.objects.set(nameHash('AttPos'), new Map(this.attPos));
    const list = createParameterList();
    let index = 0;
    for (const [name, fileName] of this.clients) {
      list.objects.set(
        nameHash(`AttClient_${index++}`),
        parameterObject([
          ['Name', Param.string64(name)],
          ['FileName', Param.string64(fileName)],
        ]),
      );
    }
    pio.root.lists.set(nameHash('AttClients'), list);
    return pio;
  }

  toBinary(_endian: Endian): Uint8Array {
    return writeParameterIO(this.toParameterIO());
  }

  diff(other: AttClientList): AttClientList {
    return new AttClientList(diffParameterObject(this.attPos, other.attPos), this.clients.diff(other.clients));
  }

  merge(diff: AttClientList): AttClientList {
    return new AttClientList(mergeParameterObject(this.attPos, diff.attPos), this.clients.merge(diff.clients));
  }

  equals(other: AttClientList): boolean {
    return parameterObjectEquals(this.attPos, other.attPos) && this.clients.equals(other.clients);
  }
}
