import {
  Param,
  createParameterIO,
  expectIntParam,
  expectParameterObject,
  expectStringParam,
  nameHash,
  parameterObject,
  parseParameterIO,
  writeParameterIO,
  type Endian,
  type ParameterIO,
  type ParameterObject,
} from '@modmerge/core';
import type { DeleteMap } from '../collections/delete-map.js';
import { objectMap } from './parameter-object.js';
import type { Resource } from './resource.js';

const HEADER_OBJECT = 'Header';

function tableKey(index: number): string {
  return `Table${String(index).padStart(2, '0')}`;
}

/**
 * Actor drop table. `Header` names the tables (`Table01`, `Table02`, ...);
 * each named table is a root object and is replaced as a whole.
 */
export class DropTable implements Resource<DropTable> {
  readonly kind = 'DropTable' as const;
  static readonly pathPattern = /^Actor\/DropTable\/[^/]+\.bdrop$/;

  constructor(readonly tables: DeleteMap<string, ParameterObject> = objectMap([])) {}

  static fromBinary(data: Uint8Array): DropTable {
    return DropTable.fromParameterIO(parseParameterIO(data));
  }

  static fromParameterIO(pio: ParameterIO): DropTable {
    const header = expectParameterObject(pio.root, HEADER_OBJECT);
    const count = expectIntParam(header, 'TableNum');
    const tables: [string, ParameterObject][] = [];
    for (let i = 1; i <= count; i++) {
      const name = expectStringParam(header, tableKey(i));
      tables.push([name, new Map(expectParameterObject(pio.root, name))]);
    }
    return new DropTable(objectMap(tables));
  }

  toParameterIO(): ParameterIO {
    const pio = createParameterIO();
    const names = [...this.tables.keys()];
    pio.root.objects.set(
      nameHash(HEADER_OBJECT),
      parameterObject([
        ['TableNum', Param.int(names.length)],
        ...names.map((name, i) => [tableKey(i + 1), Param.string64(name)] as const),
      ]),
    );
    for (const [name, table] of this.tables) pio.root.objects.set(nameHash(name), new Map(table));
    return pio;
  }

  toBinary(_endian: Endian): Uint8Array {
    return writeParameterIO(this.toParameterIO());
  }

  diff(other: DropTable): DropTable {
    return new DropTable(this.tables.diff(other.tables));
  }

  merge(diff: DropTable): DropTable {
    return new DropTable(this.tables.merge(diff.tables));
  }

  equals(other: DropTable): boolean {
    return this.tables.equals(other.tables);
  }
}
