/**
 * Parameter archive (AAMP) writer.
 *
 * Output layout: header, data type string, every list (breadth first, the
 * children of one list contiguous), every object, every parameter, the data
 * section, then the string section. Parsing the output and writing it again
 * yields identical bytes.
 */

import { BinaryWriter } from '../binary/binary-writer.js';
import { ResourceError } from '../errors.js';
import { AAMP_HEADER_SIZE, AAMP_MAGIC, AAMP_VERSION } from './aamp-parser.js';
import {
  PARAMETER_TYPES,
  ROOT_LIST_NAME,
  nameHash,
  numericValues,
  type Parameter,
  type ParameterIO,
  type ParameterList,
  type ParameterObject,
} from './parameter-types.js';

const LIST_SIZE = 12;
const OBJECT_SIZE = 8;
const PARAM_SIZE = 8;
const FLAGS_LITTLE_ENDIAN_UTF8 = 3;
const MAX_U16 = 0xffff;
const MAX_U24 = 0xffffff;

interface ListEntry {
  hash: number;
  list: ParameterList;
  firstChild: number;
  firstObject: number;
}

interface ObjectEntry {
  hash: number;
  obj: ParameterObject;
  firstParam: number;
}

interface ParamEntry {
  hash: number;
  param: Parameter;
}

function isStringParameter(param: Parameter): boolean {
  return (
    param.type === 'string32' || param.type === 'string64' || param.type === 'string256' || param.type === 'stringRef'
  );
}

function isBufferParameter(param: Parameter): boolean {
  return (
    param.type === 'bufferInt' ||
    param.type === 'bufferF32' ||
    param.type === 'bufferU32' ||
    param.type === 'bufferBinary'
  );
}

/** Distance from `self` to `target` in 4-byte units, as stored in a field of `max` units. */
function relativeOffset(target: number, self: number, max: number, field: string): number {
  const units = (target - self) / 4;
  if (units > max) {
    throw new ResourceError(`parameter archive too large: ${field} needs ${units * 4} bytes, at most ${max * 4} fit`);
  }
  return units;
}

function count(size: number, field: string): number {
  if (size > MAX_U16) throw new ResourceError(`parameter archive too large: ${size} entries in ${field}`);
  return size;
}

/** @throws ResourceError when an offset or count does not fit its field. */
export function writeParameterIO(pio: ParameterIO): Uint8Array {
  /* --- Flatten the tree ------------------------------------------- */

  const lists: ListEntry[] = [{ hash: nameHash(ROOT_LIST_NAME), list: pio.root, firstChild: 0, firstObject: 0 }];
  for (let i = 0; i < lists.length; i++) {
    const entry = lists[i];
    if (entry === undefined) break;
    entry.firstChild = lists.length;
    for (const [hash, list] of entry.list.lists) {
      lists.push({ hash, list, firstChild: 0, firstObject: 0 });
    }
  }

  const objects: ObjectEntry[] = [];
  for (const entry of lists) {
    entry.firstObject = objects.length;
    for (const [hash, obj] of entry.list.objects) {
      objects.push({ hash, obj, firstParam: 0 });
    }
  }

  const params: ParamEntry[] = [];
  for (const entry of objects) {
    entry.firstParam = params.length;
    for (const [hash, param] of entry.obj) {
      params.push({ hash, param });
    }
  }

  /* --- Header and data type --------------------------------------- */

  const writer = new BinaryWriter('little', 0x400);
  writer.magic(AAMP_MAGIC);
  writer.u32(AAMP_VERSION);
  writer.u32(FLAGS_LITTLE_ENDIAN_UTF8);
  writer.u32(0); // file size
  writer.u32(pio.version);
  writer.u32(0); // root list offset
  writer.u32(lists.length);
  writer.u32(objects.length);
  writer.u32(params.length);
  writer.u32(0); // data section size
  writer.u32(0); // string section size
  writer.u32(0); // unknown section size
  writer.cstring(pio.dataType);
  writer.align(4);

  const listsStart = writer.position;
  const objectsStart = listsStart + lists.length * LIST_SIZE;
  const paramsStart = objectsStart + objects.length * OBJECT_SIZE;
  writer.setU32At(0x14, listsStart - AAMP_HEADER_SIZE);

  /* --- Structures ------------------------------------------------- */

  for (let i = 0; i < lists.length; i++) {
    const entry = lists[i];
    if (entry === undefined) continue;
    const self = listsStart + i * LIST_SIZE;
    const childCount = count(entry.list.lists.size, 'child lists');
    const objectCount = count(entry.list.objects.size, 'objects');
    writer.u32(entry.hash);
    writer.u16(
      childCount === 0 ? 0 : relativeOffset(listsStart + entry.firstChild * LIST_SIZE, self, MAX_U16, 'child list offset'),
    );
    writer.u16(childCount);
    writer.u16(
      objectCount === 0 ? 0 : relativeOffset(objectsStart + entry.firstObject * OBJECT_SIZE, self, MAX_U16, 'object offset'),
    );
    writer.u16(objectCount);
  }

  for (let i = 0; i < objects.length; i++) {
    const entry = objects[i];
    if (entry === undefined) continue;
    const self = objectsStart + i * OBJECT_SIZE;
    const paramCount = count(entry.obj.size, 'parameters');
    writer.u32(entry.hash);
    writer.u16(
      paramCount === 0 ? 0 : relativeOffset(paramsStart + entry.firstParam * PARAM_SIZE, self, MAX_U16, 'parameter offset'),
    );
    writer.u16(paramCount);
  }

  for (const entry of params) {
    writer.u32(entry.hash);
    writer.u24(0); // data offset
    writer.u8(PARAMETER_TYPES.indexOf(entry.param.type));
  }

  /* --- Data and string sections ----------------------------------- */

  const patchDataOffset = (index: number, dataOffset: number): void => {
    const self = paramsStart + index * PARAM_SIZE;
    writer.setU24At(self + 4, relativeOffset(dataOffset, self, MAX_U24, 'parameter data offset'));
  };

  const dataStart = writer.position;
  params.forEach((entry, index) => {
    if (isStringParameter(entry.param)) return;
    writer.align(4);
    if (isBufferParameter(entry.param)) {
      writer.u32(bufferLength(entry.param));
    }
    patchDataOffset(index, writer.position);
    writeValue(writer, entry.param);
  });
  writer.align(4);

  const stringStart = writer.position;
  params.forEach((entry, index) => {
    if (!isStringParameter(entry.param)) return;
    writer.align(4);
    patchDataOffset(index, writer.position);
    writeValue(writer, entry.param);
  });
  writer.align(4);

  const end = writer.position;
  writer.setU32At(0x0c, end);
  writer.setU32At(0x24, stringStart - dataStart);
  writer.setU32At(0x28, end - stringStart);
  return writer.toBytes();
}

function bufferLength(param: Parameter): number {
  if (param.type === 'bufferBinary') return param.value.byteLength;
  return numericValues(param)?.length ?? 0;
}

function writeValue(writer: BinaryWriter, param: Parameter): void {
  switch (param.type) {
    case 'bool':
      writer.u32(param.value ? 1 : 0);
      return;
    case 'f32':
      writer.f32(param.value);
      return;
    case 'int':
      writer.i32(param.value);
      return;
    case 'u32':
      writer.u32(param.value);
      return;
    case 'vec2':
    case 'vec3':
    case 'vec4':
    case 'color':
    case 'quat':
    case 'bufferF32':
      for (const v of param.value) writer.f32(v);
      return;
    case 'bufferInt':
      for (const v of param.value) writer.i32(v);
      return;
    case 'bufferU32':
      for (const v of param.value) writer.u32(v);
      return;
    case 'bufferBinary':
      writer.writeBytes(param.value);
      return;
    case 'string32':
    case 'string64':
    case 'string256':
    case 'stringRef':
      writer.cstring(param.value);
      return;
    case 'curve1':
    case 'curve2':
    case 'curve3':
    case 'curve4':
      for (const curve of param.value) {
        writer.u32(curve.a);
        writer.u32(curve.b);
        for (const v of curve.floats) writer.f32(v);
      }
      return;
  }
}
