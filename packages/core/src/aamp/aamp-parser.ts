/**
 * Parameter archive (AAMP) reader.
 *
 * Layout (version 2, always little-endian):
 *   Header (0x30 bytes): magic, version, flags, file size, pio version,
 *     root list offset (relative to 0x30), list/object/parameter counts,
 *     data/string/unknown section sizes.
 *   Data type string, then the root list.
 *
 *   List (12 bytes):   name crc, u16 child list offset, u16 list count,
 *                      u16 object offset, u16 object count
 *   Object (8 bytes):  name crc, u16 parameter offset, u16 parameter count
 *   Param (8 bytes):   name crc, u24 data offset, u8 type id
 *
 * Relative offsets are in units of 4 bytes from the start of the owning struct.
 */

import { BinaryReader } from '../binary/binary-reader.js';
import { hasMagic, readMagic } from '../binary/endian.js';
import { ParseError } from '../errors.js';
import {
  CURVE_COUNTS,
  CURVE_FLOAT_COUNT,
  PARAMETER_TYPES,
  VECTOR_LENGTHS,
  type Curve,
  type Parameter,
  type ParameterIO,
  type ParameterList,
  type ParameterObject,
} from './parameter-types.js';

export const AAMP_MAGIC = 'AAMP';
export const AAMP_VERSION = 2;
export const AAMP_HEADER_SIZE = 0x30;

const FLAG_LITTLE_ENDIAN = 1;

export function isParameterIO(data: Uint8Array): boolean {
  return hasMagic(data, AAMP_MAGIC);
}

export function parseParameterIO(data: Uint8Array): ParameterIO {
  if (!isParameterIO(data)) {
    throw new ParseError('BadMagic', `expected "${AAMP_MAGIC}", found "${readMagic(data, 4)}"`, {
      field: 'aamp header',
      offset: 0,
    });
  }

  const reader = new BinaryReader(data, 'little');
  reader.seek(4);
  const version = reader.u32('version');
  if (version !== AAMP_VERSION) {
    throw new ParseError('BadMagic', `unsupported parameter archive version ${version}`, {
      field: 'version',
      offset: 4,
    });
  }
  const flags = reader.u32('flags');
  if ((flags & FLAG_LITTLE_ENDIAN) === 0) {
    throw new ParseError('BadMagic', 'big-endian parameter archives are not supported', {
      field: 'flags',
      offset: 8,
    });
  }
  reader.u32('file size');
  const pioVersion = reader.u32('pio version');
  const rootOffset = reader.u32('root list offset');
  reader.skip(AAMP_HEADER_SIZE - reader.position, 'header');

  const dataType = reader.cstringAt(AAMP_HEADER_SIZE, 'data type');
  const root = readList(reader, AAMP_HEADER_SIZE + rootOffset, new Set());

  return { version: pioVersion, dataType, root };
}

/* ------------------------------------------------------------------ */
/*  Structures                                                         */
/* ------------------------------------------------------------------ */

/** `ancestors` holds the offsets of the lists being read above this one. */
function readList(reader: BinaryReader, offset: number, ancestors: Set<number>): ParameterList {
  if (ancestors.has(offset)) {
    throw new ParseError('TypeMismatch', 'parameter list contains itself', { field: 'child list offset', offset });
  }
  ancestors.add(offset);
  reader.seek(offset, 'parameter list');
  reader.u32('list name');
  const listsOffset = offset + reader.u16('child list offset') * 4;
  const listCount = reader.u16('child list count');
  const objectsOffset = offset + reader.u16('object offset') * 4;
  const objectCount = reader.u16('object count');

  const lists = new Map<number, ParameterList>();
  for (let i = 0; i < listCount; i++) {
    const childOffset = listsOffset + i * 12;
    reader.seek(childOffset, 'parameter list');
    const hash = reader.u32('list name');
    lists.set(hash, readList(reader, childOffset, ancestors));
  }

  const objects = new Map<number, ParameterObject>();
  for (let i = 0; i < objectCount; i++) {
    const objOffset = objectsOffset + i * 8;
    reader.seek(objOffset, 'parameter object');
    const hash = reader.u32('object name');
    objects.set(hash, readObject(reader, objOffset));
  }

  ancestors.delete(offset);
  return { objects, lists };
}

function readObject(reader: BinaryReader, offset: number): ParameterObject {
  reader.seek(offset + 4, 'parameter object');
  const paramsOffset = offset + reader.u16('parameter offset') * 4;
  const paramCount = reader.u16('parameter count');

  const obj: ParameterObject = new Map();
  for (let i = 0; i < paramCount; i++) {
    const paramOffset = paramsOffset + i * 8;
    reader.seek(paramOffset, 'parameter');
    const hash = reader.u32('parameter name');
    const dataOffset = paramOffset + reader.u24('parameter data offset') * 4;
    const typeId = reader.u8('parameter type');
    obj.set(hash, readValue(reader, typeId, dataOffset, paramOffset));
  }
  return obj;
}

/* ------------------------------------------------------------------ */
/*  Values                                                             */
/* ------------------------------------------------------------------ */

function readFloats(reader: BinaryReader, count: number, field: string): number[] {
  const values: number[] = [];
  for (let i = 0; i < count; i++) values.push(reader.f32(field));
  return values;
}

function bufferCount(reader: BinaryReader, dataOffset: number): number {
  reader.seek(dataOffset - 4, 'buffer size');
  return reader.u32('buffer size');
}

function readValue(reader: BinaryReader, typeId: number, dataOffset: number, paramOffset: number): Parameter {
  const type = PARAMETER_TYPES[typeId];
  if (type === undefined) {
    throw new ParseError('TypeMismatch', `unknown parameter type id ${typeId}`, {
      field: 'parameter type',
      offset: paramOffset + 7,
    });
  }

  switch (type) {
    case 'bool':
      reader.seek(dataOffset, 'bool');
      return { type, value: reader.u32('bool') !== 0 };
    case 'f32':
      reader.seek(dataOffset, 'f32');
      return { type, value: reader.f32('f32') };
    case 'int':
      reader.seek(dataOffset, 'int');
      return { type, value: reader.i32('int') };
    case 'u32':
      reader.seek(dataOffset, 'u32');
      return { type, value: reader.u32('u32') };
    case 'vec2':
    case 'vec3':
    case 'vec4':
    case 'color':
    case 'quat':
      reader.seek(dataOffset, type);
      return { type, value: readFloats(reader, VECTOR_LENGTHS[type], type) };
    case 'string32':
    case 'string64':
    case 'string256':
    case 'stringRef':
      return { type, value: reader.cstringAt(dataOffset, type) };
    case 'curve1':
    case 'curve2':
    case 'curve3':
    case 'curve4': {
      reader.seek(dataOffset, type);
      const curves: Curve[] = [];
      for (let i = 0; i < CURVE_COUNTS[type]; i++) {
        const a = reader.u32('curve header');
        const b = reader.u32('curve header');
        curves.push({ a, b, floats: readFloats(reader, CURVE_FLOAT_COUNT, 'curve') });
      }
      return { type, value: curves };
    }
    case 'bufferInt': {
      const count = bufferCount(reader, dataOffset);
      const values: number[] = [];
      for (let i = 0; i < count; i++) values.push(reader.i32(type));
      return { type, value: values };
    }
    case 'bufferF32': {
      const count = bufferCount(reader, dataOffset);
      return { type, value: readFloats(reader, count, type) };
    }
    case 'bufferU32': {
      const count = bufferCount(reader, dataOffset);
      const values: number[] = [];
      for (let i = 0; i < count; i++) values.push(reader.u32(type));
      return { type, value: values };
    }
    case 'bufferBinary': {
      const count = bufferCount(reader, dataOffset);
      return { type, value: reader.readBytes(count, type) };
    }
  }
}
