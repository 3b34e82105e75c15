/**
 * Binary tree (BYML) reader, versions 2 to 4.
 *
 * Header (0x10 bytes):
 *   [0..1]   "BY" (big endian) or "YB" (little endian)
 *   [2..3]   version
 *   [4..7]   hash key table offset (0 when absent)
 *   [8..11]  string table offset (0 when absent)
 *   [12..15] root node offset (0 for an empty document)
 *
 * Containers start with a type byte and a u24 entry count. Hash entries are
 * (u24 key index, u8 type, u32 value); arrays list all type bytes, pad to 4,
 * then the values. Strings are indices into the string table; containers,
 * binary blobs and 64-bit scalars are offsets from the start of the file.
 */

import { BinaryReader } from '../binary/binary-reader.js';
import { readMagic, type Endian } from '../binary/endian.js';
import { ParseError } from '../errors.js';
import type { BymlDocument, BymlNode } from './byml-types.js';

export const BYML_HEADER_SIZE = 0x10;

export const NodeType = {
  String: 0xa0,
  Binary: 0xa1,
  Array: 0xc0,
  Hash: 0xc1,
  StringTable: 0xc2,
  Bool: 0xd0,
  Int: 0xd1,
  Float: 0xd2,
  UInt: 0xd3,
  Int64: 0xd4,
  UInt64: 0xd5,
  Double: 0xd6,
  Null: 0xff,
} as const;

/** Byte order declared by the magic, or undefined when the bytes are not BYML. */
export function detectBymlEndian(data: Uint8Array): Endian | undefined {
  const magic = readMagic(data, 2);
  if (magic === 'BY') return 'big';
  if (magic === 'YB') return 'little';
  return undefined;
}

export function isByml(data: Uint8Array): boolean {
  return detectBymlEndian(data) !== undefined;
}

export function parseByml(data: Uint8Array): BymlDocument {
  const endian = detectBymlEndian(data);
  if (endian === undefined) {
    throw new ParseError('BadMagic', `expected "BY" or "YB", found "${readMagic(data, 2)}"`, {
      field: 'byml header',
      offset: 0,
    });
  }
  return new BymlParser(data, endian).parse();
}

class BymlParser {
  private readonly reader: BinaryReader;
  private keys: string[] = [];
  private strings: string[] = [];

  constructor(
    data: Uint8Array,
    private readonly endian: Endian,
  ) {
    this.reader = new BinaryReader(data, endian);
  }

  parse(): BymlDocument {
    const reader = this.reader;
    reader.seek(2);
    const version = reader.u16('version');
    const keyTableOffset = reader.u32('hash key table offset');
    const stringTableOffset = reader.u32('string table offset');
    const rootOffset = reader.u32('root offset');

    this.keys = keyTableOffset === 0 ? [] : this.readStringTable(keyTableOffset, 'hash key table');
    this.strings = stringTableOffset === 0 ? [] : this.readStringTable(stringTableOffset, 'string table');

    const root: BymlNode = rootOffset === 0 ? { type: 'null' } : this.readContainer(rootOffset);
    return { version, endian: this.endian, root };
  }

  /* ------------------------------------------------------------------ */
  /*  Tables and containers                                              */
  /* ------------------------------------------------------------------ */

  private readStringTable(offset: number, field: string): string[] {
    const reader = this.reader;
    reader.seek(offset, field);
    const type = reader.u8(field);
    if (type !== NodeType.StringTable) {
      throw new ParseError('TypeMismatch', `expected string table node, found 0x${type.toString(16)}`, {
        field,
        offset,
      });
    }
    const count = reader.u24(field);
    const offsets: number[] = [];
    for (let i = 0; i < count; i++) offsets.push(reader.u32(field));
    return offsets.map((rel) => reader.cstringAt(offset + rel, field));
  }

  private readContainer(offset: number): BymlNode {
    const reader = this.reader;
    reader.seek(offset, 'container');
    const type = reader.u8('container type');
    const count = reader.u24('container size');

    if (type === NodeType.Array) {
      const types: number[] = [];
      for (let i = 0; i < count; i++) types.push(reader.u8('array item type'));
      reader.seek(offset + 4 + align4(count), 'array values');
      const items: BymlNode[] = [];
      for (let i = 0; i < count; i++) {
        const valueOffset = offset + 4 + align4(count) + i * 4;
        items.push(this.readValue(types[i] ?? NodeType.Null, valueOffset));
      }
      return { type: 'array', value: items };
    }

    if (type === NodeType.Hash) {
      const members = new Map<string, BymlNode>();
      for (let i = 0; i < count; i++) {
        const entryOffset = offset + 4 + i * 8;
        reader.seek(entryOffset, 'hash entry');
        const keyIndex = reader.u24('hash key index');
        const valueType = reader.u8('hash value type');
        const key = this.keys[keyIndex];
        if (key === undefined) {
          throw new ParseError('TypeMismatch', `hash key index ${keyIndex} out of range`, {
            field: 'hash key index',
            offset: entryOffset,
          });
        }
        members.set(key, this.readValue(valueType, entryOffset + 4));
      }
      return { type: 'hash', value: members };
    }

    throw new ParseError('TypeMismatch', `expected array or hash node, found 0x${type.toString(16)}`, {
      field: 'container type',
      offset,
    });
  }

  /* ------------------------------------------------------------------ */
  /*  Values                                                             */
  /* ------------------------------------------------------------------ */

  private readValue(type: number, valueOffset: number): BymlNode {
    const reader = this.reader;
    reader.seek(valueOffset, 'value');

    switch (type) {
      case NodeType.Null:
        reader.u32('null');
        return { type: 'null' };
      case NodeType.Bool:
        return { type: 'bool', value: reader.u32('bool') !== 0 };
      case NodeType.Int:
        return { type: 'int', value: reader.i32('int') };
      case NodeType.UInt:
        return { type: 'uint', value: reader.u32('uint') };
      case NodeType.Float:
        return { type: 'float', value: reader.f32('float') };
      case NodeType.String: {
        const index = reader.u32('string index');
        const value = this.strings[index];
        if (value === undefined) {
          throw new ParseError('TypeMismatch', `string index ${index} out of range`, {
            field: 'string index',
            offset: valueOffset,
          });
        }
        return { type: 'string', value };
      }
      case NodeType.Binary: {
        reader.seek(reader.u32('binary offset'), 'binary');
        const size = reader.u32('binary size');
        return { type: 'binary', value: reader.readBytes(size, 'binary') };
      }
      case NodeType.Int64:
        reader.seek(reader.u32('int64 offset'), 'int64');
        return { type: 'int64', value: reader.i64('int64') };
      case NodeType.UInt64:
        reader.seek(reader.u32('uint64 offset'), 'uint64');
        return { type: 'uint64', value: reader.u64('uint64') };
      case NodeType.Double:
        reader.seek(reader.u32('double offset'), 'double');
        return { type: 'double', value: reader.f64('double') };
      case NodeType.Array:
      case NodeType.Hash:
        return this.readContainer(reader.u32('container offset'));
      default:
        throw new ParseError('TypeMismatch', `unknown node type 0x${type.toString(16)}`, {
          field: 'node type',
          offset: valueOffset,
        });
    }
  }
}

export function align4(value: number): number {
  return (value + 3) & ~3;
}
