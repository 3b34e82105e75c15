/**
 * Binary tree (BYML) writer.
 *
 * Layout: header, hash key table, string table, then containers depth first
 * (each container followed by the containers and out-of-line values it
 * references). Keys and strings are sorted and hash members are written in
 * key order, so output depends only on the tree's content.
 */

import { BinaryWriter } from '../binary/binary-writer.js';
import type { Endian } from '../binary/endian.js';
import { ParseError } from '../errors.js';
import { NodeType } from './byml-parser.js';
import { DEFAULT_BYML_VERSION, type BymlDocument, type BymlNode } from './byml-types.js';

export function writeBymlDocument(doc: BymlDocument): Uint8Array {
  return writeByml(doc.root, doc.endian, doc.version);
}

export function writeByml(root: BymlNode, endian: Endian, version = DEFAULT_BYML_VERSION): Uint8Array {
  if (root.type !== 'hash' && root.type !== 'array' && root.type !== 'null') {
    throw new ParseError('TypeMismatch', `root node must be a hash or array, found ${root.type}`, { field: 'root' });
  }
  return new BymlWriter(endian).write(root, version);
}

function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

function nodeTypeByte(node: BymlNode): number {
  switch (node.type) {
    case 'null':
      return NodeType.Null;
    case 'bool':
      return NodeType.Bool;
    case 'int':
      return NodeType.Int;
    case 'uint':
      return NodeType.UInt;
    case 'float':
      return NodeType.Float;
    case 'double':
      return NodeType.Double;
    case 'int64':
      return NodeType.Int64;
    case 'uint64':
      return NodeType.UInt64;
    case 'string':
      return NodeType.String;
    case 'binary':
      return NodeType.Binary;
    case 'array':
      return NodeType.Array;
    case 'hash':
      return NodeType.Hash;
  }
}

function sortedMembers(members: ReadonlyMap<string, BymlNode>): [string, BymlNode][] {
  return [...members].sort(([a], [b]) => compareOrdinal(a, b));
}

class BymlWriter {
  private readonly writer: BinaryWriter;
  private readonly keyIndex = new Map<string, number>();
  private readonly stringIndex = new Map<string, number>();

  constructor(endian: Endian) {
    this.writer = new BinaryWriter(endian, 0x1000);
  }

  write(root: BymlNode, version: number): Uint8Array {
    const keys = new Set<string>();
    const strings = new Set<string>();
    collectStrings(root, keys, strings);
    const sortedKeys = [...keys].sort(compareOrdinal);
    const sortedStrings = [...strings].sort(compareOrdinal);
    sortedKeys.forEach((key, i) => this.keyIndex.set(key, i));
    sortedStrings.forEach((value, i) => this.stringIndex.set(value, i));

    const writer = this.writer;
    writer.magic(writer.endian === 'big' ? 'BY' : 'YB');
    writer.u16(version);
    writer.u32(0);
    writer.u32(0);
    writer.u32(0);

    if (sortedKeys.length > 0) {
      writer.setU32At(4, writer.position);
      this.writeStringTable(sortedKeys);
    }
    if (sortedStrings.length > 0) {
      writer.setU32At(8, writer.position);
      this.writeStringTable(sortedStrings);
    }
    if (root.type !== 'null') {
      writer.setU32At(12, this.writeNode(root));
    }
    return writer.toBytes();
  }

  private writeStringTable(values: readonly string[]): void {
    const writer = this.writer;
    const start = writer.position;
    writer.u8(NodeType.StringTable);
    writer.u24(values.length);
    const offsetsStart = writer.position;
    for (let i = 0; i <= values.length; i++) writer.u32(0);
    values.forEach((value, i) => {
      writer.setU32At(offsetsStart + i * 4, writer.position - start);
      writer.cstring(value);
    });
    writer.setU32At(offsetsStart + values.length * 4, writer.position - start);
    writer.align(4);
  }

  /** Write an out-of-line node and return its offset. */
  private writeNode(node: BymlNode): number {
    const writer = this.writer;
    writer.align(4);
    const offset = writer.position;
    switch (node.type) {
      case 'array':
        this.writeArray(node.value);
        break;
      case 'hash':
        this.writeHash(node.value);
        break;
      case 'binary':
        writer.u32(node.value.byteLength);
        writer.writeBytes(node.value);
        writer.align(4);
        break;
      case 'int64':
        writer.i64(node.value);
        break;
      case 'uint64':
        writer.u64(node.value);
        break;
      case 'double':
        writer.f64(node.value);
        break;
      default:
        throw new ParseError('TypeMismatch', `${node.type} nodes are stored inline`, { field: 'node type' });
    }
    return offset;
  }

  private writeArray(items: readonly BymlNode[]): void {
    const writer = this.writer;
    writer.u8(NodeType.Array);
    writer.u24(items.length);
    for (const item of items) writer.u8(nodeTypeByte(item));
    writer.align(4);
    const valuesStart = writer.position;
    const deferred = items.map((item, i) => this.writeInline(item, valuesStart + i * 4));
    this.writeDeferred(deferred);
  }

  private writeHash(members: ReadonlyMap<string, BymlNode>): void {
    const writer = this.writer;
    writer.u8(NodeType.Hash);
    writer.u24(members.size);
    const deferred: (Deferred | undefined)[] = [];
    for (const [key, item] of sortedMembers(members)) {
      writer.u24(this.keyIndex.get(key) ?? 0);
      writer.u8(nodeTypeByte(item));
      deferred.push(this.writeInline(item, writer.position));
    }
    this.writeDeferred(deferred);
  }

  /** Write the 4-byte value slot; nodes stored out of line are returned for later. */
  private writeInline(node: BymlNode, slot: number): Deferred | undefined {
    const writer = this.writer;
    switch (node.type) {
      case 'null':
        writer.u32(0);
        return undefined;
      case 'bool':
        writer.u32(node.value ? 1 : 0);
        return undefined;
      case 'int':
        writer.i32(node.value);
        return undefined;
      case 'uint':
        writer.u32(node.value);
        return undefined;
      case 'float':
        writer.f32(node.value);
        return undefined;
      case 'string':
        writer.u32(this.stringIndex.get(node.value) ?? 0);
        return undefined;
      default:
        writer.u32(0);
        return { slot, node };
    }
  }

  private writeDeferred(deferred: readonly (Deferred | undefined)[]): void {
    for (const entry of deferred) {
      if (entry === undefined) continue;
      const offset = this.writeNode(entry.node);
      this.writer.setU32At(entry.slot, offset);
    }
  }
}

interface Deferred {
  slot: number;
  node: BymlNode;
}

function collectStrings(node: BymlNode, keys: Set<string>, strings: Set<string>): void {
  switch (node.type) {
    case 'string':
      strings.add(node.value);
      return;
    case 'array':
      for (const item of node.value) collectStrings(item, keys, strings);
      return;
    case 'hash':
      for (const [key, item] of node.value) {
        keys.add(key);
        collectStrings(item, keys, strings);
      }
      return;
    default:
      return;
  }
}
