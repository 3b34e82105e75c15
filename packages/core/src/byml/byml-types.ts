/**
 * In-memory model of the binary tree format (BYML).
 */

import type { Endian } from '../binary/endian.js';
import { ParseError } from '../errors.js';

export type BymlNode =
  | { readonly type: 'null' }
  | { readonly type: 'bool'; readonly value: boolean }
  | { readonly type: 'int' | 'uint' | 'float' | 'double'; readonly value: number }
  | { readonly type: 'int64' | 'uint64'; readonly value: bigint }
  | { readonly type: 'string'; readonly value: string }
  | { readonly type: 'binary'; readonly value: Uint8Array }
  | { readonly type: 'array'; readonly value: readonly BymlNode[] }
  | { readonly type: 'hash'; readonly value: ReadonlyMap<string, BymlNode> };

export type BymlType = BymlNode['type'];
export type BymlHash = ReadonlyMap<string, BymlNode>;

export interface BymlDocument {
  version: number;
  endian: Endian;
  root: BymlNode;
}

export const DEFAULT_BYML_VERSION = 2;

/* ------------------------------------------------------------------ */
/*  Constructors                                                       */
/* ------------------------------------------------------------------ */

const NULL_NODE: BymlNode = { type: 'null' };

export const Byml = {
  null: (): BymlNode => NULL_NODE,
  bool: (value: boolean): BymlNode => ({ type: 'bool', value }),
  int: (value: number): BymlNode => ({ type: 'int', value: value | 0 }),
  uint: (value: number): BymlNode => ({ type: 'uint', value: value >>> 0 }),
  float: (value: number): BymlNode => ({ type: 'float', value: Math.fround(value) }),
  double: (value: number): BymlNode => ({ type: 'double', value }),
  int64: (value: bigint): BymlNode => ({ type: 'int64', value: BigInt.asIntN(64, value) }),
  uint64: (value: bigint): BymlNode => ({ type: 'uint64', value: BigInt.asUintN(64, value) }),
  string: (value: string): BymlNode => ({ type: 'string', value }),
  binary: (value: Uint8Array): BymlNode => ({ type: 'binary', value }),
  array: (items: Iterable<BymlNode>): BymlNode => ({ type: 'array', value: [...items] }),
  hash: (entries: Iterable<readonly [string, BymlNode]>): BymlNode => ({ type: 'hash', value: new Map(entries) }),
  record: (members: Readonly<Record<string, BymlNode>>): BymlNode => ({
    type: 'hash',
    value: new Map(Object.entries(members)),
  }),
} as const;

/* ------------------------------------------------------------------ */
/*  Equality                                                           */
/* ------------------------------------------------------------------ */

/** Structural equality; hash members compare regardless of order. */
export function bymlEquals(a: BymlNode, b: BymlNode): boolean {
  if (a === b) return true;
  switch (a.type) {
    case 'null':
      return b.type === 'null';
    case 'bool':
      return b.type === 'bool' && a.value === b.value;
    case 'int':
    case 'uint':
    case 'float':
    case 'double':
      return b.type === a.type && 'value' in b && Object.is(a.value, b.value);
    case 'int64':
    case 'uint64':
      return b.type === a.type && 'value' in b && a.value === b.value;
    case 'string':
      return b.type === 'string' && a.value === b.value;
    case 'binary': {
      if (b.type !== 'binary' || a.value.byteLength !== b.value.byteLength) return false;
      const other = b.value;
      return a.value.every((byte, i) => byte === other[i]);
    }
    case 'array': {
      if (b.type !== 'array' || a.value.length !== b.value.length) return false;
      const other = b.value;
      return a.value.every((item, i) => {
        const rhs = other[i];
        return rhs !== undefined && bymlEquals(item, rhs);
      });
    }
    case 'hash': {
      if (b.type !== 'hash' || a.value.size !== b.value.size) return false;
      for (const [key, item] of a.value) {
        const rhs = b.value.get(key);
        if (rhs === undefined || !bymlEquals(item, rhs)) return false;
      }
      return true;
    }
  }
}

/* ------------------------------------------------------------------ */
/*  Typed accessors                                                    */
/* ------------------------------------------------------------------ */

function mismatch(expected: string, node: BymlNode, field: string | undefined): ParseError {
  return new ParseError('TypeMismatch', `expected ${expected}, found ${node.type}`, { field });
}

export function expectHash(node: BymlNode, field?: string): BymlHash {
  if (node.type !== 'hash') throw mismatch('hash', node, field);
  return node.value;
}

export function expectArray(node: BymlNode, field?: string): readonly BymlNode[] {
  if (node.type !== 'array') throw mismatch('array', node, field);
  return node.value;
}

export function expectString(node: BymlNode, field?: string): string {
  if (node.type !== 'string') throw mismatch('string', node, field);
  return node.value;
}

export function expectBool(node: BymlNode, field?: string): boolean {
  if (node.type !== 'bool') throw mismatch('bool', node, field);
  return node.value;
}

/** Value of an `int` or `uint` node. */
export function expectInt(node: BymlNode, field?: string): number {
  if (node.type !== 'int' && node.type !== 'uint') throw mismatch('int', node, field);
  return node.value;
}

/** Value of a `float` or `double` node. */
export function expectFloat(node: BymlNode, field?: string): number {
  if (node.type !== 'float' && node.type !== 'double') throw mismatch('float', node, field);
  return node.value;
}

/** Member of a hash that must be present. */
export function expectMember(hash: BymlHash, key: string): BymlNode {
  const node = hash.get(key);
  if (node === undefined) {
    throw new ParseError('TypeMismatch', 'missing hash member', { field: key });
  }
  return node;
}
