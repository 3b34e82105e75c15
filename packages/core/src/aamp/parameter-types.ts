/**
 * In-memory model of the parameter archive (AAMP) format.
 *
 * Names are stored in the binary only as CRC-32 hashes, so every object,
 * list and parameter key is a hash. Helpers accept either a name or a hash.
 */

import { ParseError } from '../errors.js';
import { crc32 } from '../hash/crc32.js';

/** Parameter type ids in binary order (the id is the index). */
export const PARAMETER_TYPES = [
  'bool',
  'f32',
  'int',
  'vec2',
  'vec3',
  'vec4',
  'color',
  'string32',
  'string64',
  'curve1',
  'curve2',
  'curve3',
  'curve4',
  'bufferInt',
  'bufferF32',
  'string256',
  'quat',
  'u32',
  'bufferU32',
  'bufferBinary',
  'stringRef',
] as const;

export type ParameterType = (typeof PARAMETER_TYPES)[number];

export type VectorType = 'vec2' | 'vec3' | 'vec4' | 'color' | 'quat';
export type StringType = 'string32' | 'string64' | 'string256' | 'stringRef';
export type CurveType = 'curve1' | 'curve2' | 'curve3' | 'curve4';
export type NumberBufferType = 'bufferInt' | 'bufferF32' | 'bufferU32';

/** One curve record: two u32 header values and 30 floats. */
export interface Curve {
  readonly a: number;
  readonly b: number;
  readonly floats: readonly number[];
}

export type Parameter =
  | { readonly type: 'bool'; readonly value: boolean }
  | { readonly type: 'f32' | 'int' | 'u32'; readonly value: number }
  | { readonly type: VectorType; readonly value: readonly number[] }
  | { readonly type: StringType; readonly value: string }
  | { readonly type: CurveType; readonly value: readonly Curve[] }
  | { readonly type: NumberBufferType; readonly value: readonly number[] }
  | { readonly type: 'bufferBinary'; readonly value: Uint8Array };

/** Ordered parameters of one object, keyed by name hash. */
export type ParameterObject = Map<number, Parameter>;

export interface ParameterList {
  objects: Map<number, ParameterObject>;
  lists: Map<number, ParameterList>;
}

export interface ParameterIO {
  /** `pio_version` header field. */
  version: number;
  /** Data type string stored after the header (usually "xml"). */
  dataType: string;
  root: ParameterList;
}

export const ROOT_LIST_NAME = 'param_root';

export const VECTOR_LENGTHS: Readonly<Record<VectorType, number>> = {
  vec2: 2,
  vec3: 3,
  vec4: 4,
  color: 4,
  quat: 4,
};

export const CURVE_COUNTS: Readonly<Record<CurveType, number>> = {
  curve1: 1,
  curve2: 2,
  curve3: 3,
  curve4: 4,
};

export const CURVE_FLOAT_COUNT = 30;

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/** Hash of a parameter/object/list name; numbers are taken as hashes already. */
export function nameHash(name: string | number): number {
  return typeof name === 'number' ? name >>> 0 : crc32(name);
}

export function createParameterList(): ParameterList {
  return { objects: new Map(), lists: new Map() };
}

export function createParameterIO(dataType = 'xml', version = 0): ParameterIO {
  return { version, dataType, root: createParameterList() };
}

/** Build an object from `[name, parameter]` pairs, preserving order. */
export function parameterObject(entries: Iterable<readonly [string | number, Parameter]>): ParameterObject {
  const obj: ParameterObject = new Map();
  for (const [name, param] of entries) {
    obj.set(nameHash(name), param);
  }
  return obj;
}

export const Param = {
  bool: (value: boolean): Parameter => ({ type: 'bool', value }),
  f32: (value: number): Parameter => ({ type: 'f32', value: Math.fround(value) }),
  int: (value: number): Parameter => ({ type: 'int', value: value | 0 }),
  u32: (value: number): Parameter => ({ type: 'u32', value: value >>> 0 }),
  vec: (type: VectorType, value: readonly number[]): Parameter => ({
    type,
    value: value.map((v) => Math.fround(v)),
  }),
  string32: (value: string): Parameter => ({ type: 'string32', value }),
  string64: (value: string): Parameter => ({ type: 'string64', value }),
  string256: (value: string): Parameter => ({ type: 'string256', value }),
  stringRef: (value: string): Parameter => ({ type: 'stringRef', value }),
  bufferInt: (value: readonly number[]): Parameter => ({ type: 'bufferInt', value: value.map((v) => v | 0) }),
  bufferF32: (value: readonly number[]): Parameter => ({
    type: 'bufferF32',
    value: value.map((v) => Math.fround(v)),
  }),
  bufferU32: (value: readonly number[]): Parameter => ({ type: 'bufferU32', value: value.map((v) => v >>> 0) }),
  bufferBinary: (value: Uint8Array): Parameter => ({ type: 'bufferBinary', value }),
} as const;

// ---------------------------------------------------------------------------
// Equality
// ---------------------------------------------------------------------------

function numbersEqual(a: readonly number[], b: readonly number[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (!Object.is(a[i], b[i])) return false;
  }
  return true;
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.byteLength !== b.byteLength) return false;
  for (let i = 0; i < a.byteLength; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

type CurveParameter = Extract<Parameter, { type: CurveType }>;

export function isCurveParameter(param: Parameter): param is CurveParameter {
  return param.type in CURVE_COUNTS;
}

/** Float/int payload of vector and numeric buffer parameters. */
export function numericValues(param: Parameter): readonly number[] | undefined {
  switch (param.type) {
    case 'vec2':
    case 'vec3':
    case 'vec4':
    case 'color':
    case 'quat':
    case 'bufferInt':
    case 'bufferF32':
    case 'bufferU32':
      return param.value;
    default:
      return undefined;
  }
}

function scalarValue(param: Parameter): boolean | number | string | undefined {
  switch (param.type) {
    case 'bool':
    case 'f32':
    case 'int':
    case 'u32':
    case 'string32':
    case 'string64':
    case 'string256':
    case 'stringRef':
      return param.value;
    default:
      return undefined;
  }
}

function curvesEqual(a: readonly Curve[], b: readonly Curve[]): boolean {
  return (
    a.length === b.length &&
    a.every((curve, i) => {
      const other = b[i];
      return other !== undefined && curve.a === other.a && curve.b === other.b && numbersEqual(curve.floats, other.floats);
    })
  );
}

export function parameterEquals(a: Parameter, b: Parameter): boolean {
  if (a.type !== b.type) return false;
  const lhsNumbers = numericValues(a);
  const rhsNumbers = numericValues(b);
  if (lhsNumbers !== undefined && rhsNumbers !== undefined) return numbersEqual(lhsNumbers, rhsNumbers);
  if (a.type === 'bufferBinary' && b.type === 'bufferBinary') return bytesEqual(a.value, b.value);
  if (isCurveParameter(a) && isCurveParameter(b)) return curvesEqual(a.value, b.value);
  return Object.is(scalarValue(a), scalarValue(b));
}

/** Order-insensitive parameter-by-parameter equality. */
export function parameterObjectEquals(a: ParameterObject, b: ParameterObject): boolean {
  if (a.size !== b.size) return false;
  for (const [key, param] of a) {
    const other = b.get(key);
    if (other === undefined || !parameterEquals(param, other)) return false;
  }
  return true;
}

export function parameterListEquals(a: ParameterList, b: ParameterList): boolean {
  if (a.objects.size !== b.objects.size || a.lists.size !== b.lists.size) return false;
  for (const [key, obj] of a.objects) {
    const other = b.objects.get(key);
    if (other === undefined || !parameterObjectEquals(obj, other)) return false;
  }
  for (const [key, list] of a.lists) {
    const other = b.lists.get(key);
    if (other === undefined || !parameterListEquals(list, other)) return false;
  }
  return true;
}

// ---------------------------------------------------------------------------
// Typed accessors
// ---------------------------------------------------------------------------

export function objectByName(list: ParameterList, name: string | number): ParameterObject | undefined {
  return list.objects.get(nameHash(name));
}

export function listByName(list: ParameterList, name: string | number): ParameterList | undefined {
  return list.lists.get(nameHash(name));
}

function fieldLabel(name: string | number): string {
  return typeof name === 'number' ? `0x${name.toString(16).padStart(8, '0')}` : name;
}

export function expectParameterObject(list: ParameterList, name: string | number): ParameterObject {
  const obj = list.objects.get(nameHash(name));
  if (obj === undefined) {
    throw new ParseError('TypeMismatch', 'missing parameter object', { field: fieldLabel(name) });
  }
  return obj;
}

export function expectParameterList(list: ParameterList, name: string | number): ParameterList {
  const child = list.lists.get(nameHash(name));
  if (child === undefined) {
    throw new ParseError('TypeMismatch', 'missing parameter list', { field: fieldLabel(name) });
  }
  return child;
}

export function expectParam(obj: ParameterObject, name: string | number): Parameter {
  const param = obj.get(nameHash(name));
  if (param === undefined) {
    throw new ParseError('TypeMismatch', 'missing parameter', { field: fieldLabel(name) });
  }
  return param;
}

/** Value of any string-typed parameter. */
export function expectStringParam(obj: ParameterObject, name: string | number): string {
  const param = expectParam(obj, name);
  switch (param.type) {
    case 'string32':
    case 'string64':
    case 'string256':
    case 'stringRef':
      return param.value;
    default:
      throw new ParseError('TypeMismatch', `expected a string parameter, found ${param.type}`, {
        field: fieldLabel(name),
      });
  }
}

/** Value of an `int` or `u32` parameter. */
export function expectIntParam(obj: ParameterObject, name: string | number): number {
  const param = expectParam(obj, name);
  if (param.type === 'int' || param.type === 'u32') return param.value;
  throw new ParseError('TypeMismatch', `expected an integer parameter, found ${param.type}`, {
    field: fieldLabel(name),
  });
}
