/**
 * Bounds-checked, endian-aware cursor over a byte buffer.
 *
 * All resource codecs read through this class so a truncated file surfaces as
 * a `ParseError` of kind `UnexpectedEof` naming the field being read, never
 * as a `RangeError` from `DataView`.
 */

import { ParseError } from '../errors.js';
import type { Endian } from './endian.js';

const asciiDecoder = new TextDecoder('ascii');
const utf8Decoder = new TextDecoder('utf-8');

export class BinaryReader {
  private readonly view: DataView;
  private offset = 0;
  readonly byteLength: number;
  endian: Endian;

  constructor(
    private readonly bytes: Uint8Array,
    endian: Endian = 'little',
  ) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.byteLength = bytes.byteLength;
    this.endian = endian;
  }

  /* ------------------------------------------------------------------ */
  /*  Cursor control                                                     */
  /* ------------------------------------------------------------------ */

  get position(): number {
    return this.offset;
  }

  seek(offset: number, field = 'seek target'): void {
    if (offset < 0 || offset > this.byteLength) {
      throw this.eof(field, offset, 0);
    }
    this.offset = offset;
  }

  skip(count: number, field = 'padding'): void {
    this.ensure(count, field);
    this.offset += count;
  }

  /** Advance to the next multiple of `alignment`. */
  align(alignment: number): void {
    const rem = this.offset % alignment;
    if (rem !== 0) this.offset = Math.min(this.byteLength, this.offset + alignment - rem);
  }

  /* ------------------------------------------------------------------ */
  /*  Primitive readers                                                  */
  /* ------------------------------------------------------------------ */

  u8(field = 'u8'): number {
    this.ensure(1, field);
    const val = this.view.getUint8(this.offset);
    this.offset += 1;
    return val;
  }

  u16(field = 'u16'): number {
    this.ensure(2, field);
    const val = this.view.getUint16(this.offset, this.littleEndian);
    this.offset += 2;
    return val;
  }

  i16(field = 'i16'): number {
    this.ensure(2, field);
    const val = this.view.getInt16(this.offset, this.littleEndian);
    this.offset += 2;
    return val;
  }

  u24(field = 'u24'): number {
    this.ensure(3, field);
    const b0 = this.view.getUint8(this.offset);
    const b1 = this.view.getUint8(this.offset + 1);
    const b2 = this.view.getUint8(this.offset + 2);
    this.offset += 3;
    return this.littleEndian ? b0 | (b1 << 8) | (b2 << 16) : (b0 << 16) | (b1 << 8) | b2;
  }

  u32(field = 'u32'): number {
    this.ensure(4, field);
    const val = this.view.getUint32(this.offset, this.littleEndian);
    this.offset += 4;
    return val;
  }

  i32(field = 'i32'): number {
    this.ensure(4, field);
    const val = this.view.getInt32(this.offset, this.littleEndian);
    this.offset += 4;
    return val;
  }

  f32(field = 'f32'): number {
    this.ensure(4, field);
    const val = this.view.getFloat32(this.offset, this.littleEndian);
    this.offset += 4;
    return val;
  }

  u64(field = 'u64'): bigint {
    this.ensure(8, field);
    const val = this.view.getBigUint64(this.offset, this.littleEndian);
    this.offset += 8;
    return val;
  }

  i64(field = 'i64'): bigint {
    this.ensure(8, field);
    const val = this.view.getBigInt64(this.offset, this.littleEndian);
    this.offset += 8;
    return val;
  }

  f64(field = 'f64'): number {
    this.ensure(8, field);
    const val = this.view.getFloat64(this.offset, this.littleEndian);
    this.offset += 8;
    return val;
  }

  /** Read `count` bytes and return a copy. */
  readBytes(count: number, field = 'bytes'): Uint8Array {
    this.ensure(count, field);
    const copy = this.bytes.slice(this.offset, this.offset + count);
    this.offset += count;
    return copy;
  }

  /* ------------------------------------------------------------------ */
  /*  String readers                                                     */
  /* ------------------------------------------------------------------ */

  /** Read a fixed-length ASCII string (no length prefix, no terminator). */
  fixedAscii(length: number, field = 'ascii'): string {
    this.ensure(length, field);
    const text = asciiDecoder.decode(this.bytes.subarray(this.offset, this.offset + length));
    this.offset += length;
    return text;
  }

  /** Read a null-terminated UTF-8 string starting at an absolute offset. */
  cstringAt(offset: number, field = 'string'): string {
    if (offset < 0 || offset >= this.byteLength) {
      throw this.eof(field, offset, 1);
    }
    let end = offset;
    while (end < this.byteLength && this.bytes[end] !== 0) end++;
    if (end >= this.byteLength) {
      throw new ParseError('UnexpectedEof', 'unterminated string', { field, offset });
    }
    return utf8Decoder.decode(this.bytes.subarray(offset, end));
  }

  /* ------------------------------------------------------------------ */
  /*  Internals                                                          */
  /* ------------------------------------------------------------------ */

  private get littleEndian(): boolean {
    return this.endian === 'little';
  }

  private ensure(count: number, field: string): void {
    if (count < 0 || this.offset + count > this.byteLength) {
      throw this.eof(field, this.offset, count);
    }
  }

  private eof(field: string, offset: number, count: number): ParseError {
    return new ParseError(
      'UnexpectedEof',
      `need ${count} byte(s), buffer is ${this.byteLength} byte(s)`,
      { field, offset },
    );
  }
}
