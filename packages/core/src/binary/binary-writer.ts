/**
 * Growable endian-aware byte writer.
 *
 * Offsets that are only known once later sections are laid out are written
 * as placeholders and filled in with the `set*At` back-patch methods.
 */

import type { Endian } from './endian.js';

const utf8Encoder = new TextEncoder();

export class BinaryWriter {
  private buffer: Uint8Array;
  private view: DataView;
  private offset = 0;
  private length = 0;

  constructor(
    readonly endian: Endian,
    initialCapacity = 1024,
  ) {
    this.buffer = new Uint8Array(Math.max(16, initialCapacity));
    this.view = new DataView(this.buffer.buffer);
  }

  get position(): number {
    return this.offset;
  }

  /** Move the cursor; gaps are zero-filled. */
  seek(offset: number): void {
    this.ensureCapacity(offset - this.offset);
    this.offset = offset;
    this.length = Math.max(this.length, offset);
  }

  /** Zero-pad to the next multiple of `alignment`. */
  align(alignment: number): void {
    const rem = this.offset % alignment;
    if (rem !== 0) this.seek(this.offset + alignment - rem);
  }

  u8(value: number): void {
    this.ensureCapacity(1);
    this.view.setUint8(this.offset, value);
    this.advance(1);
  }

  u16(value: number): void {
    this.ensureCapacity(2);
    this.view.setUint16(this.offset, value, this.littleEndian);
    this.advance(2);
  }

  u24(value: number): void {
    this.ensureCapacity(3);
    this.writeU24(this.offset, value);
    this.advance(3);
  }

  u32(value: number): void {
    this.ensureCapacity(4);
    this.view.setUint32(this.offset, value >>> 0, this.littleEndian);
    this.advance(4);
  }

  i32(value: number): void {
    this.ensureCapacity(4);
    this.view.setInt32(this.offset, value, this.littleEndian);
    this.advance(4);
  }

  f32(value: number): void {
    this.ensureCapacity(4);
    this.view.setFloat32(this.offset, value, this.littleEndian);
    this.advance(4);
  }

  u64(value: bigint): void {
    this.ensureCapacity(8);
    this.view.setBigUint64(this.offset, value, this.littleEndian);
    this.advance(8);
  }

  i64(value: bigint): void {
    this.ensureCapacity(8);
    this.view.setBigInt64(this.offset, value, this.littleEndian);
    this.advance(8);
  }

  f64(value: number): void {
    this.ensureCapacity(8);
    this.view.setFloat64(this.offset, value, this.littleEndian);
    this.advance(8);
  }

  writeBytes(data: Uint8Array): void {
    this.ensureCapacity(data.byteLength);
    this.buffer.set(data, this.offset);
    this.advance(data.byteLength);
  }

  /** ASCII tag without terminator. */
  magic(text: string): void {
    for (let i = 0; i < text.length; i++) {
      this.u8(text.charCodeAt(i) & 0xff);
    }
  }

  /** UTF-8 string followed by a null terminator. */
  cstring(text: string): void {
    this.writeBytes(utf8Encoder.encode(text));
    this.u8(0);
  }

  /* ------------------------------------------------------------------ */
  /*  Back-patching                                                      */
  /* ------------------------------------------------------------------ */

  setU16At(offset: number, value: number): void {
    this.view.setUint16(offset, value, this.littleEndian);
  }

  setU24At(offset: number, value: number): void {
    this.writeU24(offset, value);
  }

  setU32At(offset: number, value: number): void {
    this.view.setUint32(offset, value >>> 0, this.littleEndian);
  }

  /** Copy of the written bytes. */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }

  /* ------------------------------------------------------------------ */
  /*  Internals                                                          */
  /* ------------------------------------------------------------------ */

  private get littleEndian(): boolean {
    return this.endian === 'little';
  }

  private writeU24(offset: number, value: number): void {
    const b0 = value & 0xff;
    const b1 = (value >>> 8) & 0xff;
    const b2 = (value >>> 16) & 0xff;
    if (this.littleEndian) {
      this.view.setUint8(offset, b0);
      this.view.setUint8(offset + 1, b1);
      this.view.setUint8(offset + 2, b2);
    } else {
      this.view.setUint8(offset, b2);
      this.view.setUint8(offset + 1, b1);
      this.view.setUint8(offset + 2, b0);
    }
  }

  private advance(count: number): void {
    this.offset += count;
    this.length = Math.max(this.length, this.offset);
  }

  private ensureCapacity(additionalBytes: number): void {
    const requiredSize = this.offset + Math.max(0, additionalBytes);
    if (requiredSize > this.buffer.byteLength) {
      const next = new Uint8Array(Math.max(requiredSize, this.buffer.byteLength * 2));
      next.set(this.buffer);
      this.buffer = next;
      this.view = new DataView(next.buffer);
    }
  }
}
