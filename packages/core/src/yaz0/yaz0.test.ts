import { describe, expect, it } from 'vitest';
import { ParseError } from '../errors.js';
import { compressYaz0, decompressIfYaz0, decompressYaz0, isYaz0 } from './yaz0.js';

function header(size: number): number[] {
  return [0x59, 0x61, 0x7a, 0x30, (size >>> 24) & 0xff, (size >>> 16) & 0xff, (size >>> 8) & 0xff, size & 0xff, 0, 0, 0, 0, 0, 0, 0, 0];
}

function pseudoRandomBytes(length: number, seed: number): Uint8Array {
  const out = new Uint8Array(length);
  let state = seed;
  for (let i = 0; i < length; i++) {
    state = (state * 1103515245 + 12345) >>> 0;
    // Small alphabet so the compressor finds matches.
    out[i] = 0x41 + ((state >>> 16) % 6);
  }
  return out;
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}

describe('Yaz0', () => {
  it('encodes a short run as one literal and a two-byte back reference', () => {
    const input = new TextEncoder().encode('aaaaaaaaaa');
    expect([...compressYaz0(input)]).toEqual([...header(10), 0x80, 0x61, 0x70, 0x00]);
  });

  it('encodes a long run with the three-byte back reference form', () => {
    const input = new Uint8Array(100).fill(0x61);
    expect([...compressYaz0(input)]).toEqual([...header(100), 0x80, 0x61, 0x00, 0x00, 0x51]);
  });

  it('decompresses hand-built streams with overlapping copies', () => {
    const stream = Uint8Array.from([...header(6), 0xc0, 0x61, 0x62, 0x20, 0x01]);
    expect(new TextDecoder().decode(decompressYaz0(stream))).toBe('ababab');
  });

  it('round-trips data through compress and decompress', () => {
    const input = pseudoRandomBytes(5000, 7);
    const compressed = compressYaz0(input);
    expect(compressed.byteLength).toBeLessThan(input.byteLength);
    expect(decompressYaz0(compressed)).toEqual(input);
  });

  it('compresses deterministically', () => {
    const input = pseudoRandomBytes(2048, 99);
    expect(compressYaz0(input)).toEqual(compressYaz0(input));
  });

  it('handles empty input', () => {
    const compressed = compressYaz0(new Uint8Array(0));
    expect(compressed.byteLength).toBe(16);
    expect(decompressYaz0(compressed).byteLength).toBe(0);
  });

  it('passes through data without a Yaz0 header', () => {
    const raw = Uint8Array.from([1, 2, 3]);
    expect(isYaz0(raw)).toBe(false);
    expect(decompressIfYaz0(raw)).toBe(raw);
  });

  it('reports truncated streams as UnexpectedEof', () => {
    const stream = Uint8Array.from([...header(8), 0xff, 0x61]);
    const error = captureError(() => decompressYaz0(stream));
    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ kind: 'UnexpectedEof', field: 'literal' });
  });

  it('rejects back references before the start of output', () => {
    const stream = Uint8Array.from([...header(4), 0x00, 0x20, 0x05]);
    expect(() => decompressYaz0(stream)).toThrow(/back reference/);
  });

  it('rejects a wrong magic', () => {
    expect(() => decompressYaz0(new Uint8Array(16))).toThrow(/BadMagic/);
  });
});
