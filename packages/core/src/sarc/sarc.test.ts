import { describe, expect, it } from 'vitest';
import { ParseError } from '../errors.js';
import { compressYaz0 } from '../yaz0/yaz0.js';
import { NESTED_DATA_ALIGNMENT, createSarc, parseSarc, sarcEndian, sarcNameHash, writeSarc } from './sarc.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}

function bytes(...values: number[]): Uint8Array {
  return Uint8Array.from(values);
}

describe('sarcNameHash', () => {
  it('uses the 0x65 multiplier', () => {
    expect(sarcNameHash('z')).toBe(0x7a);
    expect(sarcNameHash('a.txt')).toBe(0x5c897aa7);
  });
});

describe('writeSarc', () => {
  it('lays out headers, name table and data for a single entry', () => {
    const data = writeSarc(createSarc('little', [['a.txt', bytes(1, 2, 3)]]));
    const view = new DataView(data.buffer);

    expect(String.fromCharCode(...data.subarray(0, 4))).toBe('SARC');
    expect([data[6], data[7]]).toEqual([0xff, 0xfe]);
    expect(view.getUint32(0x08, true)).toBe(0x43);
    expect(view.getUint32(0x0c, true)).toBe(0x40);
    expect(String.fromCharCode(...data.subarray(0x14, 0x18))).toBe('SFAT');
    expect(view.getUint16(0x1a, true)).toBe(1);
    expect(view.getUint32(0x1c, true)).toBe(0x65);
    expect(view.getUint32(0x20, true)).toBe(0x5c897aa7);
    expect(view.getUint32(0x24, true)).toBe(0x01000000);
    expect(view.getUint32(0x28, true)).toBe(0);
    expect(view.getUint32(0x2c, true)).toBe(3);
    expect(String.fromCharCode(...data.subarray(0x30, 0x34))).toBe('SFNT');
    expect(String.fromCharCode(...data.subarray(0x38, 0x3d))).toBe('a.txt');
    expect([...data.subarray(0x40)]).toEqual([1, 2, 3]);
  });

  it('writes the byte-order mark big-endian archives expect', () => {
    const data = writeSarc(createSarc('big', [['a.txt', bytes(1)]]));
    expect([data[6], data[7]]).toEqual([0xfe, 0xff]);
    expect(sarcEndian(data)).toBe('big');
    expect(sarcEndian(writeSarc(createSarc('little')))).toBe('little');
  });

  it('sorts nodes by name hash', () => {
    const archive = createSarc('little', [
      ['Ecosystem/AreaData.sbyml', bytes(1)],
      ['z', bytes(2)],
      ['Actor/Pack/A.bactorpack', bytes(3)],
    ]);
    const parsed = parseSarc(writeSarc(archive));
    expect([...parsed.files.keys()]).toEqual(['z', 'Actor/Pack/A.bactorpack', 'Ecosystem/AreaData.sbyml']);
  });

  it('aligns nested archives and compressed entries', () => {
    const inner = writeSarc(createSarc('little', [['a.txt', bytes(1)]]));
    const compressed = compressYaz0(bytes(4, 4, 4, 4, 4, 4));
    const data = writeSarc(
      createSarc('little', [
        ['z', bytes(9)],
        ['Nested.sarc', inner],
        ['Packed.sbyml', compressed],
      ]),
    );
    const view = new DataView(data.buffer);
    const dataOffset = view.getUint32(0x0c, true);

    expect(dataOffset % NESTED_DATA_ALIGNMENT).toBe(0);
    const parsed = parseSarc(data);
    expect(parsed.files.get('Nested.sarc')).toEqual(inner);
    expect(parsed.files.get('Packed.sbyml')).toEqual(compressed);
  });
});

describe('parseSarc', () => {
  it.each(['big', 'little'] as const)('round-trips entries and bytes (%s endian)', (endian) => {
    const archive = createSarc(endian, [
      ['Map/B.smubin', bytes(5, 6, 7, 8, 9)],
      ['Actor/Pack/A.bactorpack', bytes()],
      ['a.txt', bytes(1, 2, 3)],
    ]);
    const data = writeSarc(archive);
    const parsed = parseSarc(data);

    expect(parsed.endian).toBe(endian);
    expect(parsed.files.get('Map/B.smubin')).toEqual(bytes(5, 6, 7, 8, 9));
    expect(parsed.files.get('Actor/Pack/A.bactorpack')).toEqual(bytes());
    expect(parsed.files.get('a.txt')).toEqual(bytes(1, 2, 3));
    expect(writeSarc(parsed)).toEqual(data);
  });

  it('rejects a wrong magic', () => {
    const error = captureError(() => parseSarc(bytes(0x59, 0x61, 0x7a, 0x30)));
    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ kind: 'BadMagic', field: 'sarc header' });
  });

  it('rejects an invalid byte-order mark', () => {
    const data = writeSarc(createSarc('little', [['a.txt', bytes(1)]]));
    data[6] = 0;
    expect(captureError(() => parseSarc(data))).toMatchObject({ kind: 'BadMagic', field: 'byte order mark' });
  });

  it('reports truncated file data as UnexpectedEof', () => {
    const data = writeSarc(createSarc('little', [['a.txt', bytes(1, 2, 3)]])).slice(0, 0x41);
    expect(captureError(() => parseSarc(data))).toMatchObject({ kind: 'UnexpectedEof', field: 'file data' });
  });
});
