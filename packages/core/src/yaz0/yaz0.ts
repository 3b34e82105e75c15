/**
 * Yaz0 compression — the transparent compression layer wrapped around
 * archives and resources whose extension starts with "s" (`.sbyml`, `.ssarc`).
 *
 * Format:
 *   Header (16 bytes):
 *     [0..3]   Magic: "Yaz0"
 *     [4..7]   Uncompressed size (BIG-ENDIAN uint32)
 *     [8..15]  Reserved (zero)
 *
 *   Body: groups of one code byte followed by up to 8 chunks. Code bits are
 *   read MSB first; a set bit copies one literal byte, a clear bit is a back
 *   reference of 2 or 3 bytes:
 *     NR RR        length = N + 2 (N = 1..15), distance = R + 1
 *     0R RR NN     length = NN + 0x12
 */

import { ParseError } from '../errors.js';
import { hasMagic } from '../binary/endian.js';

export const YAZ0_MAGIC = 'Yaz0';
const HEADER_SIZE = 16;
const MAX_DISTANCE = 0x1000;
const MIN_MATCH = 3;
const MAX_MATCH = 0x111;
const HASH_SIZE = 1 << 16;

export function isYaz0(data: Uint8Array): boolean {
  return data.byteLength >= HEADER_SIZE && hasMagic(data, YAZ0_MAGIC);
}

export function decompressYaz0(data: Uint8Array): Uint8Array {
  if (!hasMagic(data, YAZ0_MAGIC)) {
    throw new ParseError('BadMagic', `expected "${YAZ0_MAGIC}"`, { field: 'yaz0 header', offset: 0 });
  }
  if (data.byteLength < HEADER_SIZE) {
    throw new ParseError('UnexpectedEof', 'truncated Yaz0 header', { field: 'yaz0 header', offset: 0 });
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const size = view.getUint32(4, false);
  const out = new Uint8Array(size);
  let src = HEADER_SIZE;
  let dst = 0;

  const next = (field: string): number => {
    if (src >= data.byteLength) {
      throw new ParseError('UnexpectedEof', 'truncated Yaz0 stream', { field, offset: src });
    }
    return data[src++] ?? 0;
  };

  while (dst < size) {
    const code = next('code byte');
    for (let bit = 0x80; bit !== 0 && dst < size; bit >>= 1) {
      if ((code & bit) !== 0) {
        out[dst++] = next('literal');
        continue;
      }

      const b1 = next('back reference');
      const b2 = next('back reference');
      const distance = (((b1 & 0x0f) << 8) | b2) + 1;
      const nibble = b1 >> 4;
      const length = nibble === 0 ? next('back reference length') + 0x12 : nibble + 2;

      if (distance > dst) {
        throw new ParseError('TypeMismatch', 'back reference before start of output', {
          field: 'back reference',
          offset: src,
        });
      }

      // Overlapping copies are intentional (run-length style references).
      for (let i = 0; i < length && dst < size; i++) {
        out[dst] = out[dst - distance] ?? 0;
        dst++;
      }
    }
  }

  return out;
}

/** Decompress when the buffer carries a Yaz0 header, otherwise return it unchanged. */
export function decompressIfYaz0(data: Uint8Array): Uint8Array {
  return isYaz0(data) ? decompressYaz0(data) : data;
}

/**
 * Compress with greedy longest-match search. Among matches of equal length
 * the closest one wins, so output is deterministic for a given input.
 */
export function compressYaz0(data: Uint8Array): Uint8Array {
  const n = data.byteLength;
  const out: number[] = [];
  out.push(0x59, 0x61, 0x7a, 0x30);
  out.push((n >>> 24) & 0xff, (n >>> 16) & 0xff, (n >>> 8) & 0xff, n & 0xff);
  out.push(0, 0, 0, 0, 0, 0, 0, 0);

  const head = new Int32Array(HASH_SIZE).fill(-1);
  const prev = new Int32Array(Math.max(1, n)).fill(-1);
  const hashAt = (pos: number): number =>
    (((data[pos] ?? 0) << 8) ^ ((data[pos + 1] ?? 0) << 4) ^ (data[pos + 2] ?? 0)) & (HASH_SIZE - 1);
  const insert = (pos: number): void => {
    if (pos + MIN_MATCH > n) return;
    const h = hashAt(pos);
    prev[pos] = head[h] ?? -1;
    head[h] = pos;
  };

  let pos = 0;
  let codeIndex = -1;
  let bitCount = 8;

  while (pos < n) {
    if (bitCount === 8) {
      codeIndex = out.length;
      out.push(0);
      bitCount = 0;
    }

    let bestLength = 0;
    let bestDistance = 0;
    if (pos + MIN_MATCH <= n) {
      const limit = Math.min(MAX_MATCH, n - pos);
      let candidate = head[hashAt(pos)] ?? -1;
      while (candidate >= 0 && pos - candidate <= MAX_DISTANCE) {
        let length = 0;
        while (length < limit && data[candidate + length] === data[pos + length]) length++;
        if (length > bestLength) {
          bestLength = length;
          bestDistance = pos - candidate;
          if (length === limit) break;
        }
        candidate = prev[candidate] ?? -1;
      }
    }

    if (bestLength >= MIN_MATCH) {
      const dist = bestDistance - 1;
      if (bestLength >= 0x12) {
        out.push((dist >> 8) & 0x0f, dist & 0xff, bestLength - 0x12);
      } else {
        out.push((((bestLength - 2) << 4) | ((dist >> 8) & 0x0f)) & 0xff, dist & 0xff);
      }
      for (let i = 0; i < bestLength; i++) insert(pos + i);
      pos += bestLength;
    } else {
      out[codeIndex] = (out[codeIndex] ?? 0) | (0x80 >> bitCount);
      out.push(data[pos] ?? 0);
      insert(pos);
      pos += 1;
    }
    bitCount++;
  }

  return Uint8Array.from(out);
}
