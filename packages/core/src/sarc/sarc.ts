/**
 * SARC archive reader and writer.
 *
 * Format:
 *   SARC header (0x14): magic, header size, byte-order mark (0xFEFF in the
 *     archive's byte order), file size, data offset, version 0x0100, reserved.
 *   SFAT header (0x0C): magic, header size, node count, hash multiplier.
 *   SFAT nodes (0x10 each, sorted by name hash): name hash, attributes
 *     (0x01000000 | name offset / 4), data start, data end (relative to the
 *     data offset).
 *   SFNT header (0x08), then null-terminated names padded to 4 bytes.
 *   File data, each entry aligned.
 */

import { BinaryReader } from '../binary/binary-reader.js';
import { BinaryWriter } from '../binary/binary-writer.js';
import { hasMagic, readMagic, type Endian } from '../binary/endian.js';
import { ParseError } from '../errors.js';
import { isYaz0 } from '../yaz0/yaz0.js';

export const SARC_MAGIC = 'SARC';
export const SARC_HASH_MULTIPLIER = 0x65;
export const DEFAULT_SARC_ALIGNMENT = 4;
/** Alignment for entries that are themselves archives or compressed data. */
export const NESTED_DATA_ALIGNMENT = 0x2000;

const SARC_HEADER_SIZE = 0x14;
const SFAT_HEADER_SIZE = 0x0c;
const SFAT_NODE_SIZE = 0x10;
const SFNT_HEADER_SIZE = 0x08;
const SARC_VERSION = 0x0100;
const NAMED_FLAG = 0x01000000;

const utf8Encoder = new TextEncoder();

export interface SarcArchive {
  endian: Endian;
  /** Entry name to file data, in archive order. */
  files: Map<string, Uint8Array>;
}

export interface SarcWriteOptions {
  /** Minimum data alignment for every entry. */
  alignment?: number;
}

export function isSarc(data: Uint8Array): boolean {
  return hasMagic(data, SARC_MAGIC);
}

export function createSarc(endian: Endian, files?: Iterable<readonly [string, Uint8Array]>): SarcArchive {
  return { endian, files: new Map(files) };
}

/** Name hash used to sort and look up SFAT nodes. */
export function sarcNameHash(name: string, multiplier = SARC_HASH_MULTIPLIER): number {
  let hash = 0;
  for (const byte of utf8Encoder.encode(name)) {
    const signed = byte >= 0x80 ? byte - 0x100 : byte;
    hash = (Math.imul(hash, multiplier) + signed) >>> 0;
  }
  return hash;
}

/* ------------------------------------------------------------------ */
/*  Reading                                                            */
/* ------------------------------------------------------------------ */

export function parseSarc(data: Uint8Array): SarcArchive {
  if (!isSarc(data)) {
    throw new ParseError('BadMagic', `expected "${SARC_MAGIC}", found "${readMagic(data, 4)}"`, {
      field: 'sarc header',
      offset: 0,
    });
  }
  const endian = sarcEndian(data);
  const reader = new BinaryReader(data, endian);

  reader.seek(4);
  const headerSize = reader.u16('header size');
  reader.skip(2, 'byte order mark');
  reader.u32('file size');
  const dataOffset = reader.u32('data offset');

  reader.seek(headerSize, 'SFAT header');
  const sfatMagic = reader.fixedAscii(4, 'SFAT header');
  if (sfatMagic !== 'SFAT') {
    throw new ParseError('BadMagic', `expected "SFAT", found "${sfatMagic}"`, {
      field: 'SFAT header',
      offset: headerSize,
    });
  }
  const sfatHeaderSize = reader.u16('SFAT header size');
  const nodeCount = reader.u16('SFAT node count');
  reader.u32('hash multiplier');

  const nodesStart = headerSize + sfatHeaderSize;
  const sfntStart = nodesStart + nodeCount * SFAT_NODE_SIZE;
  reader.seek(sfntStart, 'SFNT header');
  const sfntMagic = reader.fixedAscii(4, 'SFNT header');
  if (sfntMagic !== 'SFNT') {
    throw new ParseError('BadMagic', `expected "SFNT", found "${sfntMagic}"`, {
      field: 'SFNT header',
      offset: sfntStart,
    });
  }
  const namesStart = sfntStart + reader.u16('SFNT header size');

  const files = new Map<string, Uint8Array>();
  for (let i = 0; i < nodeCount; i++) {
    reader.seek(nodesStart + i * SFAT_NODE_SIZE, 'SFAT node');
    const hash = reader.u32('name hash');
    const attributes = reader.u32('node attributes');
    const start = reader.u32('data start');
    const end = reader.u32('data end');

    const name =
      (attributes & NAMED_FLAG) !== 0
        ? reader.cstringAt(namesStart + (attributes & 0xffff) * 4, 'file name')
        : `0x${hash.toString(16).padStart(8, '0')}`;

    if (end < start) {
      throw new ParseError('TypeMismatch', `data end precedes data start for "${name}"`, {
        field: 'data end',
        offset: nodesStart + i * SFAT_NODE_SIZE + 12,
      });
    }
    reader.seek(dataOffset + start, 'file data');
    files.set(name, reader.readBytes(end - start, 'file data'));
  }

  return { endian, files };
}

/** Byte order declared by a SARC header's byte-order mark. */
export function sarcEndian(data: Uint8Array): Endian {
  const first = data[6];
  const second = data[7];
  if (first === 0xfe && second === 0xff) return 'big';
  if (first === 0xff && second === 0xfe) return 'little';
  throw new ParseError('BadMagic', 'invalid byte order mark', { field: 'byte order mark', offset: 6 });
}

/* ------------------------------------------------------------------ */
/*  Writing                                                            */
/* ------------------------------------------------------------------ */

/** Alignment an entry's data needs inside the archive. */
export function dataAlignment(data: Uint8Array, minimum = DEFAULT_SARC_ALIGNMENT): number {
  return isSarc(data) || isYaz0(data) ? Math.max(minimum, NESTED_DATA_ALIGNMENT) : minimum;
}

function alignUp(value: number, alignment: number): number {
  const rem = value % alignment;
  return rem === 0 ? value : value + alignment - rem;
}

export function writeSarc(archive: SarcArchive, options: SarcWriteOptions = {}): Uint8Array {
  const minimum = options.alignment ?? DEFAULT_SARC_ALIGNMENT;
  const entries = [...archive.files]
    .map(([name, data]) => ({ name, data, hash: sarcNameHash(name), alignment: dataAlignment(data, minimum) }))
    .sort((a, b) => a.hash - b.hash || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const writer = new BinaryWriter(archive.endian, 0x1000);

  writer.magic(SARC_MAGIC);
  writer.u16(SARC_HEADER_SIZE);
  writer.u16(0xfeff);
  writer.u32(0); // file size
  writer.u32(0); // data offset
  writer.u16(SARC_VERSION);
  writer.u16(0);

  writer.magic('SFAT');
  writer.u16(SFAT_HEADER_SIZE);
  writer.u16(entries.length);
  writer.u32(SARC_HASH_MULTIPLIER);

  const nodesStart = writer.position;
  for (let i = 0; i < entries.length; i++) {
    writer.u32(0);
    writer.u32(0);
    writer.u32(0);
    writer.u32(0);
  }

  writer.magic('SFNT');
  writer.u16(SFNT_HEADER_SIZE);
  writer.u16(0);
  const namesStart = writer.position;
  entries.forEach((entry, i) => {
    const node = nodesStart + i * SFAT_NODE_SIZE;
    writer.setU32At(node, entry.hash);
    writer.setU32At(node + 4, NAMED_FLAG | ((writer.position - namesStart) / 4));
    writer.cstring(entry.name);
    writer.align(4);
  });

  const maxAlignment = entries.reduce((max, entry) => Math.max(max, entry.alignment), minimum);
  writer.seek(alignUp(writer.position, maxAlignment));
  const dataOffset = writer.position;
  writer.setU32At(0x0c, dataOffset);

  entries.forEach((entry, i) => {
    writer.seek(alignUp(writer.position, entry.alignment));
    const node = nodesStart + i * SFAT_NODE_SIZE;
    writer.setU32At(node + 8, writer.position - dataOffset);
    writer.writeBytes(entry.data);
    writer.setU32At(node + 12, writer.position - dataOffset);
  });

  writer.setU32At(0x08, writer.position);
  return writer.toBytes();
}
