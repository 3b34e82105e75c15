import {
  ParseError,
  UnsupportedFormatError,
  canonicalKey,
  decompressIfYaz0,
  detectBymlEndian,
  isParameterIO,
  isSarc,
  parseSarc,
  readMagic,
  sarcEndian,
  type Endian,
} from '@modmerge/core';
import { GENERIC_PARAMETER_SCHEMA, schemaForPath } from '@modmerge/content';
import { ArchiveMap } from './archive-map.js';
import { BinaryResource } from './binary-resource.js';
import { archiveData, binaryData, mergeableData, type ResourceData } from './resource-data.js';

/** Byte order of a BYML or SARC payload; undefined for platform-agnostic data. */
export function payloadEndian(data: Uint8Array): Endian | undefined {
  const byml = detectBymlEndian(data);
  if (byml !== undefined) return byml;
  return isSarc(data) ? sarcEndian(data) : undefined;
}

/**
 * Parse one file into a {@link ResourceData}.
 *
 * Yaz0 compression is removed first. The canonical path selects a typed
 * schema when one matches; otherwise the payload's magic decides: a
 * parameter archive becomes a generic parameter resource, a BYML document a
 * platform-specific binary, a SARC an archive map (its members are not
 * parsed here, see `loadResourceTree`).
 *
 * @throws ParseError carrying the canonical path, or UnsupportedFormatError
 *   when nothing matches.
 */
export function identifyAndParse(path: string, bytes: Uint8Array): ResourceData {
  const canonical = canonicalKey(path);
  try {
    const data = decompressIfYaz0(bytes);
    const schema = schemaForPath(canonical);
    if (schema) {
      return mergeableData(schema.parse(data), { raw: bytes, endian: payloadEndian(data) });
    }
    if (isParameterIO(data)) {
      return mergeableData(GENERIC_PARAMETER_SCHEMA.parse(data), { raw: bytes });
    }
    const bymlEndian = detectBymlEndian(data);
    if (bymlEndian !== undefined) {
      return binaryData(BinaryResource.forEndian(bymlEndian, data), { raw: bytes, endian: bymlEndian });
    }
    if (isSarc(data)) {
      return archiveData(ArchiveMap.fromSarc(parseSarc(data)));
    }
    throw new UnsupportedFormatError(canonical, readMagic(data, 4));
  } catch (err) {
    throw err instanceof ParseError ? err.withPath(canonical) : err;
  }
}
