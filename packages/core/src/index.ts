/**
 * @modmerge/core — Binary codecs (Yaz0, AAMP, BYML, SARC), name hashing,
 * the error taxonomy and the mod manifest.
 */

export { ResourceError, ParseError, SchemaMismatchError, MissingResourceError, UnsupportedFormatError } from './errors.js';
export type { ParseErrorKind, ParseErrorDetails } from './errors.js';

export { BinaryReader, BinaryWriter, hasMagic, platformLabel, readMagic } from './binary/index.js';
export type { Endian } from './binary/index.js';

export { crc32 } from './hash/crc32.js';
export { PLAIN_S_EXTENSIONS, canonicalKey, isCompressedName } from './path/canonical-key.js';
export { YAZ0_MAGIC, compressYaz0, decompressIfYaz0, decompressYaz0, isYaz0 } from './yaz0/index.js';

export * from './aamp/index.js';
export * from './byml/index.js';
export * from './sarc/index.js';

export {
  AOC_PREFIX,
  createManifest,
  extendManifest,
  clearManifest,
  isManifestEmpty,
  manifestResources,
  serializeManifest,
  parseManifest,
} from './manifest/mod-manifest.js';
export type { Manifest } from './manifest/mod-manifest.js';
