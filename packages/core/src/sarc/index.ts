export {
  SARC_MAGIC,
  SARC_HASH_MULTIPLIER,
  DEFAULT_SARC_ALIGNMENT,
  NESTED_DATA_ALIGNMENT,
  isSarc,
  createSarc,
  sarcNameHash,
  parseSarc,
  sarcEndian,
  dataAlignment,
  writeSarc,
} from './sarc.js';
export type { SarcArchive, SarcWriteOptions } from './sarc.js';
