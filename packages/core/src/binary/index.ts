export { BinaryReader } from './binary-reader.js';
export { BinaryWriter } from './binary-writer.js';
export { hasMagic, platformLabel, readMagic } from './endian.js';
export type { Endian } from './endian.js';
