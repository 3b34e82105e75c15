export {
  DEFAULT_BYML_VERSION,
  Byml,
  bymlEquals,
  expectHash,
  expectArray,
  expectString,
  expectBool,
  expectInt,
  expectFloat,
  expectMember,
} from './byml-types.js';
export type { BymlNode, BymlType, BymlHash, BymlDocument } from './byml-types.js';
export { BYML_HEADER_SIZE, NodeType, detectBymlEndian, isByml, parseByml } from './byml-parser.js';
export { writeByml, writeBymlDocument } from './byml-writer.js';
