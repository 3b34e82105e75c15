export type { EngineLogger } from './logger.js';
export { BinaryResource } from './binary-resource.js';
export type { BinaryVariant, PlatformBytes } from './binary-resource.js';
export {
  archiveData,
  binaryData,
  diffResourceData,
  mergeResourceData,
  mergeableData,
  resourceDataEquals,
  resourceDataToBinary,
  reusableSource,
} from './resource-data.js';
export type { ArchiveSource, ResourceData, ResourceSource, ResourceTable } from './resource-data.js';
export { ArchiveMap } from './archive-map.js';
export type { ArchiveWriteOptions } from './archive-map.js';
export { identifyAndParse, payloadEndian } from './dispatch.js';
export { findMissingResources, loadResourceTree } from './resource-tree.js';
export type { LoadOptions, ResourceTree } from './resource-tree.js';
export { diffTables, mergeIntoTable, mergeMods } from './merge.js';
export type { MergeOptions } from './merge.js';
export { ARCHIVE_MEMBER_SEPARATOR, AREA_DATA_FALLBACK, AREA_DATA_PATH, DirectoryDump, applyAreaDataLog } from './dump.js';
export type { ResourceDump } from './dump.js';
