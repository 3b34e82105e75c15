export { RESOURCE_KINDS } from './resource.js';
export type { Resource, ResourceKind } from './resource.js';
export { diffParameterObject, mergeParameterObject, objectMap, parameterMap } from './parameter-object.js';
export { bymlFields, nodeMap, sortedNodeMap } from './byml-fields.js';
export type { BymlFields } from './byml-fields.js';
export { ActorLink } from './actor-link.js';
export { AttClientList } from './att-client-list.js';
export { DropTable } from './drop-table.js';
export { GeneralParamList, parameterGroups } from './general-param-list.js';
export type { ParameterGroups } from './general-param-list.js';
export { GenericParameter, ParameterTree } from './generic-parameter.js';
export { ActorInfo } from './actor-info.js';
export { ResidentActors } from './resident-actors.js';
export { EventInfo } from './event-info.js';
export { AreaData } from './area-data.js';
export { StaticMap, entryPosEquals } from './static-map.js';
export type { EntryPos, GeneralArrays, StartPositions } from './static-map.js';
export {
  DEFAULT_SHARD_CAPACITY,
  GAME_DATA_KINDS,
  GameData,
  GameDataPack,
  gameDataType,
  shardIndex,
  shardName,
} from './game-data.js';
export type { GameDataKind } from './game-data.js';
export {
  GENERIC_PARAMETER_SCHEMA,
  RESOURCE_SCHEMAS,
  diffResource,
  mergeResource,
  resourceToBinary,
  resourcesEqual,
  schemaForPath,
} from './mergeable-resource.js';
export type { MergeableResource, ResourceSchema } from './mergeable-resource.js';
