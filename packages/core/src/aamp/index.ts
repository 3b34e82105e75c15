export {
  PARAMETER_TYPES,
  ROOT_LIST_NAME,
  VECTOR_LENGTHS,
  CURVE_COUNTS,
  CURVE_FLOAT_COUNT,
  Param,
  nameHash,
  createParameterList,
  createParameterIO,
  parameterObject,
  isCurveParameter,
  numericValues,
  parameterEquals,
  parameterObjectEquals,
  parameterListEquals,
  objectByName,
  listByName,
  expectParameterObject,
  expectParameterList,
  expectParam,
  expectStringParam,
  expectIntParam,
} from './parameter-types.js';
export type {
  ParameterType,
  VectorType,
  StringType,
  CurveType,
  NumberBufferType,
  Curve,
  Parameter,
  ParameterObject,
  ParameterList,
  ParameterIO,
} from './parameter-types.js';
export { AAMP_MAGIC, AAMP_VERSION, AAMP_HEADER_SIZE, isParameterIO, parseParameterIO } from './aamp-parser.js';
export { writeParameterIO } from './aamp-writer.js';
