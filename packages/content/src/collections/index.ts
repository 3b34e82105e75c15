export { DeleteMap, SortedDeleteMap, compareKeys } from './delete-map.js';
export type { EntryState } from './delete-map.js';
export { DeleteSet } from './delete-set.js';
export { DeleteVec } from './delete-vec.js';
export { mergeableEquals, settle } from './mergeable.js';
export type { Mergeable, ValueEquals } from './mergeable.js';
export { valueEquals } from './value-equals.js';
