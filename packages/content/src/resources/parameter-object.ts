import {
  parameterEquals,
  parameterObjectEquals,
  type Parameter,
  type ParameterObject,
} from '@modmerge/core';
import { DeleteMap } from '../collections/delete-map.js';

/**
 * Parameters of `modified` that are new or differ from `base`. Removed
 * parameters are not recorded: parameter objects diff at value level only.
 */
export function diffParameterObject(base: ParameterObject, modified: ParameterObject): ParameterObject {
  const out: ParameterObject = new Map();
  for (const [hash, param] of modified) {
    const existing = base.get(hash);
    if (existing === undefined || !parameterEquals(existing, param)) out.set(hash, param);
  }
  return out;
}

export function mergeParameterObject(base: ParameterObject, diff: ParameterObject): ParameterObject {
  const out: ParameterObject = new Map(base);
  for (const [hash, param] of diff) out.set(hash, param);
  return out;
}

/** Parameters of an object as a delete-aware map. */
export function parameterMap(obj: ParameterObject): DeleteMap<number, Parameter> {
  return new DeleteMap(obj, parameterEquals);
}

export function objectMap(objects: Iterable<readonly [string, ParameterObject]>): DeleteMap<string, ParameterObject> {
  return new DeleteMap(objects, parameterObjectEquals);
}
