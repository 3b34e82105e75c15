/**
 * Load-order fold.
 *
 * Each mod contributes a diff table against the base. Tables are folded onto
 * the base strictly in load order, so when two mods change the same field the
 * later one wins. Keys no mod touches keep the base's `ResourceData` object.
 */

import type { EngineLogger } from './logger.js';
import {
  diffResourceData,
  mergeResourceData,
  resourceDataEquals,
  type ResourceData,
  type ResourceTable,
} from './resource-data.js';

export interface MergeOptions {
  /** Checked before every resource; aborting throws the signal's reason. */
  signal?: AbortSignal;
  logger?: EngineLogger;
}

/**
 * Per-key diffs of `modified` against `base`. Changed keys hold a diff, keys
 * the base lacks are carried whole, unchanged keys are left out.
 */
export function diffTables(base: ResourceTable, modified: ResourceTable, options: MergeOptions = {}): ResourceTable {
  const { signal, logger = console } = options;
  const diffs: ResourceTable = new Map();
  for (const [key, data] of modified) {
    signal?.throwIfAborted();
    const original = base.get(key);
    if (original === undefined) {
      logger.debug(`[diff] ${key}: new resource`);
      diffs.set(key, data);
    } else if (!resourceDataEquals(original, data)) {
      logger.debug(`[diff] ${key}: changed`);
      diffs.set(key, diffResourceData(original, data));
    }
  }
  return diffs;
}

/** Fold one diff table onto `accumulator`, returning a new table. */
export function mergeIntoTable(
  accumulator: ResourceTable,
  diffTable: ResourceTable,
  options: MergeOptions = {},
): ResourceTable {
  const { signal, logger = console } = options;
  const merged: ResourceTable = new Map(accumulator);
  for (const [key, diff] of diffTable) {
    signal?.throwIfAborted();
    const current: ResourceData | undefined = merged.get(key);
    merged.set(key, current === undefined ? diff : mergeResourceData(current, diff));
    logger.debug(`[merge] ${key}`);
  }
  return merged;
}

/** Fold every mod's diff table onto `base` in the given order. */
export function mergeMods(base: ResourceTable, mods: Iterable<ResourceTable>, options: MergeOptions = {}): ResourceTable {
  let accumulator = base;
  for (const diffTable of mods) {
    accumulator = mergeIntoTable(accumulator, diffTable, options);
  }
  return accumulator;
}
