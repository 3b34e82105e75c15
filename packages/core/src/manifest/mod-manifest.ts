/**
 * Mod manifest — the base-content and add-on-content paths a mod (or a merged
 * load order) touches.
 *
 * Used by the merge pipeline to:
 *  - Scope which resources must be rebuilt after a merge
 *  - Aggregate the footprint of every enabled mod
 */

import { canonicalKey } from '../path/canonical-key.js';

/** Virtual directory that add-on-content resources live under in the resource table. */
export const AOC_PREFIX = 'Aoc/0010/';

export interface Manifest {
  /** Base-content paths, relative to the content root. */
  content: Set<string>;
  /** Add-on-content paths, relative to the add-on root. */
  aoc: Set<string>;
}

interface SerializedManifest {
  content: string[];
  aoc: string[];
}

export function createManifest(content: Iterable<string> = [], aoc: Iterable<string> = []): Manifest {
  return { content: new Set(content), aoc: new Set(aoc) };
}

/**
 * Union `other` into `target`.
 */
export function extendManifest(target: Manifest, other: Manifest): void {
  for (const path of other.content) target.content.add(path);
  for (const path of other.aoc) target.aoc.add(path);
}

export function clearManifest(manifest: Manifest): void {
  manifest.content.clear();
  manifest.aoc.clear();
}

export function isManifestEmpty(manifest: Manifest): boolean {
  return manifest.content.size === 0 && manifest.aoc.size === 0;
}

/**
 * Resource-table keys for every path in the manifest, as {@link canonicalKey}
 * computes them; add-on paths are moved under {@link AOC_PREFIX}. Content
 * keys come first, each group in sorted order.
 */
export function manifestResources(manifest: Manifest): string[] {
  return [
    ...[...manifest.content].sort().map(canonicalKey),
    ...[...manifest.aoc].sort().map((path) => AOC_PREFIX + canonicalKey(path)),
  ];
}

/**
 * Serialize manifest to deterministic JSON (sorted paths, 2-space indent).
 */
export function serializeManifest(manifest: Manifest): string {
  const sorted: SerializedManifest = {
    content: [...manifest.content].sort(),
    aoc: [...manifest.aoc].sort(),
  };
  return JSON.stringify(sorted, null, 2) + '\n';
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Parse a manifest from JSON string. Returns null if invalid.
 */
export function parseManifest(json: string): Manifest | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null) return null;
  const content: unknown = Reflect.get(parsed, 'content');
  const aoc: unknown = Reflect.get(parsed, 'aoc');
  if (!isStringArray(content) || !isStringArray(aoc)) return null;
  return createManifest(content, aoc);
}
