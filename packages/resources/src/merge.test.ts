import { Byml, SchemaMismatchError, type BymlNode } from '@modmerge/core';
import { AreaData, type MergeableResource } from '@modmerge/content';
import { describe, expect, it, vi } from 'vitest';
import { BinaryResource } from './binary-resource.js';
import { diffTables, mergeIntoTable, mergeMods } from './merge.js';
import { binaryData, mergeableData, type ResourceTable } from './resource-data.js';

const AREA_KEY = 'Ecosystem/AreaData.byml';
const logger = { debug: vi.fn(), warn: vi.fn() };

function areaTable(climates: Record<number, string>): ResourceTable {
  const areas: BymlNode[] = Object.entries(climates).map(([num, climate]) =>
    Byml.record({ AreaNumber: Byml.int(Number(num)), Climate: Byml.string(climate) }),
  );
  return new Map([
    [AREA_KEY, mergeableData(AreaData.fromByml(Byml.array(areas)))],
    ['x.dat', binaryData(BinaryResource.agnostic(Uint8Array.from([1, 2, 3])))],
  ]);
}

function climates(table: ResourceTable): Record<number, string> {
  const data = table.get(AREA_KEY);
  const resource: MergeableResource | undefined = data?.type === 'mergeable' ? data.resource : undefined;
  if (!(resource instanceof AreaData)) throw new Error('area data missing');
  const out: Record<number, string> = {};
  for (const [num, node] of resource.areas) {
    const climate = node.type === 'hash' ? node.value.get('Climate') : undefined;
    out[num] = climate?.type === 'string' ? climate.value : '';
  }
  return out;
}

describe('mergeMods', () => {
  const base = areaTable({ 1: 'Temperate', 2: 'Snow' });

  it('merges disjoint mods to the same result in either order', () => {
    const mod1 = diffTables(base, areaTable({ 1: 'Desert', 2: 'Snow' }), { logger });
    const mod2 = diffTables(base, areaTable({ 1: 'Temperate', 2: 'Snow', 3: 'Jungle' }), { logger });

    const expected = { 1: 'Desert', 2: 'Snow', 3: 'Jungle' };
    expect(climates(mergeMods(base, [mod1, mod2], { logger }))).toEqual(expected);
    expect(climates(mergeMods(base, [mod2, mod1], { logger }))).toEqual(expected);
  });

  it('lets the last mod in load order win a conflict', () => {
    const mod1 = diffTables(base, areaTable({ 1: 'Temperate', 2: 'Desert' }), { logger });
    const mod2 = diffTables(base, areaTable({ 1: 'Temperate', 2: 'Jungle' }), { logger });

    expect(climates(mergeMods(base, [mod1, mod2], { logger }))[2]).toBe('Jungle');
    expect(climates(mergeMods(base, [mod2, mod1], { logger }))[2]).toBe('Desert');
  });

  it('propagates removals', () => {
    const mod = diffTables(base, areaTable({ 1: 'Temperate' }), { logger });
    expect(climates(mergeMods(base, [mod], { logger }))).toEqual({ 1: 'Temperate' });
  });

  it('keeps untouched resources as the same objects', () => {
    const mod = diffTables(base, areaTable({ 1: 'Desert', 2: 'Snow' }), { logger });
    const merged = mergeMods(base, [mod], { logger });

    expect([...mod.keys()]).toEqual([AREA_KEY]);
    expect(merged.get('x.dat')).toBe(base.get('x.dat'));
    expect(merged).not.toBe(base);
  });

  it('leaves the base unchanged when every mod is empty', () => {
    const empty = diffTables(base, areaTable({ 1: 'Temperate', 2: 'Snow' }), { logger });

    expect(empty.size).toBe(0);
    expect(climates(mergeMods(base, [empty, empty], { logger }))).toEqual({ 1: 'Temperate', 2: 'Snow' });
  });

  it('carries resources the base lacks whole', () => {
    const modified = areaTable({ 1: 'Temperate', 2: 'Snow' });
    const extra = binaryData(BinaryResource.agnostic(Uint8Array.from([9])));
    modified.set('y.dat', extra);

    const mod = diffTables(base, modified, { logger });
    expect(mod.get('y.dat')).toBe(extra);
    expect(mergeIntoTable(base, mod, { logger }).get('y.dat')).toBe(extra);
  });

  it('stops between resources once aborted', () => {
    const controller = new AbortController();
    const mod = diffTables(base, areaTable({ 1: 'Desert' }), { logger });
    controller.abort(new Error('merge cancelled'));

    expect(() => mergeMods(base, [mod], { logger, signal: controller.signal })).toThrow('merge cancelled');
  });

  it('refuses to combine different resource variants', () => {
    const modified: ResourceTable = new Map([[AREA_KEY, binaryData(BinaryResource.agnostic(Uint8Array.from([0])))]]);
    expect(() => diffTables(base, modified, { logger })).toThrow(SchemaMismatchError);
  });
});
