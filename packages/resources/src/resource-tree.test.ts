import {
  MissingResourceError,
  Param,
  UnsupportedFormatError,
  compressYaz0,
  createManifest,
  createSarc,
  isYaz0,
  manifestResources,
  parameterObject,
  parseSarc,
  writeSarc,
} from '@modmerge/core';
import { ActorLink, DeleteSet } from '@modmerge/content';
import { describe, expect, it, vi } from 'vitest';
import { ArchiveMap } from './archive-map.js';
import { diffTables, mergeMods } from './merge.js';
import { resourceDataToBinary } from './resource-data.js';
import { findMissingResources, loadResourceTree, type ResourceTree } from './resource-tree.js';

const text = (value: string): Uint8Array => new TextEncoder().encode(value);

function link(model: string): ActorLink {
  return new ActorLink(parameterObject([['ModelUser', Param.string64(model)]]), new DeleteSet(['Enemy']));
}

function silentLogger() {
  return { debug: vi.fn(), warn: vi.fn() };
}

function rootArchive({ root, table }: ResourceTree): ArchiveMap {
  const data = table.get(root);
  if (data?.type !== 'archive') throw new Error(`${root} is not an archive`);
  return data.map;
}

/** Valid Yaz0 that stores every byte as a literal, as some other encoders do. */
function literalYaz0(data: Uint8Array): Uint8Array {
  const size = data.byteLength;
  const out = [0x59, 0x61, 0x7a, 0x30, size >>> 24, (size >>> 16) & 0xff, (size >>> 8) & 0xff, size & 0xff];
  out.push(0, 0, 0, 0, 0, 0, 0, 0);
  for (let i = 0; i < size; i += 8) {
    out.push(0xff, ...data.subarray(i, i + 8));
  }
  return Uint8Array.from(out);
}

function actorPack(model: string): Uint8Array {
  return writeSarc(
    createSarc('big', [
      ['Actor/ActorLink/Test.bxml', link(model).toBinary('big')],
      ['Actor/Physics/Test.bphysics', text('OPAQUE physics data')],
    ]),
  );
}

/** Root archive whose nested actor pack was compressed by a foreign encoder. */
function foreignPack(otherModel: string): Uint8Array {
  return writeSarc(
    createSarc('big', [
      ['Actor/Pack/Test.sbactorpack', literalYaz0(actorPack('Model_A'))],
      ['Actor/ActorLink/Other.bxml', link(otherModel).toBinary('big')],
      ['Physics/StaticCompound/A-1.shksc', literalYaz0(text('HKSC collision data'))],
    ]),
  );
}

function pack(model: string): Uint8Array {
  const actorPack = writeSarc(
    createSarc('big', [
      ['Actor/ActorLink/Test.bxml', link(model).toBinary('big')],
      ['Actor/Physics/Test.bphysics', text('OPAQUE physics data')],
    ]),
  );
  return writeSarc(
    createSarc('big', [
      ['Actor/Pack/Test.sbactorpack', compressYaz0(actorPack)],
      ['x.dat', text('XDAT untouched bytes')],
    ]),
  );
}

describe('loadResourceTree', () => {
  it('registers every nested member under its canonical key', () => {
    const logger = silentLogger();
    const { root, table } = loadResourceTree('Pack/Test.pack', pack('Model_A'), { logger });

    expect(root).toBe('Pack/Test.pack');
    expect([...table.keys()].sort()).toEqual([
      'Actor/ActorLink/Test.bxml',
      'Actor/Pack/Test.bactorpack',
      'Actor/Physics/Test.bphysics',
      'Pack/Test.pack',
      'x.dat',
    ]);
    expect(table.get('Actor/Physics/Test.bphysics')?.type).toBe('binary');
    expect(logger.debug).toHaveBeenCalledWith('[load] keeping x.dat as opaque data (header "XDAT")');
  });

  it('rejects an unidentifiable top-level file', () => {
    expect(() => loadResourceTree('x.dat', text('XDAT'), { logger: silentLogger() })).toThrow(UnsupportedFormatError);
  });

  it('writes an untouched tree back byte for byte', () => {
    const bytes = pack('Model_A');
    const tree = loadResourceTree('Pack/Test.pack', bytes, { logger: silentLogger() });
    const data = tree.table.get(tree.root);

    expect(data?.type).toBe('archive');
    expect(data && resourceDataToBinary(data, 'big', tree.table)).toEqual(bytes);
  });

  it('copies untouched members through when another member changes', () => {
    const logger = silentLogger();
    const base = loadResourceTree('Pack/Test.pack', pack('Model_A'), { logger });
    const modified = loadResourceTree('Pack/Test.pack', pack('Model_B'), { logger });

    const diffs = diffTables(base.table, modified.table, { logger });
    expect([...diffs.keys()]).toEqual(['Actor/ActorLink/Test.bxml']);

    const merged = mergeMods(base.table, [diffs], { logger });
    const rebuilt = rootArchive({ root: base.root, table: merged }).toBinary('big', merged);
    const output = parseSarc(rebuilt);
    const original = parseSarc(pack('Model_A'));

    expect(merged.get('x.dat')).toBe(base.table.get('x.dat'));
    expect(output.files.get('x.dat')).toEqual(original.files.get('x.dat'));
    expect(output.files.get('Actor/Pack/Test.sbactorpack')).not.toEqual(
      original.files.get('Actor/Pack/Test.sbactorpack'),
    );
    expect(rebuilt).toEqual(pack('Model_B'));
  });
});

describe('untouched members', () => {
  it('copies a compressed opaque member through as stored', () => {
    const bytes = foreignPack('Model_A');
    const tree = loadResourceTree('Pack/Test.pack', bytes, { logger: silentLogger() });
    const stored = parseSarc(bytes).files.get('Physics/StaticCompound/A-1.shksc');

    const rebuilt = parseSarc(rootArchive(tree).toBinary('big', tree.table));
    const member = rebuilt.files.get('Physics/StaticCompound/A-1.shksc');

    expect(member && isYaz0(member)).toBe(true);
    expect(member).toEqual(stored);
  });

  it('keeps the stored bytes of a nested archive nobody changed', () => {
    const bytes = foreignPack('Model_A');
    const tree = loadResourceTree('Pack/Test.pack', bytes, { logger: silentLogger() });
    const stored = parseSarc(bytes).files.get('Actor/Pack/Test.sbactorpack');

    const rebuilt = parseSarc(rootArchive(tree).toBinary('big', tree.table));

    expect(rebuilt.files.get('Actor/Pack/Test.sbactorpack')).toEqual(stored);
  });

  it('keeps the stored bytes of a nested archive when a sibling member changes', () => {
    const logger = silentLogger();
    const base = loadResourceTree('Pack/Test.pack', foreignPack('Model_A'), { logger });
    const modified = loadResourceTree('Pack/Test.pack', foreignPack('Model_B'), { logger });

    const diffs = diffTables(base.table, modified.table, { logger });
    expect([...diffs.keys()]).toEqual(['Actor/ActorLink/Other.bxml']);

    const merged = mergeMods(base.table, [diffs], { logger });
    const rebuilt = rootArchive({ root: base.root, table: merged }).toBinary('big', merged);

    expect(rebuilt).toEqual(foreignPack('Model_B'));
  });

  it('re-encodes a nested archive once one of its members changes', () => {
    const logger = silentLogger();
    const base = loadResourceTree('Pack/Test.pack', foreignPack('Model_A'), { logger });
    const merged = new Map(base.table);
    const changed = loadResourceTree('Actor/ActorLink/Test.bxml', link('Model_C').toBinary('big'), { logger });
    const data = changed.table.get(changed.root);
    if (data === undefined) throw new Error('missing resource');
    merged.set('Actor/ActorLink/Test.bxml', data);

    const rebuilt = parseSarc(rootArchive(base).toBinary('big', merged));

    expect(rebuilt.files.get('Actor/Pack/Test.sbactorpack')).toEqual(compressYaz0(actorPack('Model_C')));
  });
});

describe('manifest keys', () => {
  it('match the keys loaded archive members are stored under', () => {
    const members = [
      'Actor/Pack/Test.sbactorpack',
      'Physics/StaticCompound/A-1.shksc',
      'Sound/Resource/Test.sarc',
    ];
    const bytes = writeSarc(
      createSarc('big', [
        ['Actor/Pack/Test.sbactorpack', compressYaz0(actorPack('Model_A'))],
        ['Physics/StaticCompound/A-1.shksc', literalYaz0(text('HKSC collision data'))],
        ['Sound/Resource/Test.sarc', writeSarc(createSarc('big', [['Sound/Test.bars', text('BARS sound')]]))],
      ]),
    );
    const { table } = loadResourceTree('Pack/Test.pack', bytes, { logger: silentLogger() });

    const keys = manifestResources(createManifest(members));
    expect(keys).toEqual(['Actor/Pack/Test.bactorpack', 'Physics/StaticCompound/A-1.hksc', 'Sound/Resource/Test.sarc']);
    for (const key of keys) expect(table.has(key)).toBe(true);
  });
});

describe('ArchiveMap', () => {
  it('fails on an entry whose resource is missing', () => {
    const tree = loadResourceTree('Pack/Test.pack', pack('Model_A'), { logger: silentLogger() });
    tree.table.delete('x.dat');

    expect(() => rootArchive(tree).toBinary('big', tree.table)).toThrow(MissingResourceError);
  });

  it('can skip missing entries and report them', () => {
    const logger = silentLogger();
    const tree = loadResourceTree('Pack/Test.pack', pack('Model_A'), { logger });
    tree.table.delete('x.dat');
    const failures: MissingResourceError[] = [];

    const output = rootArchive(tree).toSarc('big', tree.table, { onMissing: 'skip', failures, logger });

    expect([...output.files.keys()]).toEqual(['Actor/Pack/Test.sbactorpack']);
    expect(failures).toHaveLength(1);
    expect(failures[0]).toMatchObject({ canonical: 'x.dat', entryPath: 'x.dat' });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('diffs entries as a delete-aware map', () => {
    const base = ArchiveMap.fromSarc(createSarc('big', [['a.txt', text('a')], ['b.txt', text('b')]]));
    const modified = ArchiveMap.fromSarc(createSarc('big', [['a.txt', text('a')], ['c.txt', text('c')]]));
    const diff = base.diff(modified);

    expect(diff.entries.deletedKeys()).toEqual(['b.txt']);
    expect([...diff.entries.keys()]).toEqual(['c.txt']);
    expect(base.merge(diff).equals(modified)).toBe(true);
  });
});

describe('findMissingResources', () => {
  it('reports unresolved entries with the archive path that references them', () => {
    const { root, table } = loadResourceTree('Pack/Test.pack', pack('Model_A'), { logger: silentLogger() });
    expect(findMissingResources(table, root)).toEqual([]);

    table.delete('Actor/ActorLink/Test.bxml');
    const missing = findMissingResources(table, root);

    expect(missing).toHaveLength(1);
    expect(missing[0]).toMatchObject({ canonical: 'Actor/ActorLink/Test.bxml', entryPath: 'Actor/ActorLink/Test.bxml' });
  });
});
