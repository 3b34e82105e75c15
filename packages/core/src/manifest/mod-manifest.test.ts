import { describe, it, expect } from 'vitest';
import {
  AOC_PREFIX,
  clearManifest,
  createManifest,
  extendManifest,
  isManifestEmpty,
  manifestResources,
  parseManifest,
  serializeManifest,
} from './mod-manifest.js';

describe('Manifest', () => {
  it('creates an empty manifest', () => {
    const m = createManifest();
    expect(m.content.size).toBe(0);
    expect(m.aoc.size).toBe(0);
    expect(isManifestEmpty(m)).toBe(true);
  });

  it('unions another manifest into the target', () => {
    const m = createManifest(['Actor/Pack/A.sbactorpack'], ['Map/MainField/A-1/A-1_Static.smubin']);
    extendManifest(m, createManifest(['Actor/Pack/A.sbactorpack', 'Pack/Bootup.pack'], []));

    expect([...m.content].sort()).toEqual(['Actor/Pack/A.sbactorpack', 'Pack/Bootup.pack']);
    expect([...m.aoc]).toEqual(['Map/MainField/A-1/A-1_Static.smubin']);
    expect(isManifestEmpty(m)).toBe(false);
  });

  it('clears both path sets', () => {
    const m = createManifest(['a'], ['b']);
    clearManifest(m);
    expect(isManifestEmpty(m)).toBe(true);
  });

  it('maps paths to resource keys', () => {
    const m = createManifest(
      ['Pack/Bootup.pack', 'Actor/Pack/A.sbactorpack'],
      ['Pack/AocMainField.pack', 'Map/MainField/Static.smubin'],
    );

    expect(manifestResources(m)).toEqual([
      'Actor/Pack/A.bactorpack',
      'Pack/Bootup.pack',
      `${AOC_PREFIX}Map/MainField/Static.mubin`,
      'Aoc/0010/Pack/AocMainField.pack',
    ]);
  });

  it('strips the compression marker only from the extension', () => {
    const m = createManifest(['Event.sX/Demo.sbeventpack', 'Sound/Resource/Test.sarc', 'Physics/A-1.shksc']);

    expect(manifestResources(m)).toEqual([
      'Event.sX/Demo.beventpack',
      'Physics/A-1.hksc',
      'Sound/Resource/Test.sarc',
    ]);
  });
});

describe('manifest serialization', () => {
  it('produces deterministic JSON regardless of insertion order', () => {
    const a = createManifest(['b.bxml', 'a.bxml'], ['z.sbyml']);
    const b = createManifest(['a.bxml', 'b.bxml'], ['z.sbyml']);

    const json = serializeManifest(a);
    expect(json).toBe(serializeManifest(b));
    expect(json).toBe('{\n  "content": [\n    "a.bxml",\n    "b.bxml"\n  ],\n  "aoc": [\n    "z.sbyml"\n  ]\n}\n');
  });

  it('parses what it serializes', () => {
    const m = createManifest(['Actor/Pack/A.sbactorpack'], ['Pack/AocMainField.pack']);
    const parsed = parseManifest(serializeManifest(m));

    expect(parsed).not.toBeNull();
    expect(parsed?.content).toEqual(new Set(['Actor/Pack/A.sbactorpack']));
    expect(parsed?.aoc).toEqual(new Set(['Pack/AocMainField.pack']));
  });

  it('returns null for invalid input', () => {
    expect(parseManifest('not json')).toBeNull();
    expect(parseManifest('[]')).toBeNull();
    expect(parseManifest('{"content": ["a"]}')).toBeNull();
    expect(parseManifest('{"content": [1], "aoc": []}')).toBeNull();
  });
});
