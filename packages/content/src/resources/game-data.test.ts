import { Byml, SchemaMismatchError, type BymlNode } from '@modmerge/core';
import { describe, expect, it } from 'vitest';
import { GameData, GameDataPack, gameDataType, shardIndex, shardName } from './game-data.js';

function flag(hash: number, init = 0): BymlNode {
  return Byml.record({
    DataName: Byml.string(`Flag_${hash}`),
    HashValue: Byml.int(hash),
    InitValue: Byml.int(init),
  });
}

function gameData(dataType: string, hashes: number[], init = 0): GameData {
  return GameData.fromByml(Byml.hash([[dataType, Byml.array(hashes.map((hash) => flag(hash, init)))]]));
}

function range(count: number): number[] {
  return Array.from({ length: count }, (_, i) => i * 3 + 1);
}

describe('game data naming', () => {
  it('derives the declared data type from the kind', () => {
    expect(gameDataType('s32_data')).toBe('s32_data');
    expect(gameDataType('revival_bool_data')).toBe('bool_data');
    expect(gameDataType('string32_data')).toBe('string_data');
  });

  it('matches shard files of exactly one kind', () => {
    expect(shardName('bool_data', 3)).toBe('/bool_data_3.bgdata');
    expect(shardIndex('bool_data', '/bool_data_3.bgdata')).toBe(3);
    expect(shardIndex('bool_data', 'bool_data_12.bgdata')).toBe(12);
    expect(shardIndex('bool_data', '/bool_array_data_0.bgdata')).toBeUndefined();
    expect(shardIndex('s32_data', '/revival_s32_data_0.bgdata')).toBeUndefined();
  });
});

describe('GameData', () => {
  it('keys flags by their unsigned hash value', () => {
    const data = gameData('bool_data', [-5, 7]);
    expect([...data.flags.keys()]).toEqual([7, 0xfffffffb]);
  });

  it.each([
    [0, []],
    [4096, [4096]],
    [4097, [4096, 1]],
  ])('splits %i flags into shards of %j and joins them back', (count, sizes) => {
    const data = gameData('s32_data', range(count));
    const shards = data.divide();

    expect(shards.map((shard) => shard.flags.size)).toEqual(sizes);
    expect(GameData.fromShards('s32_data', shards).equals(data)).toBe(true);
  });

  it('fills shards in ascending hash order', () => {
    const shards = gameData('bool_data', [9, 3, 5]).divide(2);
    expect(shards.map((shard) => [...shard.flags.keys()])).toEqual([[3, 5], [9]]);
  });

  it('refuses to combine different data types', () => {
    const bools = gameData('bool_data', [1]);
    const ints = gameData('s32_data', [1]);

    expect(() => bools.diff(ints)).toThrow(SchemaMismatchError);
    expect(() => bools.merge(ints)).toThrow(SchemaMismatchError);
  });
});

describe('GameDataPack', () => {
  function pack(boolHashes: number[], init = 0): GameDataPack {
    return new GameDataPack([
      ['bool_data', gameData('bool_data', boolHashes, init)],
      ['revival_s32_data', gameData('s32_data', [100, 200])],
    ]);
  }

  it('writes one shard per capacity block and reads them back', () => {
    const original = pack([1, 2, 3]);
    const archive = original.toSarc('big', 2);

    expect([...archive.files.keys()]).toEqual([
      '/bool_data_0.bgdata',
      '/bool_data_1.bgdata',
      '/revival_s32_data_0.bgdata',
    ]);
    expect(GameDataPack.fromSarc(archive).equals(original)).toBe(true);
    expect(GameDataPack.fromBinary(original.toBinary('little')).equals(original)).toBe(true);
  });

  it('defaults missing kinds to empty data', () => {
    const data = pack([1]).get('vector3f_data');
    expect(data.dataType).toBe('vector3f_data');
    expect(data.flags.size).toBe(0);
  });

  it('diffs and merges each kind separately', () => {
    const base = pack([1, 2]);
    const modified = new GameDataPack([
      ['bool_data', GameData.fromByml(Byml.hash([['bool_data', Byml.array([flag(2, 1), flag(3)])]]))],
      ['revival_s32_data', gameData('s32_data', [100, 200])],
    ]);
    const diff = base.diff(modified);

    expect([...diff.get('bool_data').flags.keys()]).toEqual([2, 3]);
    expect(diff.get('bool_data').flags.deletedKeys()).toEqual([1]);
    expect(diff.get('revival_s32_data').flags.isEmpty()).toBe(true);
    expect(base.merge(diff).equals(modified)).toBe(true);
  });

  it('rejects data whose type does not fit the kind', () => {
    expect(() => new GameDataPack([['s32_data', gameData('bool_data', [])]])).toThrow(SchemaMismatchError);
  });
});
