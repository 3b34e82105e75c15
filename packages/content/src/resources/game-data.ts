/**
 * Game flag data.
 *
 * The game stores its flags in `GameData/gamedata.sarc`, split per flag kind
 * into BYML shards of at most 4096 flags (`/bool_data_0.bgdata`,
 * `/bool_data_1.bgdata`, ...). Each shard is a one-member hash
 * `{ <data type>: [flag, ...] }` where every flag carries its `HashValue`.
 *
 * Shards are joined into one map per kind when read and split again when
 * written, so diff and merge only ever see the joined view.
 */

import {
  Byml,
  SchemaMismatchError,
  bymlEquals,
  createSarc,
  expectArray,
  expectHash,
  expectInt,
  expectMember,
  parseByml,
  parseSarc,
  writeByml,
  writeSarc,
  ParseError,
  type BymlNode,
  type Endian,
  type SarcArchive,
} from '@modmerge/core';
import { SortedDeleteMap } from '../collections/delete-map.js';
import type { Mergeable } from '../collections/mergeable.js';
import type { Resource } from './resource.js';

export const DEFAULT_SHARD_CAPACITY = 4096;

export const GAME_DATA_KINDS = [
  'bool_array_data',
  'bool_data',
  'f32_array_data',
  'f32_data',
  'revival_bool_data',
  'revival_s32_data',
  's32_array_data',
  's32_data',
  'string32_data',
  'string64_array_data',
  'string64_data',
  'string256_array_data',
  'string256_data',
  'vector2f_array_data',
  'vector2f_data',
  'vector3f_array_data',
  'vector3f_data',
  'vector4f_data',
] as const;

export type GameDataKind = (typeof GAME_DATA_KINDS)[number];

/** Data type a kind's shards declare as their single hash key. */
export function gameDataType(kind: GameDataKind): string {
  if (kind === 'string32_data') return 'string_data';
  return kind.startsWith('revival_') ? kind.slice('revival_'.length) : kind;
}

export function shardName(kind: GameDataKind, index: number): string {
  return `/${kind}_${index}.bgdata`;
}

/** Shard index of `name` for `kind`, or undefined when the file belongs elsewhere. */
export function shardIndex(kind: GameDataKind, name: string): number | undefined {
  const match = new RegExp(`^/?${kind}_(\\d+)\\.bgdata$`).exec(name);
  return match?.[1] === undefined ? undefined : Number(match[1]);
}

/** Flags of one data type keyed by their unsigned `HashValue`. */
export class GameData implements Mergeable<GameData> {
  constructor(
    readonly dataType: string,
    readonly flags: SortedDeleteMap<number, BymlNode> = new SortedDeleteMap<number, BymlNode>(undefined, bymlEquals),
  ) {}

  static fromByml(root: BymlNode): GameData {
    const hash = expectHash(root, 'root');
    const first = hash.entries().next();
    if (first.done === true) {
      throw new ParseError('TypeMismatch', 'game data shard has no data type key', { field: 'data type' });
    }
    const [dataType, list] = first.value;
    const flags = new SortedDeleteMap<number, BymlNode>(undefined, bymlEquals);
    for (const flag of expectArray(list, dataType)) {
      const value = expectInt(expectMember(expectHash(flag, dataType), 'HashValue'), 'HashValue');
      flags.set(value >>> 0, flag);
    }
    return new GameData(dataType, flags);
  }

  /** Join shards in order; later shards win on duplicate hashes. */
  static fromShards(dataType: string, shards: Iterable<GameData>): GameData {
    let joined = new GameData(dataType);
    for (const shard of shards) joined = joined.merge(shard);
    return joined;
  }

  toByml(): BymlNode {
    return Byml.hash([[this.dataType, Byml.array(this.flags.values())]]);
  }

  /** Split into `ceil(size / capacity)` shards in ascending hash order. */
  divide(capacity = DEFAULT_SHARD_CAPACITY): GameData[] {
    const shards: GameData[] = [];
    let current: GameData | undefined;
    for (const [hash, flag] of this.flags) {
      if (current === undefined || current.flags.size >= capacity) {
        current = new GameData(this.dataType);
        shards.push(current);
      }
      current.flags.set(hash, flag);
    }
    return shards;
  }

  diff(other: GameData): GameData {
    this.assertSameType('diff', other);
    return new GameData(this.dataType, this.flags.diff(other.flags));
  }

  merge(diff: GameData): GameData {
    this.assertSameType('merge', diff);
    return new GameData(this.dataType, this.flags.merge(diff.flags));
  }

  equals(other: GameData): boolean {
    return this.dataType === other.dataType && this.flags.equals(other.flags);
  }

  private assertSameType(operation: string, other: GameData): void {
    if (other.dataType !== this.dataType) {
      throw new SchemaMismatchError(operation, this.dataType, other.dataType);
    }
  }
}

/** The complete flag pack: one joined {@link GameData} per kind. */
export class GameDataPack implements Resource<GameDataPack> {
  readonly kind = 'GameDataPack' as const;
  static readonly pathPattern = /^GameData\/gamedata\.sarc$/;

  private readonly data = new Map<GameDataKind, GameData>();

  constructor(data: Iterable<readonly [GameDataKind, GameData]> = []) {
    for (const [kind, gameData] of data) {
      if (gameData.dataType !== gameDataType(kind)) {
        throw new SchemaMismatchError('build', gameDataType(kind), gameData.dataType);
      }
      this.data.set(kind, gameData);
    }
  }

  static fromBinary(bytes: Uint8Array): GameDataPack {
    return GameDataPack.fromSarc(parseSarc(bytes));
  }

  static fromSarc(archive: SarcArchive): GameDataPack {
    return new GameDataPack(
      GAME_DATA_KINDS.map((kind) => {
        const shards: [number, GameData][] = [];
        for (const [name, bytes] of archive.files) {
          const index = shardIndex(kind, name);
          if (index === undefined) continue;
          try {
            shards.push([index, GameData.fromByml(parseByml(bytes).root)]);
          } catch (err) {
            throw err instanceof ParseError ? err.withPath(name) : err;
          }
        }
        shards.sort((a, b) => a[0] - b[0]);
        return [kind, GameData.fromShards(gameDataType(kind), shards.map(([, shard]) => shard))] as const;
      }),
    );
  }

  get(kind: GameDataKind): GameData {
    return this.data.get(kind) ?? new GameData(gameDataType(kind));
  }

  toSarc(endian: Endian, capacity = DEFAULT_SHARD_CAPACITY): SarcArchive {
    const archive = createSarc(endian);
    for (const kind of GAME_DATA_KINDS) {
      this.get(kind)
        .divide(capacity)
        .forEach((shard, i) => archive.files.set(shardName(kind, i), writeByml(shard.toByml(), endian)));
    }
    return archive;
  }

  toBinary(endian: Endian): Uint8Array {
    return writeSarc(this.toSarc(endian));
  }

  diff(other: GameDataPack): GameDataPack {
    return new GameDataPack(GAME_DATA_KINDS.map((kind) => [kind, this.get(kind).diff(other.get(kind))] as const));
  }

  merge(diff: GameDataPack): GameDataPack {
    return new GameDataPack(GAME_DATA_KINDS.map((kind) => [kind, this.get(kind).merge(diff.get(kind))] as const));
  }

  equals(other: GameDataPack): boolean {
    return GAME_DATA_KINDS.every((kind) => this.get(kind).equals(other.get(kind)));
  }
}
