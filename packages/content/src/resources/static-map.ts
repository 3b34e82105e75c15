import {
  Byml,
  bymlEquals,
  expectArray,
  expectHash,
  expectMember,
  expectString,
  parseByml,
  writeByml,
  type BymlNode,
  type Endian,
} from '@modmerge/core';
import { DeleteMap } from '../collections/delete-map.js';
import { DeleteVec } from '../collections/delete-vec.js';
import { mergeableEquals } from '../collections/mergeable.js';
import type { Resource } from './resource.js';

const START_POS_KEY = 'StartPos';

/** A named player start position on one map. */
export interface EntryPos {
  readonly rotate: BymlNode;
  readonly translate: BymlNode;
  readonly playerState?: string;
}

export function entryPosEquals(a: EntryPos, b: EntryPos): boolean {
  return a.playerState === b.playerState && bymlEquals(a.rotate, b.rotate) && bymlEquals(a.translate, b.translate);
}

export type StartPositions = DeleteMap<string, DeleteMap<string, EntryPos>>;

/** Top-level placement arrays other than `StartPos`, merged element by element. */
export type GeneralArrays = DeleteMap<string, DeleteVec<BymlNode>>;

function startPositions(): StartPositions {
  return new DeleteMap<string, DeleteMap<string, EntryPos>>(undefined, mergeableEquals);
}

function generalArrays(entries?: Iterable<readonly [string, DeleteVec<BymlNode>]>): GeneralArrays {
  return new DeleteMap<string, DeleteVec<BymlNode>>(entries, mergeableEquals);
}

/**
 * Static placement data of a field or dungeon map. Start positions are
 * grouped by map then position name; every other top-level member is an
 * array whose elements are added and removed individually.
 */
export class StaticMap implements Resource<StaticMap> {
  readonly kind = 'Static' as const;
  static readonly pathPattern = /^Map\/(?:MainField|CDungeon)\/Static\.mubin$/;

  constructor(
    readonly startPos: StartPositions = startPositions(),
    readonly general: GeneralArrays = generalArrays(),
  ) {}

  static fromBinary(data: Uint8Array): StaticMap {
    return StaticMap.fromByml(parseByml(data).root);
  }

  static fromByml(root: BymlNode): StaticMap {
    const hash = expectHash(root, 'root');
    const startPos = startPositions();
    for (const node of expectArray(expectMember(hash, START_POS_KEY), START_POS_KEY)) {
      const entry = expectHash(node, START_POS_KEY);
      const map = expectString(expectMember(entry, 'Map'), 'Map');
      const posName = entry.get('PosName');
      if (posName === undefined) continue;
      const playerState = entry.get('PlayerState');
      const pos: EntryPos = {
        rotate: expectMember(entry, 'Rotate'),
        translate: expectMember(entry, 'Translate'),
        ...(playerState === undefined ? {} : { playerState: expectString(playerState, 'PlayerState') }),
      };
      let positions = startPos.get(map);
      if (positions === undefined) {
        positions = new DeleteMap<string, EntryPos>(undefined, entryPosEquals);
        startPos.set(map, positions);
      }
      positions.set(expectString(posName, 'PosName'), pos);
    }
    const general = generalArrays(
      [...hash]
        .filter(([key]) => key !== START_POS_KEY)
        .map(([key, node]) => [key, new DeleteVec(expectArray(node, key), bymlEquals)] as const),
    );
    return new StaticMap(startPos, general);
  }

  toByml(): BymlNode {
    const entries: BymlNode[] = [];
    for (const [map, positions] of this.startPos) {
      for (const [posName, pos] of positions) {
        entries.push(
          Byml.record({
            Map: Byml.string(map),
            PosName: Byml.string(posName),
            Rotate: pos.rotate,
            Translate: pos.translate,
            ...(pos.playerState === undefined ? {} : { PlayerState: Byml.string(pos.playerState) }),
          }),
        );
      }
    }
    return Byml.hash([
      ...[...this.general].map(([key, values]) => [key, Byml.array(values.toArray())] as const),
      [START_POS_KEY, Byml.array(entries)],
    ]);
  }

  toBinary(endian: Endian): Uint8Array {
    return writeByml(this.toByml(), endian);
  }

  diff(other: StaticMap): StaticMap {
    return new StaticMap(this.startPos.deepDiff(other.startPos), this.general.deepDiff(other.general));
  }

  merge(diff: StaticMap): StaticMap {
    return new StaticMap(this.startPos.deepMerge(diff.startPos), this.general.deepMerge(diff.general));
  }

  equals(other: StaticMap): boolean {
    return this.startPos.equals(other.startPos) && this.general.equals(other.general);
  }
}
