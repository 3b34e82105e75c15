import {
  Byml,
  ParseError,
  bymlEquals,
  crc32,
  expectArray,
  expectHash,
  expectInt,
  expectMember,
  expectString,
  parseByml,
  type BymlNode,
} from '@modmerge/core';
import { describe, expect, it } from 'vitest';
import { DeleteVec } from '../collections/delete-vec.js';
import { ActorInfo } from './actor-info.js';
import { AreaData } from './area-data.js';
import { EventInfo } from './event-info.js';
import { ResidentActors } from './resident-actors.js';
import { StaticMap } from './static-map.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}

function actor(name: string, life: number): BymlNode {
  return Byml.record({ name: Byml.string(name), profile: Byml.string('Enemy'), life: Byml.int(life) });
}

describe('ActorInfo', () => {
  const info = (actors: BymlNode[]): ActorInfo => ActorInfo.fromByml(Byml.record({ Actors: Byml.array(actors) }));

  it('writes actors and hashes in ascending hash order', () => {
    const root = expectHash(info([actor('Weapon_B', 1), actor('Enemy_A', 10)]).toByml());
    const hashes = expectArray(expectMember(root, 'Hashes')).map((node) => expectInt(node) >>> 0);
    const names = expectArray(expectMember(root, 'Actors')).map((node) =>
      expectString(expectMember(expectHash(node), 'name')),
    );

    const expected = [crc32('Weapon_B'), crc32('Enemy_A')].sort((a, b) => a - b);
    expect(hashes).toEqual(expected);
    expect(names.map((name) => crc32(name))).toEqual(expected);
  });

  it('diffs actor fields individually', () => {
    const base = info([actor('Enemy_A', 10), actor('Weapon_B', 1)]);
    const modified = info([actor('Enemy_A', 20), actor('Item_C', 5)]);
    const diff = base.diff(modified);

    expect(diff.actors.get(crc32('Enemy_A'))?.toMap()).toEqual(new Map([['life', Byml.int(20)]]));
    expect(diff.actors.get(crc32('Item_C'))?.size).toBe(3);
    expect(diff.actors.deletedKeys()).toEqual([crc32('Weapon_B')]);
    expect(base.merge(diff).equals(modified)).toBe(true);
  });

  it('round-trips in both byte orders', () => {
    const original = info([actor('Enemy_A', 10), actor('Weapon_B', 1)]);
    expect(ActorInfo.fromBinary(original.toBinary('big')).equals(original)).toBe(true);
    expect(ActorInfo.fromBinary(original.toBinary('little')).equals(original)).toBe(true);
  });

  it('requires every actor to carry a name', () => {
    const error = captureError(() => info([Byml.record({ profile: Byml.string('Enemy') })]));
    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ kind: 'TypeMismatch', field: 'name' });
  });
});

describe('ResidentActors', () => {
  const resident = (names: string[]): ResidentActors =>
    ResidentActors.fromByml(
      Byml.array(names.map((name) => Byml.record({ name: Byml.string(name), only_res: Byml.bool(false) }))),
    );

  it('adds and removes actors by name', () => {
    const base = resident(['GameROMPlayer', 'PlayerStole2']);
    const modified = resident(['GameROMPlayer', 'Dm_Npc_Custom']);
    const diff = base.diff(modified);

    expect([...diff.actors.keys()]).toEqual(['Dm_Npc_Custom']);
    expect(diff.actors.deletedKeys()).toEqual(['PlayerStole2']);
    expect(base.merge(diff).equals(modified)).toBe(true);
  });
});

describe('EventInfo', () => {
  const events = (flag: string): EventInfo =>
    EventInfo.fromByml(
      Byml.record({
        'Demo001<Start>': Byml.record({ flag: Byml.string(flag), is_skip: Byml.bool(true) }),
        'Demo002<Start>': Byml.record({ flag: Byml.string('Clear_Demo002'), is_skip: Byml.bool(false) }),
      }),
    );

  it('diffs the fields of each event', () => {
    const base = events('Clear_Demo001');
    const diff = base.diff(events('Custom_Flag'));

    expect([...diff.events.keys()]).toEqual(['Demo001<Start>']);
    expect(diff.events.get('Demo001<Start>')?.toMap()).toEqual(new Map([['flag', Byml.string('Custom_Flag')]]));
    expect(base.merge(diff).equals(events('Custom_Flag'))).toBe(true);
  });
});

describe('AreaData', () => {
  const area = (num: number, climate: string): BymlNode =>
    Byml.record({ AreaNumber: Byml.int(num), Climate: Byml.string(climate) });

  it('writes areas in ascending area number order', () => {
    const data = AreaData.fromByml(Byml.array([area(3, 'Desert'), area(1, 'Temperate')]));
    const numbers = expectArray(parseByml(data.toBinary('little')).root).map((node) =>
      expectInt(expectMember(expectHash(node), 'AreaNumber')),
    );

    expect(numbers).toEqual([1, 3]);
  });

  it('replaces a changed area whole', () => {
    const base = AreaData.fromByml(Byml.array([area(1, 'Temperate'), area(2, 'Snow')]));
    const modified = AreaData.fromByml(Byml.array([area(1, 'Temperate'), area(2, 'Desert')]));
    const diff = base.diff(modified);

    expect(diff.areas.toMap()).toEqual(new Map([[2, area(2, 'Desert')]]));
    expect(base.merge(diff).equals(modified)).toBe(true);
  });

  it('requires an area number on every entry', () => {
    const error = captureError(() => AreaData.fromByml(Byml.array([Byml.record({ Climate: Byml.string('x') })])));
    expect(error).toMatchObject({ kind: 'TypeMismatch', field: 'AreaNumber' });
  });
});

describe('StaticMap', () => {
  const vec = (x: number, y: number, z: number): BymlNode =>
    Byml.record({ X: Byml.float(x), Y: Byml.float(y), Z: Byml.float(z) });

  function staticMap(startX: number): StaticMap {
    return StaticMap.fromByml(
      Byml.record({
        StartPos: Byml.array([
          Byml.record({
            Map: Byml.string('A-1'),
            PosName: Byml.string('Start'),
            Rotate: vec(0, 0, 0),
            Translate: vec(startX, 0, 0),
          }),
          Byml.record({
            Map: Byml.string('A-1'),
            PosName: Byml.string('Warp'),
            Rotate: vec(0, 1.5, 0),
            Translate: vec(10, 0, 10),
            PlayerState: Byml.string('Wait'),
          }),
          Byml.record({ Map: Byml.string('B-2'), Rotate: vec(0, 0, 0), Translate: vec(0, 0, 0) }),
        ]),
        LocationMarker: Byml.array([Byml.record({ MessageID: Byml.string('Village') })]),
      }),
    );
  }

  it('groups start positions by map and skips unnamed ones', () => {
    const map = staticMap(1);

    expect([...map.startPos.keys()]).toEqual(['A-1']);
    expect([...(map.startPos.get('A-1')?.keys() ?? [])]).toEqual(['Start', 'Warp']);
    expect(map.startPos.get('A-1')?.get('Warp')?.playerState).toBe('Wait');
    expect([...map.general.keys()]).toEqual(['LocationMarker']);
  });

  it('writes the player state back', () => {
    const root = expectHash(parseByml(staticMap(1).toBinary('big')).root);
    const entries = expectArray(expectMember(root, 'StartPos')).map((node) => expectHash(node));

    expect(entries).toHaveLength(2);
    expect(entries[1]?.get('PlayerState')).toEqual(Byml.string('Wait'));
    expect(entries[0]?.has('PlayerState')).toBe(false);
    expect(StaticMap.fromByml(Byml.hash(root)).equals(staticMap(1))).toBe(true);
  });

  it('diffs start positions per map and name', () => {
    const base = staticMap(1);
    const diff = base.diff(staticMap(4));

    expect([...(diff.startPos.get('A-1')?.keys() ?? [])]).toEqual(['Start']);
    expect(diff.general.isEmpty()).toBe(true);
    expect(base.merge(diff).equals(staticMap(4))).toBe(true);
  });

  const marker = (id: string): BymlNode => Byml.record({ MessageID: Byml.string(id) });
  const withMarkers = (...ids: string[]): StaticMap =>
    new StaticMap(
      staticMap(1).startPos,
      staticMap(1).general.set('LocationMarker', new DeleteVec(ids.map(marker), bymlEquals)),
    );

  it('keeps entries two mods each append to the same array', () => {
    const base = withMarkers('Village');
    const mod1 = base.diff(withMarkers('Village', 'Tower'));
    const mod2 = base.diff(withMarkers('Village', 'Stable'));

    expect(mod1.general.get('LocationMarker')?.toArray()).toEqual([marker('Tower')]);

    const merged = base.merge(mod1).merge(mod2);
    expect(merged.general.get('LocationMarker')?.toArray()).toEqual([
      marker('Village'),
      marker('Tower'),
      marker('Stable'),
    ]);
  });

  it('removes an array element one mod deletes while keeping another mod\'s addition', () => {
    const base = withMarkers('Village', 'Ruins');
    const removal = base.diff(withMarkers('Village'));
    const addition = base.diff(withMarkers('Village', 'Ruins', 'Tower'));

    expect(removal.general.get('LocationMarker')?.deletedValues()).toEqual([marker('Ruins')]);
    expect(base.merge(removal).merge(addition).general.get('LocationMarker')?.toArray()).toEqual([
      marker('Village'),
      marker('Tower'),
    ]);
  });

  it('rejects a top-level member that is not an array', () => {
    const error = captureError(() =>
      StaticMap.fromByml(Byml.record({ StartPos: Byml.array([]), Flag: Byml.bool(true) })),
    );
    expect(error).toMatchObject({ kind: 'TypeMismatch', field: 'Flag' });
  });
});
