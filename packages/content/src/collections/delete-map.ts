/**
 * Delete-aware maps: ordered key/value containers whose diffs can record
 * that a key was removed (a tombstone), as opposed to never mentioned.
 *
 * Only diffs hold tombstones. `merge` removes tombstoned keys, overwrites or
 * inserts present ones and carries every other key over from the receiver,
 * so a merged map never contains tombstones.
 */

import { settle, type Mergeable, type ValueEquals } from './mergeable.js';
import { valueEquals } from './value-equals.js';

export type EntryState<V> =
  | { readonly state: 'present'; readonly value: V }
  | { readonly state: 'deleted' }
  | { readonly state: 'absent' };

type Slot<V> = { readonly deleted: false; readonly value: V } | { readonly deleted: true };

const ABSENT: EntryState<never> = { state: 'absent' };
const DELETED: EntryState<never> = { state: 'deleted' };
const TOMBSTONE: Slot<never> = { deleted: true };

export class DeleteMap<K, V> implements Iterable<[K, V]> {
  protected readonly slots = new Map<K, Slot<V>>();
  readonly valueEquals: ValueEquals<V>;

  constructor(entries?: Iterable<readonly [K, V]>, equals: ValueEquals<V> = valueEquals) {
    this.valueEquals = equals;
    if (entries) {
      for (const [key, value] of entries) this.set(key, value);
    }
  }

  /** Empty map of the same flavour and comparator. */
  protected create<W>(equals: ValueEquals<W>): DeleteMap<K, W> {
    return new DeleteMap<K, W>(undefined, equals);
  }

  /** Keys in iteration order. */
  protected orderedKeys(): K[] {
    return [...this.slots.keys()];
  }

  /* ------------------------------------------------------------------ */
  /*  Map access                                                         */
  /* ------------------------------------------------------------------ */

  /** Number of present entries. */
  get size(): number {
    let count = 0;
    for (const slot of this.slots.values()) if (!slot.deleted) count++;
    return count;
  }

  get(key: K): V | undefined {
    const slot = this.slots.get(key);
    return slot === undefined || slot.deleted ? undefined : slot.value;
  }

  entry(key: K): EntryState<V> {
    const slot = this.slots.get(key);
    if (slot === undefined) return ABSENT;
    return slot.deleted ? DELETED : { state: 'present', value: slot.value };
  }

  has(key: K): boolean {
    const slot = this.slots.get(key);
    return slot !== undefined && !slot.deleted;
  }

  set(key: K, value: V): this {
    this.slots.set(key, { deleted: false, value });
    return this;
  }

  /** Forget `key` entirely (no tombstone). */
  delete(key: K): boolean {
    return this.slots.delete(key);
  }

  /** Record that `key` is removed by this diff. */
  markDeleted(key: K): this {
    this.slots.set(key, TOMBSTONE);
    return this;
  }

  *entries(): IterableIterator<[K, V]> {
    for (const key of this.orderedKeys()) {
      const slot = this.slots.get(key);
      if (slot !== undefined && !slot.deleted) yield [key, slot.value];
    }
  }

  *keys(): IterableIterator<K> {
    for (const [key] of this.entries()) yield key;
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this.entries()) yield value;
  }

  /** Every mentioned key with its state, tombstones included. */
  *states(): IterableIterator<[K, EntryState<V>]> {
    for (const key of this.orderedKeys()) yield [key, this.entry(key)];
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  deletedKeys(): K[] {
    return this.orderedKeys().filter((key) => this.slots.get(key)?.deleted === true);
  }

  hasTombstones(): boolean {
    for (const slot of this.slots.values()) if (slot.deleted) return true;
    return false;
  }

  /** True when the map mentions no key at all (an empty diff). */
  isEmpty(): boolean {
    return this.slots.size === 0;
  }

  toMap(): Map<K, V> {
    return new Map(this.entries());
  }

  /* ------------------------------------------------------------------ */
  /*  Diff / merge                                                       */
  /* ------------------------------------------------------------------ */

  diff(other: DeleteMap<K, V>): DeleteMap<K, V> {
    return diffInto(this, other, this.create(this.valueEquals), (_, modified) => modified);
  }

  merge(diff: DeleteMap<K, V>): DeleteMap<K, V> {
    return mergeInto(this, diff, this.create(this.valueEquals), (_, changed) => changed);
  }

  /** Like {@link diff}, but changed values hold their own nested diff. */
  deepDiff<W extends Mergeable<W>>(this: DeleteMap<K, W>, other: DeleteMap<K, W>): DeleteMap<K, W> {
    return diffInto(this, other, this.create(this.valueEquals), (base, modified) => base.diff(modified));
  }

  /** Like {@link merge}, but nested diffs are merged into the existing value. */
  deepMerge<W extends Mergeable<W>>(this: DeleteMap<K, W>, diff: DeleteMap<K, W>): DeleteMap<K, W> {
    return mergeInto(this, diff, this.create(this.valueEquals), (base, changed) =>
      base === undefined ? settle(changed) : base.merge(changed),
    );
  }

  /** Order-insensitive comparison of present entries and tombstones. */
  equals(other: DeleteMap<K, V>): boolean {
    if (this.slots.size !== other.slots.size) return false;
    for (const [key, slot] of this.slots) {
      const rhs = other.slots.get(key);
      if (rhs === undefined || rhs.deleted !== slot.deleted) return false;
      if (!slot.deleted && !rhs.deleted && !this.valueEquals(slot.value, rhs.value)) return false;
    }
    return true;
  }

  /** Copy without tombstones. */
  settle(): DeleteMap<K, V> {
    return fillFrom(this, this.create(this.valueEquals));
  }
}

/**
 * Delete-aware map that always iterates in ascending key order (numeric for
 * numbers, ordinal for strings), independent of insertion order.
 */
export class SortedDeleteMap<K extends string | number, V> extends DeleteMap<K, V> {
  protected override create<W>(equals: ValueEquals<W>): SortedDeleteMap<K, W> {
    return new SortedDeleteMap<K, W>(undefined, equals);
  }

  protected override orderedKeys(): K[] {
    return [...this.slots.keys()].sort(compareKeys);
  }

  override diff(other: DeleteMap<K, V>): SortedDeleteMap<K, V> {
    return diffInto(this, other, this.create(this.valueEquals), (_, modified) => modified);
  }

  override merge(diff: DeleteMap<K, V>): SortedDeleteMap<K, V> {
    return mergeInto(this, diff, this.create(this.valueEquals), (_, changed) => changed);
  }

  override deepDiff<W extends Mergeable<W>>(
    this: SortedDeleteMap<K, W>,
    other: DeleteMap<K, W>,
  ): SortedDeleteMap<K, W> {
    return diffInto(this, other, this.create(this.valueEquals), (base, modified) => base.diff(modified));
  }

  override deepMerge<W extends Mergeable<W>>(
    this: SortedDeleteMap<K, W>,
    diff: DeleteMap<K, W>,
  ): SortedDeleteMap<K, W> {
    return mergeInto(this, diff, this.create(this.valueEquals), (base, changed) =>
      base === undefined ? settle(changed) : base.merge(changed),
    );
  }

  override settle(): SortedDeleteMap<K, V> {
    return fillFrom(this, this.create(this.valueEquals));
  }
}

export function compareKeys(a: string | number, b: string | number): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const lhs = String(a);
  const rhs = String(b);
  if (lhs < rhs) return -1;
  return lhs > rhs ? 1 : 0;
}

/* ------------------------------------------------------------------ */
/*  Shared algorithms                                                  */
/* ------------------------------------------------------------------ */

function fillFrom<K, V, M extends DeleteMap<K, V>>(source: DeleteMap<K, V>, target: M): M {
  for (const [key, value] of source) target.set(key, value);
  return target;
}

/**
 * Keys removed in `modified` become tombstones, changed or new keys become
 * present (through `change` when both sides have them), unchanged keys are
 * left out.
 */
function diffInto<K, V, M extends DeleteMap<K, V>>(
  base: DeleteMap<K, V>,
  modified: DeleteMap<K, V>,
  target: M,
  change: (base: V, modified: V) => V,
): M {
  for (const [key, value] of modified) {
    const existing = base.entry(key);
    if (existing.state !== 'present') {
      target.set(key, value);
    } else if (!base.valueEquals(existing.value, value)) {
      target.set(key, change(existing.value, value));
    }
  }
  for (const key of base.keys()) {
    if (!modified.has(key)) target.markDeleted(key);
  }
  return target;
}

function mergeInto<K, V, M extends DeleteMap<K, V>>(
  base: DeleteMap<K, V>,
  diff: DeleteMap<K, V>,
  target: M,
  apply: (base: V | undefined, changed: V) => V,
): M {
  fillFrom(base, target);
  for (const [key, state] of diff.states()) {
    if (state.state === 'deleted') {
      target.delete(key);
    } else if (state.state === 'present') {
      target.set(key, apply(target.get(key), state.value));
    }
  }
  return target;
}
