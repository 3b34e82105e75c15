import { compareKeys } from './delete-map.js';
import type { Mergeable } from './mergeable.js';

/**
 * Set with tombstones. A diff lists added members and deleted ones; merging
 * removes deleted members and adds the rest. Iterates in ascending order.
 */
export class DeleteSet<K extends string | number> implements Iterable<K>, Mergeable<DeleteSet<K>> {
  /** true = present, false = tombstone */
  private readonly members = new Map<K, boolean>();

  constructor(values?: Iterable<K>) {
    if (values) {
      for (const value of values) this.members.set(value, true);
    }
  }

  get size(): number {
    let count = 0;
    for (const present of this.members.values()) if (present) count++;
    return count;
  }

  has(value: K): boolean {
    return this.members.get(value) === true;
  }

  add(value: K): this {
    this.members.set(value, true);
    return this;
  }

  delete(value: K): boolean {
    return this.members.delete(value);
  }

  markDeleted(value: K): this {
    this.members.set(value, false);
    return this;
  }

  isDeleted(value: K): boolean {
    return this.members.get(value) === false;
  }

  *values(): IterableIterator<K> {
    for (const value of this.sortedKeys()) {
      if (this.members.get(value) === true) yield value;
    }
  }

  [Symbol.iterator](): IterableIterator<K> {
    return this.values();
  }

  deletedValues(): K[] {
    return this.sortedKeys().filter((value) => this.members.get(value) === false);
  }

  diff(other: DeleteSet<K>): DeleteSet<K> {
    const out = new DeleteSet<K>();
    for (const value of other) {
      if (!this.has(value)) out.add(value);
    }
    for (const value of this) {
      if (!other.has(value)) out.markDeleted(value);
    }
    return out;
  }

  merge(diff: DeleteSet<K>): DeleteSet<K> {
    const out = new DeleteSet<K>(this);
    for (const [value, present] of diff.members) {
      if (present) out.add(value);
      else out.delete(value);
    }
    return out;
  }

  equals(other: DeleteSet<K>): boolean {
    if (this.members.size !== other.members.size) return false;
    for (const [value, present] of this.members) {
      if (other.members.get(value) !== present) return false;
    }
    return true;
  }

  private sortedKeys(): K[] {
    return [...this.members.keys()].sort(compareKeys);
  }
}
