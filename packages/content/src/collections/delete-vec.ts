import type { Mergeable, ValueEquals } from './mergeable.js';
import { valueEquals } from './value-equals.js';

type Item<T> = { readonly value: T; readonly deleted: boolean };

/**
 * Ordered list with tombstones, compared by value. A diff lists the values
 * `other` adds and, as tombstones, the values it drops; merging removes the
 * dropped values and appends added ones the receiver does not already hold.
 */
export class DeleteVec<T> implements Iterable<T>, Mergeable<DeleteVec<T>> {
  private readonly items: Item<T>[] = [];
  readonly valueEquals: ValueEquals<T>;

  constructor(values?: Iterable<T>, equals: ValueEquals<T> = valueEquals) {
    this.valueEquals = equals;
    if (values) {
      for (const value of values) this.items.push({ value, deleted: false });
    }
  }

  /** Number of present values. */
  get length(): number {
    return this.items.reduce((count, item) => (item.deleted ? count : count + 1), 0);
  }

  includes(value: T): boolean {
    return this.items.some((item) => !item.deleted && this.valueEquals(item.value, value));
  }

  push(value: T): this {
    this.items.push({ value, deleted: false });
    return this;
  }

  markDeleted(value: T): this {
    this.items.push({ value, deleted: true });
    return this;
  }

  isDeleted(value: T): boolean {
    return this.items.some((item) => item.deleted && this.valueEquals(item.value, value));
  }

  *values(): IterableIterator<T> {
    for (const item of this.items) if (!item.deleted) yield item.value;
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.values();
  }

  deletedValues(): T[] {
    return this.items.filter((item) => item.deleted).map((item) => item.value);
  }

  toArray(): T[] {
    return [...this.values()];
  }

  diff(other: DeleteVec<T>): DeleteVec<T> {
    const out = new DeleteVec<T>(undefined, this.valueEquals);
    for (const value of other) {
      if (!this.includes(value)) out.push(value);
    }
    for (const value of this) {
      if (!other.includes(value)) out.markDeleted(value);
    }
    return out;
  }

  merge(diff: DeleteVec<T>): DeleteVec<T> {
    const out = new DeleteVec<T>(
      [...this].filter((value) => !diff.isDeleted(value)),
      this.valueEquals,
    );
    for (const value of diff) {
      if (!out.includes(value)) out.push(value);
    }
    return out;
  }

  /** Order-sensitive comparison of values and tombstones. */
  equals(other: DeleteVec<T>): boolean {
    if (this.items.length !== other.items.length) return false;
    return this.items.every((item, i) => {
      const rhs = other.items[i];
      return rhs !== undefined && rhs.deleted === item.deleted && this.valueEquals(item.value, rhs.value);
    });
  }
}
