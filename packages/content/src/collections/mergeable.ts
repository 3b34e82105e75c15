/**
 * Capability shared by every value that takes part in diff/merge.
 *
 * `merge(a.diff(b))` must equal `b`, and `a.merge(a.diff(a))` must equal `a`.
 */
export interface Mergeable<T> {
  /** Changes that turn this value into `other`. */
  diff(other: T): T;
  /** Apply a diff produced by {@link diff}; the receiver is not modified. */
  merge(diff: T): T;
  equals(other: T): boolean;
}

export type ValueEquals<V> = (a: V, b: V) => boolean;

export function mergeableEquals<T extends Mergeable<T>>(a: T, b: T): boolean {
  return a.equals(b);
}

/**
 * Drop the tombstones a diff value carries so it can stand alone in a
 * merged tree. Merging a diff onto itself keeps every present entry and
 * removes every deleted one.
 */
export function settle<T extends Mergeable<T>>(value: T): T {
  return value.merge(value);
}
