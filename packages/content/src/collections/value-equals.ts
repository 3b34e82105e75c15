interface Equatable {
  equals(other: unknown): boolean;
}

function isEquatable(value: object): value is Equatable {
  return typeof Reflect.get(value, 'equals') === 'function';
}

/**
 * Structural equality for data held in collections. Values of the same class
 * that define `equals` (resources, nested delete-aware maps) compare through
 * it; byte arrays, arrays, maps and plain objects compare member-wise.
 */
export function valueEquals(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) return false;

  if (isEquatable(a) && Object.getPrototypeOf(a) === Object.getPrototypeOf(b)) return a.equals(b);

  if (a instanceof Uint8Array || b instanceof Uint8Array) {
    if (!(a instanceof Uint8Array && b instanceof Uint8Array) || a.byteLength !== b.byteLength) return false;
    const other = b;
    return a.every((byte, i) => byte === other[i]);
  }

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    const other: readonly unknown[] = b;
    return a.every((item: unknown, i) => valueEquals(item, other[i]));
  }

  if (a instanceof Map || b instanceof Map) {
    if (!(a instanceof Map && b instanceof Map) || a.size !== b.size) return false;
    for (const [key, item] of a) {
      if (!b.has(key) || !valueEquals(item, b.get(key))) return false;
    }
    return true;
  }

  const other: object = b;
  const members = Object.entries(a);
  if (members.length !== Object.keys(other).length) return false;
  return members.every(
    ([key, item]: [string, unknown]) => Object.hasOwn(other, key) && valueEquals(item, Reflect.get(other, key)),
  );
}
