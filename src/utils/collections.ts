/**
 * Small collection helpers shared by the pipeline stages.
 *
 * @module utils/collections
 */

/**
 * Code-unit string comparison. Locale-independent so that ordering, and
 * therefore generated output, is identical on every machine.
 */
export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function byName<T extends { readonly name: string }>(a: T, b: T): number {
  return compareStrings(a.name, b.name);
}

/** True when both lists hold the same members, ignoring order */
export function sameMembers(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) return false;
  const set = new Set(a);
  return set.size === new Set(b).size && b.every((item) => set.has(item));
}

/** True when every member of `subset` appears in `superset` */
export function isSubset(subset: readonly string[], superset: readonly string[]): boolean {
  const set = new Set(superset);
  return subset.every((item) => set.has(item));
}

/**
 * Recursively freeze plain objects, arrays, Maps and Sets. Maps and Sets
 * cannot be made immutable by Object.freeze; their contents are frozen and
 * their exposed types are Readonly*.
 */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== 'object' || Object.isFrozen(value)) {
    return value;
  }
  if (value instanceof Map) {
    for (const [key, entry] of value) {
      deepFreeze(key);
      deepFreeze(entry);
    }
  } else if (value instanceof Set) {
    for (const entry of value) {
      deepFreeze(entry);
    }
  } else {
    for (const entry of Object.values(value)) {
      deepFreeze(entry);
    }
  }
  return Object.freeze(value);
}
