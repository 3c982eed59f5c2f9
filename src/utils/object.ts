/**
 * Helpers operating on plain JSON-like objects. They keep optional fields out
 * of the produced objects entirely so `exactOptionalPropertyTypes` holds.
 */

/**
 * Returns a shallow copy of the provided record without any `undefined` values.
 */
export function omitUndefinedEntries<
  T extends Record<string, unknown | undefined>,
>(entries: T): Partial<{ [K in keyof T]: Exclude<T[K], undefined> }> {
  const result: Partial<{ [K in keyof T]: Exclude<T[K], undefined> }> = {};
  for (const key of Object.keys(entries) as (keyof T)[]) {
    const value = entries[key];
    if (value !== undefined) {
      (result as Record<keyof T, unknown>)[key] = value as Exclude<T[typeof key], undefined>;
    }
  }
  return result;
}

/** Returns the entries of `values` with duplicates removed, keeping first occurrences. */
export function uniqueInOrder<T>(values: Iterable<T>): T[] {
  return Array.from(new Set(values));
}

/** Clamps `value` to the inclusive `[min, max]` interval, mapping NaN to `min`. */
export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(max, Math.max(min, value));
}
