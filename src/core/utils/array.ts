/**
 * Array utilities
 */

/**
 * Splits an array into consecutive windows of `size` elements.
 * The last window may be shorter; none is empty.
 */
export function chunk<T>(arr: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < arr.length; i += size) {
    out.push(arr.slice(i, i + size));
  }
  return out;
}

/** Returns the values that occur more than once, in first-seen order */
export function duplicates<T>(arr: readonly T[]): T[] {
  const seen = new Set<T>();
  const dupes = new Set<T>();
  for (const v of arr) {
    if (seen.has(v)) dupes.add(v);
    seen.add(v);
  }
  return Array.from(dupes);
}
