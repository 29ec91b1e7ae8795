import type { CatalogEntry } from "./catalog.js";

/**
 * Select the `n` most downloaded entries, highest first. Entries with equal
 * counts keep their input order. The input array is left untouched.
 */
export function topN(entries: readonly CatalogEntry[], n: number): CatalogEntry[] {
  if (n <= 0) return [];
  return [...entries].sort((a, b) => b.popularity - a.popularity).slice(0, n);
}
