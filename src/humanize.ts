const SUFFIXES = ["", "K", "M", "B", "T"] as const;

/**
 * Abbreviate a download count: `1500` → `"1.5K"`, `250000000` → `"250M"`.
 *
 * Values below 1000 are printed as-is. Larger values are scaled by the
 * biggest power of 1000 not exceeding them (T at most) and keep one decimal
 * unless the scaled value is whole, so `999999` reads `"1000.0K"`.
 */
export function humanize(value: number): string {
  const n = Math.max(0, Math.trunc(value));
  if (n < 1000) return String(n);

  let tier = 0;
  while (tier < SUFFIXES.length - 1 && n >= 1000 ** (tier + 1)) tier++;
  const scaled = n / 1000 ** tier;
  const digits = Number.isInteger(scaled) ? 0 : 1;
  return `${scaled.toFixed(digits)}${SUFFIXES[tier]}`;
}
