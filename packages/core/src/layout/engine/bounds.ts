const I32_MIN = -2147483648;
const I32_MAX = 2147483647;

export function isI32(n: number): boolean {
  return Number.isInteger(n) && n >= I32_MIN && n <= I32_MAX;
}

/** Clamp to `[min, max]`; a `null` max leaves the upper side open. Min wins over max. */
export function clampToRange(n: number, min: number, max: number | null): number {
  const upper = max === null ? n : Math.min(n, max);
  return Math.max(upper, min);
}
