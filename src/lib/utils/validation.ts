/**
 * Validation utilities for numeric feature data
 * These helpers keep NaN/Infinity out of scoring paths
 */

/**
 * True for finite numbers only (rejects NaN, ±Infinity, numeric strings)
 *
 * @example
 * isFiniteNumber(1.5) // true
 * isFiniteNumber(NaN) // false
 * isFiniteNumber("1.5") // false
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

/**
 * Coerce to a finite number or null. Accepts numeric strings as sent by some feeds.
 *
 * @example
 * toFiniteOrNull("2.5") // 2.5
 * toFiniteOrNull("") // null
 * toFiniteOrNull(Infinity) // null
 */
export function toFiniteOrNull(value: unknown): number | null {
  if (isFiniteNumber(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Round half away from zero to a fixed number of decimals
 */
export function round(value: number, decimals = 4): number {
  const factor = 10 ** decimals;
  return (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
}

/**
 * Linear 0..1 ramp of value between lo and hi
 *
 * @example
 * unitScale(1.75, 0.5, 3) // 0.5
 */
export function unitScale(value: number, lo: number, hi: number): number {
  if (hi <= lo) return value >= hi ? 1 : 0;
  return clamp((value - lo) / (hi - lo), 0, 1);
}

/**
 * Sorted, de-duplicated list of non-empty strings (filters out non-strings)
 *
 * @example
 * ensureStringSet(["b", "a", "b", null]) // ["a", "b"]
 */
export function ensureStringSet(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  const items = value.filter(
    (item): item is string => typeof item === "string" && item.trim() !== ""
  );
  return [...new Set(items.map((item) => item.trim()))].sort();
}
