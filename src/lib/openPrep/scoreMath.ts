/**
 * Score math helpers: diminishing-returns shaping, concentration cap, logistic
 */

import { isFiniteNumber } from "../utils/validation.js";

/**
 * Signed diminishing returns: sign(x) * ln(1 + |x|)
 */
export function shape(x: number): number {
  return Math.sign(x) * Math.log1p(Math.abs(x));
}

export function logistic(x: number): number {
  return 1 / (1 + Math.exp(-x));
}

/**
 * Piecewise "sweet spot" fit for ATR%: ramps up to 1 at 2%, stays 1 through 5%,
 * fades to 0 at 8%. Too quiet and too wild both score lower.
 */
export function volatilityFit(atrPct: number): number {
  if (atrPct <= 0) return 0;
  if (atrPct < 2) return atrPct / 2;
  if (atrPct <= 5) return 1;
  if (atrPct < 8) return (8 - atrPct) / 3;
  return 0;
}

export type CapSolution =
  | { kind: "not_binding" }
  | { kind: "skipped"; reason: "no_positive_components" | "too_few_positive_components" }
  | { kind: "capped"; cap: number };

const EPSILON = 1e-12;

/**
 * Solve for the cap c such that, after clamping every positive value to c,
 * c == fraction * (sum of clamped positives).
 *
 * With k values capped and `rest` the sum of the uncapped ones:
 *   c = fraction * rest / (1 - k * fraction)
 * Try k = 0, 1, 2, ... until c separates the capped from the uncapped values.
 *
 * A non-zero solution exists only when count * fraction > 1; with fewer
 * positive values even equal values exceed the fraction.
 */
export function solveConcentrationCap(values: readonly number[], fraction: number): CapSolution {
  const positives = values.filter((v) => v > 0).sort((a, b) => b - a);
  if (positives.length === 0) return { kind: "skipped", reason: "no_positive_components" };
  if (positives.length * fraction <= 1) {
    return { kind: "skipped", reason: "too_few_positive_components" };
  }

  const total = positives.reduce((sum, v) => sum + v, 0);
  if (!isFiniteNumber(total) || positives[0] <= fraction * total * (1 + EPSILON)) {
    return { kind: "not_binding" };
  }

  let rest = total;
  for (let k = 1; k < positives.length; k++) {
    rest -= positives[k - 1];
    const denominator = 1 - k * fraction;
    if (denominator <= 0) break;

    const cap = (fraction * rest) / denominator;
    if (positives[k] <= cap * (1 + EPSILON) && positives[k - 1] >= cap * (1 - EPSILON)) {
      return { kind: "capped", cap };
    }
  }

  // Floating-point edge: fall back to bisection on f(c) = fraction * Σmin(v, c) - c
  let lo = 0;
  let hi = positives[0];
  for (let i = 0; i < 200; i++) {
    const mid = (lo + hi) / 2;
    const clampedSum = positives.reduce((sum, v) => sum + Math.min(v, mid), 0);
    if (fraction * clampedSum - mid > 0) lo = mid;
    else hi = mid;
  }
  return { kind: "capped", cap: lo };
}
