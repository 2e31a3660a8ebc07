/**
 * Signal Decay
 *
 * Exponential freshness weighting with a true half-life:
 *   weight = exp(-t * ln2 / halfLife)
 * so the weight is exactly 0.5 once `t == halfLife`.
 *
 * Volatile names decay faster: the half-life shrinks linearly as ATR% grows.
 */

import { isFiniteNumber } from "../utils/validation.js";

export type InstrumentClass = "penny" | "small_cap" | "mid_cap" | "large_cap";

export interface DecayConfig {
  baseHalfLifeSec: number;
  minHalfLifeSec: number;
  maxHalfLifeSec: number;
  /** ATR% at or below which the max half-life applies */
  atrPctLow: number;
  /** ATR% at or above which the min half-life applies */
  atrPctHigh: number;
  /** Weight used when the elapsed time is unknown */
  neutralWeight: number;
}

export const DEFAULT_DECAY_CONFIG: DecayConfig = {
  baseHalfLifeSec: 600, // 10 min
  minHalfLifeSec: 180, // 3 min
  maxHalfLifeSec: 1200, // 20 min
  atrPctLow: 1,
  atrPctHigh: 5,
  neutralWeight: 0.5,
};

const INSTRUMENT_HALF_LIFE_SEC: Record<InstrumentClass, number> = {
  penny: 240,
  small_cap: 420,
  mid_cap: 600,
  large_cap: 900,
};

/**
 * Freshness weight in (0, 1].
 *
 * - elapsed <= 0 → 1.0
 * - elapsed unknown (null, undefined, NaN) → `neutral` (0.5 by default), never 0
 *
 * @throws RangeError when the half-life is not a positive finite number
 */
export function freshnessWeight(
  elapsedSeconds: number | null | undefined,
  halfLifeSeconds: number,
  neutral: number = DEFAULT_DECAY_CONFIG.neutralWeight
): number {
  if (!isFiniteNumber(halfLifeSeconds) || halfLifeSeconds <= 0) {
    throw new RangeError(`halfLifeSeconds must be a positive finite number, got ${halfLifeSeconds}`);
  }
  if (elapsedSeconds === null || elapsedSeconds === undefined || Number.isNaN(elapsedSeconds)) {
    return neutral;
  }
  if (elapsedSeconds <= 0) return 1;

  return Math.exp((-elapsedSeconds * Math.LN2) / halfLifeSeconds);
}

/**
 * Classify by price and ATR% (penny / small / mid / large cap)
 */
export function classifyInstrument(price: number, atrPct: number): InstrumentClass {
  if (price < 5 || atrPct > 8) return "penny";
  if (price < 20 || (atrPct > 3 && price < 50)) return "small_cap";
  if (price < 100 || (atrPct > 1.5 && price < 200)) return "mid_cap";
  return "large_cap";
}

/**
 * Half-life in seconds for a candidate.
 * Uses ATR% when known, otherwise the instrument class, otherwise the base half-life.
 */
export function adaptiveHalfLife(
  atrPct: number | null,
  instrumentClass: InstrumentClass | null = null,
  config: DecayConfig = DEFAULT_DECAY_CONFIG
): number {
  if (isFiniteNumber(atrPct) && atrPct > 0) {
    const { atrPctLow, atrPctHigh, minHalfLifeSec, maxHalfLifeSec } = config;
    if (atrPct <= atrPctLow) return maxHalfLifeSec;
    if (atrPct >= atrPctHigh) return minHalfLifeSec;

    const ratio = (atrPct - atrPctLow) / (atrPctHigh - atrPctLow);
    return maxHalfLifeSec - ratio * (maxHalfLifeSec - minHalfLifeSec);
  }

  if (instrumentClass) return INSTRUMENT_HALF_LIFE_SEC[instrumentClass];
  return config.baseHalfLifeSec;
}

/**
 * Freshness with the adaptive half-life for this candidate's volatility
 */
export function adaptiveFreshnessWeight(
  elapsedSeconds: number | null,
  atrPct: number | null,
  price: number | null = null,
  config: DecayConfig = DEFAULT_DECAY_CONFIG
): number {
  // Without ATR the price alone still separates penny names from large caps
  const instrument = isFiniteNumber(price) ? classifyInstrument(price, atrPct ?? 0) : null;
  const halfLife = adaptiveHalfLife(atrPct, instrument, config);
  return freshnessWeight(elapsedSeconds, halfLife, config.neutralWeight);
}
