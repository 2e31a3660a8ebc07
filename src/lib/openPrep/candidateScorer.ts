/**
 * Candidate Scorer
 *
 * Composite pre-market score for a long-biased setup:
 *
 * 1. Weights are regime-adjusted (copy; the base set is untouched)
 * 2. Each signal component = weight * shape(normalized feature)
 * 3. Positive components are capped so none exceeds `capFraction` (40%)
 *    of the final positive sum (exact fixed point, see scoreMath)
 * 4. Risk and counter-trend penalties are subtracted, uncapped
 * 5. Non-finite totals become "score unavailable" (null), never NaN
 *
 * Unknown inputs contribute 0 and are listed in `missing`; they are never
 * treated as a genuine zero reading.
 */

import { clamp, isFiniteNumber, round, unitScale } from "../utils/validation.js";
import { createLogger } from "../utils/logger.js";
import { applyRegimeAdjustments } from "./regimeClassifier.js";
import { DEFAULT_SCORE_CONFIG, type ScoreConfig } from "./pipelineConfig.js";
import { adaptiveFreshnessWeight, DEFAULT_DECAY_CONFIG, type DecayConfig } from "./signalDecay.js";
import { logistic, shape, solveConcentrationCap, volatilityFit } from "./scoreMath.js";
import {
  SIGNAL_COMPONENT_KEYS,
  type Candidate,
  type CapOutcome,
  type ConfidenceTier,
  type CorroboratingSignal,
  type RegimeLabel,
  type RegimeSnapshot,
  type ScoreComponents,
  type ScoreResult,
  type SignalComponentKey,
  type WeightMap,
  type WeightSet,
} from "./types.js";

const log = createLogger("CandidateScorer");

/** Flags that describe how a value was obtained rather than a quality problem */
export const INFORMATIONAL_FLAGS: readonly string[] = ["gap_derived"];

export interface ScoreOptions {
  config?: ScoreConfig;
  decay?: DecayConfig;
  /** Average gap % of eligible candidates in this candidate's sector */
  sectorAverageGap?: number | null;
}

// ============================================================================
// Normalization
// ============================================================================

/**
 * Normalized (pre-weight, pre-shape) inputs per signal component; null = unknown
 */
export function normalizeFeatures(
  candidate: Candidate,
  sectorAverageGap: number | null,
  decay: DecayConfig = DEFAULT_DECAY_CONFIG
): Record<SignalComponentKey, number | null> {
  const { gapPct, relativeVolume, momentumZScore, atrPct } = candidate;

  return {
    gap: isFiniteNumber(gapPct) ? gapPct / 10 : null,
    gapSectorRelative:
      isFiniteNumber(gapPct) && candidate.sector !== null && isFiniteNumber(sectorAverageGap)
        ? (gapPct - sectorAverageGap) / 10
        : null,
    relativeVolume: isFiniteNumber(relativeVolume) ? (relativeVolume - 1) / 2 : null,
    momentum: isFiniteNumber(momentumZScore) ? clamp(momentumZScore, -5, 5) / 2 : null,
    // Signed: a bearish macro backdrop must lower the score
    macro: isFiniteNumber(candidate.macroBias) ? clamp(candidate.macroBias, -1, 1) : null,
    news: isFiniteNumber(candidate.newsCatalystScore) ? Math.max(candidate.newsCatalystScore, 0) : null,
    extHours: isFiniteNumber(candidate.extHoursScore) ? clamp(candidate.extHoursScore, 0, 1) : null,
    earningsBmo: candidate.earningsBmo ? 1 : 0,
    freshness: adaptiveFreshnessWeight(
      candidate.premarketFreshnessSec,
      candidate.atrPct,
      candidate.price,
      decay
    ),
    atrRank: isFiniteNumber(atrPct) ? volatilityFit(atrPct) : null,
  };
}

// ============================================================================
// Penalties
// ============================================================================

/**
 * Risk penalty fraction in [0.05, 0.20]:
 * ATR (halved when gap and volume corroborate the move), thin volume, wide spread.
 */
export function riskPenaltyFraction(candidate: Candidate, config: ScoreConfig = DEFAULT_SCORE_CONFIG): number {
  const { atrPct, relativeVolume, gapPct, spreadBps } = candidate;
  let total = 0;

  if (isFiniteNumber(atrPct)) {
    const corroborated =
      isFiniteNumber(relativeVolume) &&
      relativeVolume >= config.signals.relativeVolume &&
      isFiniteNumber(gapPct) &&
      Math.abs(gapPct) >= 1;
    total += unitScale(atrPct, 0.5, 3) * 0.12 * (corroborated ? 0.5 : 1);
  }

  if (isFiniteNumber(relativeVolume) && relativeVolume < 0.8) {
    total += unitScale(0.8 - relativeVolume, 0, 0.5) * 0.06;
  }

  if (isFiniteNumber(spreadBps) && spreadBps > 0) {
    total += Math.min((spreadBps / 10_000) * 10, 0.02);
  }

  return clamp(total, 0.05, 0.2);
}

const REGIME_DIRECTION: Record<RegimeLabel, number> = {
  RISK_ON: 1,
  RISK_OFF: -1,
  ROTATION: 0,
  NEUTRAL: 0,
};

/**
 * Counter-trend fraction in [0, 1]:
 * +0.5 when the gap direction opposes the regime's risk posture,
 * plus up to 0.5 when momentum strongly opposes the gap.
 */
export function counterTrendFraction(
  candidate: Candidate,
  regime: RegimeLabel,
  config: ScoreConfig = DEFAULT_SCORE_CONFIG
): number {
  const { gapPct, momentumZScore } = candidate;
  if (!isFiniteNumber(gapPct) || Math.abs(gapPct) < 0.5) return 0;

  const gapDirection = Math.sign(gapPct);
  const regimeDirection = REGIME_DIRECTION[regime];
  let total = 0;

  if (regimeDirection !== 0 && gapDirection !== regimeDirection) {
    total += 0.5;
  }

  if (
    isFiniteNumber(momentumZScore) &&
    Math.abs(momentumZScore) > config.counterTrendZ &&
    Math.sign(momentumZScore) !== gapDirection
  ) {
    total += Math.min(0.5, (Math.abs(momentumZScore) - config.counterTrendZ) * 0.2);
  }

  return Math.min(total, 1);
}

// ============================================================================
// Tier
// ============================================================================

export function corroboratingSignals(
  candidate: Candidate,
  config: ScoreConfig = DEFAULT_SCORE_CONFIG
): CorroboratingSignal[] {
  const { signals } = config;
  const found: CorroboratingSignal[] = [];

  if (isFiniteNumber(candidate.gapPct) && Math.abs(candidate.gapPct) >= signals.gapPct) found.push("gap");
  if (isFiniteNumber(candidate.relativeVolume) && candidate.relativeVolume >= signals.relativeVolume) {
    found.push("volume");
  }
  if (isFiniteNumber(candidate.newsCatalystScore) && candidate.newsCatalystScore >= signals.news) {
    found.push("news");
  }
  if (isFiniteNumber(candidate.momentumZScore) && candidate.momentumZScore >= signals.momentumZ) {
    found.push("momentum");
  }
  if (candidate.earningsBmo) found.push("earnings");
  if (isFiniteNumber(candidate.extHoursScore) && candidate.extHoursScore >= signals.extHours) {
    found.push("extHours");
  }
  return found;
}

export function qualityFlags(candidate: Candidate): string[] {
  return candidate.dataQualityFlags.filter((flag) => !INFORMATIONAL_FLAGS.includes(flag));
}

export function confidenceTier(
  score: number | null,
  signals: readonly CorroboratingSignal[],
  hasQualityFlags: boolean,
  config: ScoreConfig = DEFAULT_SCORE_CONFIG
): ConfidenceTier {
  if (score === null) return "WATCHLIST";

  if (
    score >= config.highConvictionScore &&
    signals.length >= config.highConvictionMinSignals &&
    signals.includes("gap") &&
    signals.includes("volume") &&
    !hasQualityFlags
  ) {
    return "HIGH_CONVICTION";
  }
  if (score >= config.standardScore && signals.length >= 1) return "STANDARD";
  return "WATCHLIST";
}

/** entryProbability bounds: one rounding step inside (0, 1) */
const PROBABILITY_FLOOR = 0.0001;
const PROBABILITY_CEILING = 0.9999;

/**
 * Logistic entry probability, rounded to 4 dp and kept strictly inside (0, 1)
 */
export function entryProbability(score: number, config: ScoreConfig = DEFAULT_SCORE_CONFIG): number {
  const p = round(logistic((score - config.entryProbabilityMidpoint) / config.entryProbabilityScale), 4);
  return clamp(p, PROBABILITY_FLOOR, PROBABILITY_CEILING);
}

// ============================================================================
// Scoring
// ============================================================================

function applyCap(
  signal: Record<SignalComponentKey, number>,
  fraction: number
): { capped: Record<SignalComponentKey, number>; outcome: CapOutcome } {
  const solution = solveConcentrationCap(Object.values(signal), fraction);
  const capped = { ...signal };

  if (solution.kind !== "capped") {
    return {
      capped,
      outcome: {
        applied: false,
        cap: null,
        cappedComponents: [],
        skippedReason: solution.kind === "skipped" ? solution.reason : null,
      },
    };
  }

  const cappedComponents: SignalComponentKey[] = [];
  for (const key of SIGNAL_COMPONENT_KEYS) {
    if (capped[key] > solution.cap) {
      capped[key] = solution.cap;
      cappedComponents.push(key);
    }
  }
  return {
    capped,
    outcome: { applied: true, cap: solution.cap, cappedComponents, skippedReason: null },
  };
}

function emptySignals(): Record<SignalComponentKey, number> {
  return {
    gap: 0,
    gapSectorRelative: 0,
    relativeVolume: 0,
    momentum: 0,
    macro: 0,
    news: 0,
    extHours: 0,
    earningsBmo: 0,
    freshness: 0,
    atrRank: 0,
  };
}

function weightedSignals(
  normalized: Record<SignalComponentKey, number | null>,
  weights: WeightMap
): { signal: Record<SignalComponentKey, number>; missing: SignalComponentKey[] } {
  const signal = emptySignals();
  const missing: SignalComponentKey[] = [];
  for (const key of SIGNAL_COMPONENT_KEYS) {
    const value = normalized[key];
    if (value === null) {
      missing.push(key);
      signal[key] = 0;
    } else {
      signal[key] = weights[key] * shape(value);
    }
  }
  return { signal, missing };
}

/**
 * Score one eligible candidate. Never throws for bad data: a non-finite
 * result is reported as `score: null` with `invariantViolation` set.
 */
export function scoreCandidate(
  candidate: Candidate,
  weightSet: WeightSet,
  regime: RegimeSnapshot,
  options: ScoreOptions = {}
): ScoreResult {
  const config = options.config ?? DEFAULT_SCORE_CONFIG;
  const decay = options.decay ?? DEFAULT_DECAY_CONFIG;
  const { weights } = applyRegimeAdjustments(weightSet, regime);

  const normalized = normalizeFeatures(candidate, options.sectorAverageGap ?? null, decay);
  const { signal, missing } = weightedSignals(normalized, weights);
  const { capped, outcome } = applyCap(signal, config.capFraction);

  const riskPenalty = -weights.riskPenalty * riskPenaltyFraction(candidate, config);
  const counterTrendPenalty =
    -weights.counterTrendPenalty * counterTrendFraction(candidate, regime.label, config);

  const components: ScoreComponents = { ...capped, riskPenalty, counterTrendPenalty };
  const rawComponents: ScoreComponents = { ...signal, riskPenalty, counterTrendPenalty };

  const total = Object.values(components).reduce((sum, value) => sum + value, 0);
  const signals = corroboratingSignals(candidate, config);

  if (missing.length > 0) {
    log.debug(`Unknown inputs for ${candidate.symbol}`, { missing });
  }

  if (!isFiniteNumber(total)) {
    log.warn(`Score unavailable for ${candidate.symbol}`, { total: String(total) });
    return {
      components,
      rawComponents,
      score: null,
      tier: "WATCHLIST",
      entryProbability: null,
      corroboratingSignals: signals,
      cap: outcome,
      missing,
      invariantViolation: `non_finite_score:${String(total)}`,
    };
  }

  const score = round(total, 4);
  return {
    components,
    rawComponents,
    score,
    tier: confidenceTier(score, signals, qualityFlags(candidate).length > 0, config),
    entryProbability: entryProbability(score, config),
    corroboratingSignals: signals,
    cap: outcome,
    missing,
    invariantViolation: null,
  };
}
