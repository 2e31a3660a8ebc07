/**
 * Market Regime Classifier
 *
 * Maps macro bias, VIX and sector breadth to one of four regimes:
 * - RISK_OFF: VIX at/above the enter threshold, or strongly negative macro bias
 * - ROTATION: mixed breadth with clear sector leaders AND laggards
 * - RISK_ON: positive bias with broad participation, or calm VIX
 * - NEUTRAL: everything else
 *
 * RISK_OFF has hysteresis: once entered (VIX >= 30) it holds until VIX drops
 * below the lower exit threshold (27). Prior state is carried in an explicit
 * RegimeHistory value threaded through by the caller.
 */

import { clamp, isFiniteNumber, round } from "../utils/validation.js";
import { DEFAULT_REGIME_THRESHOLDS, type RegimeThresholds } from "./pipelineConfig.js";
import {
  COMPONENT_KEYS,
  type ComponentKey,
  type RegimeHistory,
  type RegimeInputs,
  type RegimeLabel,
  type RegimeSnapshot,
  type SectorPerformance,
  type WeightMultipliers,
  type WeightSet,
} from "./types.js";

/**
 * Weight multipliers per regime. Missing keys mean 1.0.
 */
export const REGIME_WEIGHT_MULTIPLIERS: Readonly<Record<RegimeLabel, WeightMultipliers>> = {
  RISK_ON: {
    gap: 1.2,
    gapSectorRelative: 0.8,
    relativeVolume: 1.1,
    macro: 1.3,
    momentum: 1.1,
    earningsBmo: 1.2,
    extHours: 1.0,
    freshness: 0.8,
    counterTrendPenalty: 0.5,
  },
  RISK_OFF: {
    gap: 0.5,
    gapSectorRelative: 0.5,
    relativeVolume: 0.8,
    macro: 1.5,
    momentum: 0.6,
    earningsBmo: 0.8,
    extHours: 0.7,
    freshness: 1.3,
    riskPenalty: 2.0,
    counterTrendPenalty: 2.0,
  },
  ROTATION: {
    gap: 0.7,
    gapSectorRelative: 1.8,
    relativeVolume: 1.0,
    macro: 0.8,
    momentum: 1.3,
    earningsBmo: 1.0,
    extHours: 1.0,
    freshness: 1.0,
  },
  NEUTRAL: {},
};

export interface RegimeClassification {
  regime: RegimeSnapshot;
  history: RegimeHistory;
}

/**
 * Fresh prior-regime state. Call once at the start of each independent run
 * (or session); within a session the returned history is threaded forward.
 */
export function resetRegimeState(sessionDate: string | null = null): RegimeHistory {
  return { previous: "NEUTRAL", sessionDate, transitions: 0 };
}

function splitSectors(
  rows: readonly SectorPerformance[],
  movePct: number
): { leading: string[]; lagging: string[] } {
  const valid = rows.filter((row) => row.sector.trim() !== "" && isFiniteNumber(row.changePct));
  const leading = valid
    .filter((row) => row.changePct > movePct)
    .sort((a, b) => b.changePct - a.changePct || a.sector.localeCompare(b.sector))
    .map((row) => row.sector);
  const lagging = valid
    .filter((row) => row.changePct < -movePct)
    .sort((a, b) => a.changePct - b.changePct || a.sector.localeCompare(b.sector))
    .map((row) => row.sector);
  return { leading, lagging };
}

/**
 * Breadth as given, else the advancing fraction of the sector rows, else null
 */
export function resolveBreadth(inputs: RegimeInputs): number | null {
  if (isFiniteNumber(inputs.sectorBreadth)) return clamp(inputs.sectorBreadth, 0, 1);

  const rows = (inputs.sectorPerformance ?? []).filter((row) => isFiniteNumber(row.changePct));
  if (rows.length === 0) return null;
  const advancing = rows.filter((row) => row.changePct > 0).length;
  return round(advancing / rows.length, 4);
}

export function classifyRegime(
  inputs: RegimeInputs,
  history: RegimeHistory,
  thresholds: RegimeThresholds = DEFAULT_REGIME_THRESHOLDS
): RegimeClassification {
  const reasons: string[] = [];
  const vix = isFiniteNumber(inputs.vixLevel) ? inputs.vixLevel : null;
  const macroBias = isFiniteNumber(inputs.macroBias) ? clamp(inputs.macroBias, -1, 1) : 0;
  if (!isFiniteNumber(inputs.macroBias)) {
    reasons.push("macro bias unavailable, treated as 0");
  }
  const breadth = resolveBreadth(inputs);
  const { leading, lagging } = splitSectors(
    inputs.sectorPerformance ?? [],
    thresholds.sectorMovePct
  );

  const wasRiskOff = history.previous === "RISK_OFF";
  const vixThreshold = wasRiskOff ? thresholds.vixRiskOffExit : thresholds.vixRiskOffEnter;
  let hysteresisApplied = false;
  let label: RegimeLabel | null = null;

  // 1. Volatility risk-off (with hysteresis band)
  if (vix === null) {
    reasons.push("VIX unavailable, volatility rules skipped");
  } else if (vix >= vixThreshold) {
    label = "RISK_OFF";
    hysteresisApplied = wasRiskOff && vix < thresholds.vixRiskOffEnter;
    reasons.push(
      hysteresisApplied
        ? `VIX ${vix} still at/above exit threshold ${thresholds.vixRiskOffExit}, holding RISK_OFF`
        : `VIX ${vix} >= ${vixThreshold}`
    );
  } else if (wasRiskOff) {
    reasons.push(`VIX ${vix} below exit threshold ${thresholds.vixRiskOffExit}, leaving RISK_OFF`);
  }

  // 2. Macro risk-off
  if (label === null && macroBias <= thresholds.macroRiskOffBias) {
    label = "RISK_OFF";
    reasons.push(`macro bias ${macroBias} <= ${thresholds.macroRiskOffBias}`);
  }

  if (label === null && breadth === null) {
    reasons.push("sector breadth unavailable, breadth rules skipped");
  }

  // 3. Rotation: mixed breadth with both leaders and laggards
  if (
    label === null &&
    breadth !== null &&
    breadth >= thresholds.rotationBreadthMin &&
    breadth <= thresholds.rotationBreadthMax &&
    leading.length >= thresholds.rotationMinSectors &&
    lagging.length >= thresholds.rotationMinSectors
  ) {
    label = "ROTATION";
    reasons.push(
      `breadth ${breadth} mixed with ${leading.length} leading / ${lagging.length} lagging sectors`
    );
  }

  // 4. Risk-on
  if (label === null) {
    if (breadth !== null && macroBias >= thresholds.riskOnBias && breadth >= thresholds.riskOnBreadth) {
      label = "RISK_ON";
      reasons.push(`macro bias ${macroBias} >= ${thresholds.riskOnBias} with breadth ${breadth}`);
    } else if (vix !== null && vix <= thresholds.vixLow && macroBias >= 0) {
      label = "RISK_ON";
      reasons.push(`VIX ${vix} <= ${thresholds.vixLow} with non-negative macro bias`);
    } else if (breadth !== null && breadth >= thresholds.strongBreadth) {
      label = "RISK_ON";
      reasons.push(`broad participation, breadth ${breadth} >= ${thresholds.strongBreadth}`);
    }
  }

  if (label === null) {
    label = "NEUTRAL";
    reasons.push("no regime rule matched");
  }

  const regime: RegimeSnapshot = Object.freeze({
    label,
    previous: history.previous,
    vixLevel: vix,
    macroBias,
    sectorBreadth: breadth,
    leadingSectors: leading,
    laggingSectors: lagging,
    weightMultipliers: REGIME_WEIGHT_MULTIPLIERS[label],
    hysteresisApplied,
    reasons,
  });

  return {
    regime,
    history: {
      previous: label,
      sessionDate: history.sessionDate,
      transitions: history.transitions + (label === history.previous ? 0 : 1),
    },
  };
}

/**
 * Regime-adjusted copy of a weight set. The input set is never modified.
 */
export function applyRegimeAdjustments(weightSet: WeightSet, regime: RegimeSnapshot): WeightSet {
  const weights: Record<ComponentKey, number> = { ...weightSet.weights };
  for (const key of COMPONENT_KEYS) {
    weights[key] = weightSet.weights[key] * (regime.weightMultipliers[key] ?? 1);
  }
  return Object.freeze({
    name: weightSet.name,
    version: weightSet.version,
    weights: Object.freeze(weights),
  });
}
