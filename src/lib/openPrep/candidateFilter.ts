/**
 * Candidate Filter
 *
 * Hard eligibility gates that run before scoring. Total: any object shaped
 * like a partial Candidate yields a result, never an exception.
 *
 * Blocking reasons remove the candidate (it lands in `filteredOut`).
 * Warnings are carried onto the ranked record but do not block.
 */

import { isFiniteNumber } from "../utils/validation.js";
import { DEFAULT_FILTER_CONFIG, type FilterConfig } from "./pipelineConfig.js";
import type { Candidate, FilterReason, FilterResult, FilterWarning } from "./types.js";

export function filterCandidate(
  candidate: Partial<Candidate>,
  config: FilterConfig = DEFAULT_FILTER_CONFIG
): FilterResult {
  const reasons: FilterReason[] = [];
  const warnings: FilterWarning[] = [];

  if (typeof candidate.symbol !== "string" || candidate.symbol.trim() === "") {
    reasons.push("symbol_missing");
  }

  // Price
  if (!isFiniteNumber(candidate.price) || candidate.price <= 0) {
    reasons.push("price_missing");
  } else if (candidate.price < config.minPrice) {
    reasons.push("price_below_floor");
  }

  // Previous close is required for a meaningful gap
  if (!isFiniteNumber(candidate.previousClose) || candidate.previousClose <= 0) {
    reasons.push("previous_close_missing");
  }

  if (isFiniteNumber(candidate.gapPct) && candidate.gapPct <= config.severeGapDownPct) {
    reasons.push("severe_gap_down");
  }

  // Corporate actions
  if (candidate.ipoWindow === true) reasons.push("ipo_window");
  if (candidate.splitToday === true) reasons.push("split_today");

  if (isFiniteNumber(candidate.macroBias) && candidate.macroBias <= config.macroRiskOffExtreme) {
    reasons.push("macro_risk_off_extreme");
  }

  const flags = Array.isArray(candidate.dataQualityFlags) ? candidate.dataQualityFlags : [];
  const hasBlockingFlag = flags.some((flag) => config.blockingDataQualityFlags.includes(flag));
  if (hasBlockingFlag || flags.length >= config.maxDataQualityFlags) {
    reasons.push("data_quality_insufficient");
  }

  // Warnings
  if (candidate.premarketStale === true) warnings.push("premarket_stale");
  if (isFiniteNumber(candidate.spreadBps) && candidate.spreadBps > config.maxSpreadBps) {
    warnings.push("spread_too_wide");
  }
  if (isFiniteNumber(candidate.avgVolume) && candidate.avgVolume < config.minAvgVolume) {
    warnings.push("insufficient_liquidity");
  }
  if (!isFiniteNumber(candidate.atrPct)) warnings.push("atr_missing");
  if (!isFiniteNumber(candidate.relativeVolume)) warnings.push("relative_volume_missing");

  return { eligible: reasons.length === 0, reasons, warnings };
}

/**
 * Value/threshold pair for gates with a numeric cutoff (for GateTracker deficits)
 */
export function gateDetails(
  reason: FilterReason,
  candidate: Candidate,
  config: FilterConfig = DEFAULT_FILTER_CONFIG
): { value: number; threshold: number } | undefined {
  switch (reason) {
    case "price_below_floor":
      return isFiniteNumber(candidate.price)
        ? { value: candidate.price, threshold: config.minPrice }
        : undefined;
    case "severe_gap_down":
      return isFiniteNumber(candidate.gapPct)
        ? { value: candidate.gapPct, threshold: config.severeGapDownPct }
        : undefined;
    case "macro_risk_off_extreme":
      return { value: candidate.macroBias, threshold: config.macroRiskOffExtreme };
    case "data_quality_insufficient":
      return {
        value: candidate.dataQualityFlags.length,
        threshold: config.maxDataQualityFlags,
      };
    default:
      return undefined;
  }
}
