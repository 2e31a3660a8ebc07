/**
 * Playbook Assigner
 *
 * Maps a scored candidate to one of four setups with concrete guidance:
 *
 * 1. Classify the catalyst (event class, materiality, recency, source tier)
 * 2. Score fit for Gap & Go, Gap Fade and Post-News Drift (each 0..1)
 * 3. Check execution quality (spread, dollar volume, average volume)
 * 4. Apply the no-trade-zone overlay
 * 5. Pick the best setup over its threshold, else NO_TRADE
 *
 * Unknown features never earn a sub-score contribution.
 */

import { isFiniteNumber, round } from "../utils/validation.js";
import { DEFAULT_PLAYBOOK_CONFIG, type NoTradeWindow, type PlaybookConfig } from "./pipelineConfig.js";
import {
  classifyNewsEvent,
  classifyRecency,
  classifySourceQuality,
  getNewsTaxonomy,
  type NewsTaxonomy,
} from "./newsClassification.js";
import type {
  Candidate,
  ExecutionQuality,
  NewsEventInfo,
  PlaybookAssignment,
  PlaybookSubScores,
  PlaybookType,
  RecencyInfo,
  RegimeLabel,
  RegimeSnapshot,
  ScoreResult,
} from "./types.js";

export interface PlaybookOptions {
  config?: PlaybookConfig;
  /** Evaluation time for recency and no-trade windows */
  now: Date;
  taxonomy?: NewsTaxonomy;
}

const GO_MIN_GAP = 1;
const GO_MIN_RVOL = 1.5;
const GO_MIN_EXT = 0.7;
const FADE_MIN_GAP = 5;
const FADE_MAX_EXT = 0.3;
const HALT_RISK_GAP = 10;
const EXTREME_GAP = 15;
const MIN_DOLLAR_VOLUME = 500_000;

// ============================================================================
// Sub-scores
// ============================================================================

export function gapAndGoScore(
  candidate: Candidate,
  regime: RegimeLabel,
  news: NewsEventInfo,
  recency: RecencyInfo
): number {
  const { gapPct, relativeVolume, extHoursScore } = candidate;
  let s = 0;

  if (isFiniteNumber(gapPct) && gapPct >= GO_MIN_GAP) s += Math.min(gapPct / 8, 0.25);
  if (isFiniteNumber(relativeVolume) && relativeVolume >= GO_MIN_RVOL) s += Math.min(relativeVolume / 8, 0.25);
  if (isFiniteNumber(extHoursScore) && extHoursScore >= GO_MIN_EXT) s += Math.min(extHoursScore / 4, 0.2);

  if (regime === "RISK_ON") s += 0.15;
  else if (regime === "NEUTRAL") s += 0.08;

  if (recency.isActionable && (news.materiality === "HIGH" || news.materiality === "MEDIUM")) s += 0.1;
  if (news.eventClass === "SCHEDULED" || news.eventClass === "UNSCHEDULED") s += 0.05;

  return Math.min(round(s, 4), 1);
}

export function fadeScore(candidate: Candidate, regime: RegimeSnapshot, news: NewsEventInfo): number {
  const { gapPct, relativeVolume, extHoursScore } = candidate;
  let s = 0;

  if (isFiniteNumber(gapPct) && Math.abs(gapPct) >= FADE_MIN_GAP) s += Math.min(Math.abs(gapPct) / 15, 0.3);
  // Weak pre-market tape
  if (isFiniteNumber(extHoursScore) && extHoursScore <= FADE_MAX_EXT) {
    s += 0.25 * (1 - Math.max(extHoursScore, 0));
  }
  if (isFiniteNumber(relativeVolume) && relativeVolume < 2) s += 0.15;

  if (regime.label === "RISK_OFF") s += 0.15;
  else if (regime.sectorBreadth !== null && regime.sectorBreadth < 0.4) s += 0.1;

  if (news.eventClass === "STRUCTURAL") s += 0.1;
  if (news.materiality === "LOW") s += 0.05;

  return Math.min(round(s, 4), 1);
}

export function driftScore(
  candidate: Candidate,
  news: NewsEventInfo,
  recency: RecencyInfo,
  taxonomy: NewsTaxonomy = getNewsTaxonomy()
): number {
  const { gapPct, momentumZScore } = candidate;
  let s = 0;

  if (news.materiality === "HIGH") s += 0.3;
  else if (news.materiality === "MEDIUM") s += 0.15;

  // Initial noise has settled
  if (recency.bucket === "WARM" || recency.bucket === "AGING") s += 0.25;
  else if (recency.bucket === "FRESH") s += 0.1;

  if (taxonomy.driftLabels.has(news.eventLabel)) s += 0.2;
  if (isFiniteNumber(momentumZScore) && Math.abs(momentumZScore) > 1) {
    s += Math.min(Math.abs(momentumZScore) / 5, 0.15);
  }
  if (isFiniteNumber(gapPct) && Math.abs(gapPct) >= 0.5 && Math.abs(gapPct) <= 5) s += 0.1;

  return Math.min(round(s, 4), 1);
}

// ============================================================================
// Execution + no-trade zones
// ============================================================================

export function assessExecution(
  candidate: Candidate,
  config: PlaybookConfig = DEFAULT_PLAYBOOK_CONFIG
): { quality: ExecutionQuality; sizeAdjustment: number } {
  const { spreadBps, avgVolume, price } = candidate;
  let issues = 0;

  if (isFiniteNumber(spreadBps)) {
    if (spreadBps > config.maxSpreadBpsForTrade) issues += 2;
    else if (spreadBps > 60) issues += 1;
  }

  if (isFiniteNumber(avgVolume)) {
    if (isFiniteNumber(price) && price > 0 && avgVolume > 0) {
      const dollarVolume = price * avgVolume;
      if (dollarVolume < MIN_DOLLAR_VOLUME) issues += 2;
      else if (dollarVolume < 1_000_000) issues += 1;
    }
    if (avgVolume < 50_000) issues += 2;
    else if (avgVolume < 100_000) issues += 1;
  }

  if (issues >= 3) return { quality: "POOR", sizeAdjustment: 0 };
  if (issues === 2) return { quality: "CAUTION", sizeAdjustment: 0.25 };
  if (issues === 1) return { quality: "CAUTION", sizeAdjustment: 0.5 };
  return { quality: "GOOD", sizeAdjustment: 1 };
}

function parseClock(value: string): number {
  const [hours, minutes] = value.split(":").map(Number);
  return hours * 60 + minutes;
}

/**
 * Minutes since midnight, America/New_York wall clock
 */
export function easternMinuteOfDay(date: Date): number {
  const et = new Date(date.toLocaleString("en-US", { timeZone: "America/New_York" }));
  return et.getHours() * 60 + et.getMinutes();
}

/**
 * Labels of the configured windows containing `now` (start inclusive, end exclusive;
 * a window whose end is before its start wraps midnight)
 */
export function activeNoTradeWindows(windows: readonly NoTradeWindow[], now: Date): string[] {
  const minute = easternMinuteOfDay(now);
  return windows
    .filter(({ start, end }) => {
      const from = parseClock(start);
      const to = parseClock(end);
      return from <= to ? minute >= from && minute < to : minute >= from || minute < to;
    })
    .map(({ label }) => label);
}

export function noTradeZoneReasons(
  candidate: Candidate,
  score: ScoreResult,
  news: NewsEventInfo,
  recency: RecencyInfo,
  options: { config: PlaybookConfig; now: Date }
): string[] {
  const { gapPct, extHoursScore, spreadBps, keyLevelDistanceAtr } = candidate;
  const absGap = isFiniteNumber(gapPct) ? Math.abs(gapPct) : 0;
  const reasons: string[] = [];

  if (score.score === null) reasons.push("score_unavailable");

  // Straight into a breaking-news candle that has not reclaimed
  if (
    news.eventClass === "UNSCHEDULED" &&
    recency.bucket === "ULTRA_FRESH" &&
    isFiniteNumber(extHoursScore) &&
    extHoursScore < 0.3 &&
    absGap > 3
  ) {
    reasons.push("breaking_news_no_reclaim");
  }

  if (candidate.premarketStale && isFiniteNumber(spreadBps) && spreadBps > 200) {
    reasons.push("illiquid_stale_premarket");
  }

  if (absGap > EXTREME_GAP) reasons.push("extreme_gap_halt_risk");

  if (isFiniteNumber(keyLevelDistanceAtr) && keyLevelDistanceAtr < options.config.keyLevelProximityAtr) {
    reasons.push("near_key_level");
  }

  for (const label of activeNoTradeWindows(options.config.noTradeWindows, options.now)) {
    reasons.push(`time_window:${label}`);
  }

  return reasons;
}

// ============================================================================
// Guidance
// ============================================================================

function entryTrigger(playbook: PlaybookType, candidate: Candidate): string {
  switch (playbook) {
    case "GAP_AND_GO":
      return candidate.earningsBmo
        ? "Let the post-earnings opening range form (first 5 min). Enter on a break and hold above ORH with volume; " +
            "alternatively a VWAP reclaim and hold after the first dip."
        : "Enter on a break and hold above the opening range high with RVOL > 1.5x and price above VWAP; " +
            "alternatively a VWAP reclaim when the first dip holds the pre-market low.";
    case "GAP_FADE":
      return isFiniteNumber(candidate.gapPct) && candidate.gapPct > 0
        ? "Short a failed break, VWAP rejection or lower high while RVOL declines. Enter below VWAP on the second rejection."
        : "Long the reversal on a VWAP reclaim from the gap down with the prior-day low holding. Enter above VWAP on a bullish 5-min close.";
    case "POST_NEWS_DRIFT":
      return "Wait 15-60 min after the headline for the noise to settle, then enter with the trend " +
        "(higher lows long, lower highs short) around VWAP and ATR levels.";
    case "NO_TRADE":
      return "No trade: conditions do not meet playbook criteria.";
  }
}

function invalidation(playbook: PlaybookType, candidate: Candidate): string {
  switch (playbook) {
    case "GAP_AND_GO":
      return "Close below VWAP after entry, a full gap fill, or a break of the opening range low on rising volume.";
    case "GAP_FADE":
      return isFiniteNumber(candidate.gapPct) && candidate.gapPct > 0
        ? "New high of day above entry or an ORH breakout with volume; a VWAP reclaim that holds."
        : "New low of day below entry; a VWAP rejection after the reclaim attempt.";
    case "POST_NEWS_DRIFT":
      return "Drift reverses (higher low lost for longs, lower high taken out for shorts) or price retraces to the pre-news level.";
    case "NO_TRADE":
      return "N/A";
  }
}

const EXIT_PLAN: Record<PlaybookType, string> = {
  GAP_AND_GO: "Scale 1/3 at +1R and move the stop to break-even, 1/3 at +1.5R or the ATR target, trail the rest at 1.5x ATR.",
  GAP_FADE: "Scale 1/2 at VWAP, 1/2 at the previous close or +1R. Hard stop, never average down.",
  POST_NEWS_DRIFT: "Hold 1-3 days, scale 1/3 at the next level, trail at 1.5x daily ATR, exit when volume dries up.",
  NO_TRADE: "N/A",
};

const TIME_HORIZON: Record<PlaybookType, string> = {
  GAP_AND_GO: "intraday (30min–2h)",
  GAP_FADE: "intraday (15min–1h)",
  POST_NEWS_DRIFT: "swing (1–3 days)",
  NO_TRADE: "N/A",
};

const BASE_MAX_LOSS_PCT: Record<PlaybookType, number> = {
  GAP_AND_GO: 0.5,
  GAP_FADE: 0.25,
  POST_NEWS_DRIFT: 0.75,
  NO_TRADE: 0,
};

export function maxLossPct(playbook: PlaybookType, quality: ExecutionQuality): number {
  if (quality === "POOR") return 0;
  const base = BASE_MAX_LOSS_PCT[playbook];
  return quality === "CAUTION" ? round(base * 0.5, 2) : base;
}

// ============================================================================
// Assignment
// ============================================================================

function fmt(value: number | null, digits: number): string {
  return isFiniteNumber(value) ? value.toFixed(digits) : "n/a";
}

function select(
  sub: PlaybookSubScores,
  config: PlaybookConfig
): Exclude<PlaybookType, "NO_TRADE"> | null {
  const { gapAndGo: go, fade, drift } = sub;
  if (go >= fade && go >= drift && go >= config.goThreshold) return "GAP_AND_GO";
  if (fade >= go && fade >= drift && fade >= config.fadeThreshold) return "GAP_FADE";
  if (drift >= config.driftThreshold) return "POST_NEWS_DRIFT";
  return null;
}

/**
 * Assign a playbook to one scored candidate. Pure; `options.now` is the only clock.
 */
export function assignPlaybook(
  candidate: Candidate,
  score: ScoreResult,
  regime: RegimeSnapshot,
  options: PlaybookOptions
): PlaybookAssignment {
  const config = options.config ?? DEFAULT_PLAYBOOK_CONFIG;
  const taxonomy = options.taxonomy ?? getNewsTaxonomy();
  const headline = candidate.news;

  const event = classifyNewsEvent(headline?.title ?? "", "", taxonomy);
  const recency = classifyRecency(headline?.publishedAt ?? null, options.now);
  const source = classifySourceQuality(headline?.source ?? null, headline?.title ?? "", taxonomy);

  const subScores: PlaybookSubScores = {
    gapAndGo: gapAndGoScore(candidate, regime.label, event, recency),
    fade: fadeScore(candidate, regime, event),
    drift: driftScore(candidate, event, recency, taxonomy),
  };

  const execution = assessExecution(candidate, config);
  const ntzReasons = noTradeZoneReasons(candidate, score, event, recency, { config, now: options.now });
  const noTradeZone = ntzReasons.length > 0;
  const gap = candidate.gapPct;

  let playbook: PlaybookType;
  let reason: string;
  const selected = select(subScores, config);

  if (noTradeZone) {
    playbook = "NO_TRADE";
    reason = ntzReasons.join("; ");
  } else if (execution.quality === "POOR") {
    playbook = "NO_TRADE";
    reason = "Execution quality too poor";
  } else if (selected === "GAP_AND_GO") {
    playbook = selected;
    reason = `Gap&Go: gap=${fmt(gap, 1)}%, RVOL=${fmt(candidate.relativeVolume, 1)}x, tape=${fmt(candidate.extHoursScore, 2)}`;
  } else if (selected === "GAP_FADE") {
    const breadth = regime.sectorBreadth === null ? "n/a" : `${Math.round(regime.sectorBreadth * 100)}%`;
    playbook = selected;
    reason = `Gap Fade: gap=${fmt(gap, 1)}%, weak tape=${fmt(candidate.extHoursScore, 2)}, breadth=${breadth}`;
  } else if (selected === "POST_NEWS_DRIFT") {
    playbook = selected;
    reason = `Post-News Drift: ${event.eventLabel}, materiality=${event.materiality}`;
  } else {
    playbook = "NO_TRADE";
    reason =
      `No playbook scores above threshold ` +
      `(go=${subScores.gapAndGo.toFixed(2)}, fade=${subScores.fade.toFixed(2)}, drift=${subScores.drift.toFixed(2)})`;
  }

  const regimeAligned = !(
    (playbook === "GAP_AND_GO" && regime.label === "RISK_OFF") ||
    (playbook === "GAP_FADE" && regime.label === "RISK_ON" && isFiniteNumber(gap) && gap > 0)
  );

  const { price, avgVolume } = candidate;

  return {
    playbook,
    reason,
    subScores,
    entryTrigger: entryTrigger(playbook, candidate),
    invalidation: invalidation(playbook, candidate),
    exitPlan: EXIT_PLAN[playbook],
    timeHorizon: TIME_HORIZON[playbook],
    regimeAligned,
    noTradeZone,
    noTradeZoneReason: noTradeZone ? ntzReasons.join("; ") : null,
    news: { ...event, recency, source },
    executionQuality: execution.quality,
    sizeAdjustment: execution.sizeAdjustment,
    dollarVolumeOk:
      isFiniteNumber(price) && isFiniteNumber(avgVolume) && price * avgVolume >= MIN_DOLLAR_VOLUME,
    haltRisk: isFiniteNumber(gap) && Math.abs(gap) > HALT_RISK_GAP,
    maxLossPct: maxLossPct(playbook, execution.quality),
  };
}
