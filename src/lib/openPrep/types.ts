/**
 * Open-Prep Domain Types
 *
 * Records flowing through ingest → filter → score → playbook → rank.
 * Every stage returns new records; nothing here is mutated after construction.
 */

// ============================================================================
// Candidate
// ============================================================================

export interface NewsHeadline {
  title: string;
  source: string | null;
  /** ISO-8601 timestamp of the article, if known */
  publishedAt: string | null;
}

/**
 * One symbol's pre-market state for a run.
 *
 * Numeric features are `number | null`: null means the value is unknown and
 * is never read as zero.
 */
export interface Candidate {
  readonly symbol: string;
  readonly price: number | null;
  readonly previousClose: number | null;
  readonly gapPct: number | null;
  readonly relativeVolume: number | null;
  readonly atrPct: number | null;
  readonly momentumZScore: number | null;
  readonly sector: string | null;
  readonly newsCatalystScore: number | null;
  readonly premarketFreshnessSec: number | null;
  /** Run-wide macro bias in [-1, 1], copied onto every candidate */
  readonly macroBias: number;
  /** Sorted and de-duplicated */
  readonly dataQualityFlags: readonly string[];

  readonly avgVolume: number | null;
  readonly extHoursScore: number | null;
  readonly spreadBps: number | null;
  readonly earningsBmo: boolean;
  readonly splitToday: boolean;
  readonly ipoWindow: boolean;
  readonly premarketStale: boolean;
  /** Distance from nearest key level (PDH/PDL/premarket high-low) in ATR units */
  readonly keyLevelDistanceAtr: number | null;
  readonly news: NewsHeadline | null;

  // Display only, never part of scoring or the dirty fingerprint
  readonly companyName: string | null;
  readonly quoteTimestamp: string | null;
}

// ============================================================================
// Scoring
// ============================================================================

export const SIGNAL_COMPONENT_KEYS = [
  "gap",
  "gapSectorRelative",
  "relativeVolume",
  "momentum",
  "macro",
  "news",
  "extHours",
  "earningsBmo",
  "freshness",
  "atrRank",
] as const;

export const PENALTY_COMPONENT_KEYS = ["riskPenalty", "counterTrendPenalty"] as const;

export const COMPONENT_KEYS = [...SIGNAL_COMPONENT_KEYS, ...PENALTY_COMPONENT_KEYS] as const;

export type SignalComponentKey = (typeof SIGNAL_COMPONENT_KEYS)[number];
export type PenaltyComponentKey = (typeof PENALTY_COMPONENT_KEYS)[number];
export type ComponentKey = SignalComponentKey | PenaltyComponentKey;

/** Named weighted contributions; penalties are stored as values <= 0 */
export type ScoreComponents = Readonly<Record<ComponentKey, number>>;

export type WeightMap = Readonly<Record<ComponentKey, number>>;

export interface WeightSet {
  readonly name: string;
  readonly version: number;
  readonly weights: WeightMap;
}

export const CONFIDENCE_TIERS = ["HIGH_CONVICTION", "STANDARD", "WATCHLIST"] as const;
export type ConfidenceTier = (typeof CONFIDENCE_TIERS)[number];

export type CorroboratingSignal = "gap" | "volume" | "news" | "momentum" | "earnings" | "extHours";

export type CapSkipReason = "no_positive_components" | "too_few_positive_components";

export interface CapOutcome {
  applied: boolean;
  /** Final cap value when applied */
  cap: number | null;
  cappedComponents: SignalComponentKey[];
  skippedReason: CapSkipReason | null;
}

export interface ScoreResult {
  components: ScoreComponents;
  /** Components before the concentration cap */
  rawComponents: ScoreComponents;
  /** null when the score could not be computed ("score unavailable") */
  score: number | null;
  tier: ConfidenceTier;
  entryProbability: number | null;
  corroboratingSignals: CorroboratingSignal[];
  cap: CapOutcome;
  /** Signal components whose input was unknown and contributed 0 */
  missing: SignalComponentKey[];
  invariantViolation: string | null;
}

// ============================================================================
// Regime
// ============================================================================

export const REGIME_LABELS = ["RISK_ON", "RISK_OFF", "ROTATION", "NEUTRAL"] as const;
export type RegimeLabel = (typeof REGIME_LABELS)[number];

export type WeightMultipliers = Readonly<Partial<Record<ComponentKey, number>>>;

export interface SectorPerformance {
  sector: string;
  changePct: number;
}

export interface RegimeInputs {
  macroBias: number;
  vixLevel: number | null;
  /** Fraction of sectors advancing in [0, 1]; null = no data (not 0) */
  sectorBreadth: number | null;
  sectorPerformance?: readonly SectorPerformance[];
}

export interface RegimeSnapshot {
  readonly label: RegimeLabel;
  readonly previous: RegimeLabel;
  readonly vixLevel: number | null;
  readonly macroBias: number;
  readonly sectorBreadth: number | null;
  readonly leadingSectors: readonly string[];
  readonly laggingSectors: readonly string[];
  readonly weightMultipliers: WeightMultipliers;
  readonly hysteresisApplied: boolean;
  readonly reasons: readonly string[];
}

/** Prior-regime state carried between runs of the same session */
export interface RegimeHistory {
  readonly previous: RegimeLabel;
  readonly sessionDate: string | null;
  readonly transitions: number;
}

// ============================================================================
// Filter
// ============================================================================

export type FilterReason =
  | "symbol_missing"
  | "price_missing"
  | "price_below_floor"
  | "previous_close_missing"
  | "severe_gap_down"
  | "ipo_window"
  | "split_today"
  | "macro_risk_off_extreme"
  | "data_quality_insufficient";

export type FilterWarning =
  | "premarket_stale"
  | "spread_too_wide"
  | "insufficient_liquidity"
  | "atr_missing"
  | "relative_volume_missing";

export interface FilterResult {
  eligible: boolean;
  reasons: FilterReason[];
  warnings: FilterWarning[];
}

// ============================================================================
// Playbook
// ============================================================================

export type PlaybookType = "GAP_AND_GO" | "GAP_FADE" | "POST_NEWS_DRIFT" | "NO_TRADE";

export type NewsEventClass = "SCHEDULED" | "UNSCHEDULED" | "STRUCTURAL" | "UNKNOWN";
export type Materiality = "HIGH" | "MEDIUM" | "LOW";
export type RecencyBucket = "ULTRA_FRESH" | "FRESH" | "WARM" | "AGING" | "STALE" | "UNKNOWN";
export type SourceTier = "TIER_1" | "TIER_2" | "TIER_3" | "TIER_4";
export type ExecutionQuality = "GOOD" | "CAUTION" | "POOR";

export interface NewsEventInfo {
  eventClass: NewsEventClass;
  eventLabel: string;
  eventLabelsAll: string[];
  materiality: Materiality;
}

export interface RecencyInfo {
  bucket: RecencyBucket;
  ageMinutes: number | null;
  isActionable: boolean;
}

export interface SourceInfo {
  tier: SourceTier;
  rank: 1 | 2 | 3 | 4;
}

export interface PlaybookSubScores {
  gapAndGo: number;
  fade: number;
  drift: number;
}

export interface PlaybookAssignment {
  playbook: PlaybookType;
  reason: string;
  subScores: PlaybookSubScores;
  entryTrigger: string;
  invalidation: string;
  exitPlan: string;
  timeHorizon: string;
  regimeAligned: boolean;
  noTradeZone: boolean;
  noTradeZoneReason: string | null;
  news: NewsEventInfo & { recency: RecencyInfo; source: SourceInfo };
  executionQuality: ExecutionQuality;
  sizeAdjustment: number;
  dollarVolumeOk: boolean;
  haltRisk: boolean;
  maxLossPct: number;
}
