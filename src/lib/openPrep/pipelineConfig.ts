/**
 * Open-Prep pipeline configuration
 *
 * Built-in defaults, overlaid by config/open-prep.json (any subset of keys),
 * then by OPEN_PREP_* environment variables. The merged result is validated
 * once; anything malformed is a ConfigurationError.
 */

import { existsSync, readFileSync } from "fs";
import { z } from "zod";
import { getEnvVar } from "../env.js";
import { ConfigurationError, errorMessage } from "./errors.js";

// ============================================================================
// Schema
// ============================================================================

const finite = z.number().finite();
const positive = finite.positive();
const unit = finite.min(0).max(1);
const bias = finite.min(-1).max(1);
const clockTime = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "expected HH:MM");

export const RegimeThresholdsSchema = z
  .object({
    vixRiskOffEnter: positive,
    vixRiskOffExit: positive,
    vixLow: positive,
    macroRiskOffBias: bias,
    riskOnBias: bias,
    riskOnBreadth: unit,
    strongBreadth: unit,
    rotationBreadthMin: unit,
    rotationBreadthMax: unit,
    rotationMinSectors: z.number().int().min(1),
    sectorMovePct: positive,
  })
  .refine((t) => t.vixRiskOffExit < t.vixRiskOffEnter, {
    message: "vixRiskOffExit must be strictly below vixRiskOffEnter",
    path: ["vixRiskOffExit"],
  })
  .refine((t) => t.rotationBreadthMin <= t.rotationBreadthMax, {
    message: "rotationBreadthMin must not exceed rotationBreadthMax",
    path: ["rotationBreadthMin"],
  });

export const FilterConfigSchema = z.object({
  minPrice: positive,
  severeGapDownPct: finite.max(0),
  macroRiskOffExtreme: bias,
  maxSpreadBps: positive,
  minAvgVolume: finite.min(0),
  maxDataQualityFlags: z.number().int().min(1),
  blockingDataQualityFlags: z.array(z.string().min(1)),
});

export const DecayConfigSchema = z
  .object({
    baseHalfLifeSec: positive,
    minHalfLifeSec: positive,
    maxHalfLifeSec: positive,
    atrPctLow: positive,
    atrPctHigh: positive,
    neutralWeight: unit,
  })
  .refine((d) => d.minHalfLifeSec <= d.maxHalfLifeSec, {
    message: "minHalfLifeSec must not exceed maxHalfLifeSec",
    path: ["minHalfLifeSec"],
  })
  .refine((d) => d.atrPctLow < d.atrPctHigh, {
    message: "atrPctLow must be below atrPctHigh",
    path: ["atrPctLow"],
  });

export const ScoreConfigSchema = z
  .object({
    capFraction: finite.gt(0).lt(1),
    highConvictionScore: finite,
    standardScore: finite,
    highConvictionMinSignals: z.number().int().min(1),
    entryProbabilityMidpoint: finite,
    entryProbabilityScale: positive,
    counterTrendZ: positive,
    signals: z.object({
      gapPct: positive,
      relativeVolume: positive,
      news: positive,
      momentumZ: positive,
      extHours: unit,
    }),
  })
  .refine((s) => s.standardScore < s.highConvictionScore, {
    message: "standardScore must be below highConvictionScore",
    path: ["standardScore"],
  });

export const NoTradeWindowSchema = z.object({
  label: z.string().min(1),
  /** America/New_York wall-clock, inclusive start, exclusive end */
  start: clockTime,
  end: clockTime,
});

export const PlaybookConfigSchema = z.object({
  goThreshold: unit,
  fadeThreshold: unit,
  driftThreshold: unit,
  keyLevelProximityAtr: finite.min(0),
  maxSpreadBpsForTrade: positive,
  noTradeWindows: z.array(NoTradeWindowSchema),
});

export const PipelineConfigSchema = z.object({
  regime: RegimeThresholdsSchema,
  filter: FilterConfigSchema,
  decay: DecayConfigSchema,
  score: ScoreConfigSchema,
  playbook: PlaybookConfigSchema,
  ranking: z.object({ topN: z.number().int().min(1) }),
  diff: z.object({ scoreChangeThreshold: finite.min(0) }),
  cache: z.object({ maxEntries: z.number().int().min(1), ttlMs: z.number().int().min(1) }),
});

export type RegimeThresholds = z.infer<typeof RegimeThresholdsSchema>;
export type FilterConfig = z.infer<typeof FilterConfigSchema>;
export type ScoreConfig = z.infer<typeof ScoreConfigSchema>;
export type NoTradeWindow = z.infer<typeof NoTradeWindowSchema>;
export type PlaybookConfig = z.infer<typeof PlaybookConfigSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_REGIME_THRESHOLDS: RegimeThresholds = {
  vixRiskOffEnter: 30,
  vixRiskOffExit: 27,
  vixLow: 15,
  macroRiskOffBias: -0.5,
  riskOnBias: 0.3,
  riskOnBreadth: 0.6,
  strongBreadth: 0.75,
  rotationBreadthMin: 0.3,
  rotationBreadthMax: 0.7,
  rotationMinSectors: 2,
  sectorMovePct: 0.5,
};

export const DEFAULT_FILTER_CONFIG: FilterConfig = {
  minPrice: 5,
  severeGapDownPct: -25,
  macroRiskOffExtreme: -0.75,
  maxSpreadBps: 200,
  minAvgVolume: 100_000,
  maxDataQualityFlags: 3,
  blockingDataQualityFlags: ["halted", "stale_quote"],
};

export const DEFAULT_SCORE_CONFIG: ScoreConfig = {
  capFraction: 0.4,
  highConvictionScore: 60,
  standardScore: 30,
  highConvictionMinSignals: 3,
  entryProbabilityMidpoint: 40,
  entryProbabilityScale: 10,
  counterTrendZ: 2.5,
  signals: {
    gapPct: 2,
    relativeVolume: 1.5,
    news: 0.5,
    momentumZ: 1,
    extHours: 0.7,
  },
};

export const DEFAULT_PLAYBOOK_CONFIG: PlaybookConfig = {
  goThreshold: 0.3,
  fadeThreshold: 0.3,
  driftThreshold: 0.25,
  keyLevelProximityAtr: 0.25,
  maxSpreadBpsForTrade: 150,
  noTradeWindows: [],
};

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  regime: DEFAULT_REGIME_THRESHOLDS,
  filter: DEFAULT_FILTER_CONFIG,
  decay: {
    baseHalfLifeSec: 600,
    minHalfLifeSec: 180,
    maxHalfLifeSec: 1200,
    atrPctLow: 1,
    atrPctHigh: 5,
    neutralWeight: 0.5,
  },
  score: DEFAULT_SCORE_CONFIG,
  playbook: DEFAULT_PLAYBOOK_CONFIG,
  ranking: { topN: 25 },
  diff: { scoreChangeThreshold: 5 },
  cache: { maxEntries: 2_000, ttlMs: 15 * 60 * 1000 },
};

// ============================================================================
// Loading
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Recursive merge: objects merge key by key, everything else (arrays included) replaces
 */
export function mergeConfig(base: unknown, override: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(override)) {
    return override === undefined ? base : override;
  }
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = mergeConfig(base[key], value);
  }
  return merged;
}

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

/**
 * Validate a raw (possibly partial) config object over the defaults
 */
export function parsePipelineConfig(raw: unknown): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(mergeConfig(DEFAULT_PIPELINE_CONFIG, raw ?? {}));
  if (!result.success) {
    const details = formatZodIssues(result.error);
    throw new ConfigurationError(`Invalid open-prep configuration: ${details.join("; ")}`, details);
  }
  return result.data;
}

const ENV_NUMBER_OVERRIDES: ReadonlyArray<[string, [string, string]]> = [
  ["OPEN_PREP_TOP_N", ["ranking", "topN"]],
  ["OPEN_PREP_VIX_RISK_OFF_ENTER", ["regime", "vixRiskOffEnter"]],
  ["OPEN_PREP_VIX_RISK_OFF_EXIT", ["regime", "vixRiskOffExit"]],
  ["OPEN_PREP_MIN_PRICE", ["filter", "minPrice"]],
];

/**
 * Overrides from OPEN_PREP_* variables, as a partial config object
 */
export function envConfigOverrides(): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  for (const [envKey, [section, key]] of ENV_NUMBER_OVERRIDES) {
    const raw = getEnvVar(envKey);
    if (raw === undefined) continue;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      throw new ConfigurationError(`${envKey} must be numeric, got "${raw}"`);
    }
    const existing = overrides[section];
    overrides[section] = { ...(isPlainObject(existing) ? existing : {}), [key]: value };
  }
  return overrides;
}

/**
 * Load the pipeline config.
 * A missing file is fine when the path was not explicitly requested.
 *
 * @throws ConfigurationError on unreadable, unparsable or invalid config
 */
export function loadPipelineConfig(path: string | undefined, required = false): PipelineConfig {
  let fileConfig: unknown = {};

  if (path && existsSync(path)) {
    try {
      fileConfig = JSON.parse(readFileSync(path, "utf-8"));
    } catch (error) {
      throw new ConfigurationError(`Cannot read config ${path}: ${errorMessage(error)}`);
    }
    if (!isPlainObject(fileConfig)) {
      throw new ConfigurationError(`Config ${path} must contain a JSON object`);
    }
  } else if (path && required) {
    throw new ConfigurationError(`Config file not found: ${path}`);
  }

  return parsePipelineConfig(mergeConfig(fileConfig, envConfigOverrides()));
}
