/**
 * Dirty-flag cache for per-candidate scores.
 *
 * A candidate is re-scored only when its fingerprint changes. The fingerprint
 * covers every field the score stage reads plus the run context that changes
 * scoring: the regime, the sector average gap and a hash of the effective
 * weights and score/decay settings. Fields that only feed the
 * filter, the playbook or display (news headline, company name, quote time)
 * are excluded; the playbook is recomputed every run.
 */

import { createHash } from "crypto";
import { LRUCache } from "lru-cache";
import { createLogger } from "../utils/logger.js";
import { canonicalJson } from "./artifact.js";
import type { ScoreConfig } from "./pipelineConfig.js";
import type { DecayConfig } from "./signalDecay.js";
import type { Candidate, RegimeLabel, ScoreResult, WeightMap } from "./types.js";

const log = createLogger("DirtyFlagManager");

/** Candidate fields hashed into the fingerprint, in hash order */
export const FINGERPRINT_FIELDS = [
  "price",
  "gapPct",
  "relativeVolume",
  "atrPct",
  "momentumZScore",
  "sector",
  "newsCatalystScore",
  "premarketFreshnessSec",
  "macroBias",
  "extHoursScore",
  "spreadBps",
  "earningsBmo",
  "dataQualityFlags",
] as const satisfies ReadonlyArray<keyof Candidate>;

export interface FingerprintContext {
  weightSetName: string;
  weightSetVersion: number;
  regime: RegimeLabel;
  sectorAverageGap: number | null;
  /** From scoringContextKey; changes whenever weight values or score settings do */
  scoringKey: string;
}

export interface DirtyFlagStats {
  entries: number;
  hits: number;
  misses: number;
  hitRate: number;
}

export interface DirtyFlagOptions {
  maxEntries?: number;
  ttlMs?: number;
}

interface CacheEntry {
  fingerprint: string;
  result: ScoreResult;
}

function serialize(value: Candidate[keyof Candidate] | number | null): string {
  if (value === null) return "null";
  if (typeof value === "number") return Number.isFinite(value) ? value.toFixed(6) : String(value);
  if (typeof value === "boolean" || typeof value === "string") return String(value);
  if (Array.isArray(value)) return `[${value.join(",")}]`;
  return JSON.stringify(value);
}

/**
 * sha256 of the regime-adjusted weights and the score and decay settings.
 * A weight file edited without a version bump still invalidates cached scores.
 */
export function scoringContextKey(weights: WeightMap, score: ScoreConfig, decay: DecayConfig): string {
  return createHash("sha256").update(canonicalJson({ weights, score, decay })).digest("hex");
}

/**
 * sha256 over the score-relevant fields and scoring context
 */
export function computeFingerprint(candidate: Candidate, context: FingerprintContext): string {
  const parts = FINGERPRINT_FIELDS.map((field) => `${field}=${serialize(candidate[field])}`);
  parts.push(
    `weightSet=${context.weightSetName}@${context.weightSetVersion}`,
    `regime=${context.regime}`,
    `sectorAverageGap=${serialize(context.sectorAverageGap)}`,
    `scoring=${context.scoringKey}`
  );
  return createHash("sha256").update(parts.join("|")).digest("hex");
}

export class DirtyFlagManager {
  private cache: LRUCache<string, CacheEntry>;
  private hits = 0;
  private misses = 0;

  constructor(options: DirtyFlagOptions = {}) {
    this.cache = new LRUCache<string, CacheEntry>({
      max: options.maxEntries ?? 2_000,
      ttl: options.ttlMs ?? 15 * 60 * 1000,
      updateAgeOnGet: false,
    });
  }

  isDirty(symbol: string, fingerprint: string): boolean {
    return this.cache.get(symbol)?.fingerprint !== fingerprint;
  }

  /**
   * Cached result when the fingerprint still matches; counts hits and misses
   */
  getCached(symbol: string, fingerprint: string): ScoreResult | undefined {
    const entry = this.cache.get(symbol);
    if (entry && entry.fingerprint === fingerprint) {
      this.hits++;
      return entry.result;
    }
    this.misses++;
    return undefined;
  }

  markClean(symbol: string, fingerprint: string, result: ScoreResult): void {
    this.cache.set(symbol, { fingerprint, result });
  }

  invalidate(symbol: string): void {
    this.cache.delete(symbol);
  }

  clear(): void {
    log.debug("Cache cleared", { entries: this.cache.size });
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }

  stats(): DirtyFlagStats {
    const lookups = this.hits + this.misses;
    return {
      entries: this.cache.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups === 0 ? 0 : Math.round((this.hits / lookups) * 10_000) / 10_000,
    };
  }
}
