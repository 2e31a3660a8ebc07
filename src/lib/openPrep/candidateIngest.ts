/**
 * Candidate ingestion
 *
 * The one place raw run input is validated. Downstream stages receive typed,
 * immutable Candidate records and never re-check field types.
 *
 * Field problems never reject a candidate here: the value becomes null and an
 * `invalid_<field>` data-quality flag is recorded, and the filter decides.
 * Only a record without a usable symbol is dropped (as a degraded entry).
 */

import { z } from "zod";
import { clamp, ensureStringSet, isFiniteNumber, round, toFiniteOrNull } from "../utils/validation.js";
import { InputError } from "./errors.js";
import { formatZodIssues } from "./pipelineConfig.js";
import type { DegradedReason } from "./result.js";
import type { Candidate, NewsHeadline, RegimeInputs, SectorPerformance } from "./types.js";

// ============================================================================
// Raw schemas (snake_case wire format)
// ============================================================================

export const RawRunInputSchema = z.object({
  session_date: z.unknown().optional(),
  macro_bias: z.unknown().optional(),
  vix_level: z.unknown().optional(),
  sector_breadth: z.unknown().optional(),
  sector_performance: z.array(z.unknown()).optional(),
  universe: z.array(z.unknown()).optional(),
  candidates: z.array(z.unknown()),
});

const RawCandidateSchema = z
  .object({
    symbol: z.string().trim().min(1).max(16),
  })
  .passthrough();

const RawNewsSchema = z.object({
  title: z.string().trim().min(1),
  source: z.string().nullable().optional(),
  published_at: z.string().nullable().optional(),
});

const RawSectorRowSchema = z.object({
  sector: z.string().trim().min(1),
  change_pct: z.number().finite(),
});

const SESSION_DATE = /^\d{4}-\d{2}-\d{2}$/;

export type RawRunInput = z.infer<typeof RawRunInputSchema>;

export interface IngestedRun {
  sessionDate: string | null;
  regimeInputs: RegimeInputs;
  candidates: Candidate[];
  degraded: DegradedReason[];
  /** Run-level input issues (bad context fields) */
  warnings: string[];
}

// ============================================================================
// Field readers
// ============================================================================

type RawRecord = Record<string, unknown>;

interface FieldReader {
  flags: string[];
  num(key: string, check?: (value: number) => boolean): number | null;
  bool(key: string): boolean;
  str(key: string): string | null;
}

function createReader(raw: RawRecord): FieldReader {
  const flags: string[] = [];

  return {
    flags,
    num(key, check) {
      const value = raw[key];
      if (value === undefined || value === null) return null;
      const parsed = toFiniteOrNull(value);
      if (parsed === null || (check && !check(parsed))) {
        flags.push(`invalid_${key}`);
        return null;
      }
      return parsed;
    },
    bool(key) {
      const value = raw[key];
      if (value === undefined || value === null) return false;
      if (typeof value === "boolean") return value;
      flags.push(`invalid_${key}`);
      return false;
    },
    str(key) {
      const value = raw[key];
      if (value === undefined || value === null) return null;
      if (typeof value === "string") return value.trim() === "" ? null : value.trim();
      flags.push(`invalid_${key}`);
      return null;
    },
  };
}

const isPositive = (value: number) => value > 0;
const isNonNegative = (value: number) => value >= 0;

function readNews(raw: unknown, flags: string[]): NewsHeadline | null {
  if (raw === undefined || raw === null) return null;
  const parsed = RawNewsSchema.safeParse(raw);
  if (!parsed.success) {
    flags.push("invalid_news");
    return null;
  }
  return {
    title: parsed.data.title,
    source: parsed.data.source ?? null,
    publishedAt: parsed.data.published_at ?? null,
  };
}

/**
 * Gap % from price and previous close, used when the feed sent no gap
 */
export function deriveGapPct(price: number | null, previousClose: number | null): number | null {
  if (!isFiniteNumber(price) || !isFiniteNumber(previousClose) || previousClose <= 0) return null;
  return round((price / previousClose - 1) * 100, 4);
}

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

/**
 * Build one Candidate from a raw record.
 * Returns a DegradedReason when the record has no usable symbol.
 */
export function ingestCandidate(
  raw: unknown,
  macroBias: number
): { ok: true; candidate: Candidate } | { ok: false; reason: DegradedReason } {
  const parsed = RawCandidateSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      reason: {
        stage: "ingest",
        code: "invalid_record",
        message: formatZodIssues(parsed.error).join("; "),
        symbol: null,
      },
    };
  }

  const record: RawRecord = parsed.data;
  const read = createReader(record);

  const price = read.num("price", isPositive);
  const previousClose = read.num("previous_close", isPositive);
  let gapPct = read.num("gap_pct");
  if (gapPct === null) {
    gapPct = deriveGapPct(price, previousClose);
    if (gapPct !== null) read.flags.push("gap_derived");
  }

  const premarketFreshness = read.num("premarket_freshness_sec");

  const candidate: Candidate = Object.freeze({
    symbol: normalizeSymbol(parsed.data.symbol),
    price,
    previousClose,
    gapPct,
    relativeVolume: read.num("relative_volume", isNonNegative),
    atrPct: read.num("atr_pct", isNonNegative),
    momentumZScore: read.num("momentum_z_score"),
    sector: read.str("sector"),
    newsCatalystScore: read.num("news_catalyst_score"),
    // Negative ages come from clock skew between feeds; treat as just-updated
    premarketFreshnessSec: premarketFreshness === null ? null : Math.max(premarketFreshness, 0),
    macroBias,
    avgVolume: read.num("avg_volume", isNonNegative),
    extHoursScore: read.num("ext_hours_score"),
    spreadBps: read.num("spread_bps", isNonNegative),
    earningsBmo: read.bool("earnings_bmo"),
    splitToday: read.bool("split_today"),
    ipoWindow: read.bool("ipo_window"),
    premarketStale: read.bool("premarket_stale"),
    keyLevelDistanceAtr: read.num("key_level_distance_atr", isNonNegative),
    news: readNews(record.news, read.flags),
    companyName: read.str("company_name"),
    quoteTimestamp: read.str("quote_timestamp"),
    dataQualityFlags: Object.freeze(
      ensureStringSet([...ensureStringSet(record.data_quality_flags), ...read.flags])
    ),
  });

  return { ok: true, candidate };
}

function readContextNumber(
  raw: unknown,
  field: string,
  warnings: string[],
  check: (value: number) => boolean
): number | null {
  if (raw === undefined || raw === null) return null;
  const value = toFiniteOrNull(raw);
  if (value === null || !check(value)) {
    warnings.push(`invalid_${field}`);
    return null;
  }
  return value;
}

function readSectorRows(rows: unknown[] | undefined, warnings: string[]): SectorPerformance[] {
  const result: SectorPerformance[] = [];
  for (const row of rows ?? []) {
    const parsed = RawSectorRowSchema.safeParse(row);
    if (parsed.success) {
      result.push({ sector: parsed.data.sector, changePct: parsed.data.change_pct });
    } else {
      warnings.push("invalid_sector_performance_row");
    }
  }
  return result;
}

/**
 * Validate a whole run input.
 *
 * Universe resolution: when `universe` is given, only those symbols are kept,
 * and universe symbols without a record are reported as degraded.
 *
 * @throws InputError when the input is not an object with a `candidates` array
 */
export function ingestRunInput(raw: unknown): IngestedRun {
  const parsed = RawRunInputSchema.safeParse(raw);
  if (!parsed.success) {
    const details = formatZodIssues(parsed.error);
    throw new InputError(`Invalid run input: ${details.join("; ")}`, details);
  }
  const input = parsed.data;
  const warnings: string[] = [];

  const macroRaw = readContextNumber(input.macro_bias, "macro_bias", warnings, () => true);
  const macroBias = macroRaw === null ? 0 : clamp(macroRaw, -1, 1);
  if (macroRaw === null) warnings.push("macro_bias_defaulted_to_neutral");

  const vixLevel = readContextNumber(input.vix_level, "vix_level", warnings, isNonNegative);
  const sectorBreadth = readContextNumber(
    input.sector_breadth,
    "sector_breadth",
    warnings,
    (value) => value >= 0 && value <= 1
  );

  let sessionDate: string | null = null;
  if (typeof input.session_date === "string" && SESSION_DATE.test(input.session_date)) {
    sessionDate = input.session_date;
  } else if (input.session_date !== undefined) {
    warnings.push("invalid_session_date");
  }

  const universe =
    input.universe === undefined ? null : new Set(ensureStringSet(input.universe).map(normalizeSymbol));

  const candidates: Candidate[] = [];
  const degraded: DegradedReason[] = [];
  const seen = new Set<string>();

  for (const rawCandidate of input.candidates) {
    const result = ingestCandidate(rawCandidate, macroBias);
    if (!result.ok) {
      degraded.push(result.reason);
      continue;
    }
    const { candidate } = result;
    if (universe && !universe.has(candidate.symbol)) {
      continue;
    }
    if (seen.has(candidate.symbol)) {
      degraded.push({
        stage: "ingest",
        code: "duplicate_symbol",
        message: "Duplicate record ignored; first occurrence kept",
        symbol: candidate.symbol,
      });
      continue;
    }
    seen.add(candidate.symbol);
    candidates.push(candidate);
  }

  if (universe) {
    for (const symbol of [...universe].sort()) {
      if (!seen.has(symbol)) {
        degraded.push({
          stage: "ingest",
          code: "missing_candidate",
          message: "Universe symbol has no enrichment record",
          symbol,
        });
      }
    }
  }

  return {
    sessionDate,
    regimeInputs: {
      macroBias,
      vixLevel,
      sectorBreadth,
      sectorPerformance: readSectorRows(input.sector_performance, warnings),
    },
    candidates,
    degraded,
    warnings,
  };
}
