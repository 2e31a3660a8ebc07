/**
 * News classification for playbook selection
 *
 * - Event class + label from the headline (data/newsTaxonomy.json patterns)
 * - Materiality from the primary label
 * - Recency bucket from the publish time
 * - Source quality tier
 */

import { readFileSync } from "fs";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "./errors.js";
import { formatZodIssues } from "./pipelineConfig.js";
import type {
  Materiality,
  NewsEventClass,
  NewsEventInfo,
  RecencyBucket,
  RecencyInfo,
  SourceInfo,
} from "./types.js";

// ============================================================================
// Taxonomy
// ============================================================================

const PatternListSchema = z.array(
  z.object({
    label: z.string().min(1),
    pattern: z.string().min(1),
  })
);

const TaxonomySchema = z.object({
  version: z.number().int(),
  eventPatterns: z.object({
    SCHEDULED: PatternListSchema,
    UNSCHEDULED: PatternListSchema,
    STRUCTURAL: PatternListSchema,
  }),
  materiality: z.object({
    HIGH: z.array(z.string()),
    MEDIUM: z.array(z.string()),
  }),
  driftLabels: z.array(z.string()),
  sources: z.object({
    tier1: z.array(z.string().min(1)),
    tier1Words: z.array(z.string().min(1)),
    tier2: z.array(z.string().min(1)),
    tier4: z.array(z.string().min(1)),
  }),
});

type RawTaxonomy = z.infer<typeof TaxonomySchema>;
type ClassifiedEventClass = Exclude<NewsEventClass, "UNKNOWN">;

interface EventPattern {
  eventClass: ClassifiedEventClass;
  label: string;
  regex: RegExp;
}

export interface NewsTaxonomy {
  version: number;
  /** Priority order: scheduled, then unscheduled, then structural */
  patterns: EventPattern[];
  highMateriality: ReadonlySet<string>;
  mediumMateriality: ReadonlySet<string>;
  driftLabels: ReadonlySet<string>;
  tier1Sources: readonly string[];
  tier1Words: readonly RegExp[];
  tier2Sources: readonly string[];
  tier4Sources: readonly string[];
}

const CLASS_PRIORITY: readonly ClassifiedEventClass[] = ["SCHEDULED", "UNSCHEDULED", "STRUCTURAL"];

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function compilePattern(pattern: string, label: string): RegExp {
  try {
    return new RegExp(`\\b(?:${pattern})\\b`, "i");
  } catch (error) {
    throw new ConfigurationError(`Invalid news pattern for "${label}"`, [errorMessage(error)]);
  }
}

/**
 * Validate and compile a raw taxonomy object
 *
 * @throws ConfigurationError on schema or regex errors
 */
export function buildTaxonomy(raw: unknown): NewsTaxonomy {
  const parsed = TaxonomySchema.safeParse(raw);
  if (!parsed.success) {
    const details = formatZodIssues(parsed.error);
    throw new ConfigurationError(`Invalid news taxonomy: ${details.join("; ")}`, details);
  }
  const data: RawTaxonomy = parsed.data;

  return {
    version: data.version,
    patterns: CLASS_PRIORITY.flatMap((eventClass) =>
      data.eventPatterns[eventClass].map(({ label, pattern }) => ({
        eventClass,
        label,
        regex: compilePattern(pattern, label),
      }))
    ),
    highMateriality: new Set(data.materiality.HIGH),
    mediumMateriality: new Set(data.materiality.MEDIUM),
    driftLabels: new Set(data.driftLabels),
    tier1Sources: data.sources.tier1.map((s) => s.toLowerCase()),
    tier1Words: data.sources.tier1Words.map((word) => new RegExp(`\\b${escapeRegex(word.toLowerCase())}\\b`)),
    tier2Sources: data.sources.tier2.map((s) => s.toLowerCase()),
    tier4Sources: data.sources.tier4.map((s) => s.toLowerCase()),
  };
}

let defaultTaxonomy: NewsTaxonomy | null = null;

/**
 * Taxonomy bundled with the package (loaded once)
 */
export function getNewsTaxonomy(): NewsTaxonomy {
  if (!defaultTaxonomy) {
    const url = new URL("./data/newsTaxonomy.json", import.meta.url);
    defaultTaxonomy = buildTaxonomy(JSON.parse(readFileSync(url, "utf-8")));
  }
  return defaultTaxonomy;
}

// ============================================================================
// Event class + materiality
// ============================================================================

export function estimateMateriality(label: string, taxonomy: NewsTaxonomy = getNewsTaxonomy()): Materiality {
  if (taxonomy.highMateriality.has(label)) return "HIGH";
  if (taxonomy.mediumMateriality.has(label)) return "MEDIUM";
  return "LOW";
}

/**
 * Classify a headline (plus up to 600 chars of body). The first matching
 * pattern in priority order is the primary label.
 */
export function classifyNewsEvent(
  title: string,
  content = "",
  taxonomy: NewsTaxonomy = getNewsTaxonomy()
): NewsEventInfo {
  const text = `${title} ${content.slice(0, 600)}`;
  const matches = taxonomy.patterns.filter(({ regex }) => regex.test(text));

  if (matches.length === 0) {
    return { eventClass: "UNKNOWN", eventLabel: "generic", eventLabelsAll: [], materiality: "LOW" };
  }

  const [primary] = matches;
  return {
    eventClass: primary.eventClass,
    eventLabel: primary.label,
    eventLabelsAll: matches.map((match) => match.label),
    materiality: estimateMateriality(primary.label, taxonomy),
  };
}

// ============================================================================
// Recency
// ============================================================================

const RECENCY_CUTOFFS_MIN: ReadonlyArray<[number, RecencyBucket]> = [
  [5, "ULTRA_FRESH"],
  [15, "FRESH"],
  [60, "WARM"],
  [1440, "AGING"],
];

const ACTIONABLE: ReadonlySet<RecencyBucket> = new Set(["ULTRA_FRESH", "FRESH", "WARM"]);

const UNKNOWN_RECENCY: RecencyInfo = { bucket: "UNKNOWN", ageMinutes: null, isActionable: false };

/**
 * Parse an ISO timestamp; timestamps without an offset are UTC
 */
export function parseTimestamp(value: string): number | null {
  let iso = value.trim().replace(" ", "T");
  if (iso.includes("T") && !/(?:z|[+-]\d{2}:?\d{2})$/i.test(iso)) {
    iso += "Z";
  }
  const millis = Date.parse(iso);
  return Number.isNaN(millis) ? null : millis;
}

export function classifyRecency(publishedAt: string | null, now: Date): RecencyInfo {
  if (publishedAt === null) return UNKNOWN_RECENCY;
  const published = parseTimestamp(publishedAt);
  if (published === null) return UNKNOWN_RECENCY;

  // Future timestamps (feed clock skew) count as just published
  const ageMinutes = Math.max((now.getTime() - published) / 60_000, 0);
  const match = RECENCY_CUTOFFS_MIN.find(([cutoff]) => ageMinutes <= cutoff);
  const bucket: RecencyBucket = match ? match[1] : "STALE";

  return {
    bucket,
    ageMinutes: Math.round(ageMinutes * 10) / 10,
    isActionable: ACTIONABLE.has(bucket),
  };
}

// ============================================================================
// Source quality
// ============================================================================

/**
 * Tier 1: filings and press releases (matched in source or title)
 * Tier 2: major financial media, Tier 4: social/blogs, Tier 3: everything else
 */
export function classifySourceQuality(
  source: string | null,
  title = "",
  taxonomy: NewsTaxonomy = getNewsTaxonomy()
): SourceInfo {
  const sourceLower = (source ?? "").trim().toLowerCase();
  const combined = `${sourceLower} ${title.trim().toLowerCase()}`;

  if (
    taxonomy.tier1Sources.some((s) => combined.includes(s)) ||
    taxonomy.tier1Words.some((word) => word.test(combined))
  ) {
    return { tier: "TIER_1", rank: 1 };
  }
  if (taxonomy.tier2Sources.some((s) => sourceLower.includes(s))) return { tier: "TIER_2", rank: 2 };
  if (taxonomy.tier4Sources.some((s) => sourceLower.includes(s))) return { tier: "TIER_4", rank: 4 };
  return { tier: "TIER_3", rank: 3 };
}
