/**
 * Open-Prep result artifact
 *
 * One immutable JSON document per run. Nothing non-finite may reach the file:
 * score components are sanitized to null (paths recorded in runStatus.warnings)
 * and the serializer rejects anything that still slips through.
 */

import { createHash } from "crypto";
import { join } from "path";
import { writeFileAtomic } from "../utils/atomicWrite.js";
import { createLogger } from "../utils/logger.js";
import { InvariantViolationError } from "./errors.js";
import type { GateSummary } from "./GateTracker.js";
import type { DegradedReason } from "./result.js";
import type { RunDiff } from "./runDiff.js";
import {
  COMPONENT_KEYS,
  type CapOutcome,
  type ComponentKey,
  type ConfidenceTier,
  type CorroboratingSignal,
  type FilterReason,
  type FilterWarning,
  type PlaybookAssignment,
  type RegimeSnapshot,
  type ScoreComponents,
  type SignalComponentKey,
  type WeightSet,
} from "./types.js";

const log = createLogger("OpenPrepArtifact");

export const ARTIFACT_SCHEMA_VERSION = 1;

export type NullableComponents = Record<ComponentKey, number | null>;

export interface CandidateFeatures {
  price: number | null;
  previousClose: number | null;
  gapPct: number | null;
  relativeVolume: number | null;
  atrPct: number | null;
  momentumZScore: number | null;
  sector: string | null;
  newsCatalystScore: number | null;
  premarketFreshnessSec: number | null;
  avgVolume: number | null;
  spreadBps: number | null;
  companyName: string | null;
}

export interface RankedCandidateRecord {
  rank: number;
  symbol: string;
  score: number | null;
  scoreUnavailable: boolean;
  scoreComponents: NullableComponents;
  confidenceTier: ConfidenceTier;
  entryProbability: number | null;
  corroboratingSignals: CorroboratingSignal[];
  cap: CapOutcome;
  missingInputs: SignalComponentKey[];
  playbook: PlaybookAssignment;
  warnings: FilterWarning[];
  dataQualityFlags: string[];
  features: CandidateFeatures;
}

export interface FilteredOutRecord {
  symbol: string;
  reasons: FilterReason[];
}

export interface RunStatus {
  degradedMode: boolean;
  degraded: DegradedReason[];
  warnings: string[];
  counts: {
    input: number;
    eligible: number;
    filteredOut: number;
    ranked: number;
  };
  cache: {
    hits: number;
    misses: number;
  };
}

export interface OpenPrepArtifact {
  schemaVersion: number;
  generatedAt: string;
  sessionDate: string | null;
  inputsHash: string;
  regime: RegimeSnapshot;
  weightSet: WeightSet;
  ranked: RankedCandidateRecord[];
  filteredOut: FilteredOutRecord[];
  runStatus: RunStatus;
  gateSummary: GateSummary;
  diff: RunDiff | null;
}

// ============================================================================
// Sanitizing
// ============================================================================

/**
 * Copy of the components with non-finite values replaced by null;
 * each replaced path is appended to `warnings`
 */
export function sanitizeComponents(
  components: ScoreComponents,
  path: string,
  warnings: string[]
): NullableComponents {
  const result: NullableComponents = { ...components };
  for (const key of COMPONENT_KEYS) {
    if (!Number.isFinite(components[key])) {
      result[key] = null;
      warnings.push(`non_finite_sanitized:${path}.${key}`);
    }
  }
  return result;
}

/**
 * JSON paths of every non-finite number in a value
 */
export function findNonFinite(value: unknown, path = "$"): string[] {
  if (typeof value === "number") return Number.isFinite(value) ? [] : [path];
  if (Array.isArray(value)) return value.flatMap((item, index) => findNonFinite(item, `${path}[${index}]`));
  if (typeof value === "object" && value !== null) {
    return Object.entries(value).flatMap(([key, item]) => findNonFinite(item, `${path}.${key}`));
  }
  return [];
}

// ============================================================================
// Serialization
// ============================================================================

/**
 * Deterministic, pretty-printed JSON
 *
 * @throws InvariantViolationError when a NaN or Infinity is present
 */
export function serializeArtifact(artifact: OpenPrepArtifact): string {
  const invalid = findNonFinite(artifact);
  if (invalid.length > 0) {
    throw new InvariantViolationError(`Artifact contains ${invalid.length} non-finite number(s)`, invalid);
  }
  return `${JSON.stringify(artifact, null, 2)}\n`;
}

/**
 * JSON with object keys sorted at every level (non-finite numbers become null)
 */
export function canonicalJson(value: unknown): string {
  if (typeof value === "number") return Number.isFinite(value) ? JSON.stringify(value) : "null";
  if (Array.isArray(value)) return `[${value.map(canonicalJson).join(",")}]`;
  if (typeof value === "object" && value !== null) {
    const entries = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, item]) => `${JSON.stringify(key)}:${canonicalJson(item)}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

/**
 * sha256 of the canonical run input: the same input always hashes the same,
 * regardless of key order
 */
export function computeInputsHash(input: unknown): string {
  return createHash("sha256").update(canonicalJson(input)).digest("hex");
}

export interface WrittenArtifact {
  latestPath: string;
  runPath: string;
}

function runFileName(artifact: OpenPrepArtifact): string {
  const stamp = artifact.generatedAt.replace(/[:.]/g, "-");
  return `open_prep_${stamp}.json`;
}

/**
 * Write `latest.json` and a per-run copy under `runs/`, each via tmp file + rename
 */
export function writeArtifactAtomic(artifact: OpenPrepArtifact, outputDir: string): WrittenArtifact {
  const content = serializeArtifact(artifact);
  const runPath = join(outputDir, "runs", runFileName(artifact));
  const latestPath = join(outputDir, "latest.json");

  writeFileAtomic(runPath, content);
  writeFileAtomic(latestPath, content);

  log.info("Artifact written", { latestPath, ranked: artifact.ranked.length });
  return { latestPath, runPath };
}
