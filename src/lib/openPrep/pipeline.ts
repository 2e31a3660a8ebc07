/**
 * Open-Prep Pipeline
 *
 * ingest → regime → filter → score (dirty-flag skip) → playbook → rank → artifact
 *
 * Synchronous and deterministic: the same input, options and `now` produce a
 * byte-identical artifact, independent of candidate order. Per-candidate
 * failures degrade the run (runStatus.degraded) instead of aborting it.
 */

import { createLogger, generateCorrelationId, logPerformance } from "../utils/logger.js";
import { computeInputsHash, sanitizeComponents } from "./artifact.js";
import type { FilteredOutRecord, OpenPrepArtifact, RankedCandidateRecord } from "./artifact.js";
import { ARTIFACT_SCHEMA_VERSION } from "./artifact.js";
import { filterCandidate, gateDetails } from "./candidateFilter.js";
import { ingestRunInput } from "./candidateIngest.js";
import { scoreCandidate } from "./candidateScorer.js";
import { computeFingerprint, scoringContextKey, type DirtyFlagManager } from "./DirtyFlagManager.js";
import { errorMessage } from "./errors.js";
import { GateTracker } from "./GateTracker.js";
import type { NewsTaxonomy } from "./newsClassification.js";
import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "./pipelineConfig.js";
import { assignPlaybook } from "./playbookAssigner.js";
import { applyRegimeAdjustments, classifyRegime, resetRegimeState } from "./regimeClassifier.js";
import type { DegradedReason } from "./result.js";
import { computeRunDiff, type ArtifactSummary } from "./runDiff.js";
import type {
  Candidate,
  FilterWarning,
  PlaybookAssignment,
  RegimeHistory,
  ScoreResult,
  WeightSet,
} from "./types.js";
import { DEFAULT_WEIGHT_SET } from "./weightSets.js";

const log = createLogger("OpenPrepPipeline");

export interface RunOptions {
  config?: PipelineConfig;
  weightSet?: WeightSet;
  /** Regime state carried from the previous run of the same session */
  regimeHistory?: RegimeHistory | null;
  dirtyManager?: DirtyFlagManager;
  /** Run clock; defaults to the current time */
  now?: Date;
  /** Previous run to diff against; `null` means this is the first run, omitted means no diff */
  previous?: ArtifactSummary | null;
  taxonomy?: NewsTaxonomy;
}

export interface RunOutput {
  artifact: OpenPrepArtifact;
  regimeHistory: RegimeHistory;
}

interface Evaluated {
  candidate: Candidate;
  warnings: FilterWarning[];
  score: ScoreResult;
  playbook: PlaybookAssignment;
}

/**
 * Trading date (YYYY-MM-DD) on the New York calendar
 */
export function easternSessionDate(now: Date): string {
  return now.toLocaleDateString("en-CA", { timeZone: "America/New_York" });
}

/**
 * Mean gap % per sector over eligible candidates with a known gap and sector
 */
export function sectorAverageGaps(candidates: readonly Candidate[]): Map<string, number> {
  const sums = new Map<string, { total: number; count: number }>();
  for (const { sector, gapPct } of candidates) {
    if (sector === null || gapPct === null) continue;
    const entry = sums.get(sector) ?? { total: 0, count: 0 };
    entry.total += gapPct;
    entry.count += 1;
    sums.set(sector, entry);
  }
  return new Map([...sums].map(([sector, { total, count }]) => [sector, total / count]));
}

/**
 * Score desc, unavailable scores last, then symbol asc
 */
export function compareRanked(a: { symbol: string; score: number | null }, b: { symbol: string; score: number | null }): number {
  if (a.score === null && b.score !== null) return 1;
  if (b.score === null && a.score !== null) return -1;
  if (a.score !== null && b.score !== null && a.score !== b.score) return b.score - a.score;
  return a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0;
}

function resolveHistory(history: RegimeHistory | null | undefined, sessionDate: string): RegimeHistory {
  if (!history) return resetRegimeState(sessionDate);
  if (history.sessionDate !== null && history.sessionDate !== sessionDate) {
    log.info("New session, regime state reset", { from: history.sessionDate, to: sessionDate });
    return resetRegimeState(sessionDate);
  }
  return history;
}

function toRecord(entry: Evaluated, rank: number, sanitizeWarnings: string[]): RankedCandidateRecord {
  const { candidate, score, playbook, warnings } = entry;
  return {
    rank,
    symbol: candidate.symbol,
    score: score.score,
    scoreUnavailable: score.score === null,
    scoreComponents: sanitizeComponents(
      score.components,
      `ranked[${candidate.symbol}].scoreComponents`,
      sanitizeWarnings
    ),
    confidenceTier: score.tier,
    entryProbability: score.entryProbability,
    corroboratingSignals: score.corroboratingSignals,
    cap: score.cap,
    missingInputs: score.missing,
    playbook,
    warnings,
    dataQualityFlags: [...candidate.dataQualityFlags],
    features: {
      price: candidate.price,
      previousClose: candidate.previousClose,
      gapPct: candidate.gapPct,
      relativeVolume: candidate.relativeVolume,
      atrPct: candidate.atrPct,
      momentumZScore: candidate.momentumZScore,
      sector: candidate.sector,
      newsCatalystScore: candidate.newsCatalystScore,
      premarketFreshnessSec: candidate.premarketFreshnessSec,
      avgVolume: candidate.avgVolume,
      spreadBps: candidate.spreadBps,
      companyName: candidate.companyName,
    },
  };
}

/**
 * Run the pipeline over one raw run input.
 *
 * @throws InputError when the input as a whole is unusable
 */
export function runOpenPrep(input: unknown, options: RunOptions = {}): RunOutput {
  const config = options.config ?? DEFAULT_PIPELINE_CONFIG;
  const weightSet = options.weightSet ?? DEFAULT_WEIGHT_SET;
  const now = options.now ?? new Date();
  const runId = generateCorrelationId("open-prep");
  const done = logPerformance("OpenPrepPipeline", `run ${runId}`);

  const ingested = ingestRunInput(input);
  const sessionDate = ingested.sessionDate ?? easternSessionDate(now);
  const degraded: DegradedReason[] = [...ingested.degraded];

  // Regime
  const { regime, history } = classifyRegime(
    ingested.regimeInputs,
    resolveHistory(options.regimeHistory, sessionDate),
    config.regime
  );
  log.info(`Regime ${regime.label}`, { runId, reasons: regime.reasons });

  // Filter (symbol order keeps everything downstream independent of input order)
  const candidates = [...ingested.candidates].sort((a, b) => (a.symbol < b.symbol ? -1 : 1));
  const tracker = new GateTracker();
  const filteredOut: FilteredOutRecord[] = [];
  const eligible: Array<{ candidate: Candidate; warnings: FilterWarning[] }> = [];

  for (const candidate of candidates) {
    const result = filterCandidate(candidate, config.filter);
    if (!result.eligible) {
      filteredOut.push({ symbol: candidate.symbol, reasons: result.reasons });
      for (const reason of result.reasons) {
        tracker.reject(candidate.symbol, reason, gateDetails(reason, candidate, config.filter));
      }
      continue;
    }
    eligible.push({ candidate, warnings: result.warnings });
  }

  // Score + playbook
  const sectorGaps = sectorAverageGaps(eligible.map((e) => e.candidate));
  const adjustedWeights: WeightSet = applyRegimeAdjustments(weightSet, regime);
  const scoringKey = scoringContextKey(adjustedWeights.weights, config.score, config.decay);
  const evaluated: Evaluated[] = [];
  let cacheHits = 0;
  let cacheMisses = 0;

  for (const { candidate, warnings } of eligible) {
    try {
      const sectorAverageGap = candidate.sector === null ? null : sectorGaps.get(candidate.sector) ?? null;
      const fingerprint = computeFingerprint(candidate, {
        weightSetName: weightSet.name,
        weightSetVersion: weightSet.version,
        regime: regime.label,
        sectorAverageGap,
        scoringKey,
      });

      let score = options.dirtyManager?.getCached(candidate.symbol, fingerprint);
      if (score) {
        cacheHits++;
      } else {
        if (options.dirtyManager) cacheMisses++;
        score = scoreCandidate(candidate, weightSet, regime, {
          config: config.score,
          decay: config.decay,
          sectorAverageGap,
        });
        options.dirtyManager?.markClean(candidate.symbol, fingerprint, score);
      }

      if (score.invariantViolation) {
        degraded.push({
          stage: "score",
          code: "score_unavailable",
          message: score.invariantViolation,
          symbol: candidate.symbol,
        });
      }

      const playbook = assignPlaybook(candidate, score, regime, {
        config: config.playbook,
        now,
        taxonomy: options.taxonomy,
      });
      evaluated.push({ candidate, warnings, score, playbook });
    } catch (error) {
      log.error(`Candidate ${candidate.symbol} failed`, { runId, error });
      degraded.push({
        stage: "score",
        code: "candidate_failed",
        message: errorMessage(error),
        symbol: candidate.symbol,
      });
    }
  }

  // Rank
  const ordered = [...evaluated].sort((a, b) =>
    compareRanked(
      { symbol: a.candidate.symbol, score: a.score.score },
      { symbol: b.candidate.symbol, score: b.score.score }
    )
  );
  const sanitizeWarnings: string[] = [];
  const ranked = ordered
    .slice(0, config.ranking.topN)
    .map((entry, index) => toRecord(entry, index + 1, sanitizeWarnings));

  const artifact: OpenPrepArtifact = {
    schemaVersion: ARTIFACT_SCHEMA_VERSION,
    generatedAt: now.toISOString(),
    sessionDate,
    inputsHash: computeInputsHash(input),
    regime,
    weightSet: adjustedWeights,
    ranked,
    filteredOut,
    runStatus: {
      degradedMode: degraded.length > 0,
      degraded,
      warnings: [...ingested.warnings, ...sanitizeWarnings],
      counts: {
        input: candidates.length,
        eligible: eligible.length,
        filteredOut: filteredOut.length,
        ranked: ranked.length,
      },
      cache: { hits: cacheHits, misses: cacheMisses },
    },
    gateSummary: tracker.summary(candidates.length),
    diff: null,
  };

  if (options.previous !== undefined) {
    artifact.diff = computeRunDiff(options.previous, artifact, config.diff.scoreChangeThreshold);
  }

  const durationMs = done();
  log.info("Run complete", {
    runId,
    ranked: ranked.length,
    filteredOut: filteredOut.length,
    degraded: degraded.length,
    durationMs: Math.round(durationMs),
  });

  return { artifact: Object.freeze(artifact), regimeHistory: history };
}
