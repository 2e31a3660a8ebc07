/**
 * Open-Prep public API
 */

export * from "./types.js";
export * from "./errors.js";
export type { DegradedReason, DegradedStage } from "./result.js";
export * from "./pipelineConfig.js";
export * from "./signalDecay.js";
export { classifyRegime, resetRegimeState, applyRegimeAdjustments, REGIME_WEIGHT_MULTIPLIERS } from "./regimeClassifier.js";
export { DEFAULT_WEIGHT_SET, loadWeightSet, saveWeightSet, parseWeightSet } from "./weightSets.js";
export { ingestRunInput, ingestCandidate, deriveGapPct } from "./candidateIngest.js";
export { filterCandidate } from "./candidateFilter.js";
export { GateTracker, type GateSummary } from "./GateTracker.js";
export { entryProbability, scoreCandidate } from "./candidateScorer.js";
export { classifyNewsEvent, classifyRecency, classifySourceQuality, getNewsTaxonomy } from "./newsClassification.js";
export { assignPlaybook, assessExecution } from "./playbookAssigner.js";
export { DirtyFlagManager, computeFingerprint, scoringContextKey } from "./DirtyFlagManager.js";
export { ArtifactSummarySchema, computeRunDiff, formatDiffSummary, type ArtifactSummary, type RunDiff } from "./runDiff.js";
export {
  ARTIFACT_SCHEMA_VERSION,
  serializeArtifact,
  writeArtifactAtomic,
  computeInputsHash,
  type OpenPrepArtifact,
  type RankedCandidateRecord,
} from "./artifact.js";
export { runOpenPrep, type RunOptions, type RunOutput } from "./pipeline.js";
