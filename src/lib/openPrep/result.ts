/**
 * Per-candidate or run-level problem that degrades the run instead of failing it
 */

export type DegradedStage = "ingest" | "filter" | "score" | "playbook" | "cache" | "serialize";

export interface DegradedReason {
  stage: DegradedStage;
  code: string;
  message: string;
  symbol: string | null;
}
