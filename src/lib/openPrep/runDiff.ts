/**
 * Run-to-run diff: what changed since the previous artifact
 */

import { z } from "zod";
import { round } from "../utils/validation.js";
import { CONFIDENCE_TIERS, REGIME_LABELS, type ConfidenceTier, type RegimeLabel } from "./types.js";

// The slice of an artifact the diff needs; also used to read the previous run from disk
export const ArtifactSummarySchema = z.object({
  generatedAt: z.string(),
  regime: z.object({ label: z.enum(REGIME_LABELS) }),
  ranked: z.array(
    z.object({
      symbol: z.string(),
      score: z.number().nullable(),
      confidenceTier: z.enum(CONFIDENCE_TIERS),
      features: z.object({ sector: z.string().nullable() }),
    })
  ),
});

export type ArtifactSummary = z.infer<typeof ArtifactSummarySchema>;

export interface ScoreChange {
  symbol: string;
  previous: number;
  current: number;
  delta: number;
  direction: "up" | "down";
}

export interface TierChange {
  symbol: string;
  previous: ConfidenceTier;
  current: ConfidenceTier;
}

export interface SectorRotation {
  sector: string;
  previousCount: number;
  currentCount: number;
  delta: number;
}

export interface RunDiff {
  firstRun: boolean;
  hasChanges: boolean;
  previousGeneratedAt: string | null;
  newEntrants: string[];
  dropped: string[];
  scoreChanges: ScoreChange[];
  tierChanges: TierChange[];
  regimeChange: { from: RegimeLabel; to: RegimeLabel } | null;
  sectorRotations: SectorRotation[];
}

type RankedSummary = ArtifactSummary["ranked"][number];

function bySymbol(ranked: readonly RankedSummary[]): Map<string, RankedSummary> {
  return new Map(ranked.map((entry) => [entry.symbol.trim().toUpperCase(), entry]));
}

function sectorCounts(ranked: readonly RankedSummary[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const entry of ranked) {
    const sector = entry.features.sector ?? "Unknown";
    counts.set(sector, (counts.get(sector) ?? 0) + 1);
  }
  return counts;
}

/**
 * Compare two runs. Score changes below `scoreChangeThreshold` are ignored;
 * an unavailable score on either side is never reported as a change.
 */
export function computeRunDiff(
  previous: ArtifactSummary | null,
  current: ArtifactSummary,
  scoreChangeThreshold = 5
): RunDiff {
  if (previous === null) {
    return {
      firstRun: true,
      hasChanges: current.ranked.length > 0,
      previousGeneratedAt: null,
      newEntrants: current.ranked.map((entry) => entry.symbol),
      dropped: [],
      scoreChanges: [],
      tierChanges: [],
      regimeChange: null,
      sectorRotations: [],
    };
  }

  const before = bySymbol(previous.ranked);
  const after = bySymbol(current.ranked);

  const newEntrants = [...after.keys()].filter((symbol) => !before.has(symbol)).sort();
  const dropped = [...before.keys()].filter((symbol) => !after.has(symbol)).sort();

  const scoreChanges: ScoreChange[] = [];
  const tierChanges: TierChange[] = [];
  for (const symbol of [...after.keys()].filter((s) => before.has(s)).sort()) {
    const prev = before.get(symbol);
    const curr = after.get(symbol);
    if (!prev || !curr) continue;

    if (prev.score !== null && curr.score !== null) {
      const delta = curr.score - prev.score;
      if (Math.abs(delta) >= scoreChangeThreshold) {
        scoreChanges.push({
          symbol,
          previous: round(prev.score, 2),
          current: round(curr.score, 2),
          delta: round(delta, 2),
          direction: delta > 0 ? "up" : "down",
        });
      }
    }
    if (prev.confidenceTier !== curr.confidenceTier) {
      tierChanges.push({ symbol, previous: prev.confidenceTier, current: curr.confidenceTier });
    }
  }

  const regimeChange =
    previous.regime.label !== current.regime.label
      ? { from: previous.regime.label, to: current.regime.label }
      : null;

  const prevSectors = sectorCounts(previous.ranked);
  const currSectors = sectorCounts(current.ranked);
  const sectorRotations: SectorRotation[] = [...new Set([...prevSectors.keys(), ...currSectors.keys()])]
    .sort()
    .map((sector) => {
      const previousCount = prevSectors.get(sector) ?? 0;
      const currentCount = currSectors.get(sector) ?? 0;
      return { sector, previousCount, currentCount, delta: currentCount - previousCount };
    })
    .filter((rotation) => rotation.delta !== 0);

  return {
    firstRun: false,
    hasChanges:
      newEntrants.length > 0 ||
      dropped.length > 0 ||
      scoreChanges.length > 0 ||
      tierChanges.length > 0 ||
      regimeChange !== null ||
      sectorRotations.length > 0,
    previousGeneratedAt: previous.generatedAt,
    newEntrants,
    dropped,
    scoreChanges,
    tierChanges,
    regimeChange,
    sectorRotations,
  };
}

/**
 * One-paragraph human summary for logs
 */
export function formatDiffSummary(diff: RunDiff): string {
  if (diff.firstRun) return `First run: ${diff.newEntrants.length} candidate(s) ranked.`;
  if (!diff.hasChanges) return "No changes since the previous run.";

  const parts: string[] = [];
  if (diff.regimeChange) parts.push(`Regime ${diff.regimeChange.from} -> ${diff.regimeChange.to}`);
  if (diff.newEntrants.length) parts.push(`New: ${diff.newEntrants.join(", ")}`);
  if (diff.dropped.length) parts.push(`Dropped: ${diff.dropped.join(", ")}`);
  if (diff.scoreChanges.length) {
    parts.push(
      `Score moves: ${diff.scoreChanges
        .map((c) => `${c.symbol} ${c.delta > 0 ? "+" : ""}${c.delta}`)
        .join(", ")}`
    );
  }
  if (diff.tierChanges.length) {
    parts.push(`Tier changes: ${diff.tierChanges.map((c) => `${c.symbol} ${c.previous} -> ${c.current}`).join(", ")}`);
  }
  if (diff.sectorRotations.length) {
    parts.push(
      `Sectors: ${diff.sectorRotations.map((r) => `${r.sector} ${r.delta > 0 ? "+" : ""}${r.delta}`).join(", ")}`
    );
  }
  return `${parts.join(". ")}.`;
}
