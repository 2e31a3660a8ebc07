import { describe, it, expect } from "vitest";
import { serializeArtifact } from "../artifact.js";
import { DirtyFlagManager } from "../DirtyFlagManager.js";
import { InputError } from "../errors.js";
import { DEFAULT_PIPELINE_CONFIG } from "../pipelineConfig.js";
import { compareRanked, easternSessionDate, runOpenPrep, sectorAverageGaps } from "../pipeline.js";
import type { WeightSet } from "../types.js";
import { DEFAULT_WEIGHTS, DEFAULT_WEIGHT_SET } from "../weightSets.js";
import { makeCandidate } from "./fixtures.js";

const NOW = new Date("2026-03-02T13:00:00Z");

// ============================================================================
// Helpers
// ============================================================================

function rawA(overrides: Record<string, unknown> = {}) {
  return {
    symbol: "aaa",
    price: 112,
    previous_close: 100,
    gap_pct: 12,
    relative_volume: 4,
    atr_pct: 3,
    news_catalyst_score: 0.8,
    sector: "Technology",
    ...overrides,
  };
}

function rawB(overrides: Record<string, unknown> = {}) {
  return {
    symbol: "BBB",
    price: 51,
    previous_close: 50,
    gap_pct: 2,
    relative_volume: 1.1,
    atr_pct: 1,
    news_catalyst_score: 0,
    sector: "Utilities",
    ...overrides,
  };
}

function runInput(candidates: unknown[], overrides: Record<string, unknown> = {}) {
  return {
    session_date: "2026-03-02",
    macro_bias: 0.3,
    vix_level: 20,
    candidates,
    ...overrides,
  };
}

// ============================================================================
// Tests
// ============================================================================

describe("runOpenPrep", () => {
  it("ranks A above B and filters nothing in the reference scenario", () => {
    const { artifact } = runOpenPrep(runInput([rawB(), rawA()]), { now: NOW });

    expect(artifact.regime.label).toBe("NEUTRAL");
    expect(artifact.ranked.map((r) => r.symbol)).toEqual(["AAA", "BBB"]);
    expect(artifact.ranked.map((r) => r.rank)).toEqual([1, 2]);
    expect(artifact.ranked[0].score).toBe(68.6411);
    expect(artifact.ranked[0].confidenceTier).toBe("HIGH_CONVICTION");
    expect(artifact.ranked[1].score).toBe(15.1123);
    expect(artifact.filteredOut).toEqual([]);
    expect(artifact.runStatus.degradedMode).toBe(false);
    expect(artifact.runStatus.counts).toEqual({ input: 2, eligible: 2, filteredOut: 0, ranked: 2 });
    expect(artifact.generatedAt).toBe("2026-03-02T13:00:00.000Z");
    expect(artifact.sessionDate).toBe("2026-03-02");
    expect(artifact.diff).toBeNull();
  });

  it("filters out a candidate without a previous close and counts the gate", () => {
    const { artifact } = runOpenPrep(
      runInput([rawA(), rawA({ symbol: "CCC", previous_close: null })]),
      { now: NOW }
    );

    expect(artifact.filteredOut).toEqual([{ symbol: "CCC", reasons: ["previous_close_missing"] }]);
    expect(artifact.ranked.map((r) => r.symbol)).toEqual(["AAA"]);
    expect(artifact.runStatus.counts).toEqual({ input: 2, eligible: 1, filteredOut: 1, ranked: 1 });
  });

  it("produces a byte-identical artifact for identical input and clock", () => {
    const input = runInput([rawA(), rawB()]);
    const first = serializeArtifact(runOpenPrep(input, { now: NOW }).artifact);
    const second = serializeArtifact(runOpenPrep(input, { now: NOW }).artifact);

    expect(second).toBe(first);
    expect(first.endsWith("\n")).toBe(true);
  });

  it("is independent of candidate order", () => {
    const forward = runOpenPrep(runInput([rawA(), rawB(), { symbol: "CCC", price: 20 }]), { now: NOW });
    const reversed = runOpenPrep(runInput([{ symbol: "CCC", price: 20 }, rawB(), rawA()]), { now: NOW });

    expect(reversed.artifact.ranked).toEqual(forward.artifact.ranked);
    expect(reversed.artifact.filteredOut).toEqual(forward.artifact.filteredOut);
  });

  it("reuses cached scores when nothing changed", () => {
    const dirtyManager = new DirtyFlagManager();
    const input = runInput([rawA(), rawB()]);

    const first = runOpenPrep(input, { now: NOW, dirtyManager });
    const second = runOpenPrep(input, { now: NOW, dirtyManager });

    expect(first.artifact.runStatus.cache).toEqual({ hits: 0, misses: 2 });
    expect(second.artifact.runStatus.cache).toEqual({ hits: 2, misses: 0 });
    expect(second.artifact.ranked).toEqual(first.artifact.ranked);
  });

  it("re-scores only the candidate whose inputs changed", () => {
    const dirtyManager = new DirtyFlagManager();
    runOpenPrep(runInput([rawA(), rawB()]), { now: NOW, dirtyManager });
    const second = runOpenPrep(runInput([rawA(), rawB({ relative_volume: 2 })]), { now: NOW, dirtyManager });

    expect(second.artifact.runStatus.cache).toEqual({ hits: 1, misses: 1 });
  });

  it("re-scores when weight values change under the same name and version", () => {
    const dirtyManager = new DirtyFlagManager();
    const input = runInput([rawA(), rawB()]);
    const edited: WeightSet = { ...DEFAULT_WEIGHT_SET, weights: { ...DEFAULT_WEIGHTS, gap: 0 } };

    const first = runOpenPrep(input, { now: NOW, dirtyManager });
    const second = runOpenPrep(input, { now: NOW, dirtyManager, weightSet: edited });
    const uncached = runOpenPrep(input, { now: NOW, weightSet: edited });

    expect(second.artifact.runStatus.cache).toEqual({ hits: 0, misses: 2 });
    expect(second.artifact.ranked[0].score).not.toBe(first.artifact.ranked[0].score);
    expect(second.artifact.ranked).toEqual(uncached.artifact.ranked);
  });

  it("re-scores when the score settings change", () => {
    const dirtyManager = new DirtyFlagManager();
    const input = runInput([rawA(), rawB()]);
    const config = {
      ...DEFAULT_PIPELINE_CONFIG,
      score: { ...DEFAULT_PIPELINE_CONFIG.score, entryProbabilityMidpoint: 50 },
    };

    runOpenPrep(input, { now: NOW, dirtyManager });
    const second = runOpenPrep(input, { now: NOW, dirtyManager, config });

    expect(second.artifact.runStatus.cache).toEqual({ hits: 0, misses: 2 });
    expect(second.artifact.ranked[0].entryProbability).toBe(0.8658);
  });

  it("truncates the ranking to topN", () => {
    const config = { ...DEFAULT_PIPELINE_CONFIG, ranking: { topN: 1 } };
    const { artifact } = runOpenPrep(runInput([rawA(), rawB()]), { now: NOW, config });

    expect(artifact.ranked.map((r) => r.symbol)).toEqual(["AAA"]);
    expect(artifact.runStatus.counts).toEqual({ input: 2, eligible: 2, filteredOut: 0, ranked: 1 });
  });

  it("degrades the run for a record without a symbol", () => {
    const { artifact } = runOpenPrep(runInput([rawA(), { price: 10 }]), { now: NOW });

    expect(artifact.runStatus.degradedMode).toBe(true);
    expect(artifact.runStatus.degraded.map((d) => d.code)).toEqual(["invalid_record"]);
    expect(artifact.ranked.map((r) => r.symbol)).toEqual(["AAA"]);
  });

  it("throws InputError when candidates are missing", () => {
    expect(() => runOpenPrep({ macro_bias: 0 }, { now: NOW })).toThrow(InputError);
  });

  describe("regime state", () => {
    it("holds RISK_OFF inside the hysteresis band within a session", () => {
      const first = runOpenPrep(runInput([rawA()], { vix_level: 32 }), { now: NOW });
      const second = runOpenPrep(runInput([rawA()], { vix_level: 28 }), {
        now: NOW,
        regimeHistory: first.regimeHistory,
      });

      expect(first.artifact.regime.label).toBe("RISK_OFF");
      expect(second.artifact.regime.label).toBe("RISK_OFF");
      expect(second.artifact.regime.hysteresisApplied).toBe(true);
    });

    it("resets the state when the session date changes", () => {
      const first = runOpenPrep(runInput([rawA()], { vix_level: 32 }), { now: NOW });
      const nextDay = runOpenPrep(runInput([rawA()], { vix_level: 28, session_date: "2026-03-03" }), {
        now: NOW,
        regimeHistory: first.regimeHistory,
      });

      expect(nextDay.artifact.regime.label).toBe("NEUTRAL");
      expect(nextDay.artifact.regime.previous).toBe("NEUTRAL");
      expect(nextDay.regimeHistory.sessionDate).toBe("2026-03-03");
    });
  });

  describe("diff", () => {
    it("reports a first run when the previous artifact is null", () => {
      const { artifact } = runOpenPrep(runInput([rawA(), rawB()]), { now: NOW, previous: null });

      expect(artifact.diff?.firstRun).toBe(true);
      expect(artifact.diff?.newEntrants).toEqual(["AAA", "BBB"]);
    });

    it("reports a regime change against the previous run", () => {
      const previous = runOpenPrep(runInput([rawA(), rawB()]), { now: NOW }).artifact;
      const { artifact } = runOpenPrep(runInput([rawA(), rawB()], { vix_level: 32 }), {
        now: NOW,
        previous,
      });

      expect(artifact.diff?.regimeChange).toEqual({ from: "NEUTRAL", to: "RISK_OFF" });
      expect(artifact.diff?.previousGeneratedAt).toBe("2026-03-02T13:00:00.000Z");
    });
  });
});

describe("easternSessionDate", () => {
  it("uses the New York calendar date", () => {
    expect(easternSessionDate(new Date("2026-03-02T03:00:00Z"))).toBe("2026-03-01");
    expect(easternSessionDate(new Date("2026-03-02T13:00:00Z"))).toBe("2026-03-02");
  });
});

describe("sectorAverageGaps", () => {
  it("averages known gaps per known sector", () => {
    const averages = sectorAverageGaps([
      makeCandidate({ symbol: "A", sector: "Technology", gapPct: 10 }),
      makeCandidate({ symbol: "B", sector: "Technology", gapPct: 20 }),
      makeCandidate({ symbol: "C", sector: null, gapPct: 5 }),
      makeCandidate({ symbol: "D", sector: "Energy", gapPct: null }),
    ]);

    expect([...averages]).toEqual([["Technology", 15]]);
  });
});

describe("compareRanked", () => {
  it("orders by score desc, unavailable last, then symbol", () => {
    const entries = [
      { symbol: "ZZZ", score: null },
      { symbol: "BBB", score: 10 },
      { symbol: "AAA", score: 10 },
      { symbol: "CCC", score: 40 },
      { symbol: "AAB", score: null },
    ];

    expect([...entries].sort(compareRanked).map((e) => e.symbol)).toEqual(["CCC", "AAA", "BBB", "AAB", "ZZZ"]);
  });
});
