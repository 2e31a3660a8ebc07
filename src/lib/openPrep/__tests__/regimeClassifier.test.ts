import { describe, it, expect } from "vitest";
import {
  applyRegimeAdjustments,
  classifyRegime,
  resetRegimeState,
  resolveBreadth,
} from "../regimeClassifier.js";
import type { RegimeHistory, RegimeInputs, RegimeLabel, WeightSet } from "../types.js";

function run(inputs: Partial<RegimeInputs>, history: RegimeHistory = resetRegimeState()) {
  return classifyRegime({ macroBias: 0, vixLevel: 20, sectorBreadth: null, ...inputs }, history);
}

function feedVix(levels: number[]): { labels: RegimeLabel[]; history: RegimeHistory } {
  let history = resetRegimeState("2026-03-02");
  const labels: RegimeLabel[] = [];
  for (const vixLevel of levels) {
    const result = classifyRegime({ macroBias: 0, vixLevel, sectorBreadth: null }, history);
    labels.push(result.regime.label);
    history = result.history;
  }
  return { labels, history };
}

describe("resetRegimeState", () => {
  it("starts from NEUTRAL with no transitions", () => {
    expect(resetRegimeState("2026-03-02")).toEqual({
      previous: "NEUTRAL",
      sessionDate: "2026-03-02",
      transitions: 0,
    });
  });
});

describe("classifyRegime", () => {
  describe("VIX hysteresis", () => {
    it("does not flap when VIX oscillates between 28 and 31", () => {
      const { labels, history } = feedVix([28, 31, 28, 31, 28, 31, 28, 29]);

      expect(labels).toEqual([
        "NEUTRAL",
        "RISK_OFF",
        "RISK_OFF",
        "RISK_OFF",
        "RISK_OFF",
        "RISK_OFF",
        "RISK_OFF",
        "RISK_OFF",
      ]);
      expect(history.transitions).toBe(1);
    });

    it("leaves RISK_OFF only once VIX drops below the exit threshold", () => {
      const { labels, history } = feedVix([31, 27.5, 27, 26.9, 28]);

      expect(labels).toEqual(["RISK_OFF", "RISK_OFF", "RISK_OFF", "NEUTRAL", "NEUTRAL"]);
      expect(history.previous).toBe("NEUTRAL");
      expect(history.transitions).toBe(2);
    });

    it("marks classifications held by the band", () => {
      const entered = run({ vixLevel: 31 });
      const held = run({ vixLevel: 28 }, entered.history);

      expect(entered.regime.hysteresisApplied).toBe(false);
      expect(held.regime.hysteresisApplied).toBe(true);
      expect(held.regime.previous).toBe("RISK_OFF");
    });

    it("requires the enter threshold from a fresh state", () => {
      expect(run({ vixLevel: 29.9 }).regime.label).toBe("NEUTRAL");
      expect(run({ vixLevel: 30 }).regime.label).toBe("RISK_OFF");
    });
  });

  it("classifies strongly negative macro bias as RISK_OFF", () => {
    const { regime } = run({ macroBias: -0.6, vixLevel: 18 });
    expect(regime.label).toBe("RISK_OFF");
    expect(regime.reasons).toContain("macro bias -0.6 <= -0.5");
  });

  it("detects rotation from mixed breadth with leaders and laggards", () => {
    const { regime } = run({
      sectorBreadth: 0.5,
      sectorPerformance: [
        { sector: "Technology", changePct: 1.2 },
        { sector: "Energy", changePct: 0.8 },
        { sector: "Utilities", changePct: -0.9 },
        { sector: "Real Estate", changePct: -1.1 },
        { sector: "Health Care", changePct: 0.1 },
      ],
    });

    expect(regime.label).toBe("ROTATION");
    expect(regime.leadingSectors).toEqual(["Technology", "Energy"]);
    expect(regime.laggingSectors).toEqual(["Real Estate", "Utilities"]);
    expect(regime.weightMultipliers.gapSectorRelative).toBe(1.8);
  });

  it("classifies RISK_ON from positive bias with broad participation", () => {
    expect(run({ macroBias: 0.4, sectorBreadth: 0.65 }).regime.label).toBe("RISK_ON");
  });

  it("classifies RISK_ON from a calm VIX", () => {
    expect(run({ macroBias: 0, vixLevel: 14 }).regime.label).toBe("RISK_ON");
  });

  it("classifies RISK_ON from very broad participation alone", () => {
    expect(run({ macroBias: 0.1, sectorBreadth: 0.8 }).regime.label).toBe("RISK_ON");
  });

  it("falls back to NEUTRAL", () => {
    const { regime } = run({ macroBias: 0.1, sectorBreadth: 0.5 });
    expect(regime.label).toBe("NEUTRAL");
    expect(regime.weightMultipliers).toEqual({});
  });

  it("keeps missing breadth distinct from zero breadth", () => {
    const missing = run({ macroBias: 0.1, sectorBreadth: null });
    const zero = run({ macroBias: 0.1, sectorBreadth: 0 });

    expect(missing.regime.sectorBreadth).toBeNull();
    expect(missing.regime.reasons).toContain("sector breadth unavailable, breadth rules skipped");
    expect(zero.regime.sectorBreadth).toBe(0);
    expect(zero.regime.reasons).not.toContain("sector breadth unavailable, breadth rules skipped");
  });

  it("skips volatility rules when VIX is unknown", () => {
    const { regime } = run({ vixLevel: null });
    expect(regime.vixLevel).toBeNull();
    expect(regime.reasons[0]).toBe("VIX unavailable, volatility rules skipped");
  });

  it("does not mutate the history it was given", () => {
    const history = resetRegimeState();
    run({ vixLevel: 35 }, history);
    expect(history.previous).toBe("NEUTRAL");
  });
});

describe("resolveBreadth", () => {
  it("prefers explicit breadth", () => {
    expect(resolveBreadth({ macroBias: 0, vixLevel: null, sectorBreadth: 0 })).toBe(0);
  });

  it("derives breadth from sector rows", () => {
    expect(
      resolveBreadth({
        macroBias: 0,
        vixLevel: null,
        sectorBreadth: null,
        sectorPerformance: [
          { sector: "A", changePct: 0.2 },
          { sector: "B", changePct: 1 },
          { sector: "C", changePct: 0.4 },
          { sector: "D", changePct: -0.3 },
        ],
      })
    ).toBe(0.75);
  });

  it("returns null when there is no breadth data", () => {
    expect(
      resolveBreadth({ macroBias: 0, vixLevel: null, sectorBreadth: null, sectorPerformance: [] })
    ).toBeNull();
  });
});

describe("applyRegimeAdjustments", () => {
  const base: WeightSet = {
    name: "test",
    version: 1,
    weights: {
      gap: 30,
      gapSectorRelative: 10,
      relativeVolume: 25,
      momentum: 10,
      macro: 15,
      news: 20,
      extHours: 10,
      earningsBmo: 10,
      freshness: 8,
      atrRank: 8,
      riskPenalty: 40,
      counterTrendPenalty: 15,
    },
  };

  it("returns a scaled copy without touching the base set", () => {
    const { regime } = run({ macroBias: 0, vixLevel: 14 });
    const adjusted = applyRegimeAdjustments(base, regime);

    expect(adjusted.weights.gap).toBeCloseTo(36, 10);
    expect(adjusted.weights.counterTrendPenalty).toBe(7.5);
    expect(adjusted.weights.news).toBe(20);
    expect(base.weights.gap).toBe(30);
    expect(Object.isFrozen(adjusted.weights)).toBe(true);
  });
});
