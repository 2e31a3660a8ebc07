import { describe, it, expect } from "vitest";
import {
  activeNoTradeWindows,
  assessExecution,
  assignPlaybook,
  easternMinuteOfDay,
  maxLossPct,
} from "../playbookAssigner.js";
import { scoreCandidate } from "../candidateScorer.js";
import { DEFAULT_PLAYBOOK_CONFIG } from "../pipelineConfig.js";
import { DEFAULT_WEIGHT_SET } from "../weightSets.js";
import type { Candidate, RegimeLabel } from "../types.js";
import { makeCandidate, regimeOf, symbolA } from "./fixtures.js";

// 08:00 America/New_York (EST)
const NOW = new Date("2026-03-02T13:00:00Z");

function assign(candidate: Candidate, label: RegimeLabel, now: Date = NOW, config = DEFAULT_PLAYBOOK_CONFIG) {
  const regime = regimeOf(label);
  const score = scoreCandidate(candidate, DEFAULT_WEIGHT_SET, regime);
  return assignPlaybook(candidate, score, regime, { now, config });
}

const dealNews = {
  title: "Acme to acquire Widget Corp in $2B deal",
  source: "Reuters",
  publishedAt: "2026-03-02T12:50:00Z",
};

describe("assignPlaybook", () => {
  // ==========================================================================
  // Setup selection
  // ==========================================================================

  it("picks Gap & Go for a strong gap on volume with a fresh catalyst", () => {
    const result = assign(
      symbolA({ extHoursScore: 0.9, avgVolume: 2_000_000, spreadBps: 10, news: dealNews }),
      "RISK_ON"
    );

    expect(result.playbook).toBe("GAP_AND_GO");
    expect(result.subScores).toEqual({ gapAndGo: 1, fade: 0.3, drift: 0.6 });
    expect(result.reason).toBe("Gap&Go: gap=12.0%, RVOL=4.0x, tape=0.90");
    expect(result.regimeAligned).toBe(true);
    expect(result.timeHorizon).toBe("intraday (30min–2h)");
    expect(result.executionQuality).toBe("GOOD");
    expect(result.sizeAdjustment).toBe(1);
    expect(result.maxLossPct).toBe(0.5);
    expect(result.haltRisk).toBe(true);
    expect(result.dollarVolumeOk).toBe(true);
    expect(result.noTradeZone).toBe(false);
    expect(result.noTradeZoneReason).toBeNull();
    expect(result.news.recency).toEqual({ bucket: "FRESH", ageMinutes: 10, isActionable: true });
    expect(result.news.source).toEqual({ tier: "TIER_2", rank: 2 });
  });

  it("marks Gap & Go as misaligned in RISK_OFF", () => {
    const result = assign(
      symbolA({ extHoursScore: 0.9, avgVolume: 2_000_000, spreadBps: 10, news: dealNews }),
      "RISK_OFF"
    );

    expect(result.playbook).toBe("GAP_AND_GO");
    expect(result.subScores).toEqual({ gapAndGo: 0.85, fade: 0.45, drift: 0.6 });
    expect(result.regimeAligned).toBe(false);
  });

  it("picks a fade for an overextended gap on weak tape", () => {
    const result = assign(
      makeCandidate({
        gapPct: 8,
        relativeVolume: 1.2,
        extHoursScore: 0.1,
        avgVolume: 1_000_000,
        news: {
          title: "Analyst upgrades TEST to outperform",
          source: "Local Gazette",
          publishedAt: "2026-03-01T10:00:00Z",
        },
      }),
      "RISK_ON"
    );

    expect(result.playbook).toBe("GAP_FADE");
    expect(result.subScores).toEqual({ gapAndGo: 0.4, fade: 0.775, drift: 0.35 });
    expect(result.reason).toBe("Gap Fade: gap=8.0%, weak tape=0.10, breadth=n/a");
    expect(result.regimeAligned).toBe(false);
    expect(result.maxLossPct).toBe(0.25);
    expect(result.entryTrigger).toMatch(/^Short a failed break/);
  });

  it("picks post-news drift for a settled material catalyst", () => {
    const result = assign(
      makeCandidate({
        gapPct: 2,
        relativeVolume: 1.2,
        momentumZScore: 2,
        avgVolume: 1_000_000,
        news: {
          title: "XYZ Q3 earnings beat, raises full-year guidance",
          source: "Business Wire",
          publishedAt: "2026-03-02T12:20:00Z",
        },
      }),
      "NEUTRAL"
    );

    expect(result.playbook).toBe("POST_NEWS_DRIFT");
    expect(result.subScores).toEqual({ gapAndGo: 0.48, fade: 0.15, drift: 0.85 });
    expect(result.reason).toBe("Post-News Drift: earnings, materiality=MEDIUM");
    expect(result.timeHorizon).toBe("swing (1–3 days)");
    expect(result.maxLossPct).toBe(0.75);
    expect(result.news.source.tier).toBe("TIER_1");
  });

  it("falls back to NO_TRADE when nothing clears its threshold", () => {
    const result = assign(
      makeCandidate({ gapPct: 0.2, relativeVolume: 2.5, extHoursScore: 0.5, avgVolume: 1_000_000 }),
      "RISK_OFF"
    );

    expect(result.playbook).toBe("NO_TRADE");
    expect(result.reason).toBe("No playbook scores above threshold (go=0.25, fade=0.20, drift=0.00)");
    expect(result.maxLossPct).toBe(0);
    expect(result.timeHorizon).toBe("N/A");
    expect(result.noTradeZone).toBe(false);
  });

  // ==========================================================================
  // Guardrails
  // ==========================================================================

  it("refuses a trade when execution quality is poor", () => {
    const result = assign(symbolA({ spreadBps: 200, avgVolume: 40_000 }), "RISK_ON");

    expect(result.playbook).toBe("NO_TRADE");
    expect(result.reason).toBe("Execution quality too poor");
    expect(result.executionQuality).toBe("POOR");
    expect(result.sizeAdjustment).toBe(0);
    expect(result.noTradeZone).toBe(false);
  });

  it("blocks a breaking headline the tape has not reclaimed", () => {
    const result = assign(
      symbolA({
        extHoursScore: 0.1,
        avgVolume: 2_000_000,
        news: { title: "Acme hit by ransomware attack", source: "Twitter", publishedAt: "2026-03-02T12:58:00Z" },
      }),
      "NEUTRAL"
    );

    expect(result.playbook).toBe("NO_TRADE");
    expect(result.noTradeZone).toBe(true);
    expect(result.noTradeZoneReason).toBe("breaking_news_no_reclaim");
    expect(result.news.eventLabelsAll).toEqual(["geopolitical", "security"]);
    expect(result.news.source.tier).toBe("TIER_4");
  });

  it("combines halt-risk and key-level reasons", () => {
    const result = assign(symbolA({ gapPct: 20, keyLevelDistanceAtr: 0.1, avgVolume: 2_000_000 }), "RISK_ON");
    expect(result.reason).toBe("extreme_gap_halt_risk; near_key_level");
  });

  it("blocks inside a configured no-trade window", () => {
    const config = {
      ...DEFAULT_PLAYBOOK_CONFIG,
      noTradeWindows: [{ label: "opening_print", start: "09:30", end: "09:32" }],
    };
    const candidate = symbolA({ extHoursScore: 0.9, avgVolume: 2_000_000, news: dealNews });

    const inside = assign(candidate, "RISK_ON", new Date("2026-03-02T14:31:00Z"), config);
    const after = assign(candidate, "RISK_ON", new Date("2026-03-02T14:32:00Z"), config);

    expect(inside.noTradeZoneReason).toBe("time_window:opening_print");
    expect(after.noTradeZone).toBe(false);
  });

  it("never trades an unavailable score", () => {
    const result = assign(symbolA({ gapPct: Infinity }), "NEUTRAL");
    expect(result.playbook).toBe("NO_TRADE");
    expect(result.noTradeZoneReason).toBe("score_unavailable");
    expect(result.haltRisk).toBe(false);
  });
});

describe("assessExecution", () => {
  it("grades spread and liquidity issues", () => {
    expect(assessExecution(makeCandidate({ spreadBps: 100, avgVolume: 1_000_000 }))).toEqual({
      quality: "CAUTION",
      sizeAdjustment: 0.5,
    });
    expect(assessExecution(makeCandidate({ price: 5, avgVolume: 150_000, spreadBps: 80 }))).toEqual({
      quality: "CAUTION",
      sizeAdjustment: 0.25,
    });
    expect(assessExecution(makeCandidate())).toEqual({ quality: "GOOD", sizeAdjustment: 1 });
  });
});

describe("maxLossPct", () => {
  it("halves on caution and zeroes on poor execution", () => {
    expect(maxLossPct("GAP_AND_GO", "CAUTION")).toBe(0.25);
    expect(maxLossPct("POST_NEWS_DRIFT", "CAUTION")).toBe(0.38);
    expect(maxLossPct("GAP_AND_GO", "POOR")).toBe(0);
  });
});

describe("no-trade windows", () => {
  it("reads the New York wall clock", () => {
    expect(easternMinuteOfDay(NOW)).toBe(8 * 60);
    // Daylight saving time
    expect(easternMinuteOfDay(new Date("2026-06-01T13:30:00Z"))).toBe(9 * 60 + 30);
  });

  it("handles windows that wrap midnight", () => {
    const windows = [{ label: "overnight", start: "23:00", end: "01:00" }];
    expect(activeNoTradeWindows(windows, new Date("2026-03-03T04:30:00Z"))).toEqual(["overnight"]);
    expect(activeNoTradeWindows(windows, new Date("2026-03-03T07:00:00Z"))).toEqual([]);
  });
});
