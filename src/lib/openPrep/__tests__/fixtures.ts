import { resetRegimeState, classifyRegime } from "../regimeClassifier.js";
import type { Candidate, RegimeLabel, RegimeSnapshot } from "../types.js";

/**
 * Candidate with every optional feature unknown; override what a test needs
 */
export function makeCandidate(overrides: Partial<Candidate> = {}): Candidate {
  return {
    symbol: "TEST",
    price: 50,
    previousClose: 48,
    gapPct: null,
    relativeVolume: null,
    atrPct: null,
    momentumZScore: null,
    sector: null,
    newsCatalystScore: null,
    premarketFreshnessSec: null,
    macroBias: 0,
    dataQualityFlags: [],
    avgVolume: null,
    extHoursScore: null,
    spreadBps: null,
    earningsBmo: false,
    splitToday: false,
    ipoWindow: false,
    premarketStale: false,
    keyLevelDistanceAtr: null,
    news: null,
    companyName: null,
    quoteTimestamp: null,
    ...overrides,
  };
}

/** Symbol A from the reference scenario: strong gap, volume and news */
export function symbolA(overrides: Partial<Candidate> = {}): Candidate {
  return makeCandidate({
    symbol: "AAA",
    price: 112,
    previousClose: 100,
    gapPct: 12,
    relativeVolume: 4,
    atrPct: 3,
    newsCatalystScore: 0.8,
    sector: "Technology",
    macroBias: 0.3,
    ...overrides,
  });
}

/** Symbol B from the reference scenario: small gap, quiet tape */
export function symbolB(overrides: Partial<Candidate> = {}): Candidate {
  return makeCandidate({
    symbol: "BBB",
    price: 51,
    previousClose: 50,
    gapPct: 2,
    relativeVolume: 1.1,
    atrPct: 1,
    newsCatalystScore: 0,
    sector: "Utilities",
    macroBias: 0.3,
    ...overrides,
  });
}

const REGIME_INPUTS: Record<RegimeLabel, { macroBias: number; vixLevel: number; sectorBreadth: number | null }> = {
  NEUTRAL: { macroBias: 0, vixLevel: 20, sectorBreadth: null },
  RISK_ON: { macroBias: 0, vixLevel: 14, sectorBreadth: null },
  RISK_OFF: { macroBias: 0, vixLevel: 32, sectorBreadth: null },
  ROTATION: { macroBias: 0, vixLevel: 20, sectorBreadth: 0.5 },
};

/**
 * A classified regime snapshot with the given label
 */
export function regimeOf(label: RegimeLabel): RegimeSnapshot {
  const inputs = REGIME_INPUTS[label];
  const sectorPerformance =
    label === "ROTATION"
      ? [
          { sector: "Technology", changePct: 1 },
          { sector: "Energy", changePct: 0.9 },
          { sector: "Utilities", changePct: -0.8 },
          { sector: "Materials", changePct: -1 },
        ]
      : [];
  return classifyRegime({ ...inputs, sectorPerformance }, resetRegimeState()).regime;
}

/**
 * Deterministic pseudo-random numbers in [0, 1) (LCG)
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 2 ** 32;
  };
}
