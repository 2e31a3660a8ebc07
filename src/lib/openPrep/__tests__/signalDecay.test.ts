import { describe, it, expect } from "vitest";
import {
  adaptiveFreshnessWeight,
  adaptiveHalfLife,
  classifyInstrument,
  freshnessWeight,
} from "../signalDecay.js";

describe("freshnessWeight", () => {
  it.each([1, 60, 600, 1234.5, 86_400])("returns exactly 0.5 at one half-life (h=%s)", (h) => {
    expect(freshnessWeight(h, h)).toBeCloseTo(0.5, 12);
  });

  it("returns 1.0 at zero elapsed", () => {
    expect(freshnessWeight(0, 600)).toBe(1);
  });

  it("returns 0.25 at two half-lives", () => {
    expect(freshnessWeight(1200, 600)).toBeCloseTo(0.25, 12);
  });

  it("clamps negative elapsed time to full freshness", () => {
    expect(freshnessWeight(-30, 600)).toBe(1);
  });

  it("maps unknown elapsed time to the neutral default, not to stale", () => {
    expect(freshnessWeight(null, 600)).toBe(0.5);
    expect(freshnessWeight(undefined, 600)).toBe(0.5);
    expect(freshnessWeight(NaN, 600)).toBe(0.5);
    expect(freshnessWeight(null, 600, 0.7)).toBe(0.7);
  });

  it("does not use the e-folding curve", () => {
    // exp(-1) ≈ 0.368 would be the wrong answer here
    expect(freshnessWeight(600, 600)).not.toBeCloseTo(Math.exp(-1), 3);
  });

  it("throws on a non-positive half-life", () => {
    expect(() => freshnessWeight(10, 0)).toThrow(RangeError);
    expect(() => freshnessWeight(10, -5)).toThrow(RangeError);
    expect(() => freshnessWeight(10, Infinity)).toThrow(RangeError);
  });
});

describe("adaptiveHalfLife", () => {
  it("uses the max half-life for low volatility", () => {
    expect(adaptiveHalfLife(0.8)).toBe(1200);
    expect(adaptiveHalfLife(1)).toBe(1200);
  });

  it("uses the min half-life for high volatility", () => {
    expect(adaptiveHalfLife(5)).toBe(180);
    expect(adaptiveHalfLife(9)).toBe(180);
  });

  it("interpolates linearly in between", () => {
    // ratio 0.5 → 1200 - 0.5 * 1020
    expect(adaptiveHalfLife(3)).toBe(690);
  });

  it("falls back to the instrument class, then the base half-life", () => {
    expect(adaptiveHalfLife(null, "penny")).toBe(240);
    expect(adaptiveHalfLife(null, "large_cap")).toBe(900);
    expect(adaptiveHalfLife(null)).toBe(600);
  });
});

describe("classifyInstrument", () => {
  it("classifies by price and ATR%", () => {
    expect(classifyInstrument(3, 2)).toBe("penny");
    expect(classifyInstrument(50, 9)).toBe("penny");
    expect(classifyInstrument(15, 2)).toBe("small_cap");
    expect(classifyInstrument(40, 4)).toBe("small_cap");
    expect(classifyInstrument(80, 1)).toBe("mid_cap");
    expect(classifyInstrument(150, 2)).toBe("mid_cap");
    expect(classifyInstrument(300, 1)).toBe("large_cap");
  });
});

describe("adaptiveFreshnessWeight", () => {
  it("decays faster for volatile names", () => {
    const calm = adaptiveFreshnessWeight(300, 1);
    const volatile = adaptiveFreshnessWeight(300, 5);
    expect(calm).toBeGreaterThan(volatile);
    expect(volatile).toBeCloseTo(freshnessWeight(300, 180), 12);
  });

  it("uses the price class when ATR is unknown", () => {
    expect(adaptiveFreshnessWeight(900, null, 300)).toBeCloseTo(0.5, 12);
  });

  it("stays neutral when elapsed is unknown", () => {
    expect(adaptiveFreshnessWeight(null, 3)).toBe(0.5);
  });
});
