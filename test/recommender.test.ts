import { describe, expect, test } from "vitest";
import type { ComplexityAnalysis } from "../src/analysis/complexity.ts";
import {
  recommend,
  recommendSpeed,
  recommendTermCount,
  recommendWindow,
  summarizeRecommendation,
} from "../src/analysis/recommender.ts";

function analysis(overrides: Partial<ComplexityAnalysis>): ComplexityAnalysis {
  return {
    complexityLevel: "simple",
    discontinuityPositions: [],
    discontinuityCount: 0,
    highFrequencyRatio: 0,
    smoothness: 1,
    score: 0,
    degenerate: false,
    ...overrides,
  };
}

const squareWave = analysis({
  complexityLevel: "high",
  discontinuityPositions: [0],
  discontinuityCount: 1,
  highFrequencyRatio: 0.001,
  smoothness: 0.99,
  score: 6,
});

describe("recommendTermCount", () => {
  test("base terms per level", () => {
    expect(recommendTermCount(analysis({}))).toBe(20);
    expect(recommendTermCount(squareWave)).toBe(115);
  });

  test("jumps and high-frequency content add terms", () => {
    expect(recommendTermCount(analysis({ complexityLevel: "medium", discontinuityCount: 3, highFrequencyRatio: 0.4 }))).toBe(
      110,
    );
  });

  test("clamped to 300", () => {
    expect(
      recommendTermCount(analysis({ complexityLevel: "extreme", discontinuityCount: 10, highFrequencyRatio: 0.9 })),
    ).toBe(300);
  });

  test("degenerate sentinel adds no jump terms", () => {
    const degenerate = analysis({
      complexityLevel: "extreme",
      discontinuityCount: -1,
      highFrequencyRatio: 1,
      smoothness: 0,
      score: 15,
      degenerate: true,
    });
    expect(recommendTermCount(degenerate)).toBe(230);
    expect(recommendWindow(degenerate)).toBe("hamming");
  });
});

describe("speed and window", () => {
  test.each([
    [10, "slow"],
    [20, "normal"],
    [49, "normal"],
    [50, "fast"],
    [100, "very-fast"],
  ] as const)("%d terms animate %s", (terms, speed) => {
    expect(recommendSpeed(terms)).toBe(speed);
  });

  test("window follows the jump count", () => {
    expect(recommendWindow(analysis({}))).toBe("rectangular");
    expect(recommendWindow(analysis({ discontinuityCount: 2 }))).toBe("hann");
    expect(recommendWindow(analysis({ discontinuityCount: 3 }))).toBe("hamming");
  });
});

describe("recommend", () => {
  test("square wave", () => {
    const rec = recommend(squareWave);
    expect(rec).toEqual({
      termCount: 115,
      animationSpeed: "very-fast",
      windowType: "hann",
      rationale: [
        "Complexity: high (score 6).",
        "115 terms are needed to capture the detail and the jumps.",
        "Hann window: softens the overshoot at a few jumps.",
        "Gibbs overshoot expected: 1 discontinuity(ies) cause ringing of about 9% of the jump.",
      ].join("\n"),
    });
    expect(summarizeRecommendation(squareWave, rec)).toBe("115 terms | very-fast | hann | high, 1 discontinuity(ies)");
  });

  test("smooth function", () => {
    const rec = recommend(analysis({}));
    expect(rec.termCount).toBe(20);
    expect(rec.animationSpeed).toBe("normal");
    expect(rec.windowType).toBe("rectangular");
    expect(rec.rationale.split("\n")).toHaveLength(3);
  });
});
