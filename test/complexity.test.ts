import { describe, expect, test } from "vitest";
import {
  analyzeComplexity,
  complexityLevel,
  complexityScore,
  detectDiscontinuities,
  measureSmoothness,
} from "../src/analysis/complexity.ts";
import { highFrequencyRatio, powerSpectrum } from "../src/analysis/spectrum.ts";
import { Diagnostics } from "../src/diagnostics.ts";
import { FunctionExpression } from "../src/fourier/expression.ts";

const analyze = (text: string, diagnostics?: Diagnostics) =>
  analyzeComplexity(FunctionExpression.parse(text), Math.PI, { diagnostics });

describe("spectrum", () => {
  test("constant signal has all power at DC", () => {
    const [dc, first] = powerSpectrum([1, 1, 1, 1]);
    expect(dc).toBe(16);
    expect(first).toBeCloseTo(0, 12);
  });

  test("high-frequency ratio", () => {
    const high = Array.from({ length: 8 }, (_, n) => Math.cos((2 * Math.PI * 3 * n) / 8));
    const low = Array.from({ length: 8 }, (_, n) => Math.cos((2 * Math.PI * n) / 8));
    expect(highFrequencyRatio(high)).toBeCloseTo(1, 10);
    expect(highFrequencyRatio(low)).toBeCloseTo(0, 10);
    expect(highFrequencyRatio([0, 0, 0, 0])).toBe(0);
  });
});

describe("signals", () => {
  const xs = Array.from({ length: 100 }, (_, i) => i);

  test("a single step is one discontinuity", () => {
    const ys = xs.map((i) => (i < 50 ? 0 : 10));
    expect(detectDiscontinuities(xs, ys, 5, 1)).toEqual([49]);
  });

  test("neighbouring jumps merge within the separation", () => {
    const ys = xs.map((i) => (i < 50 ? 0 : i === 50 ? 5 : 10));
    expect(detectDiscontinuities(xs, ys, 5, 2)).toEqual([49]);
    expect(detectDiscontinuities(xs, ys, 5, 0.5)).toEqual([49, 50]);
  });

  test("smoothness", () => {
    expect(measureSmoothness([1, 2])).toBe(1);
    expect(measureSmoothness([0, 1, 2, 3, 4])).toBe(1);
    // second differences -20, 20: deviation 20
    expect(measureSmoothness([0, 10, 0, 10])).toBeCloseTo(1 / 3, 12);
  });
});

describe("scoring", () => {
  test.each([
    [0, 0, 1, 0],
    [1, 0, 1, 6],
    [3, 0, 1, 7],
    [6, 0, 1, 9],
    [0, 0.1, 1, 1],
    [0, 0.3, 1, 2],
    [0, 0.5, 1, 3],
    [0, 0, 0.8, 1],
    [0, 0, 0.5, 2],
    [0, 0, 0.3, 3],
    [6, 1, 0, 15],
  ])("score(%d, %d, %d) = %d", (discontinuities, hf, smoothness, expected) => {
    expect(complexityScore(discontinuities, hf, smoothness)).toBe(expected);
  });

  test("levels", () => {
    expect([0, 2, 3, 5, 6, 8, 9].map(complexityLevel)).toEqual([
      "simple",
      "simple",
      "medium",
      "medium",
      "high",
      "high",
      "extreme",
    ]);
  });
});

describe("analyzeComplexity", () => {
  test("a smooth bump is simple", () => {
    const analysis = analyze("exp(-x**2)");
    expect(analysis.complexityLevel).toBe("simple");
    expect(analysis.smoothness).toBeGreaterThan(0.5);
    expect(analysis.discontinuityCount).toBe(0);
    expect(analysis.degenerate).toBe(false);
  });

  test("a square wave has one jump and rates high", () => {
    const analysis = analyze("sign(x)");
    expect(analysis.discontinuityCount).toBe(1);
    expect(analysis.discontinuityPositions[0]).toBeCloseTo(0, 2);
    expect(analysis.score).toBe(6);
    expect(analysis.complexityLevel).toBe("high");
  });

  test("half the samples failing is not degenerate", () => {
    const diagnostics = new Diagnostics();
    const analysis = analyze("log(x)", diagnostics);
    expect(analysis.degenerate).toBe(false);
    expect(diagnostics.count("evaluation-failed")).toBe(1000);
  });

  test("mostly failing functions are degenerate", () => {
    const diagnostics = new Diagnostics();
    const analysis = analyze("sqrt(-1 - x**2)", diagnostics);
    expect(analysis).toEqual({
      complexityLevel: "extreme",
      discontinuityPositions: [],
      discontinuityCount: -1,
      highFrequencyRatio: 1,
      smoothness: 0,
      score: 15,
      degenerate: true,
    });
    expect(diagnostics.count("degenerate-function")).toBe(1);
    expect(diagnostics.count("evaluation-failed")).toBe(0);
  });
});
