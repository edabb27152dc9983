import { describe, expect, test } from "vitest";
import { FunctionExpression } from "../src/fourier/expression.ts";
import { createPeriod } from "../src/fourier/period.ts";
import { coefficientTable, computeError, evaluateSeries, formatSeriesExpression } from "../src/fourier/series.ts";
import type { CoefficientSet } from "../src/fourier/types.ts";

const cs: CoefficientSet = {
  a0: 2,
  an: [1, 0],
  bn: [0, 0.5],
  period: createPeriod(2 * Math.PI),
  nTerms: 2,
  symmetry: "none",
  source: "integrated",
  integration: "symbolic",
};

describe("evaluateSeries", () => {
  test("full partial sum", () => {
    const [atZero, atQuarter] = evaluateSeries(cs, [0, Math.PI / 4]);
    expect(atZero).toBeCloseTo(2, 12);
    expect(atQuarter).toBeCloseTo(1 + Math.SQRT1_2 + 0.5, 12);
  });

  test("term count is clamped to [0, N]", () => {
    expect(evaluateSeries(cs, [0.3], 0)).toEqual([1]);
    expect(evaluateSeries(cs, [0.3], -4)).toEqual([1]);
    expect(evaluateSeries(cs, [0.3], 99)).toEqual(evaluateSeries(cs, [0.3], 2));
  });

  test("empty input", () => {
    expect(evaluateSeries(cs, [])).toEqual([]);
  });
});

describe("computeError", () => {
  test("error statistics", () => {
    const fn = FunctionExpression.parse("1 + cos(x)");
    const error = computeError(cs, fn, [0, Math.PI / 4]);
    expect(error.pointwise[0]).toBeCloseTo(0, 12);
    expect(error.pointwise[1]).toBeCloseTo(-0.5, 12);
    expect(error.mse).toBeCloseTo(0.125, 12);
    expect(error.mae).toBeCloseTo(0.25, 12);
    expect(error.maxAbs).toBeCloseTo(0.5, 12);
  });

  test("no samples", () => {
    expect(computeError(cs, FunctionExpression.parse("x"), [])).toEqual({ pointwise: [], mse: 0, mae: 0, maxAbs: 0 });
  });
});

describe("presentation", () => {
  test("formatSeriesExpression skips negligible terms", () => {
    expect(formatSeriesExpression(cs)).toBe("1.0000 + 1.0000*cos(1πx/3.14) + 0.5000*sin(2πx/3.14)");
    expect(formatSeriesExpression(cs, 1)).toBe("1.0000 + 1.0000*cos(1πx/3.14)");
  });

  test("negative coefficients are subtracted", () => {
    expect(formatSeriesExpression({ ...cs, a0: 0, an: [0, 0], bn: [2, -1] })).toBe(
      "0.0000 + 2.0000*sin(1πx/3.14) - 1.0000*sin(2πx/3.14)",
    );
  });

  test("coefficientTable starts at n = 0", () => {
    expect(coefficientTable({ ...cs, a0: -2, an: [3, 0], bn: [4, 0.5] })).toEqual([
      { n: 0, an: -2, bn: 0, magnitude: 2 },
      { n: 1, an: 3, bn: 4, magnitude: 5 },
      { n: 2, an: 0, bn: 0.5, magnitude: 0.5 },
    ]);
  });
});
