import { describe, expect, test } from "vitest";
import { Diagnostics } from "../src/diagnostics.ts";
import { computeAll, requiredCoefficients } from "../src/fourier/engine.ts";
import { FunctionExpression } from "../src/fourier/expression.ts";
import { createPeriod } from "../src/fourier/period.ts";

const TWO_PI = createPeriod("2*pi");

function compute(text: string, nTerms: number, options: Parameters<typeof computeAll>[3] = {}) {
  return computeAll(FunctionExpression.parse(text), TWO_PI, nTerms, options);
}

describe("requiredCoefficients", () => {
  test("symmetry prunes families", () => {
    expect(requiredCoefficients("even", 3)).toEqual({ an: true, bn: false });
    expect(requiredCoefficients("odd", 3)).toEqual({ an: false, bn: true });
    expect(requiredCoefficients("half-wave", 2)).toEqual({ an: false, bn: false });
    expect(requiredCoefficients("half-wave", 3)).toEqual({ an: true, bn: true });
    expect(requiredCoefficients("none", 2)).toEqual({ an: true, bn: true });
  });
});

describe("computeAll", () => {
  test("known series skip integration", async () => {
    const cs = await compute("x**2", 5);
    expect(cs.source).toBe("known-series");
    expect(cs.knownSeries).toBe("parabola");
    expect(cs.integration).toBe("none");
    expect(cs.symmetry).toBe("even");
    expect(cs.a0).toBeCloseTo((2 * Math.PI ** 2) / 3, 12);
    expect(cs.an[0]).toBeCloseTo(-4, 12);
    expect(cs.bn).toEqual([0, 0, 0, 0, 0]);
    expect(cs.an).toHaveLength(5);
    expect(cs.anFormula?.text).toBe("4 * (-1) ** n / n ** 2");
    expect(cs.bnFormula?.text).toBe("0");
  });

  test("sin(x) reproduces its own series", async () => {
    const cs = await compute("sin(x)", 30);
    expect(cs.a0).toBe(0);
    expect(cs.bn[0]).toBe(1);
    expect(cs.an).toHaveLength(30);
    expect(cs.bn).toHaveLength(30);
    for (let k = 0; k < 30; k++) {
      expect(Math.abs(cs.an[k])).toBeLessThan(1e-6);
      if (k > 0) expect(Math.abs(cs.bn[k])).toBeLessThan(1e-6);
    }
  });

  test("integrating sin(x) through the pool agrees with the known series", async () => {
    const cs = await compute("1*sin(x)", 30);
    expect(cs.source).toBe("integrated");
    expect(cs.an).toHaveLength(30);
    expect(cs.bn).toHaveLength(30);
    expect(cs.bn[0]).toBeCloseTo(1, 10);
    for (let k = 1; k < 30; k++) expect(Math.abs(cs.bn[k])).toBeLessThan(1e-6);
    expect(cs.an.every((an) => an === 0)).toBe(true);
  });

  test("a two-harmonic sum keeps exactly its harmonics", async () => {
    const cs = await compute("sin(x) + 0.5*sin(3*x)", 6);
    expect(cs.source).toBe("integrated");
    expect(cs.a0).toBeCloseTo(0, 10);
    expect(cs.bn[0]).toBeCloseTo(1, 10);
    expect(cs.bn[2]).toBeCloseTo(0.5, 10);
    for (const k of [1, 3, 4, 5]) expect(cs.bn[k]).toBeCloseTo(0, 10);
    for (const an of cs.an) expect(an).toBeCloseTo(0, 10);
  });

  test("closed-form integration of a polynomial", async () => {
    const cs = await compute("x**2 + 1", 4);
    expect(cs.source).toBe("integrated");
    expect(cs.integration).toBe("symbolic");
    expect(cs.a0).toBeCloseTo((2 * Math.PI ** 2) / 3 + 2, 10);
    expect(cs.an[0]).toBeCloseTo(-4, 10);
    expect(cs.an[1]).toBeCloseTo(1, 10);
    expect(cs.bn[2]).toBe(0);
    expect(cs.an).toHaveLength(4);
    expect(cs.bn).toHaveLength(4);
  });

  test("odd functions have a0 and aₙ exactly zero", async () => {
    const cs = await compute("x**3 - x", 3);
    expect(cs.symmetry).toBe("odd");
    expect(cs.a0).toBe(0);
    expect(cs.an).toEqual([0, 0, 0]);
    expect(cs.anFormula?.text).toBe("0");
  });

  test("half-wave symmetry zeroes the even harmonics", async () => {
    const cs = await compute("sin(x) + cos(3*x)", 4);
    expect(cs.symmetry).toBe("half-wave");
    expect(cs.bn[0]).toBeCloseTo(1, 10);
    expect(cs.an[2]).toBeCloseTo(1, 10);
    expect(cs.an[1]).toBe(0);
    expect(cs.bn[1]).toBe(0);
    expect(cs.an[0]).toBeCloseTo(0, 10);
  });

  test("non-integrable expressions fall back to quadrature", async () => {
    const diagnostics = new Diagnostics();
    const cs = await compute("exp(x)", 3, { diagnostics });
    expect(cs.integration).toBe("numeric");
    expect(cs.a0).toBeCloseTo((2 * Math.sinh(Math.PI)) / Math.PI, 2);
    expect(cs.anFormula).toBeUndefined();
    expect(cs.an).toHaveLength(3);
    expect(cs.bn).toHaveLength(3);
    expect(diagnostics.count("integration-fallback")).toBe(1);
    expect(diagnostics.count("formula-unavailable")).toBe(1);
  });

  test("conditionals integrate numerically", async () => {
    const cs = await compute("1 if abs(x) < pi/4 else 0", 3);
    expect(cs.integration).toBe("numeric");
    expect(cs.symmetry).toBe("even");
    expect(cs.a0).toBeCloseTo(0.5, 2);
    expect(cs.an[0]).toBeCloseTo((2 * Math.SQRT1_2) / Math.PI, 2);
  });

  test("pooled and serial runs agree", async () => {
    const pooled = await compute("x**3 - x + x*cos(x)", 25);
    const serial = await compute("x**3 - x + x*cos(x)", 25, { parallelThreshold: 100 });
    expect(pooled.an).toHaveLength(25);
    expect(pooled.bn).toHaveLength(25);
    expect(pooled.a0).toBe(serial.a0);
    expect(pooled.an).toEqual(serial.an);
    expect(pooled.bn).toEqual(serial.bn);
  });

  test("repeated runs are identical", async () => {
    const first = await compute("abs(x) + x", 8);
    const second = await compute("abs(x) + x", 8);
    expect(second.a0).toBe(first.a0);
    expect(second.an).toEqual(first.an);
    expect(second.bn).toEqual(first.bn);
  });

  test("formulas are skipped above formulaMaxTerms", async () => {
    const cs = await compute("x**3 - x", 12, { formulaMaxTerms: 10 });
    expect(cs.anFormula).toBeUndefined();
    expect(cs.bnFormula).toBeUndefined();
  });

  test.each([0, -1, 2.5])("rejects %d terms", async (nTerms) => {
    await expect(compute("x", nTerms)).rejects.toThrow(RangeError);
  });
});
