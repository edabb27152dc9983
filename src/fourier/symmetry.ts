/**
 * Symmetry detection by sampling.
 *
 * A hint for the coefficient engine, not a proof: a function that breaks
 * symmetry only between test points is misclassified. Tolerances and sample
 * counts come from SymmetryOptions.
 */

import { DEFAULT_SYMMETRY_OPTIONS, type SymmetryOptions } from "../config.ts";
import type { FunctionExpression } from "./expression.ts";
import { linspace } from "./sampling.ts";
import type { SymmetryClass } from "./types.ts";

/** |a - b| <= atol + rtol·|b| for every pair; false if any value is missing */
export function allClose(
  a: readonly (number | null)[],
  b: readonly (number | null)[],
  rtol: number,
  atol: number,
): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    const x = a[i];
    const y = b[i];
    if (x === null || y === null) return false;
    if (Math.abs(x - y) > atol + rtol * Math.abs(y)) return false;
  }
  return true;
}

/** Test points for the even/odd checks: `samples` points up to extent·L, never 0 */
export function symmetryTestPoints(halfPeriod: number, options: SymmetryOptions): number[] {
  const stop = options.extent * halfPeriod;
  const start = options.start < stop ? options.start : stop / options.samples;
  return linspace(start, stop, options.samples);
}

/**
 * Classify f on [-L, L]. Even wins over odd, odd over half-wave.
 * A sample that fails to evaluate fails the test it belongs to.
 */
export function classifySymmetry(
  fn: FunctionExpression,
  halfPeriod: number,
  overrides: Partial<SymmetryOptions> = {},
): SymmetryClass {
  const options = { ...DEFAULT_SYMMETRY_OPTIONS, ...overrides };
  const { rtol, atol } = options;

  const points = symmetryTestPoints(halfPeriod, options);
  const positive = points.map((t) => fn.tryEvaluate(t));
  const negative = points.map((t) => fn.tryEvaluate(-t));

  if (allClose(negative, positive, rtol, atol)) return "even";

  const negatedPositive = positive.map((v) => (v === null ? null : -v));
  if (allClose(negative, negatedPositive, rtol, atol)) return "odd";

  const half = linspace(-halfPeriod / 2, 0, options.halfWaveSamples);
  const first = half.map((t) => fn.tryEvaluate(t));
  const shifted = half.map((t) => fn.tryEvaluate(t + halfPeriod));
  const negatedFirst = first.map((v) => (v === null ? null : -v));
  if (allClose(shifted, negatedFirst, rtol, atol)) return "half-wave";

  return "none";
}
