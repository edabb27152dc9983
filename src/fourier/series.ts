/**
 * SeriesEvaluator - partial sums, approximation error and presentation
 */

import { type DiagnosticSink, silentSink } from "../diagnostics.ts";
import type { FunctionExpression } from "./expression.ts";
import type { CoefficientSet } from "./types.ts";

export { linspace } from "./sampling.ts";

// =============================================================================
// EVALUATION
// =============================================================================

function clampTerms(cs: CoefficientSet, nTerms: number): number {
  if (!Number.isFinite(nTerms)) return nTerms > 0 ? cs.an.length : 0;
  return Math.min(Math.max(0, Math.floor(nTerms)), cs.an.length);
}

/**
 * a0/2 + Σ_{k ≤ nTerms} aₖ·cos(kπx/L) + bₖ·sin(kπx/L) at every x.
 * nTerms is clamped to [0, N]. Angular arguments are computed once for every
 * (k, x) pair.
 */
export function evaluateSeries(cs: CoefficientSet, xs: readonly number[], nTerms: number = cs.nTerms): number[] {
  const terms = clampTerms(cs, nTerms);
  const count = xs.length;
  const result = new Array<number>(count).fill(cs.a0 / 2);
  if (terms === 0 || count === 0) return result;

  // Outer product: args[k·count + j] = (k+1)·π/L · x_j
  const scale = Math.PI / cs.period.halfPeriod;
  const args = new Float64Array(terms * count);
  for (let k = 0; k < terms; k++) {
    const frequency = (k + 1) * scale;
    for (let j = 0; j < count; j++) {
      args[k * count + j] = frequency * xs[j];
    }
  }

  for (let k = 0; k < terms; k++) {
    const an = cs.an[k];
    const bn = cs.bn[k];
    if (an === 0 && bn === 0) continue;
    for (let j = 0; j < count; j++) {
      const arg = args[k * count + j];
      result[j] += an * Math.cos(arg) + bn * Math.sin(arg);
    }
  }
  return result;
}

export interface SeriesError {
  /** f(x) - series(x) */
  pointwise: number[];
  mse: number;
  mae: number;
  maxAbs: number;
}

/**
 * Approximation error of the partial sum against f. Samples where f fails to
 * evaluate count as 0 and are reported to the sink.
 */
export function computeError(
  cs: CoefficientSet,
  fn: FunctionExpression,
  xs: readonly number[],
  nTerms: number = cs.nTerms,
  sink: DiagnosticSink = silentSink,
): SeriesError {
  const actual = fn.evaluateVector(xs, sink);
  const approximation = evaluateSeries(cs, xs, nTerms);
  const pointwise = actual.map((y, i) => y - approximation[i]);

  if (pointwise.length === 0) return { pointwise, mse: 0, mae: 0, maxAbs: 0 };

  let squares = 0;
  let absolutes = 0;
  let maxAbs = 0;
  for (const e of pointwise) {
    squares += e * e;
    absolutes += Math.abs(e);
    maxAbs = Math.max(maxAbs, Math.abs(e));
  }
  return {
    pointwise,
    mse: squares / pointwise.length,
    mae: absolutes / pointwise.length,
    maxAbs,
  };
}

// =============================================================================
// PRESENTATION
// =============================================================================

const NEGLIGIBLE = 1e-10;

function signedTerm(value: number, basis: string): string {
  return `${value < 0 ? " - " : " + "}${Math.abs(value).toFixed(4)}*${basis}`;
}

/**
 * Partial sum as text, e.g. "0.0000 + 1.2732*sin(1πx/3.14)".
 * Coefficients at or below 1e-10 in magnitude are left out.
 */
export function formatSeriesExpression(cs: CoefficientSet, nTerms: number = cs.nTerms): string {
  const terms = clampTerms(cs, nTerms);
  const L = cs.period.halfPeriod.toFixed(2);
  let text = (cs.a0 / 2).toFixed(4);
  for (let k = 0; k < terms; k++) {
    const n = k + 1;
    if (Math.abs(cs.an[k]) > NEGLIGIBLE) text += signedTerm(cs.an[k], `cos(${n}πx/${L})`);
    if (Math.abs(cs.bn[k]) > NEGLIGIBLE) text += signedTerm(cs.bn[k], `sin(${n}πx/${L})`);
  }
  return text;
}

export interface CoefficientRow {
  n: number;
  an: number;
  bn: number;
  /** √(aₙ² + bₙ²) */
  magnitude: number;
}

/** One row per harmonic, starting with n = 0 carrying a0 */
export function coefficientTable(cs: CoefficientSet): CoefficientRow[] {
  const rows: CoefficientRow[] = [{ n: 0, an: cs.a0, bn: 0, magnitude: Math.abs(cs.a0) }];
  for (let k = 0; k < cs.an.length; k++) {
    rows.push({ n: k + 1, an: cs.an[k], bn: cs.bn[k], magnitude: Math.hypot(cs.an[k], cs.bn[k]) });
  }
  return rows;
}
