/**
 * ComplexityAnalyzer
 *
 * Samples f over one period and scores three signals:
 *
 *   score = discontinuity_points + frequency_points + smoothness_points
 *
 * - discontinuities: slopes far above the typical slope
 * - high-frequency ratio: share of DFT power in the upper half of the band
 * - smoothness: 1 / (1 + σ(Δ²y) / 10)
 *
 * A single jump is enough for "high": partial sums of a jump converge slowly
 * and ring near it.
 */

import { type AnalysisOptions, resolveAnalysisOptions } from "../config.ts";
import { type Diagnostic, silentSink } from "../diagnostics.ts";
import type { FunctionExpression } from "../fourier/expression.ts";
import { linspace } from "../fourier/sampling.ts";
import { highFrequencyRatio } from "./spectrum.ts";

export type ComplexityLevel = "simple" | "medium" | "high" | "extreme";

export interface ComplexityAnalysis {
  complexityLevel: ComplexityLevel;
  /** x positions of detected jumps; empty when degenerate */
  discontinuityPositions: number[];
  /** -1 when the function is degenerate */
  discontinuityCount: number;
  /** 0..1 */
  highFrequencyRatio: number;
  /** 0..1, 1 is smooth */
  smoothness: number;
  score: number;
  /** More than `degenerateRatio` of the samples failed to evaluate */
  degenerate: boolean;
}

// =============================================================================
// SIGNALS
// =============================================================================

function meanAndDeviation(values: readonly number[]): { mean: number; deviation: number } {
  if (values.length === 0) return { mean: 0, deviation: 0 };
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
  return { mean, deviation: Math.sqrt(variance) };
}

/**
 * Positions where |Δy/Δx| exceeds mean + sigma·stddev, merged when closer
 * than `minSeparation` to the last kept position.
 */
export function detectDiscontinuities(
  xs: readonly number[],
  ys: readonly number[],
  sigma: number,
  minSeparation: number,
): number[] {
  const slopes: number[] = [];
  for (let i = 0; i + 1 < ys.length; i++) {
    slopes.push(Math.abs((ys[i + 1] - ys[i]) / (xs[i + 1] - xs[i] + 1e-10)));
  }
  const { mean, deviation } = meanAndDeviation(slopes);
  const threshold = mean + sigma * deviation;

  const positions: number[] = [];
  slopes.forEach((slope, i) => {
    if (slope <= threshold) return;
    const last = positions.at(-1);
    if (last === undefined || Math.abs(xs[i] - last) > minSeparation) {
      positions.push(xs[i]);
    }
  });
  return positions;
}

/** 1 / (1 + σ(Δ²y) / 10); 1 for fewer than 3 samples */
export function measureSmoothness(ys: readonly number[]): number {
  if (ys.length < 3) return 1;
  const second: number[] = [];
  for (let i = 0; i + 2 < ys.length; i++) {
    second.push(ys[i + 2] - 2 * ys[i + 1] + ys[i]);
  }
  return 1 / (1 + meanAndDeviation(second).deviation / 10);
}

// =============================================================================
// SCORING
// =============================================================================

export function complexityScore(discontinuities: number, highFrequency: number, smoothness: number): number {
  let score = 0;

  // ===== Discontinuities =====
  if (discontinuities > 5) score += 9;
  else if (discontinuities > 2) score += 7;
  else if (discontinuities > 0) score += 6;

  // ===== Frequency content =====
  if (highFrequency >= 0.5) score += 3;
  else if (highFrequency >= 0.3) score += 2;
  else if (highFrequency >= 0.1) score += 1;

  // ===== Smoothness =====
  if (smoothness <= 0.3) score += 3;
  else if (smoothness <= 0.5) score += 2;
  else if (smoothness <= 0.8) score += 1;

  return score;
}

export function complexityLevel(score: number): ComplexityLevel {
  if (score <= 2) return "simple";
  if (score <= 5) return "medium";
  if (score <= 8) return "high";
  return "extreme";
}

// =============================================================================
// ANALYZER
// =============================================================================

/** Analyze f over [-L, L]. Never throws. */
export function analyzeComplexity(
  fn: FunctionExpression,
  halfPeriod: number,
  overrides: Partial<AnalysisOptions> = {},
): ComplexityAnalysis {
  const options = resolveAnalysisOptions(overrides);
  const sink = options.diagnostics ?? silentSink;
  const xs = linspace(-halfPeriod, halfPeriod, options.samples);

  const failures: Diagnostic[] = [];
  const ys = fn.evaluateVector(xs, { record: (d) => failures.push(d) });

  if (failures.length > options.degenerateRatio * xs.length) {
    sink.record({
      code: "degenerate-function",
      message: `${failures.length} of ${xs.length} samples failed to evaluate`,
      detail: { expression: fn.text },
    });
    return {
      complexityLevel: "extreme",
      discontinuityPositions: [],
      discontinuityCount: -1,
      highFrequencyRatio: 1,
      smoothness: 0,
      score: complexityScore(6, 1, 0),
      degenerate: true,
    };
  }
  failures.forEach((d) => sink.record(d));

  const positions = detectDiscontinuities(xs, ys, options.jumpSigma, options.mergeFraction * 2 * halfPeriod);
  const ratio = highFrequencyRatio(ys);
  const smoothness = measureSmoothness(ys);
  const score = complexityScore(positions.length, ratio, smoothness);

  return {
    complexityLevel: complexityLevel(score),
    discontinuityPositions: positions,
    discontinuityCount: positions.length,
    highFrequencyRatio: ratio,
    smoothness,
    score,
    degenerate: false,
  };
}
