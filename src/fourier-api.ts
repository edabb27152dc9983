/**
 * Text-in entry points: every operation takes expression text and a period,
 * parses them once and delegates to the core modules.
 */

import { recommend, type Recommendation } from "./analysis/recommender.ts";
import { analyzeComplexity as analyzeFunction, type ComplexityAnalysis } from "./analysis/complexity.ts";
import type { AnalysisOptions, EngineOverrides } from "./config.ts";
import type { DiagnosticSink } from "./diagnostics.ts";
import { computeAll as computeCoefficients } from "./fourier/engine.ts";
import { FunctionExpression } from "./fourier/expression.ts";
import { createPeriod } from "./fourier/period.ts";
import { computeError as seriesError, type SeriesError } from "./fourier/series.ts";
import type { CoefficientSet } from "./fourier/types.ts";

export { evaluateSeries } from "./fourier/series.ts";
export { recommend };

/** Parse and compute; rejects with ParseError before any coefficient is computed */
export async function computeAll(
  expression: string,
  period: number | string,
  nTerms: number,
  options: EngineOverrides = {},
): Promise<CoefficientSet> {
  const fn = FunctionExpression.parse(expression);
  return computeCoefficients(fn, createPeriod(period), nTerms, options);
}

export function computeError(
  cs: CoefficientSet,
  expression: string,
  xs: readonly number[],
  nTerms: number = cs.nTerms,
  sink?: DiagnosticSink,
): SeriesError {
  return seriesError(cs, FunctionExpression.parse(expression), xs, nTerms, sink);
}

export function analyzeComplexity(
  expression: string,
  period: number | string,
  options: Partial<AnalysisOptions> = {},
): ComplexityAnalysis {
  const fn = FunctionExpression.parse(expression);
  return analyzeFunction(fn, createPeriod(period).halfPeriod, options);
}

/** analyzeComplexity followed by recommend */
export function recommendFor(
  expression: string,
  period: number | string,
  options: Partial<AnalysisOptions> = {},
): { analysis: ComplexityAnalysis; recommendation: Recommendation } {
  const analysis = analyzeComplexity(expression, period, options);
  return { analysis, recommendation: recommend(analysis) };
}
