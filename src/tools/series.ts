import { z } from "zod";
import { computeError, evaluateSeries, linspace } from "../fourier/series.ts";
import { Diagnostics } from "../diagnostics.ts";
import {
  cachedCoefficients,
  expressionParam,
  fmt,
  forwardDiagnostics,
  parseInputs,
  periodParam,
  termsParam,
  type ToolContext,
} from "./shared.ts";

const pointsParam = z
  .array(z.number())
  .min(1)
  .max(10_000)
  .optional()
  .describe("x values to evaluate at; defaults to evenly spaced samples over [-L, L]");

const samplesParam = (fallback: number) =>
  z.number().int().min(2).max(10_000).default(fallback).describe("Sample count when no x values are given");

const evaluateParameters = z.object({
  expression: expressionParam,
  period: periodParam,
  n_terms: termsParam,
  partial_terms: z
    .number()
    .int()
    .min(0)
    .optional()
    .describe("Harmonics to include in the partial sum (clamped to n_terms); defaults to n_terms"),
  x_values: pointsParam,
  samples: samplesParam(21),
});

/**
 * Partial sums of the series at given points
 */
export const evaluateSeriesTool = {
  name: "evaluate_series",
  description: `Evaluate the partial Fourier sum of f at a set of x values.

Returns JSON {x, y}. partial_terms = 0 gives the constant a0/2.`,

  parameters: evaluateParameters,

  execute: async (args: z.infer<typeof evaluateParameters>, context?: ToolContext): Promise<string> => {
    const { fn, period } = parseInputs(args.expression, args.period);
    const cs = await cachedCoefficients(fn, period, args.n_terms, context);
    const xs = args.x_values ?? linspace(-period.halfPeriod, period.halfPeriod, args.samples);
    const y = evaluateSeries(cs, xs, args.partial_terms ?? cs.nTerms);
    return JSON.stringify({ x: xs, y }, null, 2);
  },
};

const errorParameters = z.object({
  expression: expressionParam,
  period: periodParam,
  n_terms: termsParam,
  x_values: pointsParam,
  samples: samplesParam(200),
});

/**
 * Approximation error of the partial sum against f
 */
export const computeErrorTool = {
  name: "compute_error",
  description: `Measure how well N harmonics approximate f.

Reports mean squared error, mean absolute error and maximum absolute error of
f(x) - series(x) over the sample points.`,

  parameters: errorParameters,

  execute: async (args: z.infer<typeof errorParameters>, context?: ToolContext): Promise<string> => {
    const { fn, period } = parseInputs(args.expression, args.period);
    const cs = await cachedCoefficients(fn, period, args.n_terms, context);
    const xs = args.x_values ?? linspace(-period.halfPeriod, period.halfPeriod, args.samples);

    const diagnostics = new Diagnostics();
    const error = computeError(cs, fn, xs, cs.nTerms, diagnostics);
    forwardDiagnostics(diagnostics, context);

    return [
      `**Approximation error** of \`${args.expression}\` with ${cs.nTerms} terms over ${xs.length} points`,
      `- MSE: ${fmt(error.mse, 8)}`,
      `- MAE: ${fmt(error.mae, 8)}`,
      `- Max |error|: ${fmt(error.maxAbs, 8)}`,
    ].join("\n");
  },
};
