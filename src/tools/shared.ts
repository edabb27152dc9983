import { UserError } from "fastmcp";
import { z } from "zod";
import { CoefficientCache } from "../cache.ts";
import { loadServerConfig } from "../config.ts";
import { Diagnostics } from "../diagnostics.ts";
import { ParseError } from "../errors.ts";
import { computeAll } from "../fourier/engine.ts";
import { FunctionExpression } from "../fourier/expression.ts";
import { createPeriod, type PeriodSpec } from "../fourier/period.ts";
import type { CoefficientSet } from "../fourier/types.ts";

/** The part of the FastMCP tool context the tools use */
export interface ToolContext {
  log: { warn: (message: string) => void };
}

export const serverConfig = loadServerConfig();
export const coefficientCache = new CoefficientCache(serverConfig.cacheSize);

// =============================================================================
// PARAMETERS
// =============================================================================

export const expressionParam = z
  .string()
  .min(1)
  .describe("f(x) in x, e.g. 'x**2', 'sign(x)', '1 if abs(x) < pi/4 else 0'");

export const periodParam = z
  .union([z.number().positive(), z.string().min(1)])
  .default("2*pi")
  .describe("Period T as a number or constant expression ('2*pi'); the series covers [-T/2, T/2]");

export const termsParam = z.number().int().min(1).max(500).default(10).describe("Number of harmonics N");

// =============================================================================
// HELPERS
// =============================================================================

/** Re-throw input errors as UserError so the client sees a message, not a crash */
export function asUserError(error: unknown): never {
  if (error instanceof ParseError) throw new UserError(error.describe());
  if (error instanceof RangeError) throw new UserError(error.message);
  throw error;
}

export function parseInputs(expression: string, period: number | string): { fn: FunctionExpression; period: PeriodSpec } {
  try {
    return { fn: FunctionExpression.parse(expression), period: createPeriod(period) };
  } catch (error) {
    return asUserError(error);
  }
}

export function forwardDiagnostics(diagnostics: Diagnostics, context?: ToolContext): void {
  for (const line of diagnostics.summarize()) {
    context?.log.warn(line);
  }
}

/** Coefficients through the server cache */
export async function cachedCoefficients(
  fn: FunctionExpression,
  period: PeriodSpec,
  nTerms: number,
  context?: ToolContext,
): Promise<CoefficientSet> {
  const key = CoefficientCache.key(fn.text, period.period, nTerms);
  const cached = coefficientCache.get(key);
  if (cached) return cached;

  const diagnostics = new Diagnostics();
  const result = await computeAll(fn, period, nTerms, { ...serverConfig.engine, diagnostics }).catch(asUserError);
  forwardDiagnostics(diagnostics, context);
  coefficientCache.set(key, result);
  return result;
}

export function fmt(value: number, digits = 6): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(digits);
}
