/**
 * Configuration - tunables with defaults, plus environment overrides for the server
 */

import { z } from "zod";
import type { DiagnosticSink } from "./diagnostics.ts";

// =============================================================================
// SYMMETRY
// =============================================================================

export interface SymmetryOptions {
  /** Points sampled on (0, extent·L] for the even/odd tests */
  samples: number;
  /** Points sampled on [-L/2, 0] for the half-wave test */
  halfWaveSamples: number;
  /** First test point; reduced automatically when extent·L is smaller */
  start: number;
  /** Last test point as a fraction of L */
  extent: number;
  /** Relative tolerance: |a - b| <= atol + rtol·|b| */
  rtol: number;
  /** Absolute tolerance */
  atol: number;
}

export const DEFAULT_SYMMETRY_OPTIONS: SymmetryOptions = {
  samples: 25,
  halfWaveSamples: 15,
  start: 0.1,
  extent: 0.95,
  rtol: 1e-4,
  atol: 1e-6,
};

// =============================================================================
// COEFFICIENT ENGINE
// =============================================================================

export interface EngineOptions {
  /** Samples for trapezoidal quadrature over [-L, L] */
  quadratureSamples: number;
  /** Term counts above this go through the task pool */
  parallelThreshold: number;
  /** Maximum tasks in flight */
  poolSize: number;
  /** General-term formulas are attempted only up to this many terms */
  formulaMaxTerms: number;
  /** Largest trigonometric polynomial the closed-form integrator will build */
  symbolicTermBudget: number;
  symmetry: SymmetryOptions;
  diagnostics?: DiagnosticSink;
}

export type EngineOverrides = Partial<Omit<EngineOptions, "symmetry">> & {
  symmetry?: Partial<SymmetryOptions>;
};

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  quadratureSamples: 2000,
  parallelThreshold: 20,
  poolSize: 4,
  formulaMaxTerms: 50,
  symbolicTermBudget: 4096,
  symmetry: DEFAULT_SYMMETRY_OPTIONS,
};

export function resolveEngineOptions(overrides: EngineOverrides = {}): EngineOptions {
  return {
    ...DEFAULT_ENGINE_OPTIONS,
    ...overrides,
    // Quadrature never drops below 2000 samples
    quadratureSamples: Math.max(
      2000,
      overrides.quadratureSamples ?? DEFAULT_ENGINE_OPTIONS.quadratureSamples,
    ),
    poolSize: Math.max(1, overrides.poolSize ?? DEFAULT_ENGINE_OPTIONS.poolSize),
    symmetry: { ...DEFAULT_SYMMETRY_OPTIONS, ...overrides.symmetry },
  };
}

// =============================================================================
// COMPLEXITY ANALYSIS
// =============================================================================

export interface AnalysisOptions {
  /** Samples over [-L, L] */
  samples: number;
  /** A slope is a jump when it exceeds mean + jumpSigma·stddev */
  jumpSigma: number;
  /** Jumps closer than mergeFraction·period are one discontinuity */
  mergeFraction: number;
  /** Fraction of failed samples above which the function is degenerate */
  degenerateRatio: number;
  diagnostics?: DiagnosticSink;
}

export const DEFAULT_ANALYSIS_OPTIONS: AnalysisOptions = {
  samples: 2000,
  jumpSigma: 5,
  mergeFraction: 0.01,
  degenerateRatio: 0.5,
};

export function resolveAnalysisOptions(overrides: Partial<AnalysisOptions> = {}): AnalysisOptions {
  return { ...DEFAULT_ANALYSIS_OPTIONS, ...overrides };
}

// =============================================================================
// SERVER (environment)
// =============================================================================

const positiveInt = z.coerce.number().int().positive();

export const ServerConfigSchema = z.object({
  FOURIER_POOL_SIZE: positiveInt.default(DEFAULT_ENGINE_OPTIONS.poolSize),
  FOURIER_PARALLEL_THRESHOLD: positiveInt.default(DEFAULT_ENGINE_OPTIONS.parallelThreshold),
  FOURIER_QUADRATURE_SAMPLES: positiveInt.min(2000).default(DEFAULT_ENGINE_OPTIONS.quadratureSamples),
  FOURIER_FORMULA_MAX_TERMS: positiveInt.default(DEFAULT_ENGINE_OPTIONS.formulaMaxTerms),
  FOURIER_CACHE_SIZE: positiveInt.default(100),
});

export interface ServerConfig {
  engine: EngineOverrides;
  cacheSize: number;
}

/** Read server settings from the environment; invalid values throw a ZodError */
export function loadServerConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const parsed = ServerConfigSchema.parse(env);
  return {
    engine: {
      poolSize: parsed.FOURIER_POOL_SIZE,
      parallelThreshold: parsed.FOURIER_PARALLEL_THRESHOLD,
      quadratureSamples: parsed.FOURIER_QUADRATURE_SAMPLES,
      formulaMaxTerms: parsed.FOURIER_FORMULA_MAX_TERMS,
    },
    cacheSize: parsed.FOURIER_CACHE_SIZE,
  };
}
