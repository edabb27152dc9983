/**
 * CoefficientEngine - a0, aₙ, bₙ over [-L, L]
 *
 * Order of attempts:
 * 1. Known-series catalog (exact, no integration)
 * 2. Symmetry classification to skip coefficients that must vanish
 * 3. Closed-form integration of the symbolic form, else trapezoidal quadrature
 *
 * Above `parallelThreshold` terms the per-harmonic work runs through the
 * task pool; both paths fill the same slots and give identical results.
 */

import { type EngineOverrides, resolveEngineOptions } from "../config.ts";
import { type DiagnosticSink, silentSink } from "../diagnostics.ts";
import type { FunctionExpression } from "./expression.ts";
import { buildGeneralTerm, ZERO_GENERAL_TERM } from "./general-term.ts";
import { ClosedFormIntegrator, type Integrator, TrapezoidIntegrator } from "./integrate.ts";
import { lookupKnownSeries } from "./known-series.ts";
import type { PeriodSpec } from "./period.ts";
import { runPool, runSerial } from "./pool.ts";
import { classifySymmetry } from "./symmetry.ts";
import type { CoefficientSet, GeneralTerm, SymmetryClass } from "./types.ts";

// =============================================================================
// HELPERS
// =============================================================================

type HarmonicPair = [an: number, bn: number];

/** Which families a symmetry class leaves non-zero at harmonic n */
export function requiredCoefficients(symmetry: SymmetryClass, n: number): { an: boolean; bn: boolean } {
  switch (symmetry) {
    case "even":
      return { an: true, bn: false };
    case "odd":
      return { an: false, bn: true };
    case "half-wave":
      return n % 2 === 1 ? { an: true, bn: true } : { an: false, bn: false };
    case "none":
      return { an: true, bn: true };
  }
}

function assertTermCount(nTerms: number): void {
  if (!Number.isInteger(nTerms) || nTerms < 1) {
    throw new RangeError(`Term count must be a positive integer, got ${nTerms}`);
  }
}

function allFinite(values: readonly number[]): boolean {
  return values.every(Number.isFinite);
}

interface Formulas {
  anFormula?: GeneralTerm;
  bnFormula?: GeneralTerm;
}

function buildFormulas(
  closedForm: ClosedFormIntegrator | null,
  halfPeriod: number,
  symmetry: SymmetryClass,
  sink: DiagnosticSink,
): Formulas {
  const anFormula =
    symmetry === "odd" ? ZERO_GENERAL_TERM : closedForm && buildGeneralTerm(closedForm.pieces, halfPeriod, "cos");
  const bnFormula =
    symmetry === "even" ? ZERO_GENERAL_TERM : closedForm && buildGeneralTerm(closedForm.pieces, halfPeriod, "sin");
  if (!anFormula || !bnFormula) {
    sink.record({
      code: "formula-unavailable",
      message: closedForm
        ? "coefficients are not of the form c·(-1)^n / n^p"
        : "no closed form for this expression",
    });
    return {};
  }
  return { anFormula, bnFormula };
}

// =============================================================================
// ENGINE
// =============================================================================

/**
 * Compute the first `nTerms` harmonics of `fn` on the given period.
 * Throws RangeError for a term count below 1; integration problems never
 * surface and are reported to `options.diagnostics` instead.
 */
export async function computeAll(
  fn: FunctionExpression,
  period: PeriodSpec,
  nTerms: number,
  overrides: EngineOverrides = {},
): Promise<CoefficientSet> {
  assertTermCount(nTerms);
  const options = resolveEngineOptions(overrides);
  const sink = options.diagnostics ?? silentSink;
  const L = period.halfPeriod;

  const symmetry = classifySymmetry(fn, L, options.symmetry);
  const ast = fn.symbolic;
  const closedForm = ast ? ClosedFormIntegrator.fromAST(ast, L, options.symbolicTermBudget) : null;
  const formulas = nTerms <= options.formulaMaxTerms ? buildFormulas(closedForm, L, symmetry, sink) : {};

  const known = lookupKnownSeries(fn.normalizedText, L);
  if (known) {
    const harmonics = Array.from({ length: nTerms }, (_, i) => i + 1);
    return {
      a0: known.a0,
      an: harmonics.map(known.an),
      bn: harmonics.map(known.bn),
      ...formulas,
      period,
      nTerms,
      symmetry,
      source: "known-series",
      knownSeries: known.name,
      integration: "none",
    };
  }

  const run = async (integrator: Integrator) => {
    const task = (index: number): HarmonicPair => {
      const n = index + 1;
      const omega = (n * Math.PI) / L;
      const need = requiredCoefficients(symmetry, n);
      return [
        need.an ? integrator.integrate(omega, 0) / L : 0,
        need.bn ? integrator.integrate(omega, -Math.PI / 2) / L : 0,
      ];
    };
    const pairs =
      nTerms > options.parallelThreshold
        ? await runPool(nTerms, options.poolSize, task)
        : runSerial(nTerms, task);
    return {
      a0: symmetry === "odd" ? 0 : integrator.integrate(0, 0) / L,
      an: pairs.map(([an]) => an),
      bn: pairs.map(([, bn]) => bn),
    };
  };

  let integrator: Integrator;
  if (closedForm) {
    integrator = closedForm;
  } else {
    sink.record({
      code: "integration-fallback",
      message: ast
        ? "closed-form integration unavailable; using trapezoidal quadrature"
        : "numeric-only expression; using trapezoidal quadrature",
      detail: { expression: fn.text },
    });
    integrator = new TrapezoidIntegrator(fn, L, options.quadratureSamples, sink);
  }

  let result = await run(integrator);
  if (integrator.method === "symbolic" && !allFinite([result.a0, ...result.an, ...result.bn])) {
    sink.record({
      code: "integration-fallback",
      message: "closed-form integration overflowed; using trapezoidal quadrature",
      detail: { expression: fn.text },
    });
    integrator = new TrapezoidIntegrator(fn, L, options.quadratureSamples, sink);
    result = await run(integrator);
  }

  return {
    ...result,
    ...(integrator.method === "symbolic" ? formulas : {}),
    period,
    nTerms,
    symmetry,
    source: "integrated",
    integration: integrator.method,
  };
}
