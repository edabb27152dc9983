/**
 * Type definitions for the fourier module
 */

import type { ASTNode } from "../math/ast.ts";
import type { PeriodSpec } from "./period.ts";

export type SymmetryClass = "even" | "odd" | "half-wave" | "none";

/** One term of a general-term formula: coeff · (-1)^n (if alternating) / n^power */
export interface GeneralTermPart {
  coeff: number;
  alternating: boolean;
  power: number;
}

/** Closed form of aₙ or bₙ as a function of the harmonic n */
export interface GeneralTerm {
  parts: readonly GeneralTermPart[];
  /** Tree in the variable `n` */
  ast: ASTNode;
  /** Formatted tree, parseable with variables ["n"] */
  text: string;
  evaluate(n: number): number;
}

/** Where the coefficients came from */
export type CoefficientSource = "known-series" | "integrated";

/** How the integrals were evaluated; "none" when no integral was needed */
export type IntegrationMethod = "symbolic" | "numeric" | "none";

/**
 * Coefficients of a0/2 + Σ aₙ cos(nπx/L) + bₙ sin(nπx/L).
 * an[i] and bn[i] belong to harmonic n = i + 1.
 */
export interface CoefficientSet {
  readonly a0: number;
  readonly an: readonly number[];
  readonly bn: readonly number[];
  readonly anFormula?: GeneralTerm;
  readonly bnFormula?: GeneralTerm;
  readonly period: PeriodSpec;
  readonly nTerms: number;
  readonly symmetry: SymmetryClass;
  readonly source: CoefficientSource;
  /** Catalog entry used, when source is "known-series" */
  readonly knownSeries?: string;
  readonly integration: IntegrationMethod;
}
