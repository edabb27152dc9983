import { ParseError } from "../errors.ts";
import { parseExpression } from "../math/ast.ts";
import { evaluateAST } from "../math/evaluate.ts";

/** A period and its half, the integration bound L */
export interface PeriodSpec {
  readonly period: number;
  readonly halfPeriod: number;
}

/**
 * Build a PeriodSpec from a number or a constant expression such as "2*pi".
 * Throws ParseError unless the period is a finite positive number.
 */
export function createPeriod(period: number | string): PeriodSpec {
  const value = typeof period === "number" ? period : evaluateConstant(period);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ParseError(`Period must be a positive finite number, got ${value}`, String(period));
  }
  return { period: value, halfPeriod: value / 2 };
}

function evaluateConstant(text: string): number {
  const { ast, error, errorIndex } = parseExpression(text, { variables: [] });
  if (!ast) {
    throw new ParseError(error ?? "Invalid period", text, errorIndex);
  }
  return evaluateAST(ast, "", 0);
}
