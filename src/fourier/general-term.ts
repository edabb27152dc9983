/**
 * General-term formulas for aₙ and bₙ.
 *
 * Available when every piece of the expansion is a plain polynomial and every
 * breakpoint sits at an integer multiple of L, so that each boundary term
 * reduces to c·(-1)^n / n^p or c / n^p.
 */

import type { ASTNode } from "../math/ast.ts";
import { formatAST } from "../math/ast.ts";
import type { Piece } from "./integrate.ts";
import type { GeneralTerm, GeneralTermPart } from "./types.ts";

/** cos(m·π/2) for integer m */
const QUARTER_TURN_COSINE = [1, 0, -1, 0];

/** s when x = s·L for an integer s, else null */
function multipleOf(x: number, halfPeriod: number): number | null {
  const s = x / halfPeriod;
  const rounded = Math.round(s);
  return Math.abs(s - rounded) < 1e-9 ? rounded : null;
}

function factorialRatio(k: number, j: number): number {
  let value = 1;
  for (let i = 0; i < j; i++) value *= k - i;
  return value;
}

/**
 * Build the formula for aₙ (basis "cos") or bₙ (basis "sin") from an
 * expansion over [-L, L]. Returns null when the expansion does not qualify.
 */
export function buildGeneralTerm(
  pieces: readonly Piece[],
  halfPeriod: number,
  basis: "cos" | "sin",
): GeneralTerm | null {
  const q0 = basis === "cos" ? 0 : 1;
  const L = halfPeriod;
  const sums = new Map<string, GeneralTermPart>();

  const accumulate = (alternating: boolean, power: number, coeff: number): void => {
    const key = `${alternating}:${power}`;
    const part = sums.get(key) ?? { coeff: 0, alternating, power };
    part.coeff += coeff;
    sums.set(key, part);
  };

  for (const piece of pieces) {
    const sa = multipleOf(piece.start, L);
    const sb = multipleOf(piece.end, L);
    if (sa === null || sb === null) return null;

    for (const t of piece.poly) {
      if (t.omega !== 0) return null;
      const k = t.power;
      for (let j = 0; j <= k; j++) {
        const cosPsi = QUARTER_TURN_COSINE[(q0 + j + 1) % 4];
        if (cosPsi === 0) continue;
        // Antiderivative term at x = s·L, with cos(nπs + ψ) = (-1)^(ns)·cosψ
        const base =
          (t.coeff * (j % 2 === 0 ? 1 : -1) * factorialRatio(k, j) * cosPsi * (L / Math.PI) ** (j + 1)) / L;
        const power = j + 1;
        accumulate(Math.abs(sb) % 2 === 1, power, base * (sb * L) ** (k - j));
        accumulate(Math.abs(sa) % 2 === 1, power, -base * (sa * L) ** (k - j));
      }
    }
  }

  const parts = [...sums.values()];
  const largest = parts.reduce((max, p) => Math.max(max, Math.abs(p.coeff)), 0);
  const kept = parts
    .filter((p) => Math.abs(p.coeff) > largest * 1e-12)
    .sort((a, b) => a.power - b.power || Number(a.alternating) - Number(b.alternating));
  return createGeneralTerm(kept);
}

export function createGeneralTerm(parts: readonly GeneralTermPart[]): GeneralTerm {
  const ast = partsToAST(parts);
  return {
    parts,
    ast,
    text: formatAST(ast),
    evaluate: (n) =>
      parts.reduce((sum, p) => sum + (p.coeff * (p.alternating && n % 2 === 1 ? -1 : 1)) / n ** p.power, 0),
  };
}

const N: ASTNode = { type: "variable", name: "n" };

function partToAST(part: GeneralTermPart, magnitude: number): ASTNode {
  let numerator: ASTNode = { type: "number", value: magnitude };
  if (part.alternating) {
    const alternation: ASTNode = {
      type: "binary",
      operator: "**",
      left: { type: "number", value: -1 },
      right: N,
    };
    numerator = magnitude === 1 ? alternation : { type: "binary", operator: "*", left: numerator, right: alternation };
  }
  const denominator: ASTNode =
    part.power === 1 ? N : { type: "binary", operator: "**", left: N, right: { type: "number", value: part.power } };
  return { type: "binary", operator: "/", left: numerator, right: denominator };
}

function partsToAST(parts: readonly GeneralTermPart[]): ASTNode {
  let tree: ASTNode | null = null;
  for (const part of parts) {
    const node = partToAST(part, Math.abs(part.coeff));
    if (tree === null) {
      tree = part.coeff < 0 ? { type: "unary", operator: "-", operand: node } : node;
    } else {
      tree = { type: "binary", operator: part.coeff < 0 ? "-" : "+", left: tree, right: node };
    }
  }
  return tree ?? { type: "number", value: 0 };
}

/** The formula that is identically zero */
export const ZERO_GENERAL_TERM: GeneralTerm = createGeneralTerm([]);
