/**
 * Integrators for ∫[-L, L] f(x)·cos(ωx + φ) dx
 *
 * Closed form: the symbolic tree is expanded into a trigonometric polynomial
 * Σ c·x^k·cos(ωx + φ), piece by piece between the roots of abs/sign
 * arguments, and integrated term by term.
 *
 * Numeric: composite trapezoidal rule over a fixed sample grid, for
 * numeric-only expressions and anything the expansion rejects.
 */

import type { DiagnosticSink } from "../diagnostics.ts";
import type { ASTNode } from "../math/ast.ts";
import { MATH_FUNCTIONS, type MathFunctionName } from "../math/functions.ts";
import type { ArithmeticOperator } from "../math/operators.ts";
import type { FunctionExpression } from "./expression.ts";
import { linspace, trapezoid } from "./sampling.ts";

// =============================================================================
// TYPES
// =============================================================================

/** c · x^power · cos(omega·x + phase), omega >= 0; phase is 0 when omega is 0 */
export interface TrigTerm {
  coeff: number;
  power: number;
  omega: number;
  phase: number;
}

export type TrigPolynomial = TrigTerm[];

/** Interval [start, end] on which f equals `poly` */
export interface Piece {
  start: number;
  end: number;
  poly: TrigPolynomial;
}

export interface Integrator {
  readonly method: "symbolic" | "numeric";
  /** ∫[-L, L] f(x)·cos(omega·x + phase) dx */
  integrate(omega: number, phase: number): number;
}

// =============================================================================
// TRIGONOMETRIC POLYNOMIAL ALGEBRA
// =============================================================================

const OMEGA_EPSILON = 1e-12;
const MAX_POWER_EXPONENT = 8;
const MAX_BREAKPOINTS = 64;

function term(coeff: number, power: number, omega: number, phase: number): TrigTerm {
  if (Math.abs(omega) < OMEGA_EPSILON) {
    return { coeff: coeff * Math.cos(phase), power, omega: 0, phase: 0 };
  }
  // cos(-ωx + φ) = cos(ωx - φ)
  return omega < 0 ? { coeff, power, omega: -omega, phase: -phase } : { coeff, power, omega, phase };
}

export function constantPoly(value: number): TrigPolynomial {
  return value === 0 ? [] : [{ coeff: value, power: 0, omega: 0, phase: 0 }];
}

/** Merge terms sharing power and frequency */
export function combineTerms(terms: readonly TrigTerm[]): TrigPolynomial {
  const groups = new Map<string, { power: number; omega: number; cos: number; sin: number }>();
  for (const t of terms) {
    const key = `${t.power}:${t.omega.toPrecision(12)}`;
    const group = groups.get(key) ?? { power: t.power, omega: t.omega, cos: 0, sin: 0 };
    // c·cos(ωx + φ) = c·cosφ·cos(ωx) - c·sinφ·sin(ωx)
    group.cos += t.coeff * Math.cos(t.phase);
    group.sin += t.coeff * Math.sin(t.phase);
    groups.set(key, group);
  }

  const combined: TrigPolynomial = [];
  let largest = 0;
  for (const g of groups.values()) {
    if (g.omega === 0) {
      combined.push({ coeff: g.cos, power: g.power, omega: 0, phase: 0 });
      largest = Math.max(largest, Math.abs(g.cos));
    } else {
      const amplitude = Math.hypot(g.cos, g.sin);
      combined.push({ coeff: amplitude, power: g.power, omega: g.omega, phase: Math.atan2(g.sin, g.cos) });
      largest = Math.max(largest, amplitude);
    }
  }
  return combined.filter((t) => Math.abs(t.coeff) > largest * 1e-14);
}

export function addPolys(a: TrigPolynomial, b: TrigPolynomial): TrigPolynomial {
  return combineTerms([...a, ...b]);
}

export function scalePoly(p: TrigPolynomial, factor: number): TrigPolynomial {
  if (factor === 0) return [];
  return p.map((t) => ({ ...t, coeff: t.coeff * factor }));
}

/** Product by cos A·cos B = ½[cos(A + B) + cos(A - B)] */
export function multiplyPolys(a: TrigPolynomial, b: TrigPolynomial): TrigPolynomial {
  const out: TrigTerm[] = [];
  for (const s of a) {
    for (const t of b) {
      const coeff = s.coeff * t.coeff;
      const power = s.power + t.power;
      if (s.omega === 0 && t.omega === 0) {
        out.push({ coeff, power, omega: 0, phase: 0 });
        continue;
      }
      out.push(term(coeff / 2, power, s.omega + t.omega, s.phase + t.phase));
      out.push(term(coeff / 2, power, s.omega - t.omega, s.phase - t.phase));
    }
  }
  return combineTerms(out);
}

/** The value of a polynomial with no x dependence, else null */
export function asConstant(p: TrigPolynomial): number | null {
  let value = 0;
  for (const t of p) {
    if (t.omega !== 0 || t.power !== 0) return null;
    value += t.coeff;
  }
  return value;
}

/** [slope, intercept] of a polynomial of the form m·x + c, else null */
export function asAffine(p: TrigPolynomial): [number, number] | null {
  let slope = 0;
  let intercept = 0;
  for (const t of p) {
    if (t.omega !== 0 || t.power > 1) return null;
    if (t.power === 1) slope += t.coeff;
    else intercept += t.coeff;
  }
  return [slope, intercept];
}

// =============================================================================
// EXPANSION
// =============================================================================

class NotIntegrable extends Error {}

/** Thrown when an abs/sign argument changes sign inside the current piece */
class SplitRequired extends Error {
  constructor(readonly at: number) {
    super(`split at ${at}`);
  }
}

/**
 * Expand a tree into a trigonometric polynomial valid on (start, end).
 * Throws NotIntegrable or SplitRequired.
 */
class Expander {
  constructor(
    private readonly start: number,
    private readonly end: number,
    private readonly budget: number,
    private readonly tolerance: number,
  ) {}

  expand(node: ASTNode): TrigPolynomial {
    const poly = this.expandNode(node);
    if (poly.length > this.budget) {
      throw new NotIntegrable(`more than ${this.budget} terms`);
    }
    return poly;
  }

  private constant(node: ASTNode): number {
    const value = asConstant(this.expand(node));
    if (value === null) throw new NotIntegrable("non-constant operand");
    return value;
  }

  private expandNode(node: ASTNode): TrigPolynomial {
    switch (node.type) {
      case "number":
      case "constant":
        return constantPoly(node.value);
      case "variable":
        return [{ coeff: 1, power: 1, omega: 0, phase: 0 }];
      case "unary":
        if (node.operator === "not") throw new NotIntegrable("logical operator");
        return node.operator === "-" ? scalePoly(this.expand(node.operand), -1) : this.expand(node.operand);
      case "binary":
        return this.expandBinary(node.operator, node.left, node.right);
      case "call":
        return this.expandCall(node.name, node.args[0]);
      case "compare":
      case "logical":
      case "conditional":
        throw new NotIntegrable(node.type);
    }
  }

  private expandBinary(operator: ArithmeticOperator, left: ASTNode, right: ASTNode): TrigPolynomial {
    switch (operator) {
      case "+":
        return addPolys(this.expand(left), this.expand(right));
      case "-":
        return addPolys(this.expand(left), scalePoly(this.expand(right), -1));
      case "*":
        return multiplyPolys(this.expand(left), this.expand(right));
      case "/": {
        const divisor = this.constant(right);
        if (divisor === 0) throw new NotIntegrable("division by zero");
        return scalePoly(this.expand(left), 1 / divisor);
      }
      case "**":
        return this.expandPower(left, right);
      default: {
        // `//` and `%` survive only between constants
        const a = this.constant(left);
        const b = this.constant(right);
        if (b === 0) throw new NotIntegrable("division by zero");
        return constantPoly(operator === "//" ? Math.floor(a / b) : a - b * Math.floor(a / b));
      }
    }
  }

  private expandPower(base: ASTNode, exponent: ASTNode): TrigPolynomial {
    const k = this.constant(exponent);
    const expanded = this.expand(base);
    const baseValue = asConstant(expanded);
    if (baseValue !== null) {
      const value = baseValue ** k;
      if (!Number.isFinite(value)) throw new NotIntegrable("non-finite power");
      return constantPoly(value);
    }
    if (!Number.isInteger(k) || k < 0 || k > MAX_POWER_EXPONENT) {
      throw new NotIntegrable(`exponent ${k}`);
    }
    let result = constantPoly(1);
    for (let i = 0; i < k; i++) {
      result = multiplyPolys(result, expanded);
      if (result.length > this.budget) throw new NotIntegrable(`more than ${this.budget} terms`);
    }
    return result;
  }

  private expandCall(name: MathFunctionName, arg: ASTNode): TrigPolynomial {
    const inner = this.expand(arg);
    const constant = asConstant(inner);
    if (constant !== null) {
      const value = MATH_FUNCTIONS[name](constant);
      if (!Number.isFinite(value)) throw new NotIntegrable(`${name}(${constant})`);
      return constantPoly(value);
    }

    const affine = asAffine(inner);
    if (!affine) throw new NotIntegrable(`${name} of a non-affine argument`);
    const [slope, intercept] = affine;

    switch (name) {
      case "cos":
        return [term(1, 0, slope, intercept)];
      case "sin":
        return [term(1, 0, slope, intercept - Math.PI / 2)];
      case "abs":
        return scalePoly(inner, this.signOn(slope, intercept));
      case "sign":
        return constantPoly(this.signOn(slope, intercept));
      default:
        throw new NotIntegrable(name);
    }
  }

  /** Sign of m·x + c on the current piece; requests a split at an interior root */
  private signOn(slope: number, intercept: number): number {
    const root = -intercept / slope;
    if (root > this.start + this.tolerance && root < this.end - this.tolerance) {
      throw new SplitRequired(root);
    }
    return Math.sign(slope * ((this.start + this.end) / 2) + intercept);
  }
}

/**
 * Expand `ast` over [-L, L] into pieces, or null when it is not integrable
 * in closed form.
 */
export function expandPiecewise(ast: ASTNode, halfPeriod: number, budget: number): Piece[] | null {
  const tolerance = halfPeriod * 1e-12;
  const breakpoints = [-halfPeriod, halfPeriod];

  for (;;) {
    try {
      const pieces: Piece[] = [];
      for (let i = 0; i + 1 < breakpoints.length; i++) {
        const start = breakpoints[i];
        const end = breakpoints[i + 1];
        pieces.push({ start, end, poly: new Expander(start, end, budget, tolerance).expand(ast) });
      }
      return pieces;
    } catch (error) {
      if (error instanceof SplitRequired && breakpoints.length < MAX_BREAKPOINTS) {
        breakpoints.push(error.at);
        breakpoints.sort((a, b) => a - b);
        continue;
      }
      if (error instanceof SplitRequired || error instanceof NotIntegrable) return null;
      throw error;
    }
  }
}

// =============================================================================
// INTEGRATION
// =============================================================================

function factorialRatio(k: number, j: number): number {
  // k! / (k - j)!
  let value = 1;
  for (let i = 0; i < j; i++) value *= k - i;
  return value;
}

/**
 * Antiderivative of x^k·cos(ωx + φ) at x:
 * Σ_j (-1)^j · k!/(k-j)! · x^(k-j) · cos(ωx + φ - (j+1)π/2) / ω^(j+1)
 */
function antiderivative(power: number, omega: number, phase: number, x: number): number {
  if (omega === 0) return (Math.cos(phase) * x ** (power + 1)) / (power + 1);
  let sum = 0;
  for (let j = 0; j <= power; j++) {
    const sign = j % 2 === 0 ? 1 : -1;
    sum +=
      (sign * factorialRatio(power, j) * x ** (power - j) * Math.cos(omega * x + phase - ((j + 1) * Math.PI) / 2)) /
      omega ** (j + 1);
  }
  return sum;
}

/** ∫[start, end] of a trigonometric polynomial */
export function integratePoly(poly: TrigPolynomial, start: number, end: number): number {
  let sum = 0;
  for (const t of poly) {
    sum +=
      t.coeff *
      (antiderivative(t.power, t.omega, t.phase, end) - antiderivative(t.power, t.omega, t.phase, start));
  }
  return sum;
}

/** Exact integration of an expanded symbolic expression */
export class ClosedFormIntegrator implements Integrator {
  readonly method = "symbolic";

  constructor(readonly pieces: readonly Piece[]) {}

  /** Returns null when the tree cannot be expanded */
  static fromAST(ast: ASTNode, halfPeriod: number, budget: number): ClosedFormIntegrator | null {
    const pieces = expandPiecewise(ast, halfPeriod, budget);
    return pieces ? new ClosedFormIntegrator(pieces) : null;
  }

  integrate(omega: number, phase: number): number {
    const basis = [term(1, 0, omega, phase)];
    let sum = 0;
    for (const piece of this.pieces) {
      sum += integratePoly(multiplyPolys(piece.poly, basis), piece.start, piece.end);
    }
    return sum;
  }
}

/** Composite trapezoidal rule on a grid sampled once */
export class TrapezoidIntegrator implements Integrator {
  readonly method = "numeric";
  private readonly xs: number[];
  private readonly ys: number[];

  constructor(fn: FunctionExpression, halfPeriod: number, samples: number, sink?: DiagnosticSink) {
    this.xs = linspace(-halfPeriod, halfPeriod, samples);
    this.ys = fn.evaluateVector(this.xs, sink);
  }

  integrate(omega: number, phase: number): number {
    const weighted = this.ys.map((y, i) => y * Math.cos(omega * this.xs[i] + phase));
    return trapezoid(weighted, this.xs);
  }
}
