/**
 * Whitelisted math functions and constants.
 * These are the only names an expression can reach besides its variable.
 */

/** Canonical function names */
export type MathFunctionName =
  | "sin"
  | "cos"
  | "tan"
  | "asin"
  | "acos"
  | "atan"
  | "sinh"
  | "cosh"
  | "tanh"
  | "exp"
  | "log"
  | "log10"
  | "sqrt"
  | "abs"
  | "sign"
  | "floor"
  | "ceil";

export type MathConstantName = "pi" | "e";

export const MATH_FUNCTIONS: Record<MathFunctionName, (value: number) => number> = {
  sin: Math.sin,
  cos: Math.cos,
  tan: Math.tan,
  asin: Math.asin,
  acos: Math.acos,
  atan: Math.atan,
  sinh: Math.sinh,
  cosh: Math.cosh,
  tanh: Math.tanh,
  exp: Math.exp,
  log: Math.log,
  log10: Math.log10,
  sqrt: Math.sqrt,
  abs: Math.abs,
  // sign(-0) is -0 in JS; normalize so 0 always maps to 0
  sign: (value) => (value > 0 ? 1 : value < 0 ? -1 : 0),
  floor: Math.floor,
  ceil: Math.ceil,
};

/** Alternative spellings accepted on input */
const FUNCTION_ALIASES: Record<string, MathFunctionName> = {
  arcsin: "asin",
  arccos: "acos",
  arctan: "atan",
};

export const MATH_CONSTANTS: Record<MathConstantName, number> = {
  pi: Math.PI,
  e: Math.E,
};

/** Resolve a (possibly aliased) function name to its canonical form */
export function resolveFunctionName(name: string): MathFunctionName | null {
  if (isMathFunctionName(name)) return name;
  return Object.hasOwn(FUNCTION_ALIASES, name) ? FUNCTION_ALIASES[name] : null;
}

export function isMathFunctionName(name: string): name is MathFunctionName {
  return Object.hasOwn(MATH_FUNCTIONS, name);
}

export function isMathConstant(name: string): name is MathConstantName {
  return Object.hasOwn(MATH_CONSTANTS, name);
}
