/**
 * Math Operator Utilities
 * Operator tables for the function grammar: arithmetic, comparison and logical
 * operators plus the whitelisted names an expression may reference.
 */

/** Pattern to match a single operator character */
export const SINGLE_OPERATOR_PATTERN = /^[+\-*/%^<>=!]$/;

/** Multi-character operators, longest first so the tokenizer can match greedily */
export const MULTI_CHAR_OPERATORS = ["**", "//", "<=", ">=", "==", "!="] as const;

/** Arithmetic operators that appear in binary nodes */
export type ArithmeticOperator = "+" | "-" | "*" | "/" | "//" | "%" | "**";

/** Comparison operators (chainable, as in `0 < x < 1`) */
export type CompareOperator = "<" | "<=" | ">" | ">=" | "==" | "!=";

/** Word operators */
export type LogicalOperator = "and" | "or";

/**
 * Operator precedence levels (higher = binds tighter)
 * - Level 1: conditional (`a if c else b`)
 * - Level 2: or
 * - Level 3: and
 * - Level 4: not
 * - Level 5: comparisons
 * - Level 6: addition/subtraction
 * - Level 7: multiplication/division/modulo
 * - Level 8: unary minus/plus
 * - Level 9: exponentiation
 */
export const OPERATOR_PRECEDENCE: Record<string, number> = {
  if: 1,
  or: 2,
  and: 3,
  not: 4,
  "<": 5,
  "<=": 5,
  ">": 5,
  ">=": 5,
  "==": 5,
  "!=": 5,
  "+": 6,
  "-": 6,
  "*": 7,
  "/": 7,
  "//": 7,
  "%": 7,
  "**": 9,
};

/** Precedence of prefix `-` / `+` (binds looser than `**`: -x**2 = -(x**2)) */
export const UNARY_PRECEDENCE = 8;

/** Keywords of the grammar; never valid as identifiers */
export const KEYWORDS = new Set(["if", "else", "and", "or", "not"]);

const COMPARE_OPERATORS = new Set<string>(["<", "<=", ">", ">=", "==", "!="]);

/** Check if a character starts an operator */
export function isOperatorChar(char: string): boolean {
  return SINGLE_OPERATOR_PATTERN.test(char);
}

/** Get the precedence of an operator; null for unknown operators */
export function getOperatorPrecedence(op: string): number | null {
  return OPERATOR_PRECEDENCE[op] ?? null;
}

export function isCompareOperator(op: string): op is CompareOperator {
  return COMPARE_OPERATORS.has(op);
}

/**
 * Normalize an operator to its canonical form.
 * `^` is accepted as exponentiation, the way most math input reads.
 */
export function normalizeOperator(op: string): string {
  return op === "^" ? "**" : op;
}
