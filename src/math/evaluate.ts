/**
 * AST evaluation
 * Compiles an AST into a closure once so repeated sampling does not re-walk
 * the tree. Float semantics: `%` takes the sign of
 * the divisor, `//` floors, comparisons yield 1 or 0 and `and`/`or` return an
 * operand. Non-finite results are returned as-is; callers decide what a
 * failed sample means.
 */

import type { ASTNode, CompareNode } from "./ast.ts";
import { MATH_FUNCTIONS } from "./functions.ts";
import type { CompareOperator } from "./operators.ts";

/** A compiled expression of one variable */
export type CompiledExpression = (value: number) => number;

const truthy = (value: number): boolean => value !== 0;

/**
 * Compile an AST into a function of one variable.
 * Any other variable name evaluates to NaN.
 *
 * @example
 * const f = compileAST(parseExpression("x ** 2 + 1").ast!);
 * f(3); // 10
 */
export function compileAST(node: ASTNode, variable = "x"): CompiledExpression {
  switch (node.type) {
    case "number":
    case "constant": {
      const value = node.value;
      return () => value;
    }

    case "variable":
      return node.name === variable ? (v) => v : () => Number.NaN;

    case "unary": {
      const operand = compileAST(node.operand, variable);
      switch (node.operator) {
        case "-":
          return (v) => -operand(v);
        case "+":
          return operand;
        case "not":
          return (v) => (truthy(operand(v)) ? 0 : 1);
      }
    }

    case "binary": {
      const left = compileAST(node.left, variable);
      const right = compileAST(node.right, variable);
      switch (node.operator) {
        case "+":
          return (v) => left(v) + right(v);
        case "-":
          return (v) => left(v) - right(v);
        case "*":
          return (v) => left(v) * right(v);
        case "/":
          return (v) => left(v) / right(v);
        case "//":
          return (v) => Math.floor(left(v) / right(v));
        case "%":
          return (v) => floorMod(left(v), right(v));
        case "**":
          return (v) => left(v) ** right(v);
      }
    }

    case "call": {
      const fn = MATH_FUNCTIONS[node.name];
      const arg = compileAST(node.args[0], variable);
      return (v) => fn(arg(v));
    }

    case "compare":
      return compileComparison(node, variable);

    case "logical": {
      const left = compileAST(node.left, variable);
      const right = compileAST(node.right, variable);
      if (node.operator === "and") {
        return (v) => {
          const l = left(v);
          return truthy(l) ? right(v) : l;
        };
      }
      return (v) => {
        const l = left(v);
        return truthy(l) ? l : right(v);
      };
    }

    case "conditional": {
      const test = compileAST(node.test, variable);
      const consequent = compileAST(node.consequent, variable);
      const alternate = compileAST(node.alternate, variable);
      return (v) => (truthy(test(v)) ? consequent(v) : alternate(v));
    }
  }
}

/** Evaluate an AST once for a set of variable bindings */
export function evaluateAST(node: ASTNode, variable: string, value: number): number {
  return compileAST(node, variable)(value);
}

/** Float modulo with the sign of the divisor */
export function floorMod(a: number, b: number): number {
  if (b === 0) return Number.NaN;
  return a - b * Math.floor(a / b);
}

function compare(op: CompareOperator, a: number, b: number): boolean {
  switch (op) {
    case "<":
      return a < b;
    case "<=":
      return a <= b;
    case ">":
      return a > b;
    case ">=":
      return a >= b;
    case "==":
      return a === b;
    case "!=":
      return a !== b;
  }
}

/** `a < b < c` means `a < b and b < c`, with `b` evaluated once */
function compileComparison(node: CompareNode, variable: string): CompiledExpression {
  const operands = node.operands.map((operand) => compileAST(operand, variable));
  const operators = node.operators;

  return (v) => {
    let left = operands[0](v);
    for (let i = 0; i < operators.length; i++) {
      const right = operands[i + 1](v);
      if (!compare(operators[i], left, right)) return 0;
      left = right;
    }
    return 1;
  };
}
