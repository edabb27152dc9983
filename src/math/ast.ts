/**
 * Math Expression AST (Abstract Syntax Tree)
 * Parsing, simplification, formatting and inspection of function expressions
 */

import {
  type MathConstantName,
  type MathFunctionName,
  MATH_CONSTANTS,
  isMathConstant,
  resolveFunctionName,
} from "./functions.ts";
import {
  type ArithmeticOperator,
  type CompareOperator,
  type LogicalOperator,
  getOperatorPrecedence,
  isCompareOperator,
  UNARY_PRECEDENCE,
} from "./operators.ts";
import { type MathToken, tokenizeMathExpression } from "./tokenizer.ts";

// =============================================================================
// AST NODE TYPES
// =============================================================================

/** AST node types */
export type ASTNodeType =
  | "number"
  | "constant"
  | "variable"
  | "unary"
  | "binary"
  | "call"
  | "compare"
  | "logical"
  | "conditional";

/** Base AST node */
export interface ASTNodeBase {
  type: ASTNodeType;
}

/** Number literal node */
export interface NumberNode extends ASTNodeBase {
  type: "number";
  value: number;
}

/** Named constant (pi, e) */
export interface ConstantNode extends ASTNodeBase {
  type: "constant";
  name: MathConstantName;
  value: number;
}

/** Variable reference node */
export interface VariableNode extends ASTNodeBase {
  type: "variable";
  name: string;
}

/** Unary operation node */
export interface UnaryNode extends ASTNodeBase {
  type: "unary";
  operator: "-" | "+" | "not";
  operand: ASTNode;
}

/** Binary arithmetic node */
export interface BinaryNode extends ASTNodeBase {
  type: "binary";
  operator: ArithmeticOperator;
  left: ASTNode;
  right: ASTNode;
}

/** Whitelisted function call */
export interface CallNode extends ASTNodeBase {
  type: "call";
  name: MathFunctionName;
  args: ASTNode[];
}

/** Comparison chain: `a < b <= c` has operands [a, b, c] and operators [<, <=] */
export interface CompareNode extends ASTNodeBase {
  type: "compare";
  operators: CompareOperator[];
  operands: ASTNode[];
}

/** `and` / `or` */
export interface LogicalNode extends ASTNodeBase {
  type: "logical";
  operator: LogicalOperator;
  left: ASTNode;
  right: ASTNode;
}

/** `consequent if test else alternate` */
export interface ConditionalNode extends ASTNodeBase {
  type: "conditional";
  test: ASTNode;
  consequent: ASTNode;
  alternate: ASTNode;
}

/** Union of all AST node types */
export type ASTNode =
  | NumberNode
  | ConstantNode
  | VariableNode
  | UnaryNode
  | BinaryNode
  | CallNode
  | CompareNode
  | LogicalNode
  | ConditionalNode;

/** Result of parsing */
export interface ASTResult {
  ast: ASTNode | null;
  error?: string;
  /** Position in the source text where the error was detected */
  errorIndex?: number;
}

export interface ParseOptions {
  /** Free variables the expression may reference (default: ["x"]) */
  variables?: readonly string[];
}

// =============================================================================
// PARSER (recursive descent)
// Grammar:
//   conditional → logical_or ("if" logical_or "else" conditional)?
//   logical_or  → logical_and ("or" logical_and)*
//   logical_and → logical_not ("and" logical_not)*
//   logical_not → "not" logical_not | comparison
//   comparison  → additive (CMP additive)*
//   additive    → term (("+" | "-") term)*
//   term        → unary (("*" | "/" | "//" | "%") unary)*
//   unary       → ("-" | "+") unary | power
//   power       → primary ("**" unary)?          // right-associative
//   primary     → NUMBER | NAME | NAME "(" args ")" | "(" conditional ")"
// =============================================================================

class SyntaxFailure extends Error {
  constructor(
    message: string,
    readonly position: number,
  ) {
    super(message);
  }
}

/**
 * Parse an expression into an AST.
 * Only whitelisted functions, `pi`, `e` and the given variables are accepted.
 *
 * @example
 * parseExpression("1 if x > 0 else -1").ast?.type; // "conditional"
 * parseExpression("y + 1").error;              // "Unknown identifier 'y'"
 */
export function parseExpression(expr: string, options: ParseOptions = {}): ASTResult {
  const { tokens, errors, errorIndex } = tokenizeMathExpression(expr);
  if (errors.length > 0) {
    return { ast: null, error: errors[0], errorIndex };
  }
  if (tokens.length === 0) {
    return { ast: null, error: "Empty expression", errorIndex: 0 };
  }

  const parser = new ExpressionParser(tokens, new Set(options.variables ?? ["x"]), expr.length);
  try {
    return { ast: parser.parse() };
  } catch (err) {
    if (err instanceof SyntaxFailure) {
      return { ast: null, error: err.message, errorIndex: err.position };
    }
    throw err;
  }
}

class ExpressionParser {
  private pos = 0;

  constructor(
    private readonly tokens: MathToken[],
    private readonly variables: ReadonlySet<string>,
    private readonly end: number,
  ) {}

  parse(): ASTNode {
    const node = this.parseConditional();
    const extra = this.peek();
    if (extra) {
      throw new SyntaxFailure(`Unexpected '${extra.value}'`, extra.position);
    }
    return node;
  }

  private peek(): MathToken | undefined {
    return this.tokens[this.pos];
  }

  private isKeyword(word: string): boolean {
    const token = this.peek();
    return token?.type === "keyword" && token.value === word;
  }

  private isOperator(...ops: string[]): boolean {
    const token = this.peek();
    return token?.type === "operator" && ops.includes(token.value);
  }

  private next(): MathToken {
    const token = this.tokens[this.pos];
    if (!token) {
      throw new SyntaxFailure("Unexpected end of expression", this.end);
    }
    this.pos++;
    return token;
  }

  private expectKeyword(word: string): void {
    if (!this.isKeyword(word)) {
      const token = this.peek();
      throw new SyntaxFailure(`Expected '${word}'`, token?.position ?? this.end);
    }
    this.pos++;
  }

  private parseConditional(): ASTNode {
    const consequent = this.parseOr();
    if (!this.isKeyword("if")) return consequent;
    this.pos++;
    const test = this.parseOr();
    this.expectKeyword("else");
    const alternate = this.parseConditional();
    return { type: "conditional", test, consequent, alternate };
  }

  private parseOr(): ASTNode {
    let left = this.parseAnd();
    while (this.isKeyword("or")) {
      this.pos++;
      left = { type: "logical", operator: "or", left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ASTNode {
    let left = this.parseNot();
    while (this.isKeyword("and")) {
      this.pos++;
      left = { type: "logical", operator: "and", left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): ASTNode {
    if (this.isKeyword("not")) {
      this.pos++;
      return { type: "unary", operator: "not", operand: this.parseNot() };
    }
    return this.parseComparison();
  }

  private parseComparison(): ASTNode {
    const first = this.parseAdditive();
    const operators: CompareOperator[] = [];
    const operands: ASTNode[] = [first];

    let token = this.peek();
    while (token?.type === "operator" && isCompareOperator(token.value)) {
      this.pos++;
      operators.push(token.value);
      operands.push(this.parseAdditive());
      token = this.peek();
    }

    if (operators.length === 0) return first;
    return { type: "compare", operators, operands };
  }

  private parseAdditive(): ASTNode {
    let left = this.parseTerm();
    while (this.isOperator("+", "-")) {
      const operator = this.next().value === "+" ? "+" : "-";
      left = { type: "binary", operator, left, right: this.parseTerm() };
    }
    return left;
  }

  private parseTerm(): ASTNode {
    let left = this.parseUnary();
    let token = this.peek();
    while (token?.type === "operator" && isTermOperator(token.value)) {
      this.pos++;
      left = { type: "binary", operator: token.value, left, right: this.parseUnary() };
      token = this.peek();
    }
    return left;
  }

  private parseUnary(): ASTNode {
    if (this.isOperator("-", "+")) {
      const operator = this.next().value === "-" ? "-" : "+";
      return { type: "unary", operator, operand: this.parseUnary() };
    }
    return this.parsePower();
  }

  private parsePower(): ASTNode {
    const base = this.parsePrimary();
    if (this.isOperator("**")) {
      this.pos++;
      // Right operand is a unary so that 2**-1 and 2**3**2 both parse
      return { type: "binary", operator: "**", left: base, right: this.parseUnary() };
    }
    return base;
  }

  private parsePrimary(): ASTNode {
    const token = this.next();

    switch (token.type) {
      case "number":
        return { type: "number", value: Number(token.value) };

      case "paren": {
        if (token.value !== "(") {
          throw new SyntaxFailure("Unexpected ')'", token.position);
        }
        const inner = this.parseConditional();
        const close = this.peek();
        if (close?.type !== "paren" || close.value !== ")") {
          throw new SyntaxFailure("Unclosed parenthesis", close?.position ?? this.end);
        }
        this.pos++;
        return inner;
      }

      case "name":
        return this.parseName(token);

      default:
        throw new SyntaxFailure(`Unexpected '${token.value}'`, token.position);
    }
  }

  private parseName(token: MathToken): ASTNode {
    const following = this.peek();
    const isCall = following?.type === "paren" && following.value === "(";

    if (isCall) {
      const name = resolveFunctionName(token.value);
      if (!name) {
        throw new SyntaxFailure(`Unknown function '${token.value}'`, token.position);
      }
      this.pos++;
      const args = this.parseArguments();
      if (args.length !== 1) {
        throw new SyntaxFailure(
          `'${token.value}' takes exactly one argument (${args.length} given)`,
          token.position,
        );
      }
      return { type: "call", name, args };
    }

    if (isMathConstant(token.value)) {
      return { type: "constant", name: token.value, value: MATH_CONSTANTS[token.value] };
    }
    if (this.variables.has(token.value)) {
      return { type: "variable", name: token.value };
    }
    if (resolveFunctionName(token.value)) {
      throw new SyntaxFailure(`Function '${token.value}' must be called`, token.position);
    }
    throw new SyntaxFailure(`Unknown identifier '${token.value}'`, token.position);
  }

  /** Parse `arg, arg, ...)` after an opening parenthesis */
  private parseArguments(): ASTNode[] {
    const args: ASTNode[] = [];
    const first = this.peek();
    if (first?.type === "paren" && first.value === ")") {
      this.pos++;
      return args;
    }

    for (;;) {
      args.push(this.parseConditional());
      const token = this.next();
      if (token.type === "comma") continue;
      if (token.type === "paren" && token.value === ")") return args;
      throw new SyntaxFailure(`Unexpected '${token.value}' in argument list`, token.position);
    }
  }
}

type TermOperator = "*" | "/" | "//" | "%";

function isTermOperator(op: string): op is TermOperator {
  return op === "*" || op === "/" || op === "//" || op === "%";
}

// =============================================================================
// INSPECTION
// =============================================================================

/**
 * Whether the tree only uses arithmetic, function calls, constants and
 * variables; conditionals, comparisons and logical operators are excluded.
 */
export function isArithmeticAST(node: ASTNode): boolean {
  switch (node.type) {
    case "number":
    case "constant":
    case "variable":
      return true;
    case "unary":
      return node.operator !== "not" && isArithmeticAST(node.operand);
    case "binary":
      return isArithmeticAST(node.left) && isArithmeticAST(node.right);
    case "call":
      return node.args.every(isArithmeticAST);
    case "compare":
    case "logical":
    case "conditional":
      return false;
  }
}

// =============================================================================
// AST FORMATTING
// =============================================================================

const ATOM_PRECEDENCE = 10;

/** Format a number compactly: integers as-is, others to 12 significant digits */
export function formatNumber(value: number): string {
  if (Number.isInteger(value)) return value.toString();
  return Number(value.toPrecision(12)).toString();
}

/**
 * Format an AST back into parseable expression text with minimal parentheses
 *
 * @example
 * formatAST(parseExpression("(x)+2*(sin(x))").ast!); // "x + 2 * sin(x)"
 * formatAST(parseExpression("(-1)**n", { variables: ["n"] }).ast!); // "(-1) ** n"
 */
export function formatAST(node: ASTNode): string {
  return fmt(node).text;
}

interface Formatted {
  text: string;
  prec: number;
}

function wrap(child: Formatted, minPrec: number): string {
  return child.prec >= minPrec ? child.text : `(${child.text})`;
}

function fmt(node: ASTNode): Formatted {
  switch (node.type) {
    case "number":
      return {
        text: formatNumber(node.value),
        prec: node.value < 0 ? UNARY_PRECEDENCE : ATOM_PRECEDENCE,
      };
    case "constant":
    case "variable":
      return { text: node.name, prec: ATOM_PRECEDENCE };
    case "call":
      return {
        text: `${node.name}(${node.args.map((arg) => fmt(arg).text).join(", ")})`,
        prec: ATOM_PRECEDENCE,
      };
    case "unary": {
      if (node.operator === "not") {
        const prec = getOperatorPrecedence("not") ?? 0;
        return { text: `not ${wrap(fmt(node.operand), prec)}`, prec };
      }
      return {
        text: `${node.operator}${wrap(fmt(node.operand), UNARY_PRECEDENCE)}`,
        prec: UNARY_PRECEDENCE,
      };
    }
    case "binary": {
      const prec = getOperatorPrecedence(node.operator) ?? 0;
      if (node.operator === "**") {
        // Base must be atomic: (-1) ** n, (x + 1) ** 2
        const text = `${wrap(fmt(node.left), ATOM_PRECEDENCE)} ** ${wrap(fmt(node.right), UNARY_PRECEDENCE)}`;
        return { text, prec };
      }
      const text = `${wrap(fmt(node.left), prec)} ${node.operator} ${wrap(fmt(node.right), prec + 1)}`;
      return { text, prec };
    }
    case "compare": {
      const prec = getOperatorPrecedence("<") ?? 0;
      let text = wrap(fmt(node.operands[0]), prec + 1);
      node.operators.forEach((op, i) => {
        text += ` ${op} ${wrap(fmt(node.operands[i + 1]), prec + 1)}`;
      });
      return { text, prec };
    }
    case "logical": {
      const prec = getOperatorPrecedence(node.operator) ?? 0;
      const text = `${wrap(fmt(node.left), prec)} ${node.operator} ${wrap(fmt(node.right), prec + 1)}`;
      return { text, prec };
    }
    case "conditional": {
      const prec = getOperatorPrecedence("if") ?? 0;
      const text = `${wrap(fmt(node.consequent), prec + 1)} if ${wrap(fmt(node.test), prec + 1)} else ${wrap(fmt(node.alternate), prec)}`;
      return { text, prec };
    }
  }
}
