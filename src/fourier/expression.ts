/**
 * FunctionExpression - a user's f(x) as a symbolic tree and a numeric evaluator
 *
 * Every expression goes through the same whitelisted parser. Arithmetic
 * expressions keep their tree as the symbolic form. Conditionals are
 * numeric-only unless they spell a known idiom, in which case the idiom's
 * equivalent becomes the symbolic form while sampling still runs the
 * conditional as written.
 */

import { silentSink, type DiagnosticSink } from "../diagnostics.ts";
import { EvaluationError, ParseError } from "../errors.ts";
import { type ASTNode, isArithmeticAST, parseExpression } from "../math/ast.ts";
import { type CompiledExpression, compileAST } from "../math/evaluate.ts";
import { type ConditionalIdiom, matchConditionalIdiom, stripWhitespace } from "../math/idioms.ts";

/** How downstream code may treat the function */
export type Representation =
  | {
      kind: "symbolic";
      ast: ASTNode;
      /** Set when the tree came from the idiom table rather than the text itself */
      idiom?: ConditionalIdiom;
    }
  | {
      kind: "numeric-only";
      evaluator: CompiledExpression;
    };

export class FunctionExpression {
  private constructor(
    /** Text as supplied */
    readonly text: string,
    readonly representation: Representation,
    private readonly evaluator: CompiledExpression,
  ) {}

  /**
   * Parse expression text in the variable `x`.
   * Throws ParseError for syntax errors and names outside the whitelist.
   */
  static parse(text: string): FunctionExpression {
    const { ast, error, errorIndex } = parseExpression(text);
    if (!ast) {
      throw new ParseError(error ?? "Invalid expression", text, errorIndex);
    }

    const evaluator = compileAST(ast);
    if (isArithmeticAST(ast)) {
      return new FunctionExpression(text, { kind: "symbolic", ast }, evaluator);
    }

    const idiom = matchConditionalIdiom(text);
    const equivalent = idiom ? parseExpression(idiom.equivalent).ast : null;
    if (idiom && equivalent) {
      return new FunctionExpression(text, { kind: "symbolic", ast: equivalent, idiom }, evaluator);
    }
    return new FunctionExpression(text, { kind: "numeric-only", evaluator }, evaluator);
  }

  /** Whitespace-stripped text, the key for catalog lookups */
  get normalizedText(): string {
    return stripWhitespace(this.text);
  }

  /** Symbolic tree, or undefined for numeric-only expressions */
  get symbolic(): ASTNode | undefined {
    return this.representation.kind === "symbolic" ? this.representation.ast : undefined;
  }

  /** f(x); throws EvaluationError when the value is not a finite real */
  evaluate(x: number): number {
    const value = this.evaluator(x);
    if (!Number.isFinite(value)) {
      throw new EvaluationError(`f(${x}) = ${value} for ${this.text}`, x);
    }
    return value;
  }

  /** f(x), or null where evaluate would throw */
  tryEvaluate(x: number): number | null {
    const value = this.evaluator(x);
    return Number.isFinite(value) ? value : null;
  }

  /**
   * f at every x. Never throws: failed samples become 0 and are reported to
   * the sink.
   */
  evaluateVector(xs: ArrayLike<number>, sink: DiagnosticSink = silentSink): number[] {
    const out = new Array<number>(xs.length);
    for (let i = 0; i < xs.length; i++) {
      const x = xs[i];
      const value = this.tryEvaluate(x);
      if (value === null) {
        sink.record({
          code: "evaluation-failed",
          message: `f(${x}) is not a finite real number; sample set to 0`,
          detail: { x, expression: this.text },
        });
        out[i] = 0;
      } else {
        out[i] = value;
      }
    }
    return out;
  }
}
