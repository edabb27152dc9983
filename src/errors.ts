/**
 * Error types that cross module boundaries
 */

/** The expression cannot be parsed by the whitelisted grammar */
export class ParseError extends Error {
  override readonly name = "ParseError";

  constructor(
    message: string,
    readonly expression: string,
    /** Character offset of the problem, when known */
    readonly position?: number,
  ) {
    super(message);
  }

  /** Message with a caret under the offending character */
  describe(): string {
    if (this.position === undefined) return `${this.message}: ${this.expression}`;
    return `${this.message}\n  ${this.expression}\n  ${" ".repeat(this.position)}^`;
  }
}

/** A single-point evaluation did not produce a finite real number */
export class EvaluationError extends Error {
  override readonly name = "EvaluationError";

  constructor(
    message: string,
    readonly x: number,
  ) {
    super(message);
  }
}
