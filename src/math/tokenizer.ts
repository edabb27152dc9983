/**
 * Math Expression Tokenizer
 * Tokenizes function expressions into structured tokens with positions
 */

import { isOperatorChar, KEYWORDS, MULTI_CHAR_OPERATORS, normalizeOperator } from "./operators.ts";

// =============================================================================
// TOKEN TYPES
// =============================================================================

/** Token types for function expressions */
export type MathTokenType = "number" | "name" | "keyword" | "operator" | "paren" | "comma" | "unknown";

/** A single token from an expression */
export interface MathToken {
  type: MathTokenType;
  value: string;
  position: number;
}

/** Result of tokenizing an expression */
export interface TokenizeResult {
  tokens: MathToken[];
  /** Any errors encountered during tokenization */
  errors: string[];
  /** Position of the first error, when there is one */
  errorIndex?: number;
}

// =============================================================================
// TOKENIZER
// =============================================================================

/**
 * Tokenize an expression into structured tokens
 *
 * @example
 * tokenizeMathExpression("1 if x > 0 else -1")
 * // [
 * //   { type: "number", value: "1", position: 0 },
 * //   { type: "keyword", value: "if", position: 2 },
 * //   { type: "name", value: "x", position: 5 },
 * //   { type: "operator", value: ">", position: 7 },
 * //   ...
 * // ]
 */
export function tokenizeMathExpression(expr: string): TokenizeResult {
  const tokens: MathToken[] = [];
  const errors: string[] = [];
  let errorIndex: number | undefined;
  let i = 0;

  while (i < expr.length) {
    const char = expr[i];
    const startPos = i;

    if (/\s/.test(char)) {
      i++;
      continue;
    }

    if (char === "(" || char === ")") {
      tokens.push({ type: "paren", value: char, position: startPos });
      i++;
      continue;
    }

    if (char === ",") {
      tokens.push({ type: "comma", value: char, position: startPos });
      i++;
      continue;
    }

    if (isOperatorChar(char)) {
      const pair = expr.slice(i, i + 2);
      const multi = MULTI_CHAR_OPERATORS.find((op) => op === pair);
      if (multi) {
        tokens.push({ type: "operator", value: multi, position: startPos });
        i += 2;
        continue;
      }
      if (char === "=" || char === "!") {
        // Assignment and bare negation are statements, not expressions
        tokens.push({ type: "unknown", value: char, position: startPos });
        errors.push(`Unexpected '${char}' at position ${startPos}`);
        errorIndex ??= startPos;
        i++;
        continue;
      }
      tokens.push({ type: "operator", value: normalizeOperator(char), position: startPos });
      i++;
      continue;
    }

    // Numbers (including decimals and scientific notation)
    if (/[\d.]/.test(char)) {
      const numStr = readNumber(expr, i);
      if (!Number.isFinite(Number(numStr))) {
        tokens.push({ type: "unknown", value: numStr, position: startPos });
        errors.push(`Malformed number '${numStr}' at position ${startPos}`);
        errorIndex ??= startPos;
      } else {
        tokens.push({ type: "number", value: numStr, position: startPos });
      }
      i += numStr.length;
      continue;
    }

    // Identifiers and keywords
    if (/[a-zA-Z_]/.test(char)) {
      let name = "";
      while (i < expr.length && /[a-zA-Z0-9_]/.test(expr[i])) {
        name += expr[i];
        i++;
      }
      tokens.push({ type: KEYWORDS.has(name) ? "keyword" : "name", value: name, position: startPos });
      continue;
    }

    tokens.push({ type: "unknown", value: char, position: startPos });
    errors.push(`Unknown character '${char}' at position ${startPos}`);
    errorIndex ??= startPos;
    i++;
  }

  return { tokens, errors, errorIndex };
}

/** Read a numeric literal starting at `start`: 12, 1.5, .5, 2e-3 @internal */
function readNumber(expr: string, start: number): string {
  let i = start;
  let numStr = "";
  while (i < expr.length) {
    const c = expr[i];
    if (/[\d.]/.test(c)) {
      numStr += c;
      i++;
    } else if (/[eE]/.test(c) && i + 1 < expr.length) {
      const next = expr[i + 1];
      const afterSign = expr[i + 2] ?? "";
      if (/\d/.test(next) || (/[+-]/.test(next) && /\d/.test(afterSign))) {
        numStr += c + next;
        i += 2;
      } else {
        break;
      }
    } else {
      break;
    }
  }
  return numStr;
}
