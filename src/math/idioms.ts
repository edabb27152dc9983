/**
 * Conditional idioms with closed-form equivalents.
 *
 * A conditional expression has no symbolic form of its own; when its
 * whitespace-stripped text matches one of these, the equivalent is used for
 * closed-form integration while sampling still runs the user's conditional.
 * Equivalents may differ from the conditional at isolated points (x = 0),
 * which no integral sees.
 */

export interface ConditionalIdiom {
  /** Conditional text with all whitespace removed */
  pattern: string;
  /** Arithmetic equivalent */
  equivalent: string;
  description: string;
}

export const CONDITIONAL_IDIOMS: readonly ConditionalIdiom[] = [
  { pattern: "1ifx>0else-1", equivalent: "sign(x)", description: "square wave" },
  { pattern: "-1ifx<0else1", equivalent: "sign(x)", description: "square wave" },
  { pattern: "1ifx>=0else-1", equivalent: "sign(x)", description: "square wave" },
  { pattern: "1ifx>0else0", equivalent: "(1 + sign(x)) / 2", description: "unit step" },
  { pattern: "1ifx>=0else0", equivalent: "(1 + sign(x)) / 2", description: "unit step" },
  { pattern: "xifx>0else0", equivalent: "(x + abs(x)) / 2", description: "ramp" },
  { pattern: "xifx>=0else0", equivalent: "(x + abs(x)) / 2", description: "ramp" },
  { pattern: "xifx>=0else-x", equivalent: "abs(x)", description: "absolute value" },
  { pattern: "xifx>0else-x", equivalent: "abs(x)", description: "absolute value" },
  { pattern: "-xifx<0elsex", equivalent: "abs(x)", description: "absolute value" },
];

/** Strip every whitespace character */
export function stripWhitespace(text: string): string {
  return text.replace(/\s+/g, "");
}

/** Find the idiom a conditional expression spells, if any */
export function matchConditionalIdiom(text: string): ConditionalIdiom | undefined {
  const normalized = stripWhitespace(text);
  return CONDITIONAL_IDIOMS.find((idiom) => idiom.pattern === normalized);
}
