import { z } from "zod";
import { coefficientTable, formatSeriesExpression } from "../fourier/series.ts";
import type { CoefficientSet } from "../fourier/types.ts";
import {
  cachedCoefficients,
  expressionParam,
  fmt,
  parseInputs,
  periodParam,
  termsParam,
  type ToolContext,
} from "./shared.ts";

const parameters = z.object({
  expression: expressionParam,
  period: periodParam,
  n_terms: termsParam,
  format: z.enum(["markdown", "json"]).default("markdown").describe("Output format"),
});

/**
 * Fourier coefficients a0, aₙ, bₙ of f over one period
 */
export const computeCoefficientsTool = {
  name: "compute_coefficients",
  description: `Compute the Fourier coefficients of a periodic function.

f(x) ≈ a0/2 + Σ aₙ·cos(nπx/L) + bₙ·sin(nπx/L) on [-L, L] with L = period/2.

Uses a closed-form series for textbook functions, exact integration where the
expression allows it, and numeric quadrature otherwise. Symmetry (even, odd,
half-wave) is detected and coefficients that must vanish are skipped.`,

  parameters,

  execute: async (args: z.infer<typeof parameters>, context?: ToolContext): Promise<string> => {
    const { fn, period } = parseInputs(args.expression, args.period);
    const cs = await cachedCoefficients(fn, period, args.n_terms, context);
    return args.format === "json" ? JSON.stringify(toJSON(cs), null, 2) : toMarkdown(args.expression, cs);
  },
};

function toJSON(cs: CoefficientSet) {
  return {
    a0: cs.a0,
    an: cs.an,
    bn: cs.bn,
    an_formula: cs.anFormula?.text,
    bn_formula: cs.bnFormula?.text,
    period: cs.period.period,
    n_terms: cs.nTerms,
    symmetry: cs.symmetry,
    source: cs.source,
    known_series: cs.knownSeries,
    integration: cs.integration,
  };
}

function toMarkdown(expression: string, cs: CoefficientSet): string {
  const lines = [
    `**Fourier coefficients** of \`${expression}\``,
    `- Period: ${fmt(cs.period.period)} (L = ${fmt(cs.period.halfPeriod)})`,
    `- Symmetry: ${cs.symmetry}`,
    `- Source: ${cs.knownSeries ? `known series (${cs.knownSeries})` : `${cs.integration} integration`}`,
  ];
  if (cs.anFormula && cs.bnFormula) {
    lines.push(`- aₙ = ${cs.anFormula.text}`, `- bₙ = ${cs.bnFormula.text}`);
  }
  lines.push("", `**Series:** ${formatSeriesExpression(cs)}`, "", "| n | aₙ | bₙ | magnitude |", "|---|----|----|-----------|");
  for (const row of coefficientTable(cs)) {
    lines.push(`| ${row.n} | ${fmt(row.an)} | ${fmt(row.bn)} | ${fmt(row.magnitude)} |`);
  }
  return lines.join("\n");
}
