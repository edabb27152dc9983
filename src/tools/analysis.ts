import { z } from "zod";
import { analyzeComplexity, type ComplexityAnalysis } from "../analysis/complexity.ts";
import { recommend, summarizeRecommendation } from "../analysis/recommender.ts";
import { Diagnostics } from "../diagnostics.ts";
import { expressionParam, fmt, forwardDiagnostics, parseInputs, periodParam, type ToolContext } from "./shared.ts";

const parameters = z.object({
  expression: expressionParam,
  period: periodParam,
});

type AnalysisArgs = z.infer<typeof parameters>;

function analyze(args: AnalysisArgs, context?: ToolContext): ComplexityAnalysis {
  const { fn, period } = parseInputs(args.expression, args.period);
  const diagnostics = new Diagnostics();
  const analysis = analyzeComplexity(fn, period.halfPeriod, { diagnostics });
  forwardDiagnostics(diagnostics, context);
  return analysis;
}

function analysisLines(analysis: ComplexityAnalysis): string[] {
  const positions = analysis.discontinuityPositions.map((x) => fmt(x, 4)).join(", ");
  return [
    `- Complexity: ${analysis.complexityLevel} (score ${analysis.score})`,
    analysis.degenerate
      ? "- Discontinuities: unknown (most samples failed to evaluate)"
      : `- Discontinuities: ${analysis.discontinuityCount}${positions ? ` at x ≈ ${positions}` : ""}`,
    `- High-frequency ratio: ${(analysis.highFrequencyRatio * 100).toFixed(1)}%`,
    `- Smoothness: ${(analysis.smoothness * 100).toFixed(1)}%`,
  ];
}

export const analyzeComplexityTool = {
  name: "analyze_complexity",
  description: `Classify how hard f is to approximate with a Fourier series.

Looks for jumps, measures the share of high-frequency power and the
smoothness of the samples, and scores them into simple, medium, high or
extreme.`,

  parameters,

  execute: async (args: AnalysisArgs, context?: ToolContext): Promise<string> => {
    const analysis = analyze(args, context);
    return [`**Complexity analysis** of \`${args.expression}\``, ...analysisLines(analysis)].join("\n");
  },
};

export const recommendParametersTool = {
  name: "recommend_parameters",
  description: `Suggest a term count, animation speed and window for f.

Runs the complexity analysis and maps it to parameters, with the reasoning.`,

  parameters,

  execute: async (args: AnalysisArgs, context?: ToolContext): Promise<string> => {
    const analysis = analyze(args, context);
    const rec = recommend(analysis);
    return [
      `**Recommendation** for \`${args.expression}\``,
      `- Terms: ${rec.termCount}`,
      `- Animation speed: ${rec.animationSpeed}`,
      `- Window: ${rec.windowType}`,
      "",
      ...analysisLines(analysis),
      "",
      rec.rationale,
      "",
      `_${summarizeRecommendation(analysis, rec)}_`,
    ].join("\n");
  },
};
