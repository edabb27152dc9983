/**
 * ParameterRecommender - term count, animation speed and window from a
 * complexity analysis
 */

import type { ComplexityAnalysis, ComplexityLevel } from "./complexity.ts";

export type AnimationSpeed = "slow" | "normal" | "fast" | "very-fast";
export type WindowType = "rectangular" | "hann" | "hamming";

export interface Recommendation {
  termCount: number;
  animationSpeed: AnimationSpeed;
  windowType: WindowType;
  /** Plain-text explanation, one point per line */
  rationale: string;
}

const BASE_TERMS: Record<ComplexityLevel, number> = {
  simple: 20,
  medium: 50,
  high: 100,
  extreme: 200,
};

export const MIN_TERMS = 10;
export const MAX_TERMS = 300;

export function recommendTermCount(analysis: ComplexityAnalysis): number {
  // The degenerate sentinel (-1) adds nothing
  const jumps = Math.max(0, analysis.discontinuityCount);
  let terms = BASE_TERMS[analysis.complexityLevel] + 15 * jumps;
  if (analysis.highFrequencyRatio > 0.5) terms += 30;
  else if (analysis.highFrequencyRatio > 0.3) terms += 15;
  return Math.max(MIN_TERMS, Math.min(MAX_TERMS, terms));
}

export function recommendSpeed(termCount: number): AnimationSpeed {
  if (termCount < 20) return "slow";
  if (termCount < 50) return "normal";
  if (termCount < 100) return "fast";
  return "very-fast";
}

export function recommendWindow(analysis: ComplexityAnalysis): WindowType {
  if (analysis.degenerate) return "hamming";
  if (analysis.discontinuityCount === 0) return "rectangular";
  if (analysis.discontinuityCount <= 2) return "hann";
  return "hamming";
}

const LEVEL_NOTES: Record<ComplexityLevel, (terms: number) => string> = {
  simple: (terms) => `${terms} terms are enough for this smooth function; more will not visibly improve it.`,
  medium: (terms) => `${terms} terms balance accuracy and speed for a moderately complex function.`,
  high: (terms) => `${terms} terms are needed to capture the detail and the jumps.`,
  extreme: (terms) => `${terms} terms are the minimum for a reasonable approximation; consider simplifying the function.`,
};

const WINDOW_NOTES: Record<WindowType, string> = {
  rectangular: "Rectangular window: no jumps, so no windowing is needed.",
  hann: "Hann window: softens the overshoot at a few jumps.",
  hamming: "Hamming window: stronger overshoot suppression for many jumps.",
};

function explain(analysis: ComplexityAnalysis, termCount: number, windowType: WindowType): string {
  const lines = [
    analysis.degenerate
      ? "Complexity: extreme (most samples failed to evaluate)."
      : `Complexity: ${analysis.complexityLevel} (score ${analysis.score}).`,
    LEVEL_NOTES[analysis.complexityLevel](termCount),
    WINDOW_NOTES[windowType],
  ];
  if (analysis.discontinuityCount > 0) {
    lines.push(
      `Gibbs overshoot expected: ${analysis.discontinuityCount} discontinuity(ies) cause ringing of about 9% of the jump.`,
    );
  }
  if (analysis.highFrequencyRatio > 0.5) {
    lines.push("High-frequency content: the function changes quickly and needs many terms.");
  }
  return lines.join("\n");
}

export function recommend(analysis: ComplexityAnalysis): Recommendation {
  const termCount = recommendTermCount(analysis);
  const windowType = recommendWindow(analysis);
  return {
    termCount,
    animationSpeed: recommendSpeed(termCount),
    windowType,
    rationale: explain(analysis, termCount, windowType),
  };
}

/** One-line summary, e.g. "115 terms | very-fast | hann | high, 1 discontinuity(ies)" */
export function summarizeRecommendation(analysis: ComplexityAnalysis, rec: Recommendation): string {
  const jumps = analysis.degenerate ? "degenerate" : `${analysis.discontinuityCount} discontinuity(ies)`;
  return `${rec.termCount} terms | ${rec.animationSpeed} | ${rec.windowType} | ${analysis.complexityLevel}, ${jumps}`;
}
