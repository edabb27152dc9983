export { analyzeComplexityTool, recommendParametersTool } from "./analysis.ts";
export { computeCoefficientsTool } from "./coefficients.ts";
export { computeErrorTool, evaluateSeriesTool } from "./series.ts";
