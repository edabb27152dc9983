/**
 * Function library - classic periodic functions with their series properties
 */

import { z } from "zod";
import rawPresets from "./presets.json";

export const DifficultySchema = z.enum(["easy", "medium", "advanced"]);
export type Difficulty = z.infer<typeof DifficultySchema>;

export const CategorySchema = z.enum(["basic-waves", "pulses", "smooth", "modulated", "special", "classic"]);
export type Category = z.infer<typeof CategorySchema>;

export const PresetSchema = z.object({
  name: z.string(),
  expression: z.string(),
  /** Constant expression text, e.g. "2*pi" */
  period: z.string(),
  description: z.string(),
  properties: z.array(z.string()),
  applications: z.string(),
  recommendedTerms: z.number().int().positive(),
  difficulty: DifficultySchema,
  category: CategorySchema,
});

export type Preset = z.infer<typeof PresetSchema> & { key: string };

const PRESETS: readonly Preset[] = Object.entries(z.record(z.string(), PresetSchema).parse(rawPresets)).map(
  ([key, preset]) => ({ key, ...preset }),
);

export function listPresets(): readonly Preset[] {
  return PRESETS;
}

export function getPreset(key: string): Preset | undefined {
  return PRESETS.find((p) => p.key === key);
}

export function presetsByDifficulty(difficulty: Difficulty): Preset[] {
  return PRESETS.filter((p) => p.difficulty === difficulty);
}

/** Keys grouped by category, in catalogue order */
export function presetsByCategory(): Record<Category, string[]> {
  const groups: Record<Category, string[]> = {
    "basic-waves": [],
    pulses: [],
    smooth: [],
    modulated: [],
    special: [],
    classic: [],
  };
  for (const preset of PRESETS) {
    groups[preset.category].push(preset.key);
  }
  return groups;
}

/** Multi-line description of a preset */
export function describePreset(preset: Preset): string {
  return [
    `${preset.name} (${preset.key})`,
    `Function: ${preset.expression}`,
    `Period: ${preset.period}`,
    "",
    preset.description,
    "",
    "Series properties:",
    ...preset.properties.map((p) => `  - ${p}`),
    "",
    `Applications: ${preset.applications}`,
    `Recommended terms: ${preset.recommendedTerms}`,
    `Difficulty: ${preset.difficulty}`,
  ].join("\n");
}
