/**
 * Function library resources
 */

import { describePreset, getPreset, listPresets, presetsByCategory } from "../library/presets.ts";

/**
 * Static resource listing every preset
 */
export const libraryResource = {
  name: "Function Library",
  uri: "fourier://library",
  description: "Classic periodic functions with their expressions, periods and series properties",
  mimeType: "application/json",
  load: async () => {
    return {
      text: JSON.stringify({ presets: listPresets(), categories: presetsByCategory() }, null, 2),
    };
  },
};

/**
 * Resource template for a single preset
 * URI: fourier://library/{key}
 */
export const presetResource = {
  name: "Function Preset",
  uriTemplate: "fourier://library/{key}",
  description: "One preset from the function library, as plain text",
  mimeType: "text/plain",
  arguments: [
    {
      name: "key",
      description: "Preset key, e.g. square_wave",
      required: true,
    },
  ],
  load: async (args: { key?: string }) => {
    const preset = args.key ? getPreset(args.key) : undefined;
    if (!preset) {
      return { text: `Preset '${args.key ?? ""}' not found` };
    }
    return { text: describePreset(preset) };
  },
};

export const allResources = [libraryResource];

export const allResourceTemplates = [presetResource];
