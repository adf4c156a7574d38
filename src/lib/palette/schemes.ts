import { z } from "zod";

// Qualitative schemes, colors in scheme order.
export const COLOR_SCHEMES = {
  Set2: ["#66c2a5", "#fc8d62", "#8da0cb", "#e78ac3", "#a6d854", "#ffd92f", "#e5c494", "#b3b3b3"],
  tab10: [
    "#1f77b4",
    "#ff7f0e",
    "#2ca02c",
    "#d62728",
    "#9467bd",
    "#8c564b",
    "#e377c2",
    "#7f7f7f",
    "#bcbd22",
    "#17becf",
  ],
} as const satisfies Record<string, readonly string[]>;

export const ColorSchemeNameSchema = z.enum(["Set2", "tab10"]);
export type ColorSchemeName = z.infer<typeof ColorSchemeNameSchema>;

// Sequential schemes for heatmaps; resolved by the renderer.
export const SequentialSchemeSchema = z.enum(["blues", "greens", "oranges", "reds", "purples", "viridis"]);
export type SequentialScheme = z.infer<typeof SequentialSchemeSchema>;
