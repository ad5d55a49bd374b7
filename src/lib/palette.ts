// src/lib/palette.ts
// Light, easily told apart fills for member bands.

export const PALETTE: readonly string[] = Object.freeze([
  "#ffb3ba", // light pink
  "#bae1ff", // light blue
  "#baffc9", // light green
  "#ffffba", // light yellow
  "#ffdfba", // light orange
  "#e0bbe4", // light purple
  "#d4d4aa", // light olive
  "#ffc9c9", // light coral
  "#c9e4ff", // light sky blue
  "#d4ffd4", // light mint
  "#ffffe0", // light cream
  "#ffe4e1", // misty rose
  "#f0f8ff", // alice blue
  "#f0fff0", // honeydew
  "#ffefd5", // papaya whip
  "#e6e6fa", // lavender
  "#f5deb3", // wheat
  "#ffe4b5", // moccasin
  "#dda0dd", // plum
  "#98fb98", // pale green
]);

export const FALLBACK_COLOR = "#f0f0f0";

export function colorFor(colors: ReadonlyMap<string, string>, owner: string): string {
  return colors.get(owner) ?? FALLBACK_COLOR;
}
