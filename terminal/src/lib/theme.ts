/**
 * Terminal color palette and glyphs.
 *
 * Every visual element in the launcher pulls from here.
 */

export const colors = {
  // Text
  text: "#c9d1d9",
  textDim: "#6e7681",
  textBright: "#f0f6fc",
  textMuted: "#484f58",

  // Accents
  brand: "#58a6ff",

  // Semantic
  red: "#f85149",
  yellow: "#d29922",

  // Borders
  borderFocus: "#58a6ff",
} as const;

export const symbols = {
  idle: "○",
  armed: "●",
  pending: "◌",
  error: "✖",
  horizontalLine: "─",
  verticalLine: "│",
} as const;
