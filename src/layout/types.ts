import type { PlaceholderSpan } from "../runs";
import type { PositionedGlyph } from "../shaping";

/**
 * Smallest breakable element: one shaped cluster (with any combining marks
 * folded in), one placeholder, or one hard line break.
 */
export type ClusterUnit = {
  /** Position in the unit sequence. */
  index: number;
  runIndex: number;
  kind: "cluster" | "placeholder" | "hard-break";
  /** UTF-16 range in the hinted buffer, trailing boundary markers included. */
  sourceStart: number;
  sourceEnd: number;
  /** Characters of the unit with markers removed. */
  text: string;
  /** Glyphs in logical order; empty for placeholders and hard breaks. */
  glyphs: PositionedGlyph[];
  placeholder: PlaceholderSpan | null;
  /** Width in points. */
  advance: number;
  whitespace: boolean;
  /** Ends with a character that allows a break after it. */
  punctuation: boolean;
  /** A boundary marker follows this unit. */
  markerAfter: boolean;
  /** Script separates words with spaces. */
  spaceDelimited: boolean;
  rtl: boolean;
};

export type BreakReason =
  | "marker"
  | "space"
  | "punctuation"
  | "cluster"
  | "hard"
  | "end";

export type GlyphPlacement = {
  kind: "glyph";
  glyph: PositionedGlyph;
  runIndex: number;
  /** Absolute pen position plus the glyph's x offset. */
  x: number;
  /** Baseline plus the glyph's y offset. */
  y: number;
};

export type PlaceholderPlacement = {
  kind: "placeholder";
  placeholder: PlaceholderSpan;
  x: number;
  y: number;
};

export type LinePlacement = GlyphPlacement | PlaceholderPlacement;

export type Line = {
  index: number;
  /** Placements in visual order. */
  placements: LinePlacement[];
  /** Sum of unit advances on the line. */
  advance: number;
  sourceStart: number;
  sourceEnd: number;
  /** Line text without markers. */
  text: string;
  /** Why the line ended. */
  breakReason: BreakReason;
  /** True when `advance` exceeds the maximum width. */
  overflow: boolean;
  /** Left edge. */
  x: number;
  /** Baseline. */
  y: number;
};

export type ComposeOptions = {
  /** Minimum share of `maxWidth` a line must fill before a word boundary may end it. Default 0.3. */
  minLineUsageFraction?: number;
  /** Left edge of every line. Default 0. */
  originX?: number;
  /** Baseline of the first line. Default 0. */
  baseline?: number;
  /** Distance between consecutive baselines; lines go downward (y decreases). Default 0. */
  lineStep?: number;
};
