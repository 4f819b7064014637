/**
 * Word segmentation algorithm used by the boundary hinter.
 * - icu: dictionary-based segmentation from the runtime's Intl.Segmenter
 * - longest: longest-matching against a word list file
 */
export type TokenizerEngine = "icu" | "longest";

/**
 * Options that control shaping, hinting and line breaking.
 */
export type ShapingConfiguration = {
  /** Run complex shaping at all. When false every run uses degraded positioning. */
  shapingEnabled: boolean;
  /** Font file used for shaping. Without it shaping is skipped. */
  fontPath: string | null;
  /** Insert word-boundary markers for scripts without inter-word spaces. */
  wordWrapEnabled: boolean;
  /**
   * Fraction of the available width a line must already hold before a break
   * point is accepted, in [0, 1].
   */
  minLineUsageFraction: number;
  /** Boundary detection algorithm. */
  tokenizerEngine: TokenizerEngine;
  /** Word list (one word per line) for the longest-matching tokenizer. */
  dictionaryPath: string | null;
  /** Per-character advance in degraded mode, as a fraction of the font size. */
  fallbackAdvanceRatio: number;
  /** Line height multipliers keyed by lower-case language tag. */
  lineHeights: Record<string, number>;
  /** Font size multipliers keyed by lower-case language tag. */
  fontSizeScales: Record<string, number>;
};

/** Environment-like source of raw configuration strings. */
export type ConfigSource = Record<string, string | undefined>;
