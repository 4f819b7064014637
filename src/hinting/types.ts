import type { TokenizerEngine } from "../config";

/**
 * Word segmentation capability. Implementations return non-empty tokens
 * whose concatenation is exactly `text`, and may throw on failure.
 */
export type Tokenizer = {
  /** Algorithm backing this tokenizer. */
  readonly engine: TokenizerEngine;
  tokenize(text: string, language: string): string[];
};

/**
 * Script that a hinted language writes without spaces between words.
 */
export type HintTarget = {
  /** Human-readable script name for diagnostics. */
  script: string;
  /** True for code points that belong to the target script. */
  matches(codePoint: number): boolean;
};

/** UTF-16 range `[start, end)` of the input that hinting must leave alone. */
export type SkipSpan = {
  start: number;
  end: number;
};

/** Inserts boundary markers into translated text. */
export type BoundaryHinter = {
  /** Spans in `skip` (placeholders) are copied verbatim and never tokenized. */
  hint(text: string, language: string, skip?: readonly SkipSpan[]): string;
};
