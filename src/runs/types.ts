import type { CodePointScript, ScriptInfo } from "../unicode";

/** Text style carried by a run; a style change always starts a new run. */
export type RunStyle = "regular" | "bold" | "italic" | "bold_italic";

/** Style applied to `[start, end)` of the paragraph buffer. */
export type StyleSpan = {
  start: number;
  end: number;
  style: RunStyle;
};

/**
 * Opaque span (formula, inline markup) that the reconstruction layer places
 * itself. It is laid out as one unit with a fixed advance and never split.
 */
export type PlaceholderSpan = {
  /** Caller identifier, e.g. "v3" for the fourth formula. */
  id: string;
  /** UTF-16 offset of the first character in the owning buffer. */
  start: number;
  /** UTF-16 offset one past the last character. */
  end: number;
  /** Horizontal advance in points. */
  width: number;
};

/**
 * Maximal span of the buffer sharing script, font and style.
 */
export type TextRun = {
  /** Position in the run sequence. */
  readonly index: number;
  /** UTF-16 offset of the run start in the owning buffer. */
  readonly start: number;
  /** UTF-16 offset one past the run end. */
  readonly end: number;
  /** Script family; "Common" only for runs with no script-bearing characters. */
  readonly script: CodePointScript;
  /** Full classification of the run's script. */
  readonly scriptInfo: ScriptInfo;
  /** Font selector resolved from the script, e.g. "base" or "complex". */
  readonly fontKey: string;
  readonly style: RunStyle;
  readonly direction: "ltr" | "rtl";
  readonly kind: "text" | "placeholder";
  /** Set for placeholder runs only. */
  readonly placeholder: PlaceholderSpan | null;
};

/** Options for {@link buildRuns}. */
export type BuildRunsOptions = {
  /** Atomic spans, in any order; they must not overlap. */
  placeholders?: readonly PlaceholderSpan[];
  /** Style spans; uncovered text is "regular". */
  styles?: readonly StyleSpan[];
  /** Map a script classification to a font selector. */
  fontKeyFor?: (info: ScriptInfo) => string;
};
