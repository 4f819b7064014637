export type {
  BuildRunsOptions,
  PlaceholderSpan,
  RunStyle,
  StyleSpan,
  TextRun,
} from "./types";
export { buildRuns, defaultFontKeyFor } from "./run-builder";
export { extractFormulaPlaceholders, remapPlaceholders } from "./placeholders";
export type { FormulaExtraction } from "./placeholders";
