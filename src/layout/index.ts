export type {
  BreakReason,
  ClusterUnit,
  ComposeOptions,
  GlyphPlacement,
  Line,
  LinePlacement,
  PlaceholderPlacement,
} from "./types";
export { buildClusterUnits } from "./units";
export { WIDTH_EPSILON, composeLines } from "./compositor";
export type {
  ParagraphBox,
  ParagraphDiagnostics,
  ParagraphInput,
  ParagraphLayout,
  ParagraphLayouter,
  ParagraphLayouterOptions,
} from "./paragraph";
export { createParagraphLayouter } from "./paragraph";
