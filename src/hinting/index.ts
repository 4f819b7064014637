export type { BoundaryHinter, HintTarget, SkipSpan, Tokenizer } from "./types";
export type { StrippedText } from "./markers";
export {
  BOUNDARY_MARKER,
  BOUNDARY_MARKER_CP,
  collapseBoundaryMarkers,
  hasBoundaryMarkers,
  stripBoundaryMarkers,
  stripWithOffsets,
} from "./markers";
export {
  createConfiguredTokenizer,
  createIntlTokenizer,
  createLongestMatchTokenizer,
  readWordList,
} from "./tokenizers";
export { HINT_TARGETS, createBoundaryHinter, hintTargetFor } from "./hinter";
