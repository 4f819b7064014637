export type {
  ClusterMap,
  DegradeReason,
  FontContext,
  FontLoadResult,
  PositionedGlyph,
  RawGlyph,
  RunFont,
  ShapeEngine,
  ShapeOutcome,
  ShapeRequest,
  ShapingFace,
} from "./types";
export { buildClusterMap, normalizeClusterOrder, validateClusters } from "./clusters";
export type { FontCache, FontCacheOptions } from "./font-cache";
export { createFontCache, fontCacheKey } from "./font-cache";
export type { BufferDirections } from "./text-shaper-engine";
export {
  configureUnicodeBuffer,
  createTextShaperEngine,
  readGlyphClusters,
  resolveUnitsPerEm,
} from "./text-shaper-engine";
export type { ShapingAdapter, ShapingAdapterOptions } from "./adapter";
export { createShapingAdapter, degradedGlyphs } from "./adapter";
