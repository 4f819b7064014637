// paragraph-reflow - main entry point

// Configuration - defaults, environment and .env loading, per-language tables
export {
  type ConfigSource,
  type ShapingConfiguration,
  type TokenizerEngine,
  CONFIG_KEYS,
  DEFAULT_FONT_SIZE_SCALES,
  DEFAULT_LINE_HEIGHTS,
  FALLBACK_LINE_HEIGHT,
  defaultShapingConfig,
  loadShapingConfig,
  loadShapingConfigFromEnvFile,
  readEnvFile,
  resolveFontSizeScale,
  resolveLineHeight,
} from "./config";

// Logging
export {
  type LogContext,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  createLogger,
  createSilentLogger,
  parseLogLevel,
} from "./logging/logger";

// Script classification
export {
  type CodePointScript,
  type ScriptInfo,
  classify,
  classifyCodePoint,
  requiresComplexShaping,
} from "./unicode";

// Boundary hinting - markers and tokenizers
export {
  type BoundaryHinter,
  type Tokenizer,
  BOUNDARY_MARKER,
  createBoundaryHinter,
  createConfiguredTokenizer,
  createIntlTokenizer,
  createLongestMatchTokenizer,
  hintTargetFor,
  stripBoundaryMarkers,
} from "./hinting";

// Runs - segmentation and placeholders
export {
  type BuildRunsOptions,
  type FormulaExtraction,
  type PlaceholderSpan,
  type RunStyle,
  type StyleSpan,
  type TextRun,
  buildRuns,
  extractFormulaPlaceholders,
  remapPlaceholders,
} from "./runs";

// Shaping - engine, font cache, adapter
export {
  type ClusterMap,
  type DegradeReason,
  type FontCache,
  type FontContext,
  type FontLoadResult,
  type PositionedGlyph,
  type RawGlyph,
  type RunFont,
  type ShapeEngine,
  type ShapeOutcome,
  type ShapeRequest,
  type ShapingAdapter,
  type ShapingFace,
  createFontCache,
  createShapingAdapter,
  createTextShaperEngine,
} from "./shaping";

// Layout - cluster units, line composition, paragraphs
export {
  type BreakReason,
  type ClusterUnit,
  type ComposeOptions,
  type Line,
  type LinePlacement,
  type ParagraphBox,
  type ParagraphInput,
  type ParagraphLayout,
  type ParagraphLayouter,
  buildClusterUnits,
  composeLines,
  createParagraphLayouter,
} from "./layout";

// Capabilities
export {
  type CreateLayoutCapabilitiesOptions,
  type LayoutCapabilities,
  createLayoutCapabilities,
} from "./capabilities";
