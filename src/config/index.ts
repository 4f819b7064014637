export type { ConfigSource, ShapingConfiguration, TokenizerEngine } from "./types";
export {
  CONFIG_KEYS,
  DEFAULT_FONT_SIZE_SCALES,
  DEFAULT_LINE_HEIGHTS,
  FALLBACK_LINE_HEIGHT,
  clampFiniteNumber,
  defaultShapingConfig,
  loadShapingConfig,
  loadShapingConfigFromEnvFile,
  parseBooleanFlag,
  parseTokenizerEngine,
  readEnvFile,
  resolveFontSizeScale,
  resolveLineHeight,
} from "./config";
