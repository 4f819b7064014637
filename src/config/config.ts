import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parse } from "dotenv";
import type { ConfigSource, ShapingConfiguration, TokenizerEngine } from "./types";

/** Environment keys read by {@link loadShapingConfig}. */
export const CONFIG_KEYS = {
  shapingEnabled: "TEXT_SHAPING_ENABLED",
  fontPath: "NOTO_FONT_PATH",
  wordWrapEnabled: "THAI_WORD_WRAP_ENABLED",
  minLineUsageFraction: "THAI_MIN_LINE_USAGE",
  tokenizerEngine: "THAI_TOKENIZER_ENGINE",
  dictionaryPath: "THAI_DICTIONARY_PATH",
  fallbackAdvanceRatio: "FALLBACK_ADVANCE_RATIO",
} as const;

const LINE_HEIGHT_PREFIX = "LANG_LINEHEIGHT_";
const FONT_SIZE_SCALE_PREFIX = "LANG_FONTSIZE_SCALE_";

/** Default line height multipliers by target language. */
export const DEFAULT_LINE_HEIGHTS: Readonly<Record<string, number>> = {
  "zh-cn": 1.4,
  "zh-tw": 1.4,
  "zh-hans": 1.4,
  "zh-hant": 1.4,
  zh: 1.4,
  ja: 1.1,
  ko: 1.2,
  en: 1.2,
  ar: 1.0,
  ru: 0.8,
  uk: 0.8,
  ta: 0.8,
  th: 1.5,
};

/** Line height used for languages missing from the map. */
export const FALLBACK_LINE_HEIGHT = 1.1;

/** Default font size multipliers by target language. */
export const DEFAULT_FONT_SIZE_SCALES: Readonly<Record<string, number>> = {
  th: 0.7,
};

const TOKENIZER_ALIASES: Record<string, TokenizerEngine> = {
  icu: "icu",
  newmm: "icu",
  longest: "longest",
  mm: "longest",
};

/** Configuration used when nothing is set. */
export function defaultShapingConfig(): ShapingConfiguration {
  return {
    shapingEnabled: true,
    fontPath: null,
    wordWrapEnabled: true,
    minLineUsageFraction: 0.3,
    tokenizerEngine: "icu",
    dictionaryPath: null,
    fallbackAdvanceRatio: 0.6,
    lineHeights: { ...DEFAULT_LINE_HEIGHTS },
    fontSizeScales: { ...DEFAULT_FONT_SIZE_SCALES },
  };
}

/** Clamp a number into [min, max], using `fallback` for non-finite input. */
export function clampFiniteNumber(
  value: number | undefined,
  fallback: number,
  min: number,
  max: number,
): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.min(max, Math.max(min, value));
}

/** Parse "true"/"false"-style flags. Unrecognized values yield `fallback`. */
export function parseBooleanFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(normalized)) return true;
  if (["false", "0", "no", "off"].includes(normalized)) return false;
  return fallback;
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function parseOptionalPath(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/** Resolve a tokenizer engine name or alias; unknown names yield null. */
export function parseTokenizerEngine(value: string | undefined): TokenizerEngine | null {
  if (!value) return null;
  return TOKENIZER_ALIASES[value.trim().toLowerCase()] ?? null;
}

/** Turn a key suffix like "ZH_CN" back into the language tag "zh-cn". */
function languageFromKeySuffix(suffix: string): string {
  return suffix.toLowerCase().replace(/_/g, "-");
}

function collectLanguageOverrides(
  source: ConfigSource,
  prefix: string,
  min: number,
  max: number,
): Record<string, number> {
  const overrides: Record<string, number> = {};
  for (const [key, raw] of Object.entries(source)) {
    if (!key.startsWith(prefix) || key.length === prefix.length) continue;
    const value = parseNumber(raw);
    if (value === undefined) continue;
    overrides[languageFromKeySuffix(key.slice(prefix.length))] = clampFiniteNumber(
      value,
      value,
      min,
      max,
    );
  }
  return overrides;
}

/**
 * Build a configuration from environment-style keys. Missing or invalid
 * values keep their defaults; `overrides` win over the source.
 */
export function loadShapingConfig(
  source: ConfigSource = process.env,
  overrides: Partial<ShapingConfiguration> = {},
): ShapingConfiguration {
  const defaults = defaultShapingConfig();
  const config: ShapingConfiguration = {
    shapingEnabled: parseBooleanFlag(source[CONFIG_KEYS.shapingEnabled], defaults.shapingEnabled),
    fontPath: parseOptionalPath(source[CONFIG_KEYS.fontPath]),
    wordWrapEnabled: parseBooleanFlag(
      source[CONFIG_KEYS.wordWrapEnabled],
      defaults.wordWrapEnabled,
    ),
    minLineUsageFraction: clampFiniteNumber(
      parseNumber(source[CONFIG_KEYS.minLineUsageFraction]),
      defaults.minLineUsageFraction,
      0,
      1,
    ),
    tokenizerEngine:
      parseTokenizerEngine(source[CONFIG_KEYS.tokenizerEngine]) ?? defaults.tokenizerEngine,
    dictionaryPath: parseOptionalPath(source[CONFIG_KEYS.dictionaryPath]),
    fallbackAdvanceRatio: clampFiniteNumber(
      parseNumber(source[CONFIG_KEYS.fallbackAdvanceRatio]),
      defaults.fallbackAdvanceRatio,
      0.05,
      4,
    ),
    lineHeights: {
      ...defaults.lineHeights,
      ...collectLanguageOverrides(source, LINE_HEIGHT_PREFIX, 0.5, 4),
    },
    fontSizeScales: {
      ...defaults.fontSizeScales,
      ...collectLanguageOverrides(source, FONT_SIZE_SCALE_PREFIX, 0.1, 4),
    },
  };
  return {
    ...config,
    ...overrides,
    minLineUsageFraction: clampFiniteNumber(
      overrides.minLineUsageFraction ?? config.minLineUsageFraction,
      defaults.minLineUsageFraction,
      0,
      1,
    ),
  };
}

/**
 * Read a `.env` file into a fresh key/value map without touching
 * `process.env`. A missing file yields an empty map.
 */
export function readEnvFile(path = ".env"): ConfigSource {
  const fullPath = resolve(path);
  if (!existsSync(fullPath)) return {};
  return parse(readFileSync(fullPath));
}

/**
 * Load configuration from a `.env` file layered under the process
 * environment (process values win).
 */
export function loadShapingConfigFromEnvFile(
  path = ".env",
  env: ConfigSource = process.env,
): ShapingConfiguration {
  return loadShapingConfig({ ...readEnvFile(path), ...env });
}

function primarySubtags(language: string): string[] {
  const normalized = language.trim().toLowerCase().replace(/_/g, "-");
  const primary = normalized.split("-")[0] ?? normalized;
  return primary === normalized ? [normalized] : [normalized, primary];
}

/** Line height multiplier for a language, trying the full tag then its primary subtag. */
export function resolveLineHeight(config: ShapingConfiguration, language: string): number {
  for (const tag of primarySubtags(language)) {
    const value = config.lineHeights[tag];
    if (value !== undefined) return value;
  }
  return FALLBACK_LINE_HEIGHT;
}

/** Font size multiplier for a language, trying the full tag then its primary subtag. */
export function resolveFontSizeScale(config: ShapingConfiguration, language: string): number {
  for (const tag of primarySubtags(language)) {
    const value = config.fontSizeScales[tag];
    if (value !== undefined) return value;
  }
  return 1;
}
