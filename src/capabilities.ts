import type { ShapingConfiguration } from "./config";
import { loadShapingConfig } from "./config";
import type { BoundaryHinter, Tokenizer } from "./hinting";
import { createBoundaryHinter, createConfiguredTokenizer } from "./hinting";
import type { Logger } from "./logging/logger";
import { createLogger } from "./logging/logger";
import type { FontCache, ShapeEngine, ShapingAdapter } from "./shaping";
import { createFontCache, createShapingAdapter, createTextShaperEngine } from "./shaping";

/**
 * Everything the layout pipeline needs from the outside world, built once
 * per process and passed down explicitly.
 */
export type LayoutCapabilities = {
  config: ShapingConfiguration;
  logger: Logger;
  tokenizer: Tokenizer | null;
  engine: ShapeEngine | null;
  fontCache: FontCache;
  hinter: BoundaryHinter;
  adapter: ShapingAdapter;
};

export type CreateLayoutCapabilitiesOptions = {
  /** Defaults to the process environment. */
  config?: ShapingConfiguration;
  logger?: Logger;
  /** Replace the configured tokenizer; null disables hinting. */
  tokenizer?: Tokenizer | null;
  /** Replace the text-shaper engine; null disables complex shaping. */
  engine?: ShapeEngine | null;
};

export function createLayoutCapabilities(
  options: CreateLayoutCapabilitiesOptions = {},
): LayoutCapabilities {
  const config = options.config ?? loadShapingConfig();
  const logger = options.logger ?? createLogger("reflow");
  const tokenizer =
    options.tokenizer !== undefined
      ? options.tokenizer
      : config.wordWrapEnabled
        ? createConfiguredTokenizer(config, logger.child("hinting"))
        : null;
  const engine =
    options.engine !== undefined ? options.engine : config.shapingEnabled ? createTextShaperEngine() : null;

  logger.debug("layout capabilities ready", {
    tokenizer: tokenizer?.engine ?? null,
    engine: engine?.name ?? null,
    fontPath: config.fontPath,
  });

  return {
    config,
    logger,
    tokenizer,
    engine,
    fontCache: createFontCache({ engine, logger: logger.child("fonts") }),
    hinter: createBoundaryHinter({ config, tokenizer, logger: logger.child("hinting") }),
    adapter: createShapingAdapter({ config, logger: logger.child("shaping") }),
  };
}
