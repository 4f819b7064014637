import type { ShapingConfiguration } from "../config";
import { stripWithOffsets } from "../hinting";
import type { Logger } from "../logging/logger";
import type { TextRun } from "../runs";
import { isoScriptTag } from "../unicode";
import { buildClusterMap, normalizeClusterOrder, validateClusters } from "./clusters";
import type {
  DegradeReason,
  FontContext,
  PositionedGlyph,
  RawGlyph,
  RunFont,
  ShapeOutcome,
} from "./types";

export type ShapingAdapterOptions = {
  config: ShapingConfiguration;
  logger: Logger;
};

export type ShapingAdapter = {
  /**
   * Shape `text.slice(run.start, run.end)`. Never throws for engine or font
   * problems; those produce a degraded outcome.
   */
  shape(run: TextRun, text: string, font: RunFont): ShapeOutcome;
};

function firstScriptTag(text: string): string | null {
  for (const ch of text) {
    const tag = isoScriptTag(ch.codePointAt(0) ?? 0);
    if (tag) return tag;
  }
  return null;
}

function sumAdvance(glyphs: readonly PositionedGlyph[]): number {
  let total = 0;
  for (const glyph of glyphs) total += glyph.xAdvance;
  return total;
}

function scaleGlyph(glyph: RawGlyph, scale: number): PositionedGlyph {
  return {
    glyphId: glyph.glyphId,
    cluster: glyph.cluster,
    xAdvance: glyph.xAdvance * scale,
    yAdvance: glyph.yAdvance * scale,
    xOffset: glyph.xOffset * scale,
    yOffset: glyph.yOffset * scale,
  };
}

/** One glyph per code point with a uniform advance. */
export function degradedGlyphs(text: string, fontSize: number, ratio: number): PositionedGlyph[] {
  const advance = fontSize * ratio;
  const glyphs: PositionedGlyph[] = [];
  let cluster = 0;
  for (const ch of text) {
    glyphs.push({
      glyphId: ch.codePointAt(0) ?? 0,
      cluster,
      xAdvance: advance,
      yAdvance: 0,
      xOffset: 0,
      yOffset: 0,
    });
    cluster += 1;
  }
  return glyphs;
}

export function createShapingAdapter(options: ShapingAdapterOptions): ShapingAdapter {
  const { config, logger } = options;

  const runContext = (run: TextRun) => ({
    run: run.index,
    script: run.script,
    start: run.start,
    end: run.end,
  });

  const shapeWithFont = (
    run: TextRun,
    stripped: string,
    codePointCount: number,
    context: FontContext,
  ): PositionedGlyph[] | DegradeReason => {
    if (codePointCount === 0) return [];
    let raw: RawGlyph[];
    try {
      raw = context.face.shape({
        text: stripped,
        script: run.script,
        scriptTag: firstScriptTag(stripped),
        direction: run.direction,
      });
    } catch (err) {
      logger.warn("shaping failed; run degraded", {
        ...runContext(run),
        font: context.face.label,
        error: err instanceof Error ? err.message : String(err),
      });
      return "shaping-failed";
    }
    const ordered = normalizeClusterOrder(raw);
    if (!validateClusters(ordered, codePointCount)) {
      logger.warn("engine returned malformed clusters; run degraded", {
        ...runContext(run),
        font: context.face.label,
        glyphs: raw.length,
        codePoints: codePointCount,
      });
      return "malformed-clusters";
    }
    return ordered.map((glyph) => scaleGlyph(glyph, context.scale));
  };

  return {
    shape(run: TextRun, text: string, font: RunFont): ShapeOutcome {
      if (run.kind === "placeholder" && run.placeholder) {
        return {
          status: "placeholder",
          run,
          placeholder: run.placeholder,
          advance: run.placeholder.width,
          coversEntireRun: true,
        };
      }

      const stripped = stripWithOffsets(text, run.start, run.end);
      const codePointCount = stripped.codePointOffsets.length - 1;

      const degrade = (reason: DegradeReason): ShapeOutcome => {
        const glyphs = degradedGlyphs(stripped.text, font.size, config.fallbackAdvanceRatio);
        return {
          status: "degraded",
          reason,
          run,
          glyphs,
          clusterMap: buildClusterMap(glyphs),
          sourceOffsets: stripped.codePointOffsets,
          advance: sumAdvance(glyphs),
          coversEntireRun: false,
        };
      };

      if (!config.shapingEnabled) {
        logger.trace("shaping disabled; run degraded", runContext(run));
        return degrade("shaping-disabled");
      }
      if (!font.font) {
        logger.debug("no font path for run; degraded", { ...runContext(run), fontKey: run.fontKey });
        return degrade("no-font-path");
      }
      if (!font.font.ok) {
        return degrade(font.font.reason);
      }

      const result = shapeWithFont(run, stripped.text, codePointCount, font.font.context);
      if (typeof result === "string") return degrade(result);
      return {
        status: "shaped",
        run,
        glyphs: result,
        clusterMap: buildClusterMap(result),
        sourceOffsets: stripped.codePointOffsets,
        advance: sumAdvance(result),
        coversEntireRun: true,
      };
    },
  };
}
