import { resolveFontSizeScale, resolveLineHeight } from "../config";
import type { PlaceholderSpan, StyleSpan } from "../runs";
import { buildRuns, remapPlaceholders } from "../runs";
import type { DegradeReason, FontLoadResult } from "../shaping";
import type { LayoutCapabilities } from "../capabilities";
import { composeLines } from "./compositor";
import type { Line } from "./types";
import { buildClusterUnits } from "./units";

const LINE_HEIGHT_STEP = 0.05;
const MIN_SHRUNK_LINE_HEIGHT = 1;

/** Target rectangle in PDF user space (y grows upward). */
export type ParagraphBox = {
  x0: number;
  x1: number;
  /** Baseline of the first line. */
  y: number;
  /** Available height; enables line-height shrinking when set. */
  height?: number;
};

export type ParagraphInput = {
  text: string;
  /** BCP 47 language tag of the translated text. */
  language: string;
  box: ParagraphBox;
  /** Requested font size in points, before the language scale. */
  fontSize: number;
  placeholders?: readonly PlaceholderSpan[];
  styles?: readonly StyleSpan[];
};

export type ParagraphDiagnostics = {
  runs: number;
  degradedRuns: { runIndex: number; reason: DegradeReason }[];
};

export type ParagraphLayout = {
  /** Text with boundary markers, as broken into lines. */
  text: string;
  lines: Line[];
  /** Effective font size after the language scale. */
  fontSize: number;
  lineHeight: number;
  diagnostics: ParagraphDiagnostics;
};

export type ParagraphLayouterOptions = {
  /** Font file per font key; keys without an entry use the configured font path. */
  fonts?: Readonly<Record<string, string>>;
};

export type ParagraphLayouter = {
  layout(input: ParagraphInput): Promise<ParagraphLayout>;
};

function shrinkLineHeight(initial: number, lineCount: number, size: number, height?: number): number {
  if (height === undefined) return initial;
  let lineHeight = initial;
  while (lineHeight > MIN_SHRUNK_LINE_HEIGHT && lineCount * size * lineHeight > height) {
    lineHeight = Math.max(MIN_SHRUNK_LINE_HEIGHT, Math.round((lineHeight - LINE_HEIGHT_STEP) * 100) / 100);
  }
  return lineHeight;
}

export function createParagraphLayouter(
  capabilities: LayoutCapabilities,
  options: ParagraphLayouterOptions = {},
): ParagraphLayouter {
  const { config, hinter, adapter, fontCache } = capabilities;
  const logger = capabilities.logger.child("layout");
  const fonts = options.fonts ?? {};

  const pathFor = (fontKey: string): string | null => fonts[fontKey] ?? config.fontPath;

  const resolveFonts = async (size: number): Promise<Map<string, FontLoadResult>> => {
    const paths = new Set<string>(Object.values(fonts));
    if (config.fontPath) paths.add(config.fontPath);
    const resolved = new Map<string, FontLoadResult>();
    if (!config.shapingEnabled) return resolved;
    await Promise.all(
      Array.from(paths).map(async (path) => {
        resolved.set(path, await fontCache.acquire(path, size));
      }),
    );
    return resolved;
  };

  return {
    async layout(input: ParagraphInput): Promise<ParagraphLayout> {
      if (!Number.isFinite(input.fontSize) || input.fontSize <= 0) {
        throw new Error(`font size must be positive, got ${input.fontSize}`);
      }
      const size = input.fontSize * resolveFontSizeScale(config, input.language);
      const resolved = await resolveFonts(size);

      const text = hinter.hint(input.text, input.language, input.placeholders);
      const runs = buildRuns(text, {
        placeholders: remapPlaceholders(input.text, text, input.placeholders ?? []),
        styles: remapPlaceholders(input.text, text, input.styles ?? []),
      });

      const degradedRuns: ParagraphDiagnostics["degradedRuns"] = [];
      const outcomes = runs.map((run) => {
        const path = pathFor(run.fontKey);
        const outcome = adapter.shape(run, text, {
          size,
          font: path ? (resolved.get(path) ?? null) : null,
        });
        if (outcome.status === "degraded") {
          degradedRuns.push({ runIndex: run.index, reason: outcome.reason });
        }
        return outcome;
      });

      const units = buildClusterUnits(runs, outcomes, text);
      const maxWidth = input.box.x1 - input.box.x0;
      const compose = (lineStep: number) =>
        composeLines(units, maxWidth, {
          minLineUsageFraction: config.minLineUsageFraction,
          originX: input.box.x0,
          baseline: input.box.y,
          lineStep,
        });

      const initialLineHeight = resolveLineHeight(config, input.language);
      const draft = compose(size * initialLineHeight);
      const lineHeight = shrinkLineHeight(initialLineHeight, draft.length, size, input.box.height);
      const lines = lineHeight === initialLineHeight ? draft : compose(size * lineHeight);

      logger.debug("paragraph laid out", {
        language: input.language,
        runs: runs.length,
        lines: lines.length,
        degraded: degradedRuns.length,
      });
      return {
        text,
        lines,
        fontSize: size,
        lineHeight,
        diagnostics: { runs: runs.length, degradedRuns },
      };
    },
  };
}
