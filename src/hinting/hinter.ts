import type { ShapingConfiguration } from "../config";
import type { Logger } from "../logging/logger";
import {
  BOUNDARY_MARKER,
  BOUNDARY_MARKER_CP,
  collapseBoundaryMarkers,
  hasBoundaryMarkers,
} from "./markers";
import type { BoundaryHinter, HintTarget, SkipSpan, Tokenizer } from "./types";

function rangeTarget(script: string, ranges: Array<[number, number]>): HintTarget {
  return {
    script,
    matches(codePoint) {
      for (const [start, end] of ranges) {
        if (codePoint >= start && codePoint <= end) return true;
      }
      return false;
    },
  };
}

/** Languages whose script needs boundary hints, keyed by primary subtag. */
export const HINT_TARGETS: Readonly<Record<string, HintTarget>> = {
  th: rangeTarget("Thai", [[0x0e00, 0x0e7f]]),
  lo: rangeTarget("Lao", [[0x0e80, 0x0eff]]),
  km: rangeTarget("Khmer", [
    [0x1780, 0x17ff],
    [0x19e0, 0x19ff],
  ]),
  my: rangeTarget("Myanmar", [
    [0x1000, 0x109f],
    [0xa9e0, 0xa9ff],
    [0xaa60, 0xaa7f],
  ]),
};

/** Hint target for a language tag such as "th" or "th-TH", if any. */
export function hintTargetFor(language: string): HintTarget | null {
  const primary = language.trim().toLowerCase().split(/[-_]/)[0] ?? "";
  return HINT_TARGETS[primary] ?? null;
}

type CreateBoundaryHinterOptions = {
  config: Pick<ShapingConfiguration, "wordWrapEnabled">;
  /** Null when no tokenizer could be constructed; hinting is then a no-op. */
  tokenizer: Tokenizer | null;
  logger: Logger;
};

export function createBoundaryHinter(options: CreateBoundaryHinterOptions): BoundaryHinter {
  const { config, tokenizer, logger } = options;

  const tokenizeRun = (run: string, language: string): string[] | null => {
    if (!tokenizer) return null;
    let tokens: string[];
    try {
      tokens = tokenizer.tokenize(run, language);
    } catch (err) {
      logger.warnOnce(`tokenize-failed:${tokenizer.engine}`, "tokenizer failed; text left unhinted", {
        engine: tokenizer.engine,
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
    if (tokens.some((token) => token.length === 0) || tokens.join("") !== run) {
      logger.warnOnce(
        `tokenize-mismatch:${tokenizer.engine}`,
        "tokenizer output does not reconstruct its input; text left unhinted",
        { engine: tokenizer.engine },
      );
      return null;
    }
    return tokens;
  };

  const hintRun = (run: string, language: string): string => {
    // Already-hinted text keeps its boundaries, so hinting stays idempotent.
    if (hasBoundaryMarkers(run)) return collapseBoundaryMarkers(run);
    const tokens = tokenizeRun(run, language);
    if (!tokens || tokens.length < 2) return run;
    return tokens.join(BOUNDARY_MARKER);
  };

  const hintSegment = (text: string, language: string, target: HintTarget): string => {
    let out = "";
    let offset = 0;
    while (offset < text.length) {
      const cp = text.codePointAt(offset) ?? 0;
      const width = cp > 0xffff ? 2 : 1;
      if (!target.matches(cp)) {
        out += text.slice(offset, offset + width);
        offset += width;
        continue;
      }
      // Maximal stretch of target characters and markers, ending on a target character.
      let cursor = offset;
      let runEnd = offset;
      while (cursor < text.length) {
        const next = text.codePointAt(cursor) ?? 0;
        const nextWidth = next > 0xffff ? 2 : 1;
        if (target.matches(next)) {
          cursor += nextWidth;
          runEnd = cursor;
        } else if (next === BOUNDARY_MARKER_CP) {
          cursor += nextWidth;
        } else {
          break;
        }
      }
      out += hintRun(text.slice(offset, runEnd), language);
      offset = runEnd;
    }
    return out;
  };

  function hint(text: string, language: string, skip: readonly SkipSpan[] = []): string {
    if (!config.wordWrapEnabled || !tokenizer || !text) return text;
    const target = hintTargetFor(language);
    if (!target) return text;
    if (skip.length === 0) return hintSegment(text, language, target);

    let out = "";
    let offset = 0;
    for (const span of skip.slice().sort((a, b) => a.start - b.start)) {
      const start = Math.max(offset, Math.min(span.start, text.length));
      const end = Math.max(start, Math.min(span.end, text.length));
      out += hintSegment(text.slice(offset, start), language, target);
      out += text.slice(start, end);
      offset = end;
    }
    return out + hintSegment(text.slice(offset), language, target);
  }

  return { hint };
}
