import { classifyCodePoint, type ScriptInfo } from "../unicode";
import type { BuildRunsOptions, PlaceholderSpan, RunStyle, StyleSpan, TextRun } from "./types";

/** Font selector used when the caller does not supply one. */
export function defaultFontKeyFor(info: ScriptInfo): string {
  return info.complex || info.script === "CJK" ? "complex" : "base";
}

function sortPlaceholders(text: string, placeholders: readonly PlaceholderSpan[]): PlaceholderSpan[] {
  const sorted = placeholders.slice().sort((a, b) => a.start - b.start);
  let previousEnd = 0;
  for (const span of sorted) {
    if (span.start < previousEnd || span.end <= span.start || span.end > text.length) {
      throw new Error(
        `placeholder ${span.id} [${span.start}, ${span.end}) is empty, overlaps another span, or exceeds the text`,
      );
    }
    previousEnd = span.end;
  }
  return sorted;
}

function styleLookup(styles: readonly StyleSpan[]): (offset: number) => RunStyle {
  return (offset) => {
    for (const span of styles) {
      if (offset >= span.start && offset < span.end) return span.style;
    }
    return "regular";
  };
}

type PendingRun = {
  start: number;
  info: ScriptInfo;
  style: RunStyle;
};

/**
 * Split `text` into runs covering it exactly, in order. Neutral characters
 * (spaces, digits, punctuation, boundary markers) join the surrounding run
 * and never force a boundary on their own.
 */
export function buildRuns(text: string, options: BuildRunsOptions = {}): TextRun[] {
  const fontKeyFor = options.fontKeyFor ?? defaultFontKeyFor;
  const placeholders = sortPlaceholders(text, options.placeholders ?? []);
  const styleAt = styleLookup(options.styles ?? []);
  const runs: TextRun[] = [];
  let pending: PendingRun | null = null;
  let nextPlaceholder = 0;

  const flush = (end: number) => {
    if (!pending || end <= pending.start) {
      pending = null;
      return;
    }
    const info = pending.info;
    const run: TextRun = {
      index: runs.length,
      start: pending.start,
      end,
      script: info.script,
      scriptInfo: info,
      fontKey: fontKeyFor(info),
      style: pending.style,
      direction: info.rtl ? "rtl" : "ltr",
      kind: "text",
      placeholder: null,
    };
    runs.push(Object.freeze(run));
    pending = null;
  };

  // Hangul and Han share a run: same family, font and direction.
  const sameRun = (a: ScriptInfo, b: ScriptInfo): boolean =>
    a.script === b.script && a.rtl === b.rtl && fontKeyFor(a) === fontKeyFor(b);

  let offset = 0;
  while (offset < text.length) {
    const placeholder = placeholders[nextPlaceholder];
    if (placeholder && placeholder.start === offset) {
      flush(offset);
      const run: TextRun = {
        index: runs.length,
        start: placeholder.start,
        end: placeholder.end,
        script: "Common",
        scriptInfo: classifyCodePoint(0x20),
        fontKey: "placeholder",
        style: styleAt(offset),
        direction: "ltr",
        kind: "placeholder",
        placeholder,
      };
      runs.push(Object.freeze(run));
      offset = placeholder.end;
      nextPlaceholder += 1;
      continue;
    }

    const cp = text.codePointAt(offset) ?? 0;
    const width = cp > 0xffff ? 2 : 1;
    const info = classifyCodePoint(cp);
    const style = styleAt(offset);
    const neutral = info.script === "Common";

    if (!pending) {
      pending = { start: offset, info, style };
    } else if (pending.style !== style) {
      flush(offset);
      pending = { start: offset, info, style };
    } else if (neutral) {
      // joins the current run
    } else if (pending.info.script === "Common") {
      pending.info = info;
    } else if (!sameRun(pending.info, info)) {
      flush(offset);
      pending = { start: offset, info, style };
    }
    offset += width;
  }
  flush(text.length);
  return runs;
}
