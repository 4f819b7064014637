import { BOUNDARY_MARKER_CP } from "../hinting";
import type { PlaceholderSpan } from "./types";

const FORMULA_MARKER = /\{\s*v([\d\s]+)\}/gi;

/** Text with formula markers resolved into placeholder spans. */
export type FormulaExtraction = {
  /** Input text minus markers that had no width. */
  text: string;
  placeholders: PlaceholderSpan[];
  /** Markers removed from the text: unknown formula indices or no index at all. */
  dropped: string[];
};

/**
 * Find `{vN}` formula markers (spaces inside the braces are tolerated) and
 * turn them into placeholder spans using `widths[N]`. Markers without digits
 * or whose index has no width are removed from the text; translators
 * sometimes invent them.
 */
export function extractFormulaPlaceholders(
  text: string,
  widths: readonly number[],
): FormulaExtraction {
  const placeholders: PlaceholderSpan[] = [];
  const dropped: string[] = [];
  let out = "";
  let last = 0;
  for (const match of text.matchAll(FORMULA_MARKER)) {
    const index = match.index ?? 0;
    out += text.slice(last, index);
    last = index + match[0].length;
    const digits = (match[1] ?? "").replace(/\s+/g, "");
    const formulaIndex = digits ? Number(digits) : Number.NaN;
    const width = Number.isInteger(formulaIndex) ? widths[formulaIndex] : undefined;
    if (width === undefined || !Number.isFinite(width)) {
      dropped.push(match[0]);
      continue;
    }
    const start = out.length;
    out += match[0];
    placeholders.push({ id: `v${formulaIndex}`, start, end: out.length, width });
  }
  out += text.slice(last);
  return { text: out, placeholders, dropped };
}

/** UTF-16 offsets of every non-marker unit in `text`. */
function survivingOffsets(text: string): number[] {
  const offsets: number[] = [];
  for (let i = 0; i < text.length; i += 1) {
    if (text.charCodeAt(i) !== BOUNDARY_MARKER_CP) offsets.push(i);
  }
  return offsets;
}

/**
 * Move spans expressed against `original` onto `hinted`. The two texts must
 * be equal once boundary markers are removed from both; either side may hold
 * markers the other lacks. Works for placeholder and style spans.
 */
export function remapPlaceholders<T extends { start: number; end: number }>(
  original: string,
  hinted: string,
  spans: readonly T[],
): T[] {
  if (original === hinted || spans.length === 0) return spans.slice();
  const targets = survivingOffsets(hinted);
  // starts[i]: hinted offset of the first surviving unit at or after original[i].
  // ends[i]: hinted offset just past the last surviving unit before original[i].
  const starts = new Array<number>(original.length + 1);
  const ends = new Array<number>(original.length + 1);
  let next = 0;
  ends[0] = 0;
  for (let i = 0; i < original.length; i += 1) {
    starts[i] = next < targets.length ? targets[next] : hinted.length;
    if (original.charCodeAt(i) === BOUNDARY_MARKER_CP) {
      ends[i + 1] = ends[i];
      continue;
    }
    const target = targets[next];
    if (target === undefined || hinted.charCodeAt(target) !== original.charCodeAt(i)) {
      throw new Error("hinted text differs from the original beyond boundary markers");
    }
    ends[i + 1] = target + 1;
    next += 1;
  }
  if (next !== targets.length) {
    throw new Error("hinted text differs from the original beyond boundary markers");
  }
  starts[original.length] = hinted.length;
  return spans.map((span) => ({
    ...span,
    start: starts[span.start] ?? span.start,
    end: ends[span.end] ?? span.end,
  }));
}
