import { BOUNDARY_MARKER } from "../hinting";
import type { TextRun } from "../runs";
import type { PositionedGlyph, ShapeOutcome } from "../shaping";
import {
  classifyCodePoint,
  isBreakPunctuation,
  isCombiningMark,
  isHardBreakCodePoint,
  isWhitespaceCodePoint,
} from "../unicode";
import type { ClusterUnit } from "./types";

type Draft = Omit<ClusterUnit, "index">;

function firstCodePoint(text: string): number {
  return text.codePointAt(0) ?? 0;
}

function lastCodePoint(text: string): number {
  const chars = Array.from(text);
  return chars.length ? (chars[chars.length - 1].codePointAt(0) ?? 0) : 0;
}

function isAllWhitespace(text: string): boolean {
  if (!text) return false;
  for (const ch of text) {
    if (!isWhitespaceCodePoint(ch.codePointAt(0) ?? 0)) return false;
  }
  return true;
}

/** Runs can mix spaced and unspaced scripts of one family (Hangul and Han). */
function spaceDelimitedAt(run: TextRun, codePoint: number): boolean {
  const info = classifyCodePoint(codePoint);
  return info.script === "Common" ? run.scriptInfo.spaceDelimited : info.spaceDelimited;
}

function sumAdvance(glyphs: readonly PositionedGlyph[]): number {
  let total = 0;
  for (const glyph of glyphs) total += glyph.xAdvance;
  return total;
}

function textDraft(
  run: TextRun,
  text: string,
  sourceStart: number,
  sourceEnd: number,
  glyphs: PositionedGlyph[],
  source: string,
): Draft {
  const hardBreak = isHardBreakCodePoint(firstCodePoint(text));
  return {
    runIndex: run.index,
    kind: hardBreak ? "hard-break" : "cluster",
    sourceStart,
    sourceEnd,
    text,
    glyphs: hardBreak ? [] : glyphs,
    placeholder: null,
    advance: hardBreak ? 0 : sumAdvance(glyphs),
    whitespace: !hardBreak && isAllWhitespace(text),
    punctuation: !hardBreak && isBreakPunctuation(lastCodePoint(text)),
    markerAfter: source.slice(sourceStart, sourceEnd).includes(BOUNDARY_MARKER),
    spaceDelimited: spaceDelimitedAt(run, firstCodePoint(text)),
    rtl: run.direction === "rtl",
  };
}

/** Fold `next` into `target`; both belong to the same run. */
function absorb(target: Draft, next: Draft, source: string): void {
  target.sourceEnd = next.sourceEnd;
  target.text += next.text;
  target.glyphs = target.glyphs.concat(next.glyphs);
  target.advance += next.advance;
  target.whitespace = target.whitespace && next.whitespace;
  target.punctuation = next.punctuation;
  target.markerAfter = source.slice(target.sourceStart, target.sourceEnd).includes(BOUNDARY_MARKER);
}

function clusterDrafts(outcome: Extract<ShapeOutcome, { glyphs: PositionedGlyph[] }>, source: string): Draft[] {
  const { run, glyphs, clusterMap, sourceOffsets } = outcome;
  const codePointCount = sourceOffsets.length - 1;
  if (codePointCount <= 0) return [];
  const clusters = Array.from(clusterMap.keys()).sort((a, b) => a - b);
  if (clusters.length === 0 || clusters[0] !== 0) clusters.unshift(0);

  const drafts: Draft[] = [];
  for (let i = 0; i < clusters.length; i += 1) {
    const from = clusters[i];
    const to = i + 1 < clusters.length ? clusters[i + 1] : codePointCount;
    const sourceStart = sourceOffsets[from];
    const sourceEnd = sourceOffsets[to];
    const text = source.slice(sourceStart, sourceEnd).split(BOUNDARY_MARKER).join("");
    const indices = clusterMap.get(from) ?? [];
    const unitGlyphs = indices.map((index) => glyphs[index]);
    const draft = textDraft(run, text, sourceStart, sourceEnd, unitGlyphs, source);
    const previous = drafts[drafts.length - 1];
    if (previous && previous.kind === "cluster" && isCombiningMark(firstCodePoint(text))) {
      absorb(previous, draft, source);
    } else if (previous && previous.kind === "hard-break" && previous.text.endsWith("\r") && text === "\n") {
      absorb(previous, draft, source);
    } else {
      drafts.push(draft);
    }
  }
  return drafts;
}

/**
 * Turn shaped runs into the unit sequence the compositor breaks.
 * `outcomes[i]` must be the outcome for `runs[i]`.
 */
export function buildClusterUnits(
  runs: readonly TextRun[],
  outcomes: readonly ShapeOutcome[],
  text: string,
): ClusterUnit[] {
  if (runs.length !== outcomes.length) {
    throw new Error(`expected ${runs.length} shape outcomes, got ${outcomes.length}`);
  }
  const drafts: Draft[] = [];
  for (let i = 0; i < runs.length; i += 1) {
    const run = runs[i];
    const outcome = outcomes[i];
    if (outcome.status === "placeholder") {
      drafts.push({
        runIndex: run.index,
        kind: "placeholder",
        sourceStart: run.start,
        sourceEnd: run.end,
        text: text.slice(run.start, run.end),
        glyphs: [],
        placeholder: outcome.placeholder,
        advance: outcome.advance,
        whitespace: false,
        punctuation: false,
        markerAfter: false,
        spaceDelimited: true,
        rtl: false,
      });
      continue;
    }
    const previous = drafts[drafts.length - 1];
    if (previous && outcome.sourceOffsets[0] > run.start) {
      previous.markerAfter = true;
    }
    drafts.push(...clusterDrafts(outcome, text));
  }
  return drafts.map((draft, index) => ({ index, ...draft }));
}
