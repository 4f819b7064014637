import type { BreakReason, ClusterUnit, ComposeOptions, Line, LinePlacement } from "./types";

/** Tolerance for width comparisons, in points. */
export const WIDTH_EPSILON = 1e-3;

const DEFAULT_MIN_LINE_USAGE = 0.3;

type Candidate = {
  /** Break before this unit index. */
  at: number;
  /** Where the next line starts. */
  resume: number;
  /** Width of units `[lineStart, at)`. */
  width: number;
  reason: BreakReason;
};

type Segment = {
  start: number;
  end: number;
  resume: number;
  reason: BreakReason;
};

function later(a: Candidate | null, b: Candidate | null): Candidate | null {
  if (!a) return b;
  if (!b) return a;
  return b.at > a.at ? b : a;
}

function splitSegments(units: readonly ClusterUnit[], maxWidth: number, minUsage: number): Segment[] {
  const segments: Segment[] = [];
  const threshold = minUsage * maxWidth;
  let start = 0;

  while (start < units.length) {
    let width = 0;
    let marker: Candidate | null = null;
    let separator: Candidate | null = null;
    let fallback: Candidate | null = null;
    let segment: Segment | null = null;

    for (let i = start; i < units.length; i += 1) {
      const unit = units[i];
      if (unit.kind === "hard-break") {
        segment = { start, end: i, resume: i + 1, reason: "hard" };
        break;
      }

      if (i > start) {
        const previous = units[i - 1];
        const found: Candidate[] = [];
        if (previous.markerAfter) found.push({ at: i, resume: i, width, reason: "marker" });
        if (unit.whitespace) found.push({ at: i, resume: i + 1, width, reason: "space" });
        else if (previous.punctuation) found.push({ at: i, resume: i, width, reason: "punctuation" });
        for (const candidate of found) {
          fallback = candidate;
          if (candidate.width + WIDTH_EPSILON < threshold) continue;
          if (candidate.reason === "marker") marker = candidate;
          else separator = candidate;
        }
      }

      if (i > start && width + unit.advance > maxWidth + WIDTH_EPSILON) {
        const qualifying = later(marker, separator);
        if (qualifying) {
          segment = { start, end: qualifying.at, resume: qualifying.resume, reason: qualifying.reason };
          break;
        }
        const previous = units[i - 1];
        if (
          !unit.spaceDelimited ||
          unit.kind === "placeholder" ||
          previous.kind === "placeholder"
        ) {
          segment = { start, end: i, resume: i, reason: "cluster" };
          break;
        }
        if (fallback) {
          segment = { start, end: fallback.at, resume: fallback.resume, reason: fallback.reason };
          break;
        }
      }
      width += unit.advance;
    }

    if (!segment) {
      segment = { start, end: units.length, resume: units.length, reason: "end" };
    }
    segments.push(segment);
    start = segment.resume;
  }
  return segments;
}

/** Units in visual order: each maximal right-to-left stretch is reversed. */
function visualOrder(units: readonly ClusterUnit[]): ClusterUnit[] {
  const ordered: ClusterUnit[] = [];
  let i = 0;
  while (i < units.length) {
    if (!units[i].rtl) {
      ordered.push(units[i]);
      i += 1;
      continue;
    }
    let j = i;
    while (j < units.length && units[j].rtl) j += 1;
    for (let k = j - 1; k >= i; k -= 1) ordered.push(units[k]);
    i = j;
  }
  return ordered;
}

function place(units: readonly ClusterUnit[], originX: number, baseline: number): LinePlacement[] {
  const placements: LinePlacement[] = [];
  let pen = 0;
  for (const unit of visualOrder(units)) {
    if (unit.kind === "placeholder" && unit.placeholder) {
      placements.push({ kind: "placeholder", placeholder: unit.placeholder, x: originX + pen, y: baseline });
      pen += unit.advance;
      continue;
    }
    for (const glyph of unit.glyphs) {
      placements.push({
        kind: "glyph",
        glyph,
        runIndex: unit.runIndex,
        x: originX + pen + glyph.xOffset,
        y: baseline + glyph.yOffset,
      });
      pen += glyph.xAdvance;
    }
  }
  return placements;
}

/**
 * Break `units` into lines no wider than `maxWidth` where a break is
 * possible. Boundary markers and spaces/punctuation are preferred once a line
 * is at least `minLineUsageFraction` full; scripts without spaces and
 * placeholders may break at any cluster; otherwise a line overflows until the
 * next break opportunity.
 */
export function composeLines(
  units: readonly ClusterUnit[],
  maxWidth: number,
  options: ComposeOptions = {},
): Line[] {
  if (!Number.isFinite(maxWidth) || maxWidth <= 0) {
    throw new Error(`maxWidth must be a positive finite number, got ${maxWidth}`);
  }
  const minUsage = Math.min(1, Math.max(0, options.minLineUsageFraction ?? DEFAULT_MIN_LINE_USAGE));
  const originX = options.originX ?? 0;
  const firstBaseline = options.baseline ?? 0;
  const lineStep = options.lineStep ?? 0;

  return splitSegments(units, maxWidth, minUsage).map((segment, index) => {
    const lineUnits = units.slice(segment.start, segment.end);
    const y = firstBaseline - index * lineStep;
    let advance = 0;
    let text = "";
    for (const unit of lineUnits) {
      advance += unit.advance;
      text += unit.text;
    }
    const anchor = units[segment.start];
    const last = lineUnits[lineUnits.length - 1];
    return {
      index,
      placements: place(lineUnits, originX, y),
      advance,
      sourceStart: anchor.sourceStart,
      sourceEnd: last ? last.sourceEnd : anchor.sourceStart,
      text,
      breakReason: segment.reason,
      overflow: advance > maxWidth + WIDTH_EPSILON,
      x: originX,
      y,
    };
  });
}
