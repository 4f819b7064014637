import type { CodePointScript } from "../unicode";
import type { PlaceholderSpan, TextRun } from "../runs";

/**
 * Glyph as returned by a shaping engine, in font design units.
 */
export type RawGlyph = {
  /** Font-internal glyph identifier. */
  glyphId: number;
  /** Code-point index into the shaped text of the first character this glyph renders. */
  cluster: number;
  /** Horizontal advance after this glyph. */
  xAdvance: number;
  /** Vertical advance after this glyph. */
  yAdvance: number;
  /** Horizontal offset from the current pen position. */
  xOffset: number;
  /** Vertical offset from the current pen position. */
  yOffset: number;
};

/**
 * Glyph positioned in points. `cluster` indexes the code points of the run
 * text with boundary markers removed; several glyphs may share a cluster and
 * a cluster may have none.
 */
export type PositionedGlyph = RawGlyph;

/** Cluster index → indices of the glyphs that render it. */
export type ClusterMap = Map<number, number[]>;

/** What the engine needs to know about a run besides its text. */
export type ShapeRequest = {
  text: string;
  script: CodePointScript;
  /** ISO 15924 tag of the first script character, e.g. "Thai"; null for neutral text. */
  scriptTag: string | null;
  direction: "ltr" | "rtl";
};

/**
 * A loaded font face able to shape text.
 */
export type ShapingFace = {
  /** Human-readable font name. */
  readonly label: string;
  /** Design units per em, used to scale glyph metrics to points. */
  readonly unitsPerEm: number;
  /** Shape text into glyphs; throws when the engine fails. */
  shape(request: ShapeRequest): RawGlyph[];
};

/**
 * Shaping capability. Constructed once per process; a null engine means
 * complex shaping is unavailable.
 */
export type ShapeEngine = {
  readonly name: string;
  /** Read and parse a font file; rejects on I/O or parse errors. */
  loadFace(path: string): Promise<ShapingFace>;
};

/**
 * Face bound to a point size.
 */
export type FontContext = {
  /** Cache key: `${path}:${size}`. */
  key: string;
  path: string;
  /** Font size in points. */
  size: number;
  face: ShapingFace;
  /** Points per design unit. */
  scale: number;
};

/** Outcome of a font cache lookup. Failures are cached like successes. */
export type FontLoadResult =
  | { ok: true; context: FontContext }
  | { ok: false; reason: "engine-unavailable" | "font-load-failed"; message: string };

/**
 * Font selection handed to the adapter for one run. `font` is null when no
 * font path is configured for the run's font key.
 */
export type RunFont = {
  /** Font size in points; drives the degraded advance model too. */
  size: number;
  font: FontLoadResult | null;
};

/** Why a run did not receive complex shaping. */
export type DegradeReason =
  | "shaping-disabled"
  | "no-font-path"
  | "engine-unavailable"
  | "font-load-failed"
  | "shaping-failed"
  | "malformed-clusters";

type GlyphOutcome = {
  run: TextRun;
  /** Glyphs in logical order, clusters non-decreasing. */
  glyphs: PositionedGlyph[];
  clusterMap: ClusterMap;
  /** UTF-16 offset in the owning buffer of each code point of the stripped run text, plus the run end. */
  sourceOffsets: number[];
  /** Sum of glyph advances in points. */
  advance: number;
};

/**
 * Result of shaping one run. Consumers branch on `status` rather than on
 * exceptions.
 */
export type ShapeOutcome =
  | (GlyphOutcome & { status: "shaped"; coversEntireRun: true })
  | (GlyphOutcome & { status: "degraded"; coversEntireRun: false; reason: DegradeReason })
  | {
      status: "placeholder";
      run: TextRun;
      placeholder: PlaceholderSpan;
      advance: number;
      coversEntireRun: true;
    };
