/** Script families distinguished by the layout core. */
export type CodePointScript = "Latin" | "Thai" | "Arabic" | "Indic" | "CJK" | "Common" | "Other";

/**
 * Classification of a single code point.
 */
export type ScriptInfo = {
  /** Script family. */
  script: CodePointScript;
  /** Needs an OpenType shaper (reordering, marks, contextual forms). */
  complex: boolean;
  /** Words are separated by spaces, so line breaks inside a word are avoided. */
  spaceDelimited: boolean;
  /** Written right to left. */
  rtl: boolean;
};

type ScriptRange = [start: number, end: number, info: ScriptInfo];

const COMMON: ScriptInfo = Object.freeze({
  script: "Common",
  complex: false,
  spaceDelimited: true,
  rtl: false,
});
const OTHER: ScriptInfo = Object.freeze({
  script: "Other",
  complex: false,
  spaceDelimited: true,
  rtl: false,
});
const LATIN: ScriptInfo = Object.freeze({
  script: "Latin",
  complex: false,
  spaceDelimited: true,
  rtl: false,
});
const THAI: ScriptInfo = Object.freeze({
  script: "Thai",
  complex: true,
  spaceDelimited: false,
  rtl: false,
});
const ARABIC: ScriptInfo = Object.freeze({
  script: "Arabic",
  complex: true,
  spaceDelimited: true,
  rtl: true,
});
const INDIC: ScriptInfo = Object.freeze({
  script: "Indic",
  complex: true,
  spaceDelimited: true,
  rtl: false,
});
const CJK: ScriptInfo = Object.freeze({
  script: "CJK",
  complex: false,
  spaceDelimited: false,
  rtl: false,
});
const HANGUL: ScriptInfo = Object.freeze({
  script: "CJK",
  complex: false,
  spaceDelimited: true,
  rtl: false,
});
const COMPLEX_UNSPACED: ScriptInfo = Object.freeze({
  script: "Other",
  complex: true,
  spaceDelimited: false,
  rtl: false,
});
const COMPLEX_SPACED: ScriptInfo = Object.freeze({
  script: "Other",
  complex: true,
  spaceDelimited: true,
  rtl: false,
});
const COMPLEX_RTL: ScriptInfo = Object.freeze({
  script: "Other",
  complex: true,
  spaceDelimited: true,
  rtl: true,
});

/** Inclusive ranges, checked in order. Anything unlisted is "Other". */
const SCRIPT_RANGES: ScriptRange[] = [
  [0x0000, 0x0040, COMMON],
  [0x0041, 0x005a, LATIN],
  [0x005b, 0x0060, COMMON],
  [0x0061, 0x007a, LATIN],
  [0x007b, 0x00bf, COMMON],
  [0x00d7, 0x00d7, COMMON],
  [0x00f7, 0x00f7, COMMON],
  [0x00c0, 0x024f, LATIN],
  [0x0250, 0x02ff, LATIN],
  [0x0300, 0x036f, COMMON], // combining diacritics inherit their base
  [0x0590, 0x05ff, COMPLEX_RTL], // Hebrew
  [0x0600, 0x06ff, ARABIC],
  [0x0700, 0x074f, COMPLEX_RTL], // Syriac
  [0x0750, 0x077f, ARABIC],
  [0x08a0, 0x08ff, ARABIC],
  [0x0900, 0x0dff, INDIC], // Devanagari through Sinhala
  [0x0e00, 0x0e7f, THAI],
  [0x0e80, 0x0eff, COMPLEX_UNSPACED], // Lao
  [0x0f00, 0x0fff, COMPLEX_UNSPACED], // Tibetan
  [0x1000, 0x109f, COMPLEX_UNSPACED], // Myanmar
  [0x1100, 0x11ff, HANGUL],
  [0x1780, 0x17ff, COMPLEX_UNSPACED], // Khmer
  [0x1800, 0x18af, COMPLEX_SPACED], // Mongolian
  [0x19e0, 0x19ff, COMPLEX_UNSPACED], // Khmer symbols
  [0x1e00, 0x1eff, LATIN],
  [0x2000, 0x2bff, COMMON], // punctuation, symbols, arrows
  [0x2e80, 0x2fdf, CJK],
  [0x3000, 0x3000, COMMON], // ideographic space
  [0x3001, 0x312f, CJK], // CJK punctuation, kana, bopomofo
  [0x3130, 0x318f, HANGUL],
  [0x3190, 0x9fff, CJK],
  [0xa8e0, 0xa8ff, INDIC],
  [0xa9e0, 0xa9ff, COMPLEX_UNSPACED], // Myanmar extended-B
  [0xaa60, 0xaa7f, COMPLEX_UNSPACED], // Myanmar extended-A
  [0xac00, 0xd7ff, HANGUL],
  [0xf900, 0xfaff, CJK],
  [0xfb50, 0xfdff, ARABIC],
  [0xfe00, 0xfe0f, COMMON], // variation selectors
  [0xfe70, 0xfeff, ARABIC],
  [0xff00, 0xffef, CJK], // half/full-width forms
  [0x20000, 0x3134f, CJK],
];

const classificationCache = new Map<number, ScriptInfo>();

function lookupScript(codePoint: number): ScriptInfo {
  for (const [start, end, info] of SCRIPT_RANGES) {
    if (codePoint >= start && codePoint <= end) return info;
  }
  return OTHER;
}

/** Classify a code point, memoized per code point. */
export function classifyCodePoint(codePoint: number): ScriptInfo {
  const cached = classificationCache.get(codePoint);
  if (cached) return cached;
  const info = lookupScript(codePoint);
  classificationCache.set(codePoint, info);
  return info;
}

/** Script family of a code point. */
export function classify(codePoint: number): CodePointScript {
  return classifyCodePoint(codePoint).script;
}

/** True when a code point needs an OpenType shaper to render correctly. */
export function requiresComplexShaping(codePoint: number): boolean {
  return classifyCodePoint(codePoint).complex;
}

type TagRange = [start: number, end: number, tag: string];

/** ISO 15924 tags for the scripts a shaper treats differently. */
const ISO_SCRIPT_TAGS: TagRange[] = [
  [0x0041, 0x005a, "Latn"],
  [0x0061, 0x007a, "Latn"],
  [0x00c0, 0x00d6, "Latn"],
  [0x00d8, 0x00f6, "Latn"],
  [0x00f8, 0x02af, "Latn"],
  [0x0370, 0x03ff, "Grek"],
  [0x0400, 0x052f, "Cyrl"],
  [0x0530, 0x058f, "Armn"],
  [0x0590, 0x05ff, "Hebr"],
  [0x0600, 0x06ff, "Arab"],
  [0x0700, 0x074f, "Syrc"],
  [0x0750, 0x077f, "Arab"],
  [0x08a0, 0x08ff, "Arab"],
  [0x0900, 0x097f, "Deva"],
  [0x0980, 0x09ff, "Beng"],
  [0x0a00, 0x0a7f, "Guru"],
  [0x0a80, 0x0aff, "Gujr"],
  [0x0b00, 0x0b7f, "Orya"],
  [0x0b80, 0x0bff, "Taml"],
  [0x0c00, 0x0c7f, "Telu"],
  [0x0c80, 0x0cff, "Knda"],
  [0x0d00, 0x0d7f, "Mlym"],
  [0x0d80, 0x0dff, "Sinh"],
  [0x0e00, 0x0e7f, "Thai"],
  [0x0e80, 0x0eff, "Laoo"],
  [0x0f00, 0x0fff, "Tibt"],
  [0x1000, 0x109f, "Mymr"],
  [0x1100, 0x11ff, "Hang"],
  [0x1780, 0x17ff, "Khmr"],
  [0x1800, 0x18af, "Mong"],
  [0x19e0, 0x19ff, "Khmr"],
  [0x1e00, 0x1eff, "Latn"],
  [0x2e80, 0x2fdf, "Hani"],
  [0x3040, 0x309f, "Hira"],
  [0x30a0, 0x30ff, "Kana"],
  [0x3130, 0x318f, "Hang"],
  [0x3400, 0x4dbf, "Hani"],
  [0x4e00, 0x9fff, "Hani"],
  [0xac00, 0xd7af, "Hang"],
  [0xf900, 0xfaff, "Hani"],
  [0xfb1d, 0xfb4f, "Hebr"],
  [0xfb50, 0xfdff, "Arab"],
  [0xfe70, 0xfeff, "Arab"],
  [0x20000, 0x3134f, "Hani"],
];

/** ISO 15924 tag of a code point, or null for neutral and unlisted ones. */
export function isoScriptTag(codePoint: number): string | null {
  for (const [start, end, tag] of ISO_SCRIPT_TAGS) {
    if (codePoint >= start && codePoint <= end) return tag;
  }
  return null;
}

const COMBINING_MARK = /^\p{M}$/u;
const WHITESPACE = /^\s$/u;
const HARD_BREAKS = new Set([0x0a, 0x0d, 0x2028, 0x2029]);
const BREAK_PUNCTUATION = new Set(
  Array.from(",.;:!?)]}-–—/、。，．！？；：」』ฯ،؛؟।॥").map(
    (ch) => ch.codePointAt(0) ?? 0,
  ),
);

/** Nonspacing, spacing and enclosing marks (general category M). */
export function isCombiningMark(codePoint: number): boolean {
  return COMBINING_MARK.test(String.fromCodePoint(codePoint));
}

/** White space that separates words. Zero-width space is not included. */
export function isWhitespaceCodePoint(codePoint: number): boolean {
  return WHITESPACE.test(String.fromCodePoint(codePoint));
}

/** Characters that always end a line. */
export function isHardBreakCodePoint(codePoint: number): boolean {
  return HARD_BREAKS.has(codePoint);
}

/** Punctuation after which a line may break. */
export function isBreakPunctuation(codePoint: number): boolean {
  return BREAK_PUNCTUATION.has(codePoint);
}
