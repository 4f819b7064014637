/** Zero-width space used as the word-boundary marker. */
export const BOUNDARY_MARKER = "\u200b";

/** Code point of {@link BOUNDARY_MARKER}. */
export const BOUNDARY_MARKER_CP = 0x200b;

const MARKER_RUN = /\u200b+/g;
const MARKER = /\u200b/g;

/** True when `text` holds at least one marker. */
export function hasBoundaryMarkers(text: string): boolean {
  return text.includes(BOUNDARY_MARKER);
}

/** Remove every marker from `text`. */
export function stripBoundaryMarkers(text: string): string {
  return text.replace(MARKER, "");
}

/** Replace runs of adjacent markers with a single marker. */
export function collapseBoundaryMarkers(text: string): string {
  return text.replace(MARKER_RUN, BOUNDARY_MARKER);
}

/**
 * Text with markers removed, plus the offset in the marked text of every
 * code point that survived. `codePointOffsets[i]` is the UTF-16 offset of the
 * i-th code point; `codePointOffsets[length]` is the end of the source range.
 */
export type StrippedText = {
  text: string;
  codePointOffsets: number[];
};

/** Strip markers from `source.slice(start, end)`, keeping a map back into `source`. */
export function stripWithOffsets(source: string, start = 0, end = source.length): StrippedText {
  let text = "";
  const codePointOffsets: number[] = [];
  let offset = start;
  while (offset < end) {
    const cp = source.codePointAt(offset) ?? 0;
    const width = cp > 0xffff ? 2 : 1;
    if (cp !== BOUNDARY_MARKER_CP) {
      codePointOffsets.push(offset);
      text += source.slice(offset, offset + width);
    }
    offset += width;
  }
  codePointOffsets.push(end);
  return { text, codePointOffsets };
}
