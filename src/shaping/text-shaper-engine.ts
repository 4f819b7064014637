import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import * as textShaper from "text-shaper";
import type { RawGlyph, ShapeEngine, ShapeRequest, ShapingFace } from "./types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** Units per em exposed by a loaded font, as `unitsPerEm` or `upem`. */
export function resolveUnitsPerEm(font: unknown): number {
  if (isRecord(font)) {
    for (const key of ["unitsPerEm", "upem"]) {
      const value = font[key];
      if (typeof value === "number" && Number.isFinite(value) && value > 0) return value;
    }
  }
  throw new Error("font does not report units per em");
}

/**
 * Read the cluster value of every glyph from a shaped glyph buffer. The
 * buffer keeps one info record per glyph in output order.
 */
export function readGlyphClusters(glyphBuffer: unknown, count: number): number[] {
  if (!isRecord(glyphBuffer)) {
    throw new Error("glyph buffer is not an object");
  }
  const infos = Array.isArray(glyphBuffer.infos)
    ? glyphBuffer.infos
    : Array.isArray(glyphBuffer.glyphInfos)
      ? glyphBuffer.glyphInfos
      : null;
  if (!infos || infos.length < count) {
    throw new Error("glyph buffer carries no cluster information");
  }
  const clusters: number[] = [];
  for (let i = 0; i < count; i += 1) {
    const info: unknown = infos[i];
    if (!isRecord(info) || typeof info.cluster !== "number") {
      throw new Error(`glyph ${i} has no cluster`);
    }
    clusters.push(info.cluster);
  }
  return clusters;
}

/** Values `setDirection` takes for each direction. */
export type BufferDirections = {
  ltr: unknown;
  rtl: unknown;
};

function resolveDirections(namespace: object): BufferDirections {
  const direction: unknown = Reflect.get(namespace, "Direction");
  if (isRecord(direction) && direction.LTR !== undefined && direction.RTL !== undefined) {
    return { ltr: direction.LTR, rtl: direction.RTL };
  }
  return { ltr: "ltr", rtl: "rtl" };
}

const TEXT_SHAPER_DIRECTIONS = resolveDirections(textShaper);

function callSetter(target: object, method: string, value: unknown): void {
  const setter: unknown = Reflect.get(target, method);
  if (typeof setter === "function") Reflect.apply(setter, target, [value]);
}

/**
 * Apply the run's direction and ISO 15924 script to a buffer before shaping.
 */
export function configureUnicodeBuffer(
  buffer: object,
  request: ShapeRequest,
  directions: BufferDirections = TEXT_SHAPER_DIRECTIONS,
): void {
  callSetter(buffer, "setDirection", request.direction === "rtl" ? directions.rtl : directions.ltr);
  if (request.scriptTag) callSetter(buffer, "setScript", request.scriptTag);
}

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const copy = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(copy).set(bytes);
  return copy;
}

/**
 * Shaping engine backed by text-shaper. Fonts are read from disk; the
 * engine applies the font's default OpenType features.
 */
export function createTextShaperEngine(): ShapeEngine {
  return {
    name: "text-shaper",
    async loadFace(path: string): Promise<ShapingFace> {
      const bytes = await readFile(path);
      const font = await textShaper.Font.loadAsync(toArrayBuffer(bytes));
      const unitsPerEm = resolveUnitsPerEm(font);
      return {
        label: basename(path),
        unitsPerEm,
        shape(request: ShapeRequest): RawGlyph[] {
          const buffer = new textShaper.UnicodeBuffer();
          buffer.addStr(request.text);
          configureUnicodeBuffer(buffer, request);
          const glyphBuffer = textShaper.shape(font, buffer);
          const shaped = textShaper.glyphBufferToShapedGlyphs(glyphBuffer);
          const clusters = readGlyphClusters(glyphBuffer, shaped.length);
          return shaped.map((glyph, i) => ({
            glyphId: glyph.glyphId,
            cluster: clusters[i],
            xAdvance: glyph.xAdvance,
            yAdvance: glyph.yAdvance,
            xOffset: glyph.xOffset,
            yOffset: glyph.yOffset,
          }));
        },
      };
    },
  };
}
