import type { ClusterMap, RawGlyph } from "./types";

/** Group glyph indices by cluster. */
export function buildClusterMap(glyphs: readonly RawGlyph[]): ClusterMap {
  const map: ClusterMap = new Map();
  for (let i = 0; i < glyphs.length; i += 1) {
    const cluster = glyphs[i].cluster;
    const indices = map.get(cluster);
    if (indices) {
      indices.push(i);
    } else {
      map.set(cluster, [i]);
    }
  }
  return map;
}

function isNonDecreasing(glyphs: readonly RawGlyph[]): boolean {
  for (let i = 1; i < glyphs.length; i += 1) {
    if (glyphs[i].cluster < glyphs[i - 1].cluster) return false;
  }
  return true;
}

function isNonIncreasing(glyphs: readonly RawGlyph[]): boolean {
  for (let i = 1; i < glyphs.length; i += 1) {
    if (glyphs[i].cluster > glyphs[i - 1].cluster) return false;
  }
  return true;
}

/**
 * Put right-to-left engine output (visual order, clusters descending) into
 * logical order by reversing whole cluster groups. Glyph order inside a
 * cluster is kept. Anything else is returned unchanged.
 */
export function normalizeClusterOrder(glyphs: readonly RawGlyph[]): RawGlyph[] {
  if (isNonDecreasing(glyphs) || !isNonIncreasing(glyphs)) return glyphs.slice();
  const groups: RawGlyph[][] = [];
  for (const glyph of glyphs) {
    const current = groups[groups.length - 1];
    if (current && current[0].cluster === glyph.cluster) {
      current.push(glyph);
    } else {
      groups.push([glyph]);
    }
  }
  return groups.reverse().flat();
}

/**
 * Check engine output against the run: finite metrics, integer clusters
 * inside `[0, codePointCount)`, non-decreasing.
 */
export function validateClusters(glyphs: readonly RawGlyph[], codePointCount: number): boolean {
  let previous = 0;
  for (const glyph of glyphs) {
    const { cluster } = glyph;
    if (!Number.isInteger(cluster) || cluster < 0 || cluster >= codePointCount) return false;
    if (cluster < previous) return false;
    if (
      !Number.isFinite(glyph.xAdvance) ||
      !Number.isFinite(glyph.yAdvance) ||
      !Number.isFinite(glyph.xOffset) ||
      !Number.isFinite(glyph.yOffset)
    ) {
      return false;
    }
    previous = cluster;
  }
  return true;
}
