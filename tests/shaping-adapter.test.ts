import { expect, test } from "vitest";
import { defaultShapingConfig, type ShapingConfiguration } from "../src/config";
import { BOUNDARY_MARKER } from "../src/hinting";
import { buildRuns } from "../src/runs";
import { createShapingAdapter, type RunFont } from "../src/shaping";
import { captureLogger, createFakeFace, glyph, loadedFont } from "./helpers/fake-engine";

function adapterFor(overrides: Partial<ShapingConfiguration> = {}) {
  const { logger, lines } = captureLogger();
  const adapter = createShapingAdapter({ config: { ...defaultShapingConfig(), ...overrides }, logger });
  return { adapter, lines };
}

function shapeFirstRun(text: string, font: RunFont, overrides: Partial<ShapingConfiguration> = {}) {
  const { adapter, lines } = adapterFor(overrides);
  const [run] = buildRuns(text);
  return { outcome: adapter.shape(run, text, font), lines };
}

test("shaped glyphs are scaled from design units to points", () => {
  const face = createFakeFace({ unitsPerEm: 1000, advance: 500 });
  const { outcome } = shapeFirstRun("ไก่", { size: 10, font: loadedFont(face, 10) });
  expect(outcome.status).toBe("shaped");
  if (outcome.status !== "shaped") return;
  expect(outcome.coversEntireRun).toBe(true);
  expect(outcome.glyphs.map((g) => [g.glyphId, g.cluster, g.xAdvance])).toEqual([
    [0x0e44, 0, 5],
    [0x0e01, 1, 5],
    [0x0e48, 2, 5],
  ]);
  expect(outcome.advance).toBe(15);
  expect(Array.from(outcome.clusterMap.entries())).toEqual([
    [0, [0]],
    [1, [1]],
    [2, [2]],
  ]);
});

test("boundary markers are removed before shaping and offsets map back", () => {
  const face = createFakeFace();
  const text = `ไก่${BOUNDARY_MARKER}ป่า`;
  const { outcome } = shapeFirstRun(text, { size: 10, font: loadedFont(face, 10) });
  expect(face.requests).toEqual([{ text: "ไก่ป่า", script: "Thai", scriptTag: "Thai", direction: "ltr" }]);
  if (outcome.status === "placeholder") throw new Error("unexpected placeholder");
  expect(outcome.glyphs).toHaveLength(6);
  expect(outcome.sourceOffsets).toEqual([0, 1, 2, 4, 5, 6, 7]);
  expect(outcome.glyphs.some((g) => g.glyphId === 0x200b)).toBe(false);
});

test("several code points may share one glyph and one code point may have several glyphs", () => {
  const face = createFakeFace({
    shape: () => [glyph(10, 0), glyph(11, 2), glyph(12, 2)],
  });
  const { outcome } = shapeFirstRun("abc", { size: 10, font: loadedFont(face, 10) });
  expect(outcome.status).toBe("shaped");
  if (outcome.status !== "shaped") return;
  expect(Array.from(outcome.clusterMap.entries())).toEqual([
    [0, [0]],
    [2, [1, 2]],
  ]);
});

test("missing font path degrades to the fallback advance model", () => {
  const { outcome, lines } = shapeFirstRun("ไก่", { size: 10, font: null });
  expect(outcome.status).toBe("degraded");
  if (outcome.status !== "degraded") return;
  expect(outcome.reason).toBe("no-font-path");
  expect(outcome.coversEntireRun).toBe(false);
  expect(outcome.glyphs).toEqual([
    { glyphId: 0x0e44, cluster: 0, xAdvance: 6, yAdvance: 0, xOffset: 0, yOffset: 0 },
    { glyphId: 0x0e01, cluster: 1, xAdvance: 6, yAdvance: 0, xOffset: 0, yOffset: 0 },
    { glyphId: 0x0e48, cluster: 2, xAdvance: 6, yAdvance: 0, xOffset: 0, yOffset: 0 },
  ]);
  expect(outcome.advance).toBe(18);
  expect(lines).toEqual([
    'debug [test] DEBUG no font path for run; degraded {"run":0,"script":"Thai","start":0,"end":3,"fontKey":"complex"}',
  ]);
});

test("disabled shaping degrades even with a font", () => {
  const face = createFakeFace();
  const { outcome } = shapeFirstRun("abc", { size: 10, font: loadedFont(face, 10) }, { shapingEnabled: false });
  expect(outcome.status === "degraded" && outcome.reason).toBe("shaping-disabled");
  expect(face.requests).toEqual([]);
});

test("cached font failures degrade with their reason", () => {
  const { outcome } = shapeFirstRun("abc", {
    size: 10,
    font: { ok: false, reason: "font-load-failed", message: "ENOENT" },
  });
  expect(outcome.status === "degraded" && outcome.reason).toBe("font-load-failed");
});

test("engine errors degrade only the affected run and warn", () => {
  const face = createFakeFace({
    shape: () => {
      throw new Error("bad table");
    },
  });
  const { outcome, lines } = shapeFirstRun("abc", { size: 10, font: loadedFont(face, 10) });
  expect(outcome.status === "degraded" && outcome.reason).toBe("shaping-failed");
  expect(lines).toEqual([
    'warn [test] WARN shaping failed; run degraded {"run":0,"script":"Latin","start":0,"end":3,"font":"fake.ttf","error":"bad table"}',
  ]);
});

test("out-of-range or non-monotonic clusters are rejected", () => {
  const outOfRange = createFakeFace({ shape: () => [glyph(1, 0), glyph(2, 3)] });
  const first = shapeFirstRun("abc", { size: 10, font: loadedFont(outOfRange, 10) });
  expect(first.outcome.status === "degraded" && first.outcome.reason).toBe("malformed-clusters");
  expect(first.lines).toHaveLength(1);

  const shuffled = createFakeFace({ shape: () => [glyph(1, 0), glyph(2, 2), glyph(3, 1)] });
  const second = shapeFirstRun("abc", { size: 10, font: loadedFont(shuffled, 10) });
  expect(second.outcome.status === "degraded" && second.outcome.reason).toBe("malformed-clusters");
});

test("right-to-left output is returned in logical order", () => {
  const face = createFakeFace({
    shape: () => [glyph(30, 2), glyph(20, 1), glyph(21, 1), glyph(10, 0)],
  });
  const { outcome } = shapeFirstRun("سلم", { size: 10, font: loadedFont(face, 10) });
  expect(face.requests[0]?.direction).toBe("rtl");
  expect(face.requests[0]?.scriptTag).toBe("Arab");
  expect(outcome.status).toBe("shaped");
  if (outcome.status !== "shaped") return;
  expect(outcome.glyphs.map((g) => [g.glyphId, g.cluster])).toEqual([
    [10, 0],
    [20, 1],
    [21, 1],
    [30, 2],
  ]);
});

test("placeholder runs report their fixed width", () => {
  const { adapter } = adapterFor();
  const text = "a{v0}";
  const runs = buildRuns(text, { placeholders: [{ id: "v0", start: 1, end: 5, width: 42 }] });
  const outcome = adapter.shape(runs[1], text, { size: 10, font: null });
  expect(outcome).toEqual({
    status: "placeholder",
    run: runs[1],
    placeholder: { id: "v0", start: 1, end: 5, width: 42 },
    advance: 42,
    coversEntireRun: true,
  });
});
