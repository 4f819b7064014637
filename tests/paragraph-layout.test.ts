import { expect, test } from "vitest";
import { createLayoutCapabilities } from "../src/capabilities";
import { loadShapingConfig, type ShapingConfiguration } from "../src/config";
import { BOUNDARY_MARKER, createLongestMatchTokenizer } from "../src/hinting";
import { createParagraphLayouter } from "../src/layout";
import type { ShapeEngine } from "../src/shaping";
import { captureLogger, createFakeEngine, createFakeFace } from "./helpers/fake-engine";

const THAI_WORDS = ["ไก่", "ที่", "เป่า", "ปี่", "อยู่ใน", "ป่า"];

function layouterFor(overrides: Partial<ShapingConfiguration> = {}, engine: ShapeEngine | null = null, fonts?: Record<string, string>) {
  const capabilities = createLayoutCapabilities({
    config: loadShapingConfig({}, { fontSizeScales: {}, ...overrides }),
    logger: captureLogger("error").logger,
    tokenizer: createLongestMatchTokenizer(THAI_WORDS),
    engine,
  });
  return createParagraphLayouter(capabilities, { fonts });
}

test("Thai paragraph without a font breaks on the hinted word boundary", async () => {
  const layout = await layouterFor().layout({
    text: THAI_WORDS.join(""),
    language: "th",
    box: { x0: 50, x1: 130, y: 700 },
    fontSize: 10,
  });
  expect(layout.text).toBe(THAI_WORDS.join(BOUNDARY_MARKER));
  expect(layout.lines.map((line) => [line.text, line.advance])).toEqual([
    ["ไก่ที่เป่าปี่", 78],
    ["อยู่ในป่า", 54],
  ]);
  expect(layout.lineHeight).toBe(1.5);
  expect(layout.lines.map((line) => [line.x, line.y])).toEqual([
    [50, 700],
    [50, 685],
  ]);
  expect(layout.lines[0].placements[0]?.x).toBe(50);
  expect(layout.diagnostics).toEqual({ runs: 1, degradedRuns: [{ runIndex: 0, reason: "no-font-path" }] });
});

test("the language font-size scale applies", async () => {
  const layouter = layouterFor({ fontSizeScales: { th: 0.5 } });
  const layout = await layouter.layout({
    text: "ไก่",
    language: "th",
    box: { x0: 0, x1: 100, y: 0 },
    fontSize: 20,
  });
  expect(layout.fontSize).toBe(10);
  expect(layout.lines[0].advance).toBe(18);
});

test("line height shrinks to fit the box height but not below 1", async () => {
  const input = {
    text: THAI_WORDS.join(""),
    language: "th",
    fontSize: 10,
  };
  const fitted = await layouterFor().layout({ ...input, box: { x0: 0, x1: 80, y: 700, height: 25 } });
  expect(fitted.lineHeight).toBe(1.25);
  expect(fitted.lines.map((line) => line.y)).toEqual([700, 687.5]);

  const cramped = await layouterFor().layout({ ...input, box: { x0: 0, x1: 80, y: 700, height: 5 } });
  expect(cramped.lineHeight).toBe(1);
});

test("fonts are chosen per font key and shaped runs are not degraded", async () => {
  const { engine, loads } = createFakeEngine(async () => createFakeFace({ unitsPerEm: 1000, advance: 1000 }));
  const layouter = layouterFor({}, engine, { complex: "/fonts/thai.ttf" });
  const layout = await layouter.layout({
    text: "ok ไก่",
    language: "th",
    box: { x0: 0, x1: 200, y: 0 },
    fontSize: 10,
  });
  expect(loads).toEqual(["/fonts/thai.ttf"]);
  expect(layout.diagnostics).toEqual({ runs: 2, degradedRuns: [{ runIndex: 0, reason: "no-font-path" }] });
  expect(layout.lines[0].advance).toBe(48);
});

test("disabled shaping never loads fonts", async () => {
  const { engine, loads } = createFakeEngine(async () => createFakeFace());
  const layouter = layouterFor({ shapingEnabled: false, fontPath: "/fonts/base.ttf" }, engine);
  const layout = await layouter.layout({
    text: "abc",
    language: "en",
    box: { x0: 0, x1: 100, y: 0 },
    fontSize: 10,
  });
  expect(loads).toEqual([]);
  expect(layout.diagnostics.degradedRuns).toEqual([{ runIndex: 0, reason: "shaping-disabled" }]);
  expect(layout.lineHeight).toBe(1.2);
});

test("placeholders survive hinting and keep their width", async () => {
  const text = "ไก่ที่{v0}ป่า";
  const layout = await layouterFor().layout({
    text,
    language: "th",
    box: { x0: 0, x1: 500, y: 0 },
    fontSize: 10,
    placeholders: [{ id: "v0", start: 6, end: 10, width: 40 }],
  });
  expect(layout.text).toBe(`ไก่${BOUNDARY_MARKER}ที่{v0}ป่า`);
  expect(layout.lines).toHaveLength(1);
  expect(layout.lines[0].advance).toBe(36 + 40 + 18);
  const placeholder = layout.lines[0].placements.find((p) => p.kind === "placeholder");
  expect(placeholder).toEqual({
    kind: "placeholder",
    placeholder: { id: "v0", start: 7, end: 11, width: 40 },
    x: 36,
    y: 0,
  });
});

test("text inside a placeholder span is not hinted", async () => {
  const layout = await layouterFor().layout({
    text: "ไก่ที่ป่า",
    language: "th",
    box: { x0: 0, x1: 500, y: 0 },
    fontSize: 10,
    placeholders: [{ id: "v0", start: 0, end: 6, width: 40 }],
  });
  expect(layout.text).toBe("ไก่ที่ป่า");
  expect(layout.lines[0].advance).toBe(40 + 18);
  const placeholder = layout.lines[0].placements.find((p) => p.kind === "placeholder");
  expect(placeholder).toEqual({
    kind: "placeholder",
    placeholder: { id: "v0", start: 0, end: 6, width: 40 },
    x: 0,
    y: 0,
  });
});

test("placeholders after duplicate markers map onto the collapsed text", async () => {
  const layout = await layouterFor().layout({
    text: "ไก่\u200b\u200bที่{v0}",
    language: "th",
    box: { x0: 0, x1: 500, y: 0 },
    fontSize: 10,
    placeholders: [{ id: "v0", start: 8, end: 12, width: 40 }],
  });
  expect(layout.text).toBe("ไก่\u200bที่{v0}");
  expect(layout.lines[0].advance).toBe(36 + 40);
  const placeholder = layout.lines[0].placements.find((p) => p.kind === "placeholder");
  expect(placeholder).toEqual({
    kind: "placeholder",
    placeholder: { id: "v0", start: 7, end: 11, width: 40 },
    x: 36,
    y: 0,
  });
});

test("non-positive font sizes are rejected", async () => {
  await expect(
    layouterFor().layout({ text: "a", language: "en", box: { x0: 0, x1: 10, y: 0 }, fontSize: 0 }),
  ).rejects.toThrow("font size must be positive");
});
