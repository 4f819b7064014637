import { expect, test } from "vitest";
import { BOUNDARY_MARKER } from "../src/hinting";
import { extractFormulaPlaceholders, remapPlaceholders } from "../src/runs";

test("formula markers become placeholder spans", () => {
  const result = extractFormulaPlaceholders("x {v0} y { v 1 } z {v5}", [12, 8]);
  expect(result.text).toBe("x {v0} y { v 1 } z ");
  expect(result.placeholders).toEqual([
    { id: "v0", start: 2, end: 6, width: 12 },
    { id: "v1", start: 9, end: 16, width: 8 },
  ]);
  expect(result.dropped).toEqual(["{v5}"]);
});

test("markers without an index are dropped", () => {
  expect(extractFormulaPlaceholders("x {v } y", [10])).toEqual({
    text: "x  y",
    placeholders: [],
    dropped: ["{v }"],
  });
});

test("text without formula markers is unchanged", () => {
  expect(extractFormulaPlaceholders("plain", [])).toEqual({
    text: "plain",
    placeholders: [],
    dropped: [],
  });
});

test("spans follow the text when markers are inserted", () => {
  const original = "กข{v0}ค";
  const hinted = `ก${BOUNDARY_MARKER}ข{v0}ค`;
  const [span] = remapPlaceholders(original, hinted, [{ id: "v0", start: 2, end: 6, width: 5 }]);
  expect(span).toEqual({ id: "v0", start: 3, end: 7, width: 5 });
  expect(hinted.slice(span.start, span.end)).toBe("{v0}");
});

test("spans follow the text when duplicate markers collapse", () => {
  const original = `a${BOUNDARY_MARKER}${BOUNDARY_MARKER}b{x}`;
  const hinted = `a${BOUNDARY_MARKER}b{x}`;
  const [span] = remapPlaceholders(original, hinted, [{ id: "v0", start: 4, end: 7, width: 5 }]);
  expect(span).toEqual({ id: "v0", start: 3, end: 6, width: 5 });
  expect(hinted.slice(span.start, span.end)).toBe("{x}");
});

test("style spans can be remapped too", () => {
  const remapped = remapPlaceholders("กขค", `กข${BOUNDARY_MARKER}ค`, [
    { start: 2, end: 3, style: "bold" as const },
  ]);
  expect(remapped).toEqual([{ start: 3, end: 4, style: "bold" }]);
});

test("remapping rejects texts that differ by more than markers", () => {
  expect(() => remapPlaceholders("abc", "abX", [{ id: "v0", start: 0, end: 1, width: 1 }])).toThrow(
    "hinted text differs",
  );
});
