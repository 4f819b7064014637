import { expect, test } from "vitest";
import { defaultShapingConfig } from "../src/config";
import {
  BOUNDARY_MARKER,
  createBoundaryHinter,
  createLongestMatchTokenizer,
  hintTargetFor,
  stripBoundaryMarkers,
  type Tokenizer,
} from "../src/hinting";
import { createLogger, type LogLevel } from "../src/logging/logger";

const THAI_WORDS = ["ไก่", "ที่", "เป่า", "ปี่", "อยู่ใน", "ป่า"];
const THAI_SENTENCE = THAI_WORDS.join("");

function captureLogger() {
  const lines: string[] = [];
  const logger = createLogger("test", {
    level: "debug",
    write: (level: LogLevel, line: string) => {
      lines.push(`${level} ${line}`);
    },
  });
  return { logger, lines };
}

function countingTokenizer(inner: Tokenizer) {
  const calls: string[] = [];
  const tokenizer: Tokenizer = {
    engine: inner.engine,
    tokenize(text, language) {
      calls.push(text);
      return inner.tokenize(text, language);
    },
  };
  return { tokenizer, calls };
}

function thaiHinter(tokenizer: Tokenizer = createLongestMatchTokenizer(THAI_WORDS)) {
  const { logger, lines } = captureLogger();
  const hinter = createBoundaryHinter({ config: defaultShapingConfig(), tokenizer, logger });
  return { hinter, lines };
}

test("hint inserts a marker between every pair of adjacent words", () => {
  const { hinter } = thaiHinter();
  expect(hinter.hint(THAI_SENTENCE, "th")).toBe(THAI_WORDS.join(BOUNDARY_MARKER));
});

test("hinted text never starts or ends with a marker", () => {
  const { hinter } = thaiHinter();
  const hinted = hinter.hint(THAI_SENTENCE, "th-TH");
  expect(hinted.startsWith(BOUNDARY_MARKER)).toBe(false);
  expect(hinted.endsWith(BOUNDARY_MARKER)).toBe(false);
});

test("removing markers restores the input", () => {
  const { hinter } = thaiHinter();
  const input = `ABC ${THAI_SENTENCE}, ${THAI_WORDS[0]}`;
  expect(stripBoundaryMarkers(hinter.hint(input, "th"))).toBe(input);
});

test("hinting twice equals hinting once and does not re-tokenize", () => {
  const counting = countingTokenizer(createLongestMatchTokenizer(THAI_WORDS));
  const { hinter } = thaiHinter(counting.tokenizer);
  const once = hinter.hint(THAI_SENTENCE, "th");
  const twice = hinter.hint(once, "th");
  expect(twice).toBe(once);
  expect(counting.calls).toEqual([THAI_SENTENCE]);
});

test("duplicate markers collapse on re-hinting", () => {
  const { hinter } = thaiHinter();
  const doubled = `ไก่${BOUNDARY_MARKER}${BOUNDARY_MARKER}ป่า`;
  expect(hinter.hint(doubled, "th")).toBe(`ไก่${BOUNDARY_MARKER}ป่า`);
});

test("only target-script stretches are tokenized", () => {
  const counting = countingTokenizer(createLongestMatchTokenizer(THAI_WORDS));
  const { hinter } = thaiHinter(counting.tokenizer);
  expect(hinter.hint("Hi ไก่ที่ ป่า!", "th")).toBe(`Hi ไก่${BOUNDARY_MARKER}ที่ ป่า!`);
  expect(counting.calls).toEqual(["ไก่ที่", "ป่า"]);
});

test("skip spans are copied verbatim and never tokenized", () => {
  const counting = countingTokenizer(createLongestMatchTokenizer(THAI_WORDS));
  const { hinter } = thaiHinter(counting.tokenizer);
  expect(hinter.hint("ไก่ที่ป่า", "th", [{ start: 0, end: 6 }])).toBe("ไก่ที่ป่า");
  expect(hinter.hint("ไก่ที่ป่าไก่", "th", [{ start: 6, end: 9 }])).toBe(`ไก่${BOUNDARY_MARKER}ที่ป่าไก่`);
  expect(counting.calls).toEqual(["ป่า", "ไก่ที่", "ไก่"]);
});

test("languages without a hint target are returned unchanged", () => {
  const counting = countingTokenizer(createLongestMatchTokenizer(THAI_WORDS));
  const { hinter } = thaiHinter(counting.tokenizer);
  expect(hinter.hint(THAI_SENTENCE, "en")).toBe(THAI_SENTENCE);
  expect(hinter.hint("hello world", "de")).toBe("hello world");
  expect(counting.calls).toEqual([]);
});

test("disabled word wrap and missing tokenizer leave text untouched", () => {
  const { logger } = captureLogger();
  const disabled = createBoundaryHinter({
    config: { wordWrapEnabled: false },
    tokenizer: createLongestMatchTokenizer(THAI_WORDS),
    logger,
  });
  expect(disabled.hint(THAI_SENTENCE, "th")).toBe(THAI_SENTENCE);

  const withoutTokenizer = createBoundaryHinter({ config: { wordWrapEnabled: true }, tokenizer: null, logger });
  expect(withoutTokenizer.hint(THAI_SENTENCE, "th")).toBe(THAI_SENTENCE);
  expect(withoutTokenizer.hint("", "th")).toBe("");
});

test("a failing tokenizer leaves text unhinted and warns once", () => {
  const failing: Tokenizer = {
    engine: "icu",
    tokenize() {
      throw new Error("segmenter exploded");
    },
  };
  const { hinter, lines } = thaiHinter(failing);
  expect(hinter.hint(THAI_SENTENCE, "th")).toBe(THAI_SENTENCE);
  expect(hinter.hint("ป่า", "th")).toBe("ป่า");
  expect(lines).toEqual([
    'warn [test] WARN tokenizer failed; text left unhinted {"engine":"icu","error":"segmenter exploded"}',
  ]);
});

test("tokenizer output that does not rebuild the input is ignored", () => {
  const lossy: Tokenizer = {
    engine: "longest",
    tokenize: (text) => [text.slice(0, 3)],
  };
  const { hinter, lines } = thaiHinter(lossy);
  expect(hinter.hint(THAI_SENTENCE, "th")).toBe(THAI_SENTENCE);
  expect(lines).toHaveLength(1);
  expect(lines[0]).toContain("does not reconstruct its input");
});

test("hint targets resolve by primary subtag", () => {
  expect(hintTargetFor("th")?.script).toBe("Thai");
  expect(hintTargetFor("lo-LA")?.script).toBe("Lao");
  expect(hintTargetFor("km")?.matches(0x1780)).toBe(true);
  expect(hintTargetFor("my_MM")?.matches(0x1000)).toBe(true);
  expect(hintTargetFor("zh")).toBeNull();
});
