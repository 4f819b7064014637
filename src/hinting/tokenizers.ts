import { readFileSync } from "node:fs";
import type { ShapingConfiguration } from "../config";
import type { Logger } from "../logging/logger";
import { isCombiningMark } from "../unicode";
import type { Tokenizer } from "./types";

/**
 * Tokenizer backed by `Intl.Segmenter` word segmentation, which uses the
 * ICU dictionaries for Thai, Lao, Khmer and Myanmar. Returns null when the
 * runtime has no segmenter.
 */
export function createIntlTokenizer(): Tokenizer | null {
  if (typeof Intl === "undefined" || typeof Intl.Segmenter !== "function") return null;
  const segmenters = new Map<string, Intl.Segmenter>();

  const segmenterFor = (language: string) => {
    let segmenter = segmenters.get(language);
    if (!segmenter) {
      segmenter = new Intl.Segmenter(language, { granularity: "word" });
      segmenters.set(language, segmenter);
    }
    return segmenter;
  };

  return {
    engine: "icu",
    tokenize(text, language) {
      const tokens: string[] = [];
      for (const part of segmenterFor(language).segment(text)) {
        if (part.segment) tokens.push(part.segment);
      }
      return tokens;
    },
  };
}

/** Length in UTF-16 units of the grapheme-ish unit at `offset`: one code point plus its marks. */
function unitLength(text: string, offset: number): number {
  let end = offset;
  const first = text.codePointAt(end) ?? 0;
  end += first > 0xffff ? 2 : 1;
  while (end < text.length) {
    const cp = text.codePointAt(end) ?? 0;
    if (!isCombiningMark(cp)) break;
    end += cp > 0xffff ? 2 : 1;
  }
  return end - offset;
}

/**
 * Longest-matching tokenizer over a fixed word list. At each position the
 * longest dictionary word wins; characters no word covers are gathered into
 * a single token that ends where the next dictionary word begins.
 */
export function createLongestMatchTokenizer(words: Iterable<string>): Tokenizer {
  const dictionary = new Set<string>();
  let maxWordLength = 0;
  for (const word of words) {
    if (!word) continue;
    dictionary.add(word);
    maxWordLength = Math.max(maxWordLength, word.length);
  }

  const longestWordAt = (text: string, offset: number): number => {
    const limit = Math.min(maxWordLength, text.length - offset);
    for (let length = limit; length > 0; length -= 1) {
      if (!dictionary.has(text.slice(offset, offset + length))) continue;
      // Never end a word in front of a combining mark.
      const next = text.codePointAt(offset + length);
      if (next !== undefined && isCombiningMark(next)) continue;
      return length;
    }
    return 0;
  };

  return {
    engine: "longest",
    tokenize(text) {
      const tokens: string[] = [];
      let unknown = "";
      let offset = 0;
      while (offset < text.length) {
        const wordLength = longestWordAt(text, offset);
        if (wordLength > 0) {
          if (unknown) {
            tokens.push(unknown);
            unknown = "";
          }
          tokens.push(text.slice(offset, offset + wordLength));
          offset += wordLength;
          continue;
        }
        const length = unitLength(text, offset);
        unknown += text.slice(offset, offset + length);
        offset += length;
      }
      if (unknown) tokens.push(unknown);
      return tokens;
    },
  };
}

/** Read a word list: one word per line, blank lines and `#` comments skipped. */
export function readWordList(path: string): string[] {
  return readFileSync(path, "utf8")
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

/**
 * Build the tokenizer selected by the configuration, or null when it cannot
 * run here. Absence is decided once, at construction.
 */
export function createConfiguredTokenizer(
  config: ShapingConfiguration,
  logger: Logger,
): Tokenizer | null {
  if (config.tokenizerEngine === "longest") {
    if (!config.dictionaryPath) {
      logger.warn("longest-match tokenizer selected without a dictionary; hints disabled");
      return null;
    }
    try {
      return createLongestMatchTokenizer(readWordList(config.dictionaryPath));
    } catch (err) {
      logger.warn("dictionary could not be read; hints disabled", {
        path: config.dictionaryPath,
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }
  const tokenizer = createIntlTokenizer();
  if (!tokenizer) logger.warn("Intl.Segmenter unavailable; hints disabled");
  return tokenizer;
}
