import type { Term } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";

export const DEFAULT_STOP_WORDS: ReadonlySet<string> = new Set([
  "the",
  "a",
  "an",
  "and",
  "or",
  "but",
  "in",
  "on",
  "at",
  "to",
  "for",
  "of",
  "with",
  "by",
  "is",
  "are",
  "was",
  "were",
  "be",
  "been",
  "have",
  "has",
  "had",
  "do",
  "does",
  "did",
  "will",
  "would",
  "could",
  "should",
]);

const NON_WORD = /[^a-z0-9_]+/g;
const WHITESPACE = /\s+/;

/**
 * ASCII word tokenizer:
 * - lowercases
 * - treats anything other than [a-z0-9_] as a separator
 * - drops stop words and single-character fragments
 *
 * The returned order is the token order used for positions.
 */
export class SimpleTokenizer implements Tokenizer {
  private readonly stopWords: ReadonlySet<string>;

  constructor(stopWords: ReadonlySet<string> = DEFAULT_STOP_WORDS) {
    this.stopWords = stopWords;
  }

  tokenize(text: string): Term[] {
    const out: Term[] = [];
    for (const frag of text.toLowerCase().replace(NON_WORD, " ").split(WHITESPACE)) {
      if (frag.length <= 1) continue;
      if (this.stopWords.has(frag)) continue;
      out.push(frag);
    }
    return out;
  }
}
