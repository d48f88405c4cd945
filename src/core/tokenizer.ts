import type { Term } from "./types.js";

/**
 * Turns text into an ordered sequence of index-eligible terms.
 *
 * Contract notes:
 * - must be deterministic and free of external state
 * - the same instance is used for documents and queries, so positions
 *   and query terms line up
 */
export interface Tokenizer {
  tokenize(text: string): Term[];
}
