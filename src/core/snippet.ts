import type { Term } from "./types.js";

export interface SnippetOptions {
  /** words in the window */
  windowSize?: number;
  /** words kept before the first match */
  lead?: number;
  openTag?: string;
  closeTag?: string;
  ellipsis?: string;
}

/**
 * Extracts a highlighted excerpt around the first query match.
 */
export interface SnippetGenerator {
  generate(content: string, queryTerms: readonly Term[]): string;
}
