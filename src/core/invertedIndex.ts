import type { DocId, Term } from "./types.js";

export interface Posting {
  /** occurrences of the term in the document's filtered token sequence */
  frequency: number;
  /** strictly increasing offsets into that sequence; length === frequency */
  positions: number[];
}

export type PostingsList = ReadonlyMap<DocId, Posting>;

/**
 * Inverted index mapping term -> (docId -> posting).
 *
 * Contract notes:
 * - each document is indexed once, so `update` sets postings and never merges
 * - `lookup` returns an empty map for unknown terms; its size is the term's
 *   document frequency
 */
export interface InvertedIndex {
  update(docId: DocId, tokens: readonly Term[]): void;
  lookup(term: Term): PostingsList;

  /** distinct terms holding at least one posting */
  termCount(): number;
  entries(): IterableIterator<[Term, PostingsList]>;

  /** Replaces the whole index (used by import). */
  load(entries: Iterable<[Term, Map<DocId, Posting>]>): void;
}
