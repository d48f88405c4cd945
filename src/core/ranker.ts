import type { DocId, Term } from "./types.js";
import type { InvertedIndex } from "./invertedIndex.js";
import type { DocumentStore } from "./documentStore.js";

export interface RankContext {
  index: InvertedIndex;
  documents: DocumentStore;
}

export interface ScoredDocument {
  docId: DocId;
  /** unrounded relevance */
  score: number;
}

/**
 * Scores documents for a tokenized query.
 *
 * `rank` returns every candidate (union of postings of the query terms),
 * ordered by descending score with ascending docId breaking ties.
 */
export interface Ranker {
  rank(queryTerms: readonly Term[], ctx: RankContext): ScoredDocument[];
  score(docId: DocId, queryTerms: readonly Term[], ctx: RankContext): number;
}
