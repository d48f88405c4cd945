import type { DocId, Term } from "../types.js";
import type { RankContext, Ranker, ScoredDocument } from "../ranker.js";

/** ln(N / df); zero when the term occurs in every document. */
export function idf(docCount: number, df: number): number {
  if (docCount <= 0 || df <= 0) return 0;
  return Math.log(docCount / df);
}

/** frequency / raw document length; zero-length documents contribute nothing. */
export function tf(frequency: number, docLength: number): number {
  return docLength > 0 ? frequency / docLength : 0;
}

/**
 * Plain TF-IDF ranker:
 * - candidates are the union of postings of the distinct query terms
 * - every query term occurrence adds its contribution, so repeating a term
 *   in the query scales its weight
 * - total order: score desc, docId asc
 */
export class TfIdfRanker implements Ranker {
  rank(queryTerms: readonly Term[], ctx: RankContext): ScoredDocument[] {
    if (queryTerms.length === 0 || ctx.documents.size() === 0) return [];

    const candidates = new Set<DocId>();
    for (const t of new Set(queryTerms)) {
      for (const docId of ctx.index.lookup(t).keys()) candidates.add(docId);
    }

    const hits: ScoredDocument[] = [];
    for (const docId of candidates) {
      hits.push({ docId, score: this.score(docId, queryTerms, ctx) });
    }

    hits.sort((a, b) => b.score - a.score || a.docId - b.docId);
    return hits;
  }

  score(docId: DocId, queryTerms: readonly Term[], ctx: RankContext): number {
    const doc = ctx.documents.get(docId);
    if (!doc) return 0;

    const docCount = ctx.documents.size();
    let score = 0;
    for (const t of queryTerms) {
      const postings = ctx.index.lookup(t);
      const p = postings.get(docId);
      if (!p) continue;
      score += tf(p.frequency, doc.length) * idf(docCount, postings.size);
    }
    return score;
  }
}
