import type { DocId, Term } from "../types.js";
import type { InvertedIndex, Posting, PostingsList } from "../invertedIndex.js";

const EMPTY: PostingsList = new Map();

/**
 * Simple in-memory inverted index.
 *
 * Data structure:
 * - term -> (docId -> {frequency, positions})
 */
export class MemoryInvertedIndex implements InvertedIndex {
  private termToDocMap = new Map<Term, Map<DocId, Posting>>();

  update(docId: DocId, tokens: readonly Term[]): void {
    const postings = new Map<Term, Posting>();

    tokens.forEach((term, position) => {
      let p = postings.get(term);
      if (!p) {
        p = { frequency: 0, positions: [] };
        postings.set(term, p);
      }
      p.frequency++;
      p.positions.push(position);
    });

    for (const [term, posting] of postings) {
      let docMap = this.termToDocMap.get(term);
      if (!docMap) {
        docMap = new Map();
        this.termToDocMap.set(term, docMap);
      }
      docMap.set(docId, posting);
    }
  }

  lookup(term: Term): PostingsList {
    return this.termToDocMap.get(term) ?? EMPTY;
  }

  termCount(): number {
    return this.termToDocMap.size;
  }

  entries(): IterableIterator<[Term, PostingsList]> {
    return this.termToDocMap.entries();
  }

  load(entries: Iterable<[Term, Map<DocId, Posting>]>): void {
    const next = new Map<Term, Map<DocId, Posting>>();
    for (const [term, docMap] of entries) {
      if (docMap.size) next.set(term, docMap);
    }
    this.termToDocMap = next;
  }
}
