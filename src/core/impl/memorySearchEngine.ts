import type { DocId, EngineStats, ImportResult, SearchResult } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";
import type { DocumentStore } from "../documentStore.js";
import type { InvertedIndex } from "../invertedIndex.js";
import type { Ranker } from "../ranker.js";
import type { SnippetGenerator } from "../snippet.js";
import type { IndexSnapshot } from "../snapshot.js";
import { decodeSnapshot, encodeSnapshot } from "./snapshotCodec.js";

export interface SearchOptions {
  /** cap on returned results; all candidates when omitted */
  limit?: number;
}

export interface EngineDeps {
  tokenizer: Tokenizer;
  documents: DocumentStore;
  index: InvertedIndex;
  ranker: Ranker;
  snippets: SnippetGenerator;
  /** decimal places of reported scores */
  scorePrecision?: number;
}

/**
 * Append-only full-text engine.
 *
 * Synchronous and unlocked: callers serialize mutations (`addDocument`,
 * `import`) against each other and against reads.
 */
export class MemorySearchEngine {
  private readonly scale: number;

  constructor(private readonly deps: EngineDeps) {
    this.scale = 10 ** (deps.scorePrecision ?? 4);
  }

  addDocument(content: string, title?: string): DocId {
    const doc = this.deps.documents.add(content, title);
    this.deps.index.update(doc.id, this.deps.tokenizer.tokenize(content));
    return doc.id;
  }

  search(query: string, options?: SearchOptions): SearchResult[] {
    const queryTerms = this.deps.tokenizer.tokenize(query);
    if (queryTerms.length === 0) return [];

    let ranked = this.deps.ranker.rank(queryTerms, {
      index: this.deps.index,
      documents: this.deps.documents,
    });
    if (options?.limit !== undefined) ranked = ranked.slice(0, Math.max(0, options.limit));

    const results: SearchResult[] = [];
    for (const { docId, score } of ranked) {
      const doc = this.deps.documents.get(docId);
      if (!doc) continue;
      results.push({
        documentId: doc.id,
        title: doc.title,
        content: doc.content,
        score: Math.round(score * this.scale) / this.scale,
        snippet: this.deps.snippets.generate(doc.content, queryTerms),
      });
    }
    return results;
  }

  stats(): EngineStats {
    const totalDocuments = this.deps.documents.size();
    let totalLength = 0;
    for (const d of this.deps.documents.values()) totalLength += d.length;

    return {
      totalDocuments,
      totalTerms: this.deps.index.termCount(),
      averageDocumentLength: totalDocuments > 0 ? totalLength / totalDocuments : 0,
    };
  }

  export(): IndexSnapshot {
    return encodeSnapshot(this.deps.documents, this.deps.index);
  }

  /** Replaces all state, or nothing when the snapshot is invalid. */
  import(snapshot: unknown): ImportResult {
    const decoded = decodeSnapshot(snapshot);
    if (!decoded.ok) {
      return { ok: false, reason: "invalid snapshot", errors: decoded.errors };
    }

    const { documents, postings, documentCount } = decoded.value;
    this.deps.documents.load(documents, documentCount);
    this.deps.index.load(postings);
    return { ok: true, documents: documents.length, terms: this.deps.index.termCount() };
  }

  exportJson(): string {
    return JSON.stringify(this.export());
  }

  importJson(json: string): ImportResult {
    let parsed: unknown;
    try {
      parsed = JSON.parse(json);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      return { ok: false, reason: "invalid JSON", errors: [{ path: "$", message }] };
    }
    return this.import(parsed);
  }
}
