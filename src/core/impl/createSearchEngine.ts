import type { SnippetOptions } from "../snippet.js";
import { MemoryDocumentStore } from "./memoryDocumentStore.js";
import { MemoryInvertedIndex } from "./memoryInvertedIndex.js";
import { MemorySearchEngine } from "./memorySearchEngine.js";
import { SimpleTokenizer } from "./simpleTokenizer.js";
import { TfIdfRanker } from "./tfidfRanker.js";
import { WindowSnippetGenerator } from "./windowSnippetGenerator.js";

export interface CreateEngineOptions {
  stopWords?: ReadonlySet<string>;
  snippet?: SnippetOptions;
  scorePrecision?: number;
}

/** Wires the default in-memory components. */
export function createSearchEngine(opts: CreateEngineOptions = {}): MemorySearchEngine {
  return new MemorySearchEngine({
    tokenizer: new SimpleTokenizer(opts.stopWords),
    documents: new MemoryDocumentStore(),
    index: new MemoryInvertedIndex(),
    ranker: new TfIdfRanker(),
    snippets: new WindowSnippetGenerator(opts.snippet),
    scorePrecision: opts.scorePrecision,
  });
}
