export { SimpleTokenizer, DEFAULT_STOP_WORDS } from "./simpleTokenizer.js";
export { MemoryDocumentStore, countWords } from "./memoryDocumentStore.js";
export { MemoryInvertedIndex } from "./memoryInvertedIndex.js";
export { TfIdfRanker, tf, idf } from "./tfidfRanker.js";
export { WindowSnippetGenerator } from "./windowSnippetGenerator.js";
export { encodeSnapshot, decodeSnapshot } from "./snapshotCodec.js";
export { MemorySearchEngine, type EngineDeps, type SearchOptions } from "./memorySearchEngine.js";
export { createSearchEngine, type CreateEngineOptions } from "./createSearchEngine.js";
