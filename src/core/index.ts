export type * from "./types.js";
export type { Tokenizer } from "./tokenizer.js";
export type { DocumentStore } from "./documentStore.js";
export type { InvertedIndex, Posting, PostingsList } from "./invertedIndex.js";
export type { Ranker, RankContext, ScoredDocument } from "./ranker.js";
export type { SnippetGenerator, SnippetOptions } from "./snippet.js";
export {
  SNAPSHOT_VERSION,
  type IndexSnapshot,
  type DocumentRecord,
  type DecodedSnapshot,
  type DecodeResult,
} from "./snapshot.js";
export * from "./impl/index.js";
