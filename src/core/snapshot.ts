import type { DocId, Document, FieldError, Term } from "./types.js";
import type { Posting } from "./invertedIndex.js";

export const SNAPSHOT_VERSION = 1;

export interface DocumentRecord {
  title: string;
  content: string;
  length: number;
}

/**
 * Plain-JSON form of the whole engine state.
 *
 * Object keys under `index` and `documents` are decimal document ids.
 */
export interface IndexSnapshot {
  version: typeof SNAPSHOT_VERSION;
  index: Record<Term, Record<string, Posting>>;
  documents: Record<string, DocumentRecord>;
  documentCount: number;
}

/** Snapshot contents after validation, ready to be loaded. */
export interface DecodedSnapshot {
  documents: Document[];
  postings: Array<[Term, Map<DocId, Posting>]>;
  documentCount: number;
}

export type DecodeResult =
  | { ok: true; value: DecodedSnapshot }
  | { ok: false; errors: FieldError[] };
