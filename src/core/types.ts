/** Shared core types used by module contracts. */

export type DocId = number;
export type Term = string;

/** A stored, immutable document. */
export interface Document {
  id: DocId;
  title: string;
  content: string;
  /** whitespace-delimited word count of the raw content (TF denominator) */
  length: number;
}

export interface SearchResult {
  documentId: DocId;
  title: string;
  content: string;
  /** rounded for presentation; ranking uses the unrounded value */
  score: number;
  snippet: string;
}

export interface EngineStats {
  totalDocuments: number;
  /** distinct indexed terms */
  totalTerms: number;
  averageDocumentLength: number;
}

export interface FieldError {
  path: string;
  message: string;
}

export type ImportResult =
  | { ok: true; documents: number; terms: number }
  | { ok: false; reason: string; errors: FieldError[] };
