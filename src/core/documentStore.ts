import type { DocId, Document } from "./types.js";

/**
 * Append-only document storage.
 *
 * Ids come from a counter starting at 1 and are never reused; records are
 * never edited or removed once added.
 */
export interface DocumentStore {
  add(content: string, title?: string): Document;
  get(id: DocId): Document | undefined;
  /** number of stored documents */
  size(): number;
  /** current value of the id counter */
  count(): number;
  values(): IterableIterator<Document>;

  /** Replaces every record and the counter at once (used by import). */
  load(documents: Iterable<Document>, counter: number): void;
}
