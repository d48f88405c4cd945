import type { DocId, Document } from "../types.js";
import type { DocumentStore } from "../documentStore.js";

/** Raw word count: whitespace-delimited fragments, no filtering. */
export function countWords(content: string): number {
  let n = 0;
  for (const w of content.split(/\s+/)) {
    if (w.length) n++;
  }
  return n;
}

export class MemoryDocumentStore implements DocumentStore {
  private docs = new Map<DocId, Document>();
  private counter = 0;

  add(content: string, title?: string): Document {
    const id = this.counter + 1;
    const doc: Document = {
      id,
      title: title || `Document ${id}`,
      content,
      length: countWords(content),
    };
    this.docs.set(id, doc);
    this.counter = id;
    return doc;
  }

  get(id: DocId): Document | undefined {
    return this.docs.get(id);
  }

  size(): number {
    return this.docs.size;
  }

  count(): number {
    return this.counter;
  }

  values(): IterableIterator<Document> {
    return this.docs.values();
  }

  load(documents: Iterable<Document>, counter: number): void {
    const next = new Map<DocId, Document>();
    for (const d of documents) next.set(d.id, d);
    this.docs = next;
    this.counter = counter;
  }
}
