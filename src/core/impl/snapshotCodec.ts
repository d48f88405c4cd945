import type { DocId, Document, FieldError, Term } from "../types.js";
import type { DocumentStore } from "../documentStore.js";
import type { InvertedIndex, Posting } from "../invertedIndex.js";
import {
  SNAPSHOT_VERSION,
  type DecodeResult,
  type DocumentRecord,
  type IndexSnapshot,
} from "../snapshot.js";
import { asNonNegativeInt, asString, isRecord, parseDocId, pushErr } from "../validation.js";

export function encodeSnapshot(store: DocumentStore, index: InvertedIndex): IndexSnapshot {
  // Object.fromEntries keeps keys such as "__proto__" as own data properties
  const documents = Object.fromEntries(
    Array.from(store.values(), (d): [string, DocumentRecord] => [
      String(d.id),
      { title: d.title, content: d.content, length: d.length },
    ]),
  );

  const postings = Object.fromEntries(
    Array.from(index.entries(), ([term, list]): [Term, Record<string, Posting>] => [
      term,
      Object.fromEntries(
        Array.from(list, ([docId, p]): [string, Posting] => [
          String(docId),
          { frequency: p.frequency, positions: [...p.positions] },
        ]),
      ),
    ]),
  );

  return { version: SNAPSHOT_VERSION, index: postings, documents, documentCount: store.count() };
}

/**
 * Validates an untrusted snapshot.
 *
 * Every problem is collected; nothing is returned unless the whole payload
 * is consistent.
 */
export function decodeSnapshot(raw: unknown): DecodeResult {
  const errors: FieldError[] = [];
  if (!isRecord(raw)) {
    pushErr(errors, "$", "must be an object");
    return { ok: false, errors };
  }

  if (raw.version !== undefined && raw.version !== SNAPSHOT_VERSION) {
    pushErr(errors, "$.version", `unsupported version (expected ${SNAPSHOT_VERSION})`);
  }

  const documentCount = asNonNegativeInt(raw.documentCount);
  if (documentCount === undefined) {
    pushErr(errors, "$.documentCount", "must be a non-negative integer");
  } else if (documentCount >= Number.MAX_SAFE_INTEGER) {
    pushErr(errors, "$.documentCount", "leaves no room for new document ids");
  }

  const documents = decodeDocuments(raw.documents, errors);
  if (documents && documentCount !== undefined) {
    for (const id of documents.keys()) {
      if (id > documentCount) pushErr(errors, `$.documents.${id}`, "id exceeds documentCount");
    }
  }

  const postings = decodePostings(raw.index, documents, errors);

  if (errors.length || !documents || !postings || documentCount === undefined) {
    return { ok: false, errors };
  }
  return { ok: true, value: { documents: Array.from(documents.values()), postings, documentCount } };
}

function decodeDocuments(v: unknown, errors: FieldError[]): Map<DocId, Document> | undefined {
  if (!isRecord(v)) {
    pushErr(errors, "$.documents", "must be an object");
    return undefined;
  }

  const out = new Map<DocId, Document>();
  for (const [key, rec] of Object.entries(v)) {
    const path = `$.documents.${key}`;
    const id = parseDocId(key);
    if (id === undefined) {
      pushErr(errors, path, "key must be a positive integer id");
      continue;
    }
    if (!isRecord(rec)) {
      pushErr(errors, path, "must be an object");
      continue;
    }

    const title = asString(rec.title);
    const content = asString(rec.content);
    const length = asNonNegativeInt(rec.length);
    if (title === undefined) pushErr(errors, `${path}.title`, "must be a string");
    if (content === undefined) pushErr(errors, `${path}.content`, "must be a string");
    if (length === undefined) pushErr(errors, `${path}.length`, "must be a non-negative integer");
    if (title === undefined || content === undefined || length === undefined) continue;

    out.set(id, { id, title, content, length });
  }
  return out;
}

function decodePostings(
  v: unknown,
  documents: Map<DocId, Document> | undefined,
  errors: FieldError[],
): Array<[Term, Map<DocId, Posting>]> | undefined {
  if (!isRecord(v)) {
    pushErr(errors, "$.index", "must be an object");
    return undefined;
  }

  const out: Array<[Term, Map<DocId, Posting>]> = [];
  for (const [term, list] of Object.entries(v)) {
    const termPath = `$.index.${term}`;
    if (!term.length) {
      pushErr(errors, termPath, "term must be non-empty");
      continue;
    }
    if (!isRecord(list)) {
      pushErr(errors, termPath, "must be an object");
      continue;
    }

    const docMap = new Map<DocId, Posting>();
    for (const [key, rec] of Object.entries(list)) {
      const path = `${termPath}.${key}`;
      const docId = parseDocId(key);
      if (docId === undefined) {
        pushErr(errors, path, "key must be a positive integer id");
        continue;
      }
      if (documents && !documents.has(docId)) {
        pushErr(errors, path, "references an unknown document");
        continue;
      }
      const posting = decodePosting(rec, path, errors);
      if (posting) docMap.set(docId, posting);
    }
    out.push([term, docMap]);
  }
  return out;
}

function decodePosting(v: unknown, path: string, errors: FieldError[]): Posting | undefined {
  if (!isRecord(v)) {
    pushErr(errors, path, "must be an object");
    return undefined;
  }

  const frequency = asNonNegativeInt(v.frequency);
  if (frequency === undefined || frequency === 0) {
    pushErr(errors, `${path}.frequency`, "must be a positive integer");
    return undefined;
  }
  if (!Array.isArray(v.positions)) {
    pushErr(errors, `${path}.positions`, "must be an array");
    return undefined;
  }

  const positions: number[] = [];
  for (const item of v.positions) {
    const pos = asNonNegativeInt(item);
    const prev = positions[positions.length - 1];
    if (pos === undefined || (prev !== undefined && pos <= prev)) {
      pushErr(errors, `${path}.positions`, "must be strictly increasing non-negative integers");
      return undefined;
    }
    positions.push(pos);
  }
  if (positions.length !== frequency) {
    pushErr(errors, `${path}.positions`, "length must equal frequency");
    return undefined;
  }

  return { frequency, positions };
}
