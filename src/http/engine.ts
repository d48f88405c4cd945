import {
  createSearchEngine,
  type DocId,
  type EngineStats,
  type ImportResult,
  type IndexSnapshot,
  type MemorySearchEngine,
  type SearchResult,
} from "../core/index.js";
import { SnapshotFile } from "../storage/snapshotFile.js";
import { Logger } from "../utils/logger.js";

export interface NewDocument {
  title?: string;
  content: string;
}

/**
 * What the HTTP layer needs from the engine.
 *
 * Mutations resolve once the change is persisted (when persistence is on).
 */
export interface Engine {
  add(doc: NewDocument): Promise<DocId>;
  /** Indexes every document, then persists once. */
  addMany(docs: readonly NewDocument[]): Promise<DocId[]>;
  search(query: string, limit?: number): SearchResult[];
  stats(): EngineStats;
  exportSnapshot(): IndexSnapshot;
  importSnapshot(snapshot: unknown): Promise<ImportResult>;
}

export function createInMemoryEngine(engine: MemorySearchEngine = createSearchEngine()): Engine {
  return wrapEngine(engine);
}

function wrapEngine(engine: MemorySearchEngine, file?: SnapshotFile): Engine {
  const persist = async (): Promise<void> => {
    if (file) await file.save(engine.export());
  };

  const addMany = async (docs: readonly NewDocument[]): Promise<DocId[]> => {
    const ids = docs.map((d) => engine.addDocument(d.content, d.title));
    if (ids.length) await persist();
    return ids;
  };

  return {
    async add(doc) {
      const [id] = await addMany([doc]);
      if (id === undefined) throw new Error("document was not indexed");
      return id;
    },
    addMany,
    search(query, limit) {
      return engine.search(query, { limit });
    },
    stats() {
      return engine.stats();
    },
    exportSnapshot() {
      return engine.export();
    },
    async importSnapshot(snapshot) {
      const result = engine.import(snapshot);
      if (result.ok) await persist();
      return result;
    },
  };
}

/**
 * Engine backed by a snapshot file: state is restored from the file on open
 * and written back after every successful mutation.
 */
export async function openFileEngine(path: string, engine: MemorySearchEngine = createSearchEngine()): Promise<Engine> {
  const file = new SnapshotFile(path);
  const stored = await file.read();

  if (stored === undefined) {
    Logger.info(`no snapshot at ${path}, starting empty`);
  } else {
    const result = engine.import(stored);
    if (!result.ok) {
      throw new Error(`snapshot ${path} is invalid: ${result.errors.map((e) => `${e.path} ${e.message}`).join("; ")}`);
    }
    Logger.info(`restored ${result.documents} documents, ${result.terms} terms from ${path}`);
  }

  return wrapEngine(engine, file);
}
