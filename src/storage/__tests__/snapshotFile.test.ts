import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";

import { createSearchEngine } from "../../core/index.js";
import { openFileEngine } from "../../http/engine.js";
import { LogLevel, Logger } from "../../utils/logger.js";
import { SnapshotFile } from "../snapshotFile.js";

describe("SnapshotFile", () => {
  let dir: string;

  beforeAll(() => {
    Logger.setLevel(LogLevel.SILENT);
  });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "lexindex-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads undefined when the file does not exist", async () => {
    const file = new SnapshotFile(join(dir, "missing.json"));
    await expect(file.read()).resolves.toBeUndefined();
  });

  it("writes and reads back a snapshot, creating parent directories", async () => {
    const engine = createSearchEngine();
    engine.addDocument("cat dog cat", "Pets");
    const file = new SnapshotFile(join(dir, "nested", "index.json"));

    await file.save(engine.export());
    await expect(file.read()).resolves.toEqual(engine.export());
  });

  it("applies concurrent saves in call order", async () => {
    const engine = createSearchEngine();
    const file = new SnapshotFile(join(dir, "index.json"));

    engine.addDocument("first");
    const a = file.save(engine.export());
    engine.addDocument("second");
    const b = file.save(engine.export());
    await Promise.all([a, b]);

    await expect(file.read()).resolves.toEqual(engine.export());
  });
});

describe("openFileEngine", () => {
  let dir: string;

  beforeAll(() => {
    Logger.setLevel(LogLevel.SILENT);
  });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "lexindex-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("persists added documents across reopen", async () => {
    const path = join(dir, "index.json");
    const first = await openFileEngine(path);
    await first.add({ content: "cat dog cat", title: "Pets" });
    await first.add({ content: "dog bird" });

    const reopened = await openFileEngine(path);
    expect(reopened.stats()).toEqual(first.stats());
    expect(reopened.search("cat")).toEqual(first.search("cat"));
    expect(await reopened.add({ content: "fish" })).toBe(3);
  });

  it("writes the snapshot once for a batch of documents", async () => {
    const path = join(dir, "index.json");
    const engine = await openFileEngine(path);
    const save = vi.spyOn(SnapshotFile.prototype, "save");
    try {
      const ids = await engine.addMany([{ content: "cat" }, { content: "dog" }, { content: "bird" }]);
      expect(ids).toEqual([1, 2, 3]);
      expect(save).toHaveBeenCalledTimes(1);

      await engine.addMany([]);
      expect(save).toHaveBeenCalledTimes(1);
    } finally {
      save.mockRestore();
    }

    const reopened = await openFileEngine(path);
    expect(reopened.stats().totalDocuments).toBe(3);
    expect(reopened.search("dog").map((r) => r.documentId)).toEqual([2]);
  });

  it("refuses to start from an invalid snapshot file", async () => {
    const path = join(dir, "index.json");
    await writeFile(path, JSON.stringify({ documents: {} }), "utf8");
    await expect(openFileEngine(path)).rejects.toThrow(/is invalid/);
  });
});
