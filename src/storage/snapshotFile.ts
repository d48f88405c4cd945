import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import type { IndexSnapshot } from "../core/index.js";

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/**
 * JSON file holding an exported index.
 *
 * Writes go through a single queue and land via rename, so readers never
 * see a half-written file and concurrent saves apply in call order.
 */
export class SnapshotFile {
  private queue: Promise<void> = Promise.resolve();

  constructor(readonly path: string) {}

  /** Parsed file contents, or undefined when the file does not exist yet. */
  async read(): Promise<unknown> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf8");
    } catch (e) {
      if (isNotFound(e)) return undefined;
      throw e;
    }
    return JSON.parse(raw);
  }

  save(snapshot: IndexSnapshot): Promise<void> {
    const data = JSON.stringify(snapshot);
    const next = this.queue.then(() => this.write(data));
    // keep the queue alive after a failed write; the caller still sees the rejection
    this.queue = next.catch(() => undefined);
    return next;
  }

  private async write(data: string): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.${process.pid}.tmp`;
    await writeFile(tmp, data, "utf8");
    await rename(tmp, this.path);
  }
}
