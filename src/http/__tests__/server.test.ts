import type http from "node:http";

import { afterEach, beforeAll, describe, expect, it } from "vitest";

import { isRecord } from "../../core/validation.js";
import { LogLevel, Logger } from "../../utils/logger.js";
import { createInMemoryEngine } from "../engine.js";
import { startServer, type ServerOptions } from "../server.js";

const servers: http.Server[] = [];

async function boot(opts: Omit<ServerOptions, "port" | "engine"> = {}): Promise<string> {
  const { server, port } = await startServer({ ...opts, port: 0, engine: createInMemoryEngine() });
  servers.push(server);
  return `http://127.0.0.1:${port}`;
}

function send(base: string, method: string, path: string, body?: unknown, contentType = "application/json"): Promise<Response> {
  return fetch(`${base}${path}`, {
    method,
    headers: body === undefined ? undefined : { "content-type": contentType },
    body: body === undefined ? undefined : typeof body === "string" ? body : JSON.stringify(body),
  });
}

async function json(res: Response): Promise<Record<string, unknown>> {
  const body: unknown = await res.json();
  if (!isRecord(body)) throw new Error("expected a JSON object");
  return body;
}

describe("http server", () => {
  beforeAll(() => {
    Logger.setLevel(LogLevel.SILENT);
  });

  afterEach(async () => {
    await Promise.all(
      servers.splice(0).map(
        (s) =>
          new Promise<void>((resolve) => {
            s.closeAllConnections();
            s.close(() => resolve());
          }),
      ),
    );
  });

  it("reports health", async () => {
    const base = await boot();
    const res = await send(base, "GET", "/health");
    expect(res.status).toBe(200);
    const body = await json(res);
    expect(body).toMatchObject({ status: "ok", service: "lexindex", version: "0.1.0" });
  });

  it("indexes documents and searches them", async () => {
    const base = await boot();
    const added = await send(base, "POST", "/documents", {
      documents: [{ content: "cat dog cat" }, { title: "Birds", content: "dog bird" }],
    });
    expect(added.status).toBe(200);
    expect(await json(added)).toEqual({ ingested: 2, failed: 0, ids: [1, 2], failures: [] });

    const res = await send(base, "POST", "/search", { query: "cat" });
    expect(res.status).toBe(200);
    const body = await json(res);
    expect(body.total).toBe(1);
    expect(body.results).toEqual([
      {
        documentId: 1,
        title: "Document 1",
        content: "cat dog cat",
        score: 0.4621,
        snippet: "<strong>cat</strong> dog <strong>cat</strong>",
      },
    ]);

    const stats = await send(base, "GET", "/stats");
    expect(await json(stats)).toEqual({ totalDocuments: 2, totalTerms: 3, averageDocumentLength: 2.5 });
  });

  it("reports per-document failures with 207", async () => {
    const base = await boot();
    const res = await send(base, "POST", "/documents", {
      documents: [{ content: "valid text" }, { content: "   " }, "nope"],
    });
    expect(res.status).toBe(207);
    expect(await json(res)).toEqual({
      ingested: 1,
      failed: 2,
      ids: [1],
      failures: [
        { index: 1, code: "INVALID_ARGUMENT", message: "content cannot be empty" },
        { index: 2, code: "INVALID_ARGUMENT", message: "document must be an object" },
      ],
    });
  });

  it("returns an empty list for an all-stopword query", async () => {
    const base = await boot();
    await send(base, "POST", "/documents", { documents: [{ content: "the cat" }] });
    const res = await send(base, "POST", "/search", { query: "the a an" });
    expect(await json(res)).toMatchObject({ results: [], total: 0 });
  });

  it("answers invalid search requests with a problem document", async () => {
    const base = await boot();
    const res = await send(base, "POST", "/search", { query: "", limit: 0 });
    expect(res.status).toBe(400);
    expect(res.headers.get("content-type")).toBe("application/problem+json");
    const body = await json(res);
    expect(body.code).toBe("INVALID_ARGUMENT");
    expect(body.type).toBe("https://errors.lexindex.local/invalid-argument");
    expect(body.errors).toEqual([
      { path: "$.query", message: "must be non-empty" },
      { path: "$.limit", message: "must be an integer between 1 and 1000" },
    ]);
  });

  it("rejects malformed JSON and wrong media types", async () => {
    const base = await boot();
    const bad = await send(base, "POST", "/search", "{oops");
    expect(bad.status).toBe(400);
    expect((await json(bad)).code).toBe("INVALID_JSON");

    const text = await send(base, "POST", "/search", "query=cat", "text/plain");
    expect(text.status).toBe(415);
  });

  it("answers bodies over the size limit with 413 and indexes nothing", async () => {
    const base = await boot({ maxBodyBytes: 64 });
    const res = await send(base, "POST", "/documents", { documents: [{ content: "word ".repeat(40) }] });
    expect(res.status).toBe(413);
    expect(res.headers.get("content-type")).toBe("application/problem+json");
    expect(await json(res)).toMatchObject({ status: 413, code: "PAYLOAD_TOO_LARGE", detail: "body exceeds 64 bytes" });

    expect(await json(await send(base, "GET", "/stats"))).toMatchObject({ totalDocuments: 0 });
    expect((await send(base, "POST", "/search", { query: "word" })).status).toBe(200);
  });

  it("exports and imports snapshots between instances", async () => {
    const a = await boot();
    await send(a, "POST", "/documents", { documents: [{ content: "cat dog cat" }, { content: "dog bird" }] });
    const snapshot = await json(await send(a, "GET", "/snapshot"));

    const b = await boot();
    const imported = await send(b, "PUT", "/snapshot", snapshot);
    expect(imported.status).toBe(200);
    expect(await json(imported)).toEqual({ imported: true, documents: 2, terms: 3 });

    const fromA = await json(await send(a, "POST", "/search", { query: "dog bird" }));
    const fromB = await json(await send(b, "POST", "/search", { query: "dog bird" }));
    expect(fromB.results).toEqual(fromA.results);
  });

  it("rejects an invalid snapshot with 422", async () => {
    const base = await boot();
    const res = await send(base, "PUT", "/snapshot", { documents: {}, index: {} });
    expect(res.status).toBe(422);
    const body = await json(res);
    expect(body.code).toBe("UNPROCESSABLE_ENTITY");
    expect(body.errors).toEqual([{ path: "$.documentCount", message: "must be a non-negative integer" }]);
  });

  it("returns 404 and 405 problems", async () => {
    const base = await boot();
    expect((await send(base, "GET", "/nope")).status).toBe(404);
    expect((await send(base, "GET", "/documents")).status).toBe(405);
  });
});
