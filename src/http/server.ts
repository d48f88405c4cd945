import http from "node:http";
import { randomUUID } from "node:crypto";

import { PROBLEM_CONTENT_TYPE, problem, type FieldError, type Problem, type ProblemCode } from "./problem.js";
import { asInt, asString, isRecord, pushErr } from "../core/validation.js";
import { createInMemoryEngine, type Engine, type NewDocument } from "./engine.js";
import { Logger } from "../utils/logger.js";

const SERVICE = "lexindex";
const VERSION = "0.1.0";

const MAX_BODY_BYTES = 16 * 1024 * 1024;
const MAX_DOCUMENTS_PER_REQUEST = 1000;
const MAX_CONTENT_LENGTH = 200000;
const MAX_TITLE_LENGTH = 512;
const MAX_QUERY_LENGTH = 4096;
const MAX_LIMIT = 1000;

export interface ServerOptions {
  port?: number;
  engine?: Engine;
  /** Request bodies larger than this are answered with 413. */
  maxBodyBytes?: number;
}

class BodyError extends Error {
  constructor(
    readonly status: number,
    readonly code: "INVALID_JSON" | "PAYLOAD_TOO_LARGE",
    message: string,
  ) {
    super(message);
  }
}

export function createServer(opts: ServerOptions = {}): http.Server {
  const start = Date.now();
  const engine = opts.engine ?? createInMemoryEngine();
  const maxBodyBytes = opts.maxBodyBytes ?? MAX_BODY_BYTES;

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const fail = (status: number, code: ProblemCode, detail: string, errors?: FieldError[]): void => {
      sendProblem(res, status, problem({ status, code, detail, errors, instance: url.pathname, requestId }));
    };

    Logger.debug(`${req.method ?? "?"} ${url.pathname}`, { requestId });

    try {
      if (url.pathname === "/health") {
        if (req.method !== "GET") return fail(405, "METHOD_NOT_ALLOWED", "use GET");
        return sendJson(res, 200, {
          status: "ok",
          service: SERVICE,
          version: VERSION,
          uptimeMs: Date.now() - start,
        });
      }

      if (url.pathname === "/stats") {
        if (req.method !== "GET") return fail(405, "METHOD_NOT_ALLOWED", "use GET");
        return sendJson(res, 200, engine.stats());
      }

      if (url.pathname === "/documents") {
        if (req.method !== "POST") return fail(405, "METHOD_NOT_ALLOWED", "use POST");
        if (!isJson(req)) {
          return fail(415, "UNSUPPORTED_MEDIA_TYPE", "content-type must be application/json");
        }
        const body = await readJson(req, maxBodyBytes);
        if (!isRecord(body)) {
          return fail(400, "INVALID_ARGUMENT", "body must be an object");
        }

        const errors: FieldError[] = [];
        const docsVal = body.documents;
        if (!Array.isArray(docsVal)) pushErr(errors, "$.documents", "must be an array");
        const docs: unknown[] = Array.isArray(docsVal) ? docsVal : [];
        if (Array.isArray(docsVal) && docsVal.length < 1) pushErr(errors, "$.documents", "must contain at least 1 item");
        if (docs.length > MAX_DOCUMENTS_PER_REQUEST) {
          pushErr(errors, "$.documents", `must contain at most ${MAX_DOCUMENTS_PER_REQUEST} items`);
        }
        if (errors.length) {
          return fail(400, "INVALID_ARGUMENT", "invalid request", errors);
        }

        const accepted: NewDocument[] = [];
        const failures: Array<{ index: number; code: string; message: string }> = [];

        for (let i = 0; i < docs.length; i++) {
          const d = docs[i];
          if (!isRecord(d)) {
            failures.push({ index: i, code: "INVALID_ARGUMENT", message: "document must be an object" });
            continue;
          }

          const content = asString(d.content);
          const title = d.title == null ? undefined : asString(d.title);

          if (d.title != null && title === undefined) {
            failures.push({ index: i, code: "INVALID_ARGUMENT", message: "title must be a string" });
            continue;
          }
          if (title !== undefined && title.length > MAX_TITLE_LENGTH) {
            failures.push({ index: i, code: "INVALID_ARGUMENT", message: "title too long" });
            continue;
          }
          if (!content || !content.trim()) {
            failures.push({ index: i, code: "INVALID_ARGUMENT", message: "content cannot be empty" });
            continue;
          }
          if (content.length > MAX_CONTENT_LENGTH) {
            failures.push({ index: i, code: "INVALID_ARGUMENT", message: "content too long" });
            continue;
          }

          accepted.push({ content, title });
        }

        const ids = await engine.addMany(accepted);

        const failed = failures.length;
        Logger.info(`indexed ${ids.length} documents (${failed} rejected)`, { requestId });
        return sendJson(res, failed > 0 ? 207 : 200, { ingested: ids.length, failed, ids, failures });
      }

      if (url.pathname === "/search") {
        if (req.method !== "POST") return fail(405, "METHOD_NOT_ALLOWED", "use POST");
        if (!isJson(req)) {
          return fail(415, "UNSUPPORTED_MEDIA_TYPE", "content-type must be application/json");
        }

        const started = Date.now();
        const body = await readJson(req, maxBodyBytes);
        if (!isRecord(body)) {
          return fail(400, "INVALID_ARGUMENT", "body must be an object");
        }

        const errors: FieldError[] = [];
        const query = asString(body.query);
        if (!query || !query.trim()) pushErr(errors, "$.query", "must be non-empty");
        if (query && query.length > MAX_QUERY_LENGTH) pushErr(errors, "$.query", "too long");

        let limit: number | undefined;
        if (body.limit != null) {
          limit = asInt(body.limit);
          if (limit === undefined || limit < 1 || limit > MAX_LIMIT) {
            pushErr(errors, "$.limit", `must be an integer between 1 and ${MAX_LIMIT}`);
          }
        }

        if (errors.length || query === undefined) {
          return fail(400, "INVALID_ARGUMENT", "invalid request", errors);
        }

        const results = engine.search(query, limit);
        return sendJson(res, 200, { results, total: results.length, tookMs: Date.now() - started });
      }

      if (url.pathname === "/snapshot") {
        if (req.method === "GET") return sendJson(res, 200, engine.exportSnapshot());
        if (req.method !== "PUT") return fail(405, "METHOD_NOT_ALLOWED", "use GET or PUT");
        if (!isJson(req)) {
          return fail(415, "UNSUPPORTED_MEDIA_TYPE", "content-type must be application/json");
        }

        const result = await engine.importSnapshot(await readJson(req, maxBodyBytes));
        if (!result.ok) {
          Logger.warn(`snapshot rejected: ${result.errors.length} errors`, { requestId });
          return fail(422, "UNPROCESSABLE_ENTITY", result.reason, result.errors);
        }
        Logger.info(`snapshot imported: ${result.documents} documents`, { requestId });
        return sendJson(res, 200, { imported: true, documents: result.documents, terms: result.terms });
      }

      return fail(404, "NOT_FOUND", "not found");
    } catch (e) {
      if (e instanceof BodyError) {
        return fail(e.status, e.code, e.message);
      }
      Logger.error(`request ${requestId} failed`, e);
      return fail(500, "INTERNAL", "internal error");
    }
  });
}

export async function startServer(opts: ServerOptions = {}): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? 3000;

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}

function isJson(req: http.IncomingMessage): boolean {
  const ct = (req.headers["content-type"] ?? "").toString();
  return (ct.split(";")[0] ?? "").trim().toLowerCase() === "application/json";
}

async function readJson(req: http.IncomingMessage, maxBytes: number): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  // an oversized body is still drained so the client gets the 413 response
  for await (const c of req) {
    const buf = Buffer.isBuffer(c) ? c : Buffer.from(String(c));
    size += buf.length;
    if (size <= maxBytes) chunks.push(buf);
  }
  if (size > maxBytes) throw new BodyError(413, "PAYLOAD_TOO_LARGE", `body exceeds ${maxBytes} bytes`);
  const raw = Buffer.concat(chunks).toString("utf8");
  if (!raw.length) return null;
  try {
    return JSON.parse(raw);
  } catch {
    throw new BodyError(400, "INVALID_JSON", "body is not valid JSON");
  }
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(data);
}

function sendProblem(res: http.ServerResponse, status: number, body: Problem): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", PROBLEM_CONTENT_TYPE);
  res.end(data);
}
