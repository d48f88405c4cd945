#!/usr/bin/env node
/**
 * lexindex CLI entry point.
 */

import { readFile } from "node:fs/promises";
import { basename, extname, resolve } from "node:path";

import { Command, InvalidArgumentError } from "commander";

import { loadConfig, loadEnv, type AppConfig } from "./config.js";
import { createSearchEngine } from "./core/index.js";
import { openFileEngine, type NewDocument } from "./http/engine.js";
import { startServer } from "./http/server.js";
import { run } from "./cli/run.js";
import { DEMO_QUERIES, SAMPLE_DOCUMENTS } from "./cli/sampleDocuments.js";
import * as ui from "./cli/ui.js";
import { LogLevel, Logger } from "./utils/logger.js";

loadEnv();

/** Reads the environment; commands stay quiet unless LOG_LEVEL is set. */
function setup(): AppConfig {
  const config = loadConfig();
  Logger.setLevel(process.env.LOG_LEVEL ? config.logLevel : LogLevel.WARN);
  return config;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("must be a positive integer");
  return n;
}

function parsePort(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0 || n > 65535) throw new InvalidArgumentError("must be a port number");
  return n;
}

function requireSnapshot(path: string | undefined, config: AppConfig): string {
  const p = path ?? config.snapshotPath;
  if (!p) throw new Error("no snapshot file: pass --snapshot <path> or set SNAPSHOT_PATH");
  return resolve(p);
}

const program = new Command();

program
  .name("lexindex")
  .description("In-memory full-text search with TF-IDF ranking")
  .version("0.1.0");

// ===== demo =====
program
  .command("demo")
  .description("Index sample documents and run demonstration queries")
  .action(async () => {
    await run(async () => {
      setup();
      const engine = createSearchEngine();

      ui.header("Adding documents");
      for (const doc of SAMPLE_DOCUMENTS) {
        const id = engine.addDocument(doc.content, doc.title);
        ui.success(`${doc.title} (ID: ${id})`);
      }

      ui.header("Index statistics");
      ui.stats(engine.stats());

      for (const q of DEMO_QUERIES) ui.results(q, engine.search(q));
    });
  });

// ===== add =====
program
  .command("add <files...>")
  .description("Index text files into a snapshot file")
  .option("-s, --snapshot <path>", "snapshot file (defaults to SNAPSHOT_PATH)")
  .option("-t, --title <title>", "title for a single file (defaults to the file name)")
  .action(async (files: string[], opts: { snapshot?: string; title?: string }) => {
    await run(async () => {
      const config = setup();
      if (opts.title && files.length > 1) throw new Error("--title only applies to a single file");
      const engine = await openFileEngine(requireSnapshot(opts.snapshot, config));

      const docs: NewDocument[] = [];
      for (const file of files) {
        const content = await readFile(resolve(file), "utf8");
        docs.push({ content, title: opts.title ?? basename(file, extname(file)) });
      }

      const ids = await engine.addMany(docs);
      ids.forEach((id, i) => ui.success(`${docs[i]?.title} (ID: ${id})`));
    });
  });

// ===== search =====
program
  .command("search <query>")
  .description("Search a snapshot file")
  .option("-s, --snapshot <path>", "snapshot file (defaults to SNAPSHOT_PATH)")
  .option("-l, --limit <n>", "maximum number of results", parsePositiveInt)
  .option("--json", "print results as JSON")
  .action(async (query: string, opts: { snapshot?: string; limit?: number; json?: boolean }) => {
    await run(async () => {
      const config = setup();
      const engine = await openFileEngine(requireSnapshot(opts.snapshot, config));
      const hits = engine.search(query, opts.limit);
      if (opts.json) {
        console.log(JSON.stringify(hits, null, 2));
        return;
      }
      ui.results(query, hits);
    });
  });

// ===== stats =====
program
  .command("stats")
  .description("Show statistics of a snapshot file")
  .option("-s, --snapshot <path>", "snapshot file (defaults to SNAPSHOT_PATH)")
  .action(async (opts: { snapshot?: string }) => {
    await run(async () => {
      const config = setup();
      const engine = await openFileEngine(requireSnapshot(opts.snapshot, config));
      ui.header("Index statistics");
      ui.stats(engine.stats());
    });
  });

// ===== serve =====
program
  .command("serve")
  .description("Start the HTTP API")
  .option("-p, --port <port>", "port to listen on", parsePort)
  .option("-s, --snapshot <path>", "persist the index to this snapshot file")
  .action(async (opts: { port?: number; snapshot?: string }) => {
    await run(async () => {
      const config = setup();
      Logger.setLevel(config.logLevel);
      const snapshotPath = opts.snapshot ?? config.snapshotPath;
      const engine = snapshotPath ? await openFileEngine(resolve(snapshotPath)) : undefined;
      const { server, port } = await startServer({ port: opts.port ?? config.port, engine });

      const shutdown = (): void => {
        server.close(() => process.exit(0));
      };
      process.on("SIGINT", shutdown);
      process.on("SIGTERM", shutdown);

      ui.success(`listening on :${port}`);
    });
  });

await program.parseAsync(process.argv);
