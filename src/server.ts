import { loadConfig, loadEnv } from "./config.js";
import { createInMemoryEngine, openFileEngine } from "./http/engine.js";
import { startServer } from "./http/server.js";
import { Logger } from "./utils/logger.js";

loadEnv();
const config = loadConfig();
Logger.setLevel(config.logLevel);

const engine = config.snapshotPath ? await openFileEngine(config.snapshotPath) : createInMemoryEngine();
const { server, port } = await startServer({ port: config.port, engine });

function shutdown(): void {
  Logger.info("shutting down");
  server.close(() => process.exit(0));
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

Logger.info(`listening on :${port}`);
