import { config as loadDotenv } from "dotenv";

import { LogLevel, parseLogLevel } from "./utils/logger.js";

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  /** JSON snapshot file persisted across restarts; in-memory only when unset */
  snapshotPath?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Loads `.env` into process.env (existing variables win). */
export function loadEnv(): void {
  loadDotenv();
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const portRaw = env.PORT?.trim();
  const port = portRaw ? Number(portRaw) : 3000;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`PORT must be an integer between 0 and 65535, got "${env.PORT}"`);
  }

  let logLevel = LogLevel.INFO;
  if (env.LOG_LEVEL?.trim()) {
    const parsed = parseLogLevel(env.LOG_LEVEL);
    if (parsed === undefined) {
      throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error, silent; got "${env.LOG_LEVEL}"`);
    }
    logLevel = parsed;
  }

  const snapshotPath = env.SNAPSHOT_PATH?.trim() || undefined;
  return { port, logLevel, snapshotPath };
}
