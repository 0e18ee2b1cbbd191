import { createJsonlStore, type LogStore } from "./log-store.js";
import { initLogger, initLoggerWithWriter } from "./logger.js";
import type { Config } from "./types.js";

export function sqlitePath(logFile: string): string {
  return logFile.replace(/\.jsonl$/, "") + ".db";
}

/**
 * Point the logger at the configured backend and return a store over the
 * same entries, or null when logging is disabled.
 */
export async function setupLogging(config: Config): Promise<LogStore | null> {
  if (config.logFile === false) {
    initLogger(false);
    return null;
  }

  if (config.logBackend === "sqlite") {
    try {
      const { createSqliteStore } = await import("./log-store-sqlite.js");
      const store = createSqliteStore(sqlitePath(config.logFile));
      initLoggerWithWriter(store);
      return store;
    } catch (err) {
      // native module missing or database unusable: keep logging as JSONL
      const message = err instanceof Error ? err.message : String(err);
      process.stderr.write(`cmdgate: sqlite log unavailable, using JSONL: ${message}\n`);
    }
  }

  initLogger(config.logFile);
  return createJsonlStore(config.logFile);
}
