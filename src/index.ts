#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { loadConfig } from "./config.js";
import { analyze } from "./engine.js";
import { setupLogging } from "./log-setup.js";
import type { LogStore } from "./log-store.js";
import { recordDecision } from "./logger.js";
import { analyzePythonFile, analyzePythonSource } from "./python-safety.js";
import { isReadonlySql, isReadonlySqlFor, SQL_DIALECT_NAMES } from "./sql.js";

function textResult(value: unknown, isError = false) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

function errorResult(error: unknown) {
  const message = error instanceof Error ? error.message : String(error);
  return textResult({ error: message }, true);
}

function createServer(store: LogStore | null): McpServer {
  const server = new McpServer({
    name: "cmdgate",
    version: "0.1.0",
  });

  server.tool(
    "check_command",
    "Decide whether a shell command may run unattended (allow), needs confirmation (ask) or is refused (deny)",
    {
      command: z.string().describe("The shell command to check"),
      cwd: z.string().describe("Working directory the command would run in"),
    },
    async ({ command, cwd }) => {
      try {
        // project config depends on where the command runs
        const config = loadConfig(cwd);
        return textResult(recordDecision("mcp", command, cwd, () => analyze(command, config, cwd)));
      } catch (error) {
        return errorResult(error);
      }
    },
  );

  server.tool(
    "check_python",
    "Statically check Python source (inline or a file path) for file, network, process or reflection access",
    {
      source: z.string().optional().describe("Python source to check"),
      path: z.string().optional().describe("Absolute path to a .py file to check"),
      allow_print: z.boolean().optional().describe("Treat print() as safe (default true)"),
    },
    async ({ source, path, allow_print }) => {
      try {
        if (source !== undefined) {
          const violations = analyzePythonSource(source, allow_print ?? true);
          return textResult({ safe: violations.length === 0, violations });
        }
        if (path !== undefined) return textResult(analyzePythonFile(path));
        return textResult({ error: "one of source or path is required" }, true);
      } catch (error) {
        return errorResult(error);
      }
    },
  );

  server.tool(
    "classify_sql",
    "Classify a SQL statement as read-only (true), writing (false) or unknown (null)",
    {
      sql: z.string().describe("The SQL text"),
      dialect: z.enum(SQL_DIALECT_NAMES).optional().describe("Engine whose extra write keywords apply"),
    },
    async ({ sql, dialect }) => {
      const readonly = dialect ? isReadonlySqlFor(sql, dialect) : isReadonlySql(sql);
      return textResult({ readonly });
    },
  );

  server.tool(
    "query_decisions",
    "Search the decision log",
    {
      search: z.string().optional().describe("Text to look for in command, cwd or reason"),
      action: z.enum(["allow", "ask", "deny"]).optional(),
      source: z.enum(["hook", "mcp"]).optional(),
      from: z.string().datetime().optional().describe("ISO timestamp, inclusive"),
      to: z.string().datetime().optional().describe("ISO timestamp, inclusive"),
      sort: z.enum(["time", "action", "cmd", "ms"]).optional(),
      order: z.enum(["asc", "desc"]).optional(),
      limit: z.number().int().positive().optional(),
      offset: z.number().int().nonnegative().optional(),
      after: z.string().optional().describe("Cursor from an earlier result"),
    },
    async (query) => {
      if (!store) return textResult({ error: "decision logging is disabled" }, true);
      try {
        return textResult(store.query(query));
      } catch (error) {
        return errorResult(error);
      }
    },
  );

  return server;
}

async function main() {
  const config = loadConfig(process.cwd());
  const store = await setupLogging(config);
  const transport = new StdioServerTransport();
  await createServer(store).connect(transport);
}

main().catch((error) => {
  console.error("cmdgate server error:", error);
  process.exit(1);
});
