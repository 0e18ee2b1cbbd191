import { existsSync, readFileSync } from "fs";
import { z } from "zod";
import { severity } from "./decision.js";
import type { Action } from "./types.js";
import type { LogSource } from "./logger.js";

const lineSchema = z.object({
  timestamp: z.string(),
  command: z.string(),
  cwd: z.string(),
  duration_ms: z.number(),
  // lines written before the MCP server logged carry no source
  source: z.enum(["hook", "mcp"]).default("hook"),
  decision: z.object({ action: z.enum(["allow", "ask", "deny"]), reason: z.string() }),
});

/** A logged verdict. `id` is the row id (SQLite) or 1-based line number (JSONL). */
export type LogEntry = z.infer<typeof lineSchema> & { id: string };

export type LogSort = "time" | "action" | "cmd" | "ms";

export interface LogQuery {
  /** Case-insensitive text to find in the command, cwd or reason. */
  search?: string;
  action?: Action;
  source?: LogSource;
  /** ISO timestamps bounding the entries, inclusive. */
  from?: string;
  to?: string;
  sort?: LogSort;
  order?: "asc" | "desc";
  limit?: number;
  offset?: number;
  /** Cursor from an earlier result: only entries logged after it. */
  after?: string;
}

export interface LogQueryResult {
  entries: LogEntry[];
  /** Matching entries before pagination. */
  total: number;
  /** Highest id seen; pass back as `after` to poll for new entries. */
  cursor: string;
}

export interface LogStore {
  query(q: LogQuery): LogQueryResult;
}

export const DEFAULT_QUERY_LIMIT = 200;

/** Numeric form of a cursor; anything unparseable reads from the start. */
export function cursorId(after: string | undefined): number {
  const id = Number(after);
  return Number.isInteger(id) && id > 0 ? id : 0;
}

function readEntries(path: string): LogEntry[] {
  if (!existsSync(path)) return [];
  const entries: LogEntry[] = [];
  readFileSync(path, "utf-8").split("\n").forEach((line, i) => {
    if (!line.trim()) return;
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch {
      // a torn line from an append still in flight
      return;
    }
    const parsed = lineSchema.safeParse(json);
    if (parsed.success) entries.push({ ...parsed.data, id: String(i + 1) });
  });
  return entries;
}

function matches(entry: LogEntry, q: LogQuery, afterId: number): boolean {
  if (Number(entry.id) <= afterId) return false;
  if (q.action && entry.decision.action !== q.action) return false;
  if (q.source && entry.source !== q.source) return false;
  if (q.from && entry.timestamp < q.from) return false;
  if (q.to && entry.timestamp > q.to) return false;
  if (q.search) {
    const needle = q.search.toLowerCase();
    return [entry.command, entry.cwd, entry.decision.reason].some((text) => text.toLowerCase().includes(needle));
  }
  return true;
}

const COMPARATORS: Record<LogSort, (a: LogEntry, b: LogEntry) => number> = {
  time: (a, b) => a.timestamp.localeCompare(b.timestamp),
  action: (a, b) => severity(a.decision.action) - severity(b.decision.action),
  cmd: (a, b) => a.command.localeCompare(b.command),
  ms: (a, b) => a.duration_ms - b.duration_ms,
};

/** Filter, sort and page entries held in memory. Ties keep log order. */
export function queryEntries(all: LogEntry[], q: LogQuery): LogQueryResult {
  const afterId = cursorId(q.after);
  const matched = all.filter((entry) => matches(entry, q, afterId));

  const compare = COMPARATORS[q.sort ?? "time"];
  const direction = q.order === "asc" ? 1 : -1;
  const sorted = [...matched].sort((a, b) => (compare(a, b) || Number(a.id) - Number(b.id)) * direction);

  const offset = q.offset ?? 0;
  const limit = q.limit ?? DEFAULT_QUERY_LIMIT;
  const newest = matched.reduce((max, entry) => Math.max(max, Number(entry.id)), afterId);

  return { entries: sorted.slice(offset, offset + limit), total: matched.length, cursor: String(newest) };
}

/** Store over a JSONL decision log, re-read on every query. */
export function createJsonlStore(path: string): LogStore {
  return {
    query: (q) => queryEntries(readEntries(path), q),
  };
}
