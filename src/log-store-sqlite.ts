import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import { cursorId, DEFAULT_QUERY_LIMIT, type LogEntry, type LogQuery, type LogSort, type LogStore } from "./log-store.js";
import { toDecisionLine, type DecisionRecord, type LogSource, type LogWriter } from "./logger.js";
import type { Action } from "./types.js";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS decisions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  timestamp TEXT NOT NULL,
  command TEXT NOT NULL,
  cwd TEXT NOT NULL,
  duration_ms INTEGER NOT NULL,
  source TEXT NOT NULL,
  action TEXT NOT NULL,
  reason TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_decisions_timestamp ON decisions(timestamp);
CREATE INDEX IF NOT EXISTS idx_decisions_action ON decisions(action);
`;

interface DecisionRow {
  id: number;
  timestamp: string;
  command: string;
  cwd: string;
  duration_ms: number;
  source: LogSource;
  action: Action;
  reason: string;
}

const ORDER_BY: Record<LogSort, string> = {
  time: "timestamp",
  action: "CASE action WHEN 'allow' THEN 0 WHEN 'ask' THEN 1 ELSE 2 END",
  cmd: "command",
  ms: "duration_ms",
};

type Param = string | number;

/** WHERE clause and its parameters; mirrors the JSONL store's filters. */
function buildFilter(q: LogQuery): { where: string; params: Param[] } {
  const conditions: string[] = ["id > ?"];
  const params: Param[] = [cursorId(q.after)];
  const add = (condition: string, ...values: Param[]) => {
    conditions.push(condition);
    params.push(...values);
  };

  if (q.action) add("action = ?", q.action);
  if (q.source) add("source = ?", q.source);
  if (q.from) add("timestamp >= ?", q.from);
  if (q.to) add("timestamp <= ?", q.to);
  if (q.search) {
    // LIKE is case-insensitive for ASCII only
    const pattern = `%${q.search.replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`;
    add("(command LIKE ? ESCAPE '\\' OR cwd LIKE ? ESCAPE '\\' OR reason LIKE ? ESCAPE '\\')", pattern, pattern, pattern);
  }
  return { where: `WHERE ${conditions.join(" AND ")}`, params };
}

function toEntry(row: DecisionRow): LogEntry {
  return {
    id: String(row.id),
    timestamp: row.timestamp,
    command: row.command,
    cwd: row.cwd,
    duration_ms: row.duration_ms,
    source: row.source,
    decision: { action: row.action, reason: row.reason },
  };
}

export interface SqliteStore extends LogStore, LogWriter {
  close(): void;
}

/** Decision log in a SQLite database; one store both writes and queries. */
export function createSqliteStore(dbPath: string): SqliteStore {
  mkdirSync(dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.exec(SCHEMA);

  const insert = db.prepare(`
    INSERT INTO decisions (timestamp, command, cwd, duration_ms, source, action, reason)
    VALUES (@timestamp, @command, @cwd, @duration_ms, @source, @action, @reason)
  `);

  return {
    write(record: DecisionRecord): void {
      const { decision, ...line } = toDecisionLine(record);
      insert.run({ ...line, ...decision });
    },

    query(q) {
      const { where, params } = buildFilter(q);
      const stats = db
        .prepare<Param[], { total: number; newest: number | null }>(
          `SELECT COUNT(*) AS total, MAX(id) AS newest FROM decisions ${where}`,
        )
        .get(...params);

      const direction = q.order === "asc" ? "ASC" : "DESC";
      const rows = db
        .prepare<Param[], DecisionRow>(
          `SELECT * FROM decisions ${where} ORDER BY ${ORDER_BY[q.sort ?? "time"]} ${direction}, id ${direction} LIMIT ? OFFSET ?`,
        )
        .all(...params, q.limit ?? DEFAULT_QUERY_LIMIT, q.offset ?? 0);

      return {
        entries: rows.map(toEntry),
        total: stats?.total ?? 0,
        cursor: String(stats?.newest ?? cursorId(q.after)),
      };
    },

    close(): void {
      db.close();
    },
  };
}
