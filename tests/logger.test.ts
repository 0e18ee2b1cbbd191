import { describe, it, expect, afterEach } from "vitest";
import {
  flushLogs,
  initLogger,
  initLoggerWithWriter,
  recordDecision,
  toDecisionLine,
  writeLogEntry,
  type DecisionRecord,
} from "../src/logger.js";
import { createJsonlStore, cursorId } from "../src/log-store.js";
import { allow, ask, deny } from "../src/decision.js";
import { readFile, rm, access, writeFile, mkdir } from "fs/promises";
import { join } from "path";
import { tmpdir } from "os";

const TEST_DIR = join(tmpdir(), `cmdgate-log-test-${process.pid}`);

function testLogFile(name: string): string {
  return join(TEST_DIR, name, "test.jsonl");
}

function record(command: string, decision = allow("ls"), overrides: Partial<DecisionRecord> = {}): DecisionRecord {
  return { command, cwd: "/tmp", decision, durationMs: 1, source: "hook", ...overrides };
}

async function readLines(file: string): Promise<Record<string, unknown>[]> {
  const content = await readFile(file, "utf-8");
  return content.trim().split("\n").map((line) => JSON.parse(line));
}

afterEach(async () => {
  initLogger(false);
  await rm(TEST_DIR, { recursive: true, force: true });
});

describe("toDecisionLine", () => {
  it("keeps the action and reason but not the children", () => {
    const line = toDecisionLine(
      record("rm -rf /", deny("rm: no", [allow("ls")]), { cwd: "/", durationMs: 42, source: "mcp" }),
      new Date("2024-05-01T10:00:00.000Z"),
    );
    expect(line).toEqual({
      timestamp: "2024-05-01T10:00:00.000Z",
      command: "rm -rf /",
      cwd: "/",
      duration_ms: 42,
      source: "mcp",
      decision: { action: "deny", reason: "rm: no" },
    });
  });
});

describe("logger", () => {
  it("writes a JSONL line per verdict", async () => {
    const logFile = testLogFile("basic");
    initLogger(logFile);
    writeLogEntry(record("ls -la", allow("ls"), { durationMs: 5 }));
    await flushLogs();

    const [entry] = await readLines(logFile);
    expect(entry).toMatchObject({
      command: "ls -la",
      cwd: "/tmp",
      duration_ms: 5,
      source: "hook",
      decision: { action: "allow", reason: "ls" },
    });
    expect(entry.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T/);
  });

  it("keeps lines in write order", async () => {
    const logFile = testLogFile("multi");
    initLogger(logFile);
    writeLogEntry(record("cmd1"));
    writeLogEntry(record("cmd2"));
    writeLogEntry(record("cmd3", allow("x"), { source: "mcp" }));
    await flushLogs();

    const lines = await readLines(logFile);
    expect(lines.map((l) => l.command)).toEqual(["cmd1", "cmd2", "cmd3"]);
    expect(lines[2].source).toBe("mcp");
  });

  it("does not write when disabled", async () => {
    const logFile = testLogFile("disabled");
    initLogger(false);
    writeLogEntry(record("rm -rf /", ask("rm -rf (destructive)")));
    await flushLogs();

    await expect(access(logFile)).rejects.toThrow();
  });

  it("creates missing directories", async () => {
    const logFile = join(TEST_DIR, "deep", "nested", "dir", "test.jsonl");
    initLogger(logFile);
    writeLogEntry(record("echo hello"));
    await flushLogs();

    const [entry] = await readLines(logFile);
    expect(entry.command).toBe("echo hello");
  });

  it("keeps write errors away from the caller", async () => {
    const logFile = testLogFile("error");
    initLogger(logFile);
    writeLogEntry(record("first"));
    await flushLogs();

    // the file from above is now used as a directory
    initLogger(join(logFile, "impossible", "path.jsonl"));
    writeLogEntry(record("second"));
    await expect(flushLogs()).resolves.toBeUndefined();

    expect(await readLines(logFile)).toHaveLength(1);
  });

  it("routes records to a custom writer", async () => {
    const seen: string[] = [];
    initLoggerWithWriter({
      write: ({ source, decision, command }) => {
        seen.push(`${source}:${decision.action}:${command}`);
      },
    });
    writeLogEntry(record("git status", allow("git status"), { source: "mcp" }));
    await flushLogs();

    expect(seen).toEqual(["mcp:allow:git status"]);
  });

  it("keeps a throwing writer away from the caller", () => {
    initLoggerWithWriter({
      write: () => {
        throw new Error("disk full");
      },
    });
    expect(() => writeLogEntry(record("ls"))).not.toThrow();
  });
});

describe("recordDecision", () => {
  it("returns the verdict and logs it", () => {
    const seen: DecisionRecord[] = [];
    initLoggerWithWriter({ write: (r) => seen.push(r) });

    const decision = recordDecision("mcp", "git push", "/repo", () => ask("git push"));
    expect(decision).toEqual(ask("git push"));
    expect(seen).toHaveLength(1);
    expect(seen[0]).toMatchObject({ command: "git push", cwd: "/repo", source: "mcp", decision });
    expect(seen[0].durationMs).toBeGreaterThanOrEqual(0);
  });
});

describe("cursorId", () => {
  it("reads positive integers and falls back to zero", () => {
    expect(cursorId("12")).toBe(12);
    expect(cursorId(undefined)).toBe(0);
    expect(cursorId("2024-01-01T00:00:00Z")).toBe(0);
    expect(cursorId("-3")).toBe(0);
  });
});

describe("JSONL LogStore", () => {
  async function seed(name: string, lines: object[]): Promise<string> {
    const file = testLogFile(name);
    await mkdir(join(TEST_DIR, name), { recursive: true });
    await writeFile(file, lines.map((l) => JSON.stringify(l)).join("\n") + "\n", "utf-8");
    return file;
  }

  const entry = (timestamp: string, command: string, action: string, reason: string, ms = 1) => ({
    timestamp,
    command,
    cwd: "/tmp",
    duration_ms: ms,
    source: "hook",
    decision: { action, reason },
  });

  it("returns an empty result for a missing file", () => {
    const result = createJsonlStore(testLogFile("missing")).query({});
    expect(result).toEqual({ entries: [], total: 0, cursor: "0" });
  });

  it("filters by action and sorts newest first", async () => {
    const file = await seed("filter", [
      entry("2024-01-01T00:00:01.000Z", "ls", "allow", "ls"),
      entry("2024-01-01T00:00:02.000Z", "git push", "ask", "git push"),
      entry("2024-01-01T00:00:03.000Z", "rm x", "ask", "rm x (destructive)"),
    ]);
    const result = createJsonlStore(file).query({ action: "ask" });
    expect(result.total).toBe(2);
    expect(result.entries.map((e) => e.command)).toEqual(["rm x", "git push"]);
    expect(result.entries.map((e) => e.id)).toEqual(["3", "2"]);
    expect(result.cursor).toBe("3");
  });

  it("searches case-insensitively", async () => {
    const file = await seed("search", [
      entry("2024-01-01T00:00:01.000Z", "ls", "allow", "ls"),
      entry("2024-01-01T00:00:02.000Z", "rm x", "ask", "rm x (Destructive)"),
    ]);
    const result = createJsonlStore(file).query({ search: "destructive" });
    expect(result.entries.map((e) => e.command)).toEqual(["rm x"]);
  });

  it("filters by time range", async () => {
    const file = await seed("range", [
      entry("2024-01-01T00:00:01.000Z", "one", "allow", "one"),
      entry("2024-01-01T00:00:02.000Z", "two", "allow", "two"),
      entry("2024-01-01T00:00:03.000Z", "three", "allow", "three"),
    ]);
    const result = createJsonlStore(file).query({
      from: "2024-01-01T00:00:02.000Z",
      to: "2024-01-01T00:00:02.500Z",
    });
    expect(result.entries.map((e) => e.command)).toEqual(["two"]);
  });

  it("skips malformed lines and defaults the source", async () => {
    const file = await seed("malformed", [
      { nope: true },
      { ...entry("2024-01-01T00:00:01.000Z", "ls", "allow", "ls"), source: undefined },
    ]);
    const result = createJsonlStore(file).query({});
    expect(result.total).toBe(1);
    expect(result.entries[0].id).toBe("2");
    expect(result.entries[0].source).toBe("hook");
  });

  it("polls for lines after the cursor", async () => {
    const file = await seed("cursor", [
      entry("2024-01-01T00:00:01.000Z", "one", "allow", "one"),
      entry("2024-01-01T00:00:02.000Z", "two", "allow", "two"),
    ]);
    const store = createJsonlStore(file);
    const result = store.query({ after: "1" });
    expect(result.entries.map((e) => e.command)).toEqual(["two"]);
    expect(result.cursor).toBe("2");

    expect(store.query({ after: "2" })).toEqual({ entries: [], total: 0, cursor: "2" });
  });

  it("sorts by severity", async () => {
    const file = await seed("severity", [
      entry("2024-01-01T00:00:01.000Z", "a", "ask", "a"),
      entry("2024-01-01T00:00:02.000Z", "b", "deny", "b"),
      entry("2024-01-01T00:00:03.000Z", "c", "allow", "c"),
    ]);
    const result = createJsonlStore(file).query({ sort: "action", order: "desc" });
    expect(result.entries.map((e) => e.decision.action)).toEqual(["deny", "ask", "allow"]);
  });

  it("sorts by duration and paginates", async () => {
    const file = await seed("paging", [
      entry("2024-01-01T00:00:01.000Z", "a", "allow", "a", 30),
      entry("2024-01-01T00:00:02.000Z", "b", "allow", "b", 10),
      entry("2024-01-01T00:00:03.000Z", "c", "allow", "c", 20),
    ]);
    const result = createJsonlStore(file).query({ sort: "ms", order: "asc", limit: 2, offset: 1 });
    expect(result.total).toBe(3);
    expect(result.entries.map((e) => e.command)).toEqual(["c", "a"]);
  });
});
