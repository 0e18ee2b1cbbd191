import { appendFile, mkdir } from "fs/promises";
import { dirname } from "path";
import type { Decision } from "./types.js";

export type LogSource = "hook" | "mcp";

/** One verdict as it reaches the decision log. */
export interface DecisionRecord {
  command: string;
  cwd: string;
  decision: Decision;
  durationMs: number;
  source: LogSource;
}

/** Serialized form of a record: one JSONL line, or one SQLite row. */
export interface DecisionLine {
  timestamp: string;
  command: string;
  cwd: string;
  duration_ms: number;
  source: LogSource;
  decision: { action: Decision["action"]; reason: string };
}

export interface LogWriter {
  write(record: DecisionRecord): void;
  /** Resolves once buffered writes have landed. */
  flush?(): Promise<void>;
}

export function toDecisionLine(record: DecisionRecord, now = new Date()): DecisionLine {
  return {
    timestamp: now.toISOString(),
    command: record.command,
    cwd: record.cwd,
    duration_ms: record.durationMs,
    source: record.source,
    // child decisions stay out of the log
    decision: { action: record.decision.action, reason: record.decision.reason },
  };
}

function reportLogError(err: unknown): void {
  if (!process.env.CMDGATE_DEBUG) return;
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`cmdgate: log write failed: ${message}\n`);
}

/** Appends records to a JSONL file, one queued append at a time so lines keep their order. */
class JsonlWriter implements LogWriter {
  private queue: Promise<void> = Promise.resolve();
  private dirReady = false;

  constructor(private readonly path: string) {}

  write(record: DecisionRecord): void {
    const line = JSON.stringify(toDecisionLine(record)) + "\n";
    this.queue = this.queue.then(() => this.append(line)).catch(reportLogError);
  }

  flush(): Promise<void> {
    return this.queue;
  }

  private async append(line: string): Promise<void> {
    if (!this.dirReady) {
      await mkdir(dirname(this.path), { recursive: true });
      this.dirReady = true;
    }
    await appendFile(this.path, line, "utf-8");
  }
}

let activeWriter: LogWriter | null = null;

/** Log to a JSONL file, or pass `false` to turn logging off. */
export function initLogger(path: string | false): void {
  activeWriter = path === false ? null : new JsonlWriter(path);
}

export function initLoggerWithWriter(writer: LogWriter): void {
  activeWriter = writer;
}

/**
 * Fire-and-forget: a failing writer never reaches the caller. Failures are
 * reported on stderr only when CMDGATE_DEBUG is set.
 */
export function writeLogEntry(record: DecisionRecord): void {
  if (!activeWriter) return;
  try {
    activeWriter.write(record);
  } catch (err) {
    reportLogError(err);
  }
}

/** Run one check, log its verdict with the time it took, and return the verdict. */
export function recordDecision(
  source: LogSource,
  command: string,
  cwd: string,
  check: () => Decision,
): Decision {
  const start = Date.now();
  const decision = check();
  writeLogEntry({ command, cwd, decision, durationMs: Date.now() - start, source });
  return decision;
}

/** The hook awaits this before exiting so queued lines are not lost. */
export async function flushLogs(): Promise<void> {
  await activeWriter?.flush?.();
}
