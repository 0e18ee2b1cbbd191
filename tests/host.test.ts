import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { defaultConfig, ConfigError } from "../src/config.js";
import { allow, ask, deny } from "../src/decision.js";
import { parseHookInput, resolveMode, runHook, toHostResponse } from "../src/host.js";
import { flushLogs, initLogger } from "../src/logger.js";
import type { Config } from "../src/types.js";

const quiet: Config = { ...defaultConfig(), logFile: false };

function bashPayload(command: string, tool = "Bash"): string {
  return JSON.stringify({ tool_name: tool, tool_input: { command }, cwd: "/work" });
}

let testDir: string | null = null;

afterEach(() => {
  initLogger(false);
  if (testDir) rmSync(testDir, { recursive: true, force: true });
  testDir = null;
});

describe("resolveMode", () => {
  it("prefers a command-line flag", () => {
    expect(resolveMode(["--gemini"], { CMDGATE_MODE: "cursor" })).toBe("gemini");
  });

  it("falls back to the environment, then claude", () => {
    expect(resolveMode([], { CMDGATE_MODE: "cursor" })).toBe("cursor");
    expect(resolveMode([], { CMDGATE_MODE: "vim" })).toBe("claude");
    expect(resolveMode([], {})).toBe("claude");
  });
});

describe("parseHookInput", () => {
  it("reads the shell tool of each host", () => {
    expect(parseHookInput({ tool_name: "Bash", tool_input: { command: "ls" }, cwd: "/a" }, "claude", "/x")).toEqual({
      command: "ls",
      cwd: "/a",
    });
    expect(parseHookInput({ tool_name: "run_shell_command", tool_input: { command: "ls" } }, "gemini", "/x")).toEqual({
      command: "ls",
      cwd: "/x",
    });
    expect(parseHookInput({ command: "ls", cwd: "/c" }, "cursor", "/x")).toEqual({ command: "ls", cwd: "/c" });
  });

  it("ignores other tools and malformed payloads", () => {
    expect(parseHookInput({ tool_name: "Edit", tool_input: { command: "ls" } }, "claude", "/x")).toBeNull();
    expect(parseHookInput({ tool_name: "Bash", tool_input: { command: "ls" } }, "gemini", "/x")).toBeNull();
    expect(parseHookInput({ tool_name: "Bash" }, "claude", "/x")).toBeNull();
    expect(parseHookInput("ls", "cursor", "/x")).toBeNull();
  });
});

describe("toHostResponse", () => {
  it("speaks each host's dialect", () => {
    expect(toHostResponse(allow("ls"), "claude")).toEqual({
      hookSpecificOutput: {
        hookEventName: "PreToolUse",
        permissionDecision: "allow",
        permissionDecisionReason: "ls",
      },
    });
    expect(toHostResponse(deny("rm: no"), "gemini")).toEqual({ decision: "deny", reason: "rm: no" });
    expect(toHostResponse(allow("ls"), "cursor")).toEqual({
      permission: "allow",
      user_message: "ls",
      agent_message: "ls",
    });
  });

  it("stays silent on ask unless told otherwise", () => {
    expect(toHostResponse(ask("git push"), "claude")).toBeNull();
    expect(toHostResponse(ask("git push"), "gemini", true)).toEqual({ decision: "ask", reason: "git push" });
  });
});

describe("runHook", () => {
  it("prints a verdict for allowed commands", async () => {
    const output = await runHook(bashPayload("git status"), { mode: "claude", load: () => quiet });
    expect(output).toBe(
      JSON.stringify({
        hookSpecificOutput: {
          hookEventName: "PreToolUse",
          permissionDecision: "allow",
          permissionDecisionReason: "git status",
        },
      }),
    );
  });

  it("prints nothing on ask", async () => {
    expect(await runHook(bashPayload("git push"), { mode: "claude", load: () => quiet })).toBeNull();
  });

  it("prints ask when explicit", async () => {
    const output = await runHook(bashPayload("git push", "run_shell_command"), {
      mode: "gemini",
      explicitAsk: true,
      load: () => quiet,
    });
    expect(output).toBe('{"decision":"ask","reason":"git push"}');
  });

  it("ignores other tools", async () => {
    expect(await runHook(bashPayload("ls", "Read"), { mode: "claude", load: () => quiet })).toBeNull();
  });

  it("reports invalid JSON", async () => {
    const errors: string[] = [];
    const output = await runHook("{oops", { mode: "claude", onError: (m) => errors.push(m) });
    expect(output).toBeNull();
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatch(/^invalid hook input: /);
  });

  it("asks when the config is broken", async () => {
    const errors: string[] = [];
    const output = await runHook(JSON.stringify({ command: "ls" }), {
      mode: "cursor",
      explicitAsk: true,
      load: () => {
        throw new ConfigError("rule 1 has an empty pattern", "/work/.cmdgate.json");
      },
      onError: (m) => errors.push(m),
    });
    const reason = "config error: /work/.cmdgate.json: rule 1 has an empty pattern";
    expect(JSON.parse(output ?? "null")).toEqual({ permission: "ask", user_message: reason, agent_message: reason });
    expect(errors).toEqual(["/work/.cmdgate.json: rule 1 has an empty pattern"]);
  });

  it("logs the decision", async () => {
    testDir = mkdtempSync(join(tmpdir(), "cmdgate-host-"));
    const logFile = join(testDir, "decisions.jsonl");
    await runHook(bashPayload("ls"), { mode: "claude", load: () => ({ ...defaultConfig(), logFile }) });
    await flushLogs();

    const entry = JSON.parse(readFileSync(logFile, "utf-8").trim());
    expect(entry).toMatchObject({ command: "ls", cwd: "/work", source: "hook", decision: { action: "allow", reason: "ls" } });
  });
});
