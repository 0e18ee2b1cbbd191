import { z } from "zod";
import { ConfigError, loadConfig } from "./config.js";
import { ask } from "./decision.js";
import { analyze } from "./engine.js";
import { setupLogging } from "./log-setup.js";
import { recordDecision } from "./logger.js";
import type { Config, Decision } from "./types.js";

export const HOST_MODES = ["claude", "gemini", "cursor"] as const;
export type HostMode = (typeof HOST_MODES)[number];

export interface ShellRequest {
  command: string;
  cwd: string;
}

const claudeInput = z.object({
  tool_name: z.string(),
  tool_input: z.object({ command: z.string() }).passthrough(),
  cwd: z.string().optional(),
});

const cursorInput = z.object({
  command: z.string(),
  cwd: z.string().optional(),
});

/** Shell tool names per host; other tools get no verdict. */
const SHELL_TOOLS: Record<Exclude<HostMode, "cursor">, string> = {
  claude: "Bash",
  gemini: "run_shell_command",
};

export function resolveMode(argv: string[], env: NodeJS.ProcessEnv = process.env): HostMode {
  for (const mode of HOST_MODES) {
    if (argv.includes(`--${mode}`)) return mode;
  }
  const fromEnv = z.enum(HOST_MODES).safeParse(env.CMDGATE_MODE);
  return fromEnv.success ? fromEnv.data : "claude";
}

/** Extract the shell command from a host payload; null for other tools. */
export function parseHookInput(payload: unknown, mode: HostMode, fallbackCwd: string): ShellRequest | null {
  if (mode === "cursor") {
    const parsed = cursorInput.safeParse(payload);
    return parsed.success ? { command: parsed.data.command, cwd: parsed.data.cwd ?? fallbackCwd } : null;
  }
  const parsed = claudeInput.safeParse(payload);
  if (!parsed.success || parsed.data.tool_name !== SHELL_TOOLS[mode]) return null;
  return { command: parsed.data.tool_input.command, cwd: parsed.data.cwd ?? fallbackCwd };
}

/**
 * Render a decision in the host's JSON dialect. Ask renders as null (print
 * nothing) so the host's own confirmation prompt runs, unless `explicitAsk`.
 */
export function toHostResponse(decision: Decision, mode: HostMode, explicitAsk = false): object | null {
  if (decision.action === "ask" && !explicitAsk) return null;
  const { action, reason } = decision;
  switch (mode) {
    case "claude":
      return {
        hookSpecificOutput: {
          hookEventName: "PreToolUse",
          permissionDecision: action,
          permissionDecisionReason: reason,
        },
      };
    case "gemini":
      return { decision: action, reason };
    case "cursor":
      return { permission: action, user_message: reason, agent_message: reason };
  }
}

export interface HookOptions {
  mode: HostMode;
  explicitAsk?: boolean;
  fallbackCwd?: string;
  /** Config loader; defaults to global + project config files. */
  load?: (cwd: string) => Config;
  onError?: (message: string) => void;
}

/**
 * Handle one hook invocation: raw stdin in, the line to print out (or null
 * for no output).
 */
export async function runHook(raw: string, options: HookOptions): Promise<string | null> {
  const report = options.onError ?? ((message: string) => process.stderr.write(`cmdgate: ${message}\n`));

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    report(`invalid hook input: ${message}`);
    return null;
  }

  const request = parseHookInput(payload, options.mode, options.fallbackCwd ?? process.cwd());
  if (!request) return null;

  let decision: Decision;
  try {
    const config = (options.load ?? loadConfig)(request.cwd);
    await setupLogging(config);
    const { command, cwd } = request;
    decision = recordDecision("hook", command, cwd, () => analyze(command, config, cwd));
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    report(err.message);
    decision = ask(`config error: ${err.message}`);
  }

  const response = toHostResponse(decision, options.mode, options.explicitAsk);
  return response ? JSON.stringify(response) : null;
}
