import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { dirname, isAbsolute, join, resolve } from "path";
import picomatch from "picomatch";
import { z } from "zod";
import type { Config, Rule, RuleDecision, RuleMatch, RuleTarget } from "./types.js";

export const CONFIG_VERSION = 1;
export const PROJECT_CONFIG_FILE = ".cmdgate.json";

const SCRIPT_EXTENSIONS = [".sh", ".bash", ".py", ".rb", ".pl"];

export class ConfigError extends Error {
  constructor(message: string, readonly path?: string) {
    super(path ? `${path}: ${message}` : message);
    this.name = "ConfigError";
  }
}

const DIRECTIVES: Record<string, { decision: RuleDecision; target: RuleTarget }> = {
  allow: { decision: "allow", target: "command" },
  ask: { decision: "ask", target: "command" },
  deny: { decision: "deny", target: "command" },
  "allow-redirect": { decision: "allow", target: "redirect" },
  "ask-redirect": { decision: "ask", target: "redirect" },
  "deny-redirect": { decision: "deny", target: "redirect" },
};

const ruleSchema = z
  .object({
    allow: z.string().optional(),
    ask: z.string().optional(),
    deny: z.string().optional(),
    "allow-redirect": z.string().optional(),
    "ask-redirect": z.string().optional(),
    "deny-redirect": z.string().optional(),
    message: z.string().optional(),
  })
  .strict();

const configFileSchema = z
  .object({
    version: z.number().int().positive().optional(),
    rules: z.array(ruleSchema).optional(),
    aliases: z.record(z.string()).optional(),
    log: z
      .object({
        file: z.union([z.string(), z.literal(false)]).optional(),
        backend: z.enum(["jsonl", "sqlite"]).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof configFileSchema>;

export function defaultConfig(): Config {
  return {
    rules: [],
    aliases: {},
    projectRoot: null,
    logFile: join(homedir(), ".cmdgate", "logs", "decisions.jsonl"),
    logBackend: "jsonl",
  };
}

export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

function toRule(raw: z.infer<typeof ruleSchema>, index: number, source: string): Rule {
  const keys = Object.keys(raw).filter((key) => key in DIRECTIVES);
  if (keys.length !== 1) {
    throw new ConfigError(
      `rule ${index + 1} must have exactly one of ${Object.keys(DIRECTIVES).join(", ")}`,
      source,
    );
  }
  const [key] = keys;
  const pattern = Object.entries(raw).find(([k]) => k === key)?.[1] ?? "";
  if (!pattern.trim()) throw new ConfigError(`rule ${index + 1} has an empty pattern`, source);

  if (pattern.startsWith("re:")) {
    try {
      new RegExp(pattern.slice(3));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`rule ${index + 1}: invalid regular expression: ${message}`, source);
    }
  }

  const { decision, target } = DIRECTIVES[key];
  return { decision, target, pattern, message: raw.message, source };
}

/** Load and validate one config file. Throws ConfigError on any problem. */
export function loadConfigFile(path: string): ConfigFile & { rules: Rule[] } {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`cannot read config: ${message}`, path);
  }

  const parsed = configFileSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length ? `${issue.path.join(".")}: ` : "";
    throw new ConfigError(`${where}${issue.message}`, path);
  }

  const file = parsed.data;
  if ((file.version ?? CONFIG_VERSION) > CONFIG_VERSION) {
    throw new ConfigError(
      `config version ${file.version} is newer than supported version ${CONFIG_VERSION}`,
      path,
    );
  }
  return { ...file, rules: (file.rules ?? []).map((rule, i) => toRule(rule, i, path)) };
}

function mergeFile(base: Config, file: ConfigFile & { rules: Rule[] }, projectRoot: string | null): Config {
  const logFile = file.log?.file;
  return {
    rules: [...base.rules, ...file.rules],
    aliases: { ...base.aliases, ...(file.aliases ?? {}) },
    projectRoot: projectRoot ?? base.projectRoot,
    logFile: typeof logFile === "string" ? expandHome(logFile) : logFile === false ? false : base.logFile,
    logBackend: file.log?.backend ?? base.logBackend,
  };
}

/** Walk up from `cwd` looking for a project config file. */
export function findProjectConfig(cwd: string): string | null {
  let current = resolve(cwd);
  for (;;) {
    const candidate = join(current, PROJECT_CONFIG_FILE);
    if (existsSync(candidate)) return candidate;
    const parent = dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

export function globalConfigPath(): string {
  const override = process.env.CMDGATE_CONFIG;
  return override ? expandHome(override) : join(homedir(), ".cmdgate", "config.json");
}

/**
 * Global config, then the nearest project config above `cwd`. Rules are
 * concatenated (project rules last, so they win); aliases are merged.
 */
export function loadConfig(cwd?: string, globalPath = globalConfigPath()): Config {
  let config = defaultConfig();
  if (existsSync(globalPath)) {
    config = mergeFile(config, loadConfigFile(globalPath), null);
  }
  if (cwd) {
    const projectPath = findProjectConfig(cwd);
    if (projectPath && resolve(projectPath) !== resolve(globalPath)) {
      config = mergeFile(config, loadConfigFile(projectPath), dirname(projectPath));
    }
  }
  return config;
}

// --- matching ---

function isScriptPattern(pattern: string): boolean {
  return pattern.includes("/") || SCRIPT_EXTENSIONS.some((ext) => pattern.endsWith(ext));
}

function matchesScript(pattern: string, tokens: string[], projectRoot: string | null, cwd: string): boolean {
  if (tokens.length === 0) return false;
  const expanded = expandHome(pattern);
  let patternPath: string;
  if (isAbsolute(expanded)) patternPath = resolve(expanded);
  else if (projectRoot) patternPath = resolve(projectRoot, expanded);
  else return false;
  return resolve(cwd, expandHome(tokens[0])) === patternPath;
}

function matchesCommandPattern(
  pattern: string,
  tokens: string[],
  projectRoot: string | null,
  cwd: string,
): boolean {
  if (pattern.startsWith("re:")) {
    return new RegExp(pattern.slice(3), "y").test(tokens.join(" "));
  }
  if (isScriptPattern(pattern)) return matchesScript(pattern, tokens, projectRoot, cwd);

  const globs = pattern.trim().split(/\s+/);
  if (globs.length > tokens.length) return false;
  // bash mode: a single * also matches across "/" inside a token
  return globs.every((glob, i) => picomatch.isMatch(tokens[i], glob, { bash: true, dot: true }));
}

/** Last matching command rule wins. */
export function matchCommand(tokens: string[], config: Config, cwd: string): RuleMatch | null {
  let found: RuleMatch | null = null;
  for (const rule of config.rules) {
    if (rule.target !== "command") continue;
    if (matchesCommandPattern(rule.pattern, tokens, config.projectRoot, cwd)) {
      found = { decision: rule.decision, pattern: rule.pattern, message: rule.message };
    }
  }
  return found;
}

/** Last matching redirect rule wins. Targets and patterns resolve against `cwd`. */
export function matchRedirect(target: string, config: Config, cwd: string): RuleMatch | null {
  const path = resolve(cwd, expandHome(target));
  let found: RuleMatch | null = null;
  for (const rule of config.rules) {
    if (rule.target !== "redirect") continue;
    const glob = resolve(cwd, expandHome(rule.pattern));
    if (picomatch.isMatch(path, glob, { dot: true })) {
      found = { decision: rule.decision, pattern: rule.pattern, message: rule.message };
    }
  }
  return found;
}
