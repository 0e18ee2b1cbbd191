import { describe, it, expect, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import {
  ConfigError,
  defaultConfig,
  findProjectConfig,
  loadConfig,
  loadConfigFile,
  matchCommand,
  matchRedirect,
  PROJECT_CONFIG_FILE,
} from "../src/config.js";
import type { Config, Rule } from "../src/types.js";

let testDir: string;

function makeDir(): string {
  testDir = mkdtempSync(join(tmpdir(), "cmdgate-config-"));
  return testDir;
}

function writeJson(path: string, value: unknown): string {
  writeFileSync(path, JSON.stringify(value));
  return path;
}

function withRules(rules: Rule[], projectRoot: string | null = null): Config {
  return { ...defaultConfig(), rules, projectRoot };
}

afterEach(() => {
  if (testDir) rmSync(testDir, { recursive: true, force: true });
});

describe("loadConfigFile", () => {
  it("turns directives into rules", () => {
    const path = writeJson(join(makeDir(), "config.json"), {
      version: 1,
      rules: [{ allow: "make *" }, { "deny-redirect": "/etc/**", message: "system files" }],
      aliases: { g: "git" },
    });
    const file = loadConfigFile(path);
    expect(file.rules).toEqual([
      { decision: "allow", target: "command", pattern: "make *", message: undefined, source: path },
      { decision: "deny", target: "redirect", pattern: "/etc/**", message: "system files", source: path },
    ]);
    expect(file.aliases).toEqual({ g: "git" });
  });

  it("rejects a rule with two directives", () => {
    const path = writeJson(join(makeDir(), "config.json"), { rules: [{ allow: "ls", deny: "rm" }] });
    expect(() => loadConfigFile(path)).toThrow(
      `${path}: rule 1 must have exactly one of allow, ask, deny, allow-redirect, ask-redirect, deny-redirect`,
    );
  });

  it("rejects a rule with no directive", () => {
    const path = writeJson(join(makeDir(), "config.json"), { rules: [{ message: "hi" }] });
    expect(() => loadConfigFile(path)).toThrow(ConfigError);
  });

  it("rejects empty patterns", () => {
    const path = writeJson(join(makeDir(), "config.json"), { rules: [{ ask: "  " }] });
    expect(() => loadConfigFile(path)).toThrow(`${path}: rule 1 has an empty pattern`);
  });

  it("rejects invalid regular expressions", () => {
    const path = writeJson(join(makeDir(), "config.json"), { rules: [{ deny: "re:(" }] });
    expect(() => loadConfigFile(path)).toThrow(/rule 1: invalid regular expression: /);
  });

  it("rejects unknown keys", () => {
    const path = writeJson(join(makeDir(), "config.json"), { rulez: [] });
    expect(() => loadConfigFile(path)).toThrow(ConfigError);
  });

  it("reports where a field is wrong", () => {
    const path = writeJson(join(makeDir(), "config.json"), { rules: [{ allow: 5 }] });
    expect(() => loadConfigFile(path)).toThrow(new RegExp(`^${path}: rules\\.0\\.allow: `));
  });

  it("rejects newer config versions", () => {
    const path = writeJson(join(makeDir(), "config.json"), { version: 2 });
    expect(() => loadConfigFile(path)).toThrow(`${path}: config version 2 is newer than supported version 1`);
  });

  it("rejects malformed JSON", () => {
    const path = join(makeDir(), "config.json");
    writeFileSync(path, "{ not json");
    expect(() => loadConfigFile(path)).toThrow(new RegExp(`^${path}: cannot read config: `));
  });
});

describe("loadConfig", () => {
  it("returns defaults when nothing exists", () => {
    const dir = makeDir();
    expect(loadConfig(dir, join(dir, "missing.json"))).toEqual(defaultConfig());
  });

  it("puts project rules after global rules", () => {
    const dir = makeDir();
    const globalPath = writeJson(join(dir, "global.json"), {
      rules: [{ ask: "git push" }],
      aliases: { g: "git", k: "kubectl" },
    });
    const project = join(dir, "project");
    mkdirSync(join(project, "src"), { recursive: true });
    writeJson(join(project, PROJECT_CONFIG_FILE), {
      rules: [{ allow: "git push" }],
      aliases: { k: "kubectl --context dev" },
      log: { file: false },
    });

    const config = loadConfig(join(project, "src"), globalPath);
    expect(config.rules.map((r) => `${r.decision} ${r.pattern}`)).toEqual(["ask git push", "allow git push"]);
    expect(config.aliases).toEqual({ g: "git", k: "kubectl --context dev" });
    expect(config.projectRoot).toBe(project);
    expect(config.logFile).toBe(false);
  });

  it("picks the sqlite backend", () => {
    const dir = makeDir();
    const globalPath = writeJson(join(dir, "global.json"), { log: { file: "/var/log/cmdgate.jsonl", backend: "sqlite" } });
    const config = loadConfig(undefined, globalPath);
    expect(config.logFile).toBe("/var/log/cmdgate.jsonl");
    expect(config.logBackend).toBe("sqlite");
  });

  it("finds the nearest project config", () => {
    const dir = makeDir();
    const nested = join(dir, "a", "b");
    mkdirSync(nested, { recursive: true });
    writeJson(join(dir, "a", PROJECT_CONFIG_FILE), {});
    expect(findProjectConfig(nested)).toBe(join(dir, "a", PROJECT_CONFIG_FILE));
  });
});

describe("matchCommand", () => {
  it("matches one glob per token as a prefix", () => {
    const config = withRules([{ decision: "allow", target: "command", pattern: "npm run *" }]);
    expect(matchCommand(["npm", "run", "test", "--watch"], config, "/")).toEqual({
      decision: "allow",
      pattern: "npm run *",
      message: undefined,
    });
    expect(matchCommand(["npm", "install"], config, "/")).toBeNull();
    expect(matchCommand(["npm"], config, "/")).toBeNull();
  });

  it("lets the last matching rule win", () => {
    const config = withRules([
      { decision: "allow", target: "command", pattern: "git *" },
      { decision: "deny", target: "command", pattern: "git push", message: "no pushing" },
    ]);
    expect(matchCommand(["git", "push"], config, "/")?.decision).toBe("deny");
    expect(matchCommand(["git", "log"], config, "/")?.decision).toBe("allow");
  });

  it("matches regular expressions from the start", () => {
    const config = withRules([{ decision: "deny", target: "command", pattern: "re:kubectl (delete|apply)" }]);
    expect(matchCommand(["kubectl", "delete", "pod"], config, "/")?.decision).toBe("deny");
    expect(matchCommand(["echo", "kubectl", "delete"], config, "/")).toBeNull();
  });

  it("matches script paths against the project root", () => {
    const config = withRules([{ decision: "allow", target: "command", pattern: "scripts/build.sh" }], "/repo");
    expect(matchCommand(["./scripts/build.sh"], config, "/repo")?.decision).toBe("allow");
    expect(matchCommand(["../scripts/build.sh"], config, "/repo/src")?.decision).toBe("allow");
    expect(matchCommand(["./build.sh"], config, "/repo")).toBeNull();
  });

  it("ignores relative script patterns without a project", () => {
    const config = withRules([{ decision: "allow", target: "command", pattern: "deploy.sh" }]);
    expect(matchCommand(["deploy.sh"], config, "/repo")).toBeNull();
  });

  it("skips redirect rules", () => {
    const config = withRules([{ decision: "allow", target: "redirect", pattern: "*" }]);
    expect(matchCommand(["ls"], config, "/")).toBeNull();
  });
});

describe("matchRedirect", () => {
  it("resolves relative targets and patterns against cwd", () => {
    const config = withRules([{ decision: "allow", target: "redirect", pattern: "build/**" }]);
    expect(matchRedirect("build/out/log.txt", config, "/repo")?.decision).toBe("allow");
    expect(matchRedirect("/repo/build/a.txt", config, "/repo")?.decision).toBe("allow");
    expect(matchRedirect("out.txt", config, "/repo")).toBeNull();
  });

  it("matches dot files", () => {
    const config = withRules([{ decision: "deny", target: "redirect", pattern: "/home/**" }]);
    expect(matchRedirect("/home/dev/.bashrc", config, "/")?.decision).toBe("deny");
  });

  it("lets the last matching rule win", () => {
    const config = withRules([
      { decision: "allow", target: "redirect", pattern: "/tmp/**" },
      { decision: "ask", target: "redirect", pattern: "/tmp/keep/**", message: "kept files" },
    ]);
    expect(matchRedirect("/tmp/keep/a", config, "/")).toEqual({
      decision: "ask",
      pattern: "/tmp/keep/**",
      message: "kept files",
    });
    expect(matchRedirect("/tmp/other", config, "/")?.decision).toBe("allow");
  });
});
