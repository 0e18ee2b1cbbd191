import { describe, it, expect } from "vitest";
import { analyze } from "../src/engine.js";
import { defaultConfig } from "../src/config.js";
import type { Config, Rule } from "../src/types.js";

function config(rules: Omit<Rule, "source">[] = [], aliases: Record<string, string> = {}): Config {
  return { ...defaultConfig(), logFile: false, rules, aliases };
}

function verdict(command: string, cfg = config(), cwd = "/work") {
  const { action, reason } = analyze(command, cfg, cwd);
  return { action, reason };
}

describe("analyze", () => {
  it("allows read-only git", () => {
    expect(verdict("git status")).toEqual({ action: "allow", reason: "git status" });
  });

  it("asks before pushing", () => {
    expect(verdict("git push")).toEqual({ action: "ask", reason: "git push" });
  });

  it("asks for destructive command substitutions", () => {
    expect(verdict("echo $(rm -rf /)")).toEqual({
      action: "ask",
      reason: "command substitution: rm -rf (destructive)",
    });
  });

  it("allows pipelines and lists of safe commands", () => {
    expect(verdict("ls | grep foo && pwd")).toEqual({ action: "allow", reason: "ls, grep, pwd" });
  });

  it("reports only the reasons at the winning level", () => {
    expect(verdict("git status; git push")).toEqual({ action: "ask", reason: "git push" });
  });

  it("asks for empty input and parse errors", () => {
    expect(verdict("")).toEqual({ action: "ask", reason: "empty command" });
    expect(verdict("   ")).toEqual({ action: "ask", reason: "empty command" });
    expect(verdict("echo 'unterminated")).toEqual({ action: "ask", reason: "parse error: unterminated single quote" });
  });

  it("describes unknown and destructive commands", () => {
    expect(verdict("rm -rf build")).toEqual({ action: "ask", reason: "rm -rf (destructive)" });
    expect(verdict("make deploy now")).toEqual({ action: "ask", reason: "make deploy" });
    expect(verdict("aws s3 ls my-bucket")).toEqual({ action: "ask", reason: "aws s3 ls" });
  });

  it("keeps the children of a combined decision", () => {
    const decision = analyze("ls | wc -l", config(), "/work");
    expect(decision.children).toHaveLength(1);
    expect(decision.children[0].children.map((c) => c.reason)).toEqual(["ls", "wc"]);
  });

  it("is idempotent", () => {
    const cfg = config();
    expect(analyze("cat a | sort > b", cfg, "/work")).toEqual(analyze("cat a | sort > b", cfg, "/work"));
  });

  it("stops at the nesting ceiling", () => {
    expect(analyze("git status", config(), "/", { maxDepth: 0 })).toMatchObject({
      action: "ask",
      reason: "max nesting depth exceeded",
    });
  });
});

describe("help and version", () => {
  it("allows help output", () => {
    expect(verdict("rm --help")).toEqual({ action: "allow", reason: "rm --help" });
    expect(verdict("git --version")).toEqual({ action: "allow", reason: "git --help" });
    expect(verdict("terraform plan -h")).toEqual({ action: "allow", reason: "terraform --help" });
  });

  it("allows help for handled commands", () => {
    expect(verdict("git push --help")).toEqual({ action: "allow", reason: "git --help" });
    expect(verdict("git push -h")).toEqual({ action: "allow", reason: "git --help" });
  });

  it("lets handlers see a trailing -h first", () => {
    expect(verdict("sh -c 'rm -rf x' -h")).toEqual({ action: "ask", reason: "rm -rf (destructive)" });
  });

  it("leaves a trailing -h to the program a command runs", () => {
    expect(verdict("bash deploy.sh -h")).toEqual({ action: "ask", reason: "bash deploy.sh" });
    expect(verdict("python3 script.py -h")).toEqual({
      action: "ask",
      reason: "python3 script.py: file not found: /work/script.py",
    });
  });
});

describe("deep nesting", () => {
  const tooDeep = { action: "ask", reason: "parse error: maximum nesting depth exceeded" };

  it("stops at nested subshells", () => {
    expect(verdict("(".repeat(3000) + "ls" + ")".repeat(3000))).toEqual(tooDeep);
  });

  it("stops at nested arithmetic", () => {
    expect(verdict("echo $((" + "(".repeat(3000) + "1" + ")".repeat(3000) + "))")).toEqual(tooDeep);
  });

  it("stops at nested parameter defaults", () => {
    expect(verdict("echo " + "${a:-".repeat(3000) + "x" + "}".repeat(3000))).toEqual(tooDeep);
  });

  it("stops at nested conditional groups", () => {
    expect(verdict("[[ " + "( ".repeat(3000) + "-n x" + " )".repeat(3000) + " ]]")).toEqual(tooDeep);
    expect(verdict("[[ " + "! ".repeat(3000) + "-n x ]]")).toEqual(tooDeep);
  });
});

describe("substitutions", () => {
  it("flags a computed argument to a handled command", () => {
    expect(verdict("git $(echo status)")).toEqual({ action: "ask", reason: "cmdsub injection risk: echo status" });
  });

  it("allows safe substitutions in safe commands", () => {
    expect(verdict("ls $(pwd)")).toEqual({ action: "allow", reason: "pwd, ls" });
  });

  it("checks process substitutions", () => {
    expect(verdict("diff <(ls a) <(ls b)")).toEqual({ action: "allow", reason: "ls, ls, diff" });
    expect(verdict("cat <(rm -rf x)")).toEqual({
      action: "ask",
      reason: "process substitution <(...): rm -rf (destructive)",
    });
  });

  it("looks inside parameter and arithmetic expansions", () => {
    expect(verdict("echo ${x:-$(git push)}")).toEqual({ action: "ask", reason: "cmdsub: git push" });
    expect(verdict("echo $((1 + $(git push)))")).toEqual({ action: "ask", reason: "cmdsub: git push" });
    expect(verdict("(( x = $(git push) ))")).toEqual({ action: "ask", reason: "cmdsub: git push" });
  });

  it("scans unquoted heredoc bodies", () => {
    expect(verdict("cat <<EOF\n$(rm -rf x)\nEOF")).toEqual({ action: "ask", reason: "cmdsub: rm -rf (destructive)" });
    expect(verdict("cat <<'EOF'\n$(rm -rf x)\nEOF")).toEqual({ action: "allow", reason: "cat" });
  });
});

describe("redirects", () => {
  it("asks for output redirects without a rule", () => {
    expect(verdict("cat file > out.txt")).toEqual({ action: "ask", reason: "redirect to out.txt" });
  });

  it("skips /dev/null and descriptor duplication", () => {
    expect(verdict("ls > /dev/null 2>&1")).toEqual({ action: "allow", reason: "ls" });
    expect(verdict("echo oops >&2")).toEqual({ action: "allow", reason: "echo" });
  });

  it("applies redirect rules", () => {
    const cfg = config([
      { decision: "allow", target: "redirect", pattern: "/tmp/**" },
      { decision: "deny", target: "redirect", pattern: "/etc/**", message: "system files" },
    ]);
    expect(verdict("echo hi > /tmp/out.txt", cfg)).toEqual({ action: "allow", reason: "redirect to /tmp/out.txt, echo" });
    expect(verdict("echo x > /etc/passwd", cfg)).toEqual({ action: "deny", reason: "redirect to /etc/passwd: system files" });
  });

  it("checks files a handler writes", () => {
    expect(verdict("echo hi | tee out.log")).toEqual({ action: "ask", reason: "tee out.log" });
    const cfg = config([{ decision: "allow", target: "redirect", pattern: "/tmp/**" }]);
    expect(verdict("echo hi | tee out.log", cfg, "/tmp")).toEqual({ action: "allow", reason: "echo, tee out.log" });
  });

  it("resolves targets against a leading cd", () => {
    const cfg = config([{ decision: "allow", target: "redirect", pattern: "/work/build/**" }]);
    expect(verdict("cd build && echo hi > log.txt", cfg)).toEqual({
      action: "allow",
      reason: "cd, redirect to log.txt, echo",
    });
  });
});

describe("rules and aliases", () => {
  it("lets operator rules decide", () => {
    const cfg = config([
      { decision: "deny", target: "command", pattern: "git push", message: "ask first" },
      { decision: "allow", target: "command", pattern: "make build" },
      { decision: "deny", target: "command", pattern: "rm", message: "no deletes" },
    ]);
    expect(verdict("git push --force", cfg)).toEqual({ action: "deny", reason: "git: ask first" });
    expect(verdict("make build", cfg)).toEqual({ action: "allow", reason: "make (make build)" });
    expect(verdict("git status && rm -rf x", cfg)).toEqual({ action: "deny", reason: "rm: no deletes" });
  });

  it("uses the last matching rule", () => {
    const cfg = config([
      { decision: "deny", target: "command", pattern: "git push" },
      { decision: "allow", target: "command", pattern: "git push" },
    ]);
    expect(verdict("git push", cfg)).toEqual({ action: "allow", reason: "git (git push)" });
  });

  it("expands aliases", () => {
    expect(verdict("g status", config([], { g: "git" }))).toEqual({ action: "allow", reason: "git status" });
  });

  it("stops alias loops", () => {
    expect(verdict("a x", config([], { a: "b", b: "a" }))).toEqual({ action: "ask", reason: "a x" });
  });

  it("ignores names inherited from Object.prototype", () => {
    expect(verdict("constructor x")).toEqual({ action: "ask", reason: "constructor x" });
    expect(verdict("toString")).toEqual({ action: "ask", reason: "toString" });
  });
});

describe("wrappers and assignments", () => {
  it("looks through wrapper commands", () => {
    expect(verdict("timeout 5 git status")).toEqual({ action: "allow", reason: "git status" });
    expect(verdict("env FOO=1 ls")).toEqual({ action: "allow", reason: "ls" });
    expect(verdict("nice -n 10 git push")).toEqual({ action: "ask", reason: "git push" });
    expect(verdict("time git push")).toEqual({ action: "ask", reason: "git push" });
  });

  it("handles wrappers with nothing to run", () => {
    expect(verdict("env")).toEqual({ action: "allow", reason: "env" });
    expect(verdict("nohup")).toEqual({ action: "ask", reason: "nohup" });
    expect(verdict("command -v git")).toEqual({ action: "allow", reason: "command -v" });
  });

  it("skips leading assignments", () => {
    expect(verdict("FOO=bar")).toEqual({ action: "allow", reason: "env assignment" });
    expect(verdict("FOO=bar git push")).toEqual({ action: "ask", reason: "git push" });
  });
});

describe("delegation", () => {
  it("analyzes shell -c strings", () => {
    expect(verdict("bash -c 'git status'")).toEqual({ action: "allow", reason: "git status" });
    expect(verdict("sh -c 'ls && git push'")).toEqual({ action: "ask", reason: "git push" });
  });

  it("asks for dot-commands in a read-only sqlite3 session", () => {
    expect(verdict('sqlite3 -readonly db.sqlite ".shell rm -rf /"')).toEqual({
      action: "ask",
      reason: "sqlite3 (dot-command)",
    });
    expect(verdict('sqlite3 -readonly db.sqlite "SELECT 1"')).toEqual({
      action: "allow",
      reason: "sqlite3 (read-only mode)",
    });
  });

  it("analyzes the command xargs runs", () => {
    expect(verdict("find . -name '*.log' | xargs grep error")).toEqual({ action: "allow", reason: "find, grep" });
    expect(verdict("ls | xargs rm")).toEqual({ action: "ask", reason: "rm" });
  });
});

describe("compound commands", () => {
  it("walks loops and conditionals", () => {
    expect(verdict("for f in *.txt; do wc -l $f; done")).toEqual({ action: "allow", reason: "wc" });
    expect(verdict("while true; do sleep 1; done")).toEqual({ action: "allow", reason: "true, sleep" });
    expect(verdict("if [ -f x ]; then rm x; fi")).toEqual({ action: "ask", reason: "rm x (destructive)" });
    expect(verdict("case $x in a) git push;; esac")).toEqual({ action: "ask", reason: "git push" });
  });

  it("walks functions, groups and conditionals", () => {
    expect(verdict("f() { rm -rf /; }")).toEqual({ action: "ask", reason: "rm -rf (destructive)" });
    expect(verdict("(cd /tmp && ls)")).toEqual({ action: "allow", reason: "cd, ls" });
    expect(verdict("[[ -n $(git push) ]]")).toEqual({ action: "ask", reason: "cmdsub: git push" });
    expect(verdict("[[ -n $x ]]")).toEqual({ action: "allow", reason: "conditional" });
  });

  it("allows comments", () => {
    expect(verdict("ls # just listing")).toEqual({ action: "allow", reason: "ls, comment" });
  });
});
