import { homedir } from "os";
import { isAbsolute, join, resolve } from "path";
import { matchCommand, matchRedirect } from "./config.js";
import { SAFE_COMMANDS } from "./data.js";
import { allow, ask, combine, decide, deny } from "./decision.js";
import { getHandler, hasHandler } from "./handlers/index.js";
import type { ArithNode, CommandNode, CondNode, Node, Redirect, Word, WordPart } from "./shell/ast.js";
import { isPureSubstitution } from "./shell/ast.js";
import { ParseError, parse } from "./shell/parser.js";
import type { Classification, Config, Decision, Handler, RuleMatch } from "./types.js";

export const DEFAULT_MAX_DEPTH = 64;

export interface AnalyzeOptions {
  /** Ceiling on AST nesting plus handler delegation. */
  maxDepth?: number;
}

interface Scope {
  config: Config;
  cwd: string;
  depth: number;
  maxDepth: number;
}

/** Wrapper commands and the options of theirs that take a separate value. */
const WRAPPERS = new Map<string, ReadonlySet<string>>([
  ["time", new Set(["-f", "--format", "-o", "--output"])],
  ["env", new Set(["-u", "--unset", "-C", "--chdir"])],
  ["timeout", new Set(["-s", "--signal", "-k", "--kill-after"])],
  ["nice", new Set(["-n", "--adjustment"])],
  ["nohup", new Set()],
  ["strace", new Set(["-e", "-o", "-p", "-s", "-u", "-E", "-a", "-b", "-I", "-O", "-S", "-X", "-P"])],
  ["ltrace", new Set(["-e", "-o", "-p", "-s", "-u", "-a", "-n"])],
  ["command", new Set()],
  ["builtin", new Set()],
  ["stdbuf", new Set(["-i", "-o", "-e"])],
  ["ionice", new Set(["-c", "-n", "-p", "-P", "-u", "--class", "--classdata"])],
]);

const DESCRIPTION_DEPTH = new Map([["aws", 3], ["gcloud", 3], ["az", 3]]);

const DESTRUCTIVE = [/\brm\s+\S/, /\bmv\s+/, /\bcp\s+/, /\bchmod\s+/, /\bchown\s+/, /\bsudo\s+/, /\bdd\s+/];

const OUTPUT_OPS = new Set([">", ">>", ">|", "&>", "&>>", "<>", ">&"]);
const DURATION = /^\d+(\.\d+)?[smhd]?$/;
const ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*(\[[^\]]*\])?\+?=/;

/**
 * Decide whether a shell command line may run unattended. Never throws:
 * anything that cannot be understood resolves to ask.
 */
export function analyze(command: string, config: Config, cwd: string, options: AnalyzeOptions = {}): Decision {
  return analyzeSource(command, {
    config,
    cwd,
    depth: 0,
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
  });
}

function analyzeSource(command: string, scope: Scope): Decision {
  const source = command.trim();
  if (!source) return ask("empty command");

  let nodes: Node[];
  try {
    nodes = parse(source);
  } catch (err) {
    if (err instanceof ParseError) return ask(`parse error: ${err.message}`);
    throw err;
  }
  if (nodes.length === 0) return ask("empty command");
  return combine(nodes.map((node) => analyzeNode(node, scope)));
}

function nested(scope: Scope): Scope {
  return { ...scope, depth: scope.depth + 1 };
}

function analyzeNode(node: Node, parent: Scope): Decision {
  const scope = nested(parent);
  if (scope.depth > scope.maxDepth) return ask("max nesting depth exceeded");

  switch (node.kind) {
    case "command":
      return analyzeCommand(node, scope);

    case "pipeline":
      return combine(node.commands.map((cmd) => analyzeNode(cmd, scope)));

    case "list": {
      const parts = node.parts.filter((part): part is Node => part.kind !== "operator");
      const target = parts.length > 0 ? cdTarget(parts[0]) : null;
      const listScope = target ? { ...scope, cwd: resolveCd(target, scope.cwd) } : scope;
      return combine(parts.map((part) => analyzeNode(part, listScope)));
    }

    case "if":
      return combine([
        analyzeNode(node.condition, scope),
        analyzeNode(node.thenBody, scope),
        ...(node.elseBody ? [analyzeNode(node.elseBody, scope)] : []),
        ...analyzeRedirects(node.redirects, scope),
      ]);

    case "while":
    case "until":
      return combine([
        analyzeNode(node.condition, scope),
        analyzeNode(node.body, scope),
        ...analyzeRedirects(node.redirects, scope),
      ]);

    case "for":
    case "select":
      return combine([
        analyzeNode(node.body, scope),
        ...(node.words ?? []).flatMap((word) => analyzeWordParts(word, scope)),
        ...analyzeRedirects(node.redirects, scope),
      ]);

    case "for-arith":
      return combine([
        analyzeNode(node.body, scope),
        ...[node.init, node.cond, node.incr].flatMap((expr) => analyzeArith(expr, scope)),
        ...analyzeRedirects(node.redirects, scope),
      ]);

    case "case": {
      const decisions = [
        ...analyzeWordParts(node.word, scope),
        ...node.items.map((item) => analyzeNode(item.body, scope)),
        ...analyzeRedirects(node.redirects, scope),
      ];
      return decisions.length ? combine(decisions) : allow("empty case");
    }

    case "function":
      // not run when defined, but whatever it runs later is judged now
      return analyzeNode(node.body, scope);

    case "subshell":
    case "brace-group":
      return combine([analyzeNode(node.body, scope), ...analyzeRedirects(node.redirects, scope)]);

    case "time":
    case "negation":
      return analyzeNode(node.pipeline, scope);

    case "coproc":
      return analyzeNode(node.command, scope);

    case "cond-expr": {
      const decisions = [...analyzeCond(node.body, scope), ...analyzeRedirects(node.redirects, scope)];
      return decisions.length ? combine(decisions) : allow("conditional");
    }

    case "arith-cmd": {
      const decisions = [...analyzeArith(node.expression, scope), ...analyzeRedirects(node.redirects, scope)];
      return decisions.length ? combine(decisions) : allow("arithmetic");
    }

    case "comment":
      return allow("comment");

    case "empty":
      return allow("empty");

    default:
      return ask(`unrecognized construct: ${kindOf(node)}`);
  }
}

/** Kind of a node the walker has no case for; typed `never` at compile time. */
function kindOf(node: never): string {
  const value: unknown = node;
  if (typeof value === "object" && value !== null && "kind" in value) return String(value.kind);
  return "unknown";
}

// --- cd tracking ---

function cdTarget(node: Node): string | null {
  if (node.kind !== "command" || node.words.length !== 2) return null;
  const [name, target] = node.words;
  if (name.text !== "cd") return null;
  if (!target.parts.every((part) => part.kind === "literal")) return null;
  return target.text;
}

function resolveCd(target: string, cwd: string): string {
  if (target === "~") return homedir();
  if (target.startsWith("~/")) return join(homedir(), target.slice(2));
  return isAbsolute(target) ? target : resolve(cwd, target);
}

// --- substitutions ---

function innerSource(source: string): string {
  if (source.startsWith("`")) return source.slice(1, -1);
  return source.slice(2, -1);
}

/** Decisions for every substitution reachable from one word part. */
function analyzePart(part: WordPart, scope: Scope): Decision[] {
  switch (part.kind) {
    case "cmdsub": {
      const inner = analyzeNode(part.command, scope);
      return [inner.action === "allow" ? inner : decide(inner.action, `cmdsub: ${inner.reason}`)];
    }
    case "procsub": {
      const inner = analyzeNode(part.command, scope);
      return [inner.action === "allow" ? inner : decide(inner.action, `procsub ${part.direction}(...): ${inner.reason}`)];
    }
    case "param":
      return [
        ...(part.index ? analyzeWordParts(part.index, scope) : []),
        ...(part.arg ? analyzeWordParts(part.arg, scope) : []),
      ];
    case "arith":
      return analyzeArith(part.expression, scope);
    case "literal":
      return [];
  }
}

function analyzeWordParts(word: Word, scope: Scope): Decision[] {
  return word.parts.flatMap((part) => analyzePart(part, scope));
}

function analyzeArith(node: ArithNode | null, scope: Scope): Decision[] {
  if (!node) return [];
  switch (node.kind) {
    case "number":
      return [];
    case "variable":
      return analyzeArith(node.index, scope);
    case "expansion":
      return analyzeWordParts(node.word, scope);
    case "unary":
    case "postfix":
      return analyzeArith(node.operand, scope);
    case "binary":
      return [...analyzeArith(node.left, scope), ...analyzeArith(node.right, scope)];
    case "assign":
      return [...analyzeArith(node.target, scope), ...analyzeArith(node.value, scope)];
    case "ternary":
      return [node.test, node.consequent, node.alternate].flatMap((child) => analyzeArith(child, scope));
    case "group":
      return analyzeArith(node.expression, scope);
  }
}

function analyzeCond(node: CondNode, scope: Scope): Decision[] {
  switch (node.kind) {
    case "unary-test":
      return analyzeWordParts(node.operand, scope);
    case "binary-test":
      return [...analyzeWordParts(node.left, scope), ...analyzeWordParts(node.right, scope)];
    case "cond-and":
    case "cond-or":
      return [...analyzeCond(node.left, scope), ...analyzeCond(node.right, scope)];
    case "cond-not":
      return analyzeCond(node.operand, scope);
    case "cond-paren":
      return analyzeCond(node.inner, scope);
  }
}

// --- redirects ---

function isOutputOp(op: string): boolean {
  return OUTPUT_OPS.has(op.replace(/^\d+/, ""));
}

function ruleDecision(match: RuleMatch, reason: string): Decision {
  const detail = match.message ?? match.pattern;
  if (match.decision === "allow") return allow(reason);
  return decide(match.decision, `${reason}: ${detail}`);
}

function analyzeRedirects(redirects: Redirect[], scope: Scope): Decision[] {
  const decisions: Decision[] = [];
  for (const redirect of redirects) {
    if (redirect.kind === "heredoc") {
      if (redirect.body) decisions.push(...analyzeWordParts(redirect.body, scope));
      continue;
    }

    decisions.push(...analyzeWordParts(redirect.target, scope));
    const target = redirect.target.text;
    if (target === "/dev/null" || target.startsWith("&")) continue;
    // descriptor duplication and closing: >&2, 2>&1, <&-
    if (redirect.op.endsWith("&") && /^(\d+|-)$/.test(target)) continue;
    if (!isOutputOp(redirect.op)) continue;

    const match = matchRedirect(target, scope.config, scope.cwd);
    decisions.push(match ? ruleDecision(match, `redirect to ${target}`) : ask(`redirect to ${target}`));
  }
  return decisions;
}

// --- commands ---

function analyzeCommand(node: CommandNode, scope: Scope): Decision {
  const words = node.words.map((word) => word.text);
  let baseIndex = 0;
  while (baseIndex < words.length && words[baseIndex].includes("=") && !words[baseIndex].startsWith("-")) {
    baseIndex++;
  }
  const base = baseIndex < words.length ? words[baseIndex] : "";
  const injectable = hasHandler(base) && !SAFE_COMMANDS.has(base);

  const decisions: Decision[] = [];
  for (const [position, word] of node.words.entries()) {
    for (const part of word.parts) {
      if (part.kind === "procsub") {
        const inner = analyzeNode(part.command, scope);
        if (inner.action !== "allow") {
          return decide(inner.action, `process substitution ${part.direction}(...): ${inner.reason}`);
        }
        decisions.push(inner);
      } else if (part.kind === "cmdsub") {
        const inner = analyzeNode(part.command, scope);
        if (inner.action !== "allow") {
          return decide(inner.action, `command substitution: ${inner.reason}`);
        }
        decisions.push(inner);
        // a computed argument can dodge the handler's token checks
        if (injectable && position > baseIndex && isPureSubstitution(word)) {
          return ask(`cmdsub injection risk: ${innerSource(part.source)}`);
        }
      } else if (part.kind === "param" || part.kind === "arith") {
        for (const inner of analyzePart(part, scope)) {
          if (inner.action !== "allow") return inner;
          decisions.push(inner);
        }
      }
    }
  }

  for (const redirect of analyzeRedirects(node.redirects, scope)) {
    if (redirect.action !== "allow") return redirect;
    decisions.push(redirect);
  }

  if (words.length === 0) return allow("empty command");
  if (base === "[" || base === "test") return combine([...decisions, allow("conditional test")]);

  decisions.push(classifyTokens(words.slice(baseIndex), scope, new Set()));
  return combine(decisions);
}

function describe(tokens: string[]): string {
  const handler = getHandler(tokens[0]);
  if (handler?.describe) return handler.describe(tokens);
  return tokens.slice(0, DESCRIPTION_DEPTH.get(tokens[0]) ?? 2).join(" ");
}

function isVersionOrHelp(tokens: string[]): boolean {
  if (tokens.length < 2) return false;
  if (tokens.length === 2 && ["help", "version", "--version", "--help", "-h"].includes(tokens[1])) return true;
  const last = tokens[tokens.length - 1];
  return (last === "--help" || last === "-h") && tokens.length <= 4;
}

/** Index of the wrapped command's first token, or tokens.length when there is none. */
function unwrap(tokens: string[], flagsWithValue: ReadonlySet<string>): number {
  const env = tokens[0] === "env";
  let i = 1;
  while (i < tokens.length) {
    const token = tokens[i];
    if (token === "--") return i + 1;
    if (flagsWithValue.has(token)) i += 2;
    else if (token.startsWith("-") || DURATION.test(token) || (env && ASSIGNMENT.test(token))) i++;
    else return i;
  }
  return i;
}

function classifyTokens(tokens: string[], scope: Scope, aliasesSeen: Set<string>): Decision {
  if (tokens.length === 0) return allow("env assignment");
  const [base] = tokens;
  const { config, cwd } = scope;

  const rule = matchCommand(tokens, config, cwd);
  if (rule) {
    const detail = rule.message ?? rule.pattern;
    if (rule.decision === "allow") return allow(`${base} (${rule.pattern})`);
    return rule.decision === "deny" ? deny(`${base}: ${detail}`) : ask(`${base}: ${detail}`);
  }

  if (Object.hasOwn(config.aliases, base) && !aliasesSeen.has(base)) {
    const expanded = config.aliases[base].trim().split(/\s+/).filter(Boolean);
    return classifyTokens([...expanded, ...tokens.slice(1)], scope, new Set([...aliasesSeen, base]));
  }

  const wrapperFlags = WRAPPERS.get(base);
  if (wrapperFlags) {
    if (base === "command" && (tokens[1] === "-v" || tokens[1] === "-V")) return allow("command -v");
    const start = unwrap(tokens, wrapperFlags);
    if (start < tokens.length) return classifyTokens(tokens.slice(start), scope, aliasesSeen);
    // bare env prints the environment
    return base === "env" ? allow("env") : ask(base);
  }

  if (SAFE_COMMANDS.has(base)) return allow(base);
  if (tokens.length === 2 && (tokens[1] === "--help" || tokens[1] === "--version")) return allow(`${base} --help`);
  const handler = getHandler(base);
  if (handler) return classifyWithHandler(handler, tokens, scope);
  if (isVersionOrHelp(tokens)) return allow(`${base} --help`);

  const joined = tokens.join(" ");
  if (DESTRUCTIVE.some((pattern) => pattern.test(joined))) return ask(`${describe(tokens)} (destructive)`);
  return ask(describe(tokens));
}

function classifyWithHandler(handler: Handler, tokens: string[], scope: Scope): Decision {
  const [base] = tokens;
  let result: Classification;
  try {
    result = handler.classify({ tokens, cwd: scope.cwd });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return ask(`${base}: handler error: ${message}`);
  }
  // `sh -c '...' -h` still runs the script
  if (result.action !== "delegate" && !handler.runsPrograms && isVersionOrHelp(tokens)) {
    return allow(`${base} --help`);
  }
  const description = result.description || describe(tokens);

  for (const target of result.redirectTargets ?? []) {
    const match = matchRedirect(target, scope.config, scope.cwd);
    if (!match) return ask(description);
    if (match.decision !== "allow") return ruleDecision(match, description);
  }

  if (result.action === "allow") return allow(description);
  if (result.action === "delegate" && result.innerCommand) {
    const inner = nested(scope);
    if (inner.depth > inner.maxDepth) return ask("max nesting depth exceeded");
    return analyzeSource(result.innerCommand, inner);
  }
  return ask(description);
}
