import { readFileSync, statSync } from "fs";
import { extname } from "path";
import { parser } from "@lezer/python";
import type { SyntaxNode } from "@lezer/common";
import { PYTHON_SAFETY } from "./data.js";
import type { Violation, ViolationKind } from "./types.js";

const MAX_SCRIPT_BYTES = 100_000;

const SAFE_MODULES = new Set(PYTHON_SAFETY.safeModules);
const DANGEROUS_MODULES = new Set(PYTHON_SAFETY.dangerousModules);
const DANGEROUS_BUILTINS = new Set(PYTHON_SAFETY.dangerousBuiltins);
const DANGEROUS_METHODS = new Set(PYTHON_SAFETY.dangerousMethods);
const REFLECTION_ATTRIBUTES = new Set(PYTHON_SAFETY.reflectionAttributes);
const DANGEROUS_NAMES = new Set(["__builtins__", "__loader__", "__spec__"]);

const ASYNC_DETAIL = new Map([
  ["FunctionDefinition", "async functions require asyncio"],
  ["ForStatement", "async for requires asyncio"],
  ["WithStatement", "async with requires asyncio"],
]);

export interface ScriptVerdict {
  safe: boolean;
  reason: string;
}

function lineIndex(source: string): (offset: number) => { line: number; col: number } {
  const starts = [0];
  for (let i = 0; i < source.length; i++) {
    if (source[i] === "\n") starts.push(i + 1);
  }
  return (offset) => {
    let lo = 0;
    let hi = starts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (starts[mid] <= offset) lo = mid;
      else hi = mid - 1;
    }
    return { line: lo + 1, col: offset - starts[lo] };
  };
}

/** Module names an import statement pulls in; `null` marks `from . import x`. */
function importedModules(text: string): (string | null)[] {
  const flat = text.replace(/\\\n/g, " ").replace(/[()]/g, " ").replace(/\s+/g, " ").trim();
  const from = /^from (\.*) ?([\w.]*) import\b/.exec(flat);
  if (from) return [from[2] ? from[2] : null];
  return flat
    .replace(/^import /, "")
    .split(",")
    .map((item) => item.trim().split(" ")[0])
    .filter((name) => name.length > 0);
}

function moduleProblem(module: string): string | null {
  const root = module.split(".")[0];
  if (DANGEROUS_MODULES.has(module) || DANGEROUS_MODULES.has(root)) return `dangerous module: ${module}`;
  if (!SAFE_MODULES.has(module) && !SAFE_MODULES.has(root)) return `unknown module: ${module}`;
  return null;
}

const PUNCTUATION = new Set(["(", ")", "Comment"]);

/** `((f))` is `f`: the tree keeps a node per pair of parentheses. */
function unwrapParens(node: SyntaxNode): SyntaxNode {
  let current = node;
  while (current.name === "ParenthesizedExpression") {
    let inner = current.firstChild;
    while (inner && PUNCTUATION.has(inner.name)) inner = inner.nextSibling;
    if (!inner) break;
    current = inner;
  }
  return current;
}

function calleeOf(call: SyntaxNode): SyntaxNode | null {
  const callee = call.firstChild;
  return callee ? unwrapParens(callee) : null;
}

function calleeName(call: SyntaxNode, source: string): string | null {
  const callee = calleeOf(call);
  if (callee?.name !== "VariableName") return null;
  return source.slice(callee.from, callee.to);
}

function insideFunction(node: SyntaxNode): boolean {
  for (let parent = node.parent; parent; parent = parent.parent) {
    if (parent.name === "FunctionDefinition" || parent.name === "LambdaExpression") return true;
  }
  return false;
}

/** Statements the grammar accepts that the interpreter rejects when compiling. */
function misplacedStatement(name: string, node: () => SyntaxNode): string | null {
  switch (name) {
    case "PrintStatement":
      return "print statement";
    case "ReturnStatement":
      return insideFunction(node()) ? null : "'return' outside function";
    case "yield":
      return insideFunction(node()) ? null : "'yield' outside function";
    default:
      return null;
  }
}

/**
 * Whitelist-based static check of Python source. An empty result means no
 * file, network, process or reflection access was found. Violations keep
 * their discovery order.
 */
export function analyzePythonSource(source: string, allowPrint = true): Violation[] {
  const tree = parser.parse(source);
  const position = lineIndex(source);
  const text = (node: { from: number; to: number }) => source.slice(node.from, node.to);

  const syntaxErrors: Violation[] = [];
  tree.iterate({
    enter(ref) {
      if (syntaxErrors.length > 0) return false;
      if (ref.type.isError) {
        syntaxErrors.push({ ...position(ref.from), kind: "syntax", detail: "invalid syntax" });
        return false;
      }
      const misplaced = misplacedStatement(ref.name, () => ref.node);
      if (misplaced) {
        syntaxErrors.push({ ...position(ref.from), kind: "syntax", detail: misplaced });
        return false;
      }
      return undefined;
    },
  });
  if (syntaxErrors.length > 0) return syntaxErrors;

  const violations: Violation[] = [];
  const add = (offset: number, kind: ViolationKind, detail: string) => {
    violations.push({ ...position(offset), kind, detail });
  };

  tree.iterate({
    enter(ref) {
      const node = ref.node;
      switch (ref.name) {
        case "ImportStatement":
          for (const module of importedModules(text(node))) {
            if (module === null) {
              add(node.from, "import", "relative import without module");
              continue;
            }
            const problem = moduleProblem(module);
            if (problem) add(node.from, "import", problem);
          }
          break;

        case "CallExpression": {
          const name = calleeName(node, source);
          const callee = calleeOf(node);
          if (name !== null) {
            if (DANGEROUS_BUILTINS.has(name) && !(name === "print" && allowPrint)) {
              add(node.from, "builtin", `dangerous builtin: ${name}`);
            }
          } else if (callee?.name === "MemberExpression") {
            const property = callee.getChild("PropertyName");
            if (property && DANGEROUS_METHODS.has(text(property))) {
              add(node.from, "method", `dangerous method: ${text(property)}`);
            }
          }
          break;
        }

        case "MemberExpression": {
          const property = node.getChild("PropertyName");
          if (property && REFLECTION_ATTRIBUTES.has(text(property))) {
            add(node.from, "reflection", `dangerous attribute: ${text(property)}`);
          }
          break;
        }

        case "VariableName":
          if (DANGEROUS_NAMES.has(text(node))) {
            add(node.from, "reflection", `dangerous name: ${text(node)}`);
          }
          break;

        case "async": {
          const parent = node.parent?.name ?? "";
          add(node.from, "async", ASYNC_DETAIL.get(parent) ?? "async comprehension requires asyncio");
          break;
        }

        case "AwaitExpression":
          add(node.from, "async", "await requires asyncio");
          break;

        case "WithStatement":
          for (let child = node.firstChild; child; child = child.nextSibling) {
            if (child.name === "CallExpression" && calleeName(child, source) === "open") {
              add(node.from, "io", "file open in with statement");
            }
          }
          break;
      }
      return undefined;
    },
  });

  return violations;
}

export function analyzePythonFile(path: string): ScriptVerdict {
  let size: number;
  try {
    const stats = statSync(path, { throwIfNoEntry: false });
    if (!stats) return { safe: false, reason: `file not found: ${path}` };
    if (!stats.isFile()) return { safe: false, reason: `not a file: ${path}` };
    size = stats.size;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { safe: false, reason: `cannot stat file: ${message}` };
  }

  const suffix = extname(path);
  if (suffix !== ".py" && suffix !== ".pyw") {
    return { safe: false, reason: `not a Python file: ${suffix || path}` };
  }
  if (size > MAX_SCRIPT_BYTES) return { safe: false, reason: "file too large to analyze" };

  let source: string;
  try {
    source = new TextDecoder("utf-8", { fatal: true }).decode(readFileSync(path));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { safe: false, reason: `cannot read file: ${message}` };
  }

  const [first] = analyzePythonSource(source);
  if (first) return { safe: false, reason: `${first.kind}: ${first.detail} (line ${first.line})` };
  return { safe: true, reason: "static analysis passed" };
}
