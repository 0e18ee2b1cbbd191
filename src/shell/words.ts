import type { ArithNode, Node, Word, WordPart } from "./ast.js";
import { MAX_NESTING, ParseError, nestingError } from "./errors.js";

/**
 * Callbacks into the command and arithmetic parsers, supplied by the parser
 * so that word scanning can recurse into substitutions.
 */
export interface NestedParsers {
  /** Parse a command list starting at `start`; `end` is the offset just past its closing `)`. */
  command(src: string, start: number, depth: number): { node: Node; end: number };
  /** Parse a complete script, as found inside backticks. */
  script(src: string, depth: number): Node;
  arithmetic(src: string, depth: number): ArithNode | null;
}

/**
 * - `word`: an ordinary shell word, ends at the first unquoted metacharacter
 * - `loose`: the whole input is one word (`${x:-...}` operands, `=~` regexes)
 * - `heredoc`: quotes are literal, only `$`, backticks and a few escapes are live
 */
export type ScanMode = "word" | "loose" | "heredoc";

const METACHARS = new Set([" ", "\t", "\n", ";", "&", "|", "(", ")", "<", ">"]);
const EXTGLOB_PREFIX = new Set(["@", "!", "+", "*", "?"]);
const SPECIAL_PARAM = /[0-9@*#?$!-]/;
const NAME_START = /[A-Za-z_]/;
const NAME_CHAR = /[A-Za-z0-9_]/;
const ARRAY_ASSIGN = /^[A-Za-z_][A-Za-z0-9_]*(\[[^\]]*\])?\+?=$/;
const PARAM_HEAD = /^([!#]?)([A-Za-z_][A-Za-z0-9_]*|[0-9]+|[@*#?$!-])(?:\[(.*?)\])?/s;
const PARAM_OP = /^(:[-=+?]|[-=+?]|##?|%%?|\/[#%/]?|\^\^?|,,?|:|@)/;

const ANSI_ESCAPES = new Map<string, string>([
  ["n", "\n"],
  ["t", "\t"],
  ["r", "\r"],
  ["a", "\x07"],
  ["b", "\b"],
  ["e", "\x1b"],
  ["E", "\x1b"],
  ["f", "\f"],
  ["v", "\v"],
  ["\\", "\\"],
  ["'", "'"],
  ['"', '"'],
  ["?", "?"],
]);

/**
 * Reads one word starting at `pos`, splitting it into literal text and
 * expansion parts. A scanner is used once; `pos` is left just past the word.
 */
export class WordScanner {
  pos: number;
  private parts: WordPart[] = [];
  private literal = "";
  private text = "";

  constructor(
    private readonly src: string,
    start: number,
    private readonly depth: number,
    private readonly nested: NestedParsers,
  ) {
    this.pos = start;
  }

  scan(mode: ScanMode): Word {
    const { src } = this;
    const start = this.pos;

    while (this.pos < src.length) {
      const ch = src[this.pos];
      const next = src[this.pos + 1];

      if (mode === "word") {
        if (ch === "<" || ch === ">") {
          if (next !== "(") break;
          this.readProcessSubstitution(ch === "<" ? "<" : ">");
          continue;
        }
        if (ch === "(" && ARRAY_ASSIGN.test(src.slice(start, this.pos))) {
          this.readArrayAssignment();
          continue;
        }
        if (EXTGLOB_PREFIX.has(ch) && next === "(") {
          this.readExtglob();
          continue;
        }
        if (METACHARS.has(ch)) break;
      }

      if (ch === "\\") {
        this.readEscape(mode);
      } else if (ch === "'" && mode !== "heredoc") {
        this.readSingleQuoted();
      } else if (ch === '"' && mode !== "heredoc") {
        this.readDoubleQuoted();
      } else if (ch === "`") {
        this.readBacktick();
      } else if (ch === "$") {
        this.readDollar(mode !== "heredoc");
      } else {
        this.append(ch);
        this.pos++;
      }
    }

    return this.finish(start);
  }

  /** Reads the single quoted string or expansion at `pos` (arithmetic operands). */
  scanOne(): Word {
    const start = this.pos;
    const ch = this.src[this.pos];
    if (ch === "$") this.readDollar(false);
    else if (ch === "`") this.readBacktick();
    else if (ch === '"') this.readDoubleQuoted();
    else if (ch === "'") this.readSingleQuoted();
    else {
      this.append(ch);
      this.pos++;
    }
    return this.finish(start);
  }

  private finish(start: number): Word {
    this.flush();
    return { value: this.src.slice(start, this.pos), text: this.text, parts: this.parts };
  }

  private append(s: string): void {
    this.literal += s;
    this.text += s;
  }

  private flush(): void {
    if (this.literal) {
      this.parts.push({ kind: "literal", value: this.literal });
      this.literal = "";
    }
  }

  private push(part: WordPart, source: string): void {
    this.flush();
    this.parts.push(part);
    this.text += source;
  }

  private readEscape(mode: ScanMode): void {
    const next = this.src[this.pos + 1];
    if (next === undefined) {
      this.append("\\");
      this.pos++;
      return;
    }
    if (next === "\n") {
      this.pos += 2;
      return;
    }
    if (mode === "heredoc" && !"$`\\".includes(next)) {
      this.append("\\");
      this.pos++;
      return;
    }
    this.append(next);
    this.pos += 2;
  }

  private readSingleQuoted(): void {
    const close = this.src.indexOf("'", this.pos + 1);
    if (close < 0) throw new ParseError("unterminated single quote", this.pos);
    this.append(this.src.slice(this.pos + 1, close));
    this.pos = close + 1;
  }

  private readDoubleQuoted(): void {
    const { src } = this;
    const open = this.pos;
    this.pos++;
    for (;;) {
      if (this.pos >= src.length) throw new ParseError("unterminated double quote", open);
      const ch = src[this.pos];
      if (ch === '"') {
        this.pos++;
        return;
      }
      if (ch === "\\") {
        const next = src[this.pos + 1];
        if (next !== undefined && '$`"\\\n'.includes(next)) {
          if (next !== "\n") this.append(next);
          this.pos += 2;
        } else {
          this.append("\\");
          this.pos++;
        }
      } else if (ch === "`") {
        this.readBacktick();
      } else if (ch === "$") {
        this.readDollar(false);
      } else {
        this.append(ch);
        this.pos++;
      }
    }
  }

  private readDollar(allowQuoted: boolean): void {
    const { src } = this;
    const start = this.pos;
    const next = src[this.pos + 1];

    if (next === "(") {
      if (src[this.pos + 2] === "(" && this.tryArithmetic()) return;
      const { node, end } = this.nested.command(src, this.pos + 2, this.depth + 1);
      const source = src.slice(start, end);
      this.push({ kind: "cmdsub", command: node, backtick: false, source }, source);
      this.pos = end;
      return;
    }
    if (next === "{") {
      this.readBraceParam();
      return;
    }
    if (next === "'" && allowQuoted) {
      this.readAnsiC();
      return;
    }
    if (next === '"' && allowQuoted) {
      // $"..." is a locale-translated string; treat it as double-quoted
      this.pos++;
      this.readDoubleQuoted();
      return;
    }
    if (next !== undefined && NAME_START.test(next)) {
      let end = this.pos + 1;
      while (end < src.length && NAME_CHAR.test(src[end])) end++;
      this.push({ kind: "param", name: src.slice(start + 1, end), index: null, arg: null }, src.slice(start, end));
      this.pos = end;
      return;
    }
    if (next !== undefined && SPECIAL_PARAM.test(next)) {
      this.push({ kind: "param", name: next, index: null, arg: null }, src.slice(start, start + 2));
      this.pos += 2;
      return;
    }
    this.append("$");
    this.pos++;
  }

  private tryArithmetic(): boolean {
    const { src } = this;
    const close = findArithmeticClose(src, this.pos + 3);
    if (close < 0) return false;
    let expression: ArithNode | null;
    try {
      expression = this.nested.arithmetic(src.slice(this.pos + 3, close), this.depth + 1);
    } catch (err) {
      // `$((cmd) ...)` is a command substitution starting with a subshell
      if (err instanceof ParseError) return false;
      throw err;
    }
    const source = src.slice(this.pos, close + 2);
    this.push({ kind: "arith", expression }, source);
    this.pos = close + 2;
    return true;
  }

  private readBraceParam(): void {
    const { src } = this;
    const start = this.pos;
    const close = findBraceClose(src, start + 2);
    if (close < 0) throw new ParseError("unterminated parameter expansion", start);
    const inner = src.slice(start + 2, close);

    const head = PARAM_HEAD.exec(inner);
    let name = inner;
    let index: Word | null = null;
    let arg: Word | null = null;
    if (head) {
      name = head[1] + head[2];
      if (head[3] !== undefined) index = this.scanLoose(head[3]);
      const rest = inner.slice(head[0].length);
      const op = PARAM_OP.exec(rest);
      const operand = op ? rest.slice(op[0].length) : rest;
      if (operand) arg = this.scanLoose(operand);
    }

    const source = src.slice(start, close + 1);
    this.push({ kind: "param", name, index, arg }, source);
    this.pos = close + 1;
  }

  private scanLoose(text: string): Word {
    if (this.depth + 1 > MAX_NESTING) throw nestingError(this.pos);
    return new WordScanner(text, 0, this.depth + 1, this.nested).scan("loose");
  }

  private readBacktick(): void {
    const { src } = this;
    const start = this.pos;
    const close = findBacktickClose(src, start + 1);
    if (close < 0) throw new ParseError("unterminated backtick substitution", start);
    const inner = src.slice(start + 1, close).replace(/\\([\\`$])/g, "$1");
    const node = this.nested.script(inner, this.depth + 1);
    const source = src.slice(start, close + 1);
    this.push({ kind: "cmdsub", command: node, backtick: true, source }, source);
    this.pos = close + 1;
  }

  private readProcessSubstitution(direction: "<" | ">"): void {
    const start = this.pos;
    const { node, end } = this.nested.command(this.src, start + 2, this.depth + 1);
    const source = this.src.slice(start, end);
    this.push({ kind: "procsub", direction, command: node, source }, source);
    this.pos = end;
  }

  private readAnsiC(): void {
    const { src } = this;
    const open = this.pos;
    let i = open + 2;
    let out = "";
    for (;;) {
      if (i >= src.length) throw new ParseError("unterminated ANSI-C quote", open);
      const ch = src[i];
      if (ch === "'") break;
      if (ch !== "\\") {
        out += ch;
        i++;
        continue;
      }
      const esc = src[i + 1] ?? "";
      const simple = ANSI_ESCAPES.get(esc);
      if (simple !== undefined) {
        out += simple;
        i += 2;
      } else if (esc === "x") {
        const hex = /^[0-9A-Fa-f]{1,2}/.exec(src.slice(i + 2));
        if (hex) {
          out += String.fromCharCode(parseInt(hex[0], 16));
          i += 2 + hex[0].length;
        } else {
          out += "\\x";
          i += 2;
        }
      } else if (/[0-7]/.test(esc)) {
        const oct = /^[0-7]{1,3}/.exec(src.slice(i + 1));
        const digits = oct ? oct[0] : esc;
        out += String.fromCharCode(parseInt(digits, 8));
        i += 1 + digits.length;
      } else {
        out += "\\" + esc;
        i += 2;
      }
    }
    this.append(out);
    this.pos = i + 1;
  }

  private readExtglob(): void {
    const close = skipParens(this.src, this.pos + 1);
    if (close < 0) throw new ParseError("unterminated pattern", this.pos);
    this.append(this.src.slice(this.pos, close + 1));
    this.pos = close + 1;
  }

  /** `name=(a b $(c))`: element parts are folded into the assignment word. */
  private readArrayAssignment(): void {
    const { src } = this;
    const open = this.pos;
    if (this.depth + 1 > MAX_NESTING) throw nestingError(open);
    this.flush();
    this.text += "(";
    this.pos++;
    for (;;) {
      while (this.pos < src.length && /\s/.test(src[this.pos])) this.pos++;
      if (this.pos >= src.length) throw new ParseError("unterminated array assignment", open);
      const ch = src[this.pos];
      if (ch === ")") {
        this.text += ")";
        this.pos++;
        return;
      }
      if (ch === "#") {
        while (this.pos < src.length && src[this.pos] !== "\n") this.pos++;
        continue;
      }
      const element = new WordScanner(src, this.pos, this.depth + 1, this.nested);
      const word = element.scan("word");
      if (element.pos === this.pos) {
        throw new ParseError(`unexpected '${ch}' in array assignment`, this.pos);
      }
      this.parts.push(...word.parts);
      this.text += (this.text.endsWith("(") ? "" : " ") + word.text;
      this.pos = element.pos;
    }
  }
}

export function skipDoubleQuoted(src: string, open: number): number {
  for (let i = open + 1; i < src.length; i++) {
    if (src[i] === "\\") i++;
    else if (src[i] === '"') return i;
  }
  return -1;
}

export function findBacktickClose(src: string, from: number): number {
  for (let i = from; i < src.length; i++) {
    if (src[i] === "\\") i++;
    else if (src[i] === "`") return i;
  }
  return -1;
}

/** Index of the `)` matching the `(` at `open`, skipping quoted text. */
export function skipParens(src: string, open: number): number {
  let depth = 0;
  for (let i = open; i < src.length; i++) {
    const ch = src[i];
    if (ch === "\\") {
      i++;
    } else if (ch === "'") {
      i = src.indexOf("'", i + 1);
      if (i < 0) return -1;
    } else if (ch === '"') {
      i = skipDoubleQuoted(src, i);
      if (i < 0) return -1;
    } else if (ch === "(") {
      depth++;
    } else if (ch === ")") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function findBraceClose(src: string, from: number): number {
  let depth = 1;
  for (let i = from; i < src.length; i++) {
    const ch = src[i];
    if (ch === "\\") {
      i++;
    } else if (ch === "'") {
      i = src.indexOf("'", i + 1);
      if (i < 0) return -1;
    } else if (ch === '"') {
      i = skipDoubleQuoted(src, i);
      if (i < 0) return -1;
    } else if (ch === "`") {
      i = findBacktickClose(src, i + 1);
      if (i < 0) return -1;
    } else if (ch === "$" && src[i + 1] === "{") {
      depth++;
      i++;
    } else if (ch === "$" && src[i + 1] === "(") {
      i = skipParens(src, i + 1);
      if (i < 0) return -1;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Given the offset just inside `$((` or `((`, returns the index of the first
 * `)` of the closing `))`, or -1 when the parentheses close some other way.
 */
export function findArithmeticClose(src: string, from: number): number {
  let depth = 0;
  for (let i = from; i < src.length; i++) {
    const ch = src[i];
    if (ch === "\\") {
      i++;
    } else if (ch === "'") {
      i = src.indexOf("'", i + 1);
      if (i < 0) return -1;
    } else if (ch === '"') {
      i = skipDoubleQuoted(src, i);
      if (i < 0) return -1;
    } else if (ch === "(") {
      depth++;
    } else if (ch === ")") {
      if (depth === 0) return src[i + 1] === ")" ? i : -1;
      depth--;
    }
  }
  return -1;
}
