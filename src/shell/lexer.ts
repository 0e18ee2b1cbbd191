import type { HeredocRedirect, Word } from "./ast.js";
import { ParseError } from "./errors.js";
import { WordScanner, skipDoubleQuoted, type NestedParsers } from "./words.js";

interface Span {
  start: number;
  end: number;
}

export type Token =
  | (Span & { type: "word"; word: Word })
  | (Span & { type: "op"; op: string })
  | (Span & { type: "redirect"; op: string })
  | (Span & { type: "heredoc"; redirect: HeredocRedirect })
  | (Span & { type: "newline" })
  | (Span & { type: "comment"; text: string })
  | (Span & { type: "eof" });

const CONTROL_OPS = [";;&", ";;", ";&", "&&", "||", "|&", "|", "&", ";", "(", ")"];
const REDIRECT = /([0-9]*)(<<<|<<-|<<|<>|<&|>&|>>|>\||<|>)|(&>>|&>)/y;

/**
 * On-demand tokenizer with unbounded lookahead. Here-document bodies are
 * consumed when the newline that ends their command line is lexed.
 */
export class Lexer {
  private pos: number;
  private buffer: Token[] = [];
  private pendingHeredocs: HeredocRedirect[] = [];

  constructor(
    readonly src: string,
    start: number,
    /** Nesting level of the words lexed next; the parser raises it inside compounds. */
    public depth: number,
    private readonly nested: NestedParsers,
  ) {
    this.pos = start;
  }

  peek(offset = 0): Token {
    while (this.buffer.length <= offset) this.buffer.push(this.lex());
    return this.buffer[offset];
  }

  next(): Token {
    const token = this.peek();
    this.buffer.shift();
    return token;
  }

  /** Drops any lookahead and continues lexing from `pos`. */
  rewind(pos: number): void {
    this.buffer = [];
    this.pos = pos;
  }

  /** Reads the right-hand side of `=~` raw, up to whitespace outside parentheses. */
  readRegex(): Word {
    const first = this.buffer[0];
    if (first) this.rewind(first.start);
    this.skipBlanks();

    const { src } = this;
    const start = this.pos;
    let depth = 0;
    let i = start;
    while (i < src.length) {
      const ch = src[i];
      if (ch === "\\") {
        i += 2;
        continue;
      }
      if (ch === "'" || ch === '"') {
        const close = ch === "'" ? src.indexOf("'", i + 1) : skipDoubleQuoted(src, i);
        if (close < 0) throw new ParseError("unterminated quote in regular expression", i);
        i = close + 1;
        continue;
      }
      if (ch === "(") {
        depth++;
      } else if (ch === ")") {
        if (depth === 0) break;
        depth--;
      } else if (depth === 0 && (ch === " " || ch === "\t" || ch === "\n")) {
        break;
      }
      i++;
    }
    if (i === start) throw new ParseError("expected regular expression after '=~'", start);

    this.pos = Math.min(i, src.length);
    const raw = src.slice(start, this.pos);
    return new WordScanner(raw, 0, this.depth, this.nested).scan("loose");
  }

  private skipBlanks(): void {
    const { src } = this;
    while (this.pos < src.length) {
      const ch = src[this.pos];
      if (ch === " " || ch === "\t") this.pos++;
      else if (ch === "\\" && src[this.pos + 1] === "\n") this.pos += 2;
      else break;
    }
  }

  private lex(): Token {
    const { src } = this;
    this.skipBlanks();
    const start = this.pos;

    if (this.pos >= src.length) {
      this.readHeredocBodies();
      return { type: "eof", start, end: start };
    }

    const ch = src[this.pos];
    if (ch === "\n") {
      this.pos++;
      this.readHeredocBodies();
      return { type: "newline", start, end: start + 1 };
    }
    if (ch === "#") {
      const eol = src.indexOf("\n", this.pos);
      this.pos = eol < 0 ? src.length : eol;
      return { type: "comment", text: src.slice(start, this.pos), start, end: this.pos };
    }

    const redirect = this.lexRedirect();
    if (redirect) return redirect;

    const op = CONTROL_OPS.find((candidate) => src.startsWith(candidate, start));
    if (op) {
      this.pos += op.length;
      return { type: "op", op, start, end: this.pos };
    }

    const scanner = new WordScanner(src, start, this.depth, this.nested);
    const word = scanner.scan("word");
    if (scanner.pos === start) throw new ParseError(`unexpected character '${ch}'`, start);
    this.pos = scanner.pos;
    return { type: "word", word, start, end: this.pos };
  }

  private lexRedirect(): Token | null {
    const { src } = this;
    const start = this.pos;
    REDIRECT.lastIndex = start;
    const match = REDIRECT.exec(src);
    if (!match) return null;

    const fd = match[1] ?? "";
    const base = match[2] ?? match[3];
    const after = start + match[0].length;
    // <(...) and >(...) are process substitutions, lexed as words
    if (fd === "" && (base === "<" || base === ">") && src[after] === "(") return null;

    this.pos = after;
    if (base !== "<<" && base !== "<<-") {
      return { type: "redirect", op: fd + base, start, end: after };
    }

    this.skipBlanks();
    const scanner = new WordScanner(src, this.pos, this.depth, this.nested);
    const word = scanner.scan("word");
    if (scanner.pos === this.pos) throw new ParseError("expected here-document delimiter", this.pos);
    this.pos = scanner.pos;

    const redirect: HeredocRedirect = {
      kind: "heredoc",
      op: base === "<<-" ? "<<-" : "<<",
      delimiter: word.text,
      quoted: /['"\\]/.test(word.value),
      content: "",
      body: null,
    };
    this.pendingHeredocs.push(redirect);
    return { type: "heredoc", redirect, start, end: this.pos };
  }

  private readHeredocBodies(): void {
    const { src } = this;
    for (const heredoc of this.pendingHeredocs) {
      const stripTabs = heredoc.op === "<<-";
      let content = "";
      while (this.pos < src.length) {
        const eol = src.indexOf("\n", this.pos);
        const line = src.slice(this.pos, eol < 0 ? src.length : eol);
        this.pos = eol < 0 ? src.length : eol + 1;
        const stripped = stripTabs ? line.replace(/^\t+/, "") : line;
        if (stripped === heredoc.delimiter) break;
        content += stripped + "\n";
      }
      heredoc.content = content;
      heredoc.body = heredoc.quoted
        ? null
        : new WordScanner(content, 0, this.depth + 1, this.nested).scan("heredoc");
    }
    this.pendingHeredocs = [];
  }
}
