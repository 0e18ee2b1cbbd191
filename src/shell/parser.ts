import type {
  ArithNode,
  CaseItem,
  CondNode,
  ForArithNode,
  IfNode,
  ListOperator,
  Node,
  OperatorPart,
  Redirect,
  Word,
} from "./ast.js";
import { parseArithmetic } from "./arith.js";
import { MAX_NESTING, ParseError, nestingError } from "./errors.js";
import { Lexer, type Token } from "./lexer.js";
import { findArithmeticClose, type NestedParsers } from "./words.js";

export { ParseError } from "./errors.js";

/** Reserved words that end a compound list and so never start a command. */
const TERMINATORS = new Set(["then", "else", "elif", "fi", "do", "done", "esac", "}"]);
const COMPOUND_STARTS = new Set(["{", "if", "while", "until", "for", "select", "case", "[["]);
const CASE_TERMINATORS = [";;", ";&", ";;&"] as const;

const UNARY_TESTS = new Set([
  "-a", "-b", "-c", "-d", "-e", "-f", "-g", "-h", "-k", "-p", "-r", "-s", "-t", "-u", "-w", "-x",
  "-G", "-L", "-N", "-O", "-S", "-z", "-n", "-o", "-v", "-R",
]);
const BINARY_TESTS = new Set([
  "==", "=", "!=", "=~", "-eq", "-ne", "-lt", "-le", "-gt", "-ge", "-nt", "-ot", "-ef",
]);

const NAME = /^[A-Za-z_][\w.:-]*$/;

const NESTED: NestedParsers = {
  command(src, start, depth) {
    return new Parser(new Lexer(src, start, depth, NESTED), depth).parseSubstitution(start);
  },
  script(src, depth) {
    return joinNodes(new Parser(new Lexer(src, 0, depth, NESTED), depth).parseProgram());
  },
  arithmetic(src, depth) {
    if (depth > MAX_NESTING) throw nestingError(0);
    return parseArithmetic(src, depth, NESTED);
  },
};

/**
 * Parse a bash command string. Returns one node per complete command line;
 * throws ParseError on malformed input.
 */
export function parse(command: string): Node[] {
  return new Parser(new Lexer(command, 0, 0, NESTED), 0).parseProgram();
}

function joinNodes(nodes: Node[]): Node {
  const commands = nodes.filter((node) => node.kind !== "comment");
  if (commands.length === 0) return { kind: "empty" };
  if (commands.length === 1) return commands[0];
  const parts: (Node | OperatorPart)[] = [];
  commands.forEach((node, i) => {
    if (i > 0) parts.push({ kind: "operator", op: ";" });
    parts.push(node);
  });
  return { kind: "list", parts };
}

function toNode(parts: (Node | OperatorPart)[]): Node {
  const [first] = parts;
  if (parts.length === 1 && first.kind !== "operator") return first;
  return { kind: "list", parts };
}

function describe(token: Token): string {
  switch (token.type) {
    case "word":
      return token.word.value;
    case "op":
    case "redirect":
      return token.op;
    case "heredoc":
      return token.redirect.op;
    case "newline":
      return "newline";
    case "comment":
      return "#";
    case "eof":
      return "end of file";
  }
}

/** Splits the inside of `for ((...))` at top-level semicolons. */
function splitArithFor(text: string): string[] {
  const sections: string[] = [];
  let depth = 0;
  let current = "";
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === "(") depth++;
    else if (ch === ")") depth--;
    if (ch === ";" && depth === 0) {
      sections.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  sections.push(current);
  return sections;
}

class Parser {
  private nesting = 0;

  constructor(
    private readonly lexer: Lexer,
    private readonly depth: number,
  ) {
    if (depth > MAX_NESTING) throw nestingError(0);
  }

  parseProgram(): Node[] {
    const nodes: Node[] = [];
    for (;;) {
      const token = this.peek();
      if (token.type === "eof") return nodes;
      if (token.type === "newline") {
        this.next();
        continue;
      }
      if (token.type === "comment") {
        this.next();
        nodes.push({ kind: "comment", text: token.text });
        continue;
      }
      if (!this.startsCommand(token)) throw this.unexpected(token);
      nodes.push(this.parseList(false));
      const after = this.peek();
      if (after.type !== "eof" && after.type !== "newline" && after.type !== "comment") {
        throw this.unexpected(after);
      }
    }
  }

  parseSubstitution(start: number): { node: Node; end: number } {
    this.skipLinebreaks();
    let node: Node = { kind: "empty" };
    if (this.startsCommand(this.peek())) node = this.parseList(true);
    this.skipLinebreaks();
    const close = this.next();
    if (close.type === "op" && close.op === ")") return { node, end: close.end };
    if (close.type === "eof") throw new ParseError("unterminated substitution", start);
    throw this.unexpected(close);
  }

  // --- token helpers ---

  private peek(offset = 0): Token {
    return this.lexer.peek(offset);
  }

  private next(): Token {
    return this.lexer.next();
  }

  private isWord(token: Token, value: string): boolean {
    return token.type === "word" && token.word.value === value;
  }

  private isOp(token: Token, op: string): boolean {
    return token.type === "op" && token.op === op;
  }

  private isCompoundStart(token: Token): boolean {
    if (token.type === "op") return token.op === "(";
    return token.type === "word" && COMPOUND_STARTS.has(token.word.value);
  }

  private startsCommand(token: Token): boolean {
    switch (token.type) {
      case "word":
        return !TERMINATORS.has(token.word.value);
      case "op":
        return token.op === "(";
      case "redirect":
      case "heredoc":
        return true;
      default:
        return false;
    }
  }

  private unexpected(token: Token): ParseError {
    if (token.type === "eof") return new ParseError("syntax error: unexpected end of file", token.start);
    return new ParseError(`syntax error near unexpected token '${describe(token)}'`, token.start);
  }

  private expectWord(value: string): void {
    const token = this.next();
    if (this.isWord(token, value)) return;
    const error = this.unexpected(token);
    throw new ParseError(`${error.message} (expected '${value}')`, error.position);
  }

  private expectOp(op: string): void {
    const token = this.next();
    if (this.isOp(token, op)) return;
    const error = this.unexpected(token);
    throw new ParseError(`${error.message} (expected '${op}')`, error.position);
  }

  private expectWordToken(): Word {
    const token = this.next();
    if (token.type !== "word") throw this.unexpected(token);
    return token.word;
  }

  private skipNewlines(): void {
    while (this.peek().type === "newline") this.next();
  }

  private skipLinebreaks(): void {
    for (;;) {
      const { type } = this.peek();
      if (type !== "newline" && type !== "comment") return;
      this.next();
    }
  }

  /** Nesting level counted from the outermost parser. */
  private get level(): number {
    return this.depth + this.nesting;
  }

  private enter(token: Token): void {
    this.nesting++;
    if (this.level > MAX_NESTING) throw nestingError(token.start);
    this.lexer.depth = this.level;
  }

  private leave(): void {
    this.nesting--;
    this.lexer.depth = this.level;
  }

  // --- lists ---

  private parseList(inCompound: boolean): Node {
    const parts: (Node | OperatorPart)[] = [];
    this.parseAndOr(parts);
    for (;;) {
      const token = this.peek();
      let op: ListOperator;
      if (token.type === "op" && (token.op === ";" || token.op === "&")) {
        this.next();
        op = token.op === ";" ? ";" : "&";
      } else if (inCompound && (token.type === "newline" || token.type === "comment")) {
        op = ";";
      } else {
        break;
      }
      if (inCompound) this.skipLinebreaks();
      if (!this.startsCommand(this.peek())) {
        if (op === "&") parts.push({ kind: "operator", op });
        break;
      }
      parts.push({ kind: "operator", op });
      this.parseAndOr(parts);
    }
    return toNode(parts);
  }

  private parseAndOr(parts: (Node | OperatorPart)[]): void {
    parts.push(this.parsePipeline());
    for (;;) {
      const token = this.peek();
      if (token.type !== "op" || (token.op !== "&&" && token.op !== "||")) return;
      this.next();
      this.skipLinebreaks();
      parts.push({ kind: "operator", op: token.op === "&&" ? "&&" : "||" });
      parts.push(this.parsePipeline());
    }
  }

  private parseCompoundList(): Node {
    this.skipLinebreaks();
    const token = this.peek();
    if (!this.startsCommand(token)) throw this.unexpected(token);
    return this.parseList(true);
  }

  private parsePipeline(): Node {
    const token = this.peek();
    if (this.isWord(token, "!")) {
      this.next();
      this.enter(token);
      const pipeline = this.parsePipeline();
      this.leave();
      return { kind: "negation", pipeline };
    }
    if (this.isWord(token, "time")) {
      this.next();
      let posix = false;
      if (this.isWord(this.peek(), "-p")) {
        this.next();
        posix = true;
      }
      if (!this.startsCommand(this.peek())) return { kind: "time", pipeline: { kind: "empty" }, posix };
      return { kind: "time", pipeline: this.parsePipeline(), posix };
    }

    const commands: Node[] = [this.parseCommand()];
    for (;;) {
      const pipe = this.peek();
      if (pipe.type !== "op" || (pipe.op !== "|" && pipe.op !== "|&")) break;
      this.next();
      this.skipLinebreaks();
      commands.push(this.parseCommand());
    }
    return commands.length === 1 ? commands[0] : { kind: "pipeline", commands };
  }

  // --- commands ---

  private parseCommand(): Node {
    const token = this.peek();

    if (this.isOp(token, "(")) {
      if (this.lexer.src[token.end] === "(") {
        const arith = this.tryArithmeticCommand(token);
        if (arith) return arith;
      }
      return this.parseGroup("subshell");
    }

    if (token.type === "word") {
      switch (token.word.value) {
        case "{":
          return this.parseGroup("brace-group");
        case "if":
          return this.parseIf();
        case "while":
          return this.parseLoop("while");
        case "until":
          return this.parseLoop("until");
        case "for":
          return this.parseFor("for");
        case "select":
          return this.parseFor("select");
        case "case":
          return this.parseCase();
        case "function":
          return this.parseFunctionKeyword();
        case "coproc":
          return this.parseCoproc();
        case "[[":
          return this.parseCondExpr();
      }
      if (NAME.test(token.word.value) && this.isOp(this.peek(1), "(") && this.isOp(this.peek(2), ")")) {
        this.next();
        this.next();
        this.next();
        return this.parseFunctionBody(token.word.value);
      }
    }

    if (this.startsCommand(token)) return this.parseSimpleCommand();
    throw this.unexpected(token);
  }

  private parseSimpleCommand(): Node {
    const words: Word[] = [];
    const redirects: Redirect[] = [];
    for (;;) {
      const token = this.peek();
      if (token.type === "word") {
        this.next();
        words.push(token.word);
      } else if (token.type === "redirect" || token.type === "heredoc") {
        redirects.push(this.parseRedirect());
      } else {
        break;
      }
    }
    return { kind: "command", words, redirects };
  }

  private parseRedirect(): Redirect {
    const token = this.next();
    if (token.type === "heredoc") return token.redirect;
    if (token.type !== "redirect") throw this.unexpected(token);
    const target = this.next();
    if (target.type !== "word") {
      throw new ParseError(`expected redirect target after '${token.op}'`, target.start);
    }
    return { kind: "file", op: token.op, target: target.word };
  }

  private parseRedirects(): Redirect[] {
    const redirects: Redirect[] = [];
    for (;;) {
      const { type } = this.peek();
      if (type !== "redirect" && type !== "heredoc") return redirects;
      redirects.push(this.parseRedirect());
    }
  }

  private tryArithmeticCommand(open: Token): Node | null {
    const { src } = this.lexer;
    const close = findArithmeticClose(src, open.start + 2);
    if (close < 0) return null;
    let expression: ArithNode | null;
    try {
      expression = parseArithmetic(src.slice(open.start + 2, close), this.level + 1, NESTED);
    } catch (err) {
      // `((cmd) ...)` is a nested subshell
      if (err instanceof ParseError) return null;
      throw err;
    }
    this.lexer.rewind(close + 2);
    return { kind: "arith-cmd", expression, redirects: this.parseRedirects() };
  }

  private parseGroup(kind: "subshell" | "brace-group"): Node {
    const open = this.next();
    this.enter(open);
    const body = this.parseCompoundList();
    if (kind === "subshell") this.expectOp(")");
    else this.expectWord("}");
    this.leave();
    return { kind, body, redirects: this.parseRedirects() };
  }

  private parseIf(): Node {
    const open = this.next();
    this.enter(open);
    const node = this.parseIfBody();
    this.expectWord("fi");
    this.leave();
    return { ...node, redirects: this.parseRedirects() };
  }

  private parseIfBody(): IfNode {
    const condition = this.parseCompoundList();
    this.expectWord("then");
    const thenBody = this.parseCompoundList();
    let elseBody: Node | null = null;
    if (this.isWord(this.peek(), "elif")) {
      this.next();
      elseBody = this.parseIfBody();
    } else if (this.isWord(this.peek(), "else")) {
      this.next();
      elseBody = this.parseCompoundList();
    }
    return { kind: "if", condition, thenBody, elseBody, redirects: [] };
  }

  private parseLoop(kind: "while" | "until"): Node {
    const open = this.next();
    this.enter(open);
    const condition = this.parseCompoundList();
    const body = this.parseDoGroup();
    this.leave();
    return { kind, condition, body, redirects: this.parseRedirects() };
  }

  private parseDoGroup(): Node {
    this.expectWord("do");
    const body = this.parseCompoundList();
    this.expectWord("done");
    return body;
  }

  private parseFor(kind: "for" | "select"): Node {
    const open = this.next();
    this.enter(open);
    const token = this.peek();
    if (kind === "for" && this.isOp(token, "(") && this.lexer.src[token.end] === "(") {
      const node = this.parseForArith(token);
      this.leave();
      return node;
    }

    if (token.type !== "word" || !NAME.test(token.word.value)) {
      if (token.type === "eof") throw this.unexpected(token);
      throw new ParseError(`expected variable name after '${kind}'`, token.start);
    }
    this.next();
    this.skipLinebreaks();

    let words: Word[] | null = null;
    if (this.isWord(this.peek(), "in")) {
      this.next();
      words = [];
      for (;;) {
        const item = this.peek();
        if (item.type !== "word") break;
        this.next();
        words.push(item.word);
      }
      const separator = this.next();
      if (!this.isOp(separator, ";") && separator.type !== "newline") throw this.unexpected(separator);
    } else if (this.isOp(this.peek(), ";")) {
      this.next();
    }
    this.skipLinebreaks();

    const body = this.parseDoGroup();
    this.leave();
    return { kind, variable: token.word.value, words, body, redirects: this.parseRedirects() };
  }

  private parseForArith(open: Token): ForArithNode {
    const { src } = this.lexer;
    const close = findArithmeticClose(src, open.start + 2);
    if (close < 0) throw new ParseError("unterminated arithmetic for clause", open.start);
    const sections = splitArithFor(src.slice(open.start + 2, close));
    if (sections.length !== 3) {
      throw new ParseError("arithmetic for clause needs three expressions", open.start);
    }
    const [init, cond, incr] = sections.map((section) => parseArithmetic(section, this.level + 1, NESTED));
    this.lexer.rewind(close + 2);

    if (this.isOp(this.peek(), ";")) this.next();
    this.skipLinebreaks();
    const body = this.parseDoGroup();
    return { kind: "for-arith", init, cond, incr, body, redirects: this.parseRedirects() };
  }

  private parseCase(): Node {
    const open = this.next();
    this.enter(open);
    const subject = this.expectWordToken();
    this.skipLinebreaks();
    this.expectWord("in");
    this.skipLinebreaks();

    const items: CaseItem[] = [];
    while (!this.isWord(this.peek(), "esac")) {
      if (this.isOp(this.peek(), "(")) this.next();

      const patterns: Word[] = [];
      for (;;) {
        patterns.push(this.expectWordToken());
        const separator = this.next();
        if (this.isOp(separator, ")")) break;
        if (!this.isOp(separator, "|")) throw this.unexpected(separator);
      }
      this.skipLinebreaks();

      let body: Node = { kind: "empty" };
      if (this.startsCommand(this.peek())) body = this.parseList(true);

      const end = this.peek();
      const terminator = CASE_TERMINATORS.find((op) => this.isOp(end, op)) ?? null;
      if (terminator) {
        this.next();
        this.skipLinebreaks();
      } else if (!this.isWord(end, "esac")) {
        throw this.unexpected(end);
      }
      items.push({ patterns, body, terminator });
    }
    this.next();
    this.leave();
    return { kind: "case", word: subject, items, redirects: this.parseRedirects() };
  }

  private parseFunctionKeyword(): Node {
    this.next();
    const name = this.expectWordToken();
    if (this.isOp(this.peek(), "(")) {
      this.next();
      this.expectOp(")");
    }
    return this.parseFunctionBody(name.value);
  }

  private parseFunctionBody(name: string): Node {
    this.skipLinebreaks();
    const token = this.peek();
    if (!this.isCompoundStart(token)) {
      if (token.type === "eof") throw this.unexpected(token);
      throw new ParseError(`expected function body for '${name}'`, token.start);
    }
    this.enter(token);
    const body = this.parseCommand();
    this.leave();
    return { kind: "function", name, body };
  }

  private parseCoproc(): Node {
    const open = this.next();
    this.enter(open);
    const first = this.peek();
    let name: string | null = null;
    if (
      first.type === "word" &&
      !this.isCompoundStart(first) &&
      NAME.test(first.word.value) &&
      this.isCompoundStart(this.peek(1))
    ) {
      this.next();
      name = first.word.value;
    }
    const command = this.parseCommand();
    this.leave();
    return { kind: "coproc", name, command };
  }

  // --- [[ ]] ---

  private parseCondExpr(): Node {
    const open = this.next();
    this.enter(open);
    const body = this.parseCondOr();
    this.skipNewlines();
    this.expectWord("]]");
    this.leave();
    return { kind: "cond-expr", body, redirects: this.parseRedirects() };
  }

  private parseCondOr(): CondNode {
    let left = this.parseCondAnd();
    while (this.isOp(this.peek(), "||")) {
      this.next();
      left = { kind: "cond-or", left, right: this.parseCondAnd() };
    }
    return left;
  }

  private parseCondAnd(): CondNode {
    let left = this.parseCondNot();
    while (this.isOp(this.peek(), "&&")) {
      this.next();
      left = { kind: "cond-and", left, right: this.parseCondNot() };
    }
    return left;
  }

  private parseCondNot(): CondNode {
    this.skipNewlines();
    const token = this.peek();
    if (this.isWord(token, "!")) {
      this.next();
      this.enter(token);
      const operand = this.parseCondNot();
      this.leave();
      return { kind: "cond-not", operand };
    }
    return this.parseCondPrimary();
  }

  private parseCondPrimary(): CondNode {
    const token = this.next();
    if (this.isOp(token, "(")) {
      this.enter(token);
      const inner = this.parseCondOr();
      this.skipNewlines();
      this.expectOp(")");
      this.leave();
      return { kind: "cond-paren", inner };
    }
    if (token.type !== "word" || token.word.value === "]]") throw this.unexpected(token);
    const word = token.word;

    if (UNARY_TESTS.has(word.value)) {
      const operand = this.peek();
      if (operand.type === "word" && operand.word.value !== "]]") {
        this.next();
        return { kind: "unary-test", op: word.value, operand: operand.word };
      }
    }

    const op = this.peek();
    if (op.type === "word" && BINARY_TESTS.has(op.word.value)) {
      this.next();
      const right = op.word.value === "=~" ? this.lexer.readRegex() : this.expectWordToken();
      return { kind: "binary-test", op: op.word.value, left: word, right };
    }
    if (op.type === "redirect" && (op.op === "<" || op.op === ">")) {
      this.next();
      return { kind: "binary-test", op: op.op, left: word, right: this.expectWordToken() };
    }
    return { kind: "unary-test", op: "-n", operand: word };
  }
}
