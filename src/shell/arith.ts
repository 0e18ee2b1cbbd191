import type { ArithNode } from "./ast.js";
import { MAX_NESTING, ParseError, nestingError } from "./errors.js";
import { WordScanner, type NestedParsers } from "./words.js";

type Token =
  | { type: "number"; value: string; pos: number }
  | { type: "name"; value: string; pos: number }
  | { type: "op"; value: string; pos: number }
  | { type: "operand"; node: ArithNode; pos: number }
  | { type: "eof"; pos: number };

const OPERATORS = [
  "<<=", ">>=",
  "**", "++", "--", "<<", ">>", "<=", ">=", "==", "!=", "&&", "||",
  "+=", "-=", "*=", "/=", "%=", "&=", "^=", "|=",
  "+", "-", "*", "/", "%", "<", ">", "&", "^", "|", "!", "~", "?", ":", "=",
  "(", ")", ",", "[", "]",
];

const ASSIGNMENT = new Set(["=", "+=", "-=", "*=", "/=", "%=", "<<=", ">>=", "&=", "^=", "|="]);
const PREFIX = new Set(["!", "~", "+", "-", "++", "--"]);

const PRECEDENCE: Record<string, number> = {
  "||": 1,
  "&&": 2,
  "|": 3,
  "^": 4,
  "&": 5,
  "==": 6,
  "!=": 6,
  "<": 7,
  ">": 7,
  "<=": 7,
  ">=": 7,
  "<<": 8,
  ">>": 8,
  "+": 9,
  "-": 9,
  "*": 10,
  "/": 10,
  "%": 10,
  "**": 11,
};

function tokenize(src: string, depth: number, nested: NestedParsers): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < src.length) {
    const ch = src[i];
    if (/\s/.test(ch) || (ch === "\\" && src[i + 1] === "\n")) {
      i += ch === "\\" ? 2 : 1;
      continue;
    }
    if (ch === "$" || ch === "`" || ch === '"' || ch === "'") {
      const scanner = new WordScanner(src, i, depth, nested);
      const word = scanner.scanOne();
      tokens.push({ type: "operand", node: { kind: "expansion", word }, pos: i });
      i = scanner.pos;
      continue;
    }
    const num = /^[0-9][0-9A-Za-z_#@]*/.exec(src.slice(i));
    if (num) {
      tokens.push({ type: "number", value: num[0], pos: i });
      i += num[0].length;
      continue;
    }
    const name = /^[A-Za-z_][A-Za-z0-9_]*/.exec(src.slice(i));
    if (name) {
      tokens.push({ type: "name", value: name[0], pos: i });
      i += name[0].length;
      continue;
    }
    const op = OPERATORS.find((candidate) => src.startsWith(candidate, i));
    if (!op) throw new ParseError(`unexpected '${ch}' in arithmetic expression`, i);
    tokens.push({ type: "op", value: op, pos: i });
    i += op.length;
  }
  tokens.push({ type: "eof", pos: src.length });
  return tokens;
}

class ArithParser {
  private index = 0;
  private nesting = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly depth: number,
  ) {}

  private peek(): Token {
    return this.tokens[this.index];
  }

  private next(): Token {
    const token = this.tokens[this.index];
    if (token.type !== "eof") this.index++;
    return token;
  }

  private isOp(value: string): boolean {
    const token = this.peek();
    return token.type === "op" && token.value === value;
  }

  /** Parses one nested operand, counting it against the nesting ceiling. */
  private descend(at: Token, parse: () => ArithNode): ArithNode {
    this.nesting++;
    if (this.depth + this.nesting > MAX_NESTING) throw nestingError(at.pos);
    const node = parse();
    this.nesting--;
    return node;
  }

  private expect(value: string): void {
    const token = this.next();
    if (token.type !== "op" || token.value !== value) {
      throw new ParseError(`expected '${value}' in arithmetic expression`, token.pos);
    }
  }

  parse(): ArithNode | null {
    if (this.peek().type === "eof") return null;
    const node = this.parseComma();
    const rest = this.peek();
    if (rest.type !== "eof") throw new ParseError("unexpected token in arithmetic expression", rest.pos);
    return node;
  }

  private parseComma(): ArithNode {
    let left = this.parseAssignment();
    while (this.isOp(",")) {
      this.next();
      left = { kind: "binary", op: ",", left, right: this.parseAssignment() };
    }
    return left;
  }

  private parseAssignment(): ArithNode {
    const target = this.parseTernary();
    const token = this.peek();
    if (token.type === "op" && ASSIGNMENT.has(token.value)) {
      if (target.kind !== "variable" && target.kind !== "expansion") {
        throw new ParseError("invalid assignment target", token.pos);
      }
      this.next();
      return { kind: "assign", op: token.value, target, value: this.descend(token, () => this.parseAssignment()) };
    }
    return target;
  }

  private parseTernary(): ArithNode {
    const test = this.parseBinary(1);
    if (!this.isOp("?")) return test;
    const question = this.next();
    const consequent = this.descend(question, () => this.parseAssignment());
    const colon = this.peek();
    this.expect(":");
    const alternate = this.descend(colon, () => this.parseAssignment());
    return { kind: "ternary", test, consequent, alternate };
  }

  private parseBinary(minPrecedence: number): ArithNode {
    let left = this.parseUnary();
    for (;;) {
      const token = this.peek();
      if (token.type !== "op") return left;
      const precedence = PRECEDENCE[token.value];
      if (precedence === undefined || precedence < minPrecedence) return left;
      this.next();
      // ** is right-associative
      const next = token.value === "**" ? precedence : precedence + 1;
      const right = this.descend(token, () => this.parseBinary(next));
      left = { kind: "binary", op: token.value, left, right };
    }
  }

  private parseUnary(): ArithNode {
    const token = this.peek();
    if (token.type === "op" && PREFIX.has(token.value)) {
      this.next();
      return { kind: "unary", op: token.value, operand: this.descend(token, () => this.parseUnary()) };
    }
    let node = this.parsePrimary();
    while (this.isOp("++") || this.isOp("--")) {
      const op = this.next();
      if (op.type === "op") node = { kind: "postfix", op: op.value, operand: node };
    }
    return node;
  }

  private parsePrimary(): ArithNode {
    const token = this.next();
    switch (token.type) {
      case "number":
        return { kind: "number", value: token.value };
      case "operand":
        return token.node;
      case "name": {
        let index: ArithNode | null = null;
        if (this.isOp("[")) {
          const open = this.next();
          index = this.descend(open, () => this.parseComma());
          this.expect("]");
        }
        return { kind: "variable", name: token.value, index };
      }
      case "op":
        if (token.value === "(") {
          const expression = this.descend(token, () => this.parseComma());
          this.expect(")");
          return { kind: "group", expression };
        }
        throw new ParseError(`unexpected '${token.value}' in arithmetic expression`, token.pos);
      case "eof":
        throw new ParseError("unexpected end of arithmetic expression", token.pos);
    }
  }
}

/** Parses the text between `((` and `))`; whitespace-only text yields null. */
export function parseArithmetic(src: string, depth: number, nested: NestedParsers): ArithNode | null {
  return new ArithParser(tokenize(src, depth, nested), depth).parse();
}
