/**
 * Syntax tree produced by the shell parser.
 *
 * Every construct is one member of the `Node` union, discriminated by `kind`.
 */

export interface Word {
  /** Source text, quotes included. */
  value: string;
  /** Value after quote removal; substitutions keep their source text. */
  text: string;
  parts: WordPart[];
}

export type WordPart = LiteralPart | CmdSubPart | ProcSubPart | ParamPart | ArithPart;

export interface LiteralPart {
  kind: "literal";
  value: string;
}

export interface CmdSubPart {
  kind: "cmdsub";
  command: Node;
  backtick: boolean;
  source: string;
}

export interface ProcSubPart {
  kind: "procsub";
  direction: "<" | ">";
  command: Node;
  source: string;
}

export interface ParamPart {
  kind: "param";
  name: string;
  /** Array subscript of `${name[index]}`. */
  index: Word | null;
  /** Operand of `${name<op>arg}` forms, parsed for nested expansions. */
  arg: Word | null;
}

export interface ArithPart {
  kind: "arith";
  expression: ArithNode | null;
}

// --- redirects ---

export interface FileRedirect {
  kind: "file";
  /** Operator including any descriptor prefix: `>`, `2>>`, `&>`, `<&`, `<<<`. */
  op: string;
  target: Word;
}

export interface HeredocRedirect {
  kind: "heredoc";
  op: "<<" | "<<-";
  delimiter: string;
  quoted: boolean;
  content: string;
  /** Expansions inside an unquoted heredoc; null when the delimiter is quoted. */
  body: Word | null;
}

export type Redirect = FileRedirect | HeredocRedirect;

// --- arithmetic ---

export type ArithNode =
  | { kind: "number"; value: string }
  | { kind: "variable"; name: string; index: ArithNode | null }
  | { kind: "expansion"; word: Word }
  | { kind: "unary"; op: string; operand: ArithNode }
  | { kind: "postfix"; op: string; operand: ArithNode }
  | { kind: "binary"; op: string; left: ArithNode; right: ArithNode }
  | { kind: "assign"; op: string; target: ArithNode; value: ArithNode }
  | { kind: "ternary"; test: ArithNode; consequent: ArithNode; alternate: ArithNode }
  | { kind: "group"; expression: ArithNode };

// --- [[ ]] conditionals ---

export type CondNode =
  | { kind: "unary-test"; op: string; operand: Word }
  | { kind: "binary-test"; op: string; left: Word; right: Word }
  | { kind: "cond-and"; left: CondNode; right: CondNode }
  | { kind: "cond-or"; left: CondNode; right: CondNode }
  | { kind: "cond-not"; operand: CondNode }
  | { kind: "cond-paren"; inner: CondNode };

// --- commands ---

export type ListOperator = "&&" | "||" | ";" | "&";

export interface OperatorPart {
  kind: "operator";
  op: ListOperator;
}

export interface CommandNode {
  kind: "command";
  words: Word[];
  redirects: Redirect[];
}

export interface PipelineNode {
  kind: "pipeline";
  commands: Node[];
}

export interface ListNode {
  kind: "list";
  parts: (Node | OperatorPart)[];
}

export interface IfNode {
  kind: "if";
  condition: Node;
  thenBody: Node;
  elseBody: Node | null;
  redirects: Redirect[];
}

export interface LoopNode {
  kind: "while" | "until";
  condition: Node;
  body: Node;
  redirects: Redirect[];
}

export interface ForNode {
  kind: "for" | "select";
  variable: string;
  /** Null when the `in` clause is omitted (iterates "$@"). */
  words: Word[] | null;
  body: Node;
  redirects: Redirect[];
}

export interface ForArithNode {
  kind: "for-arith";
  init: ArithNode | null;
  cond: ArithNode | null;
  incr: ArithNode | null;
  body: Node;
  redirects: Redirect[];
}

export interface CaseItem {
  patterns: Word[];
  body: Node;
  terminator: ";;" | ";&" | ";;&" | null;
}

export interface CaseNode {
  kind: "case";
  word: Word;
  items: CaseItem[];
  redirects: Redirect[];
}

export interface FunctionNode {
  kind: "function";
  name: string;
  body: Node;
}

export interface GroupNode {
  kind: "subshell" | "brace-group";
  body: Node;
  redirects: Redirect[];
}

export interface TimeNode {
  kind: "time";
  pipeline: Node;
  posix: boolean;
}

export interface NegationNode {
  kind: "negation";
  pipeline: Node;
}

export interface CoprocNode {
  kind: "coproc";
  name: string | null;
  command: Node;
}

export interface CondExprNode {
  kind: "cond-expr";
  body: CondNode;
  redirects: Redirect[];
}

export interface ArithCmdNode {
  kind: "arith-cmd";
  expression: ArithNode | null;
  redirects: Redirect[];
}

export interface CommentNode {
  kind: "comment";
  text: string;
}

export interface EmptyNode {
  kind: "empty";
}

export type Node =
  | CommandNode
  | PipelineNode
  | ListNode
  | IfNode
  | LoopNode
  | ForNode
  | ForArithNode
  | CaseNode
  | FunctionNode
  | GroupNode
  | TimeNode
  | NegationNode
  | CoprocNode
  | CondExprNode
  | ArithCmdNode
  | CommentNode
  | EmptyNode;

/**
 * True when the word is nothing but one command substitution, optionally
 * wrapped in double quotes: its whole value is computed at run time.
 */
export function isPureSubstitution(word: Word): boolean {
  if (word.parts.length !== 1) return false;
  const part = word.parts[0];
  if (part.kind !== "cmdsub") return false;
  return word.value === part.source || word.value === `"${part.source}"`;
}
