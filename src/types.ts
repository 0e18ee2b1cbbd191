export type Action = "allow" | "ask" | "deny";

export interface Decision {
  readonly action: Action;
  readonly reason: string;
  readonly children: readonly Decision[];
}

export type HandlerAction = "allow" | "ask" | "delegate";

export interface Classification {
  action: HandlerAction;
  description: string;
  /** Command string to analyze in place of this one when `action` is "delegate". */
  innerCommand?: string;
  /** Files the command writes, checked against redirect rules. */
  redirectTargets?: string[];
}

export interface HandlerContext {
  tokens: string[];
  cwd: string;
}

export interface Handler {
  commands: readonly string[];
  classify(ctx: HandlerContext): Classification;
  describe?(tokens: string[]): string;
  /**
   * Set when later tokens may belong to a script, query or command the
   * handler's command runs, so a trailing `-h` is not taken as a help request.
   */
  runsPrograms?: boolean;
}

export type RuleDecision = Action;

export type RuleTarget = "command" | "redirect";

export interface Rule {
  decision: RuleDecision;
  target: RuleTarget;
  pattern: string;
  message?: string;
  /** File the rule was loaded from, for error messages. */
  source?: string;
}

export interface RuleMatch {
  decision: RuleDecision;
  pattern: string;
  message?: string;
}

export type LogBackend = "jsonl" | "sqlite";

export interface Config {
  rules: Rule[];
  aliases: Record<string, string>;
  projectRoot: string | null;
  logFile: string | false;
  logBackend: LogBackend;
}

export type ViolationKind =
  | "syntax"
  | "import"
  | "builtin"
  | "method"
  | "reflection"
  | "async"
  | "io";

export interface Violation {
  line: number;
  col: number;
  kind: ViolationKind;
  detail: string;
}
