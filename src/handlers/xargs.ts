import { quote } from "shell-quote";
import type { Classification, Handler, HandlerContext } from "../types.js";

const FLAGS_WITH_ARG = new Set([
  "-a", "--arg-file", "-d", "--delimiter", "-E", "-e", "--eof", "-I", "-J", "--replace",
  "-L", "-l", "--max-lines", "-n", "--max-args", "-P", "--max-procs", "-R", "-s", "-S",
  "--max-chars", "--process-slot-var",
]);

const INTERACTIVE_FLAGS = new Map([
  ["-p", "xargs -p (prompt before execute)"],
  ["--interactive", "xargs --interactive"],
  ["-o", "xargs -o (open tty)"],
  ["--open-tty", "xargs --open-tty"],
]);

/** Index of the first token of the command xargs runs, or tokens.length. */
function commandStart(tokens: string[]): number {
  let i = 1;
  while (i < tokens.length) {
    const token = tokens[i];
    if (token === "--") return i + 1;
    if (!token.startsWith("-")) return i;
    // -n1 style carries its own value
    i += FLAGS_WITH_ARG.has(token) ? 2 : 1;
  }
  return i;
}

export const xargsHandler: Handler = {
  commands: ["xargs"],
  runsPrograms: true,

  classify({ tokens }: HandlerContext): Classification {
    for (const token of tokens.slice(1)) {
      if (token === "--") break;
      const description = INTERACTIVE_FLAGS.get(token.split("=")[0]);
      if (description) return { action: "ask", description };
    }

    const start = commandStart(tokens);
    if (start >= tokens.length) return { action: "ask", description: "xargs (no command)" };
    return { action: "delegate", description: "xargs", innerCommand: quote(tokens.slice(start)) };
  },
};
