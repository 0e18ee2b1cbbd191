import type { Classification, Handler, HandlerContext } from "../types.js";

const ADDRESS = /^(?:\d+|\$|\/(?:[^/\\]|\\.)*\/)(?:,(?:\d+|\$|\/(?:[^/\\]|\\.)*\/))?!?\s*/;
const SUBSTITUTE = /^s(.)(?:(?!\1)[^\\]|\\.)*\1(?:(?!\1)[^\\]|\\.)*\1([a-zA-Z0-9]*)/;

/** Scripts given with -e/--expression, or the first operand when there are none. */
function scripts(tokens: string[]): string[] {
  const found: string[] = [];
  let firstOperand: string | null = null;
  for (let i = 1; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === "-e" || token === "--expression") {
      if (i + 1 < tokens.length) found.push(tokens[++i]);
    } else if (token.startsWith("--expression=")) {
      found.push(token.slice("--expression=".length));
    } else if (token === "-f" || token === "--file") {
      i++;
    } else if (!token.startsWith("-") && firstOperand === null) {
      firstOperand = token;
    }
  }
  if (found.length === 0 && firstOperand !== null) found.push(firstOperand);
  return found;
}

/** Problem with one script, or null when it only edits the stream. */
function scriptProblem(script: string): string | null {
  for (const raw of script.split(/[;\n]/)) {
    const command = raw.trim().replace(/^[{}]\s*/, "").replace(ADDRESS, "");
    if (/^[wW](\s|$)/.test(command)) return "writes file";
    if (/^e(\s|$)/.test(command)) return "executes command";
    const sub = SUBSTITUTE.exec(command);
    if (sub) {
      if (sub[2].includes("w")) return "writes file";
      if (sub[2].includes("e")) return "executes command";
    }
  }
  return null;
}

export const sedHandler: Handler = {
  commands: ["sed"],

  classify({ tokens }: HandlerContext): Classification {
    for (const token of tokens.slice(1)) {
      if (token.startsWith("--in-place")) return { action: "ask", description: "sed --in-place" };
      if (/^-[a-zA-Z]*i/.test(token) && !token.startsWith("--")) return { action: "ask", description: "sed -i" };
    }
    if (tokens.includes("-f") || tokens.includes("--file")) {
      return { action: "ask", description: "sed -f (script file)" };
    }
    for (const script of scripts(tokens)) {
      const problem = scriptProblem(script);
      if (problem) return { action: "ask", description: `sed (${problem})` };
    }
    return { action: "allow", description: "sed" };
  },
};
