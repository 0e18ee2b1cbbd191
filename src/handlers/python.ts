import { basename, isAbsolute, resolve } from "path";
import { analyzePythonFile } from "../python-safety.js";
import type { Classification, Handler, HandlerContext } from "../types.js";

const SAFE_FLAGS = new Set(["-V", "--version", "-h", "--help", "-VV"]);
const FLAGS_WITH_ARG = new Set(["-c", "-m", "-W", "-X", "--check-hash-based-pycs"]);

// python3.8 .. python3.19
const VERSIONED = Array.from({ length: 12 }, (_, i) => `python3.${i + 8}`);

/** Interpreter options up to and including `-c`/`-m`; later tokens belong to the program. */
function interpreterOptions(tokens: string[]): { options: string[]; next: number } {
  const options: string[] = [];
  let i = 1;
  while (i < tokens.length && tokens[i].startsWith("-") && tokens[i] !== "-") {
    const token = tokens[i];
    options.push(token);
    if (token === "-c" || token === "-m") return { options, next: i + 1 };
    i += FLAGS_WITH_ARG.has(token) ? 2 : 1;
  }
  return { options, next: i };
}

function describe(tokens: string[]): string {
  const base = tokens[0];
  const { options, next } = interpreterOptions(tokens);
  const safe = options.find((t) => SAFE_FLAGS.has(t));
  if (safe) return `${base} ${safe}`;
  const last = options[options.length - 1];
  if (last === "-c") return `${base} -c`;
  if (last === "-m") return next < tokens.length ? `${base} -m ${tokens[next]}` : `${base} -m`;
  return next < tokens.length ? `${base} ${basename(tokens[next])}` : base;
}

export const pythonHandler: Handler = {
  commands: ["python", "python3", ...VERSIONED],
  runsPrograms: true,

  classify({ tokens, cwd }: HandlerContext): Classification {
    const description = describe(tokens);
    if (tokens.length < 2) return { action: "ask", description: `${tokens[0]} interactive` };

    // `python3 script.py -h` passes -h to the script
    const { options, next } = interpreterOptions(tokens);
    if (options.some((t) => SAFE_FLAGS.has(t))) return { action: "allow", description };
    const last = options[options.length - 1];
    if (last === "-c") return { action: "ask", description };
    if (last === "-m") {
      // calendar only prints; most other -m targets run code or touch files
      return { action: tokens[next] === "calendar" ? "allow" : "ask", description };
    }
    if (options.includes("-i")) return { action: "ask", description };
    if (next >= tokens.length) return { action: "ask", description };

    const script = tokens[next];
    const verdict = analyzePythonFile(isAbsolute(script) ? resolve(script) : resolve(cwd, script));
    return verdict.safe
      ? { action: "allow", description: `${description} (analyzed)` }
      : { action: "ask", description: `${description}: ${verdict.reason}` };
  },

  describe,
};
