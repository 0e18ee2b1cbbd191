import type { Classification, Handler, HandlerContext } from "../types.js";

export const shellHandler: Handler = {
  commands: ["bash", "sh", "zsh", "dash", "ksh"],
  runsPrograms: true,

  classify({ tokens }: HandlerContext): Classification {
    const base = tokens[0] ?? "shell";
    // -c alone or bundled with other short flags (-lc, -xc)
    const index = tokens.findIndex((t, i) => i > 0 && /^-[a-zA-Z]*c[a-zA-Z]*$/.test(t));
    if (index < 0) {
      const script = tokens.slice(1).find((t) => !t.startsWith("-"));
      return { action: "ask", description: script ? `${base} ${script}` : `${base} interactive` };
    }

    const inner = tokens[index + 1];
    if (!inner || !inner.trim()) return { action: "ask", description: `${base} -c (no command)` };
    return { action: "delegate", description: `${base} -c`, innerCommand: inner };
  },
};
