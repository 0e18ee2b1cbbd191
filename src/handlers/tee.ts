import type { Classification, Handler, HandlerContext } from "../types.js";

export const teeHandler: Handler = {
  commands: ["tee"],

  classify({ tokens }: HandlerContext): Classification {
    const targets: string[] = [];
    for (let i = 1; i < tokens.length; i++) {
      if (tokens[i] === "--") {
        targets.push(...tokens.slice(i + 1));
        break;
      }
      if (!tokens[i].startsWith("-")) targets.push(tokens[i]);
    }

    if (targets.length === 0) return { action: "allow", description: "tee" };
    const description = targets.length === 1 ? `tee ${targets[0]}` : `tee ${targets.length} files`;
    return { action: "allow", description, redirectTargets: targets };
  },
};
