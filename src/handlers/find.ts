import type { Classification, Handler, HandlerContext } from "../types.js";

const UNSAFE = new Set(["-exec", "-execdir", "-ok", "-okdir", "-delete"]);
// -fprint, -fprint0, -fprintf, -fls write to a file
const WRITES_FILE = /^-f(print0?|printf|ls)$/;

export const findHandler: Handler = {
  commands: ["find"],
  runsPrograms: true,

  classify({ tokens }: HandlerContext): Classification {
    for (const token of tokens.slice(1)) {
      if (UNSAFE.has(token) || WRITES_FILE.test(token)) {
        return { action: "ask", description: `find ${token}` };
      }
    }
    return { action: "allow", description: "find" };
  },
};
