import { GIT_TABLES } from "../data.js";
import type { Classification, Handler, HandlerContext } from "../types.js";

const SAFE_ACTIONS = new Set(GIT_TABLES.safeActions);
const FLAGS_WITH_ARG = new Set(GIT_TABLES.globalFlagsWithArg);
const FLAGS_NO_ARG = new Set(GIT_TABLES.globalFlagsNoArg);

/** Locate the subcommand after global options such as `-C dir` or `--git-dir=x`. */
function findAction(tokens: string[]): { index: number; action: string } | null {
  let i = 1;
  while (i < tokens.length) {
    const token = tokens[i];
    if (FLAGS_WITH_ARG.has(token)) {
      i += 2;
      continue;
    }
    if ([...FLAGS_WITH_ARG].some((flag) => token.startsWith(`${flag}=`)) || FLAGS_NO_ARG.has(token)) {
      i++;
      continue;
    }
    if (!token.startsWith("-")) return { index: i, action: token };
    // unknown option: can't tell where the action is
    return null;
  }
  return null;
}

function describe(tokens: string[], withContext = false): string {
  const found = findAction(tokens);
  if (!found) return "git";
  const context = Object.hasOwn(GIT_TABLES.actionContext, found.action) ? GIT_TABLES.actionContext[found.action] : null;
  return withContext && context ? `git ${found.action} (${context})` : `git ${found.action}`;
}

const positional = (rest: string[]) => rest.filter((t) => !t.startsWith("-"));

function listingOnly(rest: string[], unsafe: Set<string>, listing: Set<string>): boolean {
  if (rest.some((t) => unsafe.has(t))) return false;
  if (rest.some((t) => listing.has(t) || t.startsWith("--list"))) return true;
  // a bare name creates one
  return positional(rest).length === 0;
}

const LISTING_FLAGS = ["--list", "-l", "--contains", "--no-contains", "--merged", "--no-merged", "--points-at"];

function checkBranch(rest: string[]): boolean {
  if (rest.some((t) => t === "-u" || t.startsWith("--set-upstream-to"))) return false;
  return listingOnly(
    rest,
    new Set(["-d", "-D", "--delete", "-m", "-M", "--move", "-c", "-C", "--copy"]),
    new Set(LISTING_FLAGS),
  );
}

function checkTag(rest: string[]): boolean {
  return listingOnly(rest, new Set(["-d", "--delete"]), new Set(LISTING_FLAGS));
}

function checkRemote(rest: string[]): boolean {
  if (rest.length === 0) return true;
  const unsafe = ["add", "remove", "rm", "rename", "set-url", "prune", "set-head", "set-branches"];
  return !unsafe.includes(rest[0]);
}

function checkStash(rest: string[]): boolean {
  return rest.length > 0 && (rest[0] === "list" || rest[0] === "show");
}

function checkConfig(rest: string[]): boolean {
  const writing = ["-e", "--edit", "--unset", "--unset-all", "--add", "--replace-all", "--remove-section", "--rename-section"];
  if (rest.some((t) => writing.includes(t))) return false;
  const reading = ["--get", "--get-all", "--list", "-l", "--get-regexp", "--get-urlmatch"];
  if (rest.some((t) => reading.includes(t))) return true;
  // `git config key` reads, `git config key value` writes
  return positional(rest).length <= 1;
}

function checkNotes(rest: string[]): boolean {
  if (rest.length === 0) return true;
  return !["add", "copy", "append", "edit", "merge", "remove", "prune"].includes(rest[0]);
}

const firstIn = (...safe: string[]) => (rest: string[]) => rest.length > 0 && safe.includes(rest[0]);

const SUBCOMMAND_CHECKS = new Map<string, (rest: string[]) => boolean>(Object.entries({
  branch: checkBranch,
  tag: checkTag,
  remote: checkRemote,
  stash: checkStash,
  config: checkConfig,
  notes: checkNotes,
  bisect: firstIn("log", "visualize", "view"),
  worktree: firstIn("list"),
  // `foreach` runs an arbitrary command in every submodule
  submodule: firstIn("status", "summary"),
  apply: (rest: string[]) => rest.includes("--check"),
  "sparse-checkout": firstIn("list"),
  bundle: firstIn("verify", "list-heads"),
  lfs: firstIn("fetch", "ls-files", "status", "env", "version"),
  "hash-object": (rest: string[]) => !rest.includes("-w") && !rest.includes("--write"),
  "symbolic-ref": (rest: string[]) => positional(rest).length <= 1,
  replace: (rest: string[]) => rest.length === 0 || rest.includes("-l") || rest.includes("--list"),
  rerere: (rest: string[]) => rest.length === 0 || rest[0] === "status" || rest[0] === "diff",
}));

export const gitHandler: Handler = {
  commands: ["git"],

  classify({ tokens }: HandlerContext): Classification {
    const found = findAction(tokens);
    if (!found) return { action: "ask", description: "git" };

    const rest = tokens.slice(found.index + 1);
    const check = SUBCOMMAND_CHECKS.get(found.action);
    const safe = check ? check(rest) : SAFE_ACTIONS.has(found.action);

    return { action: safe ? "allow" : "ask", description: describe(tokens, !safe) };
  },

  describe: (tokens) => describe(tokens),
};
