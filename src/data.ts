import { readFileSync } from "fs";
import { z } from "zod";

/**
 * Lookup tables shipped in the package's `data/` directory. Resolved relative
 * to this module so the same path works from `src/` and from `dist/`.
 */
function loadTable<T>(name: string, schema: z.ZodType<T>): T {
  const url = new URL(`../data/${name}`, import.meta.url);
  return schema.parse(JSON.parse(readFileSync(url, "utf-8")));
}

const stringList = z.array(z.string());

const safeCommandsSchema = z.object({ safe: stringList });

const pythonSafetySchema = z.object({
  safeModules: stringList,
  dangerousModules: stringList,
  dangerousBuiltins: stringList,
  dangerousMethods: stringList,
  reflectionAttributes: stringList,
});

const gitSchema = z.object({
  safeActions: stringList,
  actionContext: z.record(z.string()),
  globalFlagsWithArg: stringList,
  globalFlagsNoArg: stringList,
});

export const SAFE_COMMANDS: ReadonlySet<string> = new Set(
  loadTable("safe-commands.json", safeCommandsSchema).safe,
);

export const PYTHON_SAFETY = loadTable("python-safety.json", pythonSafetySchema);

export const GIT_TABLES = loadTable("git.json", gitSchema);
