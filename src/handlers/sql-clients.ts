import { isReadonlySqlFor, type SqlDialectName } from "../sql.js";
import type { Classification, Handler, HandlerContext } from "../types.js";

function classifyQueries(client: string, queries: string[], dialect: SqlDialectName): Classification {
  if (queries.length === 0) return { action: "ask", description: `${client} (interactive)` };
  for (const sql of queries) {
    const readonly = isReadonlySqlFor(sql, dialect);
    if (readonly === false) return { action: "ask", description: `${client} (write query)` };
    if (readonly === null) return { action: "ask", description: `${client} (unknown query)` };
  }
  return { action: "allow", description: `${client} (read-only query)` };
}

/** `--name=value` with one layer of matching quotes removed. */
function inlineValue(token: string, prefix: string): string | null {
  if (!token.startsWith(prefix)) return null;
  const value = token.slice(prefix.length);
  if (value.length >= 2 && (value[0] === "'" || value[0] === '"') && value.endsWith(value[0])) {
    return value.slice(1, -1);
  }
  return value;
}

const SQLITE_NO_ARG = new Set([
  "-append", "-ascii", "-bail", "-batch", "-box", "-column", "-csv", "-deserialize", "-echo",
  "-header", "-noheader", "-help", "-html", "-interactive", "-json", "-line", "-list",
  "-markdown", "-memtrace", "-nofollow", "-quote", "-readonly", "-safe", "-stats", "-table",
  "-tabs", "-version", "-vfstrace",
]);

const SQLITE_WITH_ARG = new Set([
  "-cmd", "-init", "-key", "-hexkey", "-textkey", "-lookaside", "-maxsize", "-newline",
  "-nonce", "-nullvalue", "-pagecache", "-separator", "-vfs", "-escape", "-A",
]);

/** `sqlite3 [OPTIONS] [FILENAME [SQL...]]`: `-cmd` values and arguments after the filename. */
function sqliteInputs(tokens: string[]): string[] {
  const inputs: string[] = [];
  let filenameSeen = false;
  for (let i = 1; i < tokens.length; i++) {
    const token = tokens[i];
    if (SQLITE_WITH_ARG.has(token)) {
      if (token === "-cmd" && i + 1 < tokens.length) inputs.push(tokens[i + 1]);
      i++;
    } else if (SQLITE_NO_ARG.has(token) || token.startsWith("-")) {
      continue;
    } else if (!filenameSeen) {
      filenameSeen = true;
    } else {
      inputs.push(token);
    }
  }
  return inputs;
}

// dot-commands such as `.shell` act outside SQL
function hasDotCommand(input: string): boolean {
  return input.split("\n").some((line) => line.trimStart().startsWith("."));
}

export const sqliteHandler: Handler = {
  commands: ["sqlite3"],
  runsPrograms: true,

  classify({ tokens }: HandlerContext): Classification {
    if (tokens.some((t) => t === "-help" || t === "--help" || t === "-version")) {
      return { action: "allow", description: "sqlite3 help/version" };
    }
    if (tokens.includes("-init")) return { action: "ask", description: "sqlite3 (init script)" };

    const inputs = sqliteInputs(tokens);
    if (tokens.includes("-readonly") || tokens.includes("-safe")) {
      if (inputs.some(hasDotCommand)) return { action: "ask", description: "sqlite3 (dot-command)" };
      return { action: "allow", description: "sqlite3 (read-only mode)" };
    }
    // several arguments are separate statements run in turn
    return classifyQueries("sqlite3", inputs.length ? [inputs.join(" ")] : [], "sqlite");
  },
};

export const psqlHandler: Handler = {
  commands: ["psql"],
  runsPrograms: true,

  classify({ tokens }: HandlerContext): Classification {
    if (tokens.some((t) => t === "--help" || t === "--version" || t === "-V")) {
      return { action: "allow", description: "psql help/version" };
    }
    if (tokens.includes("-l") || tokens.includes("--list")) return { action: "allow", description: "psql --list" };
    if (tokens.some((t) => t === "--file" || t.startsWith("--file=") || t.startsWith("-f"))) {
      return { action: "ask", description: "psql (file input)" };
    }

    const queries: string[] = [];
    for (let i = 1; i < tokens.length; i++) {
      const token = tokens[i];
      if ((token === "-c" || token === "--command") && i + 1 < tokens.length) {
        queries.push(tokens[++i]);
        continue;
      }
      const inline = inlineValue(token, "--command=");
      if (inline !== null) queries.push(inline);
    }
    return classifyQueries("psql", queries, "postgres");
  },
};

export const mysqlHandler: Handler = {
  commands: ["mysql"],
  runsPrograms: true,

  classify({ tokens }: HandlerContext): Classification {
    if (tokens.some((t) => t === "--help" || t === "-?" || t === "--version" || t === "-V")) {
      return { action: "allow", description: "mysql help/version" };
    }

    for (let i = 1; i < tokens.length; i++) {
      const token = tokens[i];
      if (token === "-e" || token === "--execute") {
        return classifyQueries("mysql", i + 1 < tokens.length ? [tokens[i + 1]] : [], "mysql");
      }
      const inline = inlineValue(token, "--execute=");
      if (inline !== null) return classifyQueries("mysql", [inline], "mysql");
      if (token.startsWith("-e") && token.length > 2) return classifyQueries("mysql", [token.slice(2)], "mysql");
    }
    return classifyQueries("mysql", [], "mysql");
  },
};
