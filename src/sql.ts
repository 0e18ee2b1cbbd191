/**
 * Dialect-agnostic read-only detection for SQL statements.
 *
 * The answer is tri-state: `true` (read-only), `false` (writes) or `null`
 * (unknown or ambiguous, e.g. several statements).
 */

const QUOTED = /'(?:[^']*'')*[^']*'|"(?:[^"]*"")*[^"]*"|`[^`]*`|\[[^\]]*\]|--[^\n]*|\/\*[\s\S]*?\*\//g;
const KEYWORD = /[A-Za-z_]\w*/y;
const WHITESPACE = /\s/;

const READONLY_KEYWORDS = ["SELECT", "SHOW", "DESCRIBE", "EXPLAIN"];
const WRITE_KEYWORDS = [
  "INSERT",
  "CREATE",
  "ALTER",
  "DROP",
  "TRUNCATE",
  "DELETE",
  "UPDATE",
  "MERGE",
  "GRANT",
  "REVOKE",
  "REPLACE",
];

export interface SqlDialect {
  readonly: readonly string[];
  write: readonly string[];
}

export const SQL_DIALECT_NAMES = ["sqlite", "postgres", "mysql", "athena"] as const;

export type SqlDialectName = (typeof SQL_DIALECT_NAMES)[number];

/** Extra keywords per engine; none of these are read-only everywhere. */
export const SQL_DIALECTS: Record<SqlDialectName, SqlDialect> = {
  sqlite: { readonly: [], write: ["PRAGMA", "ATTACH", "DETACH", "VACUUM", "REINDEX", "ANALYZE"] },
  postgres: { readonly: [], write: ["COPY", "VACUUM", "CLUSTER", "REINDEX", "ANALYZE"] },
  mysql: { readonly: [], write: ["LOAD"] },
  athena: { readonly: [], write: ["MSCK", "UNLOAD", "VACUUM"] },
};

export interface SqlOptions {
  extraReadonly?: Iterable<string>;
  extraWrite?: Iterable<string>;
}

function stripQuoted(sql: string): string {
  return sql.replace(QUOTED, " ");
}

function readKeyword(sql: string, pos: number): string | null {
  KEYWORD.lastIndex = pos;
  const match = KEYWORD.exec(sql);
  return match ? match[0] : null;
}

function skipWhitespace(sql: string, pos: number): number {
  while (pos < sql.length && WHITESPACE.test(sql[pos])) pos++;
  return pos;
}

function hasMultipleStatements(stripped: string): boolean {
  const first = stripped.indexOf(";");
  if (first < 0) return false;
  const after = stripped.slice(first + 1);
  const rest = after.trim();
  if (!rest) return false;
  if (![...rest].every((ch) => ch === ";")) return true;
  // "SELECT 1;;" is one statement, "SELECT 1; ;" is not
  for (let i = 0; i < after.length; i++) {
    if (WHITESPACE.test(after[i])) {
      if (after.slice(i + 1).includes(";")) return true;
    } else if (after[i] !== ";") {
      return true;
    }
  }
  return false;
}

function skipParens(sql: string, pos: number): number {
  let depth = 0;
  for (; pos < sql.length; pos++) {
    if (sql[pos] === "(") depth++;
    else if (sql[pos] === ")") {
      depth--;
      if (depth === 0) return pos + 1;
    }
  }
  return pos;
}

/**
 * Skip `name [(cols)] AS (body), ...` after WITH and return the offset of the
 * main statement's keyword.
 */
function skipCommonTableExpressions(sql: string, pos: number): number {
  let expectAs = true;
  while (pos < sql.length) {
    pos = skipWhitespace(sql, pos);
    if (pos >= sql.length) break;
    const ch = sql[pos];
    if (ch === "(") {
      // before AS this is a column list, after it the CTE body
      pos = skipParens(sql, pos);
      continue;
    }
    if (ch === ",") {
      pos++;
      expectAs = true;
      continue;
    }
    const word = readKeyword(sql, pos);
    if (word === null) {
      pos++;
      continue;
    }
    if (!expectAs) return pos;
    if (word.toUpperCase() === "AS") expectAs = false;
    pos += word.length;
  }
  return pos;
}

function selectHasInto(sql: string, pos: number): boolean {
  while (pos < sql.length) {
    pos = skipWhitespace(sql, pos);
    if (pos >= sql.length) break;
    const word = readKeyword(sql, pos);
    if (word === null) {
      pos++;
      continue;
    }
    const upper = word.toUpperCase();
    if (upper === "INTO") return true;
    if (upper === "FROM") return false;
    pos += word.length;
  }
  return false;
}

export function isReadonlySql(sql: string, options: SqlOptions = {}): boolean | null {
  const stripped = stripQuoted(sql);
  if (hasMultipleStatements(stripped)) return null;

  const readonly = new Set([...READONLY_KEYWORDS, ...[...(options.extraReadonly ?? [])].map((k) => k.toUpperCase())]);
  const write = new Set([...WRITE_KEYWORDS, ...[...(options.extraWrite ?? [])].map((k) => k.toUpperCase())]);

  let pos = skipWhitespace(stripped, 0);
  while (pos < stripped.length) {
    const word = readKeyword(stripped, pos);
    if (word === null) return null;
    const keyword = word.toUpperCase();
    if (keyword === "WITH") {
      pos = skipWhitespace(stripped, skipCommonTableExpressions(stripped, pos + word.length));
      continue;
    }
    if (keyword === "SELECT") return !selectHasInto(stripped, pos + word.length);
    if (readonly.has(keyword)) return true;
    if (write.has(keyword)) return false;
    return null;
  }
  return null;
}

/** Classify with a named dialect's extra vocabulary. */
export function isReadonlySqlFor(sql: string, dialect: SqlDialectName): boolean | null {
  const { readonly, write } = SQL_DIALECTS[dialect];
  return isReadonlySql(sql, { extraReadonly: readonly, extraWrite: write });
}
