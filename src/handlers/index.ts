import type { Handler } from "../types.js";
import { findHandler } from "./find.js";
import { gitHandler } from "./git.js";
import { pythonHandler } from "./python.js";
import { sedHandler } from "./sed.js";
import { shellHandler } from "./shell.js";
import { mysqlHandler, psqlHandler, sqliteHandler } from "./sql-clients.js";
import { teeHandler } from "./tee.js";
import { xargsHandler } from "./xargs.js";

export const HANDLERS: readonly Handler[] = [
  gitHandler,
  shellHandler,
  xargsHandler,
  findHandler,
  sedHandler,
  teeHandler,
  pythonHandler,
  sqliteHandler,
  psqlHandler,
  mysqlHandler,
];

const BY_COMMAND = new Map<string, Handler>(
  HANDLERS.flatMap((handler) => handler.commands.map((command) => [command, handler] as const)),
);

export function getHandler(command: string): Handler | null {
  return BY_COMMAND.get(command) ?? null;
}

export function hasHandler(command: string): boolean {
  return BY_COMMAND.has(command);
}
