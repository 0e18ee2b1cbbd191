#!/usr/bin/env node
import { runHook, resolveMode } from "./host.js";
import { flushLogs } from "./logger.js";

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

async function main() {
  const output = await runHook(await readStdin(), {
    mode: resolveMode(process.argv.slice(2)),
    explicitAsk: Boolean(process.env.CMDGATE_ASK_EXPLICIT),
  });
  if (output !== null) process.stdout.write(output + "\n");
  await flushLogs();
}

main().catch((error) => {
  console.error("cmdgate hook error:", error);
  process.exit(1);
});
