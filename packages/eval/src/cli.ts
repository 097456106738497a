import { readFile } from "node:fs/promises";
import process from "node:process";

import { wrapError } from "@circlet/core";
import { startRepl } from "./repl";
import { type Runtime, createRuntime } from "./runtime";

async function runFile(runtime: Runtime, path: string): Promise<void> {
  const source = await readFile(path, "utf8");
  const result = runtime.tryRun(source, path);
  if (!result.ok) {
    console.error(result.error.format());
    process.exitCode = 1;
  }
}

async function main(): Promise<void> {
  const runtime = createRuntime({
    onTrace: process.env.CIRCLET_TRACE === "1" ? (line) => console.error(line) : undefined,
  });

  const target = process.argv[2];
  if (target) {
    await runFile(runtime, target);
    return;
  }
  startRepl(runtime, { input: process.stdin, output: process.stdout });
}

main().catch((err: unknown) => {
  console.error(wrapError(err).format());
  process.exitCode = 1;
});
