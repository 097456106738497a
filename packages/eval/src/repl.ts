import { type Interface, createInterface } from "node:readline";

import { type Value, valueToString, wrapError } from "@circlet/core";
import { isComplete, read } from "./reader";
import type { Runtime } from "./runtime";

const PROMPT = "; circlet> ";
const CONTINUATION = "; ...      ";
const RESULT_PREFIX = ";= ";

export interface ReplOptions {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

function completer(runtime: Runtime): (line: string) => [string[], string] {
  return (line) => {
    const word = /[^\s()']*$/.exec(line)?.[0] ?? "";
    const names = [...runtime.evaluator.registry.tags(), ...runtime.env.allNames()];
    return [names.filter((name) => name.startsWith(word)).sort(), word];
  };
}

/**
 * Read-eval-print loop over the given streams. Lines accumulate until they
 * form complete expressions; values are printed after ";= " and failures
 * go to console.error without ending the loop.
 */
export function startRepl(runtime: Runtime, options: ReplOptions): Interface {
  const { output } = options;
  const rl = createInterface({
    input: options.input,
    output,
    prompt: PROMPT,
    completer: completer(runtime),
  });
  let buffer = "";

  const show = (value: Value | undefined): void => {
    if (value !== undefined) {
      output.write(`${RESULT_PREFIX}${valueToString(value)}\n`);
    }
  };

  rl.on("line", (line) => {
    buffer = buffer ? `${buffer}\n${line}` : line;
    if (!isComplete(buffer)) {
      rl.setPrompt(CONTINUATION);
      rl.prompt();
      return;
    }

    const result = runtime.tryRun(buffer);
    buffer = "";
    if (result.ok) {
      show(result.value);
    } else {
      console.error(result.error.format());
    }
    rl.setPrompt(PROMPT);
    rl.prompt();
  });

  // Input ended inside an expression: report what the reader makes of it
  rl.on("close", () => {
    if (buffer.trim()) {
      try {
        read(buffer);
      } catch (error) {
        console.error(wrapError(error).format());
      }
    }
    output.write("\n");
  });

  rl.prompt();
  return rl;
}
