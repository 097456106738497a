import { once } from "node:events";
import { PassThrough, Writable } from "node:stream";
import { afterEach, describe, it, expect, vi } from "vitest";
import { createRuntime } from "./runtime";
import { startRepl } from "./repl";

async function session(lines: string, displayed: string[] = []) {
  const errors = vi.spyOn(console, "error").mockImplementation(() => {});
  const written: string[] = [];
  const input = new PassThrough();
  const output = new Writable({
    write(chunk, _encoding, callback) {
      written.push(String(chunk));
      callback();
    },
  });

  const runtime = createRuntime({ prelude: false, onOutput: (text) => displayed.push(text) });
  const rl = startRepl(runtime, { input, output });
  const closed = once(rl, "close");
  input.end(lines);
  await closed;

  return { output: written.join(""), errors: errors.mock.calls.map(([message]) => String(message)) };
}

describe("startRepl", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints each value and continues lines until the expression closes", async () => {
    const { output, errors } = await session("(+ 1\n2)\n'done\n");

    expect(output).toBe("; circlet> ; ...      ;= 3\n; circlet> ;= done\n; circlet> \n");
    expect(errors).toEqual([]);
  });

  it("continues a string literal across lines", async () => {
    const displayed: string[] = [];
    const { output } = await session('(display "a\nb")\n', displayed);

    expect(displayed).toEqual(["a\nb"]);
    expect(output).toBe("; circlet> ; ...      ;= ok\n; circlet> \n");
  });

  it("reports failures and keeps reading", async () => {
    const { output, errors } = await session("(car '())\n1\n");

    expect(errors).toEqual([
      "EvalError [E205]: car expects a non-empty list, got ()\nHint: Check that you're passing the right type to this procedure",
    ]);
    expect(output).toBe("; circlet> ; circlet> ;= 1\n; circlet> \n");
  });

  it("reports an expression left open when input ends", async () => {
    const { errors } = await session("(car\n");

    expect(errors).toEqual([
      "ReadError [E100]: Unexpected end of input\n  at 1:5\nHint: The input may be incomplete - check for a missing closing parenthesis",
    ]);
  });
});
