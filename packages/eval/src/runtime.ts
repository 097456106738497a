/**
 * Runtime facade: a global environment populated with the primitives and
 * the prelude, plus an evaluator configured from RuntimeOptions.
 */

import { readFileSync } from "fs";
import { join } from "path";
import {
  type Result,
  type Value,
  Environment,
  Err,
  FALSE,
  Ok,
  Primitive,
  TRUE,
  wrapError,
} from "@circlet/core";
import { Evaluator } from "./evaluator";
import { type PrimitiveTable, createPrimitiveTable } from "./primitives";
import { read } from "./reader";
import type { SpecialFormRegistry } from "./registry";

const PRELUDE_PATH = join(__dirname, "prelude.scm");

export interface RuntimeOptions {
  /** Where display and newline write. Defaults to stdout. */
  onOutput?: (text: string) => void;
  /** Receives one line per procedure application; tracing is off without it. */
  onTrace?: (line: string) => void;
  /** Load prelude.scm into the global environment. Defaults to true. */
  prelude?: boolean;
  /** Special forms to evaluate with; defaults to the core forms. */
  registry?: SpecialFormRegistry;
}

export interface Runtime {
  env: Environment;
  evaluator: Evaluator;
  /** Evaluate every expression in source, returning the last value. */
  run: (source: string, file?: string) => Value | undefined;
  tryRun: (source: string, file?: string) => Result<Value | undefined>;
}

/**
 * Bind each primitive in one frame over the empty environment,
 * plus true and false.
 */
export function makeGlobalEnvironment(primitiveTable: PrimitiveTable): Environment {
  const entries = Array.from(primitiveTable);
  const env = Environment.EMPTY.extend(
    entries.map(([name]) => name),
    entries.map(([name, fn]) => Primitive(name, fn))
  );
  env.define("true", TRUE);
  env.define("false", FALSE);
  return env;
}

export function createRuntime(options: RuntimeOptions = {}): Runtime {
  const evaluator = new Evaluator({ registry: options.registry, onTrace: options.onTrace });
  const onOutput = options.onOutput ?? ((text: string) => {
    process.stdout.write(text);
  });

  const env = makeGlobalEnvironment(
    createPrimitiveTable({
      onOutput,
      apply: (procedure, args) => evaluator.apply(procedure, args),
    })
  );

  const run = (source: string, file?: string): Value | undefined =>
    evaluator.evalProgram(read(source, file), env);

  const tryRun = (source: string, file?: string): Result<Value | undefined> => {
    try {
      return Ok(run(source, file));
    } catch (error) {
      return Err(wrapError(error));
    }
  };

  if (options.prelude ?? true) {
    run(readFileSync(PRELUDE_PATH, "utf-8"), "prelude.scm");
  }

  return { env, evaluator, run, tryRun };
}
