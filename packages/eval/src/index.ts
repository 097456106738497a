// @circlet/eval - reader, evaluator, special forms and syntax-rules macros

import type { Environment, Expression, Value } from "@circlet/core";
import { Evaluator } from "./evaluator";
import type { SpecialFormHandler } from "./registry";
import { createCoreRegistry } from "./special-forms";

export { isComplete, read, readOne } from "./reader";
export { Evaluator, type EvaluatorOptions } from "./evaluator";
export { SpecialFormRegistry, type SpecialFormHandler } from "./registry";
export { createCoreRegistry, installCoreForms } from "./special-forms";
export {
  DERIVED_FORMS,
  condToIf,
  letToCombination,
  sequenceToExpression,
  type DerivedFormRewriter,
} from "./derived";
export {
  ELLIPSIS,
  compilePattern,
  match,
  matchCompiled,
  matchStructured,
  flattenBindings,
  type Bindings,
  type CompiledPattern,
  type MatchTree,
  type PatternNode,
  type StructuredBindings,
} from "./pattern";
export { expandMacro, makeSyntaxRules } from "./macro";
export { createPrimitiveTable, type PrimitiveOptions, type PrimitiveTable } from "./primitives";
export { createRuntime, makeGlobalEnvironment, type Runtime, type RuntimeOptions } from "./runtime";
export { startRepl, type ReplOptions } from "./repl";

// Process-wide evaluator over the core forms. Forms added through
// registerSpecialForm must be registered before the first evaluate.
const defaultRegistry = createCoreRegistry();
const defaultEvaluator = new Evaluator({ registry: defaultRegistry });

export function registerSpecialForm(tag: string, handler: SpecialFormHandler): void {
  defaultRegistry.register(tag, handler);
}

export function evaluate(expr: Expression, env: Environment): Value {
  return defaultEvaluator.evaluate(expr, env);
}

export function apply(procedure: Value, args: Value[]): Value {
  return defaultEvaluator.apply(procedure, args);
}
