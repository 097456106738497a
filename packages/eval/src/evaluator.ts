/**
 * Metacircular evaluator
 *
 * evaluate classifies an expression, first match wins:
 * 1. numbers, strings and booleans evaluate to themselves
 * 2. symbols are looked up in the environment
 * 3. lists headed by a registered special form go to its handler
 * 4. derived forms (cond, let) are rewritten and evaluated again
 * 5. lists headed by a name bound to a syntax-rules macro are expanded
 * 6. any other non-empty list is an application
 *
 * Compound bodies are evaluated by ordinary recursion, so host stack depth
 * grows with the depth of nested calls, tail calls included.
 */

import {
  type Environment,
  type Expression,
  type Procedure,
  type Value,
  Errors,
  isBoolean,
  isList,
  isMacro,
  isNumber,
  isString,
  isSymbol,
  valueToString,
} from "@circlet/core";
import { DERIVED_FORMS, type DerivedFormRewriter } from "./derived";
import { expandMacro } from "./macro";
import type { SpecialFormRegistry } from "./registry";
import { createCoreRegistry } from "./special-forms";

export interface EvaluatorOptions {
  registry?: SpecialFormRegistry;
  derivedForms?: ReadonlyMap<string, DerivedFormRewriter>;
  /** Receives one line per procedure application; tracing is off without it. */
  onTrace?: (line: string) => void;
}

export class Evaluator {
  readonly registry: SpecialFormRegistry;
  private readonly derivedForms: ReadonlyMap<string, DerivedFormRewriter>;
  private readonly onTrace?: (line: string) => void;
  private depth = 0;

  constructor(options: EvaluatorOptions = {}) {
    this.registry = options.registry ?? createCoreRegistry();
    this.derivedForms = options.derivedForms ?? DERIVED_FORMS;
    this.onTrace = options.onTrace;
  }

  /**
   * Evaluate a single expression
   */
  evaluate(expr: Expression, env: Environment): Value {
    if (!this.registry.isSealed) {
      this.registry.seal();
    }

    if (isNumber(expr) || isString(expr) || isBoolean(expr)) {
      return expr;
    }

    if (isSymbol(expr)) {
      return env.lookup(expr.name);
    }

    if (isList(expr) && expr.elements.length > 0) {
      const head = expr.elements[0];

      if (isSymbol(head)) {
        const handler = this.registry.get(head.name);
        if (handler) {
          return handler(expr, env, this);
        }

        const rewrite = this.derivedForms.get(head.name);
        if (rewrite) {
          return this.evaluate(rewrite(expr), env);
        }

        const bound = env.find(head.name);
        if (bound && isMacro(bound)) {
          return this.evaluate(expandMacro(bound, expr, env), env);
        }
      }

      const operator = this.evaluate(head, env);
      const args = this.evaluateOperands(expr.elements, env);
      return this.apply(operator, args);
    }

    throw Errors.unknownExpressionType(valueToString(expr));
  }

  /**
   * Apply a procedure to already-evaluated arguments
   */
  apply(procedure: Value, args: Value[]): Value {
    switch (procedure.type) {
      case "primitive": {
        const primitive = procedure;
        return this.traced(primitive, args, () => primitive.fn(args));
      }

      case "compound": {
        const compound = procedure;
        return this.traced(compound, args, () =>
          this.evaluateSequence(compound.body, compound.env.extend(compound.params, args))
        );
      }

      default:
        throw Errors.notAProcedure(valueToString(procedure));
    }
  }

  /**
   * Evaluate each expression for effect except the last, whose value is returned
   */
  evaluateSequence(exprs: Expression[], env: Environment): Value {
    if (exprs.length === 0) {
      throw Errors.malformedSyntax("empty expression sequence");
    }
    for (let i = 0; i < exprs.length - 1; i++) {
      this.evaluate(exprs[i], env);
    }
    return this.evaluate(exprs[exprs.length - 1], env);
  }

  /**
   * Evaluate a list of expressions in order, return the last value
   */
  evalProgram(exprs: Expression[], env: Environment): Value | undefined {
    let result: Value | undefined;
    for (const expr of exprs) {
      result = this.evaluate(expr, env);
    }
    return result;
  }

  // Strictly left to right: each operand finishes before the next starts
  private evaluateOperands(elements: Expression[], env: Environment): Value[] {
    const args: Value[] = [];
    for (let i = 1; i < elements.length; i++) {
      args.push(this.evaluate(elements[i], env));
    }
    return args;
  }

  private traced(procedure: Procedure, args: Value[], call: () => Value): Value {
    if (!this.onTrace) {
      return call();
    }

    const name = procedure.name ?? "lambda";
    const shown = [name, ...args.map((arg) => valueToString(arg))].join(" ");
    this.onTrace(`[trace] ${"  ".repeat(this.depth)}(${shown})`);

    this.depth++;
    try {
      return call();
    } finally {
      this.depth--;
    }
  }
}
