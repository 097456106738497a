/**
 * Core special forms:
 * - (quote datum)
 * - (set! name value)
 * - (define name value)  or  (define (name params...) body...)
 * - (if test consequent alternative?)
 * - (lambda (params...) body...)
 * - (begin expr...)
 * - (and expr...), (or expr...)
 * - (define-syntax name (syntax-rules ...))
 */

import {
  type Environment,
  type ListValue,
  type Value,
  Compound,
  Errors,
  FALSE,
  OK,
  TRUE,
  isList,
  isSymbol,
  isTruthy,
  valueToString,
} from "@circlet/core";
import type { Evaluator } from "./evaluator";
import { makeSyntaxRules } from "./macro";
import { SpecialFormRegistry } from "./registry";

export function createCoreRegistry(): SpecialFormRegistry {
  const registry = new SpecialFormRegistry();
  installCoreForms(registry);
  return registry;
}

export function installCoreForms(registry: SpecialFormRegistry): void {
  registry.register("quote", evalQuote);
  registry.register("set!", evalSet);
  registry.register("define", evalDefine);
  registry.register("if", evalIf);
  registry.register("lambda", evalLambda);
  registry.register("begin", evalBegin);
  registry.register("and", evalAnd);
  registry.register("or", evalOr);
  registry.register("define-syntax", evalDefineSyntax);
}

function evalQuote(form: ListValue): Value {
  if (form.elements.length !== 2) {
    throw Errors.malformedSyntax("quote requires exactly one argument");
  }
  return form.elements[1];
}

function evalSet(form: ListValue, env: Environment, evaluator: Evaluator): Value {
  const [, target, valueExpr] = form.elements;
  if (form.elements.length !== 3 || !isSymbol(target)) {
    throw Errors.malformedSyntax("set! requires a name and a value");
  }
  env.assign(target.name, evaluator.evaluate(valueExpr, env));
  return OK;
}

function evalDefine(form: ListValue, env: Environment, evaluator: Evaluator): Value {
  const [, nameOrSignature, ...body] = form.elements;

  if (form.elements.length >= 2 && isSymbol(nameOrSignature)) {
    // (define name value)
    if (body.length !== 1) {
      throw Errors.malformedSyntax(`define ${nameOrSignature.name} requires exactly one value`);
    }
    env.define(nameOrSignature.name, evaluator.evaluate(body[0], env));
    return OK;
  }

  if (form.elements.length >= 2 && isList(nameOrSignature) && nameOrSignature.elements.length > 0) {
    // (define (name params...) body...)
    const [name, ...params] = nameOrSignature.elements;
    if (!isSymbol(name)) {
      throw Errors.malformedSyntax(`procedure name must be a symbol, got ${valueToString(name)}`);
    }
    if (body.length === 0) {
      throw Errors.malformedSyntax(`define ${name.name} requires a body`);
    }
    env.define(name.name, Compound(parameterNames(params), body, env, name.name));
    return OK;
  }

  throw Errors.malformedSyntax("define requires a name or a (name params...) signature");
}

function evalIf(form: ListValue, env: Environment, evaluator: Evaluator): Value {
  const [, test, consequent, alternative] = form.elements;
  if (form.elements.length < 3 || form.elements.length > 4) {
    throw Errors.malformedSyntax("if requires a test, a consequent and an optional alternative");
  }

  if (isTruthy(evaluator.evaluate(test, env))) {
    return evaluator.evaluate(consequent, env);
  }
  return form.elements.length === 4 ? evaluator.evaluate(alternative, env) : FALSE;
}

function evalLambda(form: ListValue, env: Environment): Value {
  const [, params, ...body] = form.elements;
  if (form.elements.length < 3 || !isList(params)) {
    throw Errors.malformedSyntax("lambda requires a parameter list and a body");
  }
  return Compound(parameterNames(params.elements), body, env);
}

function evalBegin(form: ListValue, env: Environment, evaluator: Evaluator): Value {
  if (form.elements.length < 2) {
    throw Errors.malformedSyntax("begin requires at least one expression");
  }
  return evaluator.evaluateSequence(form.elements.slice(1), env);
}

function evalAnd(form: ListValue, env: Environment, evaluator: Evaluator): Value {
  let result: Value = TRUE;
  for (let i = 1; i < form.elements.length; i++) {
    result = evaluator.evaluate(form.elements[i], env);
    if (!isTruthy(result)) {
      return result;
    }
  }
  return result;
}

function evalOr(form: ListValue, env: Environment, evaluator: Evaluator): Value {
  for (let i = 1; i < form.elements.length; i++) {
    const result = evaluator.evaluate(form.elements[i], env);
    if (isTruthy(result)) {
      return result;
    }
  }
  return FALSE;
}

function evalDefineSyntax(form: ListValue, env: Environment): Value {
  const [, name, rules] = form.elements;
  if (form.elements.length !== 3 || !isSymbol(name)) {
    throw Errors.malformedSyntax("define-syntax requires a name and a syntax-rules form");
  }
  env.define(name.name, makeSyntaxRules(name.name, rules, env));
  return OK;
}

function parameterNames(params: Value[]): string[] {
  const names: string[] = [];
  for (const param of params) {
    if (!isSymbol(param)) {
      throw Errors.malformedSyntax(`parameter must be a symbol, got ${valueToString(param)}`);
    }
    if (names.includes(param.name)) {
      throw Errors.malformedSyntax(`duplicate parameter '${param.name}'`);
    }
    names.push(param.name);
  }
  return names;
}
