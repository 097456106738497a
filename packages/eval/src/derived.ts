/**
 * Derived forms: syntax rewritten into more primitive forms before evaluation.
 *
 * - (cond (test action...)... (else action...)?)  ->  nested if
 * - (let ((name value)...) body...)               ->  ((lambda (name...) body...) value...)
 */

import {
  type Expression,
  type ListValue,
  Errors,
  FALSE,
  List,
  Sym,
  isList,
  isSymbol,
  isSymbolNamed,
} from "@circlet/core";

export type DerivedFormRewriter = (form: ListValue) => Expression;

/**
 * Wrap a sequence of expressions as one: none becomes the empty form,
 * one is unwrapped, several are wrapped in begin.
 */
export function sequenceToExpression(exprs: Expression[]): Expression {
  if (exprs.length === 0) return List();
  if (exprs.length === 1) return exprs[0];
  return List(Sym("begin"), ...exprs);
}

export function condToIf(form: ListValue): Expression {
  return expandClauses(form.elements.slice(1));
}

function expandClauses(clauses: Expression[]): Expression {
  if (clauses.length === 0) {
    return FALSE;
  }

  const [first, ...rest] = clauses;
  if (!isList(first) || first.elements.length === 0) {
    throw Errors.malformedSyntax("cond clause must be a non-empty list");
  }

  const [predicate, ...actions] = first.elements;
  if (isSymbolNamed(predicate, "else")) {
    if (rest.length > 0) {
      throw Errors.malformedSyntax("else clause isn't the last clause in cond");
    }
    return sequenceToExpression(actions);
  }

  return List(Sym("if"), predicate, sequenceToExpression(actions), expandClauses(rest));
}

export function letToCombination(form: ListValue): Expression {
  const [, bindings, ...body] = form.elements;
  if (bindings === undefined || !isList(bindings)) {
    throw Errors.malformedSyntax("let requires a list of bindings");
  }
  if (body.length === 0) {
    throw Errors.malformedSyntax("let requires a body");
  }

  const names: Expression[] = [];
  const values: Expression[] = [];
  for (const binding of bindings.elements) {
    if (!isList(binding) || binding.elements.length !== 2 || !isSymbol(binding.elements[0])) {
      throw Errors.malformedSyntax("let binding must be (name value)");
    }
    names.push(binding.elements[0]);
    values.push(binding.elements[1]);
  }

  return List(List(Sym("lambda"), List(...names), ...body), ...values);
}

export const DERIVED_FORMS: ReadonlyMap<string, DerivedFormRewriter> = new Map([
  ["cond", condToIf],
  ["let", letToCombination],
]);
