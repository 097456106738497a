/**
 * syntax-rules transformers
 *
 * (define-syntax swap!
 *   (syntax-rules ()
 *     ((_ a b) (let ((tmp a)) (set! a b) (set! b tmp)))))
 *
 * Clauses are tried in order; the keyword position of each pattern is
 * ignored. Expansion is not hygienic: template symbols are inserted as is.
 */

import {
  type Environment,
  type Expression,
  type ListValue,
  type MacroTransformer,
  type SyntaxClause,
  type Value,
  Errors,
  List,
  isList,
  isSymbol,
  isSymbolNamed,
  valueToString,
} from "@circlet/core";
import {
  type CompiledPattern,
  type MatchTree,
  type StructuredBindings,
  ELLIPSIS,
  compilePattern,
  matchStructured,
} from "./pattern";

const compiledClauses = new WeakMap<SyntaxClause, CompiledPattern>();

function compileClause(clause: SyntaxClause, literals: ReadonlySet<string>): CompiledPattern {
  const cached = compiledClauses.get(clause);
  if (cached) return cached;

  if (!isList(clause.pattern) || clause.pattern.elements.length === 0) {
    throw Errors.malformedSyntax("syntax-rules pattern must be a non-empty list");
  }
  const compiled = compilePattern(List(...clause.pattern.elements.slice(1)), literals);
  compiledClauses.set(clause, compiled);
  return compiled;
}

/**
 * Build a transformer from (syntax-rules (literal...) (pattern template)...).
 * Patterns are compiled eagerly so a malformed clause fails at definition.
 */
export function makeSyntaxRules(name: string, rules: Expression, env: Environment): MacroTransformer {
  if (!isList(rules) || rules.elements.length < 2 || !isSymbolNamed(rules.elements[0], "syntax-rules")) {
    throw Errors.malformedSyntax(`define-syntax ${name} expects (syntax-rules (literal ...) clause ...)`);
  }

  const [, literalList, ...clauseForms] = rules.elements;
  if (!isList(literalList)) {
    throw Errors.malformedSyntax("syntax-rules literals must be a list");
  }

  const literals = new Set<string>();
  for (const literal of literalList.elements) {
    if (!isSymbol(literal)) {
      throw Errors.malformedSyntax(`syntax-rules literal must be a symbol, got ${valueToString(literal)}`);
    }
    literals.add(literal.name);
  }

  const clauses = clauseForms.map((clauseForm): SyntaxClause => {
    if (!isList(clauseForm) || clauseForm.elements.length !== 2) {
      throw Errors.malformedSyntax("syntax-rules clause must be (pattern template)");
    }
    const clause = { pattern: clauseForm.elements[0], template: clauseForm.elements[1] };
    compileClause(clause, literals);
    return clause;
  });

  return { type: "macro", name, literals, clauses, env };
}

/**
 * Rewrite a macro use with the first clause whose pattern matches.
 */
export function expandMacro(macro: MacroTransformer, form: ListValue, useEnv: Environment): Expression {
  const operands = List(...form.elements.slice(1));

  for (const clause of macro.clauses) {
    const pattern = compileClause(clause, macro.literals);
    const bindings = matchStructured(pattern, operands, macro.env, useEnv);
    if (bindings) {
      return instantiate(clause.template, bindings);
    }
  }

  throw Errors.malformedSyntax(`no syntax-rules clause of ${macro.name} matches ${valueToString(form)}`);
}

// ============ Template Substitution ============

function instantiate(template: Value, bindings: StructuredBindings): Value {
  if (isSymbol(template)) {
    const bound = bindings.get(template.name);
    if (bound === undefined) {
      return template;
    }
    if (Array.isArray(bound)) {
      throw Errors.malformedSyntax(`pattern variable '${template.name}' must be followed by ${ELLIPSIS}`);
    }
    return bound;
  }

  if (!isList(template)) {
    return template;
  }

  const result: Value[] = [];
  const elements = template.elements;
  for (let i = 0; i < elements.length; i++) {
    let ellipses = 0;
    while (i + ellipses + 1 < elements.length && isSymbolNamed(elements[i + ellipses + 1], ELLIPSIS)) {
      ellipses++;
    }
    result.push(...instantiateRepeated(elements[i], bindings, ellipses));
    i += ellipses;
  }
  return List(...result);
}

/**
 * sub-template followed by `depth` ellipses: one copy per repetition of its
 * repeated variables, each built from that repetition's own bindings.
 * Consecutive ellipses splice the copies of every level into one sequence.
 */
function instantiateRepeated(template: Value, bindings: StructuredBindings, depth: number): Value[] {
  if (depth === 0) {
    return [instantiate(template, bindings)];
  }

  const sequences = new Map<string, MatchTree[]>();
  for (const name of templateVariables(template)) {
    const bound = bindings.get(name);
    if (Array.isArray(bound)) {
      sequences.set(name, bound);
    }
  }
  if (sequences.size === 0) {
    throw Errors.malformedSyntax(`${ELLIPSIS} in template follows no repeated pattern variable`);
  }

  const lengths = Array.from(sequences.values(), (sequence) => sequence.length);
  const count = lengths[0];
  if (lengths.some((length) => length !== count)) {
    const names = Array.from(sequences.keys()).join(", ");
    throw Errors.malformedSyntax(`repeated pattern variables ${names} matched different lengths`);
  }

  const copies: Value[] = [];
  for (let i = 0; i < count; i++) {
    const itemBindings: StructuredBindings = new Map(bindings);
    for (const [name, sequence] of sequences) {
      itemBindings.set(name, sequence[i]);
    }
    copies.push(...instantiateRepeated(template, itemBindings, depth - 1));
  }
  return copies;
}

function templateVariables(template: Value, names: string[] = []): string[] {
  if (isSymbol(template)) {
    if (!names.includes(template.name)) names.push(template.name);
  } else if (isList(template)) {
    for (const element of template.elements) {
      templateVariables(element, names);
    }
  }
  return names;
}
