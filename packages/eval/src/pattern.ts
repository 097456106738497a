/**
 * Pattern Matching for syntax-rules
 *
 * A pattern is a list whose elements are:
 * - Symbols: bind the corresponding form element (pattern variables)
 * - Literal identifiers: must match a form symbol with the same binding
 * - Sublists: matched recursively against a list element of the form
 * - sub-pattern ...: matches zero or more remaining form elements
 *
 * Example:
 *   Pattern:  (_ test body ...)
 *   Form:     (_ (> x 0) (display x) (newline))
 *   Bindings: {_: [_], test: [(> x 0)], body: [(display x), (newline)]}
 *
 * Flat bindings hold every form a variable matched, in order; a plain
 * variable binds a one-element sequence. The expander uses the structured
 * form instead, which keeps each ellipsis repetition apart.
 * Failing to match is a normal outcome and is reported as null.
 */

import {
  type Environment,
  type Expression,
  type Value,
  Errors,
  isList,
  isSymbol,
  isSymbolNamed,
  valueToString,
} from "@circlet/core";

export const ELLIPSIS = "...";

// ============ Pattern Nodes ============

/** Matches only the end of the form sequence. */
export interface EmptyNode {
  kind: "empty";
}

export interface VariableNode {
  kind: "variable";
  name: string;
  rest: PatternNode;
}

export interface LiteralNode {
  kind: "literal";
  name: string;
  rest: PatternNode;
}

/** Matches every remaining form against `repeated`, a one-element sequence. */
export interface EllipsisNode {
  kind: "ellipsis";
  repeated: PatternNode;
  variables: string[];
}

export interface SublistNode {
  kind: "sublist";
  head: PatternNode;
  rest: PatternNode;
}

export type PatternNode = EmptyNode | VariableNode | LiteralNode | EllipsisNode | SublistNode;

export interface CompiledPattern {
  root: PatternNode;
  /** Pattern variable -> number of ellipses it sits under. */
  depths: Map<string, number>;
}

export type Bindings = Map<string, Value[]>;

// ============ Pattern Compilation ============

export function compilePattern(pattern: Expression, literals: ReadonlySet<string>): CompiledPattern {
  if (!isList(pattern)) {
    throw Errors.malformedSyntax(`pattern must be a list, got ${valueToString(pattern)}`);
  }
  const compiler = new PatternCompiler(literals);
  const root = compiler.sequence(pattern.elements, 0, 0);
  return { root, depths: compiler.depths };
}

class PatternCompiler {
  readonly depths = new Map<string, number>();

  constructor(private readonly literals: ReadonlySet<string>) {}

  sequence(elements: Value[], index: number, depth: number): PatternNode {
    if (index >= elements.length) {
      return { kind: "empty" };
    }

    const element = elements[index];
    if (isSymbolNamed(element, ELLIPSIS)) {
      throw Errors.malformedSyntax("ellipsis must follow a sub-pattern");
    }

    const next = elements[index + 1];
    if (next !== undefined && isSymbolNamed(next, ELLIPSIS)) {
      if (index + 2 < elements.length) {
        throw Errors.malformedSyntax("ellipsis must be the last element of a pattern list");
      }
      const before = new Set(this.depths.keys());
      const repeated = this.element(element, { kind: "empty" }, depth + 1);
      const variables = Array.from(this.depths.keys()).filter((name) => !before.has(name));
      return { kind: "ellipsis", repeated, variables };
    }

    return this.element(element, this.sequence(elements, index + 1, depth), depth);
  }

  private element(element: Value, rest: PatternNode, depth: number): PatternNode {
    if (isSymbol(element)) {
      if (this.literals.has(element.name)) {
        return { kind: "literal", name: element.name, rest };
      }
      if (this.depths.has(element.name)) {
        throw Errors.malformedSyntax(`duplicate pattern variable '${element.name}'`);
      }
      this.depths.set(element.name, depth);
      return { kind: "variable", name: element.name, rest };
    }

    if (isList(element)) {
      return { kind: "sublist", head: this.sequence(element.elements, 0, depth), rest };
    }

    throw Errors.malformedSyntax(`unsupported pattern element ${valueToString(element)}`);
  }
}

// ============ Pattern Matching ============

/**
 * What a pattern variable matched, nested one array level per enclosing
 * ellipsis: a plain variable holds its form, `x ...` holds one entry per
 * repetition, `(x ...) ...` an array of arrays.
 */
export type MatchTree = Value | MatchTree[];

export type StructuredBindings = Map<string, MatchTree>;

function flattenTree(tree: MatchTree): Value[] {
  return Array.isArray(tree) ? tree.flatMap(flattenTree) : [tree];
}

/** Drop the repetition structure, keeping every matched form in order. */
export function flattenBindings(structured: StructuredBindings): Bindings {
  const flat: Bindings = new Map();
  for (const [name, tree] of structured) {
    flat.set(name, flattenTree(tree));
  }
  return flat;
}

interface MatchScope {
  definitionEnv: Environment;
  useEnv: Environment;
}

/**
 * Match a pattern against a form.
 * Returns bindings if successful, null if no match. A pattern that does not
 * compile (a number or string element, a misplaced ellipsis) throws
 * MALFORMED_SYNTAX instead of returning null.
 */
export function match(
  pattern: Expression,
  form: Expression,
  literals: ReadonlySet<string>,
  definitionEnv: Environment,
  useEnv: Environment
): Bindings | null {
  return matchCompiled(compilePattern(pattern, literals), form, definitionEnv, useEnv);
}

export function matchCompiled(
  pattern: CompiledPattern,
  form: Expression,
  definitionEnv: Environment,
  useEnv: Environment
): Bindings | null {
  const structured = matchStructured(pattern, form, definitionEnv, useEnv);
  return structured && flattenBindings(structured);
}

/**
 * Like matchCompiled, but keeps each ellipsis repetition's bindings apart
 * so a template can be instantiated once per repetition.
 */
export function matchStructured(
  pattern: CompiledPattern,
  form: Expression,
  definitionEnv: Environment,
  useEnv: Environment
): StructuredBindings | null {
  if (!isList(form)) {
    return null;
  }
  return matchNode(pattern.root, form.elements, 0, new Map(), { definitionEnv, useEnv });
}

function matchNode(
  node: PatternNode,
  forms: Value[],
  index: number,
  acc: StructuredBindings,
  scope: MatchScope
): StructuredBindings | null {
  switch (node.kind) {
    case "empty":
      return index === forms.length ? acc : null;

    case "variable": {
      if (index >= forms.length) return null;
      const bound: StructuredBindings = new Map(acc).set(node.name, forms[index]);
      return matchNode(node.rest, forms, index + 1, bound, scope);
    }

    case "literal": {
      if (index >= forms.length) return null;
      if (!isSameLiteral(node.name, forms[index], scope)) return null;
      return matchNode(node.rest, forms, index + 1, acc, scope);
    }

    case "ellipsis": {
      const repetitions: StructuredBindings[] = [];
      for (let i = index; i < forms.length; i++) {
        const one = matchNode(node.repeated, [forms[i]], 0, new Map(), scope);
        if (!one) return null;
        repetitions.push(one);
      }
      const bound: StructuredBindings = new Map(acc);
      for (const name of node.variables) {
        bound.set(name, repetitions.map((repetition) => repetition.get(name) ?? []));
      }
      return bound;
    }

    case "sublist": {
      if (index >= forms.length) return null;
      const head = forms[index];
      if (!isList(head)) return null;
      const inner = matchNode(node.head, head.elements, 0, new Map(), scope);
      if (!inner) return null;
      return matchNode(node.rest, forms, index + 1, new Map([...acc, ...inner]), scope);
    }
  }
}

/**
 * A literal matches a form symbol of the same name whose binding at the
 * use site is the binding the literal has at the definition site; two
 * unbound occurrences of the same name also match.
 */
function isSameLiteral(name: string, form: Value, scope: MatchScope): boolean {
  if (!isSymbol(form) || form.name !== name) {
    return false;
  }
  return scope.definitionEnv.resolve(name) === scope.useEnv.resolve(name);
}
