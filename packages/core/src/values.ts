// Runtime value types for the Circlet evaluator.
// Code and data share one tree shape: an Expression is just a Value.

import type { Environment } from "./environment";

export type Value =
  | NumberValue
  | StringValue
  | BooleanValue
  | SymbolValue
  | ListValue
  | PrimitiveProcedure
  | CompoundProcedure
  | MacroTransformer;

export type Expression = Value;

export interface NumberValue {
  type: "number";
  value: number;
}

export interface StringValue {
  type: "string";
  value: string;
}

export interface BooleanValue {
  type: "boolean";
  value: boolean;
}

export interface SymbolValue {
  type: "symbol";
  name: string;
}

export interface ListValue {
  type: "list";
  elements: Value[];
}

export type PrimitiveFn = (args: Value[]) => Value;

export interface PrimitiveProcedure {
  type: "primitive";
  name: string;
  fn: PrimitiveFn;
}

export interface CompoundProcedure {
  type: "compound";
  name?: string;
  params: string[];
  body: Expression[];
  env: Environment;
}

export type Procedure = PrimitiveProcedure | CompoundProcedure;

/** One (pattern template) clause of a syntax-rules transformer. */
export interface SyntaxClause {
  pattern: Expression;
  template: Expression;
}

export interface MacroTransformer {
  type: "macro";
  name: string;
  literals: ReadonlySet<string>;
  clauses: SyntaxClause[];
  env: Environment;
}

// Constructors
export const Num = (value: number): NumberValue => ({ type: "number", value });
export const Str = (value: string): StringValue => ({ type: "string", value });
export const Bool = (value: boolean): BooleanValue => ({ type: "boolean", value });
export const Sym = (name: string): SymbolValue => ({ type: "symbol", name });
export const List = (...elements: Value[]): ListValue => ({ type: "list", elements });

export const Primitive = (name: string, fn: PrimitiveFn): PrimitiveProcedure => ({
  type: "primitive",
  name,
  fn,
});

export const Compound = (
  params: string[],
  body: Expression[],
  env: Environment,
  name?: string
): CompoundProcedure => ({ type: "compound", params, body, env, name });

export const TRUE = Bool(true);
export const FALSE = Bool(false);
export const OK = Sym("ok");

// Type guards
export const isNumber = (v: Value): v is NumberValue => v.type === "number";
export const isString = (v: Value): v is StringValue => v.type === "string";
export const isBoolean = (v: Value): v is BooleanValue => v.type === "boolean";
export const isSymbol = (v: Value): v is SymbolValue => v.type === "symbol";
export const isList = (v: Value): v is ListValue => v.type === "list";
export const isPrimitive = (v: Value): v is PrimitiveProcedure => v.type === "primitive";
export const isCompound = (v: Value): v is CompoundProcedure => v.type === "compound";
export const isMacro = (v: Value): v is MacroTransformer => v.type === "macro";

export const isProcedure = (v: Value): v is Procedure => isPrimitive(v) || isCompound(v);

export function isSymbolNamed(v: Value, name: string): boolean {
  return v.type === "symbol" && v.name === name;
}

/** Only the boolean false is falsey. */
export function isTruthy(v: Value): boolean {
  return !(v.type === "boolean" && v.value === false);
}

// Atoms compare by content, everything else by identity
export function isEqv(a: Value, b: Value): boolean {
  if (a === b) return true;
  switch (a.type) {
    case "number":
    case "string":
    case "boolean":
      return b.type === a.type && b.value === a.value;
    case "symbol":
      return b.type === "symbol" && b.name === a.name;
    case "list":
      return b.type === "list" && a.elements.length === 0 && b.elements.length === 0;
    default:
      return false;
  }
}

export function isEqual(a: Value, b: Value): boolean {
  if (a.type === "list" && b.type === "list") {
    if (a.elements.length !== b.elements.length) return false;
    return a.elements.every((element, i) => isEqual(element, b.elements[i]));
  }
  return isEqv(a, b);
}

export function typeName(v: Value): string {
  switch (v.type) {
    case "primitive":
    case "compound":
      return "procedure";
    default:
      return v.type;
  }
}

/**
 * Render a value for output. In display mode strings are written raw;
 * otherwise they are quoted and escaped so the text reads back.
 */
export function valueToString(v: Value, options: { display?: boolean } = {}): string {
  switch (v.type) {
    case "number":
      return String(v.value);
    case "string":
      return options.display ? v.value : JSON.stringify(v.value);
    case "boolean":
      return v.value ? "#t" : "#f";
    case "symbol":
      return v.name;
    case "list":
      return `(${v.elements.map((e) => valueToString(e, options)).join(" ")})`;
    case "primitive":
      return `#<procedure ${v.name}>`;
    case "compound":
      return v.name
        ? `#<procedure ${v.name} (${v.params.join(" ")})>`
        : `#<compound (${v.params.join(" ")})>`;
    case "macro":
      return `#<macro ${v.name}>`;
  }
}
