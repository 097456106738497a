/**
 * Primitive procedures backed by host functions
 *
 * Categories:
 * - Lists: car, cdr, cons, list, null?, pair?
 * - Arithmetic: +, -, *, /, =, <, >, <=, >=
 * - Predicates: number?, symbol?, string?, procedure?, eq?, equal?
 * - I/O: display, newline
 * - Control: error, apply
 *
 * Each primitive checks its own arguments and arity.
 */

import {
  type ListValue,
  type PrimitiveFn,
  type Value,
  Bool,
  Errors,
  List,
  Num,
  OK,
  isEqual,
  isEqv,
  isList,
  isNumber,
  isProcedure,
  isString,
  isSymbol,
  typeName,
  valueToString,
} from "@circlet/core";

export type PrimitiveTable = ReadonlyMap<string, PrimitiveFn>;

export interface PrimitiveOptions {
  /** Where display and newline write. */
  onOutput: (text: string) => void;
  /** Applies a procedure value; backs the apply primitive. */
  apply: (procedure: Value, args: Value[]) => Value;
}

function expectArity(args: Value[], expected: number): void {
  if (args.length !== expected) {
    throw Errors.arityMismatch(expected, args.length);
  }
}

function expectMinArity(args: Value[], minimum: number): void {
  if (args.length < minimum) {
    throw Errors.arityMismatch(`at least ${minimum}`, args.length);
  }
}

function numberArg(name: string, arg: Value): number {
  if (!isNumber(arg)) {
    throw Errors.typeError(name, "a number", typeName(arg));
  }
  return arg.value;
}

function listArg(name: string, arg: Value): ListValue {
  if (!isList(arg)) {
    throw Errors.typeError(name, "a list", typeName(arg));
  }
  return arg;
}

function nonEmptyListArg(name: string, arg: Value): ListValue {
  const list = listArg(name, arg);
  if (list.elements.length === 0) {
    throw Errors.typeError(name, "a non-empty list", "()");
  }
  return list;
}

function compareChain(name: string, test: (a: number, b: number) => boolean): PrimitiveFn {
  return (args) => {
    expectMinArity(args, 1);
    const numbers = args.map((arg) => numberArg(name, arg));
    for (let i = 1; i < numbers.length; i++) {
      if (!test(numbers[i - 1], numbers[i])) return Bool(false);
    }
    return Bool(true);
  };
}

function fold(name: string, identity: number, step: (acc: number, n: number) => number): PrimitiveFn {
  return (args) => Num(args.map((arg) => numberArg(name, arg)).reduce(step, identity));
}

export function createPrimitiveTable(options: PrimitiveOptions): PrimitiveTable {
  const table = new Map<string, PrimitiveFn>();

  // ============ Lists ============

  table.set("car", (args) => {
    expectArity(args, 1);
    return nonEmptyListArg("car", args[0]).elements[0];
  });

  table.set("cdr", (args) => {
    expectArity(args, 1);
    return List(...nonEmptyListArg("cdr", args[0]).elements.slice(1));
  });

  // Lists only: a non-list tail is wrapped rather than forming a pair
  table.set("cons", (args) => {
    expectArity(args, 2);
    const [head, tail] = args;
    return isList(tail) ? List(head, ...tail.elements) : List(head, tail);
  });

  table.set("list", (args) => List(...args));

  table.set("null?", (args) => {
    expectArity(args, 1);
    const [value] = args;
    return Bool(isList(value) && value.elements.length === 0);
  });

  table.set("pair?", (args) => {
    expectArity(args, 1);
    const [value] = args;
    return Bool(isList(value) && value.elements.length > 0);
  });

  // ============ Arithmetic ============

  table.set("+", fold("+", 0, (acc, n) => acc + n));
  table.set("*", fold("*", 1, (acc, n) => acc * n));

  table.set("-", (args) => {
    expectMinArity(args, 1);
    const [first, ...rest] = args.map((arg) => numberArg("-", arg));
    if (rest.length === 0) return Num(-first);
    return Num(rest.reduce((acc, n) => acc - n, first));
  });

  table.set("/", (args) => {
    expectMinArity(args, 1);
    const [first, ...rest] = args.map((arg) => numberArg("/", arg));
    const divisors = rest.length === 0 ? [first] : rest;
    if (divisors.some((n) => n === 0)) {
      throw Errors.divisionByZero();
    }
    return Num(rest.length === 0 ? 1 / first : rest.reduce((acc, n) => acc / n, first));
  });

  table.set("=", compareChain("=", (a, b) => a === b));
  table.set("<", compareChain("<", (a, b) => a < b));
  table.set(">", compareChain(">", (a, b) => a > b));
  table.set("<=", compareChain("<=", (a, b) => a <= b));
  table.set(">=", compareChain(">=", (a, b) => a >= b));

  // ============ Predicates ============

  const predicate = (name: string, test: (v: Value) => boolean): void => {
    table.set(name, (args) => {
      expectArity(args, 1);
      return Bool(test(args[0]));
    });
  };

  predicate("number?", isNumber);
  predicate("symbol?", isSymbol);
  predicate("string?", isString);
  predicate("procedure?", isProcedure);

  table.set("eq?", (args) => {
    expectArity(args, 2);
    return Bool(isEqv(args[0], args[1]));
  });

  table.set("equal?", (args) => {
    expectArity(args, 2);
    return Bool(isEqual(args[0], args[1]));
  });

  // ============ I/O ============

  table.set("display", (args) => {
    expectArity(args, 1);
    options.onOutput(valueToString(args[0], { display: true }));
    return OK;
  });

  table.set("newline", (args) => {
    expectArity(args, 0);
    options.onOutput("\n");
    return OK;
  });

  // ============ Control ============

  table.set("error", (args) => {
    expectMinArity(args, 1);
    throw Errors.userError(args.map((arg) => valueToString(arg, { display: true })).join(" "));
  });

  table.set("apply", (args) => {
    expectArity(args, 2);
    return options.apply(args[0], listArg("apply", args[1]).elements);
  });

  return table;
}
