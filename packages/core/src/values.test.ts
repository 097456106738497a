import { describe, it, expect } from "vitest";
import { Environment } from "./environment";
import {
  Num,
  Str,
  Bool,
  Sym,
  List,
  Primitive,
  Compound,
  TRUE,
  FALSE,
  isTruthy,
  isEqv,
  isEqual,
  isProcedure,
  typeName,
  valueToString,
} from "./values";

describe("Values", () => {
  describe("isTruthy", () => {
    it("treats only #f as false", () => {
      expect(isTruthy(FALSE)).toBe(false);
      expect(isTruthy(TRUE)).toBe(true);
      expect(isTruthy(Num(0))).toBe(true);
      expect(isTruthy(Str(""))).toBe(true);
      expect(isTruthy(List())).toBe(true);
    });
  });

  describe("equality", () => {
    it("compares atoms by content", () => {
      expect(isEqv(Num(1), Num(1))).toBe(true);
      expect(isEqv(Sym("a"), Sym("a"))).toBe(true);
      expect(isEqv(Str("a"), Sym("a"))).toBe(false);
      expect(isEqv(List(), List())).toBe(true);
    });

    it("compares non-empty lists by identity in eqv and by structure in equal", () => {
      const a = List(Num(1), List(Str("x")));
      const b = List(Num(1), List(Str("x")));

      expect(isEqv(a, b)).toBe(false);
      expect(isEqual(a, b)).toBe(true);
      expect(isEqual(a, List(Num(1)))).toBe(false);
    });

    it("compares procedures by identity", () => {
      const p = Primitive("id", (args) => args[0]);
      expect(isEqv(p, p)).toBe(true);
      expect(isEqv(p, Primitive("id", (args) => args[0]))).toBe(false);
    });
  });

  describe("procedures", () => {
    it("recognizes both procedure kinds", () => {
      expect(isProcedure(Primitive("f", () => TRUE))).toBe(true);
      expect(isProcedure(Compound(["x"], [Sym("x")], Environment.EMPTY))).toBe(true);
      expect(isProcedure(Sym("f"))).toBe(false);
      expect(typeName(Compound([], [Num(1)], Environment.EMPTY))).toBe("procedure");
    });
  });

  describe("valueToString", () => {
    it("prints atoms", () => {
      expect(valueToString(Num(3.5))).toBe("3.5");
      expect(valueToString(Bool(true))).toBe("#t");
      expect(valueToString(Bool(false))).toBe("#f");
      expect(valueToString(Sym("foo"))).toBe("foo");
    });

    it("quotes strings unless displaying", () => {
      expect(valueToString(Str('say "hi"'))).toBe('"say \\"hi\\""');
      expect(valueToString(Str('say "hi"'), { display: true })).toBe('say "hi"');
    });

    it("prints nested lists", () => {
      expect(valueToString(List(Sym("a"), List(Num(1), Str("b"))))).toBe('(a (1 "b"))');
      expect(valueToString(List())).toBe("()");
    });

    it("prints procedures", () => {
      expect(valueToString(Primitive("car", () => TRUE))).toBe("#<procedure car>");
      expect(valueToString(Compound(["x", "y"], [], Environment.EMPTY))).toBe("#<compound (x y)>");
      expect(valueToString(Compound(["n"], [], Environment.EMPTY, "fact"))).toBe(
        "#<procedure fact (n)>"
      );
    });
  });
});
