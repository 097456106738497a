import { describe, it, expect } from "vitest";
import { Environment } from "./environment";
import { ErrorCode, CircletError } from "./errors";
import { Num, Str } from "./values";

function expectCode(fn: () => unknown, code: ErrorCode): void {
  try {
    fn();
  } catch (error) {
    if (!(error instanceof CircletError)) throw error;
    expect(error.code).toBe(code);
    return;
  }
  throw new Error(`Expected error with code ${code}`);
}

describe("Environment", () => {
  it("starts from the empty environment with no frames", () => {
    expect(Environment.EMPTY.isEmpty).toBe(true);
    expect(Environment.EMPTY.frameCount).toBe(0);
  });

  it("rejects define into the empty environment", () => {
    expectCode(() => Environment.EMPTY.define("x", Num(1)), ErrorCode.DEFINE_IN_EMPTY_ENVIRONMENT);
  });

  describe("extend", () => {
    it("pairs names with values positionally", () => {
      const env = Environment.EMPTY.extend(["a", "b"], [Num(1), Num(2)]);

      expect(env.lookup("a")).toEqual(Num(1));
      expect(env.lookup("b")).toEqual(Num(2));
      expect(env.frameCount).toBe(1);
    });

    it("fails on mismatched lengths instead of truncating", () => {
      expectCode(() => Environment.EMPTY.extend(["a", "b"], [Num(1)]), ErrorCode.ARITY_MISMATCH);
      expectCode(() => Environment.EMPTY.extend(["a"], [Num(1), Num(2)]), ErrorCode.ARITY_MISMATCH);
    });

    it("does not touch the parent chain", () => {
      const parent = Environment.EMPTY.extend(["x"], [Num(1)]);
      const child = parent.extend(["x"], [Num(2)]);

      expect(child.lookup("x")).toEqual(Num(2));
      expect(parent.lookup("x")).toEqual(Num(1));
      expect(child.enclosing).toBe(parent);
    });
  });

  describe("lookup", () => {
    it("finds bindings in enclosing frames", () => {
      const outer = Environment.EMPTY.extend(["x"], [Str("outer")]);
      const inner = outer.extend(["y"], [Str("inner")]);

      expect(inner.lookup("x")).toEqual(Str("outer"));
    });

    it("fails for unbound names", () => {
      const env = Environment.EMPTY.extend([], []);
      expectCode(() => env.lookup("missing"), ErrorCode.UNBOUND_VARIABLE);
    });
  });

  describe("define", () => {
    it("shadows an outer binding without mutating it", () => {
      const outer = Environment.EMPTY.extend(["x"], [Num(1)]);
      const inner = outer.extend([], []);

      inner.define("x", Num(2));

      expect(inner.lookup("x")).toEqual(Num(2));
      expect(outer.lookup("x")).toEqual(Num(1));
    });

    it("overwrites an existing binding in the same frame", () => {
      const env = Environment.EMPTY.extend(["x"], [Num(1)]);
      env.define("x", Num(5));
      expect(env.lookup("x")).toEqual(Num(5));
      expect(env.firstFrame?.size).toBe(1);
    });
  });

  describe("assign", () => {
    it("mutates the nearest binding", () => {
      const outer = Environment.EMPTY.extend(["x"], [Num(1)]);
      const inner = outer.extend(["y"], [Num(0)]);

      inner.assign("x", Num(10));

      expect(outer.lookup("x")).toEqual(Num(10));
      expect(inner.lookup("x")).toEqual(Num(10));
    });

    it("is visible to every chain sharing the frame", () => {
      const shared = Environment.EMPTY.extend(["count"], [Num(0)]);
      const a = shared.extend([], []);
      const b = shared.extend([], []);

      a.assign("count", Num(1));

      expect(b.lookup("count")).toEqual(Num(1));
    });

    it("fails for unbound names", () => {
      const env = Environment.EMPTY.extend([], []);
      expectCode(() => env.assign("missing", Num(1)), ErrorCode.UNBOUND_VARIABLE);
    });
  });

  describe("resolve", () => {
    it("returns the frame that binds a name", () => {
      const outer = Environment.EMPTY.extend(["x"], [Num(1)]);
      const inner = outer.extend(["y"], [Num(2)]);

      expect(inner.resolve("x")).toBe(outer.firstFrame);
      expect(inner.resolve("y")).toBe(inner.firstFrame);
      expect(inner.resolve("z")).toBeUndefined();
      expect(inner.find("z")).toBeUndefined();
    });
  });

  it("lists visible names innermost first", () => {
    const outer = Environment.EMPTY.extend(["a", "b"], [Num(1), Num(2)]);
    const inner = outer.extend(["b", "c"], [Num(3), Num(4)]);

    expect(inner.allNames()).toEqual(["b", "c", "a"]);
  });
});
