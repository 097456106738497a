import { describe, it, expect } from "vitest";
import { CircletError, ErrorCode, FALSE, Num, OK, isTruthy } from "@circlet/core";
import { SpecialFormRegistry, type SpecialFormHandler } from "./registry";
import { createRuntime } from "./runtime";
import { createCoreRegistry } from "./special-forms";

const unless: SpecialFormHandler = (form, env, evaluator) =>
  isTruthy(evaluator.evaluate(form.elements[1], env))
    ? FALSE
    : evaluator.evaluateSequence(form.elements.slice(2), env);

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

describe("SpecialFormRegistry", () => {
  it("looks handlers up by tag", () => {
    const registry = new SpecialFormRegistry();
    registry.register("unless", unless);

    expect(registry.get("unless")).toBe(unless);
    expect(registry.has("unless")).toBe(true);
    expect(registry.get("when")).toBeUndefined();
  });

  it("rejects a second handler for the same tag", () => {
    const registry = new SpecialFormRegistry();
    registry.register("unless", unless);

    expectCode(() => registry.register("unless", () => OK), ErrorCode.DUPLICATE_FORM);
  });

  it("rejects registration once sealed", () => {
    const registry = new SpecialFormRegistry();
    registry.seal();

    expect(registry.isSealed).toBe(true);
    expectCode(() => registry.register("unless", unless), ErrorCode.REGISTRY_SEALED);
  });

  it("holds the core forms", () => {
    expect(createCoreRegistry().tags()).toEqual([
      "quote",
      "set!",
      "define",
      "if",
      "lambda",
      "begin",
      "and",
      "or",
      "define-syntax",
    ]);
  });

  it("extends the evaluator with forms registered before it runs", () => {
    const registry = createCoreRegistry();
    registry.register("unless", unless);
    const runtime = createRuntime({ prelude: false, registry });

    expect(runtime.run("(unless #f 1 2)")).toEqual(Num(2));
    expect(runtime.run("(unless #t (car '()))")).toEqual(FALSE);
    expectCode(() => registry.register("when", unless), ErrorCode.REGISTRY_SEALED);
  });

  it("gives special forms priority over bindings of the same name", () => {
    const runtime = createRuntime({ prelude: false });
    expect(runtime.run("(define if 1) (if #f 1 2)")).toEqual(Num(2));
  });
});
