// Frames and environments for lexical scope management

import type { Value } from "./values";
import { Errors } from "./errors";

/**
 * One mutable scope level. Frames are shared between every environment
 * chain and closure that references them, so a write through one holder is
 * seen by all of them. Each write is a single Map.set, so a reader never
 * observes a half-applied insert.
 */
export class Frame {
  private readonly bindings = new Map<string, Value>();

  constructor(names: readonly string[] = [], values: readonly Value[] = []) {
    for (let i = 0; i < names.length; i++) {
      this.bindings.set(names[i], values[i]);
    }
  }

  has(name: string): boolean {
    return this.bindings.has(name);
  }

  get(name: string): Value | undefined {
    return this.bindings.get(name);
  }

  set(name: string, value: Value): void {
    this.bindings.set(name, value);
  }

  names(): string[] {
    return Array.from(this.bindings.keys());
  }

  get size(): number {
    return this.bindings.size;
  }
}

/**
 * An ordered chain of frames, innermost first, ending in the empty
 * environment. Extending never copies or mutates the parent chain.
 */
export class Environment {
  static readonly EMPTY = new Environment(null, null);

  private constructor(
    private readonly frame: Frame | null,
    readonly enclosing: Environment | null
  ) {}

  get isEmpty(): boolean {
    return this.frame === null;
  }

  get frameCount(): number {
    let count = 0;
    for (let env: Environment | null = this; env && env.frame; env = env.enclosing) {
      count++;
    }
    return count;
  }

  /** The innermost frame; undefined for the empty environment. */
  get firstFrame(): Frame | undefined {
    return this.frame ?? undefined;
  }

  /**
   * Prepend a frame pairing names[i] with values[i].
   * Lengths must agree: a mismatch is an arity error, never truncation.
   */
  extend(names: readonly string[], values: readonly Value[]): Environment {
    if (names.length !== values.length) {
      throw Errors.arityMismatch(names.length, values.length);
    }
    return new Environment(new Frame(names, values), this);
  }

  /** The nearest frame binding name, or undefined if no frame does. */
  resolve(name: string): Frame | undefined {
    for (let env: Environment | null = this; env && env.frame; env = env.enclosing) {
      if (env.frame.has(name)) {
        return env.frame;
      }
    }
    return undefined;
  }

  find(name: string): Value | undefined {
    return this.resolve(name)?.get(name);
  }

  lookup(name: string): Value {
    const frame = this.resolve(name);
    if (!frame) {
      throw Errors.unboundVariable(name);
    }
    const value = frame.get(name);
    if (value === undefined) {
      throw Errors.unboundVariable(name);
    }
    return value;
  }

  /** set! semantics: overwrite the nearest existing binding. */
  assign(name: string, value: Value): void {
    const frame = this.resolve(name);
    if (!frame) {
      throw Errors.unboundVariable(name);
    }
    frame.set(name, value);
  }

  /** define semantics: insert or overwrite in the innermost frame only. */
  define(name: string, value: Value): void {
    if (!this.frame) {
      throw Errors.defineInEmptyEnvironment(name);
    }
    this.frame.set(name, value);
  }

  // All visible names, innermost first (for debugging and completion)
  allNames(): string[] {
    const seen = new Set<string>();
    for (let env: Environment | null = this; env && env.frame; env = env.enclosing) {
      for (const name of env.frame.names()) {
        seen.add(name);
      }
    }
    return Array.from(seen);
  }
}
