/**
 * Special-form registry
 *
 * Maps the symbol in head position of a list form to the handler that
 * evaluates it. Forms are registered at startup; the evaluator seals the
 * registry on its first evaluation, after which the table is read-only.
 */

import { type Environment, type ListValue, type Value, Errors } from "@circlet/core";
import type { Evaluator } from "./evaluator";

export type SpecialFormHandler = (form: ListValue, env: Environment, evaluator: Evaluator) => Value;

export class SpecialFormRegistry {
  private readonly handlers = new Map<string, SpecialFormHandler>();
  private sealed = false;

  register(tag: string, handler: SpecialFormHandler): void {
    if (this.sealed) {
      throw Errors.registrySealed(tag);
    }
    if (this.handlers.has(tag)) {
      throw Errors.duplicateForm(tag);
    }
    this.handlers.set(tag, handler);
  }

  get(tag: string): SpecialFormHandler | undefined {
    return this.handlers.get(tag);
  }

  has(tag: string): boolean {
    return this.handlers.has(tag);
  }

  tags(): string[] {
    return Array.from(this.handlers.keys());
  }

  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }
}
