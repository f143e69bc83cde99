/**
 * LineScript Variable Store
 *
 * One store per session. Assignment inserts or overwrites; there is no
 * deletion. Backed by a Map so names like `constructor` or `__proto__` are
 * plain keys.
 */

import { EvalError } from "../errors.js";
import { err, ok, type Result } from "../shared/result.js";
import type { Value } from "./types.js";

export class VariableStore {
  private readonly vars = new Map<string, Value>();

  get(name: string): Result<Value, EvalError> {
    const value = this.vars.get(name);
    if (value === undefined) {
      return err(
        new EvalError("undefined-variable", `Variable '${name}' is not defined`),
      );
    }
    return ok(value);
  }

  set(name: string, value: Value): void {
    this.vars.set(name, value);
  }

  has(name: string): boolean {
    return this.vars.has(name);
  }

  get size(): number {
    return this.vars.size;
  }

  /** Snapshot of all bindings in insertion order */
  entries(): Array<[string, Value]> {
    return [...this.vars.entries()];
  }
}
