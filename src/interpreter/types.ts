/**
 * LineScript Interpreter Types
 */

import type { VariableStore } from "./variables.js";

/**
 * Runtime value. Produced only by evaluation; the parser keeps literal
 * representations.
 */
export type Value =
  | { readonly type: "number"; readonly value: number }
  | { readonly type: "boolean"; readonly value: boolean }
  | { readonly type: "text"; readonly value: string };

export type ValueType = Value["type"];

export const Values = {
  number(value: number): Value {
    return { type: "number", value };
  },
  boolean(value: boolean): Value {
    return { type: "boolean", value };
  },
  text(value: string): Value {
    return { type: "text", value };
  },
};

/**
 * Everything an evaluation may touch. The store is passed explicitly on
 * every call; nothing is held ambiently.
 */
export interface EvalContext {
  readonly store: VariableStore;
  /** Receives the rendered value of each `print` statement */
  readonly print: (text: string) => void;
}
