/**
 * LineScript Interpreter Module
 *
 * Re-exports the public API for the evaluator.
 */

export { type EvalResult, evaluate, evaluateExpression } from "./interpreter.js";
export {
  formatValue,
  toBoolean,
  toNumber,
  toText,
  valuesEqual,
} from "./type-coercion.js";
export { type EvalContext, type Value, type ValueType, Values } from "./types.js";
export { VariableStore } from "./variables.js";
