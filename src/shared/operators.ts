/**
 * Shared Operators
 *
 * Numeric operator implementations used by the evaluator once both operands
 * have been coerced to numbers.
 */

import type {
  ArithmeticOperator,
  ComparisonOperator,
} from "../ast/types.js";

/**
 * Apply a binary arithmetic operator with IEEE-754 semantics: division by
 * zero yields Infinity or NaN.
 */
export function applyNumericBinaryOp(
  left: number,
  right: number,
  operator: ArithmeticOperator,
): number {
  switch (operator) {
    case "+":
      return left + right;
    case "-":
      return left - right;
    case "*":
      return left * right;
    case "/":
      return left / right;
  }
}

/**
 * Apply a comparison operator to two numbers. NaN compares unequal to
 * everything, itself included.
 */
export function applyNumericComparison(
  left: number,
  right: number,
  operator: ComparisonOperator,
): boolean {
  switch (operator) {
    case "==":
      return left === right;
    case "!=":
      return left !== right;
    case "<":
      return left < right;
    case ">":
      return left > right;
  }
}
