/**
 * LineScript Evaluator
 *
 * Tree-walking evaluation of a parsed line. Strict and depth-first: operands
 * are evaluated before their operator is applied, and `and` / `or` always
 * evaluate both sides.
 */

import type {
  AstNode,
  BinaryNode,
  ComparisonNode,
  ExpressionNode,
  LogicalNode,
  UnaryNode,
} from "../ast/types.js";
import { EvalError } from "../errors.js";
import {
  applyNumericBinaryOp,
  applyNumericComparison,
} from "../shared/operators.js";
import { err, ok, type Result } from "../shared/result.js";
import {
  formatValue,
  toBoolean,
  toNumber,
  toText,
} from "./type-coercion.js";
import { type EvalContext, type Value, Values } from "./types.js";

export type EvalResult<T> = Result<T, EvalError>;

/**
 * Evaluate a statement or expression. Statements run for their effect:
 * an assignment yields the assigned value, `print` yields nothing and
 * hands its rendered value to `ctx.print` exactly once.
 */
export function evaluate(
  node: AstNode,
  ctx: EvalContext,
): EvalResult<Value | undefined> {
  switch (node.type) {
    case "Assignment": {
      const value = evaluateExpression(node.expression, ctx);
      if (!value.ok) return value;
      ctx.store.set(node.name, value.value);
      return value;
    }

    case "Print": {
      const value = evaluateExpression(node.expression, ctx);
      if (!value.ok) return value;
      ctx.print(formatValue(value.value));
      return ok(undefined);
    }

    default:
      return evaluateExpression(node, ctx);
  }
}

export function evaluateExpression(
  node: ExpressionNode,
  ctx: EvalContext,
): EvalResult<Value> {
  switch (node.type) {
    case "Number":
      return ok(Values.number(node.value));

    case "Boolean":
      return ok(Values.boolean(node.value));

    case "String":
      return ok(Values.text(node.value));

    case "Variable":
      return ctx.store.get(node.name);

    case "Unary":
      return evalUnary(node, ctx);

    case "Binary":
      return evalBinary(node, ctx);

    case "Logical":
      return evalLogical(node, ctx);

    case "Comparison":
      return evalComparison(node, ctx);
  }
}

function evalUnary(node: UnaryNode, ctx: EvalContext): EvalResult<Value> {
  const operand = evaluateNumber(node.operand, ctx);
  if (!operand.ok) return operand;
  return ok(
    Values.number(node.operator === "-" ? -operand.value : +operand.value),
  );
}

/**
 * Arithmetic, with `+` doubling as concatenation. Whether an operand counts
 * as a string is decided by its node kind (a string literal), not by its
 * runtime value: a variable holding text goes down the numeric path.
 */
function evalBinary(node: BinaryNode, ctx: EvalContext): EvalResult<Value> {
  const { operator, left, right } = node;

  if (operator === "+" && left.type === "String" && right.type === "String") {
    return ok(Values.text(left.value + right.value));
  }

  if (left.type === "String" || right.type === "String") {
    if (operator !== "+") {
      return err(
        new EvalError(
          "unsupported-operator",
          `Operator '${operator}' cannot be applied to strings`,
        ),
      );
    }
    const leftValue = evaluateExpression(left, ctx);
    if (!leftValue.ok) return leftValue;
    const rightValue = evaluateExpression(right, ctx);
    if (!rightValue.ok) return rightValue;
    return ok(Values.text(toText(leftValue.value) + toText(rightValue.value)));
  }

  const leftNumber = evaluateNumber(left, ctx);
  if (!leftNumber.ok) return leftNumber;
  const rightNumber = evaluateNumber(right, ctx);
  if (!rightNumber.ok) return rightNumber;

  return ok(
    Values.number(
      applyNumericBinaryOp(leftNumber.value, rightNumber.value, operator),
    ),
  );
}

function evalLogical(node: LogicalNode, ctx: EvalContext): EvalResult<Value> {
  if (node.operator === "not") {
    const operand = evaluateBoolean(node.operand, ctx);
    if (!operand.ok) return operand;
    return ok(Values.boolean(!operand.value));
  }

  const left = evaluateBoolean(node.left, ctx);
  if (!left.ok) return left;
  const right = evaluateBoolean(node.right, ctx);
  if (!right.ok) return right;

  return ok(
    Values.boolean(
      node.operator === "and"
        ? left.value && right.value
        : left.value || right.value,
    ),
  );
}

/**
 * Text compares only with text, and only for (in)equality. Everything else
 * is compared numerically, booleans counting as 0 / 1.
 */
function evalComparison(
  node: ComparisonNode,
  ctx: EvalContext,
): EvalResult<Value> {
  const left = evaluateExpression(node.left, ctx);
  if (!left.ok) return left;
  const right = evaluateExpression(node.right, ctx);
  if (!right.ok) return right;

  const { operator } = node;

  if (left.value.type === "text" && right.value.type === "text") {
    switch (operator) {
      case "==":
        return ok(Values.boolean(left.value.value === right.value.value));
      case "!=":
        return ok(Values.boolean(left.value.value !== right.value.value));
      default:
        return err(
          new EvalError(
            "unsupported-operator",
            `Operator '${operator}' cannot be applied to strings`,
          ),
        );
    }
  }

  if (left.value.type === "text" || right.value.type === "text") {
    return err(
      new EvalError(
        "type-mismatch",
        "Cannot compare a string with a non-string",
      ),
    );
  }

  const leftNumber = toNumber(left.value);
  if (!leftNumber.ok) return leftNumber;
  const rightNumber = toNumber(right.value);
  if (!rightNumber.ok) return rightNumber;

  return ok(
    Values.boolean(
      applyNumericComparison(leftNumber.value, rightNumber.value, operator),
    ),
  );
}

function evaluateNumber(
  node: ExpressionNode,
  ctx: EvalContext,
): EvalResult<number> {
  const value = evaluateExpression(node, ctx);
  if (!value.ok) return value;
  return toNumber(value.value);
}

function evaluateBoolean(
  node: ExpressionNode,
  ctx: EvalContext,
): EvalResult<boolean> {
  const value = evaluateExpression(node, ctx);
  if (!value.ok) return value;
  return toBoolean(value.value);
}
