/**
 * LineScript Type Conversion Helpers
 *
 * Every coercion in the evaluator goes through one of these, so the ways a
 * conversion can fail are listed here and nowhere else.
 */

import { EvalError } from "../errors.js";
import { err, ok, type Result } from "../shared/result.js";
import type { Value } from "./types.js";

const NUMERIC_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Convert a value to a number.
 * - Booleans become 1 / 0
 * - Text must spell a decimal number (surrounding whitespace allowed)
 */
export function toNumber(val: Value): Result<number, EvalError> {
  switch (val.type) {
    case "number":
      return ok(val.value);
    case "boolean":
      return ok(val.value ? 1 : 0);
    case "text": {
      const trimmed = val.value.trim();
      if (!NUMERIC_TEXT.test(trimmed)) {
        return err(
          new EvalError(
            "invalid-conversion",
            `Cannot convert text "${val.value}" to a number`,
          ),
        );
      }
      return ok(Number(trimmed));
    }
  }
}

/**
 * Convert a value to a boolean.
 * - Numbers are true when non-zero (NaN counts as non-zero)
 * - Text must be "true" or "false", case-insensitive
 */
export function toBoolean(val: Value): Result<boolean, EvalError> {
  switch (val.type) {
    case "boolean":
      return ok(val.value);
    case "number":
      return ok(val.value !== 0);
    case "text": {
      const lowered = val.value.trim().toLowerCase();
      if (lowered === "true") return ok(true);
      if (lowered === "false") return ok(false);
      return err(
        new EvalError(
          "invalid-conversion",
          `Cannot convert text "${val.value}" to a boolean`,
        ),
      );
    }
  }
}

/**
 * Textual rendering of a value. Numbers use the shortest round-trip form
 * (7, 0.5, Infinity, NaN); booleans render capitalized as True / False.
 */
export function toText(val: Value): string {
  switch (val.type) {
    case "text":
      return val.value;
    case "number":
      return String(val.value);
    case "boolean":
      return val.value ? "True" : "False";
  }
}

/**
 * Display form used by `print` and by the session for expression lines.
 */
export function formatValue(val: Value): string {
  return toText(val);
}

/**
 * Structural equality of two runtime values (same tag, same payload).
 * NaN equals NaN here.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  return a.type === b.type && Object.is(a.value, b.value);
}
