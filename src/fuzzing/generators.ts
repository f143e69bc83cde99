/**
 * Grammar-Based LineScript Line Generator
 *
 * Uses fc.letrec to generate well-formed, variable-free lines. Binary
 * operators are always surrounded by spaces so a `-` is never glued to the
 * number after it. `!` is only valid where a logical operand starts, so a
 * negation is always wrapped in its own parentheses.
 */

import fc from "fast-check";

// =============================================================================
// TOKENS
// =============================================================================

const digits: fc.Arbitrary<string> = fc.stringOf(
  fc.constantFrom(..."0123456789"),
  { minLength: 1, maxLength: 4 },
);

/** Unsigned decimal literal such as `42` or `3.25` */
export const numberLiteral: fc.Arbitrary<string> = fc
  .tuple(digits, fc.option(digits, { nil: undefined }))
  .map(([whole, fraction]) =>
    fraction === undefined ? whole : `${whole}.${fraction}`,
  );

/** Literal with an optional leading minus sign, lexed as one token */
export const signedNumberLiteral: fc.Arbitrary<string> = fc
  .tuple(fc.boolean(), numberLiteral)
  .map(([negative, literal]) => (negative ? `-${literal}` : literal));

export const booleanLiteral: fc.Arbitrary<string> = fc.constantFrom(
  "true",
  "false",
);

// =============================================================================
// GRAMMAR
// =============================================================================

export interface LineGrammarArbitraries {
  /** Numeric-only expression: literals, unary signs, + - * / and parens */
  arithmetic: fc.Arbitrary<string>;
  /** Arithmetic mixed with booleans, comparisons and logical operators */
  expression: fc.Arbitrary<string>;
}

/**
 * Create a generator for expression text.
 * @param maxDepth - Depth bound passed to fc.letrec
 */
export function createLineGrammar(maxDepth = 4): LineGrammarArbitraries {
  const { arithmetic } = fc.letrec<{ arithmetic: string }>((tie) => ({
    arithmetic: fc.oneof(
      { depthSize: "small", maxDepth, withCrossShrink: true },
      { weight: 4, arbitrary: signedNumberLiteral },
      {
        weight: 3,
        arbitrary: fc
          .tuple(
            tie("arithmetic"),
            fc.constantFrom("+", "-", "*", "/"),
            tie("arithmetic"),
          )
          .map(([left, op, right]) => `${left} ${op} ${right}`),
      },
      {
        weight: 1,
        arbitrary: fc
          .tuple(fc.constantFrom("+", "-"), tie("arithmetic"))
          .map(([sign, operand]) => `${sign}(${operand})`),
      },
      {
        weight: 2,
        arbitrary: tie("arithmetic").map((inner) => `(${inner})`),
      },
    ),
  }));

  const { expression } = fc.letrec<{ expression: string }>((tie) => ({
    expression: fc.oneof(
      { depthSize: "small", maxDepth, withCrossShrink: true },
      { weight: 3, arbitrary: arithmetic },
      { weight: 2, arbitrary: booleanLiteral },
      {
        weight: 2,
        arbitrary: fc
          .tuple(
            tie("expression"),
            fc.constantFrom("==", "!=", "<", ">"),
            tie("expression"),
          )
          .map(([left, op, right]) => `${left} ${op} ${right}`),
      },
      {
        weight: 2,
        arbitrary: fc
          .tuple(
            tie("expression"),
            fc.constantFrom("and", "or", "&", "|"),
            tie("expression"),
          )
          .map(([left, op, right]) => `${left} ${op} ${right}`),
      },
      {
        weight: 1,
        arbitrary: tie("expression").map((operand) => `(!(${operand}))`),
      },
      {
        weight: 1,
        arbitrary: tie("expression").map((inner) => `(${inner})`),
      },
    ),
  }));

  return { arithmetic, expression };
}

// =============================================================================
// LINES
// =============================================================================

const grammar = createLineGrammar();

export const arithmeticExpression: fc.Arbitrary<string> = grammar.arithmetic;
export const expression: fc.Arbitrary<string> = grammar.expression;

/** `print <expression>;` */
export const printStatement: fc.Arbitrary<string> = expression.map(
  (expr) => `print ${expr};`,
);

/** Bare expression line, with or without a trailing semicolon */
export const expressionLine: fc.Arbitrary<string> = fc
  .tuple(expression, fc.boolean())
  .map(([expr, terminated]) => (terminated ? `${expr};` : expr));
