/**
 * Recursive Descent Parser for LineScript
 *
 * Grammar, lowest binding first:
 *
 *   statement      := IDENT "=" expression ";" | "print" expression ";"
 *   expression     := logicalTerm ( "or" logicalTerm )*
 *   logicalTerm    := logicalFactor ( "and" logicalFactor )*
 *   logicalFactor  := "!" comparison | comparison
 *   comparison     := relation ( ( "==" | "!=" ) expression )*
 *   relation       := arithmetic ( ( "<" | ">" ) arithmetic )*
 *   arithmetic     := term ( ( "+" | "-" ) term )*
 *   term           := factor ( ( "*" | "/" ) factor )*
 *   factor         := ( "+" | "-" ) factor | primary
 *   primary        := NUMBER | "true" | "false" | STRING | "(" expression ")" | IDENT
 *
 * The right operand of "==" / "!=" is a full expression, not a relation, so
 * `a == b and c` groups as `a == (b and c)`. Existing programs rely on that
 * grouping.
 *
 * The parser pulls tokens one at a time from a Tokenizer and stops at the
 * first error; it never returns a partial tree.
 */

import {
  AST,
  type ArithmeticOperator,
  type ComparisonOperator,
  type ExpressionNode,
  type LogicalOperator,
  type StatementNode,
} from "../ast/types.js";
import { type LexError, ParseError, type ParseErrorCode } from "../errors.js";
import { DEFAULT_LIMITS } from "../limits.js";
import { err, ok, type Err, type Result } from "../shared/result.js";
import { describeToken, type Token, Tokenizer, TokenType } from "./lexer.js";

export type ParseResult<T> = Result<T, LexError | ParseError>;

export interface ParserOptions {
  /** Maximum depth of parentheses, prefix operators and operator chains */
  maxNestingDepth?: number;
}

const OR_OPERATORS = new Map<TokenType, LogicalOperator>([
  [TokenType.OR, "or"],
]);

const AND_OPERATORS = new Map<TokenType, LogicalOperator>([
  [TokenType.AND, "and"],
]);

const EQUALITY_OPERATORS = new Map<TokenType, ComparisonOperator>([
  [TokenType.EQ, "=="],
  [TokenType.NE, "!="],
]);

const RELATION_OPERATORS = new Map<TokenType, ComparisonOperator>([
  [TokenType.LT, "<"],
  [TokenType.GT, ">"],
]);

const ADDITIVE_OPERATORS = new Map<TokenType, ArithmeticOperator>([
  [TokenType.PLUS, "+"],
  [TokenType.MINUS, "-"],
]);

const MULTIPLICATIVE_OPERATORS = new Map<TokenType, ArithmeticOperator>([
  [TokenType.STAR, "*"],
  [TokenType.SLASH, "/"],
]);

export class Parser {
  private readonly tokenizer: Tokenizer;
  private readonly maxNestingDepth: number;
  private depth = 0;

  constructor(tokenizer: Tokenizer, options: ParserOptions = {}) {
    this.tokenizer = tokenizer;
    this.maxNestingDepth =
      options.maxNestingDepth ?? DEFAULT_LIMITS.maxNestingDepth;
  }

  // ─── Entry points ──────────────────────────────────────────

  /**
   * Parse `name = expression;` or `print expression;`, consuming the
   * terminating semicolon.
   */
  parseStatement(): ParseResult<StatementNode> {
    const first = this.tokenizer.current();
    if (!first.ok) return first;
    const token = first.value;

    let statement: StatementNode;

    switch (token.type) {
      case TokenType.IDENT: {
        const next = this.tokenizer.advance();
        if (!next.ok) return next;
        if (next.value.type !== TokenType.ASSIGN) {
          return this.fail(
            "missing-assignment",
            `Expected '=' after '${token.value}', got ${describeToken(next.value)}`,
            next.value,
          );
        }
        const afterAssign = this.tokenizer.advance();
        if (!afterAssign.ok) return afterAssign;

        const expression = this.parseExpression();
        if (!expression.ok) return expression;
        statement = AST.assignment(token.value, expression.value);
        break;
      }

      case TokenType.PRINT: {
        const next = this.tokenizer.advance();
        if (!next.ok) return next;

        const expression = this.parseExpression();
        if (!expression.ok) return expression;
        statement = AST.print(expression.value);
        break;
      }

      default:
        return this.fail(
          "unrecognized-statement",
          `Expected assignment or print statement, got ${describeToken(token)}`,
          token,
        );
    }

    const terminator = this.tokenizer.current();
    if (!terminator.ok) return terminator;
    if (terminator.value.type !== TokenType.SEMICOLON) {
      return this.fail(
        "missing-terminator",
        `Expected ';' after statement, got ${describeToken(terminator.value)}`,
        terminator.value,
      );
    }
    const after = this.tokenizer.advance();
    if (!after.ok) return after;

    return ok(statement);
  }

  /**
   * Parse one expression. A trailing semicolon is not required and is left
   * in place.
   */
  parseExpression(): ParseResult<ExpressionNode> {
    return this.parseLeftAssociative(
      () => this.parseLogicalTerm(),
      () => this.parseLogicalTerm(),
      OR_OPERATORS,
      AST.logical,
    );
  }

  /**
   * Succeed only if the whole line has been consumed. With
   * `allowTerminator`, one semicolon may precede the end.
   */
  expectEnd(options: { allowTerminator?: boolean } = {}): ParseResult<void> {
    let current = this.tokenizer.current();
    if (!current.ok) return current;

    if (options.allowTerminator && current.value.type === TokenType.SEMICOLON) {
      current = this.tokenizer.advance();
      if (!current.ok) return current;
    }

    if (current.value.type !== TokenType.EOF) {
      return this.fail(
        "trailing-input",
        `Unexpected ${describeToken(current.value)} after end of input was expected`,
        current.value,
      );
    }

    return ok(undefined);
  }

  // ─── Precedence cascade ────────────────────────────────────

  private parseLogicalTerm(): ParseResult<ExpressionNode> {
    return this.parseLeftAssociative(
      () => this.parseLogicalFactor(),
      () => this.parseLogicalFactor(),
      AND_OPERATORS,
      AST.logical,
    );
  }

  private parseLogicalFactor(): ParseResult<ExpressionNode> {
    const current = this.tokenizer.current();
    if (!current.ok) return current;

    if (current.value.type !== TokenType.NOT) {
      return this.parseComparison();
    }

    return this.nested(current.value, () => {
      const next = this.tokenizer.advance();
      if (!next.ok) return next;

      const operand = this.parseComparison();
      if (!operand.ok) return operand;
      return ok(AST.not(operand.value));
    });
  }

  private parseComparison(): ParseResult<ExpressionNode> {
    return this.parseLeftAssociative(
      () => this.parseRelation(),
      (operator) => this.nested(operator, () => this.parseExpression()),
      EQUALITY_OPERATORS,
      AST.comparison,
    );
  }

  private parseRelation(): ParseResult<ExpressionNode> {
    return this.parseLeftAssociative(
      () => this.parseArithmetic(),
      () => this.parseArithmetic(),
      RELATION_OPERATORS,
      AST.comparison,
    );
  }

  private parseArithmetic(): ParseResult<ExpressionNode> {
    return this.parseLeftAssociative(
      () => this.parseTerm(),
      () => this.parseTerm(),
      ADDITIVE_OPERATORS,
      AST.binary,
    );
  }

  private parseTerm(): ParseResult<ExpressionNode> {
    return this.parseLeftAssociative(
      () => this.parseFactor(),
      () => this.parseFactor(),
      MULTIPLICATIVE_OPERATORS,
      AST.binary,
    );
  }

  private parseFactor(): ParseResult<ExpressionNode> {
    const current = this.tokenizer.current();
    if (!current.ok) return current;
    const token = current.value;

    const operator = ADDITIVE_OPERATORS.get(token.type);
    if (operator !== "+" && operator !== "-") {
      return this.parsePrimary();
    }

    return this.nested(token, () => {
      const next = this.tokenizer.advance();
      if (!next.ok) return next;

      const operand = this.parseFactor();
      if (!operand.ok) return operand;
      return ok(AST.unary(operator, operand.value));
    });
  }

  private parsePrimary(): ParseResult<ExpressionNode> {
    const current = this.tokenizer.current();
    if (!current.ok) return current;
    const token = current.value;

    switch (token.type) {
      case TokenType.NUMBER: {
        const value = Number(token.value);
        if (Number.isNaN(value)) {
          return this.fail(
            "invalid-number",
            `Invalid numeric literal: ${token.value}`,
            token,
          );
        }
        return this.advanceWith(AST.number(token.value, value));
      }

      case TokenType.TRUE:
      case TokenType.FALSE:
        return this.advanceWith(AST.boolean(token.value));

      case TokenType.STRING:
        return this.advanceWith(AST.string(token.value));

      case TokenType.IDENT:
        return this.advanceWith(AST.variable(token.value));

      case TokenType.LPAREN:
        return this.nested(token, () => {
          const next = this.tokenizer.advance();
          if (!next.ok) return next;

          const inner = this.parseExpression();
          if (!inner.ok) return inner;

          const closing = this.tokenizer.current();
          if (!closing.ok) return closing;
          if (closing.value.type !== TokenType.RPAREN) {
            return this.fail(
              "mismatched-parentheses",
              `Mismatched parentheses: expected ')', got ${describeToken(closing.value)}`,
              closing.value,
            );
          }
          return this.advanceWith(inner.value);
        });

      default:
        return this.fail(
          "unexpected-token",
          `Unexpected ${describeToken(token)}`,
          token,
        );
    }
  }

  // ─── Helper methods ────────────────────────────────────────

  /**
   * `operand ( OP rightOperand )*`, folding to the left. Every fold adds a
   * level to the left spine of the tree, so it counts toward the nesting
   * limit like a parenthesis does.
   */
  private parseLeftAssociative<Op>(
    operand: () => ParseResult<ExpressionNode>,
    rightOperand: (operator: Token) => ParseResult<ExpressionNode>,
    operators: ReadonlyMap<TokenType, Op>,
    build: (op: Op, left: ExpressionNode, right: ExpressionNode) => ExpressionNode,
  ): ParseResult<ExpressionNode> {
    const first = operand();
    if (!first.ok) return first;
    let left = first.value;
    const baseDepth = this.depth;

    try {
      for (;;) {
        const current = this.tokenizer.current();
        if (!current.ok) return current;

        const op = operators.get(current.value.type);
        if (op === undefined) {
          return ok(left);
        }
        if (this.depth >= this.maxNestingDepth) {
          return this.tooDeep(current.value);
        }
        this.depth++;

        const next = this.tokenizer.advance();
        if (!next.ok) return next;

        const right = rightOperand(current.value);
        if (!right.ok) return right;
        left = build(op, left, right.value);
      }
    } finally {
      this.depth = baseDepth;
    }
  }

  /**
   * Run `parse` one nesting level deeper, refusing to go past the limit so
   * pathological input cannot overflow the call stack.
   */
  private nested<T>(token: Token, parse: () => ParseResult<T>): ParseResult<T> {
    if (this.depth >= this.maxNestingDepth) {
      return this.tooDeep(token);
    }
    this.depth++;
    const result = parse();
    this.depth--;
    return result;
  }

  private tooDeep(token: Token): Err<ParseError> {
    return this.fail(
      "nesting-too-deep",
      `Expression nested deeper than ${this.maxNestingDepth} levels`,
      token,
    );
  }

  private advanceWith<T>(node: T): ParseResult<T> {
    const next = this.tokenizer.advance();
    if (!next.ok) return next;
    return ok(node);
  }

  private fail(
    code: ParseErrorCode,
    message: string,
    token: Token,
  ): Err<ParseError> {
    return err(new ParseError(code, message, token.column));
  }
}

/**
 * Parse a complete statement line: the statement and nothing after it.
 */
export function parseStatementLine(
  line: string,
  options?: ParserOptions,
): ParseResult<StatementNode> {
  const parser = new Parser(new Tokenizer(line), options);
  const statement = parser.parseStatement();
  if (!statement.ok) return statement;

  const end = parser.expectEnd();
  if (!end.ok) return end;
  return statement;
}

/**
 * Parse a complete expression line. One trailing semicolon is accepted.
 */
export function parseExpressionLine(
  line: string,
  options?: ParserOptions,
): ParseResult<ExpressionNode> {
  const parser = new Parser(new Tokenizer(line), options);
  const expression = parser.parseExpression();
  if (!expression.ok) return expression;

  const end = parser.expectEnd({ allowTerminator: true });
  if (!end.ok) return end;
  return expression;
}
