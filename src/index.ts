export type {
  ExecutionLimits,
  LineScriptLogger,
  LineScriptOptions,
} from "./LineScript.js";
export { LineScript } from "./LineScript.js";
export type { ExecResult, LineOutcome } from "./types.js";

// Pipeline stages
export {
  describeToken,
  type Token,
  Tokenizer,
  TokenType,
  tokenize,
} from "./parser/lexer.js";
export {
  type ParseResult,
  Parser,
  type ParserOptions,
  parseExpressionLine,
  parseStatementLine,
} from "./parser/parser.js";
export type {
  AstNode,
  ExpressionNode,
  StatementNode,
} from "./ast/types.js";
export { AST, formatAst } from "./ast/types.js";
export {
  type EvalContext,
  type EvalResult,
  evaluate,
  evaluateExpression,
  formatValue,
  toBoolean,
  toNumber,
  toText,
  type Value,
  Values,
  VariableStore,
} from "./interpreter/index.js";

// Errors and results
export {
  type AnyLineScriptError,
  EvalError,
  formatError,
  LexError,
  LineScriptError,
  ParseError,
} from "./errors.js";
export {
  andThen,
  err,
  isErr,
  isOk,
  map,
  match,
  ok,
  type Result,
  unwrapOr,
} from "./shared/result.js";
