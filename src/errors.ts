/**
 * LineScript errors
 *
 * Three kinds, one per pipeline stage. All of them are fatal to the line
 * being processed and nothing else; they are carried inside Results and
 * never thrown across the tokenizer, parser or evaluator.
 */

export type ErrorKind = "lex" | "parse" | "eval";

export type LexErrorCode = "unexpected-character" | "unterminated-string";

export type ParseErrorCode =
  | "unexpected-token"
  | "missing-terminator"
  | "mismatched-parentheses"
  | "unrecognized-statement"
  | "missing-assignment"
  | "invalid-number"
  | "trailing-input"
  | "nesting-too-deep"
  | "line-too-long";

export type EvalErrorCode =
  | "undefined-variable"
  | "type-mismatch"
  | "unsupported-operator"
  | "invalid-conversion";

/**
 * Base class for all LineScript errors.
 * `column` is the 0-based offset in the line where the problem was found;
 * evaluation errors have none.
 */
export abstract class LineScriptError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly code: string;

  constructor(
    message: string,
    public readonly column: number | undefined = undefined,
  ) {
    super(message);
  }
}

export class LexError extends LineScriptError {
  readonly name = "LexError";
  readonly kind = "lex";

  constructor(
    public readonly code: LexErrorCode,
    message: string,
    column: number,
  ) {
    super(message, column);
  }
}

export class ParseError extends LineScriptError {
  readonly name = "ParseError";
  readonly kind = "parse";

  constructor(
    public readonly code: ParseErrorCode,
    message: string,
    column?: number,
  ) {
    super(message, column);
  }
}

export class EvalError extends LineScriptError {
  readonly name = "EvalError";
  readonly kind = "eval";

  constructor(
    public readonly code: EvalErrorCode,
    message: string,
  ) {
    super(message);
  }
}

export type AnyLineScriptError = LexError | ParseError | EvalError;

const KIND_LABELS: Record<ErrorKind, string> = {
  lex: "Lex",
  parse: "Parse",
  eval: "Eval",
};

/**
 * Render an error as `Parse error at column 4: Expected ';' after statement`.
 */
export function formatError(error: AnyLineScriptError): string {
  const label = KIND_LABELS[error.kind];
  if (error.column === undefined) {
    return `${label} error: ${error.message}`;
  }
  return `${label} error at column ${error.column + 1}: ${error.message}`;
}

/**
 * Extract message from an unknown error value.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
