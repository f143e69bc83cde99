import type { ExpressionNode, StatementNode } from "./ast/types.js";
import {
  type AnyLineScriptError,
  formatError,
  ParseError,
} from "./errors.js";
import { evaluate, evaluateExpression } from "./interpreter/interpreter.js";
import { formatValue } from "./interpreter/type-coercion.js";
import type { EvalContext, Value } from "./interpreter/types.js";
import { VariableStore } from "./interpreter/variables.js";
import { type ExecutionLimits, resolveLimits } from "./limits.js";
import {
  parseExpressionLine,
  parseStatementLine,
} from "./parser/parser.js";
import { ok, type Result } from "./shared/result.js";
import type { ExecResult, LineOutcome } from "./types.js";

export type { ExecutionLimits } from "./limits.js";

/**
 * Logger interface for session logging.
 * Implement this interface to receive execution logs.
 */
export interface LineScriptLogger {
  /** Log informational messages (line errors, exit codes) */
  info(message: string, data?: Record<string, unknown>): void;
  /** Log debug messages (each line, expression fallbacks) */
  debug(message: string, data?: Record<string, unknown>): void;
}

export interface LineScriptOptions {
  /**
   * Limits on line length and expression nesting.
   * See ExecutionLimits interface for available options.
   */
  executionLimits?: ExecutionLimits;
  /**
   * Echo `// text` lines as `Comment: text`.
   * Default: true
   */
  echoComments?: boolean;
  /**
   * Retry a line that fails as a statement as a bare expression and output
   * its value.
   * Default: true
   */
  expressionFallback?: boolean;
  /**
   * Optional logger for execution tracing.
   * Disabled by default.
   */
  logger?: LineScriptLogger;
}

const COMMENT_MARKER = "//";

/**
 * A LineScript session: one variable store shared by every line run
 * through it.
 */
export class LineScript {
  private readonly store = new VariableStore();
  private readonly limits: Required<ExecutionLimits>;
  private readonly echoComments: boolean;
  private readonly expressionFallback: boolean;
  private readonly logger?: LineScriptLogger;

  constructor(options: LineScriptOptions = {}) {
    this.limits = resolveLimits(options.executionLimits);
    this.echoComments = options.echoComments ?? true;
    this.expressionFallback = options.expressionFallback ?? true;
    this.logger = options.logger;
  }

  /**
   * Run a multi-line program, one line at a time. A failing line is
   * reported on stderr and the run continues with the next line.
   */
  exec(source: string): ExecResult {
    const lines = source.split(/\r?\n/);
    const outcomes: LineOutcome[] = [];
    let stdout = "";
    let stderr = "";

    lines.forEach((line, index) => {
      const outcome = this.runLine(line);
      outcomes.push(outcome);
      for (const text of outcome.output) {
        stdout += `${text}\n`;
      }
      if (outcome.kind === "error") {
        stderr += `line ${index + 1}: ${formatError(outcome.error)}\n`;
      }
    });

    const exitCode = outcomes.some((o) => o.kind === "error") ? 1 : 0;
    this.logger?.info("exit", { exitCode });
    return { stdout, stderr, exitCode, outcomes };
  }

  /**
   * Run one line: skip it if blank, echo it if it is a comment, otherwise
   * run it as a statement and, failing that, as an expression whose value
   * is output.
   */
  runLine(line: string): LineOutcome {
    const trimmed = line.trimStart();

    if (trimmed === "") {
      return { kind: "blank", output: [] };
    }

    if (trimmed.startsWith(COMMENT_MARKER)) {
      const text = trimmed.slice(COMMENT_MARKER.length);
      return {
        kind: "comment",
        text,
        output: this.echoComments ? [`Comment: ${text}`] : [],
      };
    }

    this.logger?.debug("line", { line });

    if (line.length > this.limits.maxLineLength) {
      return this.failure(
        new ParseError(
          "line-too-long",
          `Line exceeds maximum length of ${this.limits.maxLineLength} characters`,
        ),
      );
    }

    const output: string[] = [];
    const ctx: EvalContext = {
      store: this.store,
      print: (text) => output.push(text),
    };

    const statement = this.runStatement(line, ctx);
    if (statement.ok) {
      return { kind: "statement", ...statement.value, output };
    }

    if (!this.expressionFallback) {
      return this.failure(statement.error);
    }

    this.logger?.debug("fallback", {
      line,
      reason: statement.error.message,
    });

    const expression = this.runExpression(line, ctx);
    if (expression.ok) {
      output.push(formatValue(expression.value.value));
      return { kind: "expression", ...expression.value, output };
    }

    return this.failure(furthestError(statement.error, expression.error));
  }

  /**
   * Current value of a variable, if it has been assigned.
   */
  getVariable(name: string): Value | undefined {
    const value = this.store.get(name);
    return value.ok ? value.value : undefined;
  }

  /**
   * All variables assigned so far, in assignment order.
   */
  getVariables(): Array<[string, Value]> {
    return this.store.entries();
  }

  private runStatement(
    line: string,
    ctx: EvalContext,
  ): Result<
    { statement: StatementNode; value: Value | undefined },
    AnyLineScriptError
  > {
    const statement = parseStatementLine(line, this.limits);
    if (!statement.ok) return statement;

    const value = evaluate(statement.value, ctx);
    if (!value.ok) return value;
    return ok({ statement: statement.value, value: value.value });
  }

  private runExpression(
    line: string,
    ctx: EvalContext,
  ): Result<{ expression: ExpressionNode; value: Value }, AnyLineScriptError> {
    const expression = parseExpressionLine(line, this.limits);
    if (!expression.ok) return expression;

    const value = evaluateExpression(expression.value, ctx);
    if (!value.ok) return value;
    return ok({ expression: expression.value, value: value.value });
  }

  private failure(error: AnyLineScriptError): LineOutcome {
    this.logger?.info("error", { kind: error.kind, code: error.code });
    return { kind: "error", error, output: [] };
  }
}

/**
 * Of two failed attempts at the same line, pick the one that got further:
 * evaluation errors mean the whole line parsed; otherwise compare columns.
 * Ties go to the first (statement) attempt.
 */
export function furthestError(
  first: AnyLineScriptError,
  second: AnyLineScriptError,
): AnyLineScriptError {
  return progress(second) > progress(first) ? second : first;
}

function progress(error: AnyLineScriptError): number {
  if (error.kind === "eval") return Number.POSITIVE_INFINITY;
  return error.column ?? -1;
}
