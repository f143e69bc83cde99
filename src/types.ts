import type { ExpressionNode, StatementNode } from "./ast/types.js";
import type { AnyLineScriptError } from "./errors.js";
import type { Value } from "./interpreter/types.js";

/**
 * What happened to one source line. `output` holds the lines the line
 * produced, without trailing newlines.
 */
export type LineOutcome =
  | { kind: "blank"; output: string[] }
  | { kind: "comment"; text: string; output: string[] }
  | {
      kind: "statement";
      statement: StatementNode;
      /** Assigned value for assignments; undefined for print */
      value: Value | undefined;
      output: string[];
    }
  | {
      kind: "expression";
      expression: ExpressionNode;
      value: Value;
      output: string[];
    }
  | { kind: "error"; error: AnyLineScriptError; output: string[] };

export interface ExecResult {
  stdout: string;
  stderr: string;
  /** 0 when every line succeeded, 1 otherwise */
  exitCode: number;
  outcomes: LineOutcome[];
}
