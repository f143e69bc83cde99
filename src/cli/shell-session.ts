/**
 * Input handling for the interactive shell: source lines go to a shared
 * LineScript session, lines starting with `:` are meta-commands.
 */

import { formatAst } from "../ast/types.js";
import { formatError } from "../errors.js";
import { formatValue } from "../interpreter/type-coercion.js";
import {
  furthestError,
  LineScript,
  type LineScriptOptions,
} from "../LineScript.js";
import { describeToken, tokenize } from "../parser/lexer.js";
import { parseExpressionLine, parseStatementLine } from "../parser/parser.js";

export interface ShellReply {
  stdout: string;
  stderr: string;
  quit: boolean;
}

export const SHELL_HELP = [
  "Enter a statement (x = 1; or print x;) or an expression to evaluate.",
  "",
  "Commands:",
  "  :vars           list assigned variables",
  "  :tokens <line>  show the tokens of a line",
  "  :ast <line>     show the syntax tree of a line",
  "  :help           show this message",
  "  :quit           leave the shell",
].join("\n");

const reply = (stdout: string, stderr = ""): ShellReply => ({
  stdout,
  stderr,
  quit: false,
});

export class ShellSession {
  private readonly script: LineScript;
  private readonly options: LineScriptOptions;

  constructor(options: LineScriptOptions = {}) {
    this.options = options;
    this.script = new LineScript(options);
  }

  handle(input: string): ShellReply {
    const trimmed = input.trim();
    if (!trimmed.startsWith(":")) {
      return this.runSource(input);
    }

    const space = trimmed.indexOf(" ");
    const command = space === -1 ? trimmed : trimmed.slice(0, space);
    const rest = space === -1 ? "" : trimmed.slice(space + 1);

    switch (command) {
      case ":quit":
      case ":q":
        return { stdout: "", stderr: "", quit: true };
      case ":help":
        return reply(`${SHELL_HELP}\n`);
      case ":vars":
        return this.listVariables();
      case ":tokens":
        return this.showTokens(rest);
      case ":ast":
        return this.showAst(rest);
      default:
        return reply("", `Unknown command: ${command} (try :help)\n`);
    }
  }

  private runSource(line: string): ShellReply {
    const outcome = this.script.runLine(line);
    const stdout = outcome.output.map((text) => `${text}\n`).join("");
    if (outcome.kind === "error") {
      return reply(stdout, `${formatError(outcome.error)}\n`);
    }
    return reply(stdout);
  }

  private listVariables(): ShellReply {
    const entries = this.script.getVariables();
    if (entries.length === 0) {
      return reply("(no variables)\n");
    }
    const lines = entries.map(
      ([name, value]) => `${name} = ${formatValue(value)} (${value.type})\n`,
    );
    return reply(lines.join(""));
  }

  private showTokens(line: string): ShellReply {
    const tokens = tokenize(line);
    if (!tokens.ok) {
      return reply("", `${formatError(tokens.error)}\n`);
    }
    const lines = tokens.value.map(
      (token) => `${token.column + 1}\t${describeToken(token)}\n`,
    );
    return reply(lines.join(""));
  }

  private showAst(line: string): ShellReply {
    const limits = this.options.executionLimits;
    const statement = parseStatementLine(line, limits);
    if (statement.ok) {
      return reply(`${formatAst(statement.value)}\n`);
    }
    const expression = parseExpressionLine(line, limits);
    if (expression.ok) {
      return reply(`${formatAst(expression.value)}\n`);
    }
    return reply(
      "",
      `${formatError(furthestError(statement.error, expression.error))}\n`,
    );
  }
}
