import { describe, expect, it } from "vitest";
import { SHELL_HELP, ShellSession } from "./shell-session.js";

describe("ShellSession", () => {
  it("should run source lines against one session", () => {
    const shell = new ShellSession();
    expect(shell.handle("x = 4;")).toEqual({ stdout: "", stderr: "", quit: false });
    expect(shell.handle("x * 2")).toEqual({ stdout: "8\n", stderr: "", quit: false });
    expect(shell.handle("print x;").stdout).toBe("4\n");
  });

  it("should show errors without the line number", () => {
    const reply = new ShellSession().handle("print y;");
    expect(reply.stdout).toBe("");
    expect(reply.stderr).toBe("Eval error: Variable 'y' is not defined\n");
    expect(reply.quit).toBe(false);
  });

  it("should echo comments", () => {
    expect(new ShellSession().handle("// hi").stdout).toBe("Comment:  hi\n");
  });

  describe(":vars", () => {
    it("should list variables with their types", () => {
      const shell = new ShellSession();
      shell.handle("x = 4;");
      shell.handle('name = "ada";');
      expect(shell.handle(":vars").stdout).toBe(
        "x = 4 (number)\nname = ada (text)\n",
      );
    });

    it("should say when there are none", () => {
      expect(new ShellSession().handle(":vars").stdout).toBe("(no variables)\n");
    });
  });

  describe(":tokens", () => {
    it("should list tokens with 1-based columns", () => {
      expect(new ShellSession().handle(":tokens x = 1;").stdout).toBe(
        "1\tidentifier 'x'\n3\t'='\n5\tnumber 1\n6\t';'\n7\tend of input\n",
      );
    });

    it("should report lexical errors", () => {
      expect(new ShellSession().handle(':tokens "a').stderr).toBe(
        "Lex error at column 1: Unterminated string literal\n",
      );
    });
  });

  describe(":ast", () => {
    it("should show statements and expressions", () => {
      const shell = new ShellSession();
      expect(shell.handle(":ast x = 1;").stdout).toBe("(= x 1)\n");
      expect(shell.handle(":ast 1 + 2 * 3").stdout).toBe("(+ 1 (* 2 3))\n");
    });

    it("should report the error that got furthest", () => {
      expect(new ShellSession().handle(":ast 1 +").stderr).toBe(
        "Parse error at column 4: Unexpected end of input\n",
      );
    });

    it("should not evaluate anything", () => {
      const shell = new ShellSession();
      shell.handle(":ast x = 1;");
      expect(shell.handle(":vars").stdout).toBe("(no variables)\n");
    });
  });

  it("should show help", () => {
    expect(new ShellSession().handle(":help").stdout).toBe(`${SHELL_HELP}\n`);
  });

  it("should quit", () => {
    expect(new ShellSession().handle(":quit")).toEqual({
      stdout: "",
      stderr: "",
      quit: true,
    });
  });

  it("should reject unknown commands", () => {
    expect(new ShellSession().handle(":bogus").stderr).toBe(
      "Unknown command: :bogus (try :help)\n",
    );
  });
});
