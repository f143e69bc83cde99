#!/usr/bin/env node
/**
 * Interactive LineScript shell
 *
 * Usage:
 *   npx tsx src/cli/shell.ts [--config <file>] [--no-comments] [--no-fallback] [--verbose]
 *
 * Every line shares one session, so variables persist until the shell exits.
 * Piped input is run line by line without prompts.
 */

import * as readline from "node:readline";
import type { LineScriptOptions } from "../LineScript.js";
import {
  type ConfigFile,
  loadConfig,
  parseArgs,
  resolveSessionOptions,
  USAGE,
} from "./options.js";
import { EXIT_CONFIG_ERROR } from "./runner.js";
import { ShellSession } from "./shell-session.js";

// ANSI colors
const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  cyan: "\x1b[36m",
};

class LineShell {
  private readonly session: ShellSession;
  private readonly rl: readline.Interface;
  private readonly isInteractive: boolean;
  private running = true;

  constructor(options: LineScriptOptions) {
    this.session = new ShellSession(options);
    this.isInteractive = process.stdin.isTTY === true;

    this.rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      terminal: this.isInteractive,
    });

    // Handle Ctrl+C
    this.rl.on("SIGINT", () => {
      process.stdout.write("^C\n");
      this.prompt();
    });

    if (this.isInteractive) {
      this.rl.on("close", () => {
        if (this.running) {
          this.running = false;
          console.log("\nGoodbye!");
        }
      });
    }
  }

  /** Returns false once the session asked to quit. */
  private execute(line: string): boolean {
    const reply = this.session.handle(line);
    if (reply.stdout) {
      process.stdout.write(reply.stdout);
    }
    if (reply.stderr) {
      const text = this.isInteractive
        ? `${colors.red}${reply.stderr}${colors.reset}`
        : reply.stderr;
      process.stderr.write(text);
    }
    return !reply.quit;
  }

  private printWelcome(): void {
    console.log(
      `${colors.cyan}${colors.bold}LineScript shell${colors.reset}\n` +
        `Type ${colors.green}:help${colors.reset} for commands, ${colors.green}:quit${colors.reset} to leave.\n`,
    );
  }

  private prompt(): void {
    if (!this.running) return;
    this.rl.question(`${colors.green}>${colors.reset} `, (answer) => {
      if (!this.running) return;
      if (this.execute(answer)) {
        this.prompt();
      } else {
        this.running = false;
        this.rl.close();
      }
    });
  }

  async run(): Promise<void> {
    if (this.isInteractive) {
      this.printWelcome();
      this.prompt();
      return;
    }

    const lines: string[] = [];
    this.rl.on("line", (line) => {
      lines.push(line);
    });
    await new Promise<void>((resolve) => {
      this.rl.on("close", resolve);
    });

    for (const line of lines) {
      if (!this.execute(line)) break;
    }
  }
}

function main(): number | LineShell {
  const args = parseArgs(process.argv.slice(2));
  if (!args.ok) {
    console.error(`${args.error}\n${USAGE}`);
    return EXIT_CONFIG_ERROR;
  }
  if (args.value.help) {
    console.log(USAGE);
    return 0;
  }
  if (args.value.file !== undefined) {
    console.error("The shell reads from stdin and takes no file argument");
    return EXIT_CONFIG_ERROR;
  }

  let config: ConfigFile = {};
  if (args.value.configPath !== undefined) {
    const loaded = loadConfig(args.value.configPath);
    if (!loaded.ok) {
      console.error(loaded.error);
      return EXIT_CONFIG_ERROR;
    }
    config = loaded.value;
  }

  return new LineShell(
    resolveSessionOptions(args.value, config, (line) =>
      process.stderr.write(`${line}\n`),
    ),
  );
}

const shell = main();
if (typeof shell === "number") {
  process.exitCode = shell;
} else {
  await shell.run();
}
