#!/usr/bin/env node
/**
 * Run a LineScript source file.
 *
 * Usage:
 *   npx tsx src/cli/run.ts [--config <file>] [--no-comments] [--no-fallback] [--verbose] [file]
 *
 * Without a file argument the file name is read from stdin.
 */

import * as readline from "node:readline/promises";
import { runMain } from "./runner.js";

async function prompt(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}

process.exitCode = await runMain(process.argv.slice(2), {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  prompt,
});
