import * as fs from "node:fs";
import { LineScript } from "../LineScript.js";
import { getErrorMessage } from "../errors.js";
import {
  type ConfigFile,
  loadConfig,
  parseArgs,
  resolveSessionOptions,
  USAGE,
} from "./options.js";

export const EXIT_CONFIG_ERROR = 2;

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  /** Ask for a line of input; used when no file argument is given */
  prompt(question: string): Promise<string>;
}

/**
 * Run a source file through a fresh session. Returns the process exit code:
 * 0 on success, 1 when the file is missing or any line failed, 2 for bad
 * arguments or config.
 */
export async function runMain(
  argv: readonly string[],
  io: CliIO,
): Promise<number> {
  const args = parseArgs(argv);
  if (!args.ok) {
    io.stderr(`${args.error}\n${USAGE}\n`);
    return EXIT_CONFIG_ERROR;
  }
  if (args.value.help) {
    io.stdout(`${USAGE}\n`);
    return 0;
  }

  let config: ConfigFile = {};
  if (args.value.configPath !== undefined) {
    const loaded = loadConfig(args.value.configPath);
    if (!loaded.ok) {
      io.stderr(`${loaded.error}\n`);
      return EXIT_CONFIG_ERROR;
    }
    config = loaded.value;
  }

  const file =
    args.value.file ?? (await io.prompt("Enter source file name: ")).trim();
  if (file === "") {
    io.stderr("No source file given\n");
    return 1;
  }

  let source: string;
  try {
    source = fs.readFileSync(file, "utf8");
  } catch (error) {
    io.stderr(`Cannot read ${file}: ${getErrorMessage(error)}\n`);
    return 1;
  }

  const options = resolveSessionOptions(args.value, config, (line) =>
    io.stderr(`${line}\n`),
  );
  const result = new LineScript(options).exec(source);

  if (result.stdout) io.stdout(result.stdout);
  if (result.stderr) io.stderr(result.stderr);
  return result.exitCode;
}
