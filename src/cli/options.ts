/**
 * Command-line options and config file handling shared by the CLIs.
 *
 * Flags:
 *   --config <file>   JSON config file (see configFileSchema)
 *   --no-comments     do not echo `//` comment lines
 *   --no-fallback     do not retry failed statements as expressions
 *   --verbose         log session activity to stderr
 *   --help            print usage
 *
 * Explicit flags win over values from the config file.
 */

import * as fs from "node:fs";
import { z } from "zod";
import { getErrorMessage } from "../errors.js";
import type { LineScriptLogger, LineScriptOptions } from "../LineScript.js";
import { err, ok, type Result } from "../shared/result.js";

export const configFileSchema = z
  .object({
    echoComments: z.boolean().optional(),
    expressionFallback: z.boolean().optional(),
    verbose: z.boolean().optional(),
    executionLimits: z
      .object({
        maxLineLength: z.number().int().positive().optional(),
        maxNestingDepth: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export interface CliArgs {
  /** Positional argument: the source file, if given */
  file?: string;
  configPath?: string;
  noComments: boolean;
  noFallback: boolean;
  verbose: boolean;
  help: boolean;
}

export const USAGE = [
  "Usage: linescript [options] [file]",
  "",
  "Options:",
  "  --config <file>  read options from a JSON config file",
  "  --no-comments    do not echo // comment lines",
  "  --no-fallback    do not retry failed statements as expressions",
  "  --verbose        log session activity to stderr",
  "  --help           show this message",
].join("\n");

export function parseArgs(argv: readonly string[]): Result<CliArgs, string> {
  const args: CliArgs = {
    noComments: false,
    noFallback: false,
    verbose: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--config": {
        const path = argv[i + 1];
        if (path === undefined) {
          return err("--config requires a file argument");
        }
        args.configPath = path;
        i++;
        break;
      }
      case "--no-comments":
        args.noComments = true;
        break;
      case "--no-fallback":
        args.noFallback = true;
        break;
      case "--verbose":
        args.verbose = true;
        break;
      case "--help":
      case "-h":
        args.help = true;
        break;
      default:
        if (arg.startsWith("-")) {
          return err(`Unknown option: ${arg}`);
        }
        if (args.file !== undefined) {
          return err(`Unexpected argument: ${arg}`);
        }
        args.file = arg;
    }
  }

  return ok(args);
}

/**
 * Parse and validate config file contents. Validation failures list each
 * offending path.
 */
export function parseConfig(
  text: string,
  source: string,
): Result<ConfigFile, string> {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    return err(`${source}: invalid JSON: ${getErrorMessage(error)}`);
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    });
    return err(`${source}: invalid config\n  ${issues.join("\n  ")}`);
  }

  return ok(parsed.data);
}

export function loadConfig(path: string): Result<ConfigFile, string> {
  let text: string;
  try {
    text = fs.readFileSync(path, "utf8");
  } catch (error) {
    return err(`${path}: ${getErrorMessage(error)}`);
  }
  return parseConfig(text, path);
}

/**
 * Merge flags over config file values into session options.
 */
export function resolveSessionOptions(
  args: CliArgs,
  config: ConfigFile,
  writeLog: (line: string) => void,
): LineScriptOptions {
  const verbose = args.verbose || config.verbose === true;
  return {
    executionLimits: config.executionLimits,
    echoComments: args.noComments ? false : (config.echoComments ?? true),
    expressionFallback: args.noFallback
      ? false
      : (config.expressionFallback ?? true),
    logger: verbose ? createLineLogger(writeLog) : undefined,
  };
}

/**
 * Logger that writes one `[level] message {data}` line per call.
 */
export function createLineLogger(
  writeLog: (line: string) => void,
): LineScriptLogger {
  const write = (
    level: string,
    message: string,
    data?: Record<string, unknown>,
  ) => {
    const suffix = data ? ` ${JSON.stringify(data)}` : "";
    writeLog(`[${level}] ${message}${suffix}`);
  };
  return {
    info: (message, data) => write("info", message, data),
    debug: (message, data) => write("debug", message, data),
  };
}
