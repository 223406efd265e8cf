/**
 * Argument handling and command body for the exprconfig CLI.
 * Kept apart from cli.ts so it can be exercised without a process.
 */

import * as fs from "fs";
import { loadConfig, ConfigSource, DEFAULT_CONSTANTS_SECTION, DEFAULT_ROOT_NAME } from "./loader";
import { Section } from "./section";
import { formatTree, colorStyler, plainStyler } from "./format";
import { formatValue, toJSON } from "./value";
import {
  ConfigError,
  ConfigLoadError,
  ExpressionSyntaxError,
  IniSyntaxError,
  KeyNotFoundError,
  AmbiguousKeyError,
  InvalidPathError,
} from "./errors";

export interface CliOptions {
  /** File path, or "-" for stdin. */
  inputFile: string;
  name: string;
  separator: string;
  constantsSection: string | null;
  gets: string[];
  json: boolean;
  color: boolean;
}

export type ParsedArgs =
  | { kind: "run"; options: CliOptions }
  | { kind: "help" }
  | { kind: "error"; message: string };

export const HELP_TEXT = `
exprconfig - evaluate an expression-valued INI configuration

Usage:
  exprconfig <file|-> [options]

Options:
  -n, --name <name>        Root section name (default: ${DEFAULT_ROOT_NAME})
  -s, --separator <sep>    Path separator (default: /)
  --constants <section>    Constants section (default: ${DEFAULT_CONSTANTS_SECTION})
  --no-constants           Do not treat any section as constants
  -g, --get <key>          Print the value or section for a key (repeatable)
  --json                   Print JSON instead of a tree
  --no-color               Disable colored output
  -h, --help               Show this help

Environment:
  LOG_LEVEL                Log level for stderr diagnostics (default: warn)
  NO_COLOR                 Disable colored output

Examples:
  exprconfig settings.ini
  exprconfig settings.ini -g sampler_name -g Sampler/parameter1/max
  cat settings.ini | exprconfig - --json
`;

const VALUE_FLAGS: Record<string, string> = {
  "-n": "--name",
  "--name": "--name",
  "-s": "--separator",
  "--separator": "--separator",
  "--constants": "--constants",
  "-g": "--get",
  "--get": "--get",
};

export function parseArgs(args: string[], env: NodeJS.ProcessEnv = process.env): ParsedArgs {
  const options: CliOptions = {
    inputFile: "",
    name: DEFAULT_ROOT_NAME,
    separator: "/",
    constantsSection: DEFAULT_CONSTANTS_SECTION,
    gets: [],
    json: false,
    color: !env.NO_COLOR,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    const valueFlag = VALUE_FLAGS[arg];

    if (arg === "-h" || arg === "--help") {
      return { kind: "help" };
    } else if (valueFlag !== undefined) {
      i++;
      if (i >= args.length) {
        return { kind: "error", message: `${valueFlag} requires a value` };
      }
      const value = args[i];
      switch (valueFlag) {
        case "--name":
          options.name = value;
          break;
        case "--separator":
          options.separator = value;
          break;
        case "--constants":
          options.constantsSection = value;
          break;
        case "--get":
          options.gets.push(value);
          break;
      }
    } else if (arg === "--no-constants") {
      options.constantsSection = null;
    } else if (arg === "--json") {
      options.json = true;
    } else if (arg === "--no-color") {
      options.color = false;
    } else if (arg.startsWith("-") && arg !== "-") {
      return { kind: "error", message: `Unknown option: ${arg}` };
    } else {
      if (options.inputFile) {
        return { kind: "error", message: "Multiple input files not supported" };
      }
      options.inputFile = arg;
    }
    i++;
  }

  if (!options.inputFile) {
    return { kind: "error", message: "No input file specified" };
  }
  return { kind: "run", options };
}

export function formatError(error: unknown, filePath: string): string {
  if (error instanceof ConfigLoadError) {
    return `${filePath}: ${error.message}`;
  }
  if (error instanceof IniSyntaxError) {
    return `Syntax error: ${error.message}`;
  }
  if (error instanceof ExpressionSyntaxError) {
    return `${filePath}: Expression syntax error: ${error.message}`;
  }
  if (error instanceof KeyNotFoundError || error instanceof AmbiguousKeyError || error instanceof InvalidPathError) {
    return `Lookup error: ${error.message}`;
  }
  if (error instanceof Error) {
    return `${filePath}: ${error.message}`;
  }
  return `${filePath}: Unknown error: ${String(error)}`;
}

/**
 * Render the loaded tree, or the looked-up entries, as command output.
 */
export function renderOutput(tree: Section, options: CliOptions): string {
  const styler = options.color ? colorStyler : plainStyler;

  if (options.gets.length === 0) {
    return options.json ? JSON.stringify(tree.toJSON(), null, 2) : formatTree(tree, { styler });
  }

  return options.gets
    .map((key) => {
      const entry = tree.get(key);
      if (entry instanceof Section) {
        return options.json ? JSON.stringify(entry.toJSON(), null, 2) : formatTree(entry, { styler });
      }
      return options.json ? JSON.stringify(toJSON(entry)) : formatValue(entry);
    })
    .join("\n");
}

export async function run(options: CliOptions, stdin: ConfigSource): Promise<string> {
  if (options.inputFile !== "-" && !fs.existsSync(options.inputFile)) {
    throw new ConfigError(`No such file: ${options.inputFile}`);
  }
  const source = options.inputFile === "-" ? stdin : options.inputFile;
  const tree = await loadConfig(source, {
    name: options.name,
    separator: options.separator,
    constantsSection: options.constantsSection,
  });
  return renderOutput(tree, options);
}
