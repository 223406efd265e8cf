#!/usr/bin/env node
/**
 * exprconfig CLI.
 *
 * Usage:
 *   exprconfig <file|-> [options]
 *   exprconfig --help
 */

import { parseArgs, formatError, run, HELP_TEXT } from "./cli-options";

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    console.log(HELP_TEXT);
    process.exit(1);
  }

  const parsed = parseArgs(args);
  if (parsed.kind === "help") {
    console.log(HELP_TEXT);
    return;
  }
  if (parsed.kind === "error") {
    console.error(`Error: ${parsed.message}`);
    process.exit(1);
  }

  try {
    const output = await run(parsed.options, process.stdin);
    process.stdout.write(output + "\n");
  } catch (err) {
    console.error(formatError(err, parsed.options.inputFile));
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(formatError(err, "exprconfig"));
  process.exit(1);
});
