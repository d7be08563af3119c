#!/usr/bin/env node
import { CommanderError, type Command } from "commander";

import { buildCli } from "./cli/index.js";
import { renderCliError } from "./cli/output.js";

const SILENT_EXIT_CODES = new Set(["commander.helpDisplayed", "commander.help", "commander.version"]);

// =============================================================================
// ENTRYPOINT
// =============================================================================

/** Parses argv and runs one command. Errors are printed, never thrown. */
export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  // Commander's own error output is replaced by renderCliError.
  program.configureOutput({ outputError: () => undefined });
  program.exitOverride();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError && SILENT_EXIT_CODES.has(error.code)) {
      process.exitCode = error.exitCode;
      return;
    }

    console.error(renderCliError(error, { debug: isDebugRequested(argv, program) }));
    process.exitCode = failureExitCode(error);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

// argv wins over parsed options: parsing may have failed before --debug was read.
function isDebugRequested(argv: readonly string[], program: Command): boolean {
  const separator = argv.indexOf("--");
  const flags = separator === -1 ? argv : argv.slice(0, separator);
  const last = flags.filter((arg) => arg === "--debug" || arg === "--no-debug").at(-1);
  if (last !== undefined) return last === "--debug";

  return program.opts<{ debug?: boolean }>().debug === true;
}

function failureExitCode(error: unknown): number {
  if (error instanceof CommanderError && error.exitCode !== 0) {
    return error.exitCode;
  }
  return 1;
}

// =============================================================================
// DIRECT EXECUTION
// =============================================================================

if (import.meta.url === `file://${process.argv[1]}`) {
  void main(process.argv);
}
