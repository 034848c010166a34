#!/usr/bin/env node
/**
 * paper-scout CLI
 *
 * Main entry point for the paper-scout tool.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   paper-scout --help
 *   paper-scout score papers.json --min-score 30
 *   paper-scout fetch --categories cs.SE,cs.CL --months 1
 *   paper-scout explain --title "Repo-level code repair" --abstract "..."
 *
 * @module cli
 */

import { Command, CommanderError } from 'commander';
import { VERSION } from './version.js';
import { BaseCommand, EXIT_CODES, toGlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 *
 * @returns Configured commander Program instance
 */
export function createProgram(): Command {
  const program = new Command();

  // Program metadata
  program
    .name('paper-scout')
    .description('Score papers for fit with judged code-submission data')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('-o, --out-dir <path>', 'Override the output directory (PAPER_SCOUT_OUT_DIR, default ./out)');

  // Create base command helper with global options
  program.hook('preAction', (thisCommand) => {
    const opts = toGlobalOptions(thisCommand.opts());
    const baseCommand = new BaseCommand(opts);

    // Store base command in program for subcommands to access
    thisCommand.setOptionValue('_baseCommand', baseCommand);

    // Validate mutually exclusive flags
    if (opts.verbose && opts.quiet) {
      baseCommand.error('Cannot use both --verbose and --quiet flags', EXIT_CODES.USAGE_ERROR);
    }
  });

  // Register all subcommands
  registerCommands(program);

  // Commander errors (unknown option, bad value) are usage errors
  program.exitOverride();
  for (const command of program.commands) {
    command.exitOverride();
  }

  return program;
}

/**
 * Map a commander error to an exit code.
 *
 * @param error - Error thrown by commander
 * @returns Exit code
 */
export function commanderExitCode(error: CommanderError): number {
  if (
    error.code === 'commander.helpDisplayed' ||
    error.code === 'commander.version' ||
    error.code === 'commander.help'
  ) {
    return EXIT_CODES.SUCCESS;
  }
  return EXIT_CODES.USAGE_ERROR;
}

/**
 * Main CLI entry point.
 * Parses arguments and executes the appropriate command.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander already printed the message
      process.exit(commanderExitCode(error));
    }
    if (error instanceof Error && error.message) {
      console.error(`Error: ${error.message}`);
    }
    process.exit(EXIT_CODES.ERROR);
  }
}

// Run if executed directly
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(EXIT_CODES.ERROR);
  });
}
