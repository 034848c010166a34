/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color, out-dir)
 * - Consistent error handling and exit codes
 * - Output utilities (log, warn, error)
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import { ArxivApiError } from '../sources/arxiv/index.js';
import { FileNotFoundError } from '../storage/atomic.js';
import { getOutDir } from '../storage/paths.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Suppress all non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  color?: boolean; // commander inverts --no-color to color: false
  /** Override default output directory */
  outDir?: string;
}

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Standard exit codes for the CLI.
 */
export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** General error */
  ERROR: 1,
  /** Invalid usage or arguments */
  USAGE_ERROR: 2,
  /** Input file not found */
  NOT_FOUND: 3,
  /** API or network error */
  API_ERROR: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Pick the exit code for an error raised by a command.
 *
 * @param error - Thrown value
 * @returns Exit code
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof FileNotFoundError) {
    return EXIT_CODES.NOT_FOUND;
  }
  if (error instanceof ArxivApiError) {
    return EXIT_CODES.API_ERROR;
  }
  return EXIT_CODES.ERROR;
}

/**
 * Read the global options out of commander's untyped option bag.
 *
 * @param opts - Result of `command.opts()` or `optsWithGlobals()`
 * @returns Typed global options
 */
export function toGlobalOptions(opts: Record<string, unknown>): GlobalOptions {
  const { verbose, quiet, color, outDir } = opts;
  return {
    verbose: verbose === true,
    quiet: quiet === true,
    color: color !== false,
    ...(typeof outDir === 'string' ? { outDir } : {}),
  };
}

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * All command handlers receive a BaseCommand instance
 * to access consistent logging, error handling, and options.
 *
 * @example
 * ```typescript
 * async function scoreAction(input: string, options: ScoreOptions, cmd: Command) {
 *   const base = getBaseCommand(cmd);
 *
 *   try {
 *     await handleScore(input, options, base);
 *   } catch (err) {
 *     base.fatal(err);
 *   }
 * }
 * ```
 */
export class BaseCommand {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  /** Whether colored output is enabled */
  private readonly useColor: boolean;

  /** Resolved output directory path */
  readonly outDir: string;

  /**
   * Create a new BaseCommand instance.
   *
   * @param options - Global CLI options
   */
  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stdout.isTTY === true;
    this.outDir = getOutDir(options.outDir);

    // Configure chalk based on color preference
    if (!this.useColor) {
      chalk.level = 0;
    }
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  /**
   * Log a debug message (only visible in verbose mode).
   *
   * @param message - Message to log
   * @param args - Additional arguments to log
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Log an informational message (hidden in quiet mode).
   *
   * @param message - Message to log
   * @param args - Additional arguments to log
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.log(message, ...args);
    }
  }

  /**
   * Log a warning message (always visible).
   *
   * @param message - Warning message
   * @param args - Additional arguments to log
   */
  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Log an error message and exit.
   *
   * @param message - Error message
   * @param errorOrCode - Error object or exit code
   */
  error(message: string, errorOrCode?: Error | ExitCode): never {
    console.error(chalk.red(`Error: ${message}`));

    if (errorOrCode instanceof Error) {
      if (this.options.verbose) {
        console.error(chalk.dim(errorOrCode.stack ?? errorOrCode.message));
      }
      process.exit(exitCodeFor(errorOrCode));
    } else if (typeof errorOrCode === 'number') {
      process.exit(errorOrCode);
    } else {
      process.exit(EXIT_CODES.ERROR);
    }
  }

  /**
   * Report a thrown value and exit with the matching code.
   *
   * @param error - Thrown value
   */
  fatal(error: unknown): never {
    if (error instanceof Error) {
      this.error(error.message, error);
    }
    this.error(String(error));
  }

  /**
   * Log a success message with green checkmark.
   *
   * @param message - Success message
   */
  success(message: string): void {
    if (!this.options.quiet) {
      console.log(chalk.green(`${this.useColor ? '✔' : '[OK]'} ${message}`));
    }
  }

  /**
   * Print command output (visible in quiet mode).
   *
   * @param text - Output text
   */
  print(text: string): void {
    console.log(text);
  }

  /**
   * Print data as formatted JSON.
   *
   * @param data - Data to print
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  // ==========================================================================
  // Utility Methods
  // ==========================================================================

  /**
   * Check if verbose mode is enabled.
   */
  isVerbose(): boolean {
    return this.options.verbose === true;
  }

  /**
   * Check if quiet mode is enabled.
   */
  isQuiet(): boolean {
    return this.options.quiet === true;
  }

  /**
   * Check if colors are enabled.
   */
  hasColor(): boolean {
    return this.useColor;
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Get the base command from a commander Command instance.
 * Used by subcommand handlers to access shared functionality.
 *
 * @param cmd - Commander command instance
 * @returns BaseCommand stored by the program's preAction hook, or one built
 *   from the command's global options
 */
export function getBaseCommand(cmd: { optsWithGlobals(): Record<string, unknown> }): BaseCommand {
  const opts = cmd.optsWithGlobals();
  const base = opts['_baseCommand'];
  if (!(base instanceof BaseCommand)) {
    return new BaseCommand(toGlobalOptions(opts));
  }
  return base;
}
