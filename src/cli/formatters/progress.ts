/**
 * Progress Formatters
 *
 * Spinner for long-running operations (arXiv paging, scoring, writing).
 * Uses the ora library for terminal spinners.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

// ============================================================================
// Types
// ============================================================================

/**
 * Progress spinner options.
 */
export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
  /** Suppress all spinner output (quiet mode) */
  silent?: boolean;
}

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * Animates only on a TTY; elsewhere ora prints the final state lines.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('Fetching papers...').start();
 *
 * try {
 *   const papers = await client.fetchRecent({ categories: ['cs.SE'] });
 *   spinner.succeed(`Fetched ${papers.length} papers`);
 * } catch (err) {
 *   spinner.fail('Fetch failed');
 *   throw err;
 * }
 * ```
 */
export class ProgressSpinner {
  private readonly spinner: Ora;
  private startTime: number = 0;

  /**
   * Create a new progress spinner.
   *
   * @param text - Initial spinner text
   * @param options - Spinner options
   */
  constructor(text: string, options: SpinnerOptions = {}) {
    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: process.stdout.isTTY === true,
      isSilent: options.silent === true,
      stream: process.stdout,
    });
  }

  /**
   * Start the spinner.
   *
   * @param text - Optional text to display
   */
  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  /**
   * Update spinner text.
   */
  update(text: string): this {
    this.spinner.text = text;
    return this;
  }

  /**
   * Stop spinner with success state, appending the elapsed time.
   *
   * @param text - Success message
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  /**
   * Stop spinner with failure state.
   *
   * @param text - Failure message
   */
  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

  /**
   * Check if spinner is currently spinning.
   */
  isSpinning(): boolean {
    return this.spinner.isSpinning;
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Format a duration for display.
 *
 * @param ms - Duration in milliseconds
 * @returns e.g. `850ms`, `2.5s`, `1m 5s`
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Run an async task behind a spinner.
 *
 * @param text - Spinner text while running
 * @param task - Work to run; receives the spinner for progress updates
 * @param done - Success text derived from the result
 * @param options - Spinner options
 * @returns Task result
 */
export async function withSpinner<T>(
  text: string,
  task: (spinner: ProgressSpinner) => Promise<T>,
  done: (result: T) => string,
  options?: SpinnerOptions
): Promise<T> {
  const spinner = new ProgressSpinner(text, options).start();
  try {
    const result = await task(spinner);
    spinner.succeed(done(result));
    return result;
  } catch (error) {
    spinner.fail();
    throw error;
  }
}
