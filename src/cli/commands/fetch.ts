/**
 * Fetch Command
 *
 * Pulls recent papers from arXiv, then scores and writes them like
 * the score command.
 *
 * @module cli/commands/fetch
 */

import type { Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { withSpinner } from '../formatters/index.js';
import { ArxivClient, FETCH_DEFAULTS } from '../../sources/arxiv/index.js';
import {
  addOutputOptions,
  parseList,
  parsePositiveInt,
  parsePositiveNumber,
  parseNonNegativeInt,
  type OutputOptions,
} from './options.js';
import { scoreAndWrite, type ScoreRunResult } from './score.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the fetch command.
 */
export interface FetchCommandOptions extends OutputOptions {
  categories: string[];
  months: number;
  pageSize: number;
  maxTotal: number;
  politeDelay: number;
}

/**
 * The part of the arXiv client the command uses.
 */
export type PaperSource = Pick<ArxivClient, 'fetchRecent'>;

export const DEFAULT_CATEGORIES = ['cs.CL', 'cs.AI', 'cs.LG'];

// ============================================================================
// Command Handler
// ============================================================================

/**
 * Handle the fetch command.
 *
 * @param options - Command options
 * @param base - Base command for output
 * @param source - Paper source (default: arXiv client from config)
 * @param now - Run date used in file names
 * @throws ArxivApiError when the API keeps failing
 */
export async function handleFetch(
  options: FetchCommandOptions,
  base: BaseCommand,
  source: PaperSource = new ArxivClient(),
  now: Date = new Date()
): Promise<ScoreRunResult> {
  base.debug(
    `Fetching ${options.categories.join(', ')} for ${options.months} month(s), ` +
      `page size ${options.pageSize}, max ${options.maxTotal}`
  );

  const papers = await withSpinner(
    `Fetching arXiv papers (${options.categories.join(', ')})...`,
    (spinner) =>
      source.fetchRecent({
        categories: options.categories,
        months: options.months,
        pageSize: options.pageSize,
        maxTotal: options.maxTotal,
        politeDelayMs: options.politeDelay,
        onPage: ({ fetched }) => {
          spinner.update(`Fetching arXiv papers... ${fetched} so far`);
        },
      }),
    (fetched) => `Fetched ${fetched.length} papers`,
    { silent: base.isQuiet() }
  );

  return scoreAndWrite(papers, options, base, now);
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the fetch command.
 *
 * @param program - Commander program instance
 */
export function registerFetchCommand(program: Command): void {
  const command = program
    .command('fetch')
    .description('Fetch recent arXiv papers, score them and write JSON/CSV results')
    .option('-c, --categories <list>', 'Comma-separated arXiv categories', parseList, DEFAULT_CATEGORIES)
    .option('-m, --months <n>', 'Months back to include', parsePositiveNumber, FETCH_DEFAULTS.months)
    .option('--page-size <n>', 'Results per API request', parsePositiveInt, FETCH_DEFAULTS.pageSize)
    .option('--max-total <n>', 'Maximum papers to fetch', parsePositiveInt, FETCH_DEFAULTS.maxTotal)
    .option(
      '--polite-delay <ms>',
      'Delay between API requests',
      parseNonNegativeInt,
      FETCH_DEFAULTS.politeDelayMs
    );

  addOutputOptions(command).action(async (options: FetchCommandOptions, cmd: Command) => {
    const base = getBaseCommand(cmd);
    try {
      await handleFetch(options, base);
    } catch (error) {
      base.fatal(error);
    }
  });
}
