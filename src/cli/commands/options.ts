/**
 * Shared Command Options
 *
 * Option parsers and the options common to `score` and `fetch`.
 *
 * @module cli/commands/options
 */

import { InvalidArgumentError, Option, type Command } from 'commander';
import { RESULTS_FORMATS, type ResultsFormat } from '../../export/index.js';
import { SEARCH_ENGINES, type SearchEngine } from '../../pipeline/index.js';

/**
 * Options shared by commands that score and write papers.
 */
export interface OutputOptions {
  format: ResultsFormat;
  minScore: number;
  top: number;
  searchEngine: SearchEngine;
}

/**
 * Parse a non-negative integer option value.
 *
 * @throws InvalidArgumentError for anything else
 */
export function parseNonNegativeInt(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parseInt(value, 10);
}

/**
 * Parse a positive integer option value.
 */
export function parsePositiveInt(value: string): number {
  const parsed = parseNonNegativeInt(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('Must be greater than zero.');
  }
  return parsed;
}

/**
 * Parse a positive number option value (fractions allowed).
 */
export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive number.');
  }
  return parsed;
}

/**
 * Parse a fit score threshold (0-100).
 */
export function parseScore(value: string): number {
  const parsed = parseNonNegativeInt(value);
  if (parsed > 100) {
    throw new InvalidArgumentError('Must be between 0 and 100.');
  }
  return parsed;
}

/**
 * Parse a comma-separated list, dropping blanks.
 */
export function parseList(value: string): string[] {
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  if (items.length === 0) {
    throw new InvalidArgumentError('Must name at least one value.');
  }
  return items;
}

/**
 * Add the output options to a command.
 *
 * @param command - Command to extend
 * @returns The same command
 */
export function addOutputOptions(command: Command): Command {
  return command
    .addOption(
      new Option('-f, --format <type>', 'Result files to write').choices(RESULTS_FORMATS).default('both')
    )
    .option('--min-score <n>', 'Only keep papers scoring at least n (0-100)', parseScore, 0)
    .option('--top <n>', 'Number of papers listed in the summary', parseNonNegativeInt, 10)
    .addOption(
      new Option('--search-engine <name>', 'Engine for contact search links')
        .choices(SEARCH_ENGINES)
        .default('google')
    );
}
