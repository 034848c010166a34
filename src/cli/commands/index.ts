/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * Available commands:
 * - score: Score paper records from a JSON file
 * - fetch: Fetch recent arXiv papers and score them
 * - explain: Score a single title/abstract with details
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerExplainCommand } from './explain.js';
import { registerFetchCommand } from './fetch.js';
import { registerScoreCommand } from './score.js';

/**
 * Register all CLI commands with the program.
 *
 * @param program - Commander program instance
 */
export function registerCommands(program: Command): void {
  registerScoreCommand(program);
  registerFetchCommand(program);
  registerExplainCommand(program);
}

