/**
 * Score Command
 *
 * Reads a JSON array of paper records, scores them, and writes the
 * dated result files.
 *
 * @module cli/commands/score
 */

import * as path from 'node:path';
import type { Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { formatScoreSummary, withSpinner } from '../formatters/index.js';
import { writeResults } from '../../export/index.js';
import { filterByScore, scorePapers } from '../../pipeline/index.js';
import { parsePapers, type Paper, type ScoredPaper } from '../../schemas/paper.js';
import { readJson } from '../../storage/index.js';
import { addOutputOptions, type OutputOptions } from './options.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Outcome of a scored run.
 */
export interface ScoreRunResult {
  /** Papers kept after the minimum score, best first */
  papers: ScoredPaper[];
  /** Files written */
  written: string[];
}

// ============================================================================
// Shared Run Logic
// ============================================================================

/**
 * Score papers, write the result files and print the summary.
 *
 * @param papers - Papers from the source
 * @param options - Output options
 * @param base - Base command for output
 * @param now - Run date used in file names
 * @returns Kept papers and written paths
 */
export async function scoreAndWrite(
  papers: readonly Paper[],
  options: OutputOptions,
  base: BaseCommand,
  now: Date = new Date()
): Promise<ScoreRunResult> {
  const scored = scorePapers(papers, { searchEngine: options.searchEngine });
  const kept = filterByScore(scored, options.minScore);
  base.debug(`Scored ${scored.length} unique papers, kept ${kept.length}`);

  const written = await withSpinner(
    `Writing results to ${base.outDir}...`,
    () => writeResults(kept, { outDir: base.outDir, format: options.format, date: now }),
    (paths) => `Wrote ${paths.length} file(s)`,
    { silent: base.isQuiet() }
  );

  if (!base.isQuiet()) {
    base.print(
      formatScoreSummary({
        received: papers.length,
        scored: scored.length,
        kept,
        minScore: options.minScore,
        top: options.top,
        written,
      })
    );
  }

  return { papers: kept, written };
}

// ============================================================================
// Command Handler
// ============================================================================

/**
 * Handle the score command.
 *
 * @param input - Path to a JSON file of paper records
 * @param options - Command options
 * @param base - Base command for output
 * @param now - Run date used in file names
 * @throws FileNotFoundError when the input does not exist
 */
export async function handleScore(
  input: string,
  options: OutputOptions,
  base: BaseCommand,
  now: Date = new Date()
): Promise<ScoreRunResult> {
  const inputPath = path.resolve(input);
  base.debug(`Reading papers from ${inputPath}`);

  const papers = parsePapers(await readJson(inputPath));
  base.info(`Loaded ${papers.length} papers from ${input}`);

  return scoreAndWrite(papers, options, base, now);
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the score command.
 *
 * @param program - Commander program instance
 */
export function registerScoreCommand(program: Command): void {
  const command = program
    .command('score <input>')
    .description('Score paper records from a JSON file and write JSON/CSV results');

  addOutputOptions(command).action(async (input: string, options: OutputOptions, cmd: Command) => {
    const base = getBaseCommand(cmd);
    try {
      await handleScore(input, options, base);
    } catch (error) {
      base.fatal(error);
    }
  });
}
