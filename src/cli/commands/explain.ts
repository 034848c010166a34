/**
 * Explain Command
 *
 * Scores one title/abstract pair and shows how the score was reached.
 *
 * @module cli/commands/explain
 */

import { Option, type Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { formatExplanation } from '../formatters/index.js';
import { buildPitch, explainFit, type FitExplanation, type Pitch } from '../../scoring/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the explain command.
 */
export interface ExplainCommandOptions {
  title: string;
  abstract: string;
  format: 'text' | 'json';
}

export interface ExplainResult {
  explanation: FitExplanation;
  pitch: Pitch;
}

// ============================================================================
// Command Handler
// ============================================================================

/**
 * Handle the explain command.
 *
 * @param options - Command options
 * @param base - Base command for output
 * @returns Explanation and pitch
 */
export function handleExplain(options: ExplainCommandOptions, base: BaseCommand): ExplainResult {
  const explanation = explainFit({ title: options.title, abstract: options.abstract });
  const pitch = buildPitch(explanation.tags, explanation.benchmarks);

  if (options.format === 'json') {
    base.json({
      score: explanation.score,
      tags: explanation.tags,
      reasons: explanation.reasons,
      benchmarks: explanation.benchmarkHits,
      rawScore: explanation.rawScore,
      gated: explanation.gated,
      pitch,
    });
  } else {
    base.print(formatExplanation(explanation, pitch));
  }

  return { explanation, pitch };
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the explain command.
 *
 * @param program - Commander program instance
 */
export function registerExplainCommand(program: Command): void {
  program
    .command('explain')
    .description('Score a single title/abstract and show the matched signals')
    .requiredOption('-t, --title <text>', 'Paper title')
    .option('-a, --abstract <text>', 'Paper abstract', '')
    .addOption(new Option('-f, --format <type>', 'Output format').choices(['text', 'json']).default('text'))
    .action((options: ExplainCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      try {
        handleExplain(options, base);
      } catch (error) {
        base.fatal(error);
      }
    });
}
