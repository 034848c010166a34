/**
 * Summary Formatters
 *
 * Terminal output for scored runs and single-document explanations.
 *
 * @module cli/formatters/summary
 */

import chalk from 'chalk';
import { SEARCH_LINK_DISCLAIMER } from '../../contacts/index.js';
import type { ScoredPaper } from '../../schemas/paper.js';
import type { FitExplanation, Pitch } from '../../scoring/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Scored run data for formatting.
 */
export interface ScoreSummary {
  /** Papers read from the source, before deduplication */
  received: number;
  /** Papers after deduplication */
  scored: number;
  /** Papers kept by the minimum score, best first */
  kept: readonly ScoredPaper[];
  /** Minimum score applied */
  minScore: number;
  /** How many papers to list */
  top: number;
  /** Files written */
  written: readonly string[];
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Color a fit score by band.
 */
function colorScore(score: number): string {
  const label = String(score).padStart(3);
  if (score >= 60) return chalk.green(label);
  if (score >= 30) return chalk.yellow(label);
  return chalk.dim(label);
}

function list(values: readonly string[]): string {
  return values.length > 0 ? values.join(', ') : '-';
}

// ============================================================================
// Main Formatters
// ============================================================================

/**
 * Format the summary of a scored run.
 *
 * @param summary - Run data
 * @returns Formatted string for terminal output
 *
 * @example
 * ```
 * === Scoring Complete ===
 * Papers:  12 received, 11 unique, 4 with score >= 30
 *
 * Top 2:
 *    1. [100] Agents for repo-level code repair
 *           tags: benchmarks, core_code, repo_se
 *           contact: Grace Hopper (3+ authors: ...)
 *   ...
 * ```
 */
export function formatScoreSummary(summary: ScoreSummary): string {
  const lines: string[] = [];

  lines.push(chalk.bold('=== Scoring Complete ==='));
  lines.push(
    `Papers:  ${summary.received} received, ${summary.scored} unique, ` +
      `${summary.kept.length} with score >= ${summary.minScore}`
  );

  const shown = summary.kept.slice(0, Math.max(0, summary.top));
  if (shown.length > 0) {
    lines.push('');
    lines.push(chalk.bold(`Top ${shown.length}:`));
    shown.forEach((paper, index) => {
      const rank = String(index + 1).padStart(4);
      lines.push(`${rank}. [${colorScore(paper.fitScore)}] ${paper.title}`);
      lines.push(`         tags: ${list(paper.fitTags)}`);
      if (paper.primaryContact.name) {
        lines.push(`         contact: ${paper.primaryContact.name} (${paper.primaryContact.hint})`);
      }
      if (paper.contactSearchUrl) {
        lines.push(`         search: ${paper.contactSearchUrl}`);
      }
    });
    if (shown.some((paper) => paper.contactSearchUrl)) {
      lines.push('');
      lines.push(chalk.dim(SEARCH_LINK_DISCLAIMER));
    }
  }

  if (summary.written.length > 0) {
    lines.push('');
    for (const filePath of summary.written) {
      lines.push(`Wrote: ${chalk.cyan(filePath)}`);
    }
  }

  return lines.join('\n');
}

/**
 * Format a fit explanation with its pitch.
 *
 * @param explanation - Scorer explanation
 * @param pitch - Pitch built from the result
 * @returns Formatted string for terminal output
 */
export function formatExplanation(explanation: FitExplanation, pitch: Pitch): string {
  const lines: string[] = [];

  lines.push(`${chalk.bold('Fit score:')} ${explanation.score}`);
  if (explanation.gated && explanation.rawScore > explanation.score) {
    lines.push(chalk.yellow(`  capped from ${explanation.rawScore}: no benchmark or code/repository signal`));
  }
  lines.push(`${chalk.bold('Tags:')} ${list(explanation.tags)}`);

  lines.push(chalk.bold('Reasons:'));
  for (const reason of explanation.reasons) {
    lines.push(`  - ${reason}`);
  }

  lines.push(chalk.bold('Benchmarks:'));
  if (explanation.benchmarkHits.length === 0) {
    lines.push('  -');
  }
  for (const hit of explanation.benchmarkHits) {
    lines.push(`  - ${hit.name} (${hit.weight}): "${hit.evidence}"`);
  }

  lines.push(chalk.bold('Pitch:'));
  lines.push(`  ${pitch.oneLine}`);
  for (const bullet of pitch.bullets) {
    lines.push(`  * ${bullet}`);
  }

  return lines.join('\n');
}
