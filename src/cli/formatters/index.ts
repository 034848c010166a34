/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export { ProgressSpinner, formatDuration, withSpinner, type SpinnerOptions } from './progress.js';

// Summary formatters
export { formatScoreSummary, formatExplanation, type ScoreSummary } from './summary.js';
