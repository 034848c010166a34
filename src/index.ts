/**
 * paper-scout
 *
 * Heuristic fit scoring of papers against judged code-submission data,
 * with arXiv fetching, pitches, contacts and JSON/CSV export.
 *
 * @example
 * ```typescript
 * import { scoreFit, buildPitch } from 'paper-scout';
 *
 * const fit = scoreFit({ title: 'Repo-level code repair', abstract: 'Evaluated on SWE-bench.' });
 * const pitch = buildPitch(fit.tags, fit.benchmarks);
 * ```
 */

export * from './scoring/index.js';
export * from './schemas/index.js';
export * from './dedupe/index.js';
export * from './contacts/index.js';
export * from './pipeline/index.js';
export * from './export/index.js';
export * from './sources/arxiv/index.js';
export * from './storage/index.js';
export { config, loadConfig, type Config } from './config/index.js';
