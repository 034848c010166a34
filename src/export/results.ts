/**
 * Results Writer
 *
 * Writes a scored run to the dated results files in the output directory.
 *
 * @module export/results
 */

import type { ScoredPaper } from '../schemas/paper.js';
import { getResultsPath, type OutputFormat } from '../storage/paths.js';
import { exportPapersCsv } from './csv.js';
import { exportPapersJson } from './json.js';

/**
 * Which result files to write.
 */
export type ResultsFormat = OutputFormat | 'both';

export const RESULTS_FORMATS: readonly ResultsFormat[] = ['json', 'csv', 'both'];

export interface WriteResultsOptions {
  outDir: string;
  format: ResultsFormat;
  /** Run date used in file names (default: now) */
  date?: Date;
}

/**
 * Expand a results format into the file formats it covers.
 */
export function formatsFor(format: ResultsFormat): OutputFormat[] {
  return format === 'both' ? ['json', 'csv'] : [format];
}

/**
 * Write scored papers to `raw_papers_<date>.json` and/or `.csv`.
 *
 * @param papers - Scored papers
 * @param options - Output directory, format and date
 * @returns Paths written, JSON first
 */
export async function writeResults(
  papers: readonly ScoredPaper[],
  options: WriteResultsOptions
): Promise<string[]> {
  const date = options.date ?? new Date();
  const written: string[] = [];

  for (const format of formatsFor(options.format)) {
    const filePath = getResultsPath(options.outDir, format, date);
    if (format === 'json') {
      await exportPapersJson(papers, filePath);
    } else {
      await exportPapersCsv(papers, filePath);
    }
    written.push(filePath);
  }

  return written;
}
