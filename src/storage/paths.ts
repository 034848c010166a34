/**
 * Path Resolution Utilities
 *
 * Provides consistent output file naming.
 *
 * Directory Structure:
 * ```
 * out/                              # Default output directory (PAPER_SCOUT_OUT_DIR)
 * ├── raw_papers_2026-10-18.json    # Scored papers, full records
 * └── raw_papers_2026-10-18.csv     # Scored papers, flat table
 * ```
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import { config } from '../config/index.js';

/**
 * Output file formats.
 */
export type OutputFormat = 'json' | 'csv';

/**
 * Gets the output directory.
 *
 * @param override - Directory given on the command line
 * @returns Absolute path to the output directory
 */
export function getOutDir(override?: string): string {
  return override ? path.resolve(override) : config.outDir;
}

/**
 * Format a date as `YYYY-MM-DD` in UTC.
 *
 * @param date - Date to format
 * @returns Date stamp
 */
export function formatDateStamp(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Gets the path of a dated results file.
 *
 * @param outDir - Output directory
 * @param format - File format
 * @param date - Run date (defaults to now)
 * @returns Path like `<outDir>/raw_papers_2026-10-18.json`
 */
export function getResultsPath(outDir: string, format: OutputFormat, date: Date = new Date()): string {
  return path.join(outDir, `raw_papers_${formatDateStamp(date)}.${format}`);
}
