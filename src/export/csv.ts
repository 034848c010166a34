/**
 * CSV Export
 *
 * Flattens scored papers into a CSV table, one row per paper.
 *
 * @module export/csv
 */

import type { ScoredPaper } from '../schemas/paper.js';
import { atomicWriteText } from '../storage/atomic.js';

// ============================================================================
// Constants
// ============================================================================

/**
 * Column order of the CSV output.
 */
export const CSV_FIELDS = [
  'id',
  'published_at',
  'title',
  'authors',
  'url',
  'source',
  'categories',
  'abstract',
  'fit_score',
  'fit_tags',
  'fit_reasons',
  'benchmarks',
  'pitch',
  'primary_contact',
  'contact_search_url',
] as const;

export type CsvField = (typeof CSV_FIELDS)[number];

/** Separator for list-valued cells */
const LIST_SEPARATOR = '; ';

/** Row terminator (RFC 4180) */
const LINE_END = '\r\n';

// ============================================================================
// Formatting
// ============================================================================

/**
 * Escape a CSV field value.
 * Quotes values containing a comma, quote or line break; doubles quotes.
 *
 * @param value - Cell value
 * @returns Escaped cell
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Map a scored paper to its CSV cells.
 *
 * @param paper - Scored paper
 * @returns Cell values keyed by column
 */
export function toCsvRecord(paper: ScoredPaper): Record<CsvField, string> {
  return {
    id: paper.id,
    published_at: paper.publishedAt,
    title: paper.title,
    authors: paper.authors.join(LIST_SEPARATOR),
    url: paper.url,
    source: paper.source,
    categories: paper.categories.join(LIST_SEPARATOR),
    abstract: paper.abstract,
    fit_score: String(paper.fitScore),
    fit_tags: paper.fitTags.join(LIST_SEPARATOR),
    fit_reasons: paper.fitReasons.join(LIST_SEPARATOR),
    benchmarks: paper.benchmarks.join(LIST_SEPARATOR),
    pitch: paper.pitch.oneLine,
    primary_contact: paper.primaryContact.name,
    contact_search_url: paper.contactSearchUrl,
  };
}

/**
 * Render scored papers as CSV text with a header row.
 *
 * @param papers - Scored papers
 * @returns CSV content, every row terminated by CRLF
 */
export function toCsv(papers: readonly ScoredPaper[]): string {
  const header = CSV_FIELDS.join(',');
  const rows = papers.map((paper) => {
    const record = toCsvRecord(paper);
    return CSV_FIELDS.map((field) => escapeCsvField(record[field])).join(',');
  });

  return [header, ...rows].map((line) => line + LINE_END).join('');
}

// ============================================================================
// File Export
// ============================================================================

/**
 * Write scored papers to a CSV file.
 *
 * @param papers - Scored papers
 * @param outputPath - Target file path
 */
export async function exportPapersCsv(
  papers: readonly ScoredPaper[],
  outputPath: string
): Promise<void> {
  await atomicWriteText(outputPath, toCsv(papers));
}
