/**
 * Paper Key Generation for Deduplication
 *
 * Generates stable keys so the same paper delivered twice (or by two
 * sources) collapses to one record.
 *
 * @module dedupe/hash
 */

import { createHash } from 'node:crypto';
import type { Paper } from '../schemas/paper.js';

/**
 * Prefix of identifiers that are already stable.
 */
export const ARXIV_ID_PREFIX = 'arxiv:';

/**
 * Prefix of derived hash keys.
 */
export const HASH_KEY_PREFIX = 'hash:';

/**
 * Extract the UTC publication year of a paper.
 *
 * @param publishedAt - ISO8601 timestamp
 * @returns Four-digit year, or empty string if the date does not parse
 */
export function publicationYear(publishedAt: string): string {
  const date = new Date(publishedAt);
  if (isNaN(date.getTime())) {
    return '';
  }
  return String(date.getUTCFullYear());
}

/**
 * Generate a stable key for a paper.
 *
 * arXiv identifiers are used as-is. Other records are keyed by a hash of
 * title, first author and year.
 *
 * Seed format: `${title}|${firstAuthor}|${year}`, lowercased and trimmed.
 *
 * @param paper - The paper to key
 * @returns `arxiv:<id>` or `hash:<16 hex chars>`
 *
 * @example
 * ```typescript
 * stablePaperKey({ id: 'arxiv:2310.06770v3', ... }) // 'arxiv:2310.06770v3'
 * stablePaperKey({ id: 'feed-42', title: 'Code LLMs', ... }) // 'hash:…'
 * ```
 */
export function stablePaperKey(
  paper: Pick<Paper, 'id' | 'title' | 'authors' | 'publishedAt'>
): string {
  if (paper.id.startsWith(ARXIV_ID_PREFIX)) {
    return paper.id;
  }

  const firstAuthor = paper.authors[0] ?? '';
  const year = publicationYear(paper.publishedAt);
  const seed = `${paper.title}|${firstAuthor}|${year}`.toLowerCase().trim();

  return HASH_KEY_PREFIX + createHash('sha256').update(seed).digest('hex').substring(0, 16);
}
