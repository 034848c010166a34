/**
 * Paper Deduplication
 *
 * @module dedupe/papers
 */

import type { Paper } from '../schemas/paper.js';
import { stablePaperKey } from './hash.js';

/**
 * Remove duplicate papers, keeping the first occurrence of each key.
 *
 * Returned records carry their stable key as `id`. Input records are
 * not modified.
 *
 * @param papers - Papers in source order
 * @returns Unique papers in source order
 */
export function dedupePapers(papers: readonly Paper[]): Paper[] {
  const seen = new Set<string>();
  const unique: Paper[] = [];

  for (const paper of papers) {
    const key = stablePaperKey(paper);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push({ ...paper, id: key });
  }

  return unique;
}
