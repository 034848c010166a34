/**
 * JSON Export
 *
 * @module export/json
 */

import type { ScoredPaper } from '../schemas/paper.js';
import { atomicWriteJson } from '../storage/atomic.js';

/**
 * Write scored papers to a pretty-printed JSON file.
 *
 * Uses atomic write pattern (temp file + rename) to prevent corruption.
 * Creates parent directory if it doesn't exist.
 *
 * @param papers - Scored papers
 * @param outputPath - Target file path
 *
 * @example
 * ```typescript
 * await exportPapersJson(scored, 'out/raw_papers_2026-10-18.json');
 * ```
 */
export async function exportPapersJson(
  papers: readonly ScoredPaper[],
  outputPath: string
): Promise<void> {
  await atomicWriteJson(outputPath, papers);
}
