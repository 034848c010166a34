/**
 * Deduplication Module Exports
 *
 * Stable paper keys and first-occurrence deduplication.
 *
 * @module dedupe
 */

export { ARXIV_ID_PREFIX, HASH_KEY_PREFIX, publicationYear, stablePaperKey } from './hash.js';
export { dedupePapers } from './papers.js';
