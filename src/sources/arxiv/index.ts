/**
 * arXiv Source
 *
 * @module sources/arxiv
 */

export {
  ArxivClient,
  ArxivApiError,
  FETCH_DEFAULTS,
  type ArxivClientOptions,
  type FetchRecentParams,
  buildSearchQuery,
  computeCutoff,
  isRetryableError,
} from './client.js';

export { parseArxivFeed, entryToPaper, arxivIdFromUrl } from './parser.js';
