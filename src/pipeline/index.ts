/**
 * Pipeline Module Exports
 *
 * @module pipeline
 */

export {
  SEARCH_ENGINES,
  type SearchEngine,
  type ScorePapersOptions,
  isSearchEngine,
  scorePaper,
  scorePapers,
  filterByScore,
} from './score.js';
