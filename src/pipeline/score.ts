/**
 * Scoring Pipeline
 *
 * Turns raw paper records into scored records:
 * dedupe → fit score → pitch → primary contact → profile search link,
 * then orders the results by fit.
 *
 * @module pipeline/score
 */

import {
  buildDuckDuckGoSearchUrl,
  buildGoogleSearchUrl,
  buildProfileSearchQuery,
  pickPrimaryContact,
} from '../contacts/index.js';
import { dedupePapers } from '../dedupe/index.js';
import type { Paper, ScoredPaper } from '../schemas/paper.js';
import { buildPitch, scoreFit } from '../scoring/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Search engines available for profile links.
 */
export const SEARCH_ENGINES = ['google', 'duckduckgo'] as const;

export type SearchEngine = (typeof SEARCH_ENGINES)[number];

export interface ScorePapersOptions {
  /** Engine used for contact search links (default: google) */
  searchEngine?: SearchEngine;
}

/**
 * Type guard for search engine names.
 */
export function isSearchEngine(value: string): value is SearchEngine {
  return SEARCH_ENGINES.some((engine) => engine === value);
}

// ============================================================================
// Pipeline
// ============================================================================

/**
 * Build a profile search link with the chosen engine.
 */
function contactSearchUrl(name: string, engine: SearchEngine): string {
  const query = buildProfileSearchQuery(name);
  return engine === 'duckduckgo' ? buildDuckDuckGoSearchUrl(query) : buildGoogleSearchUrl(query);
}

/**
 * Score a single (already deduplicated) paper.
 *
 * @param paper - Paper record
 * @param engine - Engine for the contact search link
 * @returns Scored record
 */
export function scorePaper(paper: Paper, engine: SearchEngine = 'google'): ScoredPaper {
  const fit = scoreFit({ title: paper.title, abstract: paper.abstract });
  const pitch = buildPitch(fit.tags, fit.benchmarks);
  const primaryContact = pickPrimaryContact(paper.authors);

  return {
    ...paper,
    fitScore: fit.score,
    fitTags: [...fit.tags],
    fitReasons: [...fit.reasons],
    benchmarks: [...fit.benchmarks],
    pitch: { oneLine: pitch.oneLine, bullets: [...pitch.bullets] },
    primaryContact,
    contactSearchUrl: contactSearchUrl(primaryContact.name, engine),
  };
}

/**
 * Deduplicate and score papers.
 *
 * Results are ordered by fit score, highest first. Papers with equal
 * scores keep their input order.
 *
 * @param papers - Papers in source order
 * @param options - Pipeline options
 * @returns Scored papers
 */
export function scorePapers(papers: readonly Paper[], options: ScorePapersOptions = {}): ScoredPaper[] {
  const engine = options.searchEngine ?? 'google';
  return dedupePapers(papers)
    .map((paper) => scorePaper(paper, engine))
    .sort((a, b) => b.fitScore - a.fitScore);
}

/**
 * Keep papers scoring at least `minScore`.
 */
export function filterByScore(papers: readonly ScoredPaper[], minScore: number): ScoredPaper[] {
  return papers.filter((paper) => paper.fitScore >= minScore);
}
