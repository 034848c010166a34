/**
 * arXiv API Client
 *
 * Pages through the arXiv export API, newest submissions first, until a
 * date cutoff or a record cap is reached.
 *
 * Handles request timeouts, retryable error classification, retries with
 * exponential backoff, and the polite delay the API asks for between pages.
 *
 * @module sources/arxiv/client
 * @see https://info.arxiv.org/help/api/user-manual.html
 */

import { config } from '../../config/index.js';
import type { Paper } from '../../schemas/paper.js';
import { parseArxivFeed } from './parser.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Client construction options.
 */
export interface ArxivClientOptions {
  /** API endpoint (default: config.arxiv.apiUrl) */
  apiUrl?: string;
  /** Request timeout in milliseconds (default: config.arxiv.timeoutMs) */
  timeoutMs?: number;
  /** Retry attempts for retryable errors (default: 3) */
  maxRetries?: number;
  /** Delay function, replaceable in tests */
  sleep?: (ms: number) => Promise<void>;
  /** Clock, replaceable in tests */
  now?: () => Date;
}

/**
 * Parameters for fetching recent papers.
 */
export interface FetchRecentParams {
  /** arXiv categories, e.g. ['cs.CL', 'cs.AI'] */
  categories: string[];
  /** How many months back to include (default: 6) */
  months?: number;
  /** Results per API page (default: 200) */
  pageSize?: number;
  /** Hard cap on papers returned (default: 5000) */
  maxTotal?: number;
  /** Delay between pages in milliseconds (default: 3000) */
  politeDelayMs?: number;
  /** Called after each page with the running total */
  onPage?: (progress: { start: number; fetched: number }) => void;
}

/**
 * arXiv API error with additional context
 */
export class ArxivApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly isRetryable: boolean
  ) {
    super(message);
    this.name = 'ArxivApiError';
  }
}

// ============================================================================
// Constants
// ============================================================================

/**
 * Default fetch parameters
 */
export const FETCH_DEFAULTS = {
  months: 6,
  pageSize: 200,
  maxTotal: 5000,
  politeDelayMs: 3000,
} as const;

/** Average month length used for the date cutoff */
const DAYS_PER_MONTH = 30.5;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Maximum retry attempts for API calls */
const MAX_RETRIES = 3;

/** Base delay in milliseconds for exponential backoff */
const BASE_DELAY_MS = 1000;

/** Maximum delay in milliseconds for exponential backoff */
const MAX_DELAY_MS = 8000;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Sleep for a specified duration.
 *
 * @param ms - Duration in milliseconds
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Build the arXiv search query for a set of categories.
 *
 * @param categories - arXiv categories
 * @returns e.g. `cat:cs.CL OR cat:cs.AI`
 */
export function buildSearchQuery(categories: readonly string[]): string {
  return categories.map((category) => `cat:${category}`).join(' OR ');
}

/**
 * Compute the oldest publication date to include.
 *
 * @param now - Reference date
 * @param months - Months back
 * @returns Cutoff date (whole days)
 */
export function computeCutoff(now: Date, months: number): Date {
  const days = Math.trunc(months * DAYS_PER_MONTH);
  return new Date(now.getTime() - days * MS_PER_DAY);
}

/**
 * Check if an error is retryable
 *
 * @param error - Error to check
 * @returns true if the error is likely transient and worth retrying
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ArxivApiError) {
    return error.isRetryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('timeout') ||
      message.includes('network') ||
      message.includes('econnreset') ||
      message.includes('fetch failed')
    );
  }

  return false;
}

// ============================================================================
// Client Implementation
// ============================================================================

/**
 * ArxivClient fetches recent papers from the arXiv export API.
 *
 * @example
 * ```typescript
 * const client = new ArxivClient();
 * const papers = await client.fetchRecent({ categories: ['cs.SE'], months: 1 });
 * console.log(`Fetched ${papers.length} papers`);
 * ```
 */
export class ArxivClient {
  private readonly apiUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(options: ArxivClientOptions = {}) {
    this.apiUrl = options.apiUrl ?? config.arxiv.apiUrl;
    this.timeoutMs = options.timeoutMs ?? config.arxiv.timeoutMs;
    this.maxRetries = options.maxRetries ?? MAX_RETRIES;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Fetch papers submitted within the last `months`, newest first.
   *
   * Stops at an empty page, at the first paper older than the cutoff,
   * or once `maxTotal` papers were collected.
   *
   * @param params - Categories and paging limits
   * @returns Papers in submission order (newest first)
   * @throws ArxivApiError when a page fails after all retries
   */
  async fetchRecent(params: FetchRecentParams): Promise<Paper[]> {
    const months = params.months ?? FETCH_DEFAULTS.months;
    const pageSize = params.pageSize ?? FETCH_DEFAULTS.pageSize;
    const maxTotal = params.maxTotal ?? FETCH_DEFAULTS.maxTotal;
    const politeDelayMs = params.politeDelayMs ?? FETCH_DEFAULTS.politeDelayMs;

    const now = this.now();
    const cutoff = computeCutoff(now, months);
    const query = buildSearchQuery(params.categories);

    const papers: Paper[] = [];
    let start = 0;

    while (papers.length < maxTotal) {
      const page = await this.fetchPage(query, start, pageSize, now);
      if (page.length === 0) {
        break;
      }

      let reachedCutoff = false;
      for (const paper of page) {
        if (new Date(paper.publishedAt) < cutoff) {
          reachedCutoff = true;
          break;
        }
        papers.push(paper);
        if (papers.length >= maxTotal) {
          break;
        }
      }

      params.onPage?.({ start, fetched: papers.length });

      if (reachedCutoff || papers.length >= maxTotal) {
        break;
      }

      start += pageSize;
      await this.sleep(politeDelayMs);
    }

    return papers;
  }

  /**
   * Fetch and parse one page of results, retrying transient failures.
   *
   * @param query - arXiv search query
   * @param start - Offset of the first result
   * @param pageSize - Results per page
   * @param now - Fallback publication date
   * @returns Papers on the page
   */
  async fetchPage(query: string, start: number, pageSize: number, now: Date): Promise<Paper[]> {
    const params = new URLSearchParams({
      search_query: query,
      start: String(start),
      max_results: String(pageSize),
      sortBy: 'submittedDate',
      sortOrder: 'descending',
    });

    const body = await this.withRetry(() => this.fetchText(`${this.apiUrl}?${params.toString()}`));
    return parseArxivFeed(body, now);
  }

  /**
   * Execute a request with retry logic.
   *
   * Exponential backoff for retryable errors (1s, 2s, 4s, capped at 8s).
   *
   * @param fn - Async function to execute
   * @returns Result of the function
   * @throws Last error if all retries exhausted or error is not retryable
   */
  private async withRetry<T>(fn: () => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        // Don't retry if error is not retryable or we've exhausted retries
        if (!isRetryableError(error) || attempt >= this.maxRetries) {
          throw error;
        }
        await this.sleep(Math.min(MAX_DELAY_MS, BASE_DELAY_MS * Math.pow(2, attempt)));
      }
    }
  }

  /**
   * GET a URL and return the body, with a timeout.
   *
   * @param url - Request URL
   * @returns Response body
   * @throws ArxivApiError on timeout or non-2xx status
   */
  private async fetchText(url: string): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(url, { signal: controller.signal });
      if (!response.ok) {
        const isRetryable = response.status === 429 || response.status >= 500;
        throw new ArxivApiError(
          `arXiv API error (${response.status}): ${response.statusText || 'request failed'}`,
          response.status,
          isRetryable
        );
      }
      return await response.text();
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new ArxivApiError(
          `Request timed out after ${this.timeoutMs}ms`,
          408,
          true // Timeouts are retryable
        );
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
