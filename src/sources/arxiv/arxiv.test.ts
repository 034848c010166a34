/**
 * Tests for the arXiv source
 *
 * Covers Atom parsing, cutoff/paging rules, and retry handling.
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import {
  ArxivApiError,
  ArxivClient,
  buildSearchQuery,
  computeCutoff,
  isRetryableError,
} from './client.js';
import { arxivIdFromUrl, parseArxivFeed } from './parser.js';

// ============================================================================
// Test Fixtures
// ============================================================================

const mockFetch = jest.fn<typeof fetch>();
const originalFetch = global.fetch;

const NOW = new Date('2026-03-01T00:00:00Z');
const API_URL = 'http://arxiv.test/api/query';

interface EntryFixture {
  id: string;
  published?: string;
  title?: string;
}

function atomEntry(fixture: EntryFixture): string {
  const published = fixture.published ? `<published>${fixture.published}</published>` : '';
  return `
  <entry>
    <id>http://arxiv.org/abs/${fixture.id}</id>
    ${published}
    <title>${fixture.title ?? `Paper ${fixture.id}`}</title>
    <summary>Abstract of ${fixture.id}.</summary>
    <author><name>Test Author</name></author>
    <link href="http://arxiv.org/abs/${fixture.id}" rel="alternate" type="text/html"/>
    <category term="cs.SE" scheme="http://arxiv.org/schemas/atom"/>
  </entry>`;
}

function atomFeed(entries: EntryFixture[]): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>arXiv Query</title>
  ${entries.map(atomEntry).join('\n')}
</feed>`;
}

/**
 * Serve one feed per call, then empty feeds.
 */
function servePages(pages: EntryFixture[][]): void {
  let call = 0;
  mockFetch.mockImplementation(async () => {
    const page = pages[call] ?? [];
    call++;
    return new Response(atomFeed(page), { status: 200 });
  });
}

function createClient(maxRetries = 3) {
  const sleep = jest.fn(async (_ms: number): Promise<void> => undefined);
  const client = new ArxivClient({ apiUrl: API_URL, timeoutMs: 5000, maxRetries, sleep, now: () => NOW });
  return { client, sleep };
}

function requestedParams(callIndex: number): URLSearchParams {
  const [input] = mockFetch.mock.calls[callIndex] ?? [];
  return new URL(String(input)).searchParams;
}

// ============================================================================
// Parser
// ============================================================================

describe('parseArxivFeed', () => {
  const fullEntry = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>arXiv Query</title>
  <entry>
    <id>http://arxiv.org/abs/2602.01234v1</id>
    <published>2026-02-20T10:00:00Z</published>
    <title>Repo-level
      code repair</title>
    <summary>  We evaluate agents
      on SWE-bench.  </summary>
    <author><name>Ada Lovelace</name></author>
    <author><name>Alan Turing</name></author>
    <arxiv:doi xmlns:arxiv="http://arxiv.org/schemas/atom">10.1000/test.1</arxiv:doi>
    <link href="http://arxiv.org/abs/2602.01234v1" rel="alternate" type="text/html"/>
    <link title="pdf" href="http://arxiv.org/pdf/2602.01234v1" rel="related" type="application/pdf"/>
    <category term="cs.SE" scheme="http://arxiv.org/schemas/atom"/>
    <category term="cs.CL" scheme="http://arxiv.org/schemas/atom"/>
  </entry>
</feed>`;

  it('converts an entry into a paper record', async () => {
    const papers = await parseArxivFeed(fullEntry, NOW);

    expect(papers).toEqual([
      {
        id: 'arxiv:2602.01234v1',
        title: 'Repo-level code repair',
        authors: ['Ada Lovelace', 'Alan Turing'],
        abstract: 'We evaluate agents on SWE-bench.',
        url: 'http://arxiv.org/abs/2602.01234v1',
        publishedAt: '2026-02-20T10:00:00.000Z',
        source: 'arxiv',
        categories: ['cs.SE', 'cs.CL'],
        doi: '10.1000/test.1',
      },
    ]);
  });

  it('falls back to the reference date when published is missing', async () => {
    const papers = await parseArxivFeed(atomFeed([{ id: '2602.00001v1' }]), NOW);

    expect(papers[0]?.publishedAt).toBe('2026-03-01T00:00:00.000Z');
    expect(papers[0]?.doi).toBeUndefined();
  });

  it('returns an empty list for a feed without entries', async () => {
    await expect(parseArxivFeed(atomFeed([]), NOW)).resolves.toEqual([]);
  });

  it('rejects malformed XML', async () => {
    await expect(parseArxivFeed('<feed><entry></feed>', NOW)).rejects.toThrow(
      /^Invalid arXiv response XML/
    );
  });

  it('rejects documents that are not Atom feeds', async () => {
    await expect(parseArxivFeed('<html><body>down</body></html>', NOW)).rejects.toThrow(
      /^Unexpected arXiv response shape/
    );
  });
});

describe('arxivIdFromUrl', () => {
  it('returns the last path segment', () => {
    expect(arxivIdFromUrl('http://arxiv.org/abs/2401.00001v2')).toBe('2401.00001v2');
    expect(arxivIdFromUrl('http://arxiv.org/abs/2401.00001v2/')).toBe('2401.00001v2');
  });
});

// ============================================================================
// Query Helpers
// ============================================================================

describe('buildSearchQuery', () => {
  it('joins categories with OR', () => {
    expect(buildSearchQuery(['cs.CL', 'cs.AI'])).toBe('cat:cs.CL OR cat:cs.AI');
  });
});

describe('computeCutoff', () => {
  it('uses 30.5-day months truncated to whole days', () => {
    expect(computeCutoff(NOW, 1).toISOString()).toBe('2026-01-30T00:00:00.000Z');
    expect(computeCutoff(NOW, 6).toISOString()).toBe('2025-08-30T00:00:00.000Z');
  });
});

describe('isRetryableError', () => {
  it('follows the API error flag', () => {
    expect(isRetryableError(new ArxivApiError('busy', 503, true))).toBe(true);
    expect(isRetryableError(new ArxivApiError('bad', 400, false))).toBe(false);
  });

  it('treats network failures as retryable', () => {
    expect(isRetryableError(new TypeError('fetch failed'))).toBe(true);
    expect(isRetryableError(new Error('boom'))).toBe(false);
    expect(isRetryableError('timeout')).toBe(false);
  });
});

// ============================================================================
// ArxivClient
// ============================================================================

describe('ArxivClient.fetchRecent', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    global.fetch = mockFetch as unknown as typeof fetch;
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  it('sends a newest-first category query', async () => {
    servePages([]);
    const { client } = createClient();

    await client.fetchRecent({ categories: ['cs.SE', 'cs.CL'], pageSize: 50 });

    const params = requestedParams(0);
    expect(params.get('search_query')).toBe('cat:cs.SE OR cat:cs.CL');
    expect(params.get('start')).toBe('0');
    expect(params.get('max_results')).toBe('50');
    expect(params.get('sortBy')).toBe('submittedDate');
    expect(params.get('sortOrder')).toBe('descending');
  });

  it('stops at the first paper older than the cutoff', async () => {
    servePages([
      [
        { id: 'a', published: '2026-02-20T00:00:00Z' },
        { id: 'b', published: '2026-02-01T00:00:00Z' },
        { id: 'c', published: '2026-01-29T00:00:00Z' },
        { id: 'd', published: '2026-02-25T00:00:00Z' },
      ],
    ]);
    const { client, sleep } = createClient();

    const papers = await client.fetchRecent({ categories: ['cs.SE'], months: 1, pageSize: 4 });

    expect(papers.map((p) => p.id)).toEqual(['arxiv:a', 'arxiv:b']);
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('pages until an empty page with a polite delay between requests', async () => {
    servePages([
      [
        { id: 'a', published: '2026-02-20T00:00:00Z' },
        { id: 'b', published: '2026-02-19T00:00:00Z' },
      ],
      [{ id: 'c', published: '2026-02-18T00:00:00Z' }],
    ]);
    const { client, sleep } = createClient();

    const papers = await client.fetchRecent({
      categories: ['cs.SE'],
      pageSize: 2,
      politeDelayMs: 10,
    });

    expect(papers.map((p) => p.id)).toEqual(['arxiv:a', 'arxiv:b', 'arxiv:c']);
    expect(mockFetch).toHaveBeenCalledTimes(3);
    expect([0, 1, 2].map((i) => requestedParams(i).get('start'))).toEqual(['0', '2', '4']);
    expect(sleep.mock.calls).toEqual([[10], [10]]);
  });

  it('stops once maxTotal papers were collected', async () => {
    const recent = (id: string): EntryFixture => ({ id, published: '2026-02-20T00:00:00Z' });
    servePages([[recent('a'), recent('b')], [recent('c'), recent('d')], [recent('e')]]);
    const { client, sleep } = createClient();
    const onPage = jest.fn();

    const papers = await client.fetchRecent({
      categories: ['cs.SE'],
      pageSize: 2,
      maxTotal: 3,
      politeDelayMs: 10,
      onPage,
    });

    expect(papers.map((p) => p.id)).toEqual(['arxiv:a', 'arxiv:b', 'arxiv:c']);
    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(onPage.mock.calls).toEqual([[{ start: 0, fetched: 2 }], [{ start: 2, fetched: 3 }]]);
  });

  it('retries retryable failures with exponential backoff', async () => {
    mockFetch
      .mockResolvedValueOnce(new Response('', { status: 503 }))
      .mockResolvedValueOnce(new Response(atomFeed([]), { status: 200 }));
    const { client, sleep } = createClient();

    await expect(client.fetchRecent({ categories: ['cs.SE'] })).resolves.toEqual([]);

    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls).toEqual([[1000]]);
  });

  it('gives up after maxRetries', async () => {
    mockFetch.mockImplementation(async () => new Response('', { status: 429 }));
    const { client, sleep } = createClient(2);

    const error = await client.fetchRecent({ categories: ['cs.SE'] }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ArxivApiError);
    expect(error).toMatchObject({ statusCode: 429, isRetryable: true });
    expect(mockFetch).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it('does not retry client errors', async () => {
    mockFetch.mockImplementation(async () => new Response('', { status: 400 }));
    const { client, sleep } = createClient();

    await expect(client.fetchRecent({ categories: ['cs.SE'] })).rejects.toThrow(
      'arXiv API error (400): request failed'
    );
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('reports timeouts as retryable 408 errors', async () => {
    mockFetch.mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            const abort = new Error('aborted');
            abort.name = 'AbortError';
            reject(abort);
          });
        })
    );
    const client = new ArxivClient({ apiUrl: API_URL, timeoutMs: 5, maxRetries: 0, now: () => NOW });

    await expect(client.fetchRecent({ categories: ['cs.SE'] })).rejects.toMatchObject({
      name: 'ArxivApiError',
      statusCode: 408,
      isRetryable: true,
    });
  });
});
