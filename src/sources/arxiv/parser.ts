/**
 * arXiv Atom Feed Parser
 *
 * Converts arXiv export API responses (Atom XML) into paper records.
 *
 * @module sources/arxiv/parser
 */

import { parseStringPromise } from 'xml2js';
import { z } from 'zod';
import type { Paper } from '../../schemas/paper.js';

// ============================================================================
// Feed Shape
// ============================================================================

/**
 * xml2js text node: a plain string, or `{ _: text, $: attrs }` when the
 * element also carries attributes.
 */
const TextNodeSchema = z.union([
  z.string(),
  z.object({ _: z.string().optional() }).passthrough(),
]);

const TextListSchema = z.array(TextNodeSchema).optional();

const AttributesSchema = z.record(z.string()).optional();

const AtomEntrySchema = z
  .object({
    id: TextListSchema,
    title: TextListSchema,
    summary: TextListSchema,
    published: TextListSchema,
    author: z.array(z.object({ name: TextListSchema }).passthrough()).optional(),
    category: z.array(z.object({ $: AttributesSchema }).passthrough()).optional(),
    link: z.array(z.object({ $: AttributesSchema }).passthrough()).optional(),
    'arxiv:doi': TextListSchema,
  })
  .passthrough();

const AtomFeedSchema = z.object({
  feed: z
    .object({
      entry: z.array(AtomEntrySchema).optional(),
    })
    .passthrough(),
});

type AtomEntry = z.infer<typeof AtomEntrySchema>;
type TextList = z.infer<typeof TextListSchema>;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Read the first text value of an element list.
 */
function firstText(nodes: TextList): string {
  const node = nodes?.[0];
  if (node === undefined) {
    return '';
  }
  return typeof node === 'string' ? node : node._ ?? '';
}

/**
 * Collapse whitespace (titles and abstracts arrive hard-wrapped).
 */
function singleLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Extract the arXiv identifier from an entry id URL.
 *
 * @param rawId - e.g. `http://arxiv.org/abs/2401.00001v2`
 * @returns Last path segment, e.g. `2401.00001v2`
 */
export function arxivIdFromUrl(rawId: string): string {
  const segments = rawId.replace(/\/+$/, '').split('/');
  return segments[segments.length - 1] ?? rawId;
}

// ============================================================================
// Entry Conversion
// ============================================================================

/**
 * Convert one Atom entry into a paper record.
 *
 * @param entry - Parsed entry
 * @param now - Publication date used when the entry has none
 * @returns Paper, or null when the entry has no id
 */
export function entryToPaper(entry: AtomEntry, now: Date): Paper | null {
  const rawId = firstText(entry.id).trim();
  if (!rawId) {
    return null;
  }

  const alternate = entry.link?.find((link) => link.$?.['rel'] === 'alternate');
  const url = alternate?.$?.['href'] ?? rawId;

  const published = new Date(firstText(entry.published));
  const publishedAt = isNaN(published.getTime()) ? now : published;

  const authors = (entry.author ?? [])
    .map((author) => firstText(author.name).trim())
    .filter((name) => name.length > 0);

  const categories = (entry.category ?? [])
    .map((category) => category.$?.['term']?.trim() ?? '')
    .filter((term) => term.length > 0);

  const doi = firstText(entry['arxiv:doi']).trim();

  return {
    id: `arxiv:${arxivIdFromUrl(rawId)}`,
    title: singleLine(firstText(entry.title)),
    authors,
    abstract: singleLine(firstText(entry.summary)),
    url,
    publishedAt: publishedAt.toISOString(),
    source: 'arxiv',
    categories,
    ...(doi ? { doi } : {}),
  };
}

/**
 * Parse an arXiv Atom response.
 *
 * @param xml - Response body
 * @param now - Fallback publication date
 * @returns Papers in feed order
 * @throws Error if the body is not an Atom feed
 */
export async function parseArxivFeed(xml: string, now: Date = new Date()): Promise<Paper[]> {
  let raw: unknown;
  try {
    raw = await parseStringPromise(xml, { explicitArray: true, trim: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid arXiv response XML: ${message}`, { cause: error });
  }

  const result = AtomFeedSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Unexpected arXiv response shape: ${result.error.issues[0]?.message ?? 'unknown'}`);
  }

  const papers: Paper[] = [];
  for (const entry of result.data.feed.entry ?? []) {
    const paper = entryToPaper(entry, now);
    if (paper) {
      papers.push(paper);
    }
  }
  return papers;
}
