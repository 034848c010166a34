/**
 * Paper Schemas - Input records and scored output records
 *
 * Input records come from a paper source (arXiv API or a JSON file). Scored
 * records add the fit fields, the pitch and the primary contact.
 */

import { z } from 'zod';

// ============================================
// Paper Schema
// ============================================

/**
 * A paper record as delivered by a source.
 * Optional list and text fields default to empty values.
 */
export const PaperSchema = z.object({
  /** Stable identifier (`arxiv:<id>` or `hash:<hex>`) */
  id: z.string().min(1),
  title: z.string(),
  authors: z.array(z.string()).default([]),
  abstract: z.string().default(''),
  url: z.string().url(),
  /** Publication timestamp (ISO8601) */
  publishedAt: z.string().datetime({ offset: true, message: 'Must be a valid ISO8601 timestamp' }),
  source: z.string().default('arxiv'),
  categories: z.array(z.string()).default([]),
  doi: z.string().optional(),
});

export type Paper = z.infer<typeof PaperSchema>;

/**
 * Input shape before defaults are applied.
 */
export type PaperInput = z.input<typeof PaperSchema>;

// ============================================
// Scored Paper Schema
// ============================================

/**
 * Selected pitch for a paper.
 */
export const PitchSchema = z.object({
  oneLine: z.string(),
  bullets: z.array(z.string()).max(3),
});

/**
 * Suggested person to contact about a paper.
 */
export const PrimaryContactSchema = z.object({
  name: z.string(),
  hint: z.string(),
});

export type PrimaryContact = z.infer<typeof PrimaryContactSchema>;

/**
 * A paper with its fit fields attached.
 */
export const ScoredPaperSchema = PaperSchema.extend({
  fitScore: z.number().int().min(0).max(100),
  fitTags: z.array(z.string()).max(8),
  fitReasons: z.array(z.string()).min(1).max(3),
  benchmarks: z.array(z.string()).max(10),
  pitch: PitchSchema,
  primaryContact: PrimaryContactSchema,
  /** Unverified profile search link for the primary contact */
  contactSearchUrl: z.string(),
});

export type ScoredPaper = z.infer<typeof ScoredPaperSchema>;

// ============================================
// Parsing
// ============================================

/**
 * Format zod issues as `path: message` lines.
 */
function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate a list of raw paper records.
 *
 * @param raw - Parsed JSON (expected: array of paper records)
 * @returns Validated papers with defaults applied
 * @throws Error listing every invalid record and its issues
 */
export function parsePapers(raw: unknown): Paper[] {
  if (!Array.isArray(raw)) {
    throw new Error('Expected a JSON array of paper records');
  }

  const papers: Paper[] = [];
  const problems: string[] = [];

  raw.forEach((record: unknown, index) => {
    const result = PaperSchema.safeParse(record);
    if (result.success) {
      papers.push(result.data);
    } else {
      for (const line of formatIssues(result.error)) {
        problems.push(`  [${index}] ${line}`);
      }
    }
  });

  if (problems.length > 0) {
    throw new Error(`Invalid paper records:\n${problems.join('\n')}`);
  }

  return papers;
}
