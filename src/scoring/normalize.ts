/**
 * Text Normalization
 *
 * Produces the single canonical form every scoring pattern runs against.
 *
 * @module scoring/normalize
 */

/**
 * Normalize text for pattern matching.
 * Lowercases, collapses whitespace runs to a single space and trims.
 *
 * Punctuation is preserved: several patterns depend on it
 * (`swe-bench`, `c++`, `eval+`).
 *
 * @param text - Raw text (may be empty)
 * @returns Normalized text
 *
 * @example
 * ```typescript
 * normalizeText("  SWE-bench:\n Real  GitHub Issues ") // "swe-bench: real github issues"
 * normalizeText("") // ""
 * ```
 */
export function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').toLowerCase().trim();
}

/**
 * Build the normalized text for a document from its title and abstract.
 *
 * @param title - Document title
 * @param abstract - Document abstract
 * @returns Normalized `title + " " + abstract`
 */
export function normalizeDocument(title: string, abstract: string): string {
  return normalizeText(`${title} ${abstract}`);
}
