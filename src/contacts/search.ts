/**
 * Profile Search Links
 *
 * Builds search-engine links for finding a contact's public profile.
 * Links are unverified suggestions.
 *
 * @module contacts/search
 */

/**
 * Disclaimer shown next to generated links.
 */
export const SEARCH_LINK_DISCLAIMER =
  'Auto-generated search link (not verified). Please confirm the correct profile manually.';

const GOOGLE_SEARCH_URL = 'https://www.google.com/search';
const DUCKDUCKGO_SEARCH_URL = 'https://duckduckgo.com/';

/**
 * Build a profile search query for a person.
 *
 * @param name - Person name
 * @param affiliation - Optional affiliation to narrow the search
 * @returns Search query, or empty string when no name is given
 *
 * @example
 * ```typescript
 * buildProfileSearchQuery('Ada Lovelace') // '"Ada Lovelace" site:linkedin.com/in'
 * ```
 */
export function buildProfileSearchQuery(name: string, affiliation = ''): string {
  const person = name.trim();
  if (!person) {
    return '';
  }

  const org = affiliation.trim();
  return org ? `"${person}" "${org}" site:linkedin.com/in` : `"${person}" site:linkedin.com/in`;
}

/**
 * Append a form-encoded `q` parameter to a search URL.
 */
function searchUrl(base: string, query: string): string {
  if (!query) {
    return '';
  }
  return `${base}?${new URLSearchParams({ q: query }).toString()}`;
}

/**
 * Build a Google search URL for a query.
 *
 * @param query - Search query
 * @returns URL, or empty string for an empty query
 */
export function buildGoogleSearchUrl(query: string): string {
  return searchUrl(GOOGLE_SEARCH_URL, query);
}

/**
 * Build a DuckDuckGo search URL for a query.
 *
 * @param query - Search query
 * @returns URL, or empty string for an empty query
 */
export function buildDuckDuckGoSearchUrl(query: string): string {
  return searchUrl(DUCKDUCKGO_SEARCH_URL, query);
}
