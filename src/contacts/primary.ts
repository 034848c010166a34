/**
 * Primary Contact Selection
 *
 * Picks the author most likely to answer an outreach email.
 *
 * @module contacts/primary
 */

import type { PrimaryContact } from '../schemas/paper.js';

/**
 * Pick the primary contact from an author list.
 *
 * - 1 author: that author
 * - 2 authors: the first author
 * - 3+ authors: the last author (often the PI), first author named as alternate
 *
 * @param authors - Author names in paper order
 * @returns Contact name (empty if none) and a hint explaining the choice
 */
export function pickPrimaryContact(authors: readonly string[]): PrimaryContact {
  const names = authors.map((author) => author.trim()).filter((author) => author.length > 0);

  if (names.length === 0) {
    return { name: '', hint: 'no authors listed' };
  }
  if (names.length === 1) {
    return { name: names[0], hint: 'single-author paper' };
  }
  if (names.length === 2) {
    return { name: names[0], hint: '2 authors: using first author as primary' };
  }

  return {
    name: names[names.length - 1],
    hint: `3+ authors: using last author (often PI). Alternate: first author = ${names[0]}`,
  };
}
