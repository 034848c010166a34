/**
 * Contacts Module Exports
 *
 * @module contacts
 */

export { pickPrimaryContact } from './primary.js';
export {
  SEARCH_LINK_DISCLAIMER,
  buildProfileSearchQuery,
  buildGoogleSearchUrl,
  buildDuckDuckGoSearchUrl,
} from './search.js';
