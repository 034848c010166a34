/**
 * Schema Exports
 *
 * @module schemas
 */

export {
  PaperSchema,
  PitchSchema,
  PrimaryContactSchema,
  ScoredPaperSchema,
  type Paper,
  type PaperInput,
  type PrimaryContact,
  type ScoredPaper,
  parsePapers,
} from './paper.js';
