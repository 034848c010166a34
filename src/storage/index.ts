/**
 * Storage Layer
 *
 * Atomic file operations and output path resolution.
 *
 * @module storage
 */

export {
  FileNotFoundError,
  atomicWriteText,
  atomicWriteJson,
  readJson,
  isNotFound,
} from './atomic.js';

export { type OutputFormat, getOutDir, formatDateStamp, getResultsPath } from './paths.js';
