/**
 * Export Module
 *
 * Writes scored papers as JSON and CSV.
 *
 * @module export
 */

export { CSV_FIELDS, type CsvField, escapeCsvField, toCsvRecord, toCsv, exportPapersCsv } from './csv.js';
export { exportPapersJson } from './json.js';
export {
  RESULTS_FORMATS,
  type ResultsFormat,
  type WriteResultsOptions,
  formatsFor,
  writeResults,
} from './results.js';
