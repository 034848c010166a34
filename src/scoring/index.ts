/**
 * Scoring Module Exports
 *
 * Central export point for fit scoring, benchmark extraction and pitches.
 *
 * @module scoring
 */

// Normalization
export { normalizeText, normalizeDocument } from './normalize.js';

// Benchmark extraction
export {
  BENCHMARKS,
  EVIDENCE_RADIUS,
  type BenchmarkHit,
  type BenchmarkDefinition,
  extractBenchmarks,
} from './benchmarks.js';

// Rule tables
export {
  BENCHMARK_SCORE_CAP,
  BENCHMARK_TOP_N,
  BENCHMARKS_TAG,
  FALLBACK_REASON,
  FIT_LIMITS,
  GATE_CEILING,
  NEGATIVE_RULES,
  POSITIVE_RULES,
  type RuleGroup,
  type PositiveRuleGroup,
  matchesAny,
} from './rules.js';

// Fit scoring
export {
  type FitDocument,
  type FitResult,
  type FitExplanation,
  scoreFit,
  explainFit,
  selectReasons,
  effectivePenalty,
} from './fit.js';

// Pitch
export {
  DATASET_NAME,
  DEFAULT_ONE_LINE,
  MAX_PITCH_BULLETS,
  type Pitch,
  buildPitch,
} from './pitch.js';
