/**
 * Fit Scoring
 *
 * Scores how well a paper matches code + judged-submission data.
 *
 * Scores 0-100 built from:
 * - **Benchmarks** (0-60): sum of the three strongest benchmark weights, capped
 * - **Positive rule groups**: fixed points per group, each fires at most once
 * - **Off-domain penalties**: halved (toward zero) when a core code signal fired
 *
 * A gate caps the score at {@link GATE_CEILING} unless a benchmark or a
 * code/repository group fired. The result is a pure function of the text.
 *
 * @module scoring/fit
 */

import { extractBenchmarks, type BenchmarkHit } from './benchmarks.js';
import { normalizeDocument } from './normalize.js';
import {
  BENCHMARK_SCORE_CAP,
  BENCHMARK_TOP_N,
  BENCHMARKS_TAG,
  FALLBACK_REASON,
  FIT_LIMITS,
  GATE_CEILING,
  NEGATIVE_RULES,
  POSITIVE_RULES,
  matchesAny,
} from './rules.js';

// ============================================================================
// Types
// ============================================================================

/**
 * The only fields the scorer reads.
 */
export interface FitDocument {
  readonly title: string;
  readonly abstract: string;
}

/**
 * Output contract of the fit scorer.
 */
export interface FitResult {
  /** Integer in [0, 100] */
  readonly score: number;
  /** Unique, first-seen order, at most 8 */
  readonly tags: readonly string[];
  /** Between 1 and 3 */
  readonly reasons: readonly string[];
  /** Canonical names, strongest first, at most 10 */
  readonly benchmarks: readonly string[];
}

/**
 * Fit result plus the intermediate signals, for explaining a score.
 */
export interface FitExplanation extends FitResult {
  /** Every benchmark hit with evidence, strongest first */
  readonly benchmarkHits: readonly BenchmarkHit[];
  /** Score before gating and clamping */
  readonly rawScore: number;
  /** Whether the gate ceiling applied */
  readonly gated: boolean;
  /** Whether penalties were halved */
  readonly coreSignalPresent: boolean;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Clamp a score to the valid range [0, 100].
 */
function clampScore(score: number): number {
  return Math.max(0, Math.min(100, score));
}

/**
 * Deduplicate while keeping first-seen order.
 */
function uniqueInOrder(values: readonly string[]): string[] {
  return [...new Set(values)];
}

/**
 * Pick the reasons to report.
 *
 * Up to three distinct positive reasons in firing order. With none,
 * the first negative reason (if any) followed by the fallback sentence.
 *
 * @param positive - Positive reasons in firing order
 * @param negative - Negative reasons in firing order
 * @returns One to three reasons
 */
export function selectReasons(
  positive: readonly string[],
  negative: readonly string[]
): string[] {
  const reasons = uniqueInOrder(positive).slice(0, FIT_LIMITS.reasons);
  if (reasons.length > 0) {
    return reasons;
  }

  const firstNegative = negative[0];
  return firstNegative === undefined ? [FALLBACK_REASON] : [firstNegative, FALLBACK_REASON];
}

/**
 * Penalty applied by a negative group.
 * Halved toward zero (not floored) when a core signal is present.
 *
 * @param points - Negative group points
 * @param coreSignalPresent - Whether a core positive group fired
 * @returns Points to add to the score
 */
export function effectivePenalty(points: number, coreSignalPresent: boolean): number {
  return coreSignalPresent ? Math.trunc(points / 2) : points;
}

// ============================================================================
// Main Functions
// ============================================================================

/**
 * Score a document and keep the intermediate signals.
 *
 * @param document - Title and abstract
 * @returns Fit result with benchmark evidence and gate details
 */
export function explainFit(document: FitDocument): FitExplanation {
  const text = normalizeDocument(document.title, document.abstract);

  let score = 0;
  const tags: string[] = [];
  const positiveReasons: string[] = [];
  const negativeReasons: string[] = [];

  // 1) Benchmarks
  const benchmarkHits = extractBenchmarks(text);
  const topHits = benchmarkHits.slice(0, BENCHMARK_TOP_N);
  if (topHits.length > 0) {
    const benchmarkScore = topHits.reduce((sum, hit) => sum + hit.weight, 0);
    score += Math.min(BENCHMARK_SCORE_CAP, benchmarkScore);
    tags.push(BENCHMARKS_TAG);
    positiveReasons.push(`Mentions benchmarks: ${topHits.map((hit) => hit.name).join(', ')}.`);
  }

  // 2) Positive groups
  let coreSignalPresent = false;
  let gateSignalPresent = false;
  for (const group of POSITIVE_RULES) {
    if (!matchesAny(text, group.patterns)) {
      continue;
    }
    score += group.points;
    tags.push(group.tag);
    positiveReasons.push(group.reason);
    if (group.core) {
      coreSignalPresent = true;
    }
    if (group.gate) {
      gateSignalPresent = true;
    }
  }

  // 3) Off-domain penalties
  for (const group of NEGATIVE_RULES) {
    if (!matchesAny(text, group.patterns)) {
      continue;
    }
    score += effectivePenalty(group.points, coreSignalPresent);
    tags.push(group.tag);
    negativeReasons.push(group.reason);
  }

  const rawScore = score;

  // 4) Gate
  const gated = benchmarkHits.length === 0 && !gateSignalPresent;
  if (gated) {
    score = Math.min(score, GATE_CEILING);
  }

  return Object.freeze({
    score: clampScore(score),
    tags: Object.freeze(uniqueInOrder(tags).slice(0, FIT_LIMITS.tags)),
    reasons: Object.freeze(selectReasons(positiveReasons, negativeReasons)),
    benchmarks: Object.freeze(
      benchmarkHits.slice(0, FIT_LIMITS.benchmarks).map((hit) => hit.name)
    ),
    benchmarkHits: Object.freeze(benchmarkHits),
    rawScore,
    gated,
    coreSignalPresent,
  });
}

/**
 * Score how well a document fits code + judged-submission data.
 *
 * @param document - Title and abstract (empty strings allowed)
 * @returns Score, tags, reasons and benchmark names
 *
 * @example
 * ```typescript
 * const result = scoreFit({
 *   title: 'SWE-bench: Can Language Models Resolve Real-World GitHub Issues?',
 *   abstract: 'Models must generate a patch that makes failing unit tests pass.',
 * });
 * // result.score === 100
 * // result.tags: ['benchmarks', 'core_code', 'repo_se']
 * ```
 */
export function scoreFit(document: FitDocument): FitResult {
  const { score, tags, reasons, benchmarks } = explainFit(document);
  return Object.freeze({ score, tags, reasons, benchmarks });
}
