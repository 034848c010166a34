/**
 * Fit Rule Tables
 *
 * Fixed, ordered rule groups evaluated by the fit scorer.
 * Table order is significant: it decides tag order and reason order.
 *
 * @module scoring/rules
 */

// ============================================================================
// Types
// ============================================================================

/**
 * A group of patterns that fires at most once per document.
 */
export interface RuleGroup {
  /** Tag appended when the group fires */
  readonly tag: string;
  /** Points added to the score (negative for penalties) */
  readonly points: number;
  /** Human-readable reason recorded when the group fires */
  readonly reason: string;
  /** Any-of semantics over normalized text */
  readonly patterns: readonly RegExp[];
}

/**
 * A positive group with its policy flags.
 */
export interface PositiveRuleGroup extends RuleGroup {
  /** Firing softens every negative penalty */
  readonly core: boolean;
  /** Firing lifts the score ceiling */
  readonly gate: boolean;
}

// ============================================================================
// Constants
// ============================================================================

/**
 * Benchmark contribution cap.
 */
export const BENCHMARK_SCORE_CAP = 60;

/**
 * Number of strongest benchmarks that count towards the score and the reason.
 */
export const BENCHMARK_TOP_N = 3;

/**
 * Score ceiling when neither a benchmark nor a gate group fired.
 */
export const GATE_CEILING = 20;

/**
 * Output truncation limits.
 */
export const FIT_LIMITS = {
  tags: 8,
  reasons: 3,
  benchmarks: 10,
} as const;

/**
 * Reason used when nothing positive fired.
 */
export const FALLBACK_REASON = 'Low direct relevance signals found; needs manual review.';

/**
 * Tag added when any benchmark is recognized.
 */
export const BENCHMARKS_TAG = 'benchmarks';

// ============================================================================
// Positive Groups
// ============================================================================

/**
 * Positive rule groups in evaluation order.
 */
export const POSITIVE_RULES: readonly PositiveRuleGroup[] = [
  {
    tag: 'core_code',
    points: 35,
    core: true,
    gate: true,
    reason: 'Contains code/execution/test/verdict-like signals (compile/runtime/tests/errors).',
    patterns: [
      /\bprogram synthesis\b/,
      /\bcode generation\b/,
      /\bcode repair\b/,
      /\bprogram repair\b/,
      /\bbug[- ]fix(ing)?\b/,
      /\bpatch\b/,
      /\bdiff\b/,
      /\bsource code\b/,
      /\bcompiler\b/,
      /\bcompile(r|d|s)?\b/,
      /\bruntime\b/,
      /\bexecution traces?\b/,
      /\bunit tests?\b/,
      /\btest cases?\b/,
      /\bfailing tests?\b/,
      /\bwrong answer\b/,
      /\bruntime error\b/,
      /\btime limit\b/,
      /\bmemory limit\b/,
      /\bonline judge\b/,
      /\bcompetitive programming\b/,
    ],
  },
  {
    tag: 'repo_se',
    points: 25,
    core: false,
    gate: true,
    reason: 'Mentions repository/PR/CI/tests signals (similar to repo-level coding tasks).',
    patterns: [
      /\bgit(hub)?\b/,
      /\brepository\b/,
      /\brepo[- ]level\b/,
      /\bpull requests?\b/,
      /\bissues?\b/,
      /\bcommits?\b/,
      /\bci\b/,
      /\bcontinuous integration\b/,
      /\bbuild\b/,
      /\btest suite\b/,
      /\bregression\b/,
      /\bstatic analysis\b/,
      /\blint(ing)?\b/,
    ],
  },
  {
    tag: 'verification',
    points: 10,
    core: false,
    gate: false,
    reason: 'Correctness/verification angle (formal methods, type systems, soundness).',
    patterns: [
      /\bverification\b/,
      /\bformal\b/,
      /\bcorrectness\b/,
      /\btype system\b/,
      /\bsoundness\b/,
    ],
  },
  {
    tag: 'agents_tools',
    points: 8,
    core: false,
    gate: false,
    reason: 'Agentic or tool-use setting (agents, function calling, code interpreter).',
    patterns: [
      /\btool use\b/,
      /\bfunction calling\b/,
      /\bagents?\b/,
      /\bweb browsing\b/,
      /\bcode interpreter\b/,
    ],
  },
  {
    tag: 'multilang',
    points: 5,
    core: false,
    gate: false,
    reason: 'Mentions specific programming languages (multi-language angle).',
    patterns: [
      /\bpython\b/,
      /\bjava\b/,
      /\brust\b/,
      /\bgo\b/,
      /\bjavascript\b/,
      // \b cannot follow '+' or '#'
      /(?<![\w+])c\+\+(?![\w+])/,
      /(?<!\w)c#(?!\w)/,
    ],
  },
];

// ============================================================================
// Negative Groups
// ============================================================================

/**
 * Off-domain penalty groups in evaluation order.
 */
export const NEGATIVE_RULES: readonly RuleGroup[] = [
  {
    tag: 'offdomain',
    points: -25,
    reason: 'Off-domain signals (biosignals/clinical/climate).',
    patterns: [
      /\becg\b/,
      /\beeg\b/,
      /\bppg\b/,
      /\bclinical\b/,
      /\bclimate\b/,
      /\bprecipitation\b/,
    ],
  },
  {
    tag: 'offdomain',
    points: -15,
    reason: 'Off-domain signals (robotics/UAV/manipulation).',
    patterns: [
      /\buav\b/,
      /\bairspace\b/,
      /\bpreflight\b/,
      /\bgrasp(ing)?\b/,
      /\bmanipulation\b/,
    ],
  },
];

/**
 * Check whether any pattern matches the normalized text.
 *
 * @param text - Normalized text
 * @param patterns - Patterns to test
 * @returns True if at least one pattern matches
 */
export function matchesAny(text: string, patterns: readonly RegExp[]): boolean {
  return patterns.some((pattern) => pattern.test(text));
}
