/**
 * Benchmark Extraction
 *
 * Detects known code and evaluation benchmarks in normalized text.
 * Each canonical benchmark carries a fixed weight that feeds the fit score.
 *
 * @module scoring/benchmarks
 */

// ============================================================================
// Types
// ============================================================================

/**
 * A benchmark recognized in the text.
 */
export interface BenchmarkHit {
  /** Canonical display name */
  readonly name: string;
  /** Scoring weight (positive integer) */
  readonly weight: number;
  /** Up to 30 characters either side of the match, for diagnostics only */
  readonly evidence: string;
}

/**
 * A row of the benchmark table.
 */
export interface BenchmarkDefinition {
  readonly name: string;
  readonly weight: number;
  /** Tried in order; the first match wins */
  readonly patterns: readonly RegExp[];
}

// ============================================================================
// Constants
// ============================================================================

/**
 * Characters of context captured on each side of a match.
 */
export const EVIDENCE_RADIUS = 30;

/**
 * Known benchmarks, strongest code benchmarks first.
 *
 * Declaration order is the tie-break order for equal weights.
 * Patterns must never use the `g` or `y` flag: `exec` would then keep
 * `lastIndex` between calls on these shared instances.
 */
export const BENCHMARKS: readonly BenchmarkDefinition[] = [
  // Code / software engineering
  { name: 'SWE-bench', weight: 45, patterns: [/\bswe[- ]bench\b/, /\bswebench\b/] },
  { name: 'HumanEval', weight: 40, patterns: [/\bhuman[- ]?eval\b/] },
  { name: 'MBPP', weight: 35, patterns: [/\bmbpp\b/] },
  { name: 'Codeforces', weight: 35, patterns: [/\bcodeforces\b/] },
  { name: 'LeetCode', weight: 25, patterns: [/\bleet ?code\b/] },
  { name: 'APPS', weight: 25, patterns: [/\bapps\b( dataset)?/] },
  { name: 'DS-1000', weight: 25, patterns: [/\bds[- ]?1000\b/] },
  { name: 'EvalPlus', weight: 20, patterns: [/\bevalplus\b/, /\beval\+/] },
  { name: 'LiveCodeBench', weight: 30, patterns: [/\blivecodebench\b/, /\blive code bench\b/] },
  { name: 'CodeContests', weight: 25, patterns: [/\bcodecontests\b/, /\bcode contests\b/] },
  { name: 'CruxEval', weight: 20, patterns: [/\bcruxeval\b/] },
  { name: 'RepoBench', weight: 25, patterns: [/\brepobench\b/, /\brepo[- ]bench\b/] },
  { name: 'CodeSearchNet', weight: 15, patterns: [/\bcodesearchnet\b/, /\bcode search net\b/] },

  // General evaluation suites
  { name: 'MMLU', weight: 15, patterns: [/\bmmlu\b/] },
  { name: 'MMMU', weight: 15, patterns: [/\bmmmu\b/] },
  { name: 'GSM8K', weight: 10, patterns: [/\bgsm8k\b/] },
  { name: 'ARC', weight: 8, patterns: [/\barc\b(?![- ]?length)/] },
  { name: 'HellaSwag', weight: 8, patterns: [/\bhellaswag\b/] },
  { name: 'TruthfulQA', weight: 8, patterns: [/\btruthfulqa\b/] },
  { name: 'Big-Bench', weight: 8, patterns: [/\bbig[- ]bench\b/, /\bbbh\b/] },
];

// ============================================================================
// Extraction
// ============================================================================

/**
 * Find the first pattern of a definition that matches, in declared order.
 */
function firstMatch(text: string, patterns: readonly RegExp[]): RegExpExecArray | null {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match) {
      return match;
    }
  }
  return null;
}

/**
 * Cut the evidence snippet around a match, clipped to the text bounds.
 */
function evidenceAround(text: string, match: RegExpExecArray): string {
  const start = Math.max(0, match.index - EVIDENCE_RADIUS);
  const end = Math.min(text.length, match.index + match[0].length + EVIDENCE_RADIUS);
  return text.slice(start, end);
}

/**
 * Extract benchmark mentions from normalized text.
 *
 * Returns at most one hit per canonical name, sorted by weight
 * descending. Equal weights keep table order (`Array.prototype.sort`
 * is stable).
 *
 * @param text - Normalized text (see {@link normalizeText})
 * @returns Benchmark hits, strongest first
 *
 * @example
 * ```typescript
 * extractBenchmarks('we evaluate on humaneval and swe-bench verified')
 *   .map((h) => h.name);
 * // ['SWE-bench', 'HumanEval']
 * ```
 */
export function extractBenchmarks(text: string): BenchmarkHit[] {
  const hits: BenchmarkHit[] = [];

  for (const benchmark of BENCHMARKS) {
    const match = firstMatch(text, benchmark.patterns);
    if (match) {
      hits.push({
        name: benchmark.name,
        weight: benchmark.weight,
        evidence: evidenceAround(text, match),
      });
    }
  }

  return hits.sort((a, b) => b.weight - a.weight);
}
