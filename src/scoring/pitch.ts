/**
 * Pitch Builder
 *
 * Turns fit tags and benchmark names into a canned one-line pitch and up to
 * three supporting bullets. Pure selection: no new signal detection.
 *
 * @module scoring/pitch
 */

// ============================================================================
// Types
// ============================================================================

/**
 * One-line narrative plus supporting bullets.
 */
export interface Pitch {
  readonly oneLine: string;
  readonly bullets: readonly string[];
}

/**
 * Sets a condition is tested against.
 */
interface PitchSignals {
  readonly tags: ReadonlySet<string>;
  readonly benchmarks: ReadonlySet<string>;
}

/**
 * A condition paired with the sentence it selects.
 */
interface PitchRule {
  readonly when: (signals: PitchSignals) => boolean;
  readonly text: string;
}

// ============================================================================
// Constants
// ============================================================================

/**
 * Dataset name used in the canned sentences.
 */
export const DATASET_NAME = 'SPOJ';

/**
 * Maximum number of bullets returned.
 */
export const MAX_PITCH_BULLETS = 3;

const REPO_LEVEL_BENCHMARKS = ['SWE-bench', 'RepoBench'] as const;
const CODEGEN_BENCHMARKS = ['HumanEval', 'MBPP', 'EvalPlus'] as const;
const COMPETITIVE_BENCHMARKS = ['APPS', 'Codeforces', 'CodeContests'] as const;

function hasAny(set: ReadonlySet<string>, values: readonly string[]): boolean {
  return values.some((value) => set.has(value));
}

const repoLevel = (s: PitchSignals): boolean => hasAny(s.benchmarks, REPO_LEVEL_BENCHMARKS);
const codegen = (s: PitchSignals): boolean => hasAny(s.benchmarks, CODEGEN_BENCHMARKS);
const competitive = (s: PitchSignals): boolean => hasAny(s.benchmarks, COMPETITIVE_BENCHMARKS);

/**
 * Bullet rules in priority order. Every rule that holds contributes.
 */
const BULLET_RULES: readonly PitchRule[] = [
  {
    when: repoLevel,
    text: `Repo-level code editing + real-world patching signals match ${DATASET_NAME}-style iterative attempts + verdicts.`,
  },
  {
    when: codegen,
    text: `Strong code-gen evaluation focus: ${DATASET_NAME} adds scale + multi-language + harder long-tail problems.`,
  },
  {
    when: competitive,
    text: `Competitive-programming / algorithmic eval: direct overlap with the ${DATASET_NAME} problem distribution.`,
  },
  {
    when: (s) => s.tags.has('verification'),
    text: `Correctness/verification angle: ${DATASET_NAME} provides accepted vs failing traces and error modes.`,
  },
  {
    when: (s) => s.tags.has('core_code'),
    text: `Execution/test/verdict signals: ${DATASET_NAME} provides structured feedback labels at massive scale.`,
  },
  {
    when: (s) => s.tags.has('agents_tools'),
    text: `Agentic coding/tool use: ${DATASET_NAME} supports verifiable tool-loop training via judge feedback.`,
  },
];

/**
 * One-line rules in priority order. The first that holds wins.
 */
const ONE_LINE_RULES: readonly PitchRule[] = [
  {
    when: repoLevel,
    text: `${DATASET_NAME} can complement your repo-level coding evaluations with large-scale judged submissions (multi-language, verdict-labeled, iterative attempts).`,
  },
  {
    when: codegen,
    text: `${DATASET_NAME} can extend code-generation evaluation/training with 35k algorithmic tasks and 30M verdict-labeled submissions across languages.`,
  },
  {
    when: competitive,
    text: `${DATASET_NAME} is a direct fit: competitive-programming style problems + millions of submissions with judge verdicts and error modes.`,
  },
  {
    when: (s) => s.tags.has('core_code') || s.tags.has('verification'),
    text: `${DATASET_NAME} provides scalable, verifiable training/eval data: judged code submissions with timestamps, languages, and failure modes.`,
  },
];

/**
 * One-liner used when no rule holds.
 */
export const DEFAULT_ONE_LINE = `Potential ${DATASET_NAME} fit: large-scale code+verdict data may complement your evaluation/training pipeline.`;

// ============================================================================
// Main Function
// ============================================================================

/**
 * Build the pitch for a scored paper.
 *
 * @param tags - Fit tags
 * @param benchmarks - Canonical benchmark names
 * @returns One-liner and at most {@link MAX_PITCH_BULLETS} bullets
 *
 * @example
 * ```typescript
 * const pitch = buildPitch(['benchmarks', 'core_code'], ['HumanEval']);
 * // pitch.bullets.length === 2 (code-gen, then execution/verdict)
 * ```
 */
export function buildPitch(tags: readonly string[], benchmarks: readonly string[]): Pitch {
  const signals: PitchSignals = {
    tags: new Set(tags),
    benchmarks: new Set(benchmarks),
  };

  const bullets = BULLET_RULES.filter((rule) => rule.when(signals))
    .map((rule) => rule.text)
    .slice(0, MAX_PITCH_BULLETS);

  const oneLine = ONE_LINE_RULES.find((rule) => rule.when(signals))?.text ?? DEFAULT_ONE_LINE;

  return { oneLine, bullets };
}
