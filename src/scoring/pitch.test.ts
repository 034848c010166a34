/**
 * Tests for Pitch Builder
 *
 * @module scoring/pitch.test
 */

import { describe, it, expect } from '@jest/globals';
import { buildPitch, DEFAULT_ONE_LINE, MAX_PITCH_BULLETS } from './pitch.js';

describe('buildPitch', () => {
  it('uses the catch-all one-liner when nothing matches', () => {
    expect(buildPitch([], [])).toEqual({ oneLine: DEFAULT_ONE_LINE, bullets: [] });
  });

  it('leads with the repo-level angle for SWE-bench papers', () => {
    const pitch = buildPitch(['benchmarks', 'core_code', 'repo_se'], ['SWE-bench']);

    expect(pitch.oneLine).toMatch(/^SPOJ can complement your repo-level coding evaluations/);
    expect(pitch.bullets).toHaveLength(2);
    expect(pitch.bullets[0]).toMatch(/^Repo-level code editing/);
    expect(pitch.bullets[1]).toMatch(/^Execution\/test\/verdict signals/);
  });

  it('prefers code-gen over competitive programming for the one-liner', () => {
    const pitch = buildPitch(['benchmarks'], ['MBPP', 'Codeforces']);

    expect(pitch.oneLine).toMatch(/^SPOJ can extend code-generation evaluation/);
    expect(pitch.bullets).toHaveLength(2);
    expect(pitch.bullets[0]).toMatch(/^Strong code-gen evaluation focus/);
    expect(pitch.bullets[1]).toMatch(/^Competitive-programming/);
  });

  it('picks the competitive one-liner from contest benchmarks alone', () => {
    const pitch = buildPitch(['benchmarks'], ['CodeContests']);
    expect(pitch.oneLine).toMatch(/^SPOJ is a direct fit/);
  });

  it('falls through to tag-based one-liners', () => {
    expect(buildPitch(['verification'], []).oneLine).toMatch(/^SPOJ provides scalable/);
    expect(buildPitch(['core_code'], []).oneLine).toMatch(/^SPOJ provides scalable/);
    expect(buildPitch(['agents_tools'], []).oneLine).toBe(DEFAULT_ONE_LINE);
  });

  it('orders bullets by priority and truncates to three', () => {
    const pitch = buildPitch(
      ['verification', 'core_code', 'agents_tools'],
      ['SWE-bench', 'HumanEval', 'APPS']
    );

    expect(pitch.bullets).toHaveLength(MAX_PITCH_BULLETS);
    expect(pitch.bullets[0]).toMatch(/^Repo-level/);
    expect(pitch.bullets[1]).toMatch(/^Strong code-gen/);
    expect(pitch.bullets[2]).toMatch(/^Competitive-programming/);
  });

  it('emits the verification bullet before the execution bullet', () => {
    const pitch = buildPitch(['core_code', 'verification'], []);
    expect(pitch.bullets[0]).toMatch(/^Correctness\/verification angle/);
    expect(pitch.bullets[1]).toMatch(/^Execution\/test\/verdict signals/);
  });

  it('is deterministic', () => {
    const tags = ['core_code', 'agents_tools'];
    const benchmarks = ['RepoBench'];
    expect(buildPitch(tags, benchmarks)).toEqual(buildPitch(tags, benchmarks));
  });
});
