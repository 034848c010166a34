/**
 * Tests for Benchmark Extraction
 *
 * @module scoring/benchmarks.test
 */

import { describe, it, expect } from '@jest/globals';
import { BENCHMARKS, EVIDENCE_RADIUS, extractBenchmarks } from './benchmarks.js';
import { normalizeText } from './normalize.js';

describe('BENCHMARKS table', () => {
  it('has unique canonical names', () => {
    const names = BENCHMARKS.map((b) => b.name);
    expect(new Set(names).size).toBe(names.length);
  });

  it('has positive integer weights', () => {
    for (const benchmark of BENCHMARKS) {
      expect(Number.isInteger(benchmark.weight)).toBe(true);
      expect(benchmark.weight).toBeGreaterThan(0);
    }
  });

  it('uses no stateful regex flags', () => {
    for (const benchmark of BENCHMARKS) {
      for (const pattern of benchmark.patterns) {
        expect(pattern.global).toBe(false);
        expect(pattern.sticky).toBe(false);
      }
    }
  });
});

describe('extractBenchmarks', () => {
  it('returns an empty list when nothing matches', () => {
    expect(extractBenchmarks('')).toEqual([]);
    expect(extractBenchmarks('a study of protein folding')).toEqual([]);
  });

  it('sorts hits by weight descending', () => {
    const hits = extractBenchmarks('we report gsm8k and livecodebench results');
    expect(hits.map((h) => [h.name, h.weight])).toEqual([
      ['LiveCodeBench', 30],
      ['GSM8K', 10],
    ]);
  });

  it('breaks weight ties by table order', () => {
    const hits = extractBenchmarks('results on codeforces and mbpp');
    expect(hits.map((h) => h.name)).toEqual(['MBPP', 'Codeforces']);
  });

  it('reports one hit per canonical name', () => {
    const hits = extractBenchmarks('swebench (also written swe-bench or swe bench)');
    expect(hits).toHaveLength(1);
    expect(hits[0].name).toBe('SWE-bench');
  });

  it('takes evidence from the first pattern that matches', () => {
    const text = `${'x'.repeat(40)} eval+ ${'y'.repeat(10)} evalplus`;
    const [hit] = extractBenchmarks(text);
    expect(hit.name).toBe('EvalPlus');
    // first pattern (evalplus) wins over the earlier eval+ occurrence
    expect(hit.evidence).toBe(`${'x'.repeat(12)} eval+ ${'y'.repeat(10)} evalplus`);
  });

  it('captures context on both sides of the match', () => {
    const text = `${'a'.repeat(40)} mbpp ${'b'.repeat(40)}`;
    const [hit] = extractBenchmarks(text);
    expect(hit.evidence).toBe(`${'a'.repeat(29)} mbpp ${'b'.repeat(29)}`);
    expect(hit.evidence).toHaveLength(EVIDENCE_RADIUS * 2 + 'mbpp'.length);
  });

  it('clips evidence to the text bounds', () => {
    const [hit] = extractBenchmarks('mbpp rocks');
    expect(hit.evidence).toBe('mbpp rocks');
  });

  it('matches surface spelling variants', () => {
    expect(extractBenchmarks('human-eval')[0].name).toBe('HumanEval');
    expect(extractBenchmarks('human eval')[0].name).toBe('HumanEval');
    expect(extractBenchmarks('leet code')[0].name).toBe('LeetCode');
    expect(extractBenchmarks('ds 1000')[0].name).toBe('DS-1000');
    expect(extractBenchmarks('bbh')[0].name).toBe('Big-Bench');
  });

  it('does not treat arc-length as the ARC benchmark', () => {
    expect(extractBenchmarks('arc-length parametrization')).toEqual([]);
    expect(extractBenchmarks('arc length')).toEqual([]);
    expect(extractBenchmarks('the arc challenge set')[0].name).toBe('ARC');
  });

  it('respects word boundaries', () => {
    expect(extractBenchmarks('research on searching')).toEqual([]);
    expect(extractBenchmarks('mmluaux')).toEqual([]);
  });

  it('expects normalized input', () => {
    const text = normalizeText('Evaluated on  HumanEval\nand MBPP');
    expect(extractBenchmarks(text).map((h) => h.name)).toEqual(['HumanEval', 'MBPP']);
  });
});
