import { describe, expect, test } from 'vitest';
import { entropy, idealCodeLength, redundancy, uniformCodeStats } from '../../src/entropy';
import { countSymbols, unigrams } from '../../src/frequency';

describe('entropy', () => {
  test('is zero for empty input', () => {
    expect(entropy(new Map())).toBe(0);
  });

  test('is zero for a single-symbol alphabet', () => {
    expect(entropy(new Map([['a', 7]]))).toBe(0);
    expect(entropy(countSymbols(unigrams('zzzz')))).toBe(0);
  });

  test('uniform alphabets give log2 of their size', () => {
    expect(entropy(new Map([['a', 1], ['b', 1]]))).toBeCloseTo(1, 12);
    expect(entropy(new Map([['a', 3], ['b', 3], ['c', 3], ['d', 3]]))).toBeCloseTo(2, 12);
  });

  test('skewed distribution', () => {
    expect(entropy(new Map([['a', 2], ['b', 1], ['c', 1]]))).toBeCloseTo(1.5, 12);
    expect(entropy(countSymbols(unigrams('abracadabra')))).toBeCloseTo(2.0403733936884962, 12);
  });

  test('is positive whenever two or more symbols occur', () => {
    const samples = ['ab', 'aaaaaaaaab', 'mississippi', 'the quick brown fox'];
    for (const text of samples) {
      expect(entropy(countSymbols(unigrams(text)))).toBeGreaterThan(0);
    }
  });
});

describe('idealCodeLength', () => {
  test('is log2 of the alphabet size', () => {
    expect(idealCodeLength(2)).toBe(1);
    expect(idealCodeLength(8)).toBe(3);
    expect(idealCodeLength(5)).toBeCloseTo(Math.log2(5), 12);
  });

  test('is zero for degenerate alphabets', () => {
    expect(idealCodeLength(1)).toBe(0);
    expect(idealCodeLength(0)).toBe(0);
  });
});

describe('redundancy', () => {
  test('is one minus entropy over code length', () => {
    expect(redundancy(1.5, 2)).toBe(0.25);
    expect(redundancy(2, 2)).toBe(0);
  });

  test('is zero when the code length is zero', () => {
    expect(redundancy(0, 0)).toBe(0);
  });
});

describe('uniformCodeStats', () => {
  test('degenerate alphabet takes the zero-value path', () => {
    expect(uniformCodeStats(countSymbols(unigrams('aaaa')))).toEqual({
      entropy: 0,
      codeLength: 0,
      redundancy: 0,
    });
  });

  test('combines entropy, code length and redundancy', () => {
    const stats = uniformCodeStats(new Map([['a', 2], ['b', 1], ['c', 1]]));
    expect(stats.entropy).toBeCloseTo(1.5, 12);
    expect(stats.codeLength).toBeCloseTo(Math.log2(3), 12);
    expect(stats.redundancy).toBeCloseTo(1 - 1.5 / Math.log2(3), 12);
  });
});
