import { afterEach, describe, expect, test } from 'vitest';
import { analyzeRemoval, analyzeText } from '../../src/analysis';
import { configure, resetConfig } from '../../src/core/config';
import { entropy } from '../../src/entropy';
import { countSymbols, unigrams } from '../../src/frequency';

describe('analyzeText', () => {
  afterEach(() => {
    resetConfig();
  });

  test('Shannon-Fano over unigrams', () => {
    const report = analyzeText('abracadabra', { method: 'shannon-fano' });
    expect(report.tokens).toBe('unigram');
    expect(report.method).toBe('shannon-fano');
    expect(report.entropy).toBeCloseTo(2.0403733936884962, 12);
    expect(report.codeLength).toBeCloseTo(Math.log2(5), 12);
    expect(report.redundancy).toBeCloseTo(1 - 2.0403733936884962 / Math.log2(5), 12);

    const coding = report.coding;
    expect(coding).toBeDefined();
    if (coding) {
      expect(coding.codec.get('a')).toBe('00');
      expect(coding.tree).toBeUndefined();
      expect(coding.encoded).toBe('000110001100011100011000');
      expect(coding.reconstructed).toBe('abracadabra');
      expect(coding.roundTrip).toBe(true);
      expect(coding.averageLength).toBeCloseTo(24 / 11, 9);
      expect(coding.efficiency).toBeCloseTo(0.9351711387738941, 9);
    }
  });

  test('Huffman is the default method', () => {
    const report = analyzeText('abracadabra');
    expect(report.method).toBe('huffman');
    expect(report.coding?.tree?.weight).toBe(11);
    expect(report.coding?.encoded).toBe('10010001011101010010001');
    expect(report.coding?.roundTrip).toBe(true);
    expect(report.coding?.averageLength).toBeCloseTo(23 / 11, 9);
  });

  test('bigram tokens decode back through overlap reconstruction', () => {
    for (const method of ['huffman', 'shannon-fano'] as const) {
      const report = analyzeText('abracadabra', { tokens: 'bigram', method });
      expect(report.symbols).toHaveLength(10);
      expect(report.counts.get('ab')).toBe(2);
      expect(report.coding?.decoded).toEqual(report.symbols);
      expect(report.coding?.reconstructed).toBe('abracadabra');
      expect(report.coding?.roundTrip).toBe(true);
    }
  });

  test('single-symbol alphabet under Shannon-Fano builds no codec', () => {
    const report = analyzeText('aaaa', { method: 'shannon-fano' });
    expect(report.entropy).toBe(0);
    expect(report.codeLength).toBe(0);
    expect(report.redundancy).toBe(0);
    expect(report.coding).toBeUndefined();
  });

  test('single-symbol alphabet under Huffman uses a one-bit code', () => {
    const report = analyzeText('aaaa');
    expect(report.coding?.encoded).toBe('0000');
    expect(report.coding?.roundTrip).toBe(true);
    expect(report.coding?.averageLength).toBe(1);
    expect(report.coding?.efficiency).toBe(0);
  });

  test('empty input builds no codec', () => {
    expect(analyzeText('').coding).toBeUndefined();
    expect(analyzeText('', { method: 'shannon-fano' }).coding).toBeUndefined();
    expect(analyzeText('a', { tokens: 'bigram' }).coding).toBeUndefined();
  });

  test('configured queue gives the same codec', () => {
    const heap = analyzeText('she sells sea shells');
    configure({ huffmanQueue: 'naive' });
    const naive = analyzeText('she sells sea shells');
    expect([...(naive.coding?.codec ?? [])]).toEqual([...(heap.coding?.codec ?? [])]);
  });
});

describe('analyzeRemoval', () => {
  afterEach(() => {
    resetConfig();
  });

  test('reports the entropy shift after removing the top symbol', () => {
    const report = analyzeRemoval('aaabbbccd', 'top', 0.34);
    expect(report.filtered).toBe('bbbccd');
    expect(report.removed).toEqual(['a']);
    expect(report.before).toBeCloseTo(entropy(countSymbols(unigrams('aaabbbccd'))), 12);
    expect(report.after).toBeCloseTo(1.4591479170272448, 12);
    expect(report.delta).toBeCloseTo(1.4591479170272448 - 1.8910611120726526, 12);
  });

  test('falls back to the configured fraction', () => {
    const report = analyzeRemoval('aaabbbccd', 'bottom');
    expect(report.fraction).toBe(0.2);
    expect(report.removed).toEqual(['d']);

    configure({ removalFraction: 0.5 });
    expect(analyzeRemoval('aaabbbccd', 'bottom').removed).toEqual(['c', 'd']);
  });
});
