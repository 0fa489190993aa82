import { describe, expect, test } from 'vitest';
import { decode, encode, isPrefixFree, kraftSum } from '../../src/codec';
import { buildShannonFano } from '../../src/codes';
import { InvalidInputError } from '../../src/errors';
import { countSymbols, unigrams } from '../../src/frequency';

describe('buildShannonFano', () => {
  test('builds the expected codec for abracadabra', () => {
    const codec = buildShannonFano(countSymbols(unigrams('abracadabra')));
    expect([...codec.entries()]).toEqual([
      ['a', '00'],
      ['b', '01'],
      ['r', '10'],
      ['c', '110'],
      ['d', '111'],
    ]);
  });

  test('two symbols get one bit each, heavier first', () => {
    const codec = buildShannonFano(new Map([['x', 1], ['y', 9]]));
    expect(codec.get('y')).toBe('0');
    expect(codec.get('x')).toBe('1');
  });

  test('equal weights split evenly in first-seen order', () => {
    const codec = buildShannonFano(new Map([['a', 1], ['b', 1], ['c', 1], ['d', 1]]));
    expect(Object.fromEntries(codec)).toEqual({ a: '00', b: '01', c: '10', d: '11' });
  });

  test('ties are broken by first-seen order', () => {
    const codec = buildShannonFano(new Map([['b', 4], ['a', 4]]));
    expect(codec.get('b')).toBe('0');
    expect(codec.get('a')).toBe('1');
  });

  test('codes are prefix-free and Kraft-complete', () => {
    const samples = ['abracadabra', 'mississippi', 'aaaaaaab', 'the quick brown fox jumps'];
    for (const text of samples) {
      const codec = buildShannonFano(countSymbols(unigrams(text)));
      expect(isPrefixFree(codec)).toBe(true);
      expect(kraftSum(codec)).toBeCloseTo(1, 9);
    }
  });

  test('round trips abracadabra', () => {
    const symbols = unigrams('abracadabra');
    const codec = buildShannonFano(countSymbols(symbols));
    const bits = encode(symbols, codec);
    expect(bits).toBe('000110001100011100011000');
    expect(decode(bits, codec).join('')).toBe('abracadabra');
  });

  test('rejects alphabets with fewer than two symbols', () => {
    expect(() => buildShannonFano(new Map([['a', 3]]))).toThrow(InvalidInputError);
    expect(() => buildShannonFano(new Map())).toThrow(InvalidInputError);
  });
});
