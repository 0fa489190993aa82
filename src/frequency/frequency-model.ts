import type { FrequencyCount, Sym } from '../types/codes';

/**
 * Counts symbol occurrences.
 * The returned map iterates in first-seen order.
 */
export function countSymbols(sequence: Iterable<Sym>): Map<Sym, number> {
  const counts = new Map<Sym, number>();
  for (const symbol of sequence) {
    counts.set(symbol, (counts.get(symbol) ?? 0) + 1);
  }
  return counts;
}

/**
 * Splits text into single-character symbols (by code point).
 */
export function unigrams(text: string): Sym[] {
  return Array.from(text);
}

/**
 * Splits text into overlapping 2-character tokens: "abc" -> ["ab", "bc"].
 * Texts shorter than two characters have no bigrams.
 */
export function bigrams(text: string): Sym[] {
  const chars = Array.from(text);
  const tokens: Sym[] = [];
  for (let i = 0; i < chars.length - 1; i++) {
    tokens.push(chars[i] + chars[i + 1]);
  }
  return tokens;
}

/**
 * Rebuilds text from overlapping bigram tokens.
 *
 * The first token contributes both characters; every later token overlaps
 * its predecessor by one position and contributes only its last character.
 */
export function joinBigrams(tokens: readonly Sym[]): string {
  if (tokens.length === 0) return '';
  const parts = [tokens[0]];
  for (let i = 1; i < tokens.length; i++) {
    const chars = Array.from(tokens[i]);
    parts.push(chars[chars.length - 1] ?? '');
  }
  return parts.join('');
}

/** Sum of all counts. */
export function totalCount(counts: FrequencyCount): number {
  let total = 0;
  for (const count of counts.values()) total += count;
  return total;
}

/** Number of distinct symbols. */
export function alphabetSize(counts: FrequencyCount): number {
  return counts.size;
}

/**
 * Symbols ordered by count descending.
 * Equal counts keep first-seen order (Array.prototype.sort is stable).
 */
export function rankSymbols(counts: FrequencyCount): Array<[Sym, number]> {
  return [...counts.entries()].sort((a, b) => b[1] - a[1]);
}
