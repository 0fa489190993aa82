import { entropy } from '../entropy/entropy';
import { countSymbols, rankSymbols } from '../frequency/frequency-model';
import { InvalidInputError } from '../errors';
import type { Sym } from '../types/codes';

export type RemovalMode = 'top' | 'bottom';

export interface RemovalResult {
  /** Input with every occurrence of a removed symbol dropped */
  filtered: Sym[];
  /** Removed symbols, in rank order */
  removed: Set<Sym>;
}

export interface EntropyShift {
  before: number;
  after: number;
  /** after - before */
  delta: number;
}

/**
 * Rounds to the nearest integer, halves to the even neighbour
 * (0.5 -> 0, 1.5 -> 2, 2.5 -> 2).
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Number of symbols `removeByFrequency` drops from an alphabet of `size`.
 */
export function removalCount(size: number, fraction: number): number {
  if (size === 0) return 0;
  return Math.min(size, Math.max(1, roundHalfEven(fraction * size)));
}

/**
 * Drops the most (`top`) or least (`bottom`) frequent symbols.
 *
 * `max(1, round(fraction * distinct))` symbols are removed, picked from
 * the count-descending ranking with ties in first-seen order. Retained
 * symbols keep their order and multiplicity.
 *
 * @throws InvalidInputError when `fraction` is outside [0, 1]
 */
export function removeByFrequency(
  sequence: readonly Sym[],
  mode: RemovalMode,
  fraction: number,
): RemovalResult {
  if (!(fraction >= 0 && fraction <= 1)) {
    throw new InvalidInputError(
      'removeByFrequency',
      `fraction must be within [0, 1], got ${fraction}`,
    );
  }

  const ranked = rankSymbols(countSymbols(sequence));
  if (ranked.length === 0) {
    return { filtered: [...sequence], removed: new Set() };
  }

  const n = removalCount(ranked.length, fraction);
  const picked = mode === 'top' ? ranked.slice(0, n) : ranked.slice(ranked.length - n);
  const removed = new Set(picked.map(([symbol]) => symbol));

  return {
    filtered: sequence.filter((symbol) => !removed.has(symbol)),
    removed,
  };
}

/**
 * Entropy of `filtered` relative to `original`.
 */
export function entropyShift(original: Iterable<Sym>, filtered: Iterable<Sym>): EntropyShift {
  const before = entropy(countSymbols(original));
  const after = entropy(countSymbols(filtered));
  return { before, after, delta: after - before };
}
