import { InvalidInputError } from '../errors';
import { rankSymbols } from '../frequency/frequency-model';
import type { Codec, CodeWord, FrequencyCount, Sym } from '../types/codes';

/**
 * Index just past the first element at which the running weight of
 * `weights[start..end)` reaches half of the group total.
 * Always leaves at least one element on each side.
 */
function findCut(weights: readonly number[], start: number, end: number): number {
  let total = 0;
  for (let i = start; i < end; i++) total += weights[i];

  let acc = 0;
  for (let i = start; i < end; i++) {
    acc += weights[i];
    if (acc >= total / 2) {
      return Math.min(i + 1, end - 1);
    }
  }
  return end - 1;
}

/**
 * Builds a Shannon-Fano code by recursive top-down partitioning.
 *
 * Symbols are ranked by weight (descending, ties in first-seen order) and
 * each group is cut right after the element where the accumulated weight
 * first reaches half the group total. The left part extends its codewords
 * with '0', the right part with '1'.
 *
 * The returned codec iterates in the order of `counts`.
 *
 * @throws InvalidInputError when `counts` has fewer than two symbols
 */
export function buildShannonFano(counts: FrequencyCount): Codec {
  if (counts.size < 2) {
    throw new InvalidInputError(
      'buildShannonFano',
      `need at least 2 distinct symbols, got ${counts.size}`,
      'single-symbol alphabets have zero entropy and need no code',
    );
  }

  const ranked = rankSymbols(counts);
  const symbols: Sym[] = ranked.map(([symbol]) => symbol);
  const weights: number[] = ranked.map(([, weight]) => weight);
  const codes: CodeWord[] = symbols.map(() => '');

  const split = (start: number, end: number): void => {
    if (end - start <= 1) return;

    const cut = findCut(weights, start, end);
    for (let i = start; i < cut; i++) codes[i] += '0';
    for (let i = cut; i < end; i++) codes[i] += '1';

    split(start, cut);
    split(cut, end);
  };

  split(0, symbols.length);

  const bySymbol = new Map<Sym, CodeWord>();
  symbols.forEach((symbol, i) => bySymbol.set(symbol, codes[i]));

  const codec = new Map<Sym, CodeWord>();
  for (const symbol of counts.keys()) {
    const code = bySymbol.get(symbol);
    if (code !== undefined) codec.set(symbol, code);
  }
  return codec;
}
