import { alphabetSize, totalCount } from '../frequency/frequency-model';
import type { FrequencyCount } from '../types/codes';

/**
 * Fixed-length code statistics for an alphabet.
 */
export interface UniformCodeStats {
  /** Shannon entropy in bits per symbol */
  entropy: number;
  /** Bits per symbol of an ideal uniform code, log2(alphabet size) */
  codeLength: number;
  /** 1 - entropy / codeLength */
  redundancy: number;
}

/**
 * Shannon entropy in bits per symbol: sum of -p * log2(p).
 * Zero for empty input and for single-symbol alphabets.
 */
export function entropy(counts: FrequencyCount): number {
  const total = totalCount(counts);
  if (total === 0) return 0;

  let bits = 0;
  for (const count of counts.values()) {
    if (count <= 0) continue;
    const p = count / total;
    bits -= p * Math.log2(p);
  }
  // A lone symbol gives -1 * log2(1) = -0
  return bits === 0 ? 0 : bits;
}

/**
 * Bits per symbol needed by a uniform code over `size` symbols.
 */
export function idealCodeLength(size: number): number {
  return size > 1 ? Math.log2(size) : 0;
}

/**
 * Fraction of a uniform code that is wasted relative to the entropy bound.
 */
export function redundancy(entropyBits: number, codeLength: number): number {
  if (codeLength <= 0) return 0;
  return 1 - entropyBits / codeLength;
}

/**
 * Entropy, uniform code length and redundancy in one pass.
 * Degenerate alphabets (size <= 1) give all zeros.
 */
export function uniformCodeStats(counts: FrequencyCount): UniformCodeStats {
  const entropyBits = entropy(counts);
  const codeLength = idealCodeLength(alphabetSize(counts));
  return {
    entropy: entropyBits,
    codeLength,
    redundancy: redundancy(entropyBits, codeLength),
  };
}
