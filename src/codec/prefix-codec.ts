import { CorruptStreamError, InvalidInputError, MissingSymbolError } from '../errors';
import { totalCount } from '../frequency/frequency-model';
import type { Bitstring, Codec, FrequencyCount, Sym } from '../types/codes';

/**
 * Codeword -> symbol lookup for decoding.
 *
 * @throws InvalidInputError on an empty codeword or a codeword shared by
 * two symbols
 */
export function invertCodec(codec: Codec): Map<string, Sym> {
  const inverse = new Map<string, Sym>();
  for (const [symbol, code] of codec) {
    if (code.length === 0) {
      throw new InvalidInputError('invertCodec', `empty codeword for ${JSON.stringify(symbol)}`);
    }
    const taken = inverse.get(code);
    if (taken !== undefined) {
      throw new InvalidInputError(
        'invertCodec',
        `codeword "${code}" is shared by ${JSON.stringify(taken)} and ${JSON.stringify(symbol)}`,
      );
    }
    inverse.set(code, symbol);
  }
  return inverse;
}

/**
 * Concatenates the codeword of every symbol in input order.
 *
 * @throws MissingSymbolError listing every symbol without a codeword
 */
export function encode(sequence: Iterable<Sym>, codec: Codec): Bitstring {
  const parts: string[] = [];
  const missing = new Set<Sym>();
  for (const symbol of sequence) {
    const code = codec.get(symbol);
    if (code === undefined) {
      missing.add(symbol);
    } else {
      parts.push(code);
    }
  }
  if (missing.size > 0) {
    throw new MissingSymbolError([...missing]);
  }
  return parts.join('');
}

/**
 * Decodes a bitstring with a prefix-free codec.
 *
 * Bits accumulate in a buffer that is looked up after every bit; a hit
 * emits the symbol and clears the buffer. With a prefix-free codec the
 * first hit is the only possible one.
 *
 * @throws CorruptStreamError on a non-binary digit or unresolved trailing bits
 */
export function decode(bits: Bitstring, codec: Codec): Sym[] {
  const inverse = invertCodec(codec);
  const symbols: Sym[] = [];
  let buffer = '';
  let start = 0;

  for (let i = 0; i < bits.length; i++) {
    const bit = bits[i];
    if (bit !== '0' && bit !== '1') {
      throw new CorruptStreamError('invalid-digit', bit, i);
    }
    buffer += bit;
    const symbol = inverse.get(buffer);
    if (symbol !== undefined) {
      symbols.push(symbol);
      buffer = '';
      start = i + 1;
    }
  }

  if (buffer.length > 0) {
    throw new CorruptStreamError('trailing-bits', buffer, start);
  }
  return symbols;
}

/**
 * Expected codeword length in bits per symbol:
 * sum of count[s] / total * len(code[s]) over symbols present in both.
 */
export function averageCodeLength(codec: Codec, counts: FrequencyCount): number {
  const total = totalCount(counts);
  if (total === 0) return 0;

  let bits = 0;
  for (const [symbol, code] of codec) {
    const count = counts.get(symbol);
    if (count === undefined) continue;
    bits += (count / total) * code.length;
  }
  return bits;
}

/**
 * Entropy divided by average code length; 0 when the average is not positive.
 */
export function codingEfficiency(entropyBits: number, averageLength: number): number {
  if (averageLength <= 0) return 0;
  return entropyBits / averageLength;
}

/**
 * True when no codeword is a proper prefix of another.
 *
 * Sorting puts every prefix immediately before some word it prefixes,
 * so checking neighbours is enough.
 */
export function isPrefixFree(codec: Codec): boolean {
  const words = [...codec.values()].sort();
  for (let i = 1; i < words.length; i++) {
    if (words[i].startsWith(words[i - 1])) return false;
  }
  return true;
}

/** Kraft sum: sum of 2^-len(code). Equals 1 for a complete prefix code. */
export function kraftSum(codec: Codec): number {
  let sum = 0;
  for (const code of codec.values()) sum += 2 ** -code.length;
  return sum;
}
