/**
 * entropia - entropy statistics and minimum-redundancy prefix codes.
 *
 * Counts symbols, measures Shannon entropy and redundancy, builds
 * Shannon-Fano and Huffman codes, and encodes/decodes bitstrings.
 *
 * @example
 * ```ts
 * import { buildHuffman, countSymbols, decode, encode, entropy, unigrams } from 'entropia';
 *
 * const symbols = unigrams('abracadabra');
 * const counts = countSymbols(symbols);
 * entropy(counts); // ≈ 2.04 bits per symbol
 *
 * const { codec } = buildHuffman(counts);
 * const bits = encode(symbols, codec);
 * decode(bits, codec).join(''); // 'abracadabra'
 * ```
 */

// Value types
export type {
  Bit,
  Bitstring,
  Codec,
  CodeMethod,
  CodeWord,
  FrequencyCount,
  HuffmanInternal,
  HuffmanLeaf,
  HuffmanTree,
  Sym,
  TokenKind,
} from './types/codes';

// Frequency model
export {
  alphabetSize,
  bigrams,
  countSymbols,
  joinBigrams,
  rankSymbols,
  totalCount,
  unigrams,
} from './frequency';

// Entropy
export { entropy, idealCodeLength, redundancy, uniformCodeStats } from './entropy';
export type { UniformCodeStats } from './entropy';

// Code construction
export {
  buildHuffman,
  buildHuffmanTree,
  buildShannonFano,
  decodeWithTree,
  huffmanCodes,
} from './codes';
export type { HuffmanCode, HuffmanOptions, HuffmanQueue } from './codes';

// Encoding / decoding
export {
  averageCodeLength,
  codingEfficiency,
  decode,
  encode,
  invertCodec,
  isPrefixFree,
  kraftSum,
} from './codec';

// Frequency filtering
export { entropyShift, removeByFrequency } from './filter';
export type { EntropyShift, RemovalMode, RemovalResult } from './filter';

// Pipelines
export { analyzeRemoval, analyzeText } from './analysis';
export type { AnalyzeOptions, CodingReport, RemovalAnalysis, TextAnalysis } from './analysis';

// Configuration
export { configure, getConfig, getDefaultConfig, resetConfig } from './core/config';
export type { EntropiaConfig } from './core/config';
export { setLogMode } from './logger';
export type { LogModeName } from './logger';

// Errors
export {
  CorruptStreamError,
  EntropiaError,
  InvalidInputError,
  MissingSymbolError,
} from './errors';
export type { CorruptStreamReason } from './errors';
