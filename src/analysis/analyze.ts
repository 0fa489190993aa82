import { averageCodeLength, codingEfficiency, decode, encode } from '../codec/prefix-codec';
import { buildHuffman, decodeWithTree, type HuffmanQueue } from '../codes/huffman';
import { buildShannonFano } from '../codes/shannon-fano';
import { getConfig } from '../core/config';
import { uniformCodeStats } from '../entropy/entropy';
import { entropyShift, type RemovalMode, removeByFrequency } from '../filter/frequency-filter';
import { bigrams, countSymbols, joinBigrams, unigrams } from '../frequency/frequency-model';
import { logger } from '../logger';
import type {
  Bitstring,
  Codec,
  CodeMethod,
  FrequencyCount,
  HuffmanTree,
  Sym,
  TokenKind,
} from '../types/codes';

export interface AnalyzeOptions {
  /** How the text is cut into symbols (default: 'unigram') */
  tokens?: TokenKind;
  /** Code construction algorithm (default: 'huffman') */
  method?: CodeMethod;
  /** Huffman queue; falls back to `getConfig().huffmanQueue` */
  queue?: HuffmanQueue;
}

/**
 * Result of coding the token sequence with a prefix code.
 */
export interface CodingReport {
  codec: Codec;
  /** Present for Huffman codes */
  tree?: HuffmanTree;
  encoded: Bitstring;
  decoded: Sym[];
  /** Text rebuilt from the decoded tokens (bigrams overlap by one character) */
  reconstructed: string;
  /** Whether `reconstructed` equals the analysed text */
  roundTrip: boolean;
  /** Bits per token */
  averageLength: number;
  /** Token entropy / averageLength */
  efficiency: number;
}

export interface TextAnalysis {
  tokens: TokenKind;
  method: CodeMethod;
  symbols: Sym[];
  counts: FrequencyCount;
  entropy: number;
  codeLength: number;
  redundancy: number;
  /**
   * Missing when no code applies: empty input, or a single-symbol
   * alphabet under Shannon-Fano.
   */
  coding?: CodingReport;
}

export interface RemovalAnalysis {
  mode: RemovalMode;
  fraction: number;
  filtered: string;
  removed: Sym[];
  before: number;
  after: number;
  delta: number;
}

function tokenize(text: string, kind: TokenKind): Sym[] {
  return kind === 'bigram' ? bigrams(text) : unigrams(text);
}

function detokenize(symbols: readonly Sym[], kind: TokenKind): string {
  return kind === 'bigram' ? joinBigrams(symbols) : symbols.join('');
}

function buildCoding(
  text: string,
  symbols: Sym[],
  counts: FrequencyCount,
  entropyBits: number,
  options: Required<AnalyzeOptions>,
): CodingReport | undefined {
  let codec: Codec;
  let tree: HuffmanTree | undefined;
  let decoded: Sym[];

  if (options.method === 'huffman') {
    if (counts.size === 0) return undefined;
    const built = buildHuffman(counts, { queue: options.queue });
    codec = built.codec;
    tree = built.tree;
  } else {
    if (counts.size < 2) return undefined;
    codec = buildShannonFano(counts);
  }

  const encoded = encode(symbols, codec);
  if (tree !== undefined) {
    decoded = decodeWithTree(encoded, tree);
  } else {
    decoded = decode(encoded, codec);
  }

  const reconstructed = detokenize(decoded, options.tokens);
  const averageLength = averageCodeLength(codec, counts);

  return {
    codec,
    tree,
    encoded,
    decoded,
    reconstructed,
    roundTrip: reconstructed === text,
    averageLength,
    efficiency: codingEfficiency(entropyBits, averageLength),
  };
}

/**
 * Runs the whole pipeline on a text: token counts, entropy statistics,
 * code construction, encode, decode and the round-trip check.
 *
 * @example
 * ```ts
 * const report = analyzeText('abracadabra', { method: 'shannon-fano' });
 * report.coding?.codec.get('a'); // '00'
 * report.coding?.roundTrip;      // true
 * ```
 */
export function analyzeText(text: string, options: AnalyzeOptions = {}): TextAnalysis {
  const resolved: Required<AnalyzeOptions> = {
    tokens: options.tokens ?? 'unigram',
    method: options.method ?? 'huffman',
    queue: options.queue ?? getConfig().huffmanQueue,
  };

  const symbols = tokenize(text, resolved.tokens);
  const counts = countSymbols(symbols);
  const stats = uniformCodeStats(counts);
  const coding = buildCoding(text, symbols, counts, stats.entropy, resolved);

  logger.debug('Analyzed text', {
    tokens: resolved.tokens,
    method: resolved.method,
    alphabet: counts.size,
    entropy: stats.entropy,
    roundTrip: coding?.roundTrip,
  });

  return {
    tokens: resolved.tokens,
    method: resolved.method,
    symbols,
    counts,
    ...stats,
    coding,
  };
}

/**
 * Removes the most or least frequent characters of a text and reports
 * how the unigram entropy moves.
 */
export function analyzeRemoval(
  text: string,
  mode: RemovalMode,
  fraction: number = getConfig().removalFraction,
): RemovalAnalysis {
  const symbols = unigrams(text);
  const { filtered, removed } = removeByFrequency(symbols, mode, fraction);
  const shift = entropyShift(symbols, filtered);

  logger.debug('Removed symbols by frequency', {
    mode,
    fraction,
    removed: [...removed],
    delta: shift.delta,
  });

  return {
    mode,
    fraction,
    filtered: filtered.join(''),
    removed: [...removed],
    ...shift,
  };
}
