/**
 * Core value types shared by every coding module.
 *
 * All of these are plain immutable values. Maps iterate in the order their
 * keys were first seen in the source sequence, and several algorithms rely on
 * that order for tie-breaking.
 */

/** Atomic alphabet unit: a single character or a 2-character bigram token. */
export type Sym = string;

/** A single binary digit as it appears in a bitstring. */
export type Bit = '0' | '1';

/** Non-empty string over `'0' | '1'`. */
export type CodeWord = string;

/** Textual sequence of binary digits. */
export type Bitstring = string;

/** Symbol -> occurrence count. Every present key has a count > 0. */
export type FrequencyCount = ReadonlyMap<Sym, number>;

/** Injective, prefix-free mapping from symbol to codeword. */
export type Codec = ReadonlyMap<Sym, CodeWord>;

/** How a text is cut into symbols. */
export type TokenKind = 'unigram' | 'bigram';

/** Code-construction algorithm. */
export type CodeMethod = 'huffman' | 'shannon-fano';

/**
 * Huffman tree leaf.
 * `order` is the insertion sequence number used to break weight ties.
 */
export interface HuffmanLeaf {
  readonly kind: 'leaf';
  readonly symbol: Sym;
  readonly weight: number;
  readonly order: number;
}

/** Huffman tree internal node; exclusively owns both children. */
export interface HuffmanInternal {
  readonly kind: 'internal';
  readonly weight: number;
  readonly order: number;
  readonly left: HuffmanTree;
  readonly right: HuffmanTree;
}

export type HuffmanTree = HuffmanLeaf | HuffmanInternal;
