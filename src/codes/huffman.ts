import { CorruptStreamError, InvalidInputError } from '../errors';
import type {
  Bitstring,
  Codec,
  CodeWord,
  FrequencyCount,
  HuffmanInternal,
  HuffmanLeaf,
  HuffmanTree,
  Sym,
} from '../types/codes';
import { MinHeap } from './min-heap';

/**
 * Minimum-selection strategy.
 * - `heap`: binary min-heap, O(n log n)
 * - `naive`: linear scan of the pool per pick, O(n^2)
 *
 * Both order nodes by (weight, insertion order) and build identical trees.
 */
export type HuffmanQueue = 'heap' | 'naive';

export interface HuffmanOptions {
  /** Minimum-selection strategy (default: 'heap') */
  queue?: HuffmanQueue;
}

export interface HuffmanCode {
  codec: Codec;
  tree: HuffmanTree;
}

/** Bit appended when descending into the left child. */
export const LEFT_BIT = '1';
/** Bit appended when descending into the right child. */
export const RIGHT_BIT = '0';

/**
 * Lower weight first; equal weights go to the earlier-inserted node.
 */
export function compareNodes(a: HuffmanTree, b: HuffmanTree): number {
  return a.weight - b.weight || a.order - b.order;
}

function createLeaves(counts: FrequencyCount): HuffmanLeaf[] {
  const leaves: HuffmanLeaf[] = [];
  for (const [symbol, weight] of counts) {
    leaves.push({ kind: 'leaf', symbol, weight, order: leaves.length });
  }
  return leaves;
}

function merge(first: HuffmanTree, second: HuffmanTree, order: number): HuffmanInternal {
  return {
    kind: 'internal',
    weight: first.weight + second.weight,
    order,
    left: first,
    right: second,
  };
}

function mergeWithHeap(leaves: HuffmanLeaf[]): HuffmanTree {
  const heap = new MinHeap<HuffmanTree>(compareNodes);
  for (const leaf of leaves) heap.push(leaf);

  let order = leaves.length;
  for (;;) {
    const first = heap.pop();
    const second = heap.pop();
    if (first === undefined) {
      throw new InvalidInputError('buildHuffmanTree', 'no symbols to merge');
    }
    if (second === undefined) return first;
    heap.push(merge(first, second, order++));
  }
}

/** Removes and returns the minimum node of a non-empty pool. */
function takeMin(pool: HuffmanTree[]): HuffmanTree {
  let best = 0;
  for (let i = 1; i < pool.length; i++) {
    if (compareNodes(pool[i], pool[best]) < 0) best = i;
  }
  const [node] = pool.splice(best, 1);
  return node;
}

function mergeNaive(leaves: HuffmanLeaf[]): HuffmanTree {
  const pool: HuffmanTree[] = [...leaves];
  let order = leaves.length;
  while (pool.length > 1) {
    const first = takeMin(pool);
    const second = takeMin(pool);
    pool.push(merge(first, second, order++));
  }
  return pool[0];
}

/**
 * Builds a Huffman tree by repeatedly merging the two lightest nodes.
 *
 * Leaves are inserted in the iteration order of `counts` and numbered from
 * 0; every merged node takes the next number. Of two nodes with equal
 * weight the lower number is picked first. The first pick of each round
 * becomes the left child, the second the right child.
 *
 * @throws InvalidInputError when `counts` is empty
 */
export function buildHuffmanTree(counts: FrequencyCount, options: HuffmanOptions = {}): HuffmanTree {
  if (counts.size === 0) {
    throw new InvalidInputError(
      'buildHuffmanTree',
      'frequency count is empty',
      'count at least one symbol before building a code',
    );
  }

  const leaves = createLeaves(counts);
  return (options.queue ?? 'heap') === 'naive' ? mergeNaive(leaves) : mergeWithHeap(leaves);
}

/**
 * Reads codewords off a Huffman tree. Left edges append '1', right edges '0'.
 *
 * A tree that is a single leaf gets the one-bit codeword '0', since an
 * empty codeword could neither be encoded nor decoded. The codec iterates
 * in leaf insertion order.
 */
export function huffmanCodes(tree: HuffmanTree): Codec {
  if (tree.kind === 'leaf') {
    return new Map<Sym, CodeWord>([[tree.symbol, RIGHT_BIT]]);
  }

  const found: Array<[HuffmanLeaf, CodeWord]> = [];
  const stack: Array<[HuffmanTree, CodeWord]> = [[tree, '']];
  while (stack.length > 0) {
    const entry = stack.pop();
    if (entry === undefined) break;
    const [node, prefix] = entry;
    if (node.kind === 'leaf') {
      found.push([node, prefix]);
      continue;
    }
    stack.push([node.left, prefix + LEFT_BIT]);
    stack.push([node.right, prefix + RIGHT_BIT]);
  }

  found.sort((a, b) => a[0].order - b[0].order);
  return new Map(found.map(([leaf, code]): [Sym, CodeWord] => [leaf.symbol, code]));
}

/**
 * Builds both the Huffman tree and its codec.
 */
export function buildHuffman(counts: FrequencyCount, options: HuffmanOptions = {}): HuffmanCode {
  const tree = buildHuffmanTree(counts, options);
  return { codec: huffmanCodes(tree), tree };
}

/**
 * Decodes a bitstring by walking the tree: '1' follows the left child,
 * '0' the right child, and every leaf reached emits its symbol and
 * restarts from the root.
 *
 * @throws CorruptStreamError on a non-binary digit, or when the input
 * stops partway down the tree
 */
export function decodeWithTree(bits: Bitstring, tree: HuffmanTree): Sym[] {
  const symbols: Sym[] = [];

  if (tree.kind === 'leaf') {
    for (let i = 0; i < bits.length; i++) {
      const bit = bits[i];
      if (bit === RIGHT_BIT) {
        symbols.push(tree.symbol);
      } else if (bit === LEFT_BIT) {
        throw new CorruptStreamError('trailing-bits', bits.slice(i), i);
      } else {
        throw new CorruptStreamError('invalid-digit', bit, i);
      }
    }
    return symbols;
  }

  let node: HuffmanInternal = tree;
  let start = 0;
  for (let i = 0; i < bits.length; i++) {
    const bit = bits[i];
    let next: HuffmanTree;
    if (bit === LEFT_BIT) {
      next = node.left;
    } else if (bit === RIGHT_BIT) {
      next = node.right;
    } else {
      throw new CorruptStreamError('invalid-digit', bit, i);
    }
    if (next.kind === 'leaf') {
      symbols.push(next.symbol);
      node = tree;
      start = i + 1;
    } else {
      node = next;
    }
  }

  if (start < bits.length) {
    throw new CorruptStreamError('trailing-bits', bits.slice(start), start);
  }
  return symbols;
}
