export { buildShannonFano } from './shannon-fano';
export {
  buildHuffman,
  buildHuffmanTree,
  compareNodes,
  decodeWithTree,
  huffmanCodes,
  LEFT_BIT,
  RIGHT_BIT,
} from './huffman';
export type { HuffmanCode, HuffmanOptions, HuffmanQueue } from './huffman';
export { MinHeap } from './min-heap';
