/**
 * Huffman Queue Benchmark
 *
 * Compares the binary-heap and linear-scan minimum selection on synthetic
 * alphabets of increasing size. Both produce identical trees.
 *
 * Usage: npm run bench
 */

import { bench, group, run } from 'mitata';
import { buildHuffmanTree, buildShannonFano } from '../src';

/** Deterministic Zipf-like counts: symbol i occurs about N / (i + 1) times. */
function syntheticCounts(alphabet: number): Map<string, number> {
  const counts = new Map<string, number>();
  for (let i = 0; i < alphabet; i++) {
    counts.set(`s${i}`, Math.max(1, Math.floor(100_000 / (i + 1))));
  }
  return counts;
}

console.log('\n📊 Prefix code construction\n');
console.log('='.repeat(60));

for (const alphabet of [64, 512, 4096]) {
  const counts = syntheticCounts(alphabet);

  group(`${alphabet} symbols`, () => {
    bench('huffman (heap)', () => buildHuffmanTree(counts, { queue: 'heap' }));
    bench('huffman (naive)', () => buildHuffmanTree(counts, { queue: 'naive' }));
    bench('shannon-fano', () => buildShannonFano(counts));
  });
}

await run();

console.log('\n✅ Benchmark complete!');
