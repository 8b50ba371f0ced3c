import { MinHeap } from './priority-queue.js';
import { SYMBOL_COUNT, type FrequencyTable } from './frequency.js';

/**
 * Leaf: one byte value and its count.
 */
export interface LeafNode {
  kind: 'leaf';
  symbol: number;
  weight: number;
}

/**
 * Merge node. `right` is absent only on the root synthesized for an
 * input with a single distinct byte value.
 */
export interface InternalNode {
  kind: 'internal';
  weight: number;
  left: HuffmanNode;
  right?: HuffmanNode;
}

export type HuffmanNode = LeafNode | InternalNode;

export function isLeaf(node: HuffmanNode): node is LeafNode {
  return node.kind === 'leaf';
}

/**
 * Build the Huffman tree for a frequency table.
 *
 * Leaves are queued in byte-value order and the two lightest nodes are
 * merged until one remains; the first extracted becomes the left child.
 * A table with one non-zero entry yields a root whose only child is the
 * leaf, so every symbol gets a code of at least one bit.
 *
 * @throws Error if every count is zero
 */
export function buildHuffmanTree(frequencies: FrequencyTable): InternalNode {
  const heap = new MinHeap<HuffmanNode>((node) => node.weight);

  for (let symbol = 0; symbol < SYMBOL_COUNT; symbol++) {
    const weight = frequencies[symbol] ?? 0;
    if (weight > 0) {
      heap.insert({ kind: 'leaf', symbol, weight });
    }
  }

  if (heap.isEmpty()) {
    throw new Error('Cannot build a Huffman tree from an empty frequency table');
  }

  if (heap.size === 1) {
    const only = heap.extractMin();
    return { kind: 'internal', weight: only.weight, left: only };
  }

  while (heap.size > 1) {
    const left = heap.extractMin();
    const right = heap.extractMin();
    heap.insert({
      kind: 'internal',
      weight: left.weight + right.weight,
      left,
      right,
    });
  }

  const root = heap.extractMin();
  // Two or more leaves always merge into an internal root
  if (isLeaf(root)) {
    throw new Error('Huffman tree root is unexpectedly a leaf');
  }
  return root;
}

/**
 * Length of the longest root-to-leaf path.
 */
export function treeDepth(node: HuffmanNode): number {
  if (isLeaf(node)) return 0;
  const left = treeDepth(node.left);
  const right = node.right ? treeDepth(node.right) : 0;
  return 1 + Math.max(left, right);
}

export function countLeaves(node: HuffmanNode): number {
  if (isLeaf(node)) return 1;
  return countLeaves(node.left) + (node.right ? countLeaves(node.right) : 0);
}
