import { isLeaf, type HuffmanNode } from './huffman-tree.js';
import { SYMBOL_COUNT } from './frequency.js';

/**
 * Byte value to code, written as a string of '0' and '1' characters.
 * Values absent from the input have no entry.
 */
export type CodeTable = ReadonlyMap<number, string>;

/**
 * Assign each leaf the path leading to it: '0' for left, '1' for right.
 */
export function generateCodes(root: HuffmanNode): CodeTable {
  const codes = new Map<number, string>();
  const stack: Array<{ node: HuffmanNode; path: string }> = [{ node: root, path: '' }];

  for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
    const { node, path } = frame;

    if (isLeaf(node)) {
      if (path.length === 0) {
        throw new Error('Huffman tree leaf at depth 0 has no code');
      }
      codes.set(node.symbol, path);
      continue;
    }

    if (node.right) {
      stack.push({ node: node.right, path: path + '1' });
    }
    stack.push({ node: node.left, path: path + '0' });
  }

  return codes;
}

/**
 * Code length per byte value, 0 for values without a code.
 */
export function codeLengths(codes: CodeTable): number[] {
  const lengths = new Array<number>(SYMBOL_COUNT).fill(0);
  for (const [symbol, code] of codes) {
    lengths[symbol] = code.length;
  }
  return lengths;
}
