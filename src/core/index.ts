export { BitOutputStream, BitInputStream, type Bit } from './bit-stream.js';
export { MinHeap } from './priority-queue.js';
export {
  SYMBOL_COUNT,
  countFrequencies,
  totalFrequency,
  distinctSymbols,
  type FrequencyTable,
} from './frequency.js';
export {
  buildHuffmanTree,
  isLeaf,
  treeDepth,
  countLeaves,
  type HuffmanNode,
  type LeafNode,
  type InternalNode,
} from './huffman-tree.js';
export { generateCodes, codeLengths, type CodeTable } from './code-table.js';
export {
  packSymbols,
  unpackSymbols,
  type PackOptions,
  type PackProgressCallback,
} from './bit-packer.js';
