/**
 * byte-huffman
 *
 * Lossless byte-oriented compression with Huffman coding.
 *
 * @example
 * ```typescript
 * import { HuffmanCompressor } from 'byte-huffman';
 *
 * const compressor = new HuffmanCompressor();
 *
 * // Compress
 * const result = compressor.compress(new TextEncoder().encode('Hello, world!'));
 * console.log(`Compression ratio: ${result.compressionRatio.toFixed(2)}x`);
 *
 * // Decompress
 * const bytes = compressor.decompress(result.data);
 * ```
 */

// Main compressor
export {
  HuffmanCompressor,
  encode,
  decode,
  type CompressorOptions,
  type CompressionResult,
  type ProgressInfo,
} from './compressor.js';

// File helpers
export { compressFile, decompressFile, type FileOperationResult } from './file.js';

// Errors
export { HuffmanError, isHuffmanError, type HuffmanErrorCode } from './errors.js';

// Core Huffman coding (for advanced usage)
export {
  BitOutputStream,
  BitInputStream,
  type Bit,
  MinHeap,
  SYMBOL_COUNT,
  countFrequencies,
  totalFrequency,
  distinctSymbols,
  type FrequencyTable,
  buildHuffmanTree,
  isLeaf,
  treeDepth,
  countLeaves,
  type HuffmanNode,
  type LeafNode,
  type InternalNode,
  generateCodes,
  codeLengths,
  type CodeTable,
  packSymbols,
  unpackSymbols,
  type PackOptions,
  type PackProgressCallback,
} from './core/index.js';

// File format (for advanced usage)
export {
  type CompressedHeader,
  MAGIC_BYTES,
  BASE_HEADER_SIZE,
  FREQUENCY_TABLE_SIZE,
  FULL_HEADER_SIZE,
  createHeader,
  headerSize,
  serializeHeader,
  deserializeHeader,
  combineHeaderAndPayload,
  splitHeaderAndPayload,
} from './format/index.js';
