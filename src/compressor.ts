import { countFrequencies, distinctSymbols } from './core/frequency.js';
import { buildHuffmanTree } from './core/huffman-tree.js';
import { generateCodes } from './core/code-table.js';
import { packSymbols, unpackSymbols, type PackOptions } from './core/bit-packer.js';
import {
  createHeader,
  serializeHeader,
  splitHeaderAndPayload,
  combineHeaderAndPayload,
} from './format/header.js';
import { HuffmanError, guardAllocation } from './errors.js';

/**
 * Progress information callback payload.
 */
export interface ProgressInfo {
  stage: 'counting' | 'building' | 'encoding' | 'decoding';
  current: number;
  total: number;
}

/**
 * Options for HuffmanCompressor.
 */
export interface CompressorOptions {
  /** Progress callback */
  onProgress?: (progress: ProgressInfo) => void;

  /** Bytes between progress reports while packing or unpacking (default: 65536) */
  progressInterval?: number;
}

/**
 * Result of compression operation.
 */
export interface CompressionResult {
  /** Compressed data (header + payload) */
  data: Uint8Array;

  /** Original size in bytes */
  originalSize: number;

  /** Compressed size in bytes */
  compressedSize: number;

  /** Compression ratio (originalSize / compressedSize) */
  compressionRatio: number;

  /** Number of distinct byte values in the input */
  distinctSymbols: number;
}

/**
 * Byte-oriented Huffman compressor.
 *
 * Usage:
 * ```typescript
 * const compressor = new HuffmanCompressor();
 *
 * const result = compressor.compress(bytes);
 * const restored = compressor.decompress(result.data);
 * ```
 */
export class HuffmanCompressor {
  private options: CompressorOptions;

  constructor(options: CompressorOptions = {}) {
    this.options = options;
  }

  /**
   * Compress bytes into a self-describing container.
   *
   * An empty input yields a 12-byte container with no table and no body.
   */
  compress(data: Uint8Array): CompressionResult {
    if (data.length === 0) {
      const headerBytes = serializeHeader(createHeader(0, null));
      return {
        data: headerBytes,
        originalSize: 0,
        compressedSize: headerBytes.length,
        compressionRatio: 0,
        distinctSymbols: 0,
      };
    }

    this.reportProgress('counting', 0, 1);
    const frequencies = countFrequencies(data);
    this.reportProgress('counting', 1, 1);

    this.reportProgress('building', 0, 1);
    const codes = guardAllocation('code table', () =>
      generateCodes(buildHuffmanTree(frequencies))
    );
    this.reportProgress('building', 1, 1);

    const payload = packSymbols(data, codes, this.packOptions('encoding'));

    const headerBytes = serializeHeader(createHeader(data.length, frequencies));
    const container = guardAllocation('container', () =>
      combineHeaderAndPayload(headerBytes, payload)
    );

    return {
      data: container,
      originalSize: data.length,
      compressedSize: container.length,
      compressionRatio: data.length / container.length,
      distinctSymbols: distinctSymbols(frequencies),
    };
  }

  /**
   * Restore the original bytes from a container.
   *
   * @throws HuffmanError on a malformed, truncated or oversized container
   */
  decompress(data: Uint8Array): Uint8Array {
    const { header, payload } = splitHeaderAndPayload(data);

    if (header.originalLength === 0) {
      return new Uint8Array(0);
    }

    if (header.frequencies === null) {
      throw new HuffmanError('INVALID_FORMAT', 'Missing frequency table');
    }
    const frequencies = header.frequencies;

    this.reportProgress('building', 0, 1);
    const root = guardAllocation('Huffman tree', () => buildHuffmanTree(frequencies));
    this.reportProgress('building', 1, 1);

    return unpackSymbols(payload, root, header.originalLength, this.packOptions('decoding'));
  }

  private packOptions(stage: 'encoding' | 'decoding'): PackOptions {
    const onProgress = this.options.onProgress;
    return {
      progressInterval: this.options.progressInterval,
      onProgress: onProgress
        ? (current, total) => onProgress({ stage, current, total })
        : undefined,
    };
  }

  /**
   * Report progress to the callback if provided.
   */
  private reportProgress(
    stage: ProgressInfo['stage'],
    current: number,
    total: number
  ): void {
    this.options.onProgress?.({ stage, current, total });
  }
}

/**
 * Compress bytes with default options and return the container.
 */
export function encode(data: Uint8Array): Uint8Array {
  return new HuffmanCompressor().compress(data).data;
}

/**
 * Restore bytes from a container produced by encode().
 */
export function decode(container: Uint8Array): Uint8Array {
  return new HuffmanCompressor().decompress(container);
}
