import { BitOutputStream, BitInputStream } from './bit-stream.js';
import { isLeaf, type HuffmanNode } from './huffman-tree.js';
import type { CodeTable } from './code-table.js';
import { HuffmanError, guardAllocation } from '../errors.js';

/**
 * Called periodically with the number of bytes processed so far.
 */
export type PackProgressCallback = (processed: number, total: number) => void;

export interface PackOptions {
  onProgress?: PackProgressCallback;
  /** Bytes between progress callbacks */
  progressInterval?: number;
}

const DEFAULT_PROGRESS_INTERVAL = 65536;

/**
 * Concatenate the code of every input byte into an MSB-first bit stream,
 * zero-padding the final byte.
 *
 * @throws Error if a byte has no code in the table
 */
export function packSymbols(
  data: Uint8Array,
  codes: CodeTable,
  options: PackOptions = {}
): Uint8Array {
  const interval = Math.max(1, options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL);
  const stream = guardAllocation('bit buffer', () => new BitOutputStream(data.length));

  for (let i = 0; i < data.length; i++) {
    if (options.onProgress && i % interval === 0) {
      options.onProgress(i, data.length);
    }

    const code = codes.get(data[i]);
    if (code === undefined) {
      throw new Error(`No Huffman code for byte value ${data[i]}`);
    }
    stream.writeCode(code);
  }

  stream.flush();
  options.onProgress?.(data.length, data.length);

  return guardAllocation('packed body', () => stream.toUint8Array());
}

/**
 * Decode exactly `count` bytes by walking the tree bit by bit.
 * Padding bits after the last symbol are ignored.
 *
 * @throws HuffmanError TRUNCATED_BODY if the bits run out first
 */
export function unpackSymbols(
  payload: Uint8Array,
  root: HuffmanNode,
  count: number,
  options: PackOptions = {}
): Uint8Array {
  const interval = Math.max(1, options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL);
  const output = guardAllocation('output buffer', () => new Uint8Array(count));
  const stream = new BitInputStream(payload);

  let node = root;
  let emitted = 0;

  while (emitted < count) {
    const bit = stream.readBit();
    if (bit < 0) {
      throw new HuffmanError(
        'TRUNCATED_BODY',
        `Compressed body ended after ${emitted} of ${count} bytes`
      );
    }

    if (isLeaf(node)) {
      throw new Error('Cannot decode with a single-leaf tree');
    }

    const next = bit === 0 ? node.left : node.right;
    if (next === undefined) {
      // Only the synthesized single-symbol root lacks a right branch
      throw new HuffmanError(
        'INVALID_FORMAT',
        `Bit ${stream.position - 1} selects a branch that does not exist`
      );
    }

    if (isLeaf(next)) {
      if (options.onProgress && emitted % interval === 0) {
        options.onProgress(emitted, count);
      }
      output[emitted++] = next.symbol;
      node = root;
    } else {
      node = next;
    }
  }

  options.onProgress?.(count, count);
  return output;
}
