/**
 * Compressed container header.
 *
 * Layout (little-endian):
 * [Magic: 4 bytes "HUFF"]
 * [Original length: 8 bytes]
 * [Frequency table: 256 × 8 bytes] (only when original length > 0)
 * [Payload: variable] (only when original length > 0)
 */

import { SYMBOL_COUNT, totalFrequency, type FrequencyTable } from '../core/frequency.js';
import { HuffmanError } from '../errors.js';

/**
 * Magic bytes identifying a Huffman-compressed file.
 * "HUFF" in ASCII.
 */
export const MAGIC_BYTES = new Uint8Array([0x48, 0x55, 0x46, 0x46]);

/**
 * Magic plus original length; the whole header of an empty input.
 */
export const BASE_HEADER_SIZE = 12;

export const FREQUENCY_TABLE_SIZE = SYMBOL_COUNT * 8;

/**
 * Header size whenever the original input is non-empty.
 */
export const FULL_HEADER_SIZE = BASE_HEADER_SIZE + FREQUENCY_TABLE_SIZE;

export interface CompressedHeader {
  /** Magic bytes: "HUFF" */
  magic: Uint8Array;

  /** Original input length in bytes */
  originalLength: number;

  /** Per-byte counts; absent when originalLength is 0 */
  frequencies: FrequencyTable | null;
}

/**
 * Create a header for a compressed file.
 */
export function createHeader(
  originalLength: number,
  frequencies: FrequencyTable | null
): CompressedHeader {
  return {
    magic: new Uint8Array(MAGIC_BYTES),
    originalLength,
    frequencies: originalLength > 0 ? frequencies : null,
  };
}

/**
 * Size in bytes of a serialized header.
 */
export function headerSize(header: CompressedHeader): number {
  return header.originalLength > 0 ? FULL_HEADER_SIZE : BASE_HEADER_SIZE;
}

/**
 * Serialize a header to bytes.
 *
 * @throws Error if a non-empty header lacks a 256-entry table summing to originalLength
 */
export function serializeHeader(header: CompressedHeader): Uint8Array {
  const size = headerSize(header);
  const buffer = new ArrayBuffer(size);
  const view = new DataView(buffer);
  const bytes = new Uint8Array(buffer);

  bytes.set(header.magic, 0);
  view.setBigUint64(4, BigInt(header.originalLength), true);

  if (header.originalLength > 0) {
    const frequencies = header.frequencies;
    if (frequencies === null || frequencies.length !== SYMBOL_COUNT) {
      throw new Error(
        `Frequency table with ${SYMBOL_COUNT} entries is required for a non-empty input`
      );
    }
    const total = totalFrequency(frequencies);
    if (total !== header.originalLength) {
      throw new Error(
        `Frequency total ${total} does not match original length ${header.originalLength}`
      );
    }
    for (let i = 0; i < SYMBOL_COUNT; i++) {
      view.setBigUint64(BASE_HEADER_SIZE + i * 8, BigInt(frequencies[i]), true);
    }
  }

  return bytes;
}

function readSafeInteger(view: DataView, offset: number, field: string): number {
  const value = view.getBigUint64(offset, true);
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new HuffmanError('INVALID_FORMAT', `Invalid header: ${field} ${value} is too large`);
  }
  return Number(value);
}

/**
 * Deserialize a header from bytes.
 *
 * @throws HuffmanError INVALID_FORMAT on a missing or wrong magic or inconsistent counts
 * @throws HuffmanError TRUNCATED_HEADER if the data is shorter than the header
 */
export function deserializeHeader(data: Uint8Array): CompressedHeader {
  if (data.length < MAGIC_BYTES.length) {
    throw new HuffmanError(
      'INVALID_FORMAT',
      `Invalid file format: ${data.length} bytes cannot hold the magic bytes`
    );
  }

  const magic = data.slice(0, 4);
  if (
    magic[0] !== MAGIC_BYTES[0] ||
    magic[1] !== MAGIC_BYTES[1] ||
    magic[2] !== MAGIC_BYTES[2] ||
    magic[3] !== MAGIC_BYTES[3]
  ) {
    throw new HuffmanError('INVALID_FORMAT', 'Invalid file format: magic bytes mismatch');
  }

  if (data.length < BASE_HEADER_SIZE) {
    throw new HuffmanError(
      'TRUNCATED_HEADER',
      `Invalid header: expected at least ${BASE_HEADER_SIZE} bytes, got ${data.length}`
    );
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const originalLength = readSafeInteger(view, 4, 'original length');

  if (originalLength === 0) {
    return { magic, originalLength, frequencies: null };
  }

  if (data.length < FULL_HEADER_SIZE) {
    throw new HuffmanError(
      'TRUNCATED_HEADER',
      `Invalid header: expected ${FULL_HEADER_SIZE} bytes, got ${data.length}`
    );
  }

  const frequencies = new Array<number>(SYMBOL_COUNT);
  for (let i = 0; i < SYMBOL_COUNT; i++) {
    frequencies[i] = readSafeInteger(view, BASE_HEADER_SIZE + i * 8, `count of byte ${i}`);
  }

  const total = totalFrequency(frequencies);
  if (total !== originalLength) {
    throw new HuffmanError(
      'INVALID_FORMAT',
      `Invalid header: frequency total ${total} does not match original length ${originalLength}`
    );
  }

  return { magic, originalLength, frequencies };
}

/**
 * Combine header and payload into a single buffer.
 */
export function combineHeaderAndPayload(
  header: Uint8Array,
  payload: Uint8Array
): Uint8Array {
  const result = new Uint8Array(header.length + payload.length);
  result.set(header, 0);
  result.set(payload, header.length);
  return result;
}

/**
 * Split data into header and payload.
 */
export function splitHeaderAndPayload(
  data: Uint8Array
): { header: CompressedHeader; payload: Uint8Array } {
  const header = deserializeHeader(data);
  const payload = data.slice(headerSize(header));
  return { header, payload };
}
