import { describe, it, expect } from 'vitest';
import {
  HuffmanCompressor,
  HuffmanError,
  encode,
  decode,
  isHuffmanError,
  createHeader,
  serializeHeader,
  FULL_HEADER_SIZE,
  BASE_HEADER_SIZE,
  type ProgressInfo,
  type HuffmanErrorCode,
} from '../src/index.js';

/** Deterministic pseudo-random bytes (LCG). */
function pseudoRandomBytes(length: number, seed: number): Uint8Array {
  const out = new Uint8Array(length);
  let state = seed >>> 0;
  for (let i = 0; i < length; i++) {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    out[i] = state >>> 24;
  }
  return out;
}

function errorCodeOf(fn: () => unknown): HuffmanErrorCode | undefined {
  try {
    fn();
  } catch (err) {
    if (isHuffmanError(err)) return err.code;
    throw err;
  }
  return undefined;
}

const AAABB = new TextEncoder().encode('AAABB');

describe('encode / decode round-trip', () => {
  it('should round-trip an empty input', () => {
    const container = encode(new Uint8Array(0));

    expect(container.length).toBe(BASE_HEADER_SIZE);
    expect(decode(container)).toEqual(new Uint8Array(0));
  });

  it('should round-trip a single repeated byte', () => {
    const data = new Uint8Array(1000).fill(0x41);
    const container = encode(data);

    // 1000 one-bit codes
    expect(container.length).toBe(FULL_HEADER_SIZE + 125);
    expect(decode(container)).toEqual(data);
  });

  it('should round-trip a single byte', () => {
    const data = new Uint8Array([0xff]);

    expect(decode(encode(data))).toEqual(data);
  });

  it('should round-trip all 256 byte values once each', () => {
    const data = Uint8Array.from({ length: 256 }, (_, i) => i);
    const container = encode(data);

    expect(container.length).toBe(FULL_HEADER_SIZE + 256);
    expect(decode(container)).toEqual(data);
  });

  it('should round-trip pseudo-random binary data', () => {
    for (const [length, seed] of [
      [1, 1],
      [7, 2],
      [4096, 3],
      [100_003, 4],
    ]) {
      const data = pseudoRandomBytes(length, seed);
      expect(decode(encode(data))).toEqual(data);
    }
  });

  it('should round-trip text', () => {
    const text = 'the quick brown fox jumps over the lazy dog\n'.repeat(50);
    const data = new TextEncoder().encode(text);
    const restored = decode(encode(data));

    expect(new TextDecoder().decode(restored)).toBe(text);
  });

  it('should round-trip data with a very skewed distribution', () => {
    const data = new Uint8Array(5000);
    let pos = 0;
    for (let symbol = 0; symbol < 12 && pos < data.length; symbol++) {
      const run = Math.min(2 ** symbol, data.length - pos);
      data.fill(symbol, pos, pos + run);
      pos += run;
    }
    data.fill(200, pos);

    expect(decode(encode(data))).toEqual(data);
  });
});

describe('container layout', () => {
  it('should encode AAABB into a one-byte body', () => {
    const container = encode(AAABB);

    expect(container.length).toBe(FULL_HEADER_SIZE + 1);
    expect(Array.from(container.slice(0, 12))).toEqual([
      0x48, 0x55, 0x46, 0x46, 5, 0, 0, 0, 0, 0, 0, 0,
    ]);
    // Counts for 'A' (65) and 'B' (66)
    expect(container[12 + 65 * 8]).toBe(3);
    expect(container[12 + 66 * 8]).toBe(2);
    // A = 1, B = 0: 11100 + three padding zeros
    expect(container[FULL_HEADER_SIZE]).toBe(0xe0);
    expect(decode(container)).toEqual(AAABB);
  });

  it('should follow the 2060-byte header with a non-empty body', () => {
    for (const data of [AAABB, new Uint8Array([0]), pseudoRandomBytes(300, 9)]) {
      const container = encode(data);
      const bodyBits = (container.length - FULL_HEADER_SIZE) * 8;

      expect(container.length).toBeGreaterThan(FULL_HEADER_SIZE);
      expect(bodyBits).toBeGreaterThanOrEqual(data.length);
    }
  });

  it('should be deterministic', () => {
    const data = pseudoRandomBytes(2000, 42);

    expect(encode(data)).toEqual(encode(new Uint8Array(data)));
  });
});

describe('compression bounds', () => {
  it('should shrink highly skewed input', () => {
    const data = new Uint8Array(10_000).fill(0x20);
    for (let i = 0; i < 100; i++) {
      data[i * 100] = 0x30 + (i % 10);
    }
    const body = encode(data).length - FULL_HEADER_SIZE;

    expect(body).toBeLessThan(data.length);
  });

  it('should keep equally frequent values at one byte each', () => {
    const data = new Uint8Array(1024);
    for (let i = 0; i < data.length; i++) {
      data[i] = (i * 37) & 0xff;
    }
    const body = encode(data).length - FULL_HEADER_SIZE;

    expect(body).toBe(data.length);
  });
});

describe('decode errors', () => {
  it('should fail with INVALID_FORMAT on a corrupted magic', () => {
    const container = encode(AAABB);
    container[2] ^= 0xff;

    expect(errorCodeOf(() => decode(container))).toBe('INVALID_FORMAT');
  });

  it('should fail with INVALID_FORMAT on a corrupted magic of an empty container', () => {
    const container = encode(new Uint8Array(0));
    container[0] = 0x00;

    expect(errorCodeOf(() => decode(container))).toBe('INVALID_FORMAT');
  });

  it('should fail with INVALID_FORMAT when the magic is absent', () => {
    const text = new TextEncoder();

    expect(errorCodeOf(() => decode(new Uint8Array(0)))).toBe('INVALID_FORMAT');
    expect(errorCodeOf(() => decode(text.encode('hi!')))).toBe('INVALID_FORMAT');
    expect(errorCodeOf(() => decode(text.encode('xyzw')))).toBe('INVALID_FORMAT');
    expect(errorCodeOf(() => decode(encode(AAABB).slice(0, 3)))).toBe('INVALID_FORMAT');
  });

  it('should fail with TRUNCATED_HEADER on a short container', () => {
    const container = encode(AAABB);

    expect(errorCodeOf(() => decode(container.slice(0, 10)))).toBe('TRUNCATED_HEADER');
    expect(errorCodeOf(() => decode(container.slice(0, 500)))).toBe('TRUNCATED_HEADER');
  });

  it('should fail with TRUNCATED_BODY when the body is cut', () => {
    const data = pseudoRandomBytes(1000, 7);
    const container = encode(data);

    expect(errorCodeOf(() => decode(container.slice(0, container.length - 1)))).toBe(
      'TRUNCATED_BODY'
    );
    expect(errorCodeOf(() => decode(container.slice(0, FULL_HEADER_SIZE)))).toBe(
      'TRUNCATED_BODY'
    );
  });

  it('should fail with ALLOCATION_FAILURE for an impossible output size', () => {
    const length = 2 ** 50;
    const table = new Array<number>(256).fill(0);
    table[0] = length;
    const container = serializeHeader(createHeader(length, table));

    let caught: unknown;
    try {
      decode(container);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(HuffmanError);
    expect(caught).toMatchObject({ code: 'ALLOCATION_FAILURE' });
    expect(caught).toHaveProperty('cause');
  });

  it('should ignore trailing bytes after a complete body', () => {
    const container = encode(AAABB);
    const padded = new Uint8Array(container.length + 3);
    padded.set(container);

    expect(decode(padded)).toEqual(AAABB);
  });
});

describe('HuffmanCompressor', () => {
  it('should report compression statistics', () => {
    const result = new HuffmanCompressor().compress(AAABB);

    expect(result.originalSize).toBe(5);
    expect(result.compressedSize).toBe(FULL_HEADER_SIZE + 1);
    expect(result.data.length).toBe(result.compressedSize);
    expect(result.compressionRatio).toBeCloseTo(5 / 2061, 10);
    expect(result.distinctSymbols).toBe(2);
  });

  it('should report statistics for an empty input', () => {
    const result = new HuffmanCompressor().compress(new Uint8Array(0));

    expect(result).toMatchObject({
      originalSize: 0,
      compressedSize: BASE_HEADER_SIZE,
      compressionRatio: 0,
      distinctSymbols: 0,
    });
  });

  it('should report progress through each stage', () => {
    const events: ProgressInfo[] = [];
    const compressor = new HuffmanCompressor({ onProgress: (p) => events.push(p) });

    const { data } = compressor.compress(AAABB);
    expect(events).toEqual([
      { stage: 'counting', current: 0, total: 1 },
      { stage: 'counting', current: 1, total: 1 },
      { stage: 'building', current: 0, total: 1 },
      { stage: 'building', current: 1, total: 1 },
      { stage: 'encoding', current: 0, total: 5 },
      { stage: 'encoding', current: 5, total: 5 },
    ]);

    events.length = 0;
    compressor.decompress(data);
    expect(events).toEqual([
      { stage: 'building', current: 0, total: 1 },
      { stage: 'building', current: 1, total: 1 },
      { stage: 'decoding', current: 0, total: 5 },
      { stage: 'decoding', current: 5, total: 5 },
    ]);
  });

  it('should honour the progress interval', () => {
    const events: ProgressInfo[] = [];
    const compressor = new HuffmanCompressor({
      progressInterval: 1000,
      onProgress: (p) => events.push(p),
    });

    compressor.compress(new Uint8Array(2500).fill(1));

    const encoding = events.filter((e) => e.stage === 'encoding').map((e) => e.current);
    expect(encoding).toEqual([0, 1000, 2000, 2500]);
  });
});
