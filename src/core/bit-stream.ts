/**
 * Bit 0 or 1.
 */
export type Bit = 0 | 1;

const INITIAL_CAPACITY = 1024;

/**
 * Bit-level output stream, most significant bit first within each byte.
 * Accumulates bits and outputs bytes when full.
 */
export class BitOutputStream {
  private buffer: Uint8Array;
  private length: number = 0;
  private currentByte: number = 0;
  private bitPosition: number = 0;

  /**
   * @param capacity - Initial byte capacity; the buffer grows as needed
   */
  constructor(capacity: number = INITIAL_CAPACITY) {
    this.buffer = new Uint8Array(Math.max(1, capacity));
  }

  /**
   * Write a single bit to the stream.
   */
  writeBit(bit: number): void {
    this.currentByte = (this.currentByte << 1) | (bit & 1);
    this.bitPosition++;

    if (this.bitPosition === 8) {
      this.pushByte(this.currentByte);
      this.currentByte = 0;
      this.bitPosition = 0;
    }
  }

  /**
   * Write a code given as a string of '0' and '1' characters.
   */
  writeCode(code: string): void {
    for (let i = 0; i < code.length; i++) {
      this.writeBit(code.charCodeAt(i) === 0x31 ? 1 : 0);
    }
  }

  /**
   * Flush any remaining bits, padding with zeros.
   * Must be called after all data is written.
   */
  flush(): void {
    if (this.bitPosition > 0) {
      this.pushByte(this.currentByte << (8 - this.bitPosition));
      this.currentByte = 0;
      this.bitPosition = 0;
    }
  }

  /**
   * Copy the complete bytes into a new array.
   * Call flush() first to include a partial byte.
   */
  toUint8Array(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }

  private pushByte(byte: number): void {
    if (this.length === this.buffer.length) {
      const grown = new Uint8Array(this.buffer.length * 2);
      grown.set(this.buffer);
      this.buffer = grown;
    }
    this.buffer[this.length++] = byte & 0xff;
  }
}

/**
 * Bit-level input stream reading MSB first from a Uint8Array.
 */
export class BitInputStream {
  private data: Uint8Array;
  private bytePosition: number = 0;
  private bitPosition: number = 0;

  constructor(data: Uint8Array) {
    this.data = data;
  }

  /**
   * Read a single bit, or -1 once the data is exhausted.
   */
  readBit(): Bit | -1 {
    if (this.bytePosition >= this.data.length) {
      return -1;
    }

    const bit = (this.data[this.bytePosition] >>> (7 - this.bitPosition)) & 1;
    this.bitPosition++;

    if (this.bitPosition === 8) {
      this.bytePosition++;
      this.bitPosition = 0;
    }

    return bit === 1 ? 1 : 0;
  }

  /**
   * Get current position in bits.
   */
  get position(): number {
    return this.bytePosition * 8 + this.bitPosition;
  }
}
