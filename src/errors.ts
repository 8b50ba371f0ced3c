/**
 * Error kinds raised by the codec.
 *
 * An empty input is not an error: it encodes to a header-only container.
 */
export type HuffmanErrorCode =
  | 'INVALID_FORMAT'
  | 'TRUNCATED_HEADER'
  | 'TRUNCATED_BODY'
  | 'ALLOCATION_FAILURE';

export class HuffmanError extends Error {
  readonly code: HuffmanErrorCode;

  constructor(code: HuffmanErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HuffmanError';
    this.code = code;
  }
}

/**
 * Check whether a value is a HuffmanError, optionally of a given code.
 */
export function isHuffmanError(
  value: unknown,
  code?: HuffmanErrorCode
): value is HuffmanError {
  return value instanceof HuffmanError && (code === undefined || value.code === code);
}

/**
 * Run an allocation-heavy step, turning a RangeError into ALLOCATION_FAILURE.
 */
export function guardAllocation<T>(what: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof RangeError) {
      throw new HuffmanError(
        'ALLOCATION_FAILURE',
        `Failed to allocate ${what}: ${error.message}`,
        { cause: error }
      );
    }
    throw error;
  }
}
