/**
 * Number of distinct byte values.
 */
export const SYMBOL_COUNT = 256;

/**
 * Occurrence count per byte value, indexed 0-255. Zero means absent.
 */
export type FrequencyTable = readonly number[];

/**
 * Count how often each byte value occurs in the input.
 */
export function countFrequencies(data: Uint8Array): number[] {
  const table = new Array<number>(SYMBOL_COUNT).fill(0);
  for (let i = 0; i < data.length; i++) {
    table[data[i]]++;
  }
  return table;
}

/**
 * Sum of all counts, i.e. the length of the input the table describes.
 */
export function totalFrequency(table: FrequencyTable): number {
  let total = 0;
  for (const count of table) {
    total += count;
  }
  return total;
}

/**
 * Number of byte values with a non-zero count.
 */
export function distinctSymbols(table: FrequencyTable): number {
  let count = 0;
  for (const freq of table) {
    if (freq > 0) count++;
  }
  return count;
}
