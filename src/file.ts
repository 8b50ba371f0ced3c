import { readFile, writeFile } from 'fs/promises';
import { HuffmanCompressor, type CompressorOptions } from './compressor.js';

/**
 * Sizes of the file read and the file written.
 */
export interface FileOperationResult {
  inputSize: number;
  outputSize: number;
}

/**
 * Compress a file into a container file.
 */
export async function compressFile(
  inputPath: string,
  outputPath: string,
  options?: CompressorOptions
): Promise<FileOperationResult> {
  const input = await readFile(inputPath);
  const result = new HuffmanCompressor(options).compress(input);
  await writeFile(outputPath, result.data);
  return { inputSize: input.length, outputSize: result.data.length };
}

/**
 * Restore a file from a container file.
 * Nothing is written if the container fails to decode.
 */
export async function decompressFile(
  inputPath: string,
  outputPath: string,
  options?: CompressorOptions
): Promise<FileOperationResult> {
  const input = await readFile(inputPath);
  const output = new HuffmanCompressor(options).decompress(input);
  await writeFile(outputPath, output);
  return { inputSize: input.length, outputSize: output.length };
}
