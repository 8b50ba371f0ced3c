/**
 * Example: Compress or decompress a file from the command line.
 *
 * Usage:
 *   npx tsx examples/compress.ts -c <input_file> <output_file>
 *   npx tsx examples/compress.ts -d <input_file> <output_file>
 *
 * Add --progress to print packing progress.
 */

import { performance } from 'perf_hooks';
import {
  compressFile,
  decompressFile,
  isHuffmanError,
  type FileOperationResult,
  type ProgressInfo,
} from '../src/index.js';

type Mode = 'compress' | 'decompress';

interface Options {
  mode: Mode;
  inputPath: string;
  outputPath: string;
  progress: boolean;
}

function printUsage(): void {
  console.error('Usage: npx tsx examples/compress.ts [mode] [input_file] [output_file]');
  console.error('Modes:');
  console.error('  -c : Compress');
  console.error('  -d : Decompress');
}

function parseArgs(): Options | null {
  const args = process.argv.slice(2);
  const progress = args.includes('--progress');
  const positional = args.filter((arg) => arg !== '--progress');

  if (positional.length !== 3) {
    printUsage();
    return null;
  }

  const [flag, inputPath, outputPath] = positional;
  let mode: Mode;
  if (flag === '-c') {
    mode = 'compress';
  } else if (flag === '-d') {
    mode = 'decompress';
  } else {
    console.error(`❌ Invalid mode '${flag}'`);
    printUsage();
    return null;
  }

  return { mode, inputPath, outputPath, progress };
}

function printProgress(progress: ProgressInfo): void {
  if (progress.stage === 'encoding' || progress.stage === 'decoding') {
    process.stdout.write(
      `\r  ${progress.stage === 'encoding' ? 'Encoding' : 'Decoding'}: ${progress.current}/${progress.total} bytes`
    );
  }
}

async function main(): Promise<number> {
  const options = parseArgs();
  if (!options) return 1;

  console.log(`Mode: ${options.mode === 'compress' ? 'Compress' : 'Decompress'}`);
  console.log(`Input: ${options.inputPath}`);
  console.log(`Output: ${options.outputPath}`);

  const compressorOptions = options.progress ? { onProgress: printProgress } : undefined;
  const start = performance.now();

  let result: FileOperationResult;
  try {
    result =
      options.mode === 'compress'
        ? await compressFile(options.inputPath, options.outputPath, compressorOptions)
        : await decompressFile(options.inputPath, options.outputPath, compressorOptions);
  } catch (err) {
    if (options.progress) console.log();
    if (isHuffmanError(err)) {
      console.error(`❌ ${err.code}: ${err.message}`);
    } else {
      console.error('❌ Error:', err);
    }
    console.error(options.mode === 'compress' ? 'Compression failed.' : 'Decompression failed.');
    return 1;
  }

  const elapsed = (performance.now() - start) / 1000;
  if (options.progress) console.log();

  console.log('📊 Results:');
  console.log(`  Input size:  ${result.inputSize} bytes`);
  console.log(`  Output size: ${result.outputSize} bytes`);
  if (options.mode === 'compress' && result.inputSize > 0) {
    console.log(`  Compression ratio: ${(result.inputSize / result.outputSize).toFixed(2)}x`);
  }
  console.log(`Operation finished in ${elapsed.toFixed(4)} seconds.`);

  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('Error:', err);
    process.exit(1);
  });
