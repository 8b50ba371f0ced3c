import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import { fileURLToPath } from 'url';
import tsupConfig from '../tsup.config.js';

const manifest: unknown = JSON.parse(
  fs.readFileSync(fileURLToPath(new URL('../package.json', import.meta.url)), 'utf8')
);

describe('Package entry points', () => {
  it('should map both bundle formats built by tsup', () => {
    expect(tsupConfig).toMatchObject({ format: ['cjs', 'esm'] });
    expect(manifest).toMatchObject({
      exports: {
        '.': {
          import: { types: './dist/index.d.ts', default: './dist/index.js' },
          require: { types: './dist/index.d.cts', default: './dist/index.cjs' },
        },
      },
    });
  });
});
