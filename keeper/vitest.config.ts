import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const rootDir = fileURLToPath(new URL('.', import.meta.url));
const srcDir = path.join(rootDir, 'src');
const testDir = path.join(rootDir, 'test');

function isKeeperSource(importer: string | undefined): boolean {
  if (!importer) return false;
  return importer.startsWith(srcDir) || importer.startsWith(testDir);
}

export default defineConfig({
  plugins: [
    {
      name: 'keeper-resolve-js-to-ts',
      enforce: 'pre',
      async resolveId(source: string, importer: string | undefined) {
        // NodeNext-style relative imports inside this package only.
        if (!isKeeperSource(importer)) return null;
        if (!source.endsWith('.js')) return null;
        if (!source.startsWith('./') && !source.startsWith('../')) return null;

        const tsSource = `${source.slice(0, -3)}.ts`;
        const resolved = await this.resolve(tsSource, importer, { skipSelf: true });
        return resolved?.id ?? null;
      },
    },
  ],
  resolve: {
    alias: {
      '@dutchmine/sdk': path.join(rootDir, '../sdk/src/index.ts'),
    },
  },
  test: {
    name: 'keeper',
    environment: 'node',
    include: ['test/**/*.test.ts'],
    testTimeout: 10_000,
  },
});
