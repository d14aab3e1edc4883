import { describe, expect, it } from 'vitest';

import { readFileSync } from 'node:fs';

type Manifest = { exports: Record<string, { types: string; default: string }> };
type BuildConfig = { compilerOptions: { rootDir: string; outDir: string }; include: string[] };

function readJson(name: string): unknown {
  return JSON.parse(readFileSync(new URL(`../${name}`, import.meta.url), 'utf8'));
}

describe('package entry points', () => {
  it('serves source types and runs from the emitted build', () => {
    const manifest = readJson('package.json') as Manifest;
    const build = readJson('tsconfig.build.json') as BuildConfig;

    const entry = manifest.exports['.'];
    expect(entry.types).toBe('./src/index.ts');
    expect(entry.default).toBe('./dist/index.js');

    // src/index.ts must land on dist/index.js.
    expect(build.compilerOptions).toMatchObject({ rootDir: 'src', outDir: 'dist' });
    expect(build.include).toEqual(['src']);
  });
});
