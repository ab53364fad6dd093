import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { describe, it, expect } from 'vitest';
import { z } from 'zod';

const PACKAGES_DIR = fileURLToPath(new URL('../../../', import.meta.url));
const BUILT_PACKAGES = ['types', 'uci', 'core', 'cli'];

const manifestSchema = z.object({
  name: z.string(),
  exports: z.record(z.object({ types: z.string(), default: z.string() })),
  bin: z.record(z.string()).optional(),
  dependencies: z.record(z.string()).optional(),
});

const buildConfigSchema = z.object({
  compilerOptions: z.object({ rootDir: z.string(), outDir: z.string() }),
  references: z.array(z.object({ path: z.string() })).optional(),
});

function readJson<T>(schema: z.ZodType<T>, path: string): T {
  return schema.parse(JSON.parse(readFileSync(`${PACKAGES_DIR}${path}`, 'utf-8')));
}

/** Where tsc writes the output for a source file under src/ */
function compiledPath(source: string): string {
  return source.replace(/^\.\/src\//, './dist/').replace(/\.ts$/, '.js');
}

describe('Workspace packaging', () => {
  describe.each(BUILT_PACKAGES)('%s', (name) => {
    const manifest = readJson(manifestSchema, `${name}/package.json`);
    const build = readJson(buildConfigSchema, `${name}/tsconfig.build.json`);

    it('should build src/ into dist/', () => {
      expect(build.compilerOptions).toMatchObject({ rootDir: 'src', outDir: 'dist' });
    });

    it('should give Node the compiled file for every export', () => {
      for (const target of Object.values(manifest.exports)) {
        expect(target.types).toMatch(/^\.\/src\/.+\.ts$/);
        expect(existsSync(`${PACKAGES_DIR}${name}/${target.types.slice(2)}`)).toBe(true);
        expect(target.default).toBe(compiledPath(target.types));
      }
    });

    it('should reference the build of every workspace dependency', () => {
      const workspaceDeps = Object.keys(manifest.dependencies ?? {})
        .filter((dep) => dep.startsWith('@enginelens/'))
        .map((dep) => `../${dep.slice('@enginelens/'.length)}/tsconfig.build.json`);

      expect((build.references ?? []).map((ref) => ref.path).sort()).toEqual(workspaceDeps.sort());
    });
  });

  it('should point the enginelens binary at the compiled bin entry', () => {
    const manifest = readJson(manifestSchema, 'cli/package.json');

    expect(manifest.bin).toEqual({ enginelens: './dist/bin.js' });
    const source = readFileSync(`${PACKAGES_DIR}cli/src/bin.ts`, 'utf-8');
    expect(source.startsWith('#!/usr/bin/env node\n')).toBe(true);
  });
});
