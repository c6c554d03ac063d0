/**
 * Warden CLI — Manifest Tests
 *
 * The emitted CLI runs under plain Node.js, so every workspace must export
 * built JavaScript by default and keep its sources behind the `source`
 * condition.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';

const ROOT = join(dirname(fileURLToPath(import.meta.url)), '..', '..', '..');

const WORKSPACES = [
  'packages/confine',
  'packages/kernel',
  'packages/provider-loader',
  'packages/runtime-host',
  'modules/first-party/package',
  'packages/cli',
];

function readManifest(dir: string): unknown {
  const parsed: unknown = JSON.parse(readFileSync(join(ROOT, dir, 'package.json'), 'utf-8'));
  return parsed;
}

/** The string at a key path of a parsed JSON value, if there is one. */
function stringAt(value: unknown, ...keys: ReadonlyArray<string>): string | undefined {
  let current = value;
  for (const key of keys) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Reflect.get(current, key);
  }
  return typeof current === 'string' ? current : undefined;
}

describe('workspace manifests', () => {
  it.each(WORKSPACES)('%s exports built output by default and sources under "source"', (dir) => {
    const manifest = readManifest(dir);

    expect(stringAt(manifest, 'exports', '.', 'default')).toBe('./dist/index.js');
    expect(stringAt(manifest, 'exports', '.', 'types')).toBe('./dist/index.d.ts');
    expect(stringAt(manifest, 'exports', '.', 'source')).toBe('./src/index.ts');
    expect(existsSync(join(ROOT, dir, 'src', 'index.ts'))).toBe(true);
  });

  it.each(WORKSPACES)('%s builds its sources into its own dist', (dir) => {
    const config: unknown = JSON.parse(readFileSync(join(ROOT, dir, 'tsconfig.build.json'), 'utf-8'));

    expect(stringAt(config, 'compilerOptions', 'rootDir')).toBe('src');
    expect(stringAt(config, 'compilerOptions', 'outDir')).toBe('dist');
  });

  it('points the warden bin at the compiled entry point', () => {
    expect(stringAt(readManifest('packages/cli'), 'bin', 'warden')).toBe('./dist/bin/warden.js');
    expect(stringAt(readManifest('.'), 'bin', 'warden')).toBe('packages/cli/dist/bin/warden.js');
    expect(existsSync(join(ROOT, 'packages', 'cli', 'src', 'bin', 'warden.ts'))).toBe(true);
  });
});
