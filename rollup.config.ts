import { builtinModules, createRequire } from 'node:module';

import commonjsPlugin from '@rollup/plugin-commonjs';
import jsonPlugin from '@rollup/plugin-json';
import { nodeResolve } from '@rollup/plugin-node-resolve';
import typescriptPlugin from '@rollup/plugin-typescript';
import fs from 'fs-extra';
import type { InputOptions, RollupOptions } from 'rollup';
import dtsPlugin from 'rollup-plugin-dts';

const require = createRequire(import.meta.url);
type PackageJson = {
  dependencies?: Record<string, string>;
  peerDependencies?: Record<string, string>;
};
const pkg = require('./package.json') as PackageJson;

/**
 * Externalization rules:
 * - Treat Node built-ins and all runtime deps/peerDeps as external.
 * - Also treat dependency *subpath* imports as external (e.g.
 *   `@karmaniverous/get-dotenv/cliHost`), not just the package root.
 */
const runtimeDeps = [
  ...Object.keys(pkg.dependencies ?? {}),
  ...Object.keys(pkg.peerDependencies ?? {}),
  'tslib',
];
const runtimeDepSet = new Set(runtimeDeps);
const runtimeDepPrefixes = runtimeDeps.map((d) => `${d}/`);
const builtinSet = new Set(builtinModules);

const isNodeBuiltin = (id: string): boolean => {
  const bare = id.startsWith('node:') ? id.slice(5) : id;
  return builtinSet.has(bare) || builtinSet.has(id);
};

const isExternal = (id: string): boolean => {
  if (!id) return false;
  if (id.startsWith('\0')) return false;
  if (id.startsWith('.') || id.startsWith('/')) return false;
  if (isNodeBuiltin(id)) return true;
  if (runtimeDepSet.has(id)) return true;
  return runtimeDepPrefixes.some((p) => id.startsWith(p));
};

const outputPath = 'dist';

// Rollup writes bundle outputs; the TS plugin only transpiles.
const typescript = typescriptPlugin({
  tsconfig: './tsconfig.json',
  outputToFilesystem: false,
  include: ['src/**/*.ts'],
  exclude: ['**/*.test.ts'],
  noEmit: false,
  declaration: false,
  declarationMap: false,
  incremental: false,
});

const commonInputOptions: InputOptions = {
  input: 'src/index.ts',
  external: (id) => isExternal(id),
  plugins: [commonjsPlugin(), jsonPlugin(), nodeResolve(), typescript],
};

/**
 * Discover CLI commands under src/cli. Kept synchronous so Rollup can load
 * this config via `--configPlugin`.
 */
let cliCommands: string[] = [];
try {
  cliCommands = fs.readdirSync('src/cli');
} catch {
  cliCommands = [];
}

const config: RollupOptions[] = [
  // Library output (ESM).
  {
    ...commonInputOptions,
    output: [{ dir: `${outputPath}/mjs`, format: 'esm' }],
  },

  // Bundled type definitions.
  {
    input: 'src/index.ts',
    output: [{ file: `${outputPath}/index.d.ts`, format: 'esm' }],
    external: (id) => isExternal(id),
    plugins: [dtsPlugin()],
  },

  // CLI output.
  ...cliCommands.map<RollupOptions>((c) => ({
    ...commonInputOptions,
    input: `src/cli/${c}/index.ts`,
    output: [
      {
        dir: `${outputPath}/cli/${c}`,
        format: 'esm',
        banner: '#!/usr/bin/env node',
      },
    ],
  })),
];

export default config;
