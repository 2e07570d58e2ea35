import { defineConfig } from 'tsup';
import type { Options } from 'tsup';

// Runtime dependencies stay external; everything under the path aliases is bundled
const externalDependencies = [
  'chalk',
  'winston'
];

type EsbuildOptions = Parameters<NonNullable<Options['esbuildOptions']>>[0];

const esbuildOptions = (options: EsbuildOptions): void => {
  options.alias = {
    '@core': './core',
    '@services': './services',
    '@interpreter': './interpreter',
    '@cli': './cli',
    '@api': './api'
  };
  options.platform = 'node';
  options.keepNames = true;
  options.target = 'node20';
};

export default defineConfig([
  // API build
  {
    entry: {
      index: 'api/index.ts'
    },
    format: ['esm'],
    dts: true,
    clean: true,
    sourcemap: true,
    splitting: false,
    outDir: 'dist',
    external: externalDependencies,
    esbuildOptions
  },
  // CLI build
  {
    entry: {
      cli: 'cli/cli-entry.ts'
    },
    format: ['esm'],
    dts: false,
    clean: false,
    sourcemap: true,
    outDir: 'dist',
    external: externalDependencies,
    banner: {
      js: '#!/usr/bin/env node'
    },
    esbuildOptions
  }
]);
